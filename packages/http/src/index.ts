/**
 * vfs-connect HTTP options
 *
 * Importing this package installs the `http:*` option kinds into the default
 * file option registry.
 */

import { fileOptionRegistry } from '@vfs-connect/core';
import { httpFileOptions } from './plugin.js';

fileOptionRegistry.install(httpFileOptions);

export { httpFileOptions } from './plugin.js';

export { HTTP_PARAMS, HTTP_SCOPE, HttpFileSystemConfigBuilder, httpConfig } from './config-builder.js';
export { ClientCookie, StaticUserAuthenticator } from './connector.js';
export type { ClientCookieInit } from './connector.js';
export { COOKIES_OPTION, COOKIE_KEYS, CookieSource } from './cookie-source.js';
export type { CookieSourceInit } from './cookie-source.js';

export { ConnectionTimeout, SocketTimeout } from './options/timeouts.js';
export { KeepAlive, MaxConnectionsPerHost, MaxTotalConnections } from './options/connections.js';
export { HostnameVerification, KeyStoreFile, KeyStoreType, TLS_VERSIONS, TlsVersions } from './options/tls.js';
export type { TlsVersion } from './options/tls.js';
export { PROXY_SCHEMES, ProxyAuthenticator, ProxyHost, ProxyPort, ProxyScheme } from './options/proxy.js';
export type { ProxyCredentials, ProxySchemeName } from './options/proxy.js';
export { FollowRedirect, PreemptiveAuthentication, UrlCharset, UserAgent } from './options/request.js';
export { Cookies } from './options/cookies.js';
