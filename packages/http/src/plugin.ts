import type { FileOptionPlugin } from '@vfs-connect/core';
import { KeepAlive, MaxConnectionsPerHost, MaxTotalConnections } from './options/connections.js';
import { Cookies } from './options/cookies.js';
import { ProxyAuthenticator, ProxyHost, ProxyPort, ProxyScheme } from './options/proxy.js';
import { FollowRedirect, PreemptiveAuthentication, UrlCharset, UserAgent } from './options/request.js';
import { ConnectionTimeout, SocketTimeout } from './options/timeouts.js';
import { HostnameVerification, KeyStoreFile, KeyStoreType, TlsVersions } from './options/tls.js';

/**
 * Every `http:*` option kind. Adding a kind means adding it here; the
 * registry itself never changes.
 */
export const httpFileOptions: FileOptionPlugin = {
  name: 'http',
  resolvers: [
    ConnectionTimeout,
    Cookies,
    FollowRedirect,
    HostnameVerification,
    KeepAlive,
    KeyStoreFile,
    KeyStoreType,
    MaxConnectionsPerHost,
    MaxTotalConnections,
    PreemptiveAuthentication,
    ProxyAuthenticator,
    ProxyHost,
    ProxyPort,
    ProxyScheme,
    SocketTimeout,
    TlsVersions,
    UrlCharset,
    UserAgent,
  ],
};
