/**
 * HTTP connector configuration builder
 *
 * One setter per connector parameter, each writing a typed parameter into the
 * shared options context. File options call exactly one of these on apply.
 */

import { Duration, defineParam, type FileSystemOptions, type OptionParam } from '@vfs-connect/core';
import { ClientCookie, StaticUserAuthenticator } from './connector.js';

export const HTTP_SCOPE = 'http';

const isString = (v: unknown): v is string => typeof v === 'string';
const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';
const isNumber = (v: unknown): v is number => typeof v === 'number';
const isDuration = (v: unknown): v is Duration => v instanceof Duration;
const isAuthenticator = (v: unknown): v is StaticUserAuthenticator => v instanceof StaticUserAuthenticator;
const isCookies = (v: unknown): v is readonly ClientCookie[] =>
  Array.isArray(v) && v.every((c) => c instanceof ClientCookie);

export const HTTP_PARAMS = {
  connectionTimeout: defineParam(HTTP_SCOPE, 'connectionTimeout', isDuration),
  socketTimeout: defineParam(HTTP_SCOPE, 'socketTimeout', isDuration),
  cookies: defineParam(HTTP_SCOPE, 'cookies', isCookies),
  followRedirect: defineParam(HTTP_SCOPE, 'followRedirect', isBoolean),
  hostnameVerificationEnabled: defineParam(HTTP_SCOPE, 'hostnameVerificationEnabled', isBoolean),
  keepAlive: defineParam(HTTP_SCOPE, 'keepAlive', isBoolean),
  keyStoreFile: defineParam(HTTP_SCOPE, 'keyStoreFile', isString),
  keyStoreType: defineParam(HTTP_SCOPE, 'keyStoreType', isString),
  maxConnectionsPerHost: defineParam(HTTP_SCOPE, 'maxConnectionsPerHost', isNumber),
  maxTotalConnections: defineParam(HTTP_SCOPE, 'maxTotalConnections', isNumber),
  preemptiveAuth: defineParam(HTTP_SCOPE, 'preemptiveAuth', isBoolean),
  proxyAuthenticator: defineParam(HTTP_SCOPE, 'proxyAuthenticator', isAuthenticator),
  proxyHost: defineParam(HTTP_SCOPE, 'proxyHost', isString),
  proxyPort: defineParam(HTTP_SCOPE, 'proxyPort', isNumber),
  proxyScheme: defineParam(HTTP_SCOPE, 'proxyScheme', isString),
  tlsVersions: defineParam(HTTP_SCOPE, 'tlsVersions', isString),
  urlCharset: defineParam(HTTP_SCOPE, 'urlCharset', isString),
  userAgent: defineParam(HTTP_SCOPE, 'userAgent', isString),
} as const;

export class HttpFileSystemConfigBuilder {
  get<T>(opts: FileSystemOptions, param: OptionParam<T>): T | undefined {
    return opts.get(param);
  }

  setConnectionTimeout(opts: FileSystemOptions, timeout: Duration): void {
    opts.set(HTTP_PARAMS.connectionTimeout, timeout);
  }

  setSocketTimeout(opts: FileSystemOptions, timeout: Duration): void {
    opts.set(HTTP_PARAMS.socketTimeout, timeout);
  }

  setCookies(opts: FileSystemOptions, cookies: readonly ClientCookie[]): void {
    opts.set(HTTP_PARAMS.cookies, cookies);
  }

  setFollowRedirect(opts: FileSystemOptions, followRedirect: boolean): void {
    opts.set(HTTP_PARAMS.followRedirect, followRedirect);
  }

  setHostnameVerificationEnabled(opts: FileSystemOptions, enabled: boolean): void {
    opts.set(HTTP_PARAMS.hostnameVerificationEnabled, enabled);
  }

  setKeepAlive(opts: FileSystemOptions, keepAlive: boolean): void {
    opts.set(HTTP_PARAMS.keepAlive, keepAlive);
  }

  setKeyStoreFile(opts: FileSystemOptions, path: string): void {
    opts.set(HTTP_PARAMS.keyStoreFile, path);
  }

  setKeyStoreType(opts: FileSystemOptions, type: string): void {
    opts.set(HTTP_PARAMS.keyStoreType, type);
  }

  setMaxConnectionsPerHost(opts: FileSystemOptions, max: number): void {
    opts.set(HTTP_PARAMS.maxConnectionsPerHost, max);
  }

  setMaxTotalConnections(opts: FileSystemOptions, max: number): void {
    opts.set(HTTP_PARAMS.maxTotalConnections, max);
  }

  setPreemptiveAuth(opts: FileSystemOptions, preemptive: boolean): void {
    opts.set(HTTP_PARAMS.preemptiveAuth, preemptive);
  }

  setProxyAuthenticator(opts: FileSystemOptions, authenticator: StaticUserAuthenticator): void {
    opts.set(HTTP_PARAMS.proxyAuthenticator, authenticator);
  }

  setProxyHost(opts: FileSystemOptions, host: string): void {
    opts.set(HTTP_PARAMS.proxyHost, host);
  }

  setProxyPort(opts: FileSystemOptions, port: number): void {
    opts.set(HTTP_PARAMS.proxyPort, port);
  }

  setProxyScheme(opts: FileSystemOptions, scheme: string): void {
    opts.set(HTTP_PARAMS.proxyScheme, scheme);
  }

  /** Comma-separated protocol names, e.g. `V_1_2,V_1_3` */
  setTlsVersions(opts: FileSystemOptions, versions: string): void {
    opts.set(HTTP_PARAMS.tlsVersions, versions);
  }

  setUrlCharset(opts: FileSystemOptions, charset: string): void {
    opts.set(HTTP_PARAMS.urlCharset, charset);
  }

  setUserAgent(opts: FileSystemOptions, userAgent: string): void {
    opts.set(HTTP_PARAMS.userAgent, userAgent);
  }
}

export const httpConfig = new HttpFileSystemConfigBuilder();
