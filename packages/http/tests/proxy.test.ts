import { describe, it, expect } from 'vitest';
import { FileOptionErrorCodes, FileSystemOptions } from '@vfs-connect/core';
import { HTTP_PARAMS, httpConfig } from '../src/config-builder.js';
import { StaticUserAuthenticator } from '../src/connector.js';
import { ProxyAuthenticator, ProxyHost, ProxyPort, ProxyScheme } from '../src/options/proxy.js';
import { caught } from './helpers.js';

describe('ProxyAuthenticator', () => {
  it('hands static credentials to the connector', () => {
    const opts = new FileSystemOptions();
    ProxyAuthenticator.fromJson({ id: 'proxy-user', password: 'test-secret', domain: 'CORP' }).apply(opts);

    const authenticator = httpConfig.get(opts, HTTP_PARAMS.proxyAuthenticator);
    expect(authenticator).toBeInstanceOf(StaticUserAuthenticator);
    expect(authenticator?.username).toBe('proxy-user');
    expect(authenticator?.password).toBe('test-secret');
    expect(authenticator?.domain).toBe('CORP');
  });

  it('leaves absent and null members out of the projection', () => {
    const option = ProxyAuthenticator.fromJson({ id: 'proxy-user', password: null });
    expect(option.value).toEqual({ id: 'proxy-user' });
    expect(option.toString()).toBe('{"http:proxyAuthenticator":{"id":"proxy-user"}}');
  });

  it('treats every member as optional', () => {
    expect(ProxyAuthenticator.fromJson({}).getValue()).toEqual({});
    expect(ProxyAuthenticator.of({ password: 'test-secret' }).getValue()).toEqual({ password: 'test-secret' });
  });

  it('projects members in a fixed order', () => {
    const option = ProxyAuthenticator.of({ domain: 'CORP', password: 'test-secret', id: 'proxy-user' });
    expect(option.toString()).toBe(
      '{"http:proxyAuthenticator":{"id":"proxy-user","password":"test-secret","domain":"CORP"}}'
    );
  });

  it('names itself in errors', () => {
    const notObject = caught(() => ProxyAuthenticator.fromJson('proxy-user'));
    expect(notObject.code).toBe(FileOptionErrorCodes.INVALID_FORMAT);
    expect(notObject.message).toBe('FileOption value of [http:proxyAuthenticator] must be convertible to JSON object.');

    const badMember = caught(() => ProxyAuthenticator.fromJson({ id: 42 }));
    expect(badMember.code).toBe(FileOptionErrorCodes.INVALID_FORMAT);
    expect(badMember.message).toBe('FileOption value of [http:proxyAuthenticator] member [id] must be string.');
  });

  it('keeps the password out of serialized authenticators', () => {
    const authenticator = new StaticUserAuthenticator(undefined, 'proxy-user', 'test-secret');
    expect(JSON.stringify(authenticator)).toBe('{"username":"proxy-user","password":"[REDACTED]"}');
  });
});

describe('ProxyHost', () => {
  it('sets the host', () => {
    const opts = new FileSystemOptions();
    ProxyHost.fromJson('proxy.internal').apply(opts);
    expect(httpConfig.get(opts, HTTP_PARAMS.proxyHost)).toBe('proxy.internal');
  });

  it('rejects blank hosts', () => {
    const err = caught(() => ProxyHost.of(' '));
    expect(err.code).toBe(FileOptionErrorCodes.INVALID_VALUE);
    expect(err.message).toBe('FileOption value of [http:proxyHost] must be non-empty string.');
  });
});

describe('ProxyPort', () => {
  it('sets the port', () => {
    const opts = new FileSystemOptions();
    ProxyPort.fromJson(3128).apply(opts);
    expect(httpConfig.get(opts, HTTP_PARAMS.proxyPort)).toBe(3128);
  });

  it.each([0, 65_536, 80.5])('rejects %j', (port) => {
    const err = caught(() => ProxyPort.fromJson(port));
    expect(err.code).toBe(FileOptionErrorCodes.INVALID_VALUE);
    expect(err.message).toBe('FileOption value of [http:proxyPort] must be integer between 1 and 65535.');
  });

  it('rejects port strings', () => {
    expect(caught(() => ProxyPort.fromJson('3128')).code).toBe(FileOptionErrorCodes.INVALID_FORMAT);
  });
});

describe('ProxyScheme', () => {
  it('sets the scheme', () => {
    const opts = new FileSystemOptions();
    ProxyScheme.of('https').apply(opts);
    expect(httpConfig.get(opts, HTTP_PARAMS.proxyScheme)).toBe('https');
  });

  it('accepts only http and https', () => {
    const err = caught(() => ProxyScheme.fromJson('socks5'));
    expect(err.code).toBe(FileOptionErrorCodes.INVALID_VALUE);
    expect(err.message).toBe('FileOption value of [http:proxyScheme] must be either [http, https].');
    expect(caught(() => ProxyScheme.fromJson('HTTP')).code).toBe(FileOptionErrorCodes.INVALID_VALUE);
  });
});
