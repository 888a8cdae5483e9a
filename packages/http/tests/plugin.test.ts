import { describe, it, expect } from 'vitest';
import {
  FileOptionErrorCodes,
  FileSystemOptions,
  applyFileOptions,
  fileOptionRegistry,
  resolveFileOption,
  resolveFileOptions,
} from '@vfs-connect/core';
import { HTTP_PARAMS, httpConfig, httpFileOptions, TlsVersions } from '../src/index.js';
import { caught } from './helpers.js';

const document = {
  'http:connectionTimeout': 'PT30S',
  'http:cookies': [{ name: 'session', value: 'abc', path: '/' }],
  'http:followRedirect': true,
  'http:hostnameVerification': true,
  'http:keepAlive': false,
  'http:keyStoreFileUri': 'file:///etc/pki/client.p12',
  'http:keyStoreType': 'PKCS12',
  'http:maxConnectionsPerHost': 4,
  'http:maxTotalConnections': 16,
  'http:preemptiveAuthentication': false,
  'http:proxyAuthenticator': { id: 'proxy-user', password: 'test-secret' },
  'http:proxyHost': 'proxy.internal',
  'http:proxyPort': 8080,
  'http:proxyScheme': 'http',
  'http:socketTimeout': 'PT1M',
  'http:tlsVersions': ['V_1_2', 'V_1_3'],
  'http:urlCharset': 'UTF-8',
  'http:userAgent': 'vfs-connect-test',
};

describe('http file options', () => {
  it('are installed on import, in plugin order', () => {
    expect(fileOptionRegistry.names()).toEqual(httpFileOptions.resolvers.map((resolver) => resolver.name));
    expect(fileOptionRegistry.names()).toEqual(Object.keys(document));
  });

  it('install only once', () => {
    fileOptionRegistry.install(httpFileOptions);
    expect(fileOptionRegistry.names()).toHaveLength(18);
  });

  it('resolve by name to the same option the kind builds', () => {
    const resolved = resolveFileOption('http:tlsVersions', ['V_1_1', 'V_1_2', 'V_1_3']);
    expect(resolved.equals(TlsVersions.fromJson(['V_1_1', 'V_1_2', 'V_1_3']))).toBe(true);
    expect(TlsVersions.is(resolved)).toBe(true);
    expect(resolved.getValue()).toBe('V_1_1,V_1_2,V_1_3');
  });

  it('reject names nobody registered', () => {
    const err = caught(() => resolveFileOption('http:retryCount', 3));
    expect(err.code).toBe(FileOptionErrorCodes.UNKNOWN_OPTION);
    expect(err.message).toBe('FileOption [http:retryCount] is not registered.');
  });

  it('read back their own projections', () => {
    for (const option of resolveFileOptions(document)) {
      const again = resolveFileOption(option.getName(), option.getValue());
      expect(again.equals(option)).toBe(true);
    }
  });

  it('configure every connector parameter from one document', () => {
    const opts = applyFileOptions(resolveFileOptions(document), new FileSystemOptions());

    expect(opts.size).toBe(18);
    expect(httpConfig.get(opts, HTTP_PARAMS.socketTimeout)?.toString()).toBe('PT1M');
    expect(httpConfig.get(opts, HTTP_PARAMS.keyStoreFile)).toBe('/etc/pki/client.p12');
    expect(httpConfig.get(opts, HTTP_PARAMS.proxyAuthenticator)?.username).toBe('proxy-user');
    expect(httpConfig.get(opts, HTTP_PARAMS.tlsVersions)).toBe('V_1_2,V_1_3');
    expect(httpConfig.get(opts, HTTP_PARAMS.cookies)?.[0]?.path).toBe('/');
  });

  it('fail as a whole when the context is sealed', () => {
    const opts = new FileSystemOptions().seal();
    const err = caught(() => applyFileOptions(resolveFileOptions({ 'http:userAgent': 'x' }), opts));
    expect(err.code).toBe(FileOptionErrorCodes.APPLY_FAILED);
    expect(err.message).toBe('FileOption [http:userAgent] could not be applied.');
  });
});
