import { describe, it, expect } from 'vitest';
import { FileOptionErrorCodes, FileSystemOptions, LocalDateTime } from '@vfs-connect/core';
import { HTTP_PARAMS, httpConfig } from '../src/config-builder.js';
import { CookieSource } from '../src/cookie-source.js';
import { Cookies } from '../src/options/cookies.js';
import { caught } from './helpers.js';

const COOKIES_MESSAGE = 'FileOption value of [http:cookies] must be list of cookie.';

describe('CookieSource', () => {
  it('reads every member', () => {
    const cookie = CookieSource.fromJson({
      name: 'session',
      value: 'abc',
      domain: 'files.example.com',
      path: '/dav',
      isOnlyHttp: true,
      isSecure: false,
      creationDateTime: '2000-01-01T00:00:00',
      expiryDateTime: '2999-12-31T23:59:59',
      attributes: [{ name: 'SameSite', value: 'Strict' }],
    });

    expect(cookie.name).toBe('session');
    expect(cookie.httpOnly).toBe(true);
    expect(cookie.secure).toBe(false);
    expect(cookie.creation?.toString()).toBe('2000-01-01T00:00:00');
    expect(cookie.attributes?.get('SameSite')).toBe('Strict');
    expect(Object.isFrozen(cookie)).toBe(true);
  });

  it('writes members back in a fixed order, leaving absent ones out', () => {
    const cookie = new CookieSource({
      name: 'session',
      expiry: LocalDateTime.parse('2999-12-31T23:59'),
      secure: true,
      path: '/',
    });
    expect(JSON.stringify(cookie.toJson())).toBe(
      '{"name":"session","path":"/","isSecure":true,"expiryDateTime":"2999-12-31T23:59:00"}'
    );
  });

  it('treats null members as absent', () => {
    const cookie = CookieSource.fromJson({ name: 'n', value: null, isSecure: null, attributes: null });
    expect(cookie.toJson()).toEqual({ name: 'n' });
  });

  it('converts to a client cookie with UTC timestamps', () => {
    const client = CookieSource.fromJson({
      name: 'session',
      value: 'abc',
      expiryDateTime: '2999-12-31T23:59:59',
      attributes: [{ name: 'Partitioned' }],
    }).toCookie();

    expect(client.name).toBe('session');
    expect(client.value).toBe('abc');
    expect(client.httpOnly).toBe(false);
    expect(client.secure).toBe(false);
    expect(client.creationDate).toBeUndefined();
    expect(client.expiryDate?.toISOString()).toBe('2999-12-31T23:59:59.000Z');
    expect(client.isExpired(new Date('2020-01-01T00:00:00Z'))).toBe(false);
    expect(client.containsAttribute('Partitioned')).toBe(true);
    expect(client.getAttribute('Partitioned')).toBeUndefined();
  });

  it('requires a name', () => {
    const err = caught(() => CookieSource.fromJson({ value: 'abc' }));
    expect(err.code).toBe(FileOptionErrorCodes.MISSING_INPUT);
    expect(err.message).toBe('Cookie name is required.');
    expect(caught(() => CookieSource.fromJson({ name: null })).code).toBe(FileOptionErrorCodes.MISSING_INPUT);
  });

  it('rejects wrongly typed members', () => {
    const err = caught(() => CookieSource.fromJson({ name: 'n', isSecure: 'yes' }));
    expect(err.code).toBe(FileOptionErrorCodes.INVALID_FORMAT);
    expect(err.message).toBe('Cookie member [isSecure] is malformed: Expected boolean, received string.');
    expect(caught(() => CookieSource.fromJson('n')).message).toBe('Cookie must be JSON object.');
  });

  it('rejects date-times with a zone or offset', () => {
    const err = caught(() => CookieSource.fromJson({ name: 'n', creationDateTime: '2000-01-01T00:00:00Z' }));
    expect(err.code).toBe(FileOptionErrorCodes.INVALID_VALUE);
    expect(err.message).toBe('Cookie member [creationDateTime] must be local date-time.');
  });

  it('rejects repeated attribute names', () => {
    const err = caught(
      () =>
        new CookieSource({
          name: 'n',
          attributes: [
            ['a', undefined],
            ['b', '1'],
            ['a', '2'],
          ],
        })
    );
    expect(err.code).toBe(FileOptionErrorCodes.INVALID_VALUE);
    expect(err.message).toBe('Cookie attribute names must not be duplicated: [a].');
  });
});

describe('Cookies', () => {
  const document = [
    {
      name: 'n1',
      attributes: [{ name: 'an1' }, { name: 'an2', value: 'av2' }],
    },
    { name: 'n2' },
  ];

  it('builds one cookie per element', () => {
    const option = Cookies.fromJson(document);
    expect(option.value).toHaveLength(2);
    expect(option.getValue()).toEqual([
      { name: 'n1', attributes: [{ name: 'an1' }, { name: 'an2', value: 'av2' }] },
      { name: 'n2' },
    ]);
  });

  it('hands client cookies to the connector', () => {
    const opts = new FileSystemOptions();
    Cookies.fromJson(document).apply(opts);

    const cookies = httpConfig.get(opts, HTTP_PARAMS.cookies) ?? [];
    expect(cookies.map((cookie) => cookie.name)).toEqual(['n1', 'n2']);
    expect(cookies[0]?.attributeNames()).toEqual(['an1', 'an2']);
    expect(cookies[0]?.getAttribute('an1')).toBeUndefined();
    expect(cookies[0]?.getAttribute('an2')).toBe('av2');
    expect(cookies[1]?.attributeNames()).toEqual([]);
  });

  it('allows repeated cookie names', () => {
    const option = Cookies.fromJson([{ name: 'n' }, { name: 'n', value: 'v' }]);
    expect(option.toString()).toBe('{"http:cookies":[{"name":"n"},{"name":"n","value":"v"}]}');
  });

  it('builds the same option from cookie sources', () => {
    const sources = document.map((cookie) => CookieSource.fromJson(cookie));
    expect(Cookies.of(sources).equals(Cookies.fromJson(document))).toBe(true);
    expect(Cookies.fromJson([]).getValue()).toEqual([]);
  });

  it('rejects anything but a list', () => {
    const err = caught(() => Cookies.fromJson({ name: 'n1' }));
    expect(err.code).toBe(FileOptionErrorCodes.INVALID_FORMAT);
    expect(err.message).toBe(COOKIES_MESSAGE);
  });

  it('reports a bad cookie with its position', () => {
    const missing = caught(() => Cookies.fromJson([{ name: 'n1' }, { value: 'v' }]));
    expect(missing.code).toBe(FileOptionErrorCodes.MISSING_INPUT);
    expect(missing.message).toBe(COOKIES_MESSAGE);
    expect(missing.cause).toMatchObject({
      code: FileOptionErrorCodes.MISSING_INPUT,
      message: 'Cookie #1: Cookie name is required.',
    });

    const duplicated = caught(() =>
      Cookies.fromJson([{ name: 'n1', attributes: [{ name: 'x' }, { name: 'x', value: 'y' }] }])
    );
    expect(duplicated.code).toBe(FileOptionErrorCodes.INVALID_VALUE);
    expect(duplicated.message).toBe(COOKIES_MESSAGE);
    expect(duplicated.cause).toMatchObject({
      message: 'Cookie #0: Cookie attribute names must not be duplicated: [x].',
    });

    expect(caught(() => Cookies.fromJson(['n1'])).code).toBe(FileOptionErrorCodes.INVALID_FORMAT);
  });
});
