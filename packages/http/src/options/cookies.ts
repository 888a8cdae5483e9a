import { FileOptionError, FileOptionErrorCodes, defineFileOption, isFileOptionError } from '@vfs-connect/core';
import { z } from 'zod';
import { httpConfig } from '../config-builder.js';
import { COOKIES_OPTION, CookieSource } from '../cookie-source.js';

const COOKIES_MESSAGE = `FileOption value of [${COOKIES_OPTION}] must be list of cookie.`;

/**
 * Wrap a cookie failure so the option error always reads the same, keeping
 * the specific failure (and which cookie) as the cause.
 */
function listError(err: unknown, index?: number): FileOptionError {
  const code = isFileOptionError(err) ? err.code : FileOptionErrorCodes.INVALID_VALUE;
  const cause =
    index === undefined || !(err instanceof Error)
      ? err
      : new FileOptionError(code, COOKIES_OPTION, `Cookie #${index}: ${err.message}`, { cause: err });
  return new FileOptionError(code, COOKIES_OPTION, COOKIES_MESSAGE, { cause });
}

function parseCookies(json: unknown): CookieSource[] {
  const list = z.array(z.unknown()).safeParse(json);
  if (!list.success) {
    throw new FileOptionError(FileOptionErrorCodes.INVALID_FORMAT, COOKIES_OPTION, COOKIES_MESSAGE);
  }
  return list.data.map((cookie, index) => {
    try {
      return CookieSource.fromJson(cookie);
    } catch (err) {
      throw listError(err, index);
    }
  });
}

/**
 * `http:cookies` - JSON array of cookie objects. Cookie names may repeat
 * across the list; attribute names may not repeat within one cookie.
 */
export const Cookies = defineFileOption<readonly CookieSource[], readonly CookieSource[]>({
  name: COOKIES_OPTION,
  parse: parseCookies,
  of: (input) => {
    if (!input.every((cookie) => cookie instanceof CookieSource)) {
      throw new FileOptionError(FileOptionErrorCodes.INVALID_FORMAT, COOKIES_OPTION, COOKIES_MESSAGE);
    }
    return [...input];
  },
  project: (cookies) => cookies.map((cookie) => cookie.toJson()),
  apply: (opts, cookies) => httpConfig.setCookies(opts, cookies.map((cookie) => cookie.toCookie())),
});
