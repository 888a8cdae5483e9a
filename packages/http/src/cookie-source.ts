/**
 * Cookie source
 *
 * One cookie of the `http:cookies` option: validated from its JSON object,
 * immutable, and convertible both back to JSON and to the connector's
 * {@link ClientCookie}. Timestamps stay zone-less until that conversion, where
 * they are read as UTC.
 */

import {
  FileOptionErrorCodes,
  LocalDateTime,
  FileOptionError,
  isPlainObject,
  type JsonObject,
} from '@vfs-connect/core';
import { z } from 'zod';
import { ClientCookie } from './connector.js';

export const COOKIES_OPTION = 'http:cookies';

/** JSON member names of a cookie object */
export const COOKIE_KEYS = {
  name: 'name',
  value: 'value',
  domain: 'domain',
  path: 'path',
  httpOnly: 'isOnlyHttp',
  secure: 'isSecure',
  creation: 'creationDateTime',
  expiry: 'expiryDateTime',
  attributes: 'attributes',
} as const;

// JSON null on an optional member counts as absent
const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);
const optionalBoolean = z
  .boolean()
  .nullish()
  .transform((v) => v ?? undefined);

const CookieAttributeJsonSchema = z.object({
  [COOKIE_KEYS.name]: z.string(),
  [COOKIE_KEYS.value]: optionalString,
});

const CookieJsonSchema = z.object({
  [COOKIE_KEYS.name]: z.string(),
  [COOKIE_KEYS.value]: optionalString,
  [COOKIE_KEYS.domain]: optionalString,
  [COOKIE_KEYS.path]: optionalString,
  [COOKIE_KEYS.httpOnly]: optionalBoolean,
  [COOKIE_KEYS.secure]: optionalBoolean,
  [COOKIE_KEYS.creation]: optionalString,
  [COOKIE_KEYS.expiry]: optionalString,
  [COOKIE_KEYS.attributes]: z.array(CookieAttributeJsonSchema).nullish(),
});

export interface CookieSourceInit {
  name: string;
  value?: string;
  domain?: string;
  path?: string;
  httpOnly?: boolean;
  secure?: boolean;
  creation?: LocalDateTime;
  expiry?: LocalDateTime;
  /** Ordered attribute name to optional value; names must be unique */
  attributes?: Iterable<readonly [string, string | undefined]>;
}

export class CookieSource {
  readonly name: string;
  readonly value?: string;
  readonly domain?: string;
  readonly path?: string;
  readonly httpOnly?: boolean;
  readonly secure?: boolean;
  readonly creation?: LocalDateTime;
  readonly expiry?: LocalDateTime;
  readonly attributes?: ReadonlyMap<string, string | undefined>;

  /**
   * @throws FileOptionError if `name` is missing or an attribute name repeats
   */
  constructor(init: CookieSourceInit) {
    if (typeof init.name !== 'string') {
      throw new FileOptionError(FileOptionErrorCodes.MISSING_INPUT, COOKIES_OPTION, 'Cookie name is required.');
    }
    this.name = init.name;
    this.value = init.value;
    this.domain = init.domain;
    this.path = init.path;
    this.httpOnly = init.httpOnly;
    this.secure = init.secure;
    this.creation = init.creation;
    this.expiry = init.expiry;
    this.attributes = init.attributes === undefined ? undefined : collectAttributes(init.attributes);
    Object.freeze(this);
  }

  /**
   * Build from one JSON cookie object.
   *
   * @throws FileOptionError E_OPTION_MISSING_INPUT without `name`,
   *   E_OPTION_INVALID_FORMAT on a wrong member type,
   *   E_OPTION_INVALID_VALUE on a bad date-time or a repeated attribute name
   */
  static fromJson(json: unknown): CookieSource {
    if (!isPlainObject(json)) {
      throw new FileOptionError(FileOptionErrorCodes.INVALID_FORMAT, COOKIES_OPTION, 'Cookie must be JSON object.');
    }
    if (json[COOKIE_KEYS.name] === undefined || json[COOKIE_KEYS.name] === null) {
      throw new FileOptionError(FileOptionErrorCodes.MISSING_INPUT, COOKIES_OPTION, 'Cookie name is required.');
    }

    const parsed = CookieJsonSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new FileOptionError(
        FileOptionErrorCodes.INVALID_FORMAT,
        COOKIES_OPTION,
        `Cookie member [${issue?.path.join('.') ?? ''}] is malformed: ${issue?.message ?? 'invalid'}.`,
        { cause: parsed.error }
      );
    }
    const cookie = parsed.data;

    return new CookieSource({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      httpOnly: cookie.isOnlyHttp,
      secure: cookie.isSecure,
      creation: parseDateTime(COOKIE_KEYS.creation, cookie.creationDateTime),
      expiry: parseDateTime(COOKIE_KEYS.expiry, cookie.expiryDateTime),
      attributes: cookie.attributes?.map((attr) => [attr.name, attr.value] as const) ?? undefined,
    });
  }

  /**
   * JSON cookie object; absent members are left out.
   */
  toJson(): JsonObject {
    const json: JsonObject = { [COOKIE_KEYS.name]: this.name };
    if (this.value !== undefined) json[COOKIE_KEYS.value] = this.value;
    if (this.domain !== undefined) json[COOKIE_KEYS.domain] = this.domain;
    if (this.path !== undefined) json[COOKIE_KEYS.path] = this.path;
    if (this.httpOnly !== undefined) json[COOKIE_KEYS.httpOnly] = this.httpOnly;
    if (this.secure !== undefined) json[COOKIE_KEYS.secure] = this.secure;
    if (this.creation !== undefined) json[COOKIE_KEYS.creation] = this.creation.toString();
    if (this.expiry !== undefined) json[COOKIE_KEYS.expiry] = this.expiry.toString();
    if (this.attributes !== undefined) {
      json[COOKIE_KEYS.attributes] = Array.from(this.attributes, ([name, value]): JsonObject => {
        const attribute: JsonObject = { [COOKIE_KEYS.name]: name };
        if (value !== undefined) attribute[COOKIE_KEYS.value] = value;
        return attribute;
      });
    }
    return json;
  }

  toCookie(): ClientCookie {
    return new ClientCookie({
      name: this.name,
      value: this.value,
      domain: this.domain,
      path: this.path,
      httpOnly: this.httpOnly,
      secure: this.secure,
      creationDate: this.creation?.toDate(),
      expiryDate: this.expiry?.toDate(),
      attributes: this.attributes,
    });
  }
}

/**
 * Single ordered pass; the first repeated name fails construction.
 */
function collectAttributes(
  entries: Iterable<readonly [string, string | undefined]>
): ReadonlyMap<string, string | undefined> {
  const attributes = new Map<string, string | undefined>();
  for (const [name, value] of entries) {
    if (attributes.has(name)) {
      throw new FileOptionError(
        FileOptionErrorCodes.INVALID_VALUE,
        COOKIES_OPTION,
        `Cookie attribute names must not be duplicated: [${name}].`
      );
    }
    attributes.set(name, value);
  }
  return attributes;
}

function parseDateTime(key: string, text: string | undefined): LocalDateTime | undefined {
  if (text === undefined) {
    return undefined;
  }
  try {
    return LocalDateTime.parse(text);
  } catch (err) {
    throw new FileOptionError(
      FileOptionErrorCodes.INVALID_VALUE,
      COOKIES_OPTION,
      `Cookie member [${key}] must be local date-time.`,
      { cause: err }
    );
  }
}
