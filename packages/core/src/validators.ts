/**
 * Validation helpers shared by file option kinds
 *
 * Each helper narrows untyped JSON input to the option's native type or throws
 * a FileOptionError naming the option. Shape problems raise
 * E_OPTION_INVALID_FORMAT, domain problems E_OPTION_INVALID_VALUE.
 */

import { isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { Duration } from './duration.js';
import { FileOptionErrorCodes, optionValueError } from './errors.js';
import { JsonObjectSchema, type JsonObject } from './json.js';

const { INVALID_FORMAT, INVALID_VALUE } = FileOptionErrorCodes;

/** Upper bound of a signed 32-bit integer */
export const MAX_INT32 = 2_147_483_647;

/** Render a closed value set as `[a, b, c]`, in declaration order */
export function formatChoices(values: readonly string[]): string {
  return `[${values.join(', ')}]`;
}

export interface StringRules {
  /** Reject the empty string and whitespace-only strings */
  nonEmpty?: boolean;
}

export function requireString(json: unknown, option: string, rules: StringRules = {}): string {
  const parsed = z.string().safeParse(json);
  if (!parsed.success) {
    throw optionValueError(INVALID_FORMAT, option, 'must be string.');
  }
  if (rules.nonEmpty && parsed.data.trim() === '') {
    throw optionValueError(INVALID_VALUE, option, 'must be non-empty string.');
  }
  return parsed.data;
}

export function requireBoolean(json: unknown, option: string): boolean {
  const parsed = z.boolean().safeParse(json);
  if (!parsed.success) {
    throw optionValueError(INVALID_FORMAT, option, 'must be boolean.');
  }
  return parsed.data;
}

export interface IntegerRange {
  min: number;
  max: number;
}

export function requireInteger(json: unknown, option: string, range: IntegerRange): number {
  const detail = `must be integer between ${range.min} and ${range.max}.`;
  const parsed = z.number().finite().safeParse(json);
  if (!parsed.success) {
    throw optionValueError(INVALID_FORMAT, option, detail);
  }
  const checked = z.number().int().min(range.min).max(range.max).safeParse(parsed.data);
  if (!checked.success) {
    throw optionValueError(INVALID_VALUE, option, detail);
  }
  return checked.data;
}

export function requireNonNegativeDuration(value: Duration, option: string): Duration {
  if (value.isNegative()) {
    throw optionValueError(INVALID_VALUE, option, 'must be non-negative duration.');
  }
  return value;
}

/**
 * ISO-8601 duration text, e.g. `PT30S`. Negative durations are rejected.
 */
export function requireDuration(json: unknown, option: string): Duration {
  const parsed = z.string().safeParse(json);
  if (!parsed.success) {
    throw optionValueError(INVALID_FORMAT, option, 'must be duration.');
  }

  let duration: Duration;
  try {
    duration = Duration.parse(parsed.data);
  } catch (err) {
    throw optionValueError(INVALID_VALUE, option, 'must be duration.', err);
  }
  return requireNonNegativeDuration(duration, option);
}

/**
 * One token of a closed, case-sensitive enumeration.
 */
export function requireEnum<E extends string>(json: unknown, option: string, values: readonly [E, ...E[]]): E {
  const detail = `must be either ${formatChoices(values)}.`;
  const token = z.string().safeParse(json);
  if (!token.success) {
    throw optionValueError(INVALID_FORMAT, option, detail);
  }
  const member = z.enum(values).safeParse(token.data);
  if (!member.success) {
    throw optionValueError(INVALID_VALUE, option, detail);
  }
  return member.data;
}

/**
 * Ordered list of enumeration tokens, given as a JSON array of strings or as
 * the comma-joined string the list projects to.
 */
export function requireEnumList<E extends string>(
  json: unknown,
  option: string,
  values: readonly [E, ...E[]]
): E[] {
  const detail = `must be either ${formatChoices(values)}.`;
  const shape = z.union([z.array(z.string()), z.string()]).safeParse(json);
  if (!shape.success) {
    throw optionValueError(INVALID_FORMAT, option, detail);
  }

  const tokens = typeof shape.data === 'string' ? splitList(shape.data) : shape.data;
  const members = z.array(z.enum(values)).safeParse(tokens);
  if (!members.success) {
    throw optionValueError(INVALID_VALUE, option, detail);
  }
  return members.data;
}

function splitList(text: string): string[] {
  return text === '' ? [] : text.split(',');
}

const PATH_DETAIL = 'must be convertible to URI, and further convertible to absolute path of local file.';

/**
 * Absolute local path, rejecting relative input.
 */
export function requireAbsolutePath(path: string, option: string): string {
  if (!isAbsolute(path)) {
    throw optionValueError(INVALID_VALUE, option, PATH_DETAIL);
  }
  return path;
}

/**
 * Local path behind a hierarchical `file:` URI such as `file:///etc/keystore.p12`.
 * URIs with an authority (even `localhost`), a query or a fragment are rejected.
 */
export function requirePathViaUri(json: unknown, option: string): string {
  const parsed = z.string().safeParse(json);
  if (!parsed.success) {
    throw optionValueError(INVALID_FORMAT, option, PATH_DETAIL);
  }

  // opaque forms such as `file:keystore.p12` carry a relative path
  if (!/^file:\//i.test(parsed.data)) {
    throw optionValueError(INVALID_VALUE, option, PATH_DETAIL);
  }

  let url: URL;
  try {
    url = new URL(parsed.data);
  } catch (err) {
    throw optionValueError(INVALID_VALUE, option, PATH_DETAIL, err);
  }

  // checked on the raw text: URL parsing folds `localhost` into an empty host
  const authority = /^file:\/\/([^/?#]*)/i.exec(parsed.data)?.[1] ?? '';
  if (authority !== '' || url.search !== '' || url.hash !== '') {
    throw optionValueError(INVALID_VALUE, option, PATH_DETAIL);
  }

  let path: string;
  try {
    path = fileURLToPath(url);
  } catch (err) {
    throw optionValueError(INVALID_VALUE, option, PATH_DETAIL, err);
  }
  return requireAbsolutePath(path, option);
}

/**
 * Character set label known to the runtime, e.g. `UTF-8` or `ISO-8859-1`.
 */
export function requireCharset(json: unknown, option: string): string {
  const label = requireString(json, option);
  try {
    new TextDecoder(label);
  } catch (err) {
    throw optionValueError(INVALID_VALUE, option, 'must be supported charset.', err);
  }
  return label;
}

export function requireJsonObject(json: unknown, option: string, detail = 'must be convertible to JSON object.'): JsonObject {
  const parsed = JsonObjectSchema.safeParse(json);
  if (!parsed.success) {
    throw optionValueError(INVALID_FORMAT, option, detail);
  }
  return parsed.data;
}

/**
 * Read an optional string member. Missing keys and JSON null are both absent.
 */
export function optionalString(obj: JsonObject, key: string, option: string, detail: string): string | undefined {
  const parsed = z.string().nullish().safeParse(obj[key]);
  if (!parsed.success) {
    throw optionValueError(INVALID_FORMAT, option, detail);
  }
  return parsed.data ?? undefined;
}
