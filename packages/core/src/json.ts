/**
 * JSON document model
 *
 * File options read their input from, and project their value to, plain JSON.
 * The Zod schemas below accept exactly what survives a JSON roundtrip:
 * - Rejects NaN, Infinity, -Infinity (not valid JSON numbers)
 * - Rejects undefined (dropped by JSON.stringify)
 * - Rejects non-plain objects (Date, Map, Set, class instances)
 */

import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Check if value is a plain object (not Date, Map, Set, class instance, etc.)
 *
 * A plain object has prototype of Object.prototype or null.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const JsonNumberSchema = z.number().finite();

const JsonPrimitiveSchema = z.union([z.string(), JsonNumberSchema, z.boolean(), z.null()]);

const PlainObjectSchema = z.custom<Record<string, unknown>>(isPlainObject, {
  message: 'Expected plain object, received non-plain object (Date, Map, Set, or class instance)',
});

/**
 * JSON value schema - recursive type for any valid JSON value
 */
export const JsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([JsonPrimitiveSchema, z.array(JsonValueSchema), PlainObjectSchema.pipe(z.record(JsonValueSchema))])
);

/**
 * JSON object schema - plain object with string keys and JSON values
 */
export const JsonObjectSchema: z.ZodType<JsonObject, z.ZodTypeDef, unknown> = PlainObjectSchema.pipe(z.record(JsonValueSchema));

/**
 * Serialize a JSON value without whitespace.
 *
 * Projections are built with a fixed key order, so the text is stable and
 * doubles as the equality key of a file option.
 */
export function stringifyJson(value: JsonValue): string {
  return JSON.stringify(value);
}
