/**
 * vfs-connect core
 * File option contract, resolver registry and options context
 */

export { config } from './config.js';
export { logger } from './logging.js';
export type { Logger } from './logging.js';

export {
  FileOptionError,
  FileOptionErrorCodes,
  FileSystemOptionsError,
  isFileOptionError,
  missingInput,
  optionValueError,
} from './errors.js';
export type { FileOptionErrorCode } from './errors.js';

export { JsonObjectSchema, JsonValueSchema, isPlainObject, stringifyJson } from './json.js';
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './json.js';

export { Duration } from './duration.js';
export { LocalDateTime } from './local-date-time.js';
export type { LocalDateTimeFields } from './local-date-time.js';

export {
  MAX_INT32,
  formatChoices,
  optionalString,
  requireAbsolutePath,
  requireBoolean,
  requireCharset,
  requireDuration,
  requireEnum,
  requireEnumList,
  requireInteger,
  requireJsonObject,
  requireNonNegativeDuration,
  requirePathViaUri,
  requireString,
} from './validators.js';
export type { IntegerRange, StringRules } from './validators.js';

export { FileSystemOptions, defineParam } from './file-system-options.js';
export type { OptionParam } from './file-system-options.js';

export { defineFileOption } from './file-option.js';
export type { FileOption, FileOptionDefinition, FileOptionKind, FileOptionResolver } from './file-option.js';

export {
  FileOptionRegistry,
  OPTIONS_DOCUMENT,
  applyFileOptions,
  fileOptionRegistry,
  resolveFileOption,
  resolveFileOptions,
} from './registry.js';
export type { FileOptionPlugin, FileOptionRegistryOptions } from './registry.js';
