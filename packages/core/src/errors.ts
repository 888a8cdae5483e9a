/**
 * Typed errors for file options
 *
 * Use `err.code` to handle errors programmatically without message parsing.
 * Messages always name the offending option so they can be surfaced as-is.
 */

export const FileOptionErrorCodes = {
  /** Required top-level input or required nested field is null or absent */
  MISSING_INPUT: 'E_OPTION_MISSING_INPUT',
  /** Input is not the JSON shape the option expects */
  INVALID_FORMAT: 'E_OPTION_INVALID_FORMAT',
  /** Input has the right shape but fails semantic validation */
  INVALID_VALUE: 'E_OPTION_INVALID_VALUE',
  /** No registered resolver declares the requested name */
  UNKNOWN_OPTION: 'E_OPTION_UNKNOWN',
  /** The options context rejected an otherwise valid value */
  APPLY_FAILED: 'E_OPTION_APPLY_FAILED',
  /** A second resolver was registered for a name while duplicates are rejected */
  DUPLICATE_OPTION: 'E_OPTION_DUPLICATE',
} as const;

export type FileOptionErrorCode = (typeof FileOptionErrorCodes)[keyof typeof FileOptionErrorCodes];

/**
 * Error raised while constructing, resolving or applying a file option
 */
export class FileOptionError extends Error {
  readonly code: FileOptionErrorCode;
  /** Declared name of the option the failure belongs to */
  readonly option: string;

  constructor(code: FileOptionErrorCode, option: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FileOptionError';
    this.code = code;
    this.option = option;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, FileOptionError.prototype);
  }
}

export function isFileOptionError(err: unknown, code?: FileOptionErrorCode): err is FileOptionError {
  return err instanceof FileOptionError && (code === undefined || err.code === code);
}

/**
 * Build the uniform `FileOption value of [<name>] <detail>` error.
 */
export function optionValueError(
  code: FileOptionErrorCode,
  option: string,
  detail: string,
  cause?: unknown
): FileOptionError {
  return new FileOptionError(
    code,
    option,
    `FileOption value of [${option}] ${detail}`,
    cause === undefined ? undefined : { cause }
  );
}

export function missingInput(option: string): FileOptionError {
  return optionValueError(FileOptionErrorCodes.MISSING_INPUT, option, 'is required.');
}

/**
 * Raised by {@link FileSystemOptions} when a parameter cannot be written.
 */
export class FileSystemOptionsError extends Error {
  readonly param: string;

  constructor(param: string, message: string) {
    super(message);
    this.name = 'FileSystemOptionsError';
    this.param = param;
    Object.setPrototypeOf(this, FileSystemOptionsError.prototype);
  }
}
