/**
 * File option contract
 *
 * A file option is an immutable, named unit of connector configuration with a
 * JSON projection and a single effect on the options context. Kinds are
 * declared with {@link defineFileOption}; every instance of a kind carries the
 * kind's name as its tag and the kind's own apply step, so new kinds need no
 * base class and no central dispatch.
 *
 * @packageDocumentation
 */

import { FileOptionError, FileOptionErrorCodes, missingInput } from './errors.js';
import type { FileSystemOptions } from './file-system-options.js';
import { stringifyJson, type JsonObject, type JsonValue } from './json.js';
import { logger } from './logging.js';

const log = logger.child({ module: 'file-option' });

export interface FileOption<T = unknown> {
  /** Declared name, also the JSON key and registry key */
  readonly name: string;
  /** Validated payload, frozen */
  readonly value: T;
  getName(): string;
  /** JSON projection; absent fields are omitted, never null */
  getValue(): JsonValue;
  /**
   * Write the value onto the context. Safe to repeat; the option itself never
   * changes.
   *
   * @throws FileOptionError with code E_OPTION_APPLY_FAILED if the context rejects the value
   */
  apply(opts: FileSystemOptions): void;
  /** Structural equality on name and JSON projection */
  equals(other: unknown): boolean;
  /** Stable text of name and projection; equal options share a key */
  key(): string;
  /** `{"<name>":<value-json>}` */
  toString(): string;
  toJSON(): JsonObject;
}

/**
 * Builds file option instances of one kind by name from raw JSON.
 */
export interface FileOptionResolver {
  readonly name: string;
  /**
   * @throws FileOptionError if the input is missing, malformed or invalid
   */
  fromJson(json: unknown): FileOption;
}

export interface FileOptionDefinition<N, T> {
  name: string;
  /** Validate non-null JSON input into the payload */
  parse(json: unknown, name: string): T;
  /** Validate native input into the payload */
  of(input: N, name: string): T;
  project(value: T): JsonValue;
  /** Call the connector setter for this parameter */
  apply(opts: FileSystemOptions, value: T): void;
}

export interface FileOptionKind<N, T> extends FileOptionResolver {
  fromJson(json: unknown): FileOption<T>;
  of(input: N): FileOption<T>;
  /** True when `option` was built by this kind */
  is(option: unknown): option is FileOption<T>;
}

class FileOptionValue<T> implements FileOption<T> {
  readonly name: string;
  readonly value: T;
  private readonly json: JsonValue;
  private readonly text: string;
  private readonly applyValue: (opts: FileSystemOptions, value: T) => void;

  constructor(definition: Pick<FileOptionDefinition<unknown, T>, 'name' | 'project' | 'apply'>, value: T) {
    this.name = definition.name;
    this.value = deepFreeze(value);
    this.json = deepFreeze(definition.project(value));
    this.text = stringifyJson(this.json);
    this.applyValue = definition.apply;
    Object.freeze(this);
  }

  getName(): string {
    return this.name;
  }

  getValue(): JsonValue {
    return this.json;
  }

  apply(opts: FileSystemOptions): void {
    try {
      this.applyValue(opts, this.value);
    } catch (err) {
      throw new FileOptionError(
        FileOptionErrorCodes.APPLY_FAILED,
        this.name,
        `FileOption [${this.name}] could not be applied.`,
        { cause: err }
      );
    }
    log.debug({ option: this.name }, 'file option applied');
  }

  equals(other: unknown): boolean {
    return other instanceof FileOptionValue && other.name === this.name && other.text === this.text;
  }

  key(): string {
    return this.toString();
  }

  toString(): string {
    return stringifyJson(this.toJSON());
  }

  toJSON(): JsonObject {
    return { [this.name]: this.json };
  }
}

export function defineFileOption<N, T>(definition: FileOptionDefinition<N, T>): FileOptionKind<N, T> {
  const { name } = definition;
  const create = (value: T): FileOption<T> => new FileOptionValue<T>(definition, value);

  return Object.freeze({
    name,
    fromJson(json: unknown): FileOption<T> {
      if (json === null || json === undefined) {
        throw missingInput(name);
      }
      return create(definition.parse(json, name));
    },
    of(input: N): FileOption<T> {
      if (input === null || input === undefined) {
        throw missingInput(name);
      }
      return create(definition.of(input, name));
    },
    is(option: unknown): option is FileOption<T> {
      return option instanceof FileOptionValue && option.name === name;
    },
  });
}

function deepFreeze<V>(value: V): V {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
  }
  return value;
}
