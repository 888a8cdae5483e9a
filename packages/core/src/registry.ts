/**
 * File option resolver registry
 *
 * Maps declared option names to the resolvers that build them from JSON.
 * Plugins contribute resolvers once at start-up; after that the registry is
 * only read, so lookups are plain map reads.
 */

import { config } from './config.js';
import { FileOptionError, FileOptionErrorCodes } from './errors.js';
import type { FileOption, FileOptionResolver } from './file-option.js';
import type { FileSystemOptions } from './file-system-options.js';
import { JsonObjectSchema } from './json.js';
import { logger as rootLogger, type Logger } from './logging.js';

/**
 * A loadable unit contributing option kinds, e.g. one connector's options.
 */
export interface FileOptionPlugin {
  readonly name: string;
  readonly resolvers: readonly FileOptionResolver[];
}

export interface FileOptionRegistryOptions {
  /** Throw on a second resolver for the same name instead of ignoring it */
  rejectDuplicates?: boolean;
  logger?: Logger;
}

/** Name used on errors about the options document as a whole */
export const OPTIONS_DOCUMENT = 'options';

export class FileOptionRegistry {
  private resolvers = new Map<string, FileOptionResolver>();
  private plugins = new Set<string>();
  private readonly rejectDuplicates: boolean;
  private readonly log: Logger;

  constructor(options: FileOptionRegistryOptions = {}) {
    this.rejectDuplicates = options.rejectDuplicates ?? config.registry.rejectDuplicates;
    this.log = (options.logger ?? rootLogger).child({ module: 'registry' });
  }

  /**
   * Add a resolver. Names are not deduplicated: the first resolver for a name
   * stays in effect and later ones are logged and dropped.
   *
   * @returns whether the resolver is now the one in effect for its name
   */
  register(resolver: FileOptionResolver): boolean {
    const existing = this.resolvers.get(resolver.name);
    if (existing === resolver) {
      return true;
    }
    if (existing) {
      if (this.rejectDuplicates) {
        throw new FileOptionError(
          FileOptionErrorCodes.DUPLICATE_OPTION,
          resolver.name,
          `FileOption [${resolver.name}] is already registered.`
        );
      }
      this.log.warn({ option: resolver.name }, 'duplicate file option resolver ignored');
      return false;
    }
    this.resolvers.set(resolver.name, resolver);
    return true;
  }

  /**
   * Register every resolver of a plugin. Installing the same plugin again is a no-op.
   */
  install(plugin: FileOptionPlugin): void {
    if (this.plugins.has(plugin.name)) {
      return;
    }
    this.plugins.add(plugin.name);
    for (const resolver of plugin.resolvers) {
      this.register(resolver);
    }
    this.log.debug({ plugin: plugin.name, options: plugin.resolvers.length }, 'file option plugin installed');
  }

  has(name: string): boolean {
    return this.resolvers.has(name);
  }

  get(name: string): FileOptionResolver | undefined {
    return this.resolvers.get(name);
  }

  /** Registered names in registration order */
  names(): string[] {
    return Array.from(this.resolvers.keys());
  }

  /**
   * Build the option declared as `name` from raw JSON. Validation is left
   * entirely to the resolver.
   *
   * @throws FileOptionError E_OPTION_UNKNOWN if no resolver declares the name
   */
  resolve(name: string, json: unknown): FileOption {
    const resolver = this.resolvers.get(name);
    if (!resolver) {
      throw new FileOptionError(FileOptionErrorCodes.UNKNOWN_OPTION, name, `FileOption [${name}] is not registered.`);
    }
    return resolver.fromJson(json);
  }

  /**
   * Resolve a whole options document, `{ "<name>": <value>, ... }`, in key order.
   *
   * @throws FileOptionError E_OPTION_INVALID_FORMAT if the document is not a JSON object
   */
  resolveAll(document: unknown): FileOption[] {
    const parsed = JsonObjectSchema.safeParse(document);
    if (!parsed.success) {
      throw new FileOptionError(
        FileOptionErrorCodes.INVALID_FORMAT,
        OPTIONS_DOCUMENT,
        'FileOption document must be JSON object of option name to value.'
      );
    }
    return Object.entries(parsed.data).map(([name, json]) => this.resolve(name, json));
  }
}

/**
 * Process-wide registry. Connector packages install their plugin here when
 * they are first imported.
 */
export const fileOptionRegistry = new FileOptionRegistry();

export function resolveFileOption(name: string, json: unknown): FileOption {
  return fileOptionRegistry.resolve(name, json);
}

export function resolveFileOptions(document: unknown): FileOption[] {
  return fileOptionRegistry.resolveAll(document);
}

/**
 * Apply options in order; a later option for the same parameter overwrites an earlier one.
 */
export function applyFileOptions(options: readonly FileOption[], opts: FileSystemOptions): FileSystemOptions {
  for (const option of options) {
    option.apply(opts);
  }
  return opts;
}
