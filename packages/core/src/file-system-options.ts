/**
 * Options context
 *
 * The mutable parameter bag a connector reads when it opens a file system.
 * File options write into it through the connector's config builder; nothing
 * here is synchronized, so callers sharing one context serialize their writes.
 */

import { FileSystemOptionsError } from './errors.js';

/**
 * Typed key of one parameter. The guard keeps reads type-safe without casts.
 */
export interface OptionParam<T> {
  readonly scope: string;
  readonly name: string;
  is(value: unknown): value is T;
}

export function defineParam<T>(scope: string, name: string, is: (value: unknown) => value is T): OptionParam<T> {
  return Object.freeze({ scope, name, is });
}

function paramId(param: OptionParam<unknown>): string {
  return `${param.scope}.${param.name}`;
}

export class FileSystemOptions {
  private params = new Map<string, unknown>();
  private sealed = false;

  /**
   * Set or overwrite a parameter.
   *
   * @throws FileSystemOptionsError if the context has been sealed
   */
  set<T>(param: OptionParam<T>, value: T): void {
    const id = paramId(param);
    if (this.sealed) {
      throw new FileSystemOptionsError(id, `Cannot set [${id}]: options are sealed`);
    }
    this.params.set(id, value);
  }

  get<T>(param: OptionParam<T>): T | undefined {
    const value = this.params.get(paramId(param));
    return param.is(value) ? value : undefined;
  }

  has(param: OptionParam<unknown>): boolean {
    return this.params.has(paramId(param));
  }

  get size(): number {
    return this.params.size;
  }

  /** Parameter ids in first-set order */
  keys(): string[] {
    return Array.from(this.params.keys());
  }

  /**
   * Freeze the context once the connector has consumed it. Later writes fail.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}
