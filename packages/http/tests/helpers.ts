import { FileOptionError } from '@vfs-connect/core';

/** Run `fn` and return the FileOptionError it throws */
export function caught(fn: () => unknown): FileOptionError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FileOptionError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a FileOptionError');
}
