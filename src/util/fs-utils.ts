// src/util/fs-utils.ts

import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return path.resolve(dirPath);
}

/**
 * Narrow an unknown thrown value to a Node system error.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
   return err instanceof Error && 'code' in err;
}

/**
 * The errno code of a thrown value ("ENOENT", "EACCES", ...), if any.
 */
export function errnoCode(err: unknown): string | undefined {
   return isErrnoException(err) && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Expand a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
   if (input === '~') {
      return os.homedir();
   }
   if (input.startsWith('~/') || input.startsWith('~\\')) {
      return path.resolve(os.homedir(), input.slice(2));
   }
   return input;
}
