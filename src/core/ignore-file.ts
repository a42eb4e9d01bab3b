// src/core/ignore-file.ts

import fsp from 'fs/promises';
import path from 'path';
import { IoFailureError } from './errors';
import { errnoCode } from '../util/fs-utils';

/**
 * Parse ignore-file text: one pattern per line, blank lines and lines
 * starting with "#" are dropped, trailing whitespace is trimmed.
 */
export function parseIgnoreFile(text: string): string[] {
   return text
      .split(/\r?\n/)
      .map((line) => line.trimEnd())
      .filter((line) => line.trim() !== '' && !line.trimStart().startsWith('#'));
}

/**
 * Read `<dir>/<fileName>` if it exists. A missing file yields no patterns.
 */
export async function readIgnoreFile(dir: string, fileName: string): Promise<string[]> {
   const filePath = path.join(dir, fileName);
   let text: string;
   try {
      text = await fsp.readFile(filePath, 'utf8');
   } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw new IoFailureError(filePath, 'read', err);
   }
   return parseIgnoreFile(text);
}

/**
 * Concatenate pattern lists, keeping the first occurrence of each.
 */
export function mergePatterns(...lists: ReadonlyArray<readonly string[]>): string[] {
   const seen = new Set<string>();
   const merged: string[] = [];
   for (const list of lists) {
      for (const pattern of list) {
         if (seen.has(pattern)) continue;
         seen.add(pattern);
         merged.push(pattern);
      }
   }
   return merged;
}
