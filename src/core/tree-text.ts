// src/core/tree-text.ts

import fs from 'fs';
import path from 'path';
import { IoFailureError } from './errors';

export interface RenderTreeOptions {
   /**
    * Maximum depth to traverse (0 = only the root's entries).
    * Default: Infinity (no limit).
    */
   maxDepth?: number;
}

/**
 * Render a directory as an indented text tree.
 *
 * - 2 spaces per level.
 * - Directories suffixed with "/", listed before files.
 * - Symlinks shown as "name -> target" and never followed.
 */
export function renderTree(rootDir: string, options: RenderTreeOptions = {}): string {
   const absRoot = path.resolve(rootDir);
   const maxDepth = options.maxDepth ?? Infinity;
   const lines: string[] = [];

   function walk(currentAbs: string, depth: number) {
      if (depth > maxDepth) return;

      let dirents: fs.Dirent[];
      try {
         dirents = fs.readdirSync(currentAbs, { withFileTypes: true });
      } catch (err) {
         throw new IoFailureError(currentAbs, 'read directory', err);
      }

      // Sort: directories first, then files, both alphabetically
      dirents.sort((a, b) => {
         if (a.isDirectory() && !b.isDirectory()) return -1;
         if (!a.isDirectory() && b.isDirectory()) return 1;
         return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
      });

      const indent = '  '.repeat(depth);
      for (const dirent of dirents) {
         const absPath = path.join(currentAbs, dirent.name);

         if (dirent.isDirectory()) {
            lines.push(`${indent}${dirent.name}/`);
            walk(absPath, depth + 1);
         } else if (dirent.isSymbolicLink()) {
            let target: string;
            try {
               target = fs.readlinkSync(absPath);
            } catch (err) {
               throw new IoFailureError(absPath, 'read link', err);
            }
            lines.push(`${indent}${dirent.name} -> ${target}`);
         } else {
            lines.push(`${indent}${dirent.name}`);
         }
      }
   }

   walk(absRoot, 0);
   return lines.join('\n');
}
