// src/core/copy-tree.ts

import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import pluralize from 'pluralize';

import type { EmptyDirPolicy, SymlinkPolicy } from '../schema';
import {
   CopyCancelledError,
   DestinationNotEmptyError,
   IoFailureError,
   SymlinkLoopError,
} from './errors';
import { IgnoreMatcher } from './ignore-matcher';
import { errnoCode } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

export type EntryType = 'file' | 'directory' | 'symlink' | 'other';

export type SkipReason = 'ignored' | 'symlink' | 'unsupported' | 'destination';

export type CopyEntryEvent =
   | { action: 'copy'; path: string; type: EntryType; bytes: number }
   | { action: 'skip'; path: string; type: EntryType; reason: SkipReason; pattern?: string };

export interface CopyStats {
   filesCopied: number;
   bytesCopied: number;
   dirsCreated: number;
   linksCopied: number;
   /**
    * Entries not copied. An excluded directory counts once, whatever
    * it contains, since it is never read.
    */
   entriesSkipped: number;
}

export interface CopyOptions {
   /**
    * Precompiled ignore patterns. Takes precedence over `ignore`.
    */
   matcher?: IgnoreMatcher;

   /**
    * Ignore patterns, compiled before anything is read or written.
    */
   ignore?: readonly string[];

   /**
    * Allow a non-empty destination; existing files are replaced.
    * Nothing already in the destination is removed.
    */
   overwrite?: boolean;

   /**
    * Default: 'copy'.
    */
   symlinks?: SymlinkPolicy;

   /**
    * Default: 'keep'.
    */
   emptyDirs?: EmptyDirPolicy;

   /**
    * Walk and report without writing anything.
    */
   dryRun?: boolean;

   /**
    * Checked before every entry.
    */
   signal?: AbortSignal;

   onEntry?: (event: CopyEntryEvent) => void;

   logger?: Logger;
}

export function emptyCopyStats(): CopyStats {
   return {
      filesCopied: 0,
      bytesCopied: 0,
      dirsCreated: 0,
      linksCopied: 0,
      entriesSkipped: 0,
   };
}

export function formatCopyStats(stats: CopyStats): string {
   const parts = [
      pluralize('file', stats.filesCopied, true),
      pluralize('byte', stats.bytesCopied, true),
      pluralize('directory', stats.dirsCreated, true),
   ];
   if (stats.linksCopied > 0) parts.push(pluralize('link', stats.linksCopied, true));
   parts.push(`${stats.entriesSkipped} skipped`);
   return parts.join(', ');
}

async function isEmptyDir(dirPath: string): Promise<boolean> {
   const entries = await fsp.readdir(dirPath);
   return entries.length === 0;
}

/**
 * Copy `sourceRoot` into `destRoot`, depth first, leaving out every entry
 * the ignore patterns exclude. An excluded directory is never read.
 *
 * Failure semantics: the first entry that cannot be read or written
 * aborts the copy with an {@link IoFailureError} naming that entry.
 * Whatever was already written to `destRoot` stays there; there is no
 * rollback, cleanup is up to the caller.
 */
export async function copyTree(
   sourceRoot: string,
   destRoot: string,
   options: CopyOptions = {},
): Promise<CopyStats> {
   const matcher = options.matcher ?? IgnoreMatcher.compile(options.ignore ?? []);
   const symlinkPolicy = options.symlinks ?? 'copy';
   const emptyDirs = options.emptyDirs ?? 'keep';
   const overwrite = options.overwrite ?? false;
   const dryRun = options.dryRun ?? false;
   const logger = options.logger ?? defaultLogger.child('[copy]');
   const { signal, onEntry } = options;

   const sourceAbs = path.resolve(sourceRoot);
   const destAbs = path.resolve(destRoot);
   const stats = emptyCopyStats();

   let sourceStat: fs.Stats;
   try {
      sourceStat = await fsp.stat(sourceAbs);
   } catch (err) {
      throw new IoFailureError(sourceAbs, 'read', err);
   }
   if (!sourceStat.isDirectory()) {
      throw new IoFailureError(sourceAbs, 'read', new Error('not a directory'));
   }

   const destStat = await fsp.lstat(destAbs).catch((err: unknown) => {
      if (errnoCode(err) === 'ENOENT') return null;
      throw new IoFailureError(destAbs, 'inspect', err);
   });
   if (destStat) {
      if (!destStat.isDirectory()) {
         throw new IoFailureError(destAbs, 'write', new Error('destination is not a directory'));
      }
      let empty: boolean;
      try {
         empty = await isEmptyDir(destAbs);
      } catch (err) {
         throw new IoFailureError(destAbs, 'read directory', err);
      }
      if (!empty && !overwrite) {
         throw new DestinationNotEmptyError(destAbs);
      }
   }

   if (!dryRun) {
      try {
         await fsp.mkdir(destAbs, { recursive: true });
      } catch (err) {
         throw new IoFailureError(destAbs, 'create directory', err);
      }
   }

   let sourceReal: string;
   try {
      sourceReal = await fsp.realpath(sourceAbs);
   } catch (err) {
      throw new IoFailureError(sourceAbs, 'resolve', err);
   }

   logger.debug(
      `copy ${sourceAbs} -> ${destAbs} (patterns=${matcher.patterns.length}, symlinks=${symlinkPolicy}, emptyDirs=${emptyDirs}${dryRun ? ', dry run' : ''})`,
   );

   const skip = (relPath: string, type: EntryType, reason: SkipReason, pattern?: string) => {
      stats.entriesSkipped++;
      logger.debug(`skip ${relPath} (${pattern ? `matches "${pattern}"` : reason})`);
      onEntry?.({ action: 'skip', path: relPath, type, reason, ...(pattern !== undefined && { pattern }) });
   };

   const createDir = async (relDir: string): Promise<void> => {
      const target = path.join(destAbs, relDir);
      if (!dryRun) {
         try {
            await fsp.mkdir(target);
         } catch (err) {
            if (errnoCode(err) !== 'EEXIST') {
               throw new IoFailureError(target, 'create directory', err);
            }
            const existing = await fsp.lstat(target).catch(() => null);
            if (!existing?.isDirectory()) {
               throw new IoFailureError(target, 'create directory', err);
            }
            return;
         }
      }
      stats.dirsCreated++;
      onEntry?.({ action: 'copy', path: relDir, type: 'directory', bytes: 0 });
   };

   // Directories are materialized on demand so 'prune' mode only
   // creates the ones something is written into.
   const dirEnsurer = (relDir: string, parent?: () => Promise<void>) => {
      let created = false;
      return async () => {
         if (created) return;
         await parent?.();
         await createDir(relDir);
         created = true;
      };
   };

   const copyFile = async (
      srcPath: string,
      relPath: string,
      fileStat: fs.Stats,
      ensureParent: () => Promise<void>,
   ) => {
      await ensureParent();
      const target = path.join(destAbs, relPath);
      if (!dryRun) {
         try {
            await fsp.copyFile(srcPath, target, overwrite ? 0 : fs.constants.COPYFILE_EXCL);
         } catch (err) {
            throw new IoFailureError(srcPath, 'copy', err);
         }
         try {
            await fsp.chmod(target, fileStat.mode & 0o777);
         } catch (err) {
            throw new IoFailureError(target, 'set permissions on', err);
         }
      }
      stats.filesCopied++;
      stats.bytesCopied += fileStat.size;
      onEntry?.({ action: 'copy', path: relPath, type: 'file', bytes: fileStat.size });
   };

   const copyLink = async (srcPath: string, relPath: string, ensureParent: () => Promise<void>) => {
      let linkTarget: string;
      try {
         linkTarget = await fsp.readlink(srcPath);
      } catch (err) {
         throw new IoFailureError(srcPath, 'read link', err);
      }
      await ensureParent();
      const target = path.join(destAbs, relPath);
      if (!dryRun) {
         try {
            if (overwrite) {
               const existing = await fsp.lstat(target).catch(() => null);
               if (existing && !existing.isDirectory()) {
                  await fsp.unlink(target);
               }
            }
            await fsp.symlink(linkTarget, target);
         } catch (err) {
            throw new IoFailureError(target, 'create link', err);
         }
      }
      stats.linksCopied++;
      onEntry?.({ action: 'copy', path: relPath, type: 'symlink', bytes: 0 });
   };

   const walk = async (
      absDir: string,
      relDir: string,
      realDir: string,
      ancestors: readonly string[],
      ensureSelf: () => Promise<void>,
   ): Promise<void> => {
      let dirents: fs.Dirent[];
      try {
         dirents = await fsp.readdir(absDir, { withFileTypes: true });
      } catch (err) {
         throw new IoFailureError(absDir, 'read directory', err);
      }
      dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const dirent of dirents) {
         const relPath = relDir ? `${relDir}/${dirent.name}` : dirent.name;
         if (signal?.aborted) {
            throw new CopyCancelledError(relPath);
         }

         const srcPath = path.join(absDir, dirent.name);
         if (path.resolve(srcPath) === destAbs) {
            skip(relPath, 'directory', 'destination');
            continue;
         }

         let isDirectory = dirent.isDirectory();
         let isFile = dirent.isFile();
         let childReal = path.join(realDir, dirent.name);

         if (dirent.isSymbolicLink()) {
            if (symlinkPolicy === 'skip') {
               skip(relPath, 'symlink', 'symlink');
               continue;
            }
            if (symlinkPolicy === 'copy') {
               const pattern = matcher.matchingPattern(relPath, false);
               if (pattern !== undefined) {
                  skip(relPath, 'symlink', 'ignored', pattern);
                  continue;
               }
               // eslint-disable-next-line no-await-in-loop
               await copyLink(srcPath, relPath, ensureSelf);
               continue;
            }

            // follow
            let targetStat: fs.Stats;
            try {
               // eslint-disable-next-line no-await-in-loop
               targetStat = await fsp.stat(srcPath);
               // eslint-disable-next-line no-await-in-loop
               childReal = await fsp.realpath(srcPath);
            } catch (err) {
               throw new IoFailureError(srcPath, 'follow link', err);
            }
            isDirectory = targetStat.isDirectory();
            isFile = targetStat.isFile();
            if (isDirectory && ancestors.includes(childReal)) {
               throw new SymlinkLoopError(srcPath, childReal);
            }
         }

         if (isDirectory) {
            const pattern = matcher.matchingPattern(relPath, true);
            if (pattern !== undefined) {
               skip(relPath, 'directory', 'ignored', pattern);
               continue;
            }
            const ensureChild = dirEnsurer(relPath, ensureSelf);
            if (emptyDirs === 'keep') {
               // eslint-disable-next-line no-await-in-loop
               await ensureChild();
            }
            // eslint-disable-next-line no-await-in-loop
            await walk(srcPath, relPath, childReal, [...ancestors, childReal], ensureChild);
         } else if (isFile) {
            const pattern = matcher.matchingPattern(relPath, false);
            if (pattern !== undefined) {
               skip(relPath, 'file', 'ignored', pattern);
               continue;
            }
            let fileStat: fs.Stats;
            try {
               // eslint-disable-next-line no-await-in-loop
               fileStat = await fsp.stat(srcPath);
            } catch (err) {
               throw new IoFailureError(srcPath, 'read', err);
            }
            // eslint-disable-next-line no-await-in-loop
            await copyFile(srcPath, relPath, fileStat, ensureSelf);
         } else {
            skip(relPath, 'other', 'unsupported');
         }
      }
   };

   const ensureRoot = async () => {};
   await walk(sourceAbs, '', sourceReal, [sourceReal], ensureRoot);

   logger.debug(`copied ${formatCopyStats(stats)}`);
   return stats;
}
