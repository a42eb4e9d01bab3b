// src/core/registry-lock.ts

import fsp from 'fs/promises';
import { RegistryLockedError, IoFailureError } from './errors';
import { errnoCode } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

export interface LockOptions {
   /**
    * Give up after waiting this long. Default: 5000 ms.
    */
   timeoutMs?: number;

   /**
    * Delay between attempts. Default: 50 ms.
    */
   retryMs?: number;

   logger?: Logger;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function processAlive(pid: number): boolean {
   try {
      process.kill(pid, 0);
      return true;
   } catch (err) {
      // EPERM: the process exists but belongs to someone else
      return errnoCode(err) === 'EPERM';
   }
}

async function readLockOwner(lockPath: string): Promise<number | undefined> {
   try {
      const raw = await fsp.readFile(lockPath, 'utf8');
      const pid = Number.parseInt(raw.trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : undefined;
   } catch (err) {
      if (errnoCode(err) === 'ENOENT') return undefined;
      throw new IoFailureError(lockPath, 'read lock', err);
   }
}

async function acquire(lockPath: string, timeoutMs: number, retryMs: number, logger: Logger) {
   const started = Date.now();
   for (;;) {
      try {
         await fsp.writeFile(lockPath, `${process.pid}\n`, { flag: 'wx' });
         return;
      } catch (err) {
         if (errnoCode(err) !== 'EEXIST') {
            throw new IoFailureError(lockPath, 'create lock', err);
         }
      }

      const owner = await readLockOwner(lockPath);
      if (owner !== undefined && !processAlive(owner)) {
         logger.warn(`Removing stale registry lock held by exited process ${owner}`);
         await fsp.unlink(lockPath).catch((err: unknown) => {
            if (errnoCode(err) !== 'ENOENT') throw new IoFailureError(lockPath, 'remove stale lock', err);
         });
         continue;
      }

      const waited = Date.now() - started;
      if (waited >= timeoutMs) {
         throw new RegistryLockedError(lockPath, waited);
      }
      await sleep(retryMs);
   }
}

async function release(lockPath: string) {
   try {
      await fsp.unlink(lockPath);
   } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
         throw new IoFailureError(lockPath, 'release lock', err);
      }
   }
}

/**
 * Run `fn` while holding an advisory lock file created with O_EXCL.
 * Only cooperating dirplate processes honour it.
 */
export async function withFileLock<T>(
   lockPath: string,
   fn: () => Promise<T>,
   options: LockOptions = {},
): Promise<T> {
   const logger = options.logger ?? defaultLogger.child('[lock]');
   await acquire(lockPath, options.timeoutMs ?? 5000, options.retryMs ?? 50, logger);

   let result: T;
   try {
      result = await fn();
   } catch (err) {
      await release(lockPath).catch((releaseErr: unknown) => {
         logger.warn(`Could not release ${lockPath}`, releaseErr);
      });
      throw err;
   }
   await release(lockPath);
   return result;
}
