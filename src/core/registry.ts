// src/core/registry.ts

import crypto from 'crypto';
import fsp from 'fs/promises';
import path from 'path';

import {
   DEFAULT_LOCK_TIMEOUT_MS,
   REGISTRY_FILE_NAME,
   REGISTRY_VERSION,
   RegistryFileSchema,
   STAGING_DIR_NAME,
   TEMPLATES_DIR_NAME,
   TemplateNameSchema,
   type EmptyDirPolicy,
   type RegistryFile,
   type SymlinkPolicy,
   type Template,
   type TemplateRecord,
} from '../schema';
import { copyTree, type CopyEntryEvent, type CopyStats } from './copy-tree';
import {
   DestinationNotEmptyError,
   InvalidTemplateNameError,
   IoFailureError,
   RegistryCorruptError,
   TemplateExistsError,
   TemplateNotFoundError,
} from './errors';
import { IgnoreMatcher } from './ignore-matcher';
import { withFileLock } from './registry-lock';
import { errnoCode, toPosixPath } from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

export interface RegistryOptions {
   /**
    * Root directory holding the registry file and the templates folder.
    * Resolved by the caller (see resolveRootDir); never read from env here.
    */
   rootDir: string;

   logger?: Logger;

   lockTimeoutMs?: number;
}

interface CopyControls {
   symlinks?: SymlinkPolicy;
   signal?: AbortSignal;
   onEntry?: (event: CopyEntryEvent) => void;
}

export interface AddTemplateOptions extends CopyControls {
   /**
    * Replace an existing template of the same name (or an unregistered
    * directory occupying its storage location).
    */
   overwrite?: boolean;
   description?: string;
   emptyDirs?: EmptyDirPolicy;

   /**
    * Report what would be captured without writing anything.
    */
   dryRun?: boolean;
}

export interface InstantiateOptions extends CopyControls {
   /**
    * Allow a non-empty destination; existing files are replaced.
    */
   overwrite?: boolean;
   dryRun?: boolean;
}

export interface AddTemplateResult {
   template: Template;
   stats: CopyStats;
}

export interface RegistryAudit {
   /**
    * Registered names whose storage directory is gone.
    */
   missing: string[];

   /**
    * Absolute paths of storage directories nothing in the registry
    * refers to (including leftovers of failed captures).
    */
   orphans: string[];
}

export interface PruneResult {
   removedPaths: string[];
   droppedTemplates: string[];
}

function emptyRegistry(): RegistryFile {
   return { version: REGISTRY_VERSION, templates: {} };
}

/**
 * Own entries only; names such as "constructor" must not resolve to
 * Object.prototype members.
 */
function findRecord(data: RegistryFile, name: string): TemplateRecord | undefined {
   return Object.hasOwn(data.templates, name) ? data.templates[name] : undefined;
}

/**
 * Assert `name` can be used as a template name and directory name.
 */
export function validateTemplateName(name: string): void {
   const parsed = TemplateNameSchema.safeParse(name);
   if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? 'invalid name';
      throw new InvalidTemplateNameError(name, reason);
   }
}

async function isDirectory(p: string): Promise<boolean> {
   try {
      return (await fsp.lstat(p)).isDirectory();
   } catch (err) {
      if (errnoCode(err) === 'ENOENT') return false;
      throw new IoFailureError(p, 'inspect', err);
   }
}

async function removeDir(p: string): Promise<void> {
   try {
      await fsp.rm(p, { recursive: true, force: true });
   } catch (err) {
      throw new IoFailureError(p, 'remove', err);
   }
}

async function listDirNames(p: string): Promise<string[]> {
   try {
      const dirents = await fsp.readdir(p, { withFileTypes: true });
      return dirents.filter((d) => d.isDirectory()).map((d) => d.name).sort();
   } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw new IoFailureError(p, 'read directory', err);
   }
}

/**
 * Durable index of templates, backed by a single root directory:
 *
 *   <root>/registry             JSON metadata
 *   <root>/templates/<name>/    captured copies
 *   <root>/templates/.staging/  captures in progress
 *
 * Nothing else writes below the root. Read-modify-write sequences hold
 * an advisory lock; copies run outside the lock.
 */
export class TemplateRegistry {
   readonly rootDir: string;
   readonly registryPath: string;
   readonly templatesDir: string;
   readonly stagingDir: string;
   readonly lockPath: string;

   private readonly logger: Logger;
   private readonly lockTimeoutMs: number;

   constructor(options: RegistryOptions) {
      this.rootDir = path.resolve(options.rootDir);
      this.registryPath = path.join(this.rootDir, REGISTRY_FILE_NAME);
      this.templatesDir = path.join(this.rootDir, TEMPLATES_DIR_NAME);
      this.stagingDir = path.join(this.templatesDir, STAGING_DIR_NAME);
      this.lockPath = `${this.registryPath}.lock`;
      this.logger = options.logger ?? defaultLogger.child('[registry]');
      this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
   }

   storagePathFor(name: string): string {
      return path.join(this.templatesDir, name);
   }

   async list(): Promise<Template[]> {
      const data = await this.load();
      return Object.values(data.templates)
         .map((record) => this.toTemplate(record))
         .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
   }

   async get(name: string): Promise<Template | undefined> {
      const data = await this.load();
      const record = findRecord(data, name);
      return record ? this.toTemplate(record) : undefined;
   }

   /**
    * Capture `sourcePath` as template `name`.
    *
    * The copy is written to a staging directory and moved into place only
    * once it completed, and the registry is written after that. A failed
    * copy leaves the registry untouched; its partial staging directory
    * stays on disk until `prune()`.
    */
   async add(
      name: string,
      sourcePath: string,
      ignore: readonly string[],
      options: AddTemplateOptions = {},
   ): Promise<AddTemplateResult> {
      validateTemplateName(name);
      const matcher = IgnoreMatcher.compile(ignore);
      const sourceAbs = path.resolve(sourcePath);
      const storagePath = this.storagePathFor(name);
      const overwrite = options.overwrite ?? false;

      this.assertAvailable(await this.load(), name, overwrite);
      if (!overwrite && (await isDirectory(storagePath))) {
         throw new DestinationNotEmptyError(storagePath);
      }

      const staging = path.join(this.stagingDir, `${name}-${crypto.randomBytes(4).toString('hex')}`);
      const copyOptions = {
         matcher,
         symlinks: options.symlinks,
         emptyDirs: options.emptyDirs,
         signal: options.signal,
         onEntry: options.onEntry,
         logger: this.logger,
      };

      const record: TemplateRecord = {
         name,
         storagePath: toPosixPath(path.relative(this.rootDir, storagePath)),
         createdAt: new Date().toISOString(),
         sourcePath: sourceAbs,
         ignore: matcher.patterns,
         ...(options.description !== undefined && { description: options.description }),
      };

      if (options.dryRun) {
         const stats = await copyTree(sourceAbs, staging, { ...copyOptions, dryRun: true });
         return { template: this.toTemplate(record), stats };
      }

      await this.ensureDir(this.stagingDir);
      let stats: CopyStats;
      try {
         stats = await copyTree(sourceAbs, staging, copyOptions);
      } catch (err) {
         this.logger.debug(`capture of "${name}" failed; partial copy left at ${staging}`);
         throw err;
      }

      await this.locked(async () => {
         const data = await this.load();
         try {
            this.assertAvailable(data, name, overwrite);
         } catch (err) {
            await removeDir(staging);
            throw err;
         }

         if (findRecord(data, name)) {
            // drop the old entry before its storage so a crash can only
            // leave unreferenced storage behind
            delete data.templates[name];
            await this.save(data);
         }
         if (await isDirectory(storagePath)) {
            if (!overwrite) {
               await removeDir(staging);
               throw new DestinationNotEmptyError(storagePath);
            }
            await removeDir(storagePath);
         }

         try {
            await fsp.rename(staging, storagePath);
         } catch (err) {
            throw new IoFailureError(storagePath, 'move capture into', err);
         }

         data.templates[name] = record;
         await this.save(data);
      });

      this.logger.debug(`registered "${name}" from ${sourceAbs}`);
      return { template: this.toTemplate(record), stats };
   }

   /**
    * Delete template `name`: the registry entry first, then its storage.
    * If deleting storage fails, the entry is already gone and the
    * directory shows up as an orphan in `audit()`.
    */
   async remove(name: string): Promise<Template> {
      return this.locked(async () => {
         const data = await this.load();
         const record = findRecord(data, name);
         if (!record) {
            throw new TemplateNotFoundError(name);
         }

         delete data.templates[name];
         await this.save(data);

         const template = this.toTemplate(record);
         await removeDir(template.storagePath);
         this.logger.debug(`removed "${name}"`);
         return template;
      });
   }

   /**
    * Copy template `name` into `destPath`. Storage was filtered at
    * capture time, so nothing is ignored here.
    */
   async instantiate(
      name: string,
      destPath: string,
      options: InstantiateOptions = {},
   ): Promise<CopyStats> {
      const template = await this.get(name);
      if (!template) {
         throw new TemplateNotFoundError(name);
      }
      return copyTree(template.storagePath, destPath, {
         matcher: IgnoreMatcher.empty(),
         overwrite: options.overwrite,
         symlinks: options.symlinks,
         dryRun: options.dryRun,
         signal: options.signal,
         onEntry: options.onEntry,
         logger: this.logger,
      });
   }

   async audit(): Promise<RegistryAudit> {
      const data = await this.load();
      const templates = Object.values(data.templates).map((record) => this.toTemplate(record));

      const missing: string[] = [];
      for (const template of templates) {
         // eslint-disable-next-line no-await-in-loop
         if (!(await isDirectory(template.storagePath))) {
            missing.push(template.name);
         }
      }

      const referenced = new Set(templates.map((template) => path.resolve(template.storagePath)));
      const orphans: string[] = [];
      for (const dirName of await listDirNames(this.templatesDir)) {
         if (dirName === STAGING_DIR_NAME) continue;
         const abs = path.join(this.templatesDir, dirName);
         if (!referenced.has(abs)) orphans.push(abs);
      }
      for (const dirName of await listDirNames(this.stagingDir)) {
         orphans.push(path.join(this.stagingDir, dirName));
      }

      return { missing: missing.sort(), orphans };
   }

   /**
    * Remove orphaned storage and drop entries whose storage is gone.
    */
   async prune(): Promise<PruneResult> {
      return this.locked(async () => {
         const { missing, orphans } = await this.audit();

         for (const orphan of orphans) {
            // eslint-disable-next-line no-await-in-loop
            await removeDir(orphan);
            this.logger.debug(`removed orphaned storage ${orphan}`);
         }

         if (missing.length > 0) {
            const data = await this.load();
            for (const name of missing) {
               delete data.templates[name];
            }
            await this.save(data);
         }

         return { removedPaths: orphans, droppedTemplates: missing };
      });
   }

   private assertAvailable(data: RegistryFile, name: string, overwrite: boolean): void {
      if (findRecord(data, name) && !overwrite) {
         throw new TemplateExistsError(name);
      }
   }

   private toTemplate(record: TemplateRecord): Template {
      return {
         ...record,
         storagePath: path.resolve(this.rootDir, record.storagePath),
      };
   }

   private locked<T>(fn: () => Promise<T>): Promise<T> {
      return this.ensureDir(this.rootDir).then(() =>
         withFileLock(this.lockPath, fn, { timeoutMs: this.lockTimeoutMs, logger: this.logger }),
      );
   }

   private async ensureDir(dir: string): Promise<void> {
      try {
         await fsp.mkdir(dir, { recursive: true });
      } catch (err) {
         throw new IoFailureError(dir, 'create directory', err);
      }
   }

   /**
    * Read and validate the registry file. A missing file is an empty
    * registry; anything unreadable is RegistryCorrupt, never a reset.
    */
   private async load(): Promise<RegistryFile> {
      let raw: string;
      try {
         raw = await fsp.readFile(this.registryPath, 'utf8');
      } catch (err) {
         if (errnoCode(err) === 'ENOENT') return emptyRegistry();
         const reason = errnoCode(err) === 'EISDIR' ? 'path is a directory' : 'cannot be read';
         throw new RegistryCorruptError(this.registryPath, reason, err);
      }

      let json: unknown;
      try {
         json = JSON.parse(raw);
      } catch (err) {
         throw new RegistryCorruptError(this.registryPath, 'not valid JSON', err);
      }

      const parsed = RegistryFileSchema.safeParse(json);
      if (!parsed.success) {
         const issue = parsed.error.issues[0];
         const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
         throw new RegistryCorruptError(
            this.registryPath,
            `${issue?.message ?? 'unexpected content'}${where}`,
            parsed.error,
         );
      }

      for (const [key, record] of Object.entries(parsed.data.templates)) {
         if (key !== record.name) {
            throw new RegistryCorruptError(
               this.registryPath,
               `entry "${key}" is named "${record.name}"`,
            );
         }
         // storage must be templates/<name>
         if (path.resolve(this.rootDir, record.storagePath) !== this.storagePathFor(key)) {
            throw new RegistryCorruptError(
               this.registryPath,
               `entry "${key}" stores its files at ${record.storagePath} instead of ${TEMPLATES_DIR_NAME}/${key}`,
            );
         }
      }

      return parsed.data;
   }

   /**
    * Write through a temp file and rename, so readers never see a
    * half-written registry.
    */
   private async save(data: RegistryFile): Promise<void> {
      await this.ensureDir(this.rootDir);
      const tmpPath = `${this.registryPath}.${process.pid}.tmp`;
      try {
         await fsp.writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf8');
         await fsp.rename(tmpPath, this.registryPath);
      } catch (err) {
         throw new IoFailureError(this.registryPath, 'write', err);
      }
   }
}
