// src/core/template-actions.ts

import path from 'path';

import type { EmptyDirPolicy, SymlinkPolicy, Template } from '../schema';
import type { ResolvedConfig } from './config-loader';
import type { CopyEntryEvent, CopyStats } from './copy-tree';
import {
   TemplateNotFoundError,
   isDirplateError,
   type DirplateError,
   type DirplateErrorKind,
} from './errors';
import { mergePatterns, readIgnoreFile } from './ignore-file';
import type { AddTemplateResult, PruneResult, TemplateRegistry } from './registry';
import { renderTree } from './tree-text';

/**
 * Outcome of a user-facing action. Failures carry the error kind and a
 * message ready to print; errors outside the catalog are rethrown.
 */
export type ActionResult<T> =
   | { ok: true; value: T }
   | { ok: false; kind: DirplateErrorKind; message: string; error: DirplateError };

export interface ActionContext {
   registry: TemplateRegistry;
   config: ResolvedConfig;
}

export interface CaptureRequest {
   /**
    * Default: the source folder's base name.
    */
   name?: string;
   sourcePath: string;

   /**
    * Patterns given by the user for this capture.
    */
   ignore?: string[];

   /**
    * Include the config's default patterns and the source's ignore file.
    * Default: true
    */
   useDefaults?: boolean;

   description?: string;
   overwrite?: boolean;
   dryRun?: boolean;
   symlinks?: SymlinkPolicy;
   emptyDirs?: EmptyDirPolicy;
   signal?: AbortSignal;
   onEntry?: (event: CopyEntryEvent) => void;
}

export interface InstantiateRequest {
   template: string;

   /**
    * Parent directory of the new copy.
    */
   location: string;

   /**
    * Name of the directory created under `location`. Default: the
    * template name.
    */
   dirName?: string;

   overwrite?: boolean;
   dryRun?: boolean;
   symlinks?: SymlinkPolicy;
   signal?: AbortSignal;
   onEntry?: (event: CopyEntryEvent) => void;
}

export interface InstantiateResult {
   destPath: string;
   stats: CopyStats;
}

export interface ShowTemplateResult {
   template: Template;
   tree: string;
}

/**
 * Turn a catalogued error into the message shown to the user.
 */
export function describeError(error: DirplateError): string {
   const kind = error.kind;
   switch (kind) {
      case 'AlreadyExists':
         return `${error.message}. Use --force to replace it.`;
      case 'NotFound':
         return `${error.message}. Run "dirplate list" to see the available templates.`;
      case 'DestinationNotEmpty':
         return `${error.message}. Use --force to copy into it anyway.`;
      case 'IOFailure':
         return `${error.message}. Anything copied before the failure was left in place.`;
      case 'Cancelled':
         return `${error.message}. Anything copied so far was left in place.`;
      case 'RegistryCorrupt':
         return `${error.message}. Fix the file by hand, or move it away (this forgets every template).`;
      case 'SymlinkLoop':
         return `${error.message}. Use --symlinks copy or --symlinks skip.`;
      case 'Locked':
         return `${error.message}. If no other dirplate process is running, delete the lock file.`;
      case 'PatternSyntax':
      case 'InvalidName':
      case 'ConfigInvalid':
         return error.message;
      default: {
         const unreachable: never = kind;
         return String(unreachable);
      }
   }
}

async function run<T>(action: () => Promise<T>): Promise<ActionResult<T>> {
   try {
      return { ok: true, value: await action() };
   } catch (err) {
      if (isDirplateError(err)) {
         return { ok: false, kind: err.kind, message: describeError(err), error: err };
      }
      throw err;
   }
}

/**
 * "Capture this folder as X": merge the ignore sources, then register.
 */
export function captureTemplate(
   ctx: ActionContext,
   request: CaptureRequest,
): Promise<ActionResult<AddTemplateResult>> {
   return run(async () => {
      const sourcePath = path.resolve(request.sourcePath);
      const useDefaults = request.useDefaults ?? true;
      const { ignoreFile } = ctx.config;

      const fromFile =
         useDefaults && ignoreFile !== false ? await readIgnoreFile(sourcePath, ignoreFile) : [];
      const ignore = mergePatterns(
         useDefaults ? ctx.config.ignore : [],
         fromFile,
         request.ignore ?? [],
      );

      const name = request.name ?? path.basename(sourcePath);
      return ctx.registry.add(name, sourcePath, ignore, {
         overwrite: request.overwrite,
         description: request.description,
         dryRun: request.dryRun,
         symlinks: request.symlinks ?? ctx.config.symlinks,
         emptyDirs: request.emptyDirs ?? ctx.config.emptyDirs,
         signal: request.signal,
         onEntry: request.onEntry,
      });
   });
}

/**
 * "Instantiate X into this folder": copy into `<location>/<dirName>`.
 */
export function instantiateTemplate(
   ctx: ActionContext,
   request: InstantiateRequest,
): Promise<ActionResult<InstantiateResult>> {
   return run(async () => {
      const destPath = path.resolve(request.location, request.dirName ?? request.template);
      const stats = await ctx.registry.instantiate(request.template, destPath, {
         overwrite: request.overwrite,
         dryRun: request.dryRun,
         symlinks: request.symlinks ?? ctx.config.symlinks,
         signal: request.signal,
         onEntry: request.onEntry,
      });
      return { destPath, stats };
   });
}

export function removeTemplate(ctx: ActionContext, name: string): Promise<ActionResult<Template>> {
   return run(() => ctx.registry.remove(name));
}

export function findTemplate(
   ctx: ActionContext,
   name: string,
): Promise<ActionResult<Template | undefined>> {
   return run(() => ctx.registry.get(name));
}

export function listTemplates(ctx: ActionContext): Promise<ActionResult<Template[]>> {
   return run(() => ctx.registry.list());
}

/**
 * Look up a template and render its stored tree.
 */
export function showTemplate(
   ctx: ActionContext,
   name: string,
   options: { maxDepth?: number } = {},
): Promise<ActionResult<ShowTemplateResult>> {
   return run(async () => {
      const template = await ctx.registry.get(name);
      if (!template) {
         throw new TemplateNotFoundError(name);
      }
      return { template, tree: renderTree(template.storagePath, options) };
   });
}

export function pruneTemplates(ctx: ActionContext): Promise<ActionResult<PruneResult>> {
   return run(() => ctx.registry.prune());
}
