// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { pathToFileURL } from 'url';
import { transform } from 'esbuild';

import {
   DEFAULT_IGNORE,
   DEFAULT_IGNORE_FILE,
   DEFAULT_LOCK_TIMEOUT_MS,
   DIRPLATE_DIR_NAME,
   DIRPLATE_HOME_ENV,
   DirplateConfigSchema,
   type DirplateConfig,
   type EmptyDirPolicy,
   type SymlinkPolicy,
} from '../schema';
import { ConfigInvalidError } from './errors';
import { defaultLogger } from '../util/logger';
import { ensureDirSync, expandHomePath } from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

export const CONFIG_FILE_CANDIDATES = [
   'config.ts',
   'config.mts',
   'config.mjs',
   'config.js',
   'config.cjs',
];

/**
 * Config with every default filled in.
 */
export interface ResolvedConfig {
   ignore: string[];
   ignoreFile: string | false;
   symlinks: SymlinkPolicy;
   emptyDirs: EmptyDirPolicy;
   lockTimeoutMs: number;
}

export interface ResolveRootDirOptions {
   /**
    * Explicit root (e.g. from --root). Wins over the environment.
    */
   rootDir?: string;

   env?: NodeJS.ProcessEnv;
   platform?: NodeJS.Platform;
   homeDir?: string;
}

export interface LoadConfigOptions extends ResolveRootDirOptions {
   /**
    * Explicit config file path. If not provided, we look for config.*
    * inside the root directory.
    */
   configPath?: string;
}

export interface LoadConfigResult {
   config: ResolvedConfig;

   /**
    * Absolute root directory handed to the registry.
    */
   rootDir: string;

   /**
    * Config file that was loaded, if any.
    */
   configPath: string | undefined;
}

/**
 * Platform configuration directory for dirplate:
 * - Linux & others: $XDG_CONFIG_HOME/dirplate or ~/.config/dirplate
 * - macOS: ~/Library/Application Support/dirplate
 * - Windows: %APPDATA%\dirplate
 */
export function defaultRootDir(options: Omit<ResolveRootDirOptions, 'rootDir'> = {}): string {
   const env = options.env ?? process.env;
   const platform = options.platform ?? process.platform;
   const home = options.homeDir ?? os.homedir();

   if (platform === 'darwin') {
      return path.join(home, 'Library', 'Application Support', DIRPLATE_DIR_NAME);
   }
   if (platform === 'win32') {
      const appData = env.APPDATA ?? path.join(home, 'AppData', 'Roaming');
      return path.join(appData, DIRPLATE_DIR_NAME);
   }
   const xdg = env.XDG_CONFIG_HOME;
   const base = xdg && path.isAbsolute(xdg) ? xdg : path.join(home, '.config');
   return path.join(base, DIRPLATE_DIR_NAME);
}

/**
 * Resolve the root directory: explicit option > DIRPLATE_HOME > platform default.
 * A leading "~" is expanded.
 */
export function resolveRootDir(options: ResolveRootDirOptions = {}): string {
   const env = options.env ?? process.env;
   const fromEnv = env[DIRPLATE_HOME_ENV]?.trim();
   const chosen = options.rootDir ?? (fromEnv ? fromEnv : undefined) ?? defaultRootDir(options);
   return path.resolve(expandHomePath(chosen));
}

export function withConfigDefaults(config: DirplateConfig): ResolvedConfig {
   return {
      ignore: config.ignore ?? DEFAULT_IGNORE,
      ignoreFile: config.ignoreFile ?? DEFAULT_IGNORE_FILE,
      symlinks: config.symlinks ?? 'copy',
      emptyDirs: config.emptyDirs ?? 'keep',
      lockTimeoutMs: config.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
   };
}

/**
 * Resolve the root directory and load the optional config file in it.
 * A missing config file means defaults; a config that fails validation
 * is a ConfigInvalidError.
 */
export async function loadDirplateConfig(
   options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
   const rootDir = resolveRootDir(options);
   const configPath = options.configPath
      ? path.resolve(expandHomePath(options.configPath))
      : findConfigPath(rootDir);

   if (!configPath) {
      logger.debug(`No config file in ${rootDir}; using defaults.`);
      return { config: withConfigDefaults({}), rootDir, configPath: undefined };
   }

   const exported = await importConfig(configPath);
   const parsed = DirplateConfigSchema.safeParse(exported);
   if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new ConfigInvalidError(configPath, `${where}${issue?.message ?? 'invalid value'}`, parsed.error);
   }

   logger.debug(`Loaded config ${configPath} (root=${rootDir})`);
   return { config: withConfigDefaults(parsed.data), rootDir, configPath };
}

function findConfigPath(rootDir: string): string | undefined {
   for (const file of CONFIG_FILE_CANDIDATES) {
      const full = path.join(rootDir, file);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return undefined;
}

function defaultExport(mod: unknown): unknown {
   if (typeof mod === 'object' && mod !== null && 'default' in mod && mod.default !== undefined) {
      return mod.default;
   }
   return mod;
}

/**
 * Import a DirplateConfig from the given path.
 * - For .ts/.mts we transpile with esbuild to ESM and load from a temp file.
 * - For .js/.mjs/.cjs we import directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   if (!fs.existsSync(configPath)) {
      throw new ConfigInvalidError(configPath, 'file does not exist');
   }

   const ext = path.extname(configPath).toLowerCase();
   try {
      if (ext === '.ts' || ext === '.mts') {
         return await importTsConfig(configPath);
      }

      const url = pathToFileURL(configPath).href;
      const mod: unknown = await import(url);
      return defaultExport(mod);
   } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigInvalidError(configPath, `could not be loaded: ${reason}`, err);
   }
}

/**
 * Transpile a TS config file to ESM with esbuild and import the compiled file.
 * We cache based on (path + mtime) so changes invalidate the temp.
 */
async function importTsConfig(configPath: string): Promise<unknown> {
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = path.join(os.tmpdir(), 'dirplate-config');
   ensureDirSync(tmpDir);

   const tmpFile = path.join(tmpDir, `${hash}.mjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader: 'ts',
         format: 'esm',
         sourcemap: 'inline',
         target: 'node20',
         sourcefile: configPath,
      });

      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   const url = pathToFileURL(tmpFile).href;
   const mod: unknown = await import(url);
   return defaultExport(mod);
}
