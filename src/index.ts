// src/index.ts

export * from './schema';
export * from './core/errors';
export * from './core/ignore-matcher';
export * from './core/copy-tree';
export * from './core/registry';
export * from './core/template-actions';
export * from './core/ignore-file';
export * from './core/tree-text';
export {
   CONFIG_FILE_CANDIDATES,
   defaultRootDir,
   loadDirplateConfig,
   resolveRootDir,
   withConfigDefaults,
   type LoadConfigOptions,
   type LoadConfigResult,
   type ResolveRootDirOptions,
   type ResolvedConfig,
} from './core/config-loader';
export { initConfig, type InitConfigOptions, type InitConfigResult } from './core/init-config';
export { withFileLock, type LockOptions } from './core/registry-lock';
export { Logger, defaultLogger, parseLogLevel, type LogLevel, type LoggerOptions } from './util/logger';
