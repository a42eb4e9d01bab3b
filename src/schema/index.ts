// src/schema/index.ts

export * from './config';
export * from './template';

/**
 * Default folder name under the platform config directory.
 */
export const DIRPLATE_DIR_NAME = 'dirplate';

/**
 * Environment variable overriding the root directory.
 */
export const DIRPLATE_HOME_ENV = 'DIRPLATE_HOME';

/**
 * Registry metadata file, relative to the root directory.
 */
export const REGISTRY_FILE_NAME = 'registry';

/**
 * Directory holding one sub-directory per template, relative to the root.
 */
export const TEMPLATES_DIR_NAME = 'templates';

/**
 * In-progress captures, relative to the templates directory.
 */
export const STAGING_DIR_NAME = '.staging';
