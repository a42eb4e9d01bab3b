// src/core/init-config.ts

import fs from 'fs';
import path from 'path';
import { ensureDirSync } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';
import { DEFAULT_IGNORE, DEFAULT_IGNORE_FILE, DEFAULT_LOCK_TIMEOUT_MS } from '../schema';

const logger = defaultLogger.child('[init]');

export interface InitConfigOptions {
    /**
     * Overwrite an existing config file.
     */
    force?: boolean;

    /**
     * Name of the config file inside the root directory.
     * Default: "config.ts"
     */
    configFileName?: string;
}

export interface InitConfigResult {
    configPath: string;
    created: boolean;
}

// ---------------------------------------------------------------------------
// Default config template
// ---------------------------------------------------------------------------

const DEFAULT_CONFIG_TS = `import type { DirplateConfig } from 'dirplate';

const config: DirplateConfig = {
  // Patterns left out of every capture, on top of the ones passed with
  // \`dirplate capture --ignore\`. Syntax:
  //   *.log          any file or folder named *.log, at any depth
  //   /build         only "build" at the top of the captured folder
  //   cache/         folders only
  //   dist/**        "dist" and everything below it
  ignore: ${JSON.stringify(DEFAULT_IGNORE)},

  // Per-folder ignore file read from the captured folder (false to disable).
  // ignoreFile: '${DEFAULT_IGNORE_FILE}',

  // Symbolic links: 'copy' (recreate the link), 'follow' (copy its target),
  // or 'skip'.
  // symlinks: 'copy',

  // Folders left empty after filtering: 'keep' or 'prune'.
  // emptyDirs: 'keep',

  // How long to wait for another dirplate process to release the registry.
  // lockTimeoutMs: ${DEFAULT_LOCK_TIMEOUT_MS},
};

export default config;
`;

/**
 * Write a commented default config into the root directory.
 *
 * - Creates the root directory if it doesn't exist.
 * - Leaves an existing config alone unless force = true.
 */
export function initConfig(rootDir: string, options: InitConfigOptions = {}): InitConfigResult {
    const rootAbs = ensureDirSync(rootDir);
    const configPath = path.join(rootAbs, options.configFileName ?? 'config.ts');

    const existed = fs.existsSync(configPath);
    if (existed && !options.force) {
        logger.info(`Config already exists at ${configPath} (use --force to overwrite).`);
        return { configPath, created: false };
    }

    fs.writeFileSync(configPath, DEFAULT_CONFIG_TS, 'utf8');
    logger.info(`${existed ? 'Overwrote' : 'Created'} config at ${configPath}`);
    return { configPath, created: true };
}
