// src/schema/config.ts

import { z } from 'zod';

/**
 * How symbolic links inside a copied tree are handled.
 *
 * - 'copy':   recreate the link with the same target text (default)
 * - 'follow': copy whatever the link points at; loops are an error
 * - 'skip':   leave links out
 */
export type SymlinkPolicy = 'copy' | 'follow' | 'skip';

/**
 * Whether directories left empty after filtering are created.
 *
 * - 'keep':  mirror every surviving directory, even empty ones (default)
 * - 'prune': only create directories that receive a file or link
 */
export type EmptyDirPolicy = 'keep' | 'prune';

/**
 * User configuration, exported from `<root>/config.ts` (or .mts/.mjs/.js/.cjs).
 *
 * Every field is optional; an absent config file means all defaults.
 */
export interface DirplateConfig {
    /**
     * Ignore patterns applied to every capture, in addition to the
     * ones given on the command line. Default: see DEFAULT_IGNORE.
     */
    ignore?: string[];

    /**
     * Name of a per-directory ignore file read from the capture source.
     * Set to false to disable.
     *
     * Default: ".dirplateignore"
     */
    ignoreFile?: string | false;

    /**
     * Symlink handling for capture and instantiate.
     */
    symlinks?: SymlinkPolicy;

    /**
     * Empty directory handling for capture.
     */
    emptyDirs?: EmptyDirPolicy;

    /**
     * How long registry writers wait for the advisory lock (ms).
     *
     * Default: 5000
     */
    lockTimeoutMs?: number;
}

export const DEFAULT_IGNORE: string[] = [
    '.git/',
    'node_modules/',
    '.DS_Store',
];

export const DEFAULT_IGNORE_FILE = '.dirplateignore';

export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

export const SymlinkPolicySchema = z.enum(['copy', 'follow', 'skip']);

export const EmptyDirPolicySchema = z.enum(['keep', 'prune']);

export const DirplateConfigSchema = z
    .object({
        ignore: z.array(z.string()).optional(),
        ignoreFile: z.union([z.string().min(1), z.literal(false)]).optional(),
        symlinks: SymlinkPolicySchema.optional(),
        emptyDirs: EmptyDirPolicySchema.optional(),
        lockTimeoutMs: z.number().int().nonnegative().optional(),
    })
    .strict();
