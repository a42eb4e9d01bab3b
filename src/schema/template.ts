// src/schema/template.ts

import { z } from 'zod';

/**
 * A stored template as seen by callers.
 */
export interface Template {
    /**
     * Unique identifier, also the storage directory name.
     */
    name: string;

    /**
     * Absolute path of the captured copy (`<root>/templates/<name>`).
     */
    storagePath: string;

    /**
     * ISO-8601 capture time.
     */
    createdAt: string;

    /**
     * Absolute path of the directory the template was captured from.
     */
    sourcePath: string;

    description?: string;

    /**
     * Effective ignore patterns used at capture time.
     */
    ignore: string[];
}

export const TEMPLATE_NAME_MAX_LENGTH = 100;

export const TemplateNameSchema = z
    .string()
    .min(1, 'name is empty')
    .max(TEMPLATE_NAME_MAX_LENGTH, `name is longer than ${TEMPLATE_NAME_MAX_LENGTH} characters`)
    .regex(
        /^[A-Za-z0-9][A-Za-z0-9._-]*$/,
        'use letters, digits, ".", "_" or "-", starting with a letter or digit',
    );

/**
 * On-disk form of a template; `storagePath` is relative to the root
 * directory (POSIX separators) so the root can be moved.
 */
export const TemplateRecordSchema = z
    .object({
        name: TemplateNameSchema,
        storagePath: z.string().min(1),
        createdAt: z.string().datetime(),
        sourcePath: z.string().min(1),
        description: z.string().optional(),
        ignore: z.array(z.string()).default([]),
    })
    .strict();

export type TemplateRecord = z.infer<typeof TemplateRecordSchema>;

export const REGISTRY_VERSION = 1;

export const RegistryFileSchema = z
    .object({
        version: z.literal(REGISTRY_VERSION),
        templates: z.record(z.string(), TemplateRecordSchema),
    })
    .strict();

export type RegistryFile = z.infer<typeof RegistryFileSchema>;
