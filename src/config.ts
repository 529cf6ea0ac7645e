/**
 * Configuration for the ontology graph.
 *
 * Settings come from the environment and may be overridden programmatically.
 * Everything is validated once, at startup.
 */

import * as path from 'path';
import { z } from 'zod';
import { createInvalidArgumentError } from './types/errors.js';
import { LOG_LEVELS } from './logger.js';

const extensionSchema = z
    .string()
    .min(1)
    .transform((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());

const relationAliasSchema = z.union([
    z.string().min(1),
    z.object({ type: z.string().min(1), inverse: z.boolean().optional() }),
]);

export const GraphConfigSchema = z.object({
    /** Directories scanned for source files at startup */
    sourceDirectories: z.array(z.string().min(1)).default([]),
    /** Descend into subdirectories when discovering sources */
    recursive: z.boolean().default(false),
    ontologyExtensions: z.array(extensionSchema).default(['.owl', '.rdf', '.xml']),
    annotationExtensions: z.array(extensionSchema).default(['.xlsx', '.csv']),
    /** Capability flag: when false, annotation files are reported and skipped */
    annotationSupport: z.boolean().default(true),
    /** JSON file replacing the bundled relation vocabulary */
    relationsFile: z.string().min(1).optional(),
    /** Extra aliases layered over the vocabulary */
    relationAliases: z.record(relationAliasSchema).default({}),
    logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type GraphConfig = z.infer<typeof GraphConfigSchema>;
export type GraphConfigInput = z.input<typeof GraphConfigSchema>;

const booleanFlag = (value: string): boolean => {
    const normalized = value.trim().toLowerCase();
    return !['0', 'false', 'off', 'no', ''].includes(normalized);
};

const list = (value: string, separator: string): string[] =>
    value.split(separator).map((item) => item.trim()).filter((item) => item.length > 0);

/**
 * Read settings from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): GraphConfigInput {
    const input: GraphConfigInput = {};
    if (env.GRAPH_SOURCE_DIRS) input.sourceDirectories = list(env.GRAPH_SOURCE_DIRS, path.delimiter);
    if (env.GRAPH_RECURSIVE !== undefined) input.recursive = booleanFlag(env.GRAPH_RECURSIVE);
    if (env.GRAPH_ONTOLOGY_EXTENSIONS) input.ontologyExtensions = list(env.GRAPH_ONTOLOGY_EXTENSIONS, ',');
    if (env.GRAPH_ANNOTATION_EXTENSIONS) input.annotationExtensions = list(env.GRAPH_ANNOTATION_EXTENSIONS, ',');
    if (env.GRAPH_ANNOTATIONS !== undefined) input.annotationSupport = booleanFlag(env.GRAPH_ANNOTATIONS);
    if (env.GRAPH_RELATIONS_FILE) input.relationsFile = env.GRAPH_RELATIONS_FILE;
    const level = LOG_LEVELS.find((candidate) => candidate === env.LOG_LEVEL);
    if (level) input.logLevel = level;
    return input;
}

/**
 * Build a validated configuration. Overrides win over the environment.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: GraphConfigInput = {}
): GraphConfig {
    const result = GraphConfigSchema.safeParse({ ...configFromEnv(env), ...overrides });
    if (!result.success) {
        throw createInvalidArgumentError('Invalid configuration', {
            issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        });
    }
    return result.data;
}
