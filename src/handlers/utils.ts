import { z } from 'zod';
import type {
    Entity,
    EntityView,
    LoadReport,
    LoadResponse,
    MinimalLoadResponse,
    PropertyBag,
    RelatedEntity,
    RelatedView,
    ScalarValue,
    SourceSummary,
    Verbosity,
} from '../types/index.js';
import { createInvalidArgumentError } from '../types/index.js';

export const verbositySchema = z.enum(['minimal', 'standard', 'detailed']).default('standard');

export const scalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

/**
 * Validate tool arguments, raising INVALID_ARGUMENT with every issue
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
    const result = schema.safeParse(args ?? {});
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw createInvalidArgumentError(`Invalid arguments: ${issues.join('; ')}`, { issues });
    }
    return result.data;
}

function flatten(bag: PropertyBag): Record<string, ScalarValue> {
    return Object.fromEntries(Object.entries(bag).map(([key, { value }]) => [key, value]));
}

/**
 * Build entity view based on verbosity level
 */
export function buildEntityView(entity: Entity, verbosity: Verbosity = 'standard'): EntityView {
    if (verbosity === 'minimal') {
        return { id: entity.id, name: entity.name, type: entity.type };
    }
    if (verbosity === 'standard') {
        return {
            id: entity.id,
            name: entity.name,
            type: entity.type,
            classes: entity.classes,
            properties: flatten(entity.properties),
            annotations: flatten(entity.annotations),
        };
    }
    return entity;
}

export function buildRelatedView(anchorId: string, related: RelatedEntity, verbosity: Verbosity): RelatedView {
    const { relationship, entity } = related;
    return {
        relationship: {
            id: relationship.id,
            type: relationship.type,
            direction: relationship.sourceId === anchorId ? 'outgoing' : 'incoming',
            ...(verbosity === 'detailed' && relationship.sourcePredicate && { sourcePredicate: relationship.sourcePredicate }),
        },
        entity: buildEntityView(entity, verbosity),
    };
}

/**
 * Build load response based on verbosity level
 */
export function buildLoadResponse(report: LoadReport, verbosity: Verbosity = 'standard'): LoadResponse {
    const count = (status: 'loaded' | 'skipped' | 'failed'): number =>
        report.files.filter((file) => file.status === status).length;

    const base: MinimalLoadResponse = {
        state: report.state,
        loaded: count('loaded'),
        skipped: count('skipped'),
        failed: count('failed'),
        totalEntities: report.stats.totalEntities,
        totalRelationships: report.stats.totalRelationships,
    };

    if (verbosity === 'minimal') {
        return base;
    }

    if (verbosity === 'standard') {
        const files = report.files.map((file): SourceSummary => ({
            source: file.source,
            kind: file.kind,
            status: file.status,
            ...(file.merge && {
                entitiesCreated: file.merge.entitiesCreated,
                entitiesMerged: file.merge.entitiesMerged,
                relationshipsCreated: file.merge.relationshipsCreated,
                warnings: file.merge.entries.filter((e) => e.severity === 'warning').length,
            }),
            ...(file.annotations && {
                annotationsMatched: file.annotations.matched,
                annotationsUnmatched: file.annotations.unmatched,
                warnings: file.annotations.entries.filter((e) => e.severity === 'warning').length,
            }),
            ...(file.error && { error: { code: file.error.code, message: file.error.message } }),
        }));
        return { ...base, files };
    }

    return { ...base, files: report.files, entries: report.entries, stats: report.stats };
}
