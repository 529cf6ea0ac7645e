import { z } from 'zod';
import type {
    EntityListResponse,
    GraphError,
    IntegrityReport,
    LoadResponse,
    ManagerStats,
    RelatedListResponse,
    EntityView,
    RelatedSummary,
} from '../types/index.js';
import { createInvalidArgumentError, createNotFoundError } from '../types/index.js';
import type { OntologyManager } from '../ontology/manager.js';
import {
    buildEntityView,
    buildLoadResponse,
    buildRelatedView,
    parseArgs,
    scalarSchema,
    verbositySchema,
} from './utils.js';

const loadSourcesSchema = z.object({
    paths: z.array(z.string().min(1)).optional(),
    directory: z.string().min(1).optional(),
    verbosity: verbositySchema,
});

export async function loadSourcesHandler(args: unknown, manager: OntologyManager): Promise<LoadResponse> {
    const { paths, directory, verbosity } = parseArgs(loadSourcesSchema, args);
    if (!paths?.length && !directory) {
        throw createInvalidArgumentError('Provide paths, a directory, or both');
    }

    const files = [...(paths ?? [])];
    if (directory) {
        const discovered = await manager.discoverSources([directory]);
        files.push(...discovered.ontologies, ...discovered.annotations);
    }
    const report = await manager.load(files);
    return buildLoadResponse(report, verbosity);
}

const queryEntitiesSchema = z.object({
    type: z.string().min(1).optional(),
    name: z.string().optional(),
    properties: z.record(scalarSchema).optional(),
    limit: z.number().int().positive().optional(),
    verbosity: verbositySchema,
});

export function queryEntitiesHandler(args: unknown, manager: OntologyManager): EntityListResponse {
    const { type, name, properties, limit, verbosity } = parseArgs(queryEntitiesSchema, args);
    const entities = manager.query({ type, name, properties });
    return {
        count: entities.length,
        entities: entities.slice(0, limit).map((e) => buildEntityView(e, verbosity)),
    };
}

const searchEntitiesSchema = z.object({
    text: z.string().min(1),
    type: z.string().min(1).optional(),
    limit: z.number().int().positive().optional(),
    verbosity: verbositySchema,
});

export function searchEntitiesHandler(args: unknown, manager: OntologyManager): EntityListResponse {
    const { text, type, limit, verbosity } = parseArgs(searchEntitiesSchema, args);
    const entities = manager.search(text, type);
    return {
        count: entities.length,
        entities: entities.slice(0, limit).map((e) => buildEntityView(e, verbosity)),
    };
}

const entityIdSchema = z.object({
    id: z.string().min(1),
    verbosity: verbositySchema,
});

export function getEntityHandler(
    args: unknown,
    manager: OntologyManager
): { found: true; entity: EntityView } | { found: false; error: GraphError } {
    const { id, verbosity } = parseArgs(entityIdSchema, args);
    const lookup = manager.getEntity(id);
    if (!lookup.found) {
        return lookup;
    }
    return { found: true, entity: buildEntityView(lookup.entity, verbosity) };
}

const getRelatedSchema = z.object({
    id: z.string().min(1),
    relation_types: z.array(z.string().min(1)).optional(),
    direction: z.enum(['outgoing', 'incoming', 'both']).optional(),
    verbosity: verbositySchema,
});

export function getRelatedHandler(args: unknown, manager: OntologyManager): RelatedListResponse {
    const { id, relation_types, direction, verbosity } = parseArgs(getRelatedSchema, args);
    if (!manager.getEntity(id).found) {
        throw createNotFoundError(id);
    }
    const related = manager.getRelated(id, { relationTypes: relation_types, direction });
    return {
        count: related.length,
        related: related.map((r) => buildRelatedView(id, r, verbosity)),
    };
}

const describeEntitySchema = z.object({
    id: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    verbosity: verbositySchema,
});

export function describeEntityHandler(
    args: unknown,
    manager: OntologyManager
): { entity: EntityView; relations: Record<string, RelatedSummary[]> } {
    const { id, name, verbosity } = parseArgs(describeEntitySchema, args);
    const entityId = id ?? (name !== undefined ? manager.findByName(name)?.id : undefined);
    if (entityId === undefined) {
        if (name === undefined) {
            throw createInvalidArgumentError('Provide an entity id or name');
        }
        throw createNotFoundError(name);
    }

    const description = manager.describeEntity(entityId);
    if (!description.found) {
        throw createNotFoundError(entityId);
    }
    return { entity: buildEntityView(description.entity, verbosity), relations: description.relations };
}

const addEntitySchema = z.object({
    type: z.string().min(1),
    name: z.string().min(1),
    properties: z.record(scalarSchema).default({}),
});

export function addEntityHandler(args: unknown, manager: OntologyManager): { id: string; name: string; type: string } {
    const { type, name, properties } = parseArgs(addEntitySchema, args);
    const id = manager.addEntity(type, name, properties);
    const lookup = manager.getEntity(id);
    return lookup.found
        ? { id, name: lookup.entity.name, type: lookup.entity.type }
        : { id, name, type };
}

const addRelationshipSchema = z.object({
    type: z.string().min(1),
    source_id: z.string().min(1),
    target_id: z.string().min(1),
    properties: z.record(scalarSchema).default({}),
});

export function addRelationshipHandler(
    args: unknown,
    manager: OntologyManager
): { id: string; type: string; source_id: string; target_id: string } {
    const { type, source_id, target_id, properties } = parseArgs(addRelationshipSchema, args);
    const id = manager.addRelationship(type, source_id, target_id, properties);
    const relationship = manager.getRelationship(id);
    if (!relationship) {
        throw createNotFoundError(id, 'Relationship');
    }
    return {
        id,
        type: relationship.type,
        source_id: relationship.sourceId,
        target_id: relationship.targetId,
    };
}

const removeSchema = z.object({ id: z.string().min(1) });

export function removeEntityHandler(
    args: unknown,
    manager: OntologyManager
): { removed: true; removed_relationships: number } {
    const { id } = parseArgs(removeSchema, args);
    const { removedRelationships } = manager.removeEntity(id);
    return { removed: true, removed_relationships: removedRelationships };
}

export function removeRelationshipHandler(args: unknown, manager: OntologyManager): { removed: true } {
    const { id } = parseArgs(removeSchema, args);
    manager.removeRelationship(id);
    return { removed: true };
}

export function graphStatsHandler(_args: unknown, manager: OntologyManager): ManagerStats {
    return manager.stats();
}

export function checkIntegrityHandler(_args: unknown, manager: OntologyManager): IntegrityReport {
    return manager.checkIntegrity();
}
