/**
 * Graph Store
 *
 * In-memory entity-relationship graph with identity resolution on
 * normalized external keys, canonical relation types and referential
 * integrity. Every mutation runs against a forked state that replaces the
 * live one only when the whole operation returns.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type {
    Direction,
    Entity,
    EntityLookup,
    EntityQuery,
    GraphExport,
    GraphStats,
    IntegrityReport,
    MergeReport,
    PropertyBag,
    RelatedEntity,
    Relationship,
    ScalarValue,
} from '../types/graph.js';
import type { SourceDescriptor } from '../types/ontology.js';
import {
    createDanglingReferenceError,
    createInvalidArgumentError,
    createNotFoundError,
} from '../types/errors.js';
import { RelationVocabulary } from '../ontology/relations.js';
import { createChildLogger } from '../logger.js';
import {
    GraphState,
    cloneEntity,
    cloneRelationship,
    effectiveValue,
    normalizeKey,
    putValue,
    tripleKey,
} from './state.js';

/** Fallback type for entities without a specific class */
export const GENERIC_TYPE = 'Entity';

/** Provenance label for direct API writes */
export const API_SOURCE = 'api';

export interface UpsertOptions {
    source?: string;
    name?: string;
    classes?: string[];
    iri?: string;
}

export interface RelationshipOptions {
    source?: string;
    sourcePredicate?: string;
}

export interface RelatedOptions {
    relationTypes?: string[];
    direction?: Direction;
}

export interface GraphStoreOptions {
    vocabulary?: RelationVocabulary;
}

function isScalar(value: unknown): value is ScalarValue {
    return typeof value === 'string'
        || typeof value === 'boolean'
        || (typeof value === 'number' && Number.isFinite(value));
}

function addSource(sources: string[], source: string): void {
    if (!sources.includes(source)) {
        sources.push(source);
    }
}

function toBag(properties: Record<string, unknown>, source: string): PropertyBag {
    const bag: PropertyBag = {};
    for (const [key, value] of Object.entries(properties)) {
        if (!isScalar(value)) {
            throw createInvalidArgumentError(`Property '${key}' must be a string, number or boolean`, { key });
        }
        putValue(bag, key, { value, source });
    }
    return bag;
}

/**
 * Mutation handle over a forked state. Only valid inside `GraphStore.transaction`.
 */
export class GraphTransaction {
    constructor(
        private readonly state: GraphState,
        private readonly vocabulary: RelationVocabulary
    ) { }

    entity(id: string): Entity | undefined {
        return this.state.entities.get(id);
    }

    idForKey(key: string): string | undefined {
        return this.state.entityByKey(key)?.id;
    }

    findByName(name: string): Entity | undefined {
        return this.state.findByName(name);
    }

    upsertEntity(
        externalKey: string,
        type: string,
        properties: Record<string, unknown> = {},
        options: UpsertOptions = {}
    ): { id: string; created: boolean } {
        const key = normalizeKey(externalKey);
        if (key.length === 0) {
            throw createInvalidArgumentError('Entity key must not be empty');
        }
        const entityType = type.trim() || GENERIC_TYPE;
        const source = options.source ?? API_SOURCE;
        const bag = toBag(properties, source);
        const now = Date.now();

        const existingId = this.state.keyIndex.get(key);
        const existing = existingId !== undefined ? this.state.writableEntity(existingId) : undefined;
        if (existing) {
            if (entityType !== GENERIC_TYPE) {
                existing.type = entityType;
            }
            for (const [key, value] of Object.entries(bag)) {
                putValue(existing.properties, key, value);
            }
            for (const cls of options.classes ?? []) {
                if (!existing.classes.includes(cls)) existing.classes.push(cls);
            }
            if (options.iri) existing.iri = options.iri;
            addSource(existing.sources, source);
            existing.updatedAt = now;
            return { id: existing.id, created: false };
        }

        const entity: Entity = {
            id: randomUUID(),
            key,
            type: entityType,
            name: (options.name ?? externalKey).trim().replace(/\s+/g, ' '),
            classes: [...new Set(options.classes ?? [])],
            ...(options.iri && { iri: options.iri }),
            properties: bag,
            annotations: {},
            sources: [source],
            createdAt: now,
            updatedAt: now,
        };
        this.state.insertEntity(entity);
        return { id: entity.id, created: true };
    }

    setProperty(id: string, key: string, value: ScalarValue, source: string): void {
        const entity = this.state.writableEntity(id);
        if (!entity) {
            throw createNotFoundError(id);
        }
        putValue(entity.properties, key, { value, source });
        addSource(entity.sources, source);
        entity.updatedAt = Date.now();
    }

    /**
     * Put an annotation field unless an explicit property holds the key.
     * Returns false when shadowed.
     */
    setAnnotation(id: string, key: string, value: ScalarValue, source: string): boolean {
        const current = this.state.entities.get(id);
        if (!current) {
            throw createNotFoundError(id);
        }
        if (Object.hasOwn(current.properties, key)) {
            return false;
        }
        const entity = this.state.writableEntity(id);
        if (entity) {
            putValue(entity.annotations, key, { value, source });
            addSource(entity.sources, source);
            entity.updatedAt = Date.now();
        }
        return true;
    }

    addRelationship(
        type: string,
        sourceId: string,
        targetId: string,
        properties: Record<string, unknown> = {},
        options: RelationshipOptions = {}
    ): { id: string; created: boolean } {
        if (type.trim().length === 0) {
            throw createInvalidArgumentError('Relationship type must not be empty');
        }
        const canonical = this.vocabulary.canonicalize(type);
        const [from, to] = canonical.inverse ? [targetId, sourceId] : [sourceId, targetId];
        const missing = [from, to].filter((id, index, all) => !this.state.entities.has(id) && all.indexOf(id) === index);
        if (missing.length > 0) {
            throw createDanglingReferenceError(missing, { type: canonical.type });
        }

        const source = options.source ?? API_SOURCE;
        const bag = toBag(properties, source);
        const existingId = this.state.tripleIndex.get(tripleKey(canonical.type, from, to));
        const existing = existingId !== undefined ? this.state.writableRelationship(existingId) : undefined;
        if (existing) {
            for (const [key, value] of Object.entries(bag)) {
                putValue(existing.properties, key, value);
            }
            addSource(existing.sources, source);
            return { id: existing.id, created: false };
        }

        const relationship: Relationship = {
            id: randomUUID(),
            type: canonical.type,
            sourceId: from,
            targetId: to,
            properties: bag,
            sources: [source],
            ...(options.sourcePredicate && { sourcePredicate: options.sourcePredicate }),
            createdAt: Date.now(),
        };
        this.state.insertRelationship(relationship);
        return { id: relationship.id, created: true };
    }

    /**
     * Remove an entity and every relationship touching it.
     * Returns the number of relationships removed.
     */
    removeEntity(id: string): number {
        if (!this.state.entities.has(id)) {
            throw createNotFoundError(id);
        }
        const attached = [...this.state.relationships.values()]
            .filter((r) => r.sourceId === id || r.targetId === id)
            .map((r) => r.id);
        for (const relationshipId of attached) {
            this.state.deleteRelationship(relationshipId);
        }
        this.state.deleteEntity(id);
        return attached.length;
    }

    removeRelationship(id: string): void {
        if (!this.state.deleteRelationship(id)) {
            throw createNotFoundError(id, 'Relationship');
        }
    }
}

export class GraphStore {
    private state = GraphState.empty();
    readonly vocabulary: RelationVocabulary;
    private readonly logger: Logger;

    constructor(options: GraphStoreOptions = {}) {
        this.vocabulary = options.vocabulary ?? new RelationVocabulary();
        this.logger = createChildLogger({ component: 'graph-store' });
    }

    /**
     * Run `fn` against a fork of the state. The fork is committed when `fn`
     * returns; if it throws, the live state is unchanged.
     */
    transaction<T>(fn: (tx: GraphTransaction) => T): T {
        const draft = this.state.fork();
        const result = fn(new GraphTransaction(draft, this.vocabulary));
        this.state = draft;
        return result;
    }

    upsertEntity(
        externalKey: string,
        type: string,
        properties: Record<string, unknown> = {},
        options: UpsertOptions = {}
    ): { id: string; created: boolean } {
        return this.transaction((tx) => tx.upsertEntity(externalKey, type, properties, options));
    }

    /**
     * Insert a relationship, or return the id of the existing one with the
     * same canonical (type, source, target).
     * Throws DANGLING_REFERENCE when an endpoint is absent.
     */
    addRelationship(
        type: string,
        sourceId: string,
        targetId: string,
        properties: Record<string, unknown> = {},
        options: RelationshipOptions = {}
    ): string {
        return this.transaction((tx) => tx.addRelationship(type, sourceId, targetId, properties, options)).id;
    }

    /**
     * Merge one parsed ontology file. Per assertion, unresolved individuals
     * are dropped with a warning; anything thrown leaves the store untouched.
     */
    mergeDescriptor(descriptor: SourceDescriptor): MergeReport {
        const source = descriptor.source;
        const report: MergeReport = {
            source,
            entitiesCreated: 0,
            entitiesMerged: 0,
            propertiesSet: 0,
            relationshipsCreated: 0,
            relationshipsDeduplicated: 0,
            entries: [],
        };

        this.transaction((tx) => {
            for (const individual of descriptor.individuals) {
                const { id, created } = tx.upsertEntity(
                    individual.name,
                    individual.classes[0] ?? GENERIC_TYPE,
                    {},
                    { source, classes: individual.classes, iri: individual.iri }
                );
                if (created) {
                    report.entitiesCreated++;
                } else {
                    report.entitiesMerged++;
                    report.entries.push({
                        severity: 'info',
                        code: 'DUPLICATE_ENTITY',
                        message: `Individual '${individual.name}' already known; merged`,
                        source,
                        details: { id, name: individual.name },
                    });
                }
            }

            for (const assertion of descriptor.assertions) {
                const subjectId = tx.idForKey(assertion.subject);
                const objectId = assertion.object.kind === 'individual' ? tx.idForKey(assertion.object.name) : undefined;
                if (subjectId === undefined || (assertion.object.kind === 'individual' && objectId === undefined)) {
                    const unresolved = subjectId === undefined
                        ? assertion.subject
                        : assertion.object.kind === 'individual' ? assertion.object.name : assertion.subject;
                    report.entries.push({
                        severity: 'warning',
                        code: 'DANGLING_REFERENCE',
                        message: `Assertion ${assertion.subject} ${assertion.predicate} refers to undeclared individual '${unresolved}'`,
                        source,
                        details: { subject: assertion.subject, predicate: assertion.predicate, missing: unresolved },
                    });
                    continue;
                }

                if (assertion.object.kind === 'literal') {
                    tx.setProperty(subjectId, assertion.predicate, assertion.object.value, source);
                    report.propertiesSet++;
                } else if (objectId !== undefined) {
                    const { created } = tx.addRelationship(assertion.predicate, subjectId, objectId, {}, {
                        source,
                        sourcePredicate: assertion.predicate,
                    });
                    if (created) {
                        report.relationshipsCreated++;
                    } else {
                        report.relationshipsDeduplicated++;
                    }
                }
            }
        });

        this.logger.debug({
            source,
            created: report.entitiesCreated,
            merged: report.entitiesMerged,
            relationships: report.relationshipsCreated,
        }, 'Descriptor merged');
        return report;
    }

    /**
     * Entities matching every given filter, in insertion order
     */
    query(filter: EntityQuery = {}): Entity[] {
        const name = filter.name?.toLowerCase();
        const properties = Object.entries(filter.properties ?? {});
        const results: Entity[] = [];
        for (const entity of this.state.entities.values()) {
            if (filter.type !== undefined && entity.type !== filter.type) continue;
            if (name !== undefined && !entity.name.toLowerCase().includes(name)) continue;
            if (!properties.every(([key, value]) => effectiveValue(entity, key) === value)) continue;
            results.push(cloneEntity(entity));
        }
        return results;
    }

    getEntity(id: string): EntityLookup {
        const entity = this.state.entities.get(id);
        if (!entity) {
            return { found: false, error: createNotFoundError(id).error };
        }
        return { found: true, entity: cloneEntity(entity) };
    }

    findByName(name: string): Entity | undefined {
        const entity = this.state.findByName(name);
        return entity ? cloneEntity(entity) : undefined;
    }

    /**
     * Neighbours of an entity. Relation types are canonicalized first.
     * Unknown ids yield an empty list.
     */
    getRelated(id: string, options: RelatedOptions = {}): RelatedEntity[] {
        const direction = options.direction ?? 'both';
        const types = options.relationTypes
            ? new Set(options.relationTypes.map((t) => this.vocabulary.canonicalize(t).type))
            : undefined;

        const related: RelatedEntity[] = [];
        for (const relationship of this.state.relationships.values()) {
            if (types && !types.has(relationship.type)) continue;
            const outgoing = relationship.sourceId === id && direction !== 'incoming';
            const incoming = relationship.targetId === id && direction !== 'outgoing';
            if (!outgoing && !incoming) continue;
            const otherId = outgoing ? relationship.targetId : relationship.sourceId;
            const entity = this.state.entities.get(otherId);
            if (entity) {
                related.push({ relationship: cloneRelationship(relationship), entity: cloneEntity(entity) });
            }
        }
        return related;
    }

    getRelationship(id: string): Relationship | undefined {
        const relationship = this.state.relationships.get(id);
        return relationship ? cloneRelationship(relationship) : undefined;
    }

    /**
     * Case-insensitive text search over names and property/annotation values
     */
    search(text: string, type?: string): Entity[] {
        const needle = text.trim().toLowerCase();
        if (needle.length === 0) {
            return [];
        }
        const contains = (value: ScalarValue): boolean => String(value).toLowerCase().includes(needle);
        const results: Entity[] = [];
        for (const entity of this.state.entities.values()) {
            if (type !== undefined && entity.type !== type) continue;
            const hit = contains(entity.name)
                || Object.values(entity.properties).some((p) => contains(p.value))
                || Object.values(entity.annotations).some((p) => contains(p.value));
            if (hit) {
                results.push(cloneEntity(entity));
            }
        }
        return results;
    }

    stats(): GraphStats {
        const entityCountsByType: Record<string, number> = {};
        for (const entity of this.state.entities.values()) {
            entityCountsByType[entity.type] = (entityCountsByType[entity.type] ?? 0) + 1;
        }
        const relationshipCountsByType: Record<string, number> = {};
        for (const relationship of this.state.relationships.values()) {
            relationshipCountsByType[relationship.type] = (relationshipCountsByType[relationship.type] ?? 0) + 1;
        }
        return {
            totalEntities: this.state.entities.size,
            totalRelationships: this.state.relationships.size,
            entityCountsByType,
            relationshipCountsByType,
        };
    }

    /**
     * Remove an entity together with its relationships
     */
    removeEntity(id: string): { removedRelationships: number } {
        const removedRelationships = this.transaction((tx) => tx.removeEntity(id));
        return { removedRelationships };
    }

    removeRelationship(id: string): void {
        this.transaction((tx) => tx.removeRelationship(id));
    }

    /**
     * Verify referential integrity and index consistency
     */
    checkIntegrity(): IntegrityReport {
        const { entities, keyIndex, relationships, tripleIndex } = this.state;
        const issues: string[] = [];

        for (const relationship of relationships.values()) {
            for (const endpoint of [relationship.sourceId, relationship.targetId]) {
                if (!entities.has(endpoint)) {
                    issues.push(`Relationship ${relationship.id} (${relationship.type}) references missing entity ${endpoint}`);
                }
            }
            const indexed = tripleIndex.get(tripleKey(relationship.type, relationship.sourceId, relationship.targetId));
            if (indexed !== relationship.id) {
                issues.push(`Relationship ${relationship.id} is not indexed under its triple`);
            }
        }
        if (tripleIndex.size !== relationships.size) {
            issues.push(`Triple index has ${tripleIndex.size} entries for ${relationships.size} relationships`);
        }

        for (const entity of entities.values()) {
            if (keyIndex.get(entity.key) !== entity.id) {
                issues.push(`Entity ${entity.id} is not indexed under key '${entity.key}'`);
            }
        }
        if (keyIndex.size !== entities.size) {
            issues.push(`Key index has ${keyIndex.size} entries for ${entities.size} entities`);
        }

        return { valid: issues.length === 0, issues };
    }

    exportGraph(): GraphExport {
        return {
            entities: [...this.state.entities.values()].map(cloneEntity),
            relationships: [...this.state.relationships.values()].map(cloneRelationship),
        };
    }
}
