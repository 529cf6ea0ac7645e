/**
 * Copy-on-write graph state.
 *
 * A committed state is never mutated. Writers fork it, mutate the fork
 * (cloning each entity/relationship on first write) and the store swaps the
 * fork in when the whole operation succeeded.
 */

import type { Entity, PropertyBag, Relationship, ScalarValue } from '../types/graph.js';

/**
 * Normalized external key: NFC, trimmed, single spaces, lower case
 */
export function normalizeKey(raw: string): string {
    return raw.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function tripleKey(type: string, sourceId: string, targetId: string): string {
    return `${type}\u0000${sourceId}\u0000${targetId}`;
}

/**
 * Write a bag entry as an own property, `__proto__` included
 */
export function putValue<T>(bag: Record<string, T>, key: string, value: T): void {
    Object.defineProperty(bag, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Own entry of a bag; inherited members such as `constructor` are not entries
 */
export function ownValue<T>(bag: Record<string, T>, key: string): T | undefined {
    return Object.hasOwn(bag, key) ? bag[key] : undefined;
}

function cloneBag(bag: PropertyBag): PropertyBag {
    return Object.fromEntries(Object.entries(bag).map(([key, value]) => [key, { ...value }]));
}

export function cloneEntity(entity: Entity): Entity {
    return {
        ...entity,
        classes: [...entity.classes],
        properties: cloneBag(entity.properties),
        annotations: cloneBag(entity.annotations),
        sources: [...entity.sources],
    };
}

export function cloneRelationship(relationship: Relationship): Relationship {
    return {
        ...relationship,
        properties: cloneBag(relationship.properties),
        sources: [...relationship.sources],
    };
}

/**
 * Value a filter sees: the explicit property, else the annotation
 */
export function effectiveValue(entity: Entity, key: string): ScalarValue | undefined {
    return (ownValue(entity.properties, key) ?? ownValue(entity.annotations, key))?.value;
}

export class GraphState {
    readonly entities: Map<string, Entity>;
    readonly keyIndex: Map<string, string>;
    readonly relationships: Map<string, Relationship>;
    readonly tripleIndex: Map<string, string>;
    /** Objects cloned by this fork, safe to mutate */
    private readonly owned = new Set<string>();

    private constructor(source?: GraphState) {
        this.entities = new Map(source?.entities);
        this.keyIndex = new Map(source?.keyIndex);
        this.relationships = new Map(source?.relationships);
        this.tripleIndex = new Map(source?.tripleIndex);
    }

    static empty(): GraphState {
        return new GraphState();
    }

    fork(): GraphState {
        return new GraphState(this);
    }

    entityByKey(key: string): Entity | undefined {
        const id = this.keyIndex.get(normalizeKey(key));
        return id !== undefined ? this.entities.get(id) : undefined;
    }

    /**
     * Entity by display name: exact match first, then case-insensitive
     */
    findByName(name: string): Entity | undefined {
        for (const entity of this.entities.values()) {
            if (entity.name === name) return entity;
        }
        const lowered = name.toLowerCase();
        for (const entity of this.entities.values()) {
            if (entity.name.toLowerCase() === lowered) return entity;
        }
        return undefined;
    }

    writableEntity(id: string): Entity | undefined {
        const entity = this.entities.get(id);
        if (!entity || this.owned.has(id)) {
            return entity;
        }
        const copy = cloneEntity(entity);
        this.entities.set(id, copy);
        this.owned.add(id);
        return copy;
    }

    writableRelationship(id: string): Relationship | undefined {
        const relationship = this.relationships.get(id);
        if (!relationship || this.owned.has(id)) {
            return relationship;
        }
        const copy = cloneRelationship(relationship);
        this.relationships.set(id, copy);
        this.owned.add(id);
        return copy;
    }

    insertEntity(entity: Entity): void {
        this.entities.set(entity.id, entity);
        this.keyIndex.set(entity.key, entity.id);
        this.owned.add(entity.id);
    }

    insertRelationship(relationship: Relationship): void {
        this.relationships.set(relationship.id, relationship);
        this.tripleIndex.set(tripleKey(relationship.type, relationship.sourceId, relationship.targetId), relationship.id);
        this.owned.add(relationship.id);
    }

    deleteRelationship(id: string): boolean {
        const relationship = this.relationships.get(id);
        if (!relationship) {
            return false;
        }
        this.relationships.delete(id);
        this.tripleIndex.delete(tripleKey(relationship.type, relationship.sourceId, relationship.targetId));
        return true;
    }

    deleteEntity(id: string): boolean {
        const entity = this.entities.get(id);
        if (!entity) {
            return false;
        }
        this.entities.delete(id);
        this.keyIndex.delete(entity.key);
        return true;
    }
}
