/**
 * Graph model: entities, relationships, reports
 */

import type { GraphError, GraphErrorCode } from './errors.js';

/**
 * Scalar values allowed in property and annotation bags
 */
export type ScalarValue = string | number | boolean;

/**
 * A property value tagged with the source that set it
 */
export interface PropertyValue {
    value: ScalarValue;
    source: string;
}

export type PropertyBag = Record<string, PropertyValue>;

export interface Entity {
    id: string;
    key: string;                 // Normalized external key
    type: string;
    name: string;                // Display name
    classes: string[];
    iri?: string;
    properties: PropertyBag;     // Explicit data
    annotations: PropertyBag;    // Lower-precedence annotation data
    sources: string[];
    createdAt: number;
    updatedAt: number;
}

export interface Relationship {
    id: string;
    type: string;                // Canonical relation type
    sourceId: string;
    targetId: string;
    properties: PropertyBag;
    sources: string[];
    sourcePredicate?: string;    // Predicate name as written in the source
    createdAt: number;
}

export type Direction = 'outgoing' | 'incoming' | 'both';

export interface RelatedEntity {
    relationship: Relationship;
    entity: Entity;
}

export type EntityLookup =
    | { found: true; entity: Entity }
    | { found: false; error: GraphError };

export interface EntityQuery {
    type?: string;
    name?: string;                          // Case-insensitive substring
    properties?: Record<string, ScalarValue>;
}

export interface GraphStats {
    totalEntities: number;
    totalRelationships: number;
    entityCountsByType: Record<string, number>;
    relationshipCountsByType: Record<string, number>;
}

export interface IntegrityReport {
    valid: boolean;
    issues: string[];
}

export interface GraphExport {
    entities: Entity[];
    relationships: Relationship[];
}

/**
 * Severity-tagged entry in merge, annotation and load reports
 */
export interface ReportEntry {
    severity: 'info' | 'warning' | 'error';
    code: GraphErrorCode;
    message: string;
    source?: string;
    details?: Record<string, unknown>;
}

export interface MergeReport {
    source: string;
    entitiesCreated: number;
    entitiesMerged: number;
    propertiesSet: number;
    relationshipsCreated: number;
    relationshipsDeduplicated: number;
    entries: ReportEntry[];
}

export interface AnnotationReport {
    source: string;
    matched: number;
    unmatched: number;
    fieldsApplied: number;
    fieldsShadowed: number;
    entries: ReportEntry[];
}

// === Orchestrator ===

export type ManagerState = 'empty' | 'loading' | 'ready' | 'failed';

export type SourceKind = 'ontology' | 'annotation';

/**
 * Outcome for one file of a load batch
 */
export interface SourceResult {
    source: string;
    kind: SourceKind;
    status: 'loaded' | 'skipped' | 'failed';
    merge?: MergeReport;
    annotations?: AnnotationReport;
    error?: GraphError;
}

export interface LoadReport {
    state: ManagerState;
    files: SourceResult[];
    /** Unsupported paths and other batch-level entries */
    entries: ReportEntry[];
    stats: GraphStats;
}

export interface DiscoveredSources {
    ontologies: string[];
    annotations: string[];
}

export interface ManagerStats extends GraphStats {
    state: ManagerState;
    sources: string[];
}

/**
 * Neighbour summary used by describe-entity
 */
export interface RelatedSummary {
    relationshipId: string;
    direction: 'outgoing' | 'incoming';
    id: string;
    name: string;
    type: string;
}

export type EntityDescription =
    | { found: true; entity: Entity; relations: Record<string, RelatedSummary[]> }
    | { found: false; error: GraphError };
