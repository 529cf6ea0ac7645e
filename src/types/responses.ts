/**
 * Response types for the graph tools
 */

import type { GraphError } from './errors.js';
import type {
    Entity,
    GraphStats,
    ManagerState,
    MergeReport,
    AnnotationReport,
    ReportEntry,
    ScalarValue,
    SourceKind,
} from './graph.js';

/**
 * Verbosity level for responses
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

/**
 * Minimal entity view - identity only
 */
export interface MinimalEntityView {
    id: string;
    name: string;
    type: string;
}

/**
 * Standard entity view - flattened values
 */
export interface StandardEntityView extends MinimalEntityView {
    classes: string[];
    properties: Record<string, ScalarValue>;
    annotations: Record<string, ScalarValue>;
}

/**
 * Detailed view is the entity with provenance
 */
export type DetailedEntityView = Entity;

export type EntityView = MinimalEntityView | StandardEntityView | DetailedEntityView;

export interface RelatedView {
    relationship: {
        id: string;
        type: string;
        direction: 'outgoing' | 'incoming';
        sourcePredicate?: string;
    };
    entity: EntityView;
}

export interface SourceSummary {
    source: string;
    kind: SourceKind;
    status: 'loaded' | 'skipped' | 'failed';
    entitiesCreated?: number;
    entitiesMerged?: number;
    relationshipsCreated?: number;
    annotationsMatched?: number;
    annotationsUnmatched?: number;
    warnings?: number;
    error?: Pick<GraphError, 'code' | 'message'>;
}

export interface MinimalLoadResponse {
    state: ManagerState;
    loaded: number;
    skipped: number;
    failed: number;
    totalEntities: number;
    totalRelationships: number;
}

export interface StandardLoadResponse extends MinimalLoadResponse {
    files: SourceSummary[];
}

export interface DetailedLoadResponse extends MinimalLoadResponse {
    files: Array<{
        source: string;
        kind: SourceKind;
        status: 'loaded' | 'skipped' | 'failed';
        merge?: MergeReport;
        annotations?: AnnotationReport;
        error?: GraphError;
    }>;
    entries: ReportEntry[];
    stats: GraphStats;
}

export type LoadResponse = MinimalLoadResponse | StandardLoadResponse | DetailedLoadResponse;

export interface EntityListResponse {
    count: number;
    entities: EntityView[];
}

export interface RelatedListResponse {
    count: number;
    related: RelatedView[];
}
