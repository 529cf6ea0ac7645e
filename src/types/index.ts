/**
 * Shared type definitions for the ontology graph
 */

// Re-export error types
export {
    GraphException,
    createParseError,
    createDependencyMissingError,
    createDanglingReferenceError,
    createNotFoundError,
    createSourceNotFoundError,
    createInvalidArgumentError,
    createStoreCorruptedError,
    serializeGraphError,
    createError,
    createGenericError,
    toGraphError,
} from './errors.js';

export type {
    GraphErrorCode,
    GraphError,
} from './errors.js';

// Re-export graph model types
export type {
    ScalarValue,
    PropertyValue,
    PropertyBag,
    Entity,
    Relationship,
    Direction,
    RelatedEntity,
    EntityLookup,
    EntityQuery,
    GraphStats,
    IntegrityReport,
    GraphExport,
    ReportEntry,
    MergeReport,
    AnnotationReport,
    ManagerState,
    SourceKind,
    SourceResult,
    LoadReport,
    DiscoveredSources,
    ManagerStats,
    RelatedSummary,
    EntityDescription,
} from './graph.js';

// Re-export source descriptor types
export type {
    ClassDeclaration,
    ObjectPropertyDeclaration,
    IndividualDeclaration,
    AssertionObject,
    PropertyAssertion,
    SourceDescriptor,
    RelationAlias,
    RelationVocabularyConfig,
    CanonicalRelation,
} from './ontology.js';

// Re-export annotation types
export type {
    AnnotationFields,
    AnnotationRecord,
    SheetSummary,
    UnkeyedSheet,
    AnnotationTable,
} from './annotations.js';

// Re-export response types
export type {
    Verbosity,
    MinimalEntityView,
    StandardEntityView,
    DetailedEntityView,
    EntityView,
    RelatedView,
    SourceSummary,
    MinimalLoadResponse,
    StandardLoadResponse,
    DetailedLoadResponse,
    LoadResponse,
    EntityListResponse,
    RelatedListResponse,
} from './responses.js';
