/**
 * Ontology Graph - Library Entry Point
 *
 * Exports the ingestion engine for use in other projects.
 * This file should NOT import @modelcontextprotocol/sdk or any other
 * server-specific dependencies.
 */

// Orchestrator
export { OntologyManager, compareSources } from './ontology/manager.js';
export type { OntologyManagerOptions } from './ontology/manager.js';

// Loaders
export { OntologyLoader, toScalar } from './ontology/loader.js';
export { AnnotationLoader, toCellScalar } from './annotations/loader.js';
export type { AnnotationLoaderOptions } from './annotations/loader.js';
export { applyAnnotations } from './annotations/applier.js';

// Graph store
export { GraphStore, GraphTransaction, GENERIC_TYPE, API_SOURCE } from './graph/store.js';
export type { UpsertOptions, RelationshipOptions, RelatedOptions, GraphStoreOptions } from './graph/store.js';
export { normalizeKey } from './graph/state.js';

// Relation vocabulary
export {
    RelationVocabulary,
    loadRelationVocabulary,
    readVocabularyFile,
    relationKey,
    BUNDLED_RELATIONS_FILE,
} from './ontology/relations.js';

// Configuration and logging
export { loadConfig, configFromEnv, GraphConfigSchema } from './config.js';
export type { GraphConfig, GraphConfigInput } from './config.js';
export { logger, createChildLogger, setLogLevel } from './logger.js';

// Types and Interfaces
export * from './types/index.js';
