import type { Tool } from '@modelcontextprotocol/sdk/types.js';

/**
 * Verbosity parameter schema for tools
 */
const verbositySchema = {
    type: 'string',
    enum: ['minimal', 'standard', 'detailed'],
    description: "Response verbosity: 'minimal' (id, name, type), 'standard' (default, adds values), 'detailed' (full entity with provenance)",
};

const propertiesSchema = {
    type: 'object',
    additionalProperties: { type: ['string', 'number', 'boolean'] },
    description: 'Scalar properties keyed by name',
};

const limitSchema = {
    type: 'integer',
    description: 'Return at most this many entities (count still reports every match)',
};

export const TOOLS: Tool[] = [
    // ==================== INGESTION ====================
    {
        name: 'load-sources',
        description: `Load ontology (.owl/.rdf/.xml) and annotation (.xlsx/.csv) files into the graph.

**When to use:** Ingest new or updated source files. Loading the same file again is safe.
**Order:** Ontology files are merged first (sorted by file name), then annotation files.

**Example:**
  directory: "./data"
  → Returns: { state: "ready", loaded: 3, skipped: 0, failed: 0, totalEntities: 42, ... }

**Common issues:**
- A malformed file is reported with PARSE_ERROR and skipped; the rest of the batch still loads
- Annotation files are skipped with DEPENDENCY_MISSING when annotation support is disabled`,
        inputSchema: {
            type: 'object',
            properties: {
                paths: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Source files to load',
                },
                directory: {
                    type: 'string',
                    description: 'Directory whose source files are loaded',
                },
                verbosity: verbositySchema,
            },
        },
    },

    // ==================== QUERIES ====================
    {
        name: 'query-entities',
        description: `Find entities by type, name substring and property values.

**Example:**
  type: "Patient", properties: { "age": 45 }
  → Returns: { count: 1, entities: [{ id, name: "P1", type: "Patient", ... }] }

Property filters match the explicit value, or the annotation value when no explicit one exists.`,
        inputSchema: {
            type: 'object',
            properties: {
                type: { type: 'string', description: 'Exact entity type' },
                name: { type: 'string', description: 'Case-insensitive name substring' },
                properties: propertiesSchema,
                limit: limitSchema,
                verbosity: verbositySchema,
            },
        },
    },
    {
        name: 'search-entities',
        description: 'Case-insensitive text search over entity names and property/annotation values.',
        inputSchema: {
            type: 'object',
            properties: {
                text: { type: 'string', description: 'Text to look for' },
                type: { type: 'string', description: 'Restrict to one entity type' },
                limit: limitSchema,
                verbosity: verbositySchema,
            },
            required: ['text'],
        },
    },
    {
        name: 'get-entity',
        description: 'Fetch one entity by id. Returns { found: false, error } when the id is unknown.',
        inputSchema: {
            type: 'object',
            properties: {
                id: { type: 'string', description: 'Entity id' },
                verbosity: verbositySchema,
            },
            required: ['id'],
        },
    },
    {
        name: 'get-related',
        description: `List the entities related to one entity.

**Example:**
  id: "<patient id>", relation_types: ["hasDisease"]
  → Returns: { count: 1, related: [{ relationship: { type: "hasDisease", direction: "outgoing" }, entity: { name: "Diabetes" } }] }

Relation type names are mapped onto canonical types first, so aliases such as "diagnosedWith" work.`,
        inputSchema: {
            type: 'object',
            properties: {
                id: { type: 'string', description: 'Entity id' },
                relation_types: {
                    type: 'array',
                    items: { type: 'string' },
                    description: 'Only these relation types (canonical names or aliases)',
                },
                direction: {
                    type: 'string',
                    enum: ['outgoing', 'incoming', 'both'],
                    description: "Edge direction relative to the entity. Default: 'both'.",
                },
                verbosity: verbositySchema,
            },
            required: ['id'],
        },
    },
    {
        name: 'describe-entity',
        description: `Summarize an entity together with its neighbours grouped by relation type.

**When to use:** "What do we know about patient P1?" - diseases, treatments and lab tests in one call.
Look the entity up by id, or by display name (exact match first, then case-insensitive).`,
        inputSchema: {
            type: 'object',
            properties: {
                id: { type: 'string', description: 'Entity id' },
                name: { type: 'string', description: 'Entity display name' },
                verbosity: verbositySchema,
            },
        },
    },
    {
        name: 'graph-stats',
        description: 'Entity counts by type, relationship counts by type, manager state and loaded sources.',
        inputSchema: {
            type: 'object',
            properties: {},
        },
    },
    {
        name: 'check-integrity',
        description: 'Verify that every relationship endpoint exists and the graph indexes are consistent.',
        inputSchema: {
            type: 'object',
            properties: {},
        },
    },

    // ==================== DIRECT WRITES ====================
    {
        name: 'add-entity',
        description: `Add an entity, or merge into the existing one with the same name (names compare case- and whitespace-insensitively).

**Example:**
  type: "Patient", name: "P7", properties: { "age": 52 }
  → Returns: { id: "...", name: "P7", type: "Patient" }`,
        inputSchema: {
            type: 'object',
            properties: {
                type: { type: 'string', description: 'Entity type, e.g. Patient, Disease, Treatment' },
                name: { type: 'string', description: 'Display name, also the identity key' },
                properties: propertiesSchema,
            },
            required: ['type', 'name'],
        },
    },
    {
        name: 'add-relationship',
        description: `Relate two existing entities. Returns the existing relationship when the same one is already present.

**Common issues:**
- DANGLING_REFERENCE: one of the ids does not exist; add the entity first
- Inverse aliases (e.g. "treatedBy") are stored under their canonical type with source and target swapped`,
        inputSchema: {
            type: 'object',
            properties: {
                type: { type: 'string', description: 'Relation type (canonical name or alias)' },
                source_id: { type: 'string', description: 'Source entity id' },
                target_id: { type: 'string', description: 'Target entity id' },
                properties: propertiesSchema,
            },
            required: ['type', 'source_id', 'target_id'],
        },
    },
    {
        name: 'remove-entity',
        description: 'Remove an entity and every relationship attached to it.',
        inputSchema: {
            type: 'object',
            properties: {
                id: { type: 'string', description: 'Entity id' },
            },
            required: ['id'],
        },
    },
    {
        name: 'remove-relationship',
        description: 'Remove one relationship by id.',
        inputSchema: {
            type: 'object',
            properties: {
                id: { type: 'string', description: 'Relationship id' },
            },
            required: ['id'],
        },
    },
];
