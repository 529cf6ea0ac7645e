#!/usr/bin/env node
/**
 * Ontology Graph - Entry Point
 *
 * CLI entry point for the ontology graph server.
 */

import { runServer, SERVER_VERSION } from './server.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
Ontology Graph Server - ontology and annotation ingestion into one entity graph

Usage: ontology-graph [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Environment:
  GRAPH_SOURCE_DIRS            Directories loaded at startup (path-delimiter separated)
  GRAPH_RECURSIVE              Descend into subdirectories (default: off)
  GRAPH_ONTOLOGY_EXTENSIONS    Ontology file extensions (default: .owl,.rdf,.xml)
  GRAPH_ANNOTATION_EXTENSIONS  Annotation file extensions (default: .xlsx,.csv)
  GRAPH_ANNOTATIONS            Annotation support on/off (default: on)
  GRAPH_RELATIONS_FILE         Relation vocabulary JSON replacing the bundled one
  LOG_LEVEL                    fatal|error|warn|info|debug|trace|silent (default: info)

Ingestion Tools:
  - load-sources         Load ontology and annotation files

Query Tools:
  - query-entities       Filter entities by type, name and properties
  - search-entities      Text search over names and values
  - get-entity           Fetch one entity
  - get-related          Neighbours of an entity
  - describe-entity      Entity plus neighbours grouped by relation
  - graph-stats          Counts by entity and relation type
  - check-integrity      Verify referential integrity

Write Tools:
  - add-entity           Add or merge an entity
  - add-relationship     Relate two entities
  - remove-entity        Remove an entity and its relationships
  - remove-relationship  Remove one relationship

MCP Capabilities:
  - Resources: graph://stats, graph://export, graph://relations

The server communicates via stdio using the Model Context Protocol.
Logs are written to stderr.
`);
        process.exit(0);
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`ontology-graph version ${SERVER_VERSION}`);
        process.exit(0);
    }

    try {
        await runServer();
    } catch (error) {
        logger.fatal({ err: error }, 'Failed to start server');
        process.exit(1);
    }
}

void main();
