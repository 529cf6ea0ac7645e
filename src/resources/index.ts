/**
 * MCP Resources
 *
 * Read-only JSON views of the graph.
 */

import type { OntologyManager } from '../ontology/manager.js';

/**
 * Resource definition
 */
export interface Resource {
    uri: string;
    name: string;
    description: string;
    mimeType: string;
}

/**
 * All available resources
 */
export const RESOURCES: Resource[] = [
    {
        uri: 'graph://stats',
        name: 'Graph Statistics',
        description: 'Entity and relationship counts by type, manager state and loaded sources',
        mimeType: 'application/json',
    },
    {
        uri: 'graph://export',
        name: 'Graph Export',
        description: 'Every entity and relationship as a JSON snapshot',
        mimeType: 'application/json',
    },
    {
        uri: 'graph://relations',
        name: 'Relation Vocabulary',
        description: 'Canonical relation types and the aliases mapped onto them',
        mimeType: 'application/json',
    },
];

export function listResources(): Resource[] {
    return RESOURCES;
}

/**
 * Get resource content by URI, or null when the URI is unknown
 */
export function getResourceContent(uri: string, manager: OntologyManager): string | null {
    switch (uri) {
        case 'graph://stats':
            return JSON.stringify(manager.stats(), null, 2);
        case 'graph://export':
            return JSON.stringify(manager.exportGraph(), null, 2);
        case 'graph://relations':
            return JSON.stringify(manager.store.vocabulary.toJSON(), null, 2);
        default:
            return null;
    }
}
