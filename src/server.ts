/**
 * Ontology Graph Server
 *
 * MCP server exposing the ontology graph: source loading, entity queries,
 * direct writes and integrity checks.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { listResources, getResourceContent } from './resources/index.js';

import {
    GraphException,
    createInvalidArgumentError,
    createNotFoundError,
    serializeGraphError,
} from './types/index.js';
import * as Handlers from './handlers/index.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer } from './container.js';
import type { ServerContainer } from './container.js';
import { createChildLogger } from './logger.js';

export const SERVER_NAME = 'ontology-graph';
export const SERVER_VERSION = '0.3.0';

type ToolHandler = (args: Record<string, unknown>, container: ServerContainer) => Promise<unknown> | unknown;

const toolHandlers: Record<string, ToolHandler> = {
    // ==================== INGESTION ====================
    'load-sources': (args, c) =>
        Handlers.loadSourcesHandler(args, c.manager),

    // ==================== QUERIES ====================
    'query-entities': (args, c) =>
        Handlers.queryEntitiesHandler(args, c.manager),

    'search-entities': (args, c) =>
        Handlers.searchEntitiesHandler(args, c.manager),

    'get-entity': (args, c) =>
        Handlers.getEntityHandler(args, c.manager),

    'get-related': (args, c) =>
        Handlers.getRelatedHandler(args, c.manager),

    'describe-entity': (args, c) =>
        Handlers.describeEntityHandler(args, c.manager),

    'graph-stats': (args, c) =>
        Handlers.graphStatsHandler(args, c.manager),

    'check-integrity': (args, c) =>
        Handlers.checkIntegrityHandler(args, c.manager),

    // ==================== DIRECT WRITES ====================
    'add-entity': (args, c) =>
        Handlers.addEntityHandler(args, c.manager),

    'add-relationship': (args, c) =>
        Handlers.addRelationshipHandler(args, c.manager),

    'remove-entity': (args, c) =>
        Handlers.removeEntityHandler(args, c.manager),

    'remove-relationship': (args, c) =>
        Handlers.removeRelationshipHandler(args, c.manager),
};

/**
 * Create and configure the MCP server
 */
export function createServer(container: ServerContainer = createContainer()): Server {
    const logger = createChildLogger({ component: 'server' });
    const server = new Server(
        {
            name: SERVER_NAME,
            version: SERVER_VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},
            },
        }
    );

    // Handle list_tools request
    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    // ==================== MCP RESOURCES HANDLERS ====================

    // Handle list_resources request
    server.setRequestHandler(ListResourcesRequestSchema, async () => {
        return {
            resources: listResources().map(r => ({
                uri: r.uri,
                name: r.name,
                description: r.description,
                mimeType: r.mimeType,
            })),
        };
    });

    // Handle read_resource request
    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
        const { uri } = request.params;
        const content = getResourceContent(uri, container.manager);

        if (content === null) {
            throw createNotFoundError(uri, 'Resource');
        }

        return {
            contents: [
                {
                    uri,
                    mimeType: 'application/json',
                    text: content,
                },
            ],
        };
    });

    // Handle call_tool request
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: rawArgs } = request.params;
        const args = rawArgs || {};

        try {
            const handler = toolHandlers[name];
            if (!handler) {
                throw createInvalidArgumentError(`Unknown tool: ${name}`);
            }

            const result = await handler(args, container);

            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify(result, null, 2),
                    },
                ],
            };
        } catch (error) {
            // Handle structured GraphException
            if (error instanceof GraphException) {
                logger.debug({ tool: name, code: error.code }, 'Tool failed');
                return {
                    content: [
                        {
                            type: 'text',
                            text: JSON.stringify(serializeGraphError(error.error), null, 2),
                        },
                    ],
                    isError: true,
                };
            }

            // Handle generic errors
            const errorMessage = error instanceof Error ? error.message : String(error);
            logger.error({ tool: name, error: errorMessage }, 'Unexpected tool error');
            return {
                content: [
                    {
                        type: 'text',
                        text: JSON.stringify({
                            error: errorMessage,
                            type: error instanceof Error ? error.constructor.name : 'Error',
                        }),
                    },
                ],
                isError: true,
            };
        }
    });

    return server;
}

/**
 * Run the MCP server: load the configured sources, then serve over stdio
 */
export async function runServer(): Promise<void> {
    const container = createContainer();
    const logger = createChildLogger({ component: 'server' });

    const report = await container.manager.loadConfiguredSources();
    if (report) {
        logger.info({
            entities: report.stats.totalEntities,
            relationships: report.stats.totalRelationships,
            failed: report.files.filter((f) => f.status === 'failed').length,
        }, 'Configured sources loaded');
    }

    const server = createServer(container);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ name: SERVER_NAME, version: SERVER_VERSION }, 'Server listening on stdio');

    // Keep the server running
    await new Promise(() => { });
}
