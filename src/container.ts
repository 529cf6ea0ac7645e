import type { GraphConfig } from './config.js';
import { loadConfig } from './config.js';
import { setLogLevel } from './logger.js';
import { OntologyManager } from './ontology/manager.js';

export interface ServerContainer {
    config: GraphConfig;
    manager: OntologyManager;
}

export function createContainer(config: GraphConfig = loadConfig()): ServerContainer {
    // Components take child loggers at construction, so the level goes first
    setLogLevel(config.logLevel);
    const manager = new OntologyManager({ config });

    return {
        config,
        manager,
    };
}
