export {
    loadSourcesHandler,
    queryEntitiesHandler,
    searchEntitiesHandler,
    getEntityHandler,
    getRelatedHandler,
    describeEntityHandler,
    addEntityHandler,
    addRelationshipHandler,
    removeEntityHandler,
    removeRelationshipHandler,
    graphStatsHandler,
    checkIntegrityHandler,
} from './graph.js';

export {
    buildEntityView,
    buildRelatedView,
    buildLoadResponse,
    parseArgs,
} from './utils.js';
