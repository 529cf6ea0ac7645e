import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import type {
    DiscoveredSources,
    Entity,
    EntityDescription,
    EntityLookup,
    EntityQuery,
    GraphExport,
    IntegrityReport,
    LoadReport,
    ManagerState,
    ManagerStats,
    RelatedEntity,
    RelatedSummary,
    Relationship,
    ReportEntry,
    SourceResult,
} from '../types/graph.js';
import {
    createSourceNotFoundError,
    createStoreCorruptedError,
    toGraphError,
} from '../types/errors.js';
import type { GraphConfig } from '../config.js';
import { loadConfig } from '../config.js';
import { GraphStore, API_SOURCE } from '../graph/store.js';
import type { RelatedOptions } from '../graph/store.js';
import { OntologyLoader } from './loader.js';
import { loadRelationVocabulary } from './relations.js';
import { AnnotationLoader } from '../annotations/loader.js';
import { applyAnnotations } from '../annotations/applier.js';
import { createChildLogger } from '../logger.js';

export interface OntologyManagerOptions {
    config?: GraphConfig;
    store?: GraphStore;
    ontologyLoader?: OntologyLoader;
    annotationLoader?: AnnotationLoader;
}

/**
 * Order sources by file name, full path as tiebreak
 */
export function compareSources(a: string, b: string): number {
    const byName = path.basename(a).localeCompare(path.basename(b), 'en');
    if (byName !== 0) return byName;
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Orchestrates ingestion into one graph store and exposes its query surface.
 *
 * Ontology files of a batch are merged in order before any annotation file
 * is read, so annotations can name entities declared anywhere in the batch.
 */
export class OntologyManager {
    readonly config: GraphConfig;
    readonly store: GraphStore;
    private readonly ontologyLoader: OntologyLoader;
    private readonly annotationLoader: AnnotationLoader;
    private readonly logger: Logger;
    private state: ManagerState = 'empty';
    private readonly sources: string[] = [];
    private lock: Promise<void> = Promise.resolve();

    constructor(options: OntologyManagerOptions = {}) {
        this.config = options.config ?? loadConfig();
        this.store = options.store ?? new GraphStore({
            vocabulary: loadRelationVocabulary(this.config),
        });
        this.ontologyLoader = options.ontologyLoader ?? new OntologyLoader();
        this.annotationLoader = options.annotationLoader
            ?? new AnnotationLoader({ enabled: this.config.annotationSupport });
        this.logger = createChildLogger({ component: 'ontology-manager' });
    }

    /**
     * Run load batches one after another
     */
    private async withLock<T>(fn: () => Promise<T>): Promise<T> {
        const previous = this.lock;
        let release = (): void => { };
        this.lock = new Promise<void>((resolve) => { release = resolve; });
        try {
            await previous;
            return await fn();
        } finally {
            release();
        }
    }

    private ensureWritable(): void {
        if (this.state === 'failed') {
            throw createStoreCorruptedError(this.store.checkIntegrity().issues);
        }
    }

    getState(): ManagerState {
        return this.state;
    }

    loadedSources(): string[] {
        return [...this.sources];
    }

    private kindOf(filePath: string): 'ontology' | 'annotation' | undefined {
        const ext = path.extname(filePath).toLowerCase();
        if (this.config.ontologyExtensions.includes(ext)) return 'ontology';
        if (this.config.annotationExtensions.includes(ext)) return 'annotation';
        return undefined;
    }

    private async listDirectory(directory: string, into: string[]): Promise<void> {
        let dirents: fs.Dirent[];
        try {
            dirents = await fs.promises.readdir(directory, { withFileTypes: true });
        } catch (e) {
            throw createSourceNotFoundError(directory, e instanceof Error ? e.message : String(e));
        }
        for (const dirent of dirents) {
            const fullPath = path.join(directory, dirent.name);
            if (dirent.isDirectory()) {
                if (this.config.recursive) {
                    await this.listDirectory(fullPath, into);
                }
            } else if (dirent.isFile()) {
                into.push(fullPath);
            }
        }
    }

    /**
     * Source files under the given directories, grouped and sorted.
     * Rejects with SOURCE_NOT_FOUND for an unreadable directory.
     */
    async discoverSources(directories: string[] = this.config.sourceDirectories): Promise<DiscoveredSources> {
        const files: string[] = [];
        for (const directory of directories) {
            await this.listDirectory(directory, files);
        }
        const { ontologies, annotations } = this.partition(files);
        return { ontologies, annotations };
    }

    private partition(paths: string[]): DiscoveredSources & { unsupported: string[] } {
        const ontologies: string[] = [];
        const annotations: string[] = [];
        const unsupported: string[] = [];
        for (const filePath of new Set(paths.map((p) => path.resolve(p)))) {
            const kind = this.kindOf(filePath);
            if (kind === 'ontology') ontologies.push(filePath);
            else if (kind === 'annotation') annotations.push(filePath);
            else unsupported.push(filePath);
        }
        ontologies.sort(compareSources);
        annotations.sort(compareSources);
        return { ontologies, annotations, unsupported };
    }

    /**
     * Load a batch of files: every ontology first, then every annotation file.
     * Failing files are recorded and skipped. Rejects with STORE_CORRUPTED
     * when the store fails its integrity check afterwards.
     */
    async load(paths: string[]): Promise<LoadReport> {
        return this.withLock(async () => {
            this.ensureWritable();
            const previousState = this.state;
            this.state = 'loading';
            try {
                return await this.runBatch(paths);
            } catch (e) {
                if (this.state === 'loading') {
                    this.state = previousState;
                }
                throw e;
            }
        });
    }

    /**
     * Discover and load every source file under one directory
     */
    async loadDirectory(directory: string): Promise<LoadReport> {
        const { ontologies, annotations } = await this.discoverSources([directory]);
        return this.load([...ontologies, ...annotations]);
    }

    /**
     * Load the configured source directories, if any
     */
    async loadConfiguredSources(): Promise<LoadReport | undefined> {
        if (this.config.sourceDirectories.length === 0) {
            return undefined;
        }
        const { ontologies, annotations } = await this.discoverSources();
        return this.load([...ontologies, ...annotations]);
    }

    private async runBatch(paths: string[]): Promise<LoadReport> {
        const { ontologies, annotations, unsupported } = this.partition(paths);
        const files: SourceResult[] = [];
        const entries: ReportEntry[] = unsupported.map((source): ReportEntry => ({
            severity: 'warning',
            code: 'INVALID_ARGUMENT',
            message: `Unsupported file type: ${path.basename(source)}`,
            source,
        }));

        for (const source of ontologies) {
            try {
                const descriptor = await this.ontologyLoader.load(source);
                const merge = this.store.mergeDescriptor(descriptor);
                this.recordSource(source);
                files.push({ source, kind: 'ontology', status: 'loaded', merge });
            } catch (e) {
                const error = toGraphError(e, 'PARSE_ERROR', source);
                this.logger.warn({ source, code: error.code }, 'Ontology file skipped');
                files.push({ source, kind: 'ontology', status: 'failed', error });
            }
        }

        for (const source of annotations) {
            try {
                const knownNames = this.store.query().map((entity) => entity.name);
                const table = await this.annotationLoader.load(source, knownNames);
                const missing = table.entries.find((entry) => entry.code === 'DEPENDENCY_MISSING');
                if (missing) {
                    files.push({
                        source,
                        kind: 'annotation',
                        status: 'skipped',
                        error: { code: missing.code, message: missing.message, source },
                    });
                    continue;
                }
                const report = applyAnnotations(this.store, table);
                report.entries.unshift(...table.entries);
                this.recordSource(source);
                files.push({ source, kind: 'annotation', status: 'loaded', annotations: report });
            } catch (e) {
                const error = toGraphError(e, 'PARSE_ERROR', source);
                this.logger.warn({ source, code: error.code }, 'Annotation file skipped');
                files.push({ source, kind: 'annotation', status: 'failed', error });
            }
        }

        const integrity = this.store.checkIntegrity();
        if (!integrity.valid) {
            this.state = 'failed';
            this.logger.error({ issues: integrity.issues }, 'Graph store failed its integrity check');
            throw createStoreCorruptedError(integrity.issues);
        }

        this.state = 'ready';
        const stats = this.store.stats();
        this.logger.info({
            files: files.length,
            failed: files.filter((f) => f.status === 'failed').length,
            entities: stats.totalEntities,
            relationships: stats.totalRelationships,
        }, 'Load batch complete');
        return { state: this.state, files, entries, stats };
    }

    private recordSource(source: string): void {
        if (!this.sources.includes(source)) {
            this.sources.push(source);
        }
    }

    // === Queries ===

    query(filter: EntityQuery = {}): Entity[] {
        return this.store.query(filter);
    }

    getEntity(id: string): EntityLookup {
        return this.store.getEntity(id);
    }

    getRelated(id: string, options: RelatedOptions = {}): RelatedEntity[] {
        return this.store.getRelated(id, options);
    }

    search(text: string, type?: string): Entity[] {
        return this.store.search(text, type);
    }

    findByName(name: string): Entity | undefined {
        return this.store.findByName(name);
    }

    getRelationship(id: string): Relationship | undefined {
        return this.store.getRelationship(id);
    }

    /**
     * Entity plus its neighbours grouped by relation type
     */
    describeEntity(id: string): EntityDescription {
        const lookup = this.store.getEntity(id);
        if (!lookup.found) {
            return lookup;
        }
        const relations: Record<string, RelatedSummary[]> = {};
        for (const { relationship, entity } of this.store.getRelated(id)) {
            (relations[relationship.type] ??= []).push({
                relationshipId: relationship.id,
                direction: relationship.sourceId === id ? 'outgoing' : 'incoming',
                id: entity.id,
                name: entity.name,
                type: entity.type,
            });
        }
        return { found: true, entity: lookup.entity, relations };
    }

    stats(): ManagerStats {
        return { ...this.store.stats(), state: this.state, sources: this.loadedSources() };
    }

    checkIntegrity(): IntegrityReport {
        return this.store.checkIntegrity();
    }

    exportGraph(): GraphExport {
        return this.store.exportGraph();
    }

    // === Direct writes ===

    /**
     * Add or merge an entity keyed by its name. Returns its id.
     */
    addEntity(type: string, name: string, properties: Record<string, unknown> = {}): string {
        this.ensureWritable();
        return this.store.upsertEntity(name, type, properties, { source: API_SOURCE }).id;
    }

    /**
     * Relate two existing entities. Throws DANGLING_REFERENCE otherwise.
     */
    addRelationship(
        type: string,
        sourceId: string,
        targetId: string,
        properties: Record<string, unknown> = {}
    ): string {
        this.ensureWritable();
        return this.store.addRelationship(type, sourceId, targetId, properties, { source: API_SOURCE });
    }

    removeEntity(id: string): { removedRelationships: number } {
        this.ensureWritable();
        return this.store.removeEntity(id);
    }

    removeRelationship(id: string): void {
        this.ensureWritable();
        this.store.removeRelationship(id);
    }
}
