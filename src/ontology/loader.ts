/**
 * Ontology Source Loader
 *
 * Reads one OWL file in RDF/XML syntax into a SourceDescriptor: class and
 * object-property declarations (reference data), individuals with their class
 * tags, and property assertions. Constructs outside that subset
 * (restrictions, imports, datatype properties, axioms, blank nodes) are
 * skipped without error.
 *
 * Loading never touches graph state.
 */

import * as fs from 'fs';
import type { Logger } from 'pino';
import type {
    AssertionObject,
    ClassDeclaration,
    IndividualDeclaration,
    ObjectPropertyDeclaration,
    PropertyAssertion,
    SourceDescriptor,
} from '../types/ontology.js';
import type { ScalarValue } from '../types/graph.js';
import { createParseError, createSourceNotFoundError } from '../types/errors.js';
import { createChildLogger } from '../logger.js';
import { parseXml, getAttribute } from './xml.js';
import type { XmlElement } from './xml.js';
import {
    NamespaceTable,
    OWL_NS,
    RDF_NS,
    RDFS_NS,
    XSD_NS,
    isVocabulary,
    localName,
} from './namespaces.js';
import type { ResolvedName } from './namespaces.js';

const RDF_TYPE = `${RDF_NS}type`;
const RDF_DESCRIPTION = `${RDF_NS}Description`;
const RDFS_SUBCLASS_OF = `${RDFS_NS}subClassOf`;
const RDFS_DOMAIN = `${RDFS_NS}domain`;
const RDFS_RANGE = `${RDFS_NS}range`;

const CLASS_TYPES = new Set([`${OWL_NS}Class`, `${RDFS_NS}Class`]);
const OBJECT_PROPERTY = `${OWL_NS}ObjectProperty`;
const ONTOLOGY = `${OWL_NS}Ontology`;
const INDIVIDUAL_MARKERS = new Set([`${OWL_NS}NamedIndividual`, `${OWL_NS}Thing`]);

/** Vocabulary predicates kept as literal properties on individuals */
const KEPT_VOCABULARY_PREDICATES = new Set([`${RDFS_NS}label`, `${RDFS_NS}comment`]);

const INTEGER_DATATYPES = new Set([
    'integer', 'int', 'long', 'short', 'byte',
    'nonNegativeInteger', 'positiveInteger', 'negativeInteger', 'nonPositiveInteger',
    'unsignedInt', 'unsignedLong', 'unsignedShort', 'unsignedByte',
]);

const DECIMAL_DATATYPES = new Set(['decimal', 'double', 'float']);

/**
 * Convert literal text to a scalar according to its xsd datatype
 */
export function toScalar(text: string, datatype?: string): ScalarValue {
    if (!datatype || !datatype.startsWith(XSD_NS)) {
        return text;
    }
    const type = datatype.slice(XSD_NS.length);
    if (INTEGER_DATATYPES.has(type)) {
        // Beyond 2^53 the text is the only exact form
        const n = Number(text);
        return text.trim() !== '' && Number.isSafeInteger(n) ? n : text;
    }
    if (DECIMAL_DATATYPES.has(type)) {
        const n = Number(text);
        return text !== '' && Number.isFinite(n) ? n : text;
    }
    if (type === 'boolean') {
        if (text === 'true' || text === '1') return true;
        if (text === 'false' || text === '0') return false;
    }
    return text;
}

/**
 * Everything said about one subject in the document
 */
interface NodeRecord {
    subject: ResolvedName;
    types: Set<string>;
    parents: Set<string>;
    domain?: string;
    range?: string;
    assertions: PropertyAssertion[];
}

/**
 * Walks the node elements of one document and groups statements by subject
 */
class NodeCollector {
    private readonly records = new Map<string, NodeRecord>();

    constructor(private readonly ns: NamespaceTable) { }

    private subjectOf(element: XmlElement): ResolvedName | undefined {
        const about = getAttribute(element, RDF_NS, 'about', true);
        if (about !== undefined) {
            return this.ns.resolve(about);
        }
        const id = getAttribute(element, RDF_NS, 'ID', true);
        return id !== undefined ? this.ns.resolveId(id) : undefined;
    }

    private resourceOf(element: XmlElement): ResolvedName | undefined {
        const resource = getAttribute(element, RDF_NS, 'resource', true);
        return resource !== undefined ? this.ns.resolve(resource) : undefined;
    }

    private record(subject: ResolvedName): NodeRecord {
        let record = this.records.get(subject.iri);
        if (!record) {
            record = { subject, types: new Set(), parents: new Set(), assertions: [] };
            this.records.set(subject.iri, record);
        }
        return record;
    }

    /**
     * Collect one node element. Returns its subject, or undefined for blank nodes.
     */
    node(element: XmlElement): ResolvedName | undefined {
        const subject = this.subjectOf(element);
        if (!subject) {
            return undefined;
        }
        const record = this.record(subject);
        const elementIri = this.ns.elementIri(element);
        if (elementIri !== RDF_DESCRIPTION) {
            record.types.add(elementIri);
        }
        for (const child of element.children) {
            this.property(record, child);
        }
        return subject;
    }

    private property(record: NodeRecord, element: XmlElement): void {
        const predicateIri = this.ns.elementIri(element);
        const resource = this.resourceOf(element);

        switch (predicateIri) {
            case RDF_TYPE:
                if (resource) record.types.add(resource.iri);
                return;
            case RDFS_SUBCLASS_OF:
                if (resource) record.parents.add(resource.name);
                return;
            case RDFS_DOMAIN:
                if (resource) record.domain = resource.name;
                return;
            case RDFS_RANGE:
                if (resource) record.range = resource.name;
                return;
        }
        if (isVocabulary(predicateIri) && !KEPT_VOCABULARY_PREDICATES.has(predicateIri)) {
            return;
        }

        const object = this.objectOf(element, resource);
        if (object) {
            record.assertions.push({
                subject: record.subject.name,
                predicate: localName(predicateIri),
                predicateIri,
                object,
            });
        }
    }

    private objectOf(element: XmlElement, resource: ResolvedName | undefined): AssertionObject | undefined {
        if (resource) {
            return { kind: 'individual', name: resource.name, iri: resource.iri };
        }
        if (element.children.length > 0) {
            // Nested node: declares the object and links to it
            const nested = this.node(element.children[0]);
            return nested ? { kind: 'individual', name: nested.name, iri: nested.iri } : undefined;
        }
        if (getAttribute(element, RDF_NS, 'nodeID', true) !== undefined
            || getAttribute(element, RDF_NS, 'parseType', true) !== undefined) {
            return undefined;
        }
        const text = element.text.trim();
        const datatypeRef = getAttribute(element, RDF_NS, 'datatype', true);
        const datatype = datatypeRef !== undefined ? this.ns.resolve(datatypeRef)?.iri : undefined;
        if (text === '' && !datatype) {
            return undefined;
        }
        return { kind: 'literal', value: toScalar(text, datatype), ...(datatype && { datatype }) };
    }

    build(source: string): SourceDescriptor {
        const classes: ClassDeclaration[] = [];
        const objectProperties: ObjectPropertyDeclaration[] = [];
        const individuals: IndividualDeclaration[] = [];
        const assertions: PropertyAssertion[] = [];
        let ontologyIri: string | undefined;

        for (const record of this.records.values()) {
            const { subject, types } = record;
            if ([...types].some((t) => CLASS_TYPES.has(t))) {
                classes.push({ name: subject.name, iri: subject.iri, parents: [...record.parents] });
                continue;
            }
            if (types.has(OBJECT_PROPERTY)) {
                objectProperties.push({
                    name: subject.name,
                    iri: subject.iri,
                    ...(record.domain && { domain: record.domain }),
                    ...(record.range && { range: record.range }),
                });
                continue;
            }
            if (types.has(ONTOLOGY)) {
                ontologyIri ??= subject.iri;
                continue;
            }

            const classTags = [...types].filter((t) => !isVocabulary(t));
            const isIndividual = classTags.length > 0 || [...types].some((t) => INDIVIDUAL_MARKERS.has(t));
            if (!isIndividual && types.size > 0) {
                // Datatype/annotation properties, restrictions, axioms, ...
                continue;
            }
            if (isIndividual) {
                individuals.push({
                    name: subject.name,
                    iri: subject.iri,
                    classes: classTags.map(localName),
                });
            }
            // Untyped subjects keep their assertions; the store decides whether they resolve
            assertions.push(...record.assertions);
        }

        return {
            source,
            namespaces: this.ns.toRecord(),
            ...(this.ns.base && { base: this.ns.base }),
            ...(ontologyIri && { ontologyIri }),
            classes,
            objectProperties,
            individuals,
            assertions,
        };
    }
}

/**
 * Loader for OWL ontology files
 */
export class OntologyLoader {
    private readonly logger: Logger;

    constructor() {
        this.logger = createChildLogger({ component: 'ontology-loader' });
    }

    /**
     * Load and parse one file.
     * Rejects with SOURCE_NOT_FOUND or PARSE_ERROR.
     */
    async load(filePath: string): Promise<SourceDescriptor> {
        let xml: string;
        try {
            xml = await fs.promises.readFile(filePath, 'utf-8');
        } catch (e) {
            throw createSourceNotFoundError(filePath, e instanceof Error ? e.message : String(e));
        }
        return this.parse(xml, filePath);
    }

    /**
     * Parse RDF/XML text. `source` labels the descriptor for provenance.
     */
    async parse(xml: string, source: string): Promise<SourceDescriptor> {
        let root: XmlElement;
        try {
            root = await parseXml(xml);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            this.logger.warn({ source, error: message }, 'Malformed ontology markup');
            throw createParseError(source, message.split('\n')[0]);
        }

        const ns = NamespaceTable.fromRoot(root);
        const collector = new NodeCollector(ns);
        const isRdfRoot = root.uri === RDF_NS && root.local === 'RDF';
        for (const element of isRdfRoot ? root.children : [root]) {
            collector.node(element);
        }

        const descriptor = collector.build(source);
        this.logger.info({
            source,
            classes: descriptor.classes.length,
            objectProperties: descriptor.objectProperties.length,
            individuals: descriptor.individuals.length,
            assertions: descriptor.assertions.length,
        }, 'Ontology parsed');
        return descriptor;
    }
}
