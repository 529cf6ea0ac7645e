import type { XmlElement } from './xml.js';
import { getAttribute } from './xml.js';

export const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS_NS = 'http://www.w3.org/2000/01/rdf-schema#';
export const OWL_NS = 'http://www.w3.org/2002/07/owl#';
export const XSD_NS = 'http://www.w3.org/2001/XMLSchema#';
export const XML_NS = 'http://www.w3.org/XML/1998/namespace';

const VOCABULARY_NAMESPACES = [RDF_NS, RDFS_NS, OWL_NS, XSD_NS];

export interface ResolvedName {
    iri: string;
    name: string;
}

/**
 * Whether an IRI belongs to the RDF/RDFS/OWL/XSD vocabularies
 */
export function isVocabulary(iri: string): boolean {
    return VOCABULARY_NAMESPACES.some((ns) => iri.startsWith(ns));
}

/**
 * Local part of an IRI: after the last '#', else the last '/', else the last ':'.
 */
export function localName(iri: string): string {
    for (const separator of ['#', '/', ':']) {
        const index = iri.lastIndexOf(separator);
        if (index !== -1 && index < iri.length - 1) {
            return iri.slice(index + 1);
        }
    }
    return iri;
}

/**
 * Prefix table of one document, used to resolve qualified and bare names.
 */
export class NamespaceTable {
    private readonly prefixes: Map<string, string>;
    readonly base?: string;

    constructor(prefixes: Record<string, string> = {}, base?: string) {
        this.prefixes = new Map(Object.entries(prefixes));
        this.base = base;
    }

    static fromRoot(root: XmlElement): NamespaceTable {
        const prefixes: Record<string, string> = {};
        for (const attribute of root.attributes) {
            if (attribute.name === 'xmlns') {
                prefixes[''] = attribute.value;
            } else if (attribute.name.startsWith('xmlns:')) {
                prefixes[attribute.name.slice('xmlns:'.length)] = attribute.value;
            }
        }
        return new NamespaceTable(prefixes, getAttribute(root, XML_NS, 'base'));
    }

    toRecord(): Record<string, string> {
        return Object.fromEntries(this.prefixes);
    }

    get defaultNamespace(): string | undefined {
        return this.prefixes.get('');
    }

    /** Base IRI without fragment, falling back to the default namespace */
    private documentBase(): string {
        const base = this.base ?? this.defaultNamespace ?? '';
        const hash = base.indexOf('#');
        return hash === -1 ? base : base.slice(0, hash);
    }

    /**
     * Resolve a reference written as an absolute IRI, `#Local`,
     * `prefix:Local` (declared prefix) or a bare `Local`.
     */
    resolve(reference: string): ResolvedName | undefined {
        const ref = reference.trim();
        if (ref.length === 0) {
            return undefined;
        }

        let iri: string;
        const qualified = /^([A-Za-z_][\w.-]*)?:(.*)$/.exec(ref);
        if (ref.startsWith('#')) {
            iri = this.documentBase() + ref;
        } else if (qualified && this.prefixes.has(qualified[1] ?? '') && !qualified[2].startsWith('//')) {
            iri = (this.prefixes.get(qualified[1] ?? '') ?? '') + qualified[2];
        } else if (ref.includes(':')) {
            iri = ref;
        } else {
            const documentBase = this.documentBase();
            iri = this.defaultNamespace ?? (documentBase ? `${documentBase}#` : '');
            iri += ref;
        }
        return { iri, name: localName(iri) };
    }

    /** Resolve `rdf:ID="x"`, which is always relative to the document base */
    resolveId(id: string): ResolvedName {
        const iri = `${this.documentBase()}#${id.trim()}`;
        return { iri, name: localName(iri) };
    }

    /**
     * IRI of an element name. Elements outside any namespace are resolved as
     * bare local names.
     */
    elementIri(element: XmlElement): string {
        if (element.uri) {
            return element.uri + element.local;
        }
        return this.resolve(element.local)?.iri ?? element.local;
    }
}
