/**
 * Namespace-aware XML element tree on top of xml2js.
 */

import { parseStringPromise } from 'xml2js';

export interface XmlAttribute {
    name: string;        // As written, e.g. 'rdf:about'
    value: string;
    prefix: string;
    local: string;
    uri: string;         // '' when the attribute has no namespace
}

export interface XmlElement {
    name: string;        // As written, e.g. 'owl:Class'
    uri: string;         // '' when the element has no namespace
    local: string;
    attributes: XmlAttribute[];
    text: string;
    children: XmlElement[];
}

const PARSER_OPTIONS = {
    xmlns: true,
    explicitChildren: true,
    preserveChildrenOrder: true,
    explicitCharkey: true,
    charkey: '_',
    attrkey: '$',
    childkey: '$$',
};

const BUILTIN_ENTITIES = new Set(['lt', 'gt', 'amp', 'quot', 'apos']);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
    return typeof value === 'string' ? value : '';
}

function localPart(qname: string): string {
    const colon = qname.indexOf(':');
    return colon === -1 ? qname : qname.slice(colon + 1);
}

/**
 * Inline the internal DTD entities (`<!ENTITY xsd "...">`) that ontology
 * editors emit; the underlying sax parser rejects undeclared entities.
 */
export function expandDoctypeEntities(xml: string): string {
    const doctype = /<!DOCTYPE[^[>]*\[([\s\S]*?)\]\s*>/.exec(xml);
    if (!doctype) {
        return xml;
    }
    const entities = new Map<string, string>();
    const entityPattern = /<!ENTITY\s+([A-Za-z_][\w.-]*)\s+(["'])([\s\S]*?)\2\s*>/g;
    let match: RegExpExecArray | null;
    while ((match = entityPattern.exec(doctype[1])) !== null) {
        if (!BUILTIN_ENTITIES.has(match[1])) {
            entities.set(match[1], match[3]);
        }
    }

    const head = xml.slice(0, doctype.index);
    const body = xml.slice(doctype.index + doctype[0].length);
    const expanded = body.replace(/&([A-Za-z_][\w.-]*);/g, (whole, name: string) => entities.get(name) ?? whole);
    return head + expanded;
}

function toAttribute(name: string, raw: unknown): XmlAttribute {
    if (isRecord(raw)) {
        return {
            name,
            value: asString(raw.value),
            prefix: asString(raw.prefix),
            local: asString(raw.local) || localPart(name),
            uri: asString(raw.uri),
        };
    }
    return { name, value: asString(raw), prefix: '', local: localPart(name), uri: '' };
}

function toElement(raw: unknown, fallbackName: string): XmlElement {
    if (!isRecord(raw)) {
        // Collapsed text-only node
        return { name: fallbackName, uri: '', local: localPart(fallbackName), attributes: [], text: asString(raw), children: [] };
    }

    const name = asString(raw['#name']) || fallbackName;
    const ns = isRecord(raw.$ns) ? raw.$ns : {};
    const attributes = isRecord(raw.$)
        ? Object.entries(raw.$).map(([key, value]) => toAttribute(key, value))
        : [];
    const children = Array.isArray(raw.$$)
        ? raw.$$.map((child: unknown) => toElement(child, ''))
        : [];

    return {
        name,
        uri: asString(ns.uri),
        local: asString(ns.local) || localPart(name),
        attributes,
        text: asString(raw._),
        children,
    };
}

/**
 * Parse an XML document into its root element.
 * Rejects on malformed markup and on unbound namespace prefixes.
 */
export async function parseXml(xml: string): Promise<XmlElement> {
    const result: unknown = await parseStringPromise(expandDoctypeEntities(xml), PARSER_OPTIONS);
    if (!isRecord(result)) {
        throw new Error('Document has no root element');
    }
    const entries = Object.entries(result);
    if (entries.length === 0) {
        throw new Error('Document has no root element');
    }
    const [rootName, rootValue] = entries[0];
    return toElement(rootValue, rootName);
}

/**
 * Find an attribute by namespace URI and local name.
 * `acceptBare` also matches the attribute written without a prefix.
 */
export function getAttribute(
    element: XmlElement,
    uri: string,
    local: string,
    acceptBare = false
): string | undefined {
    const qualified = element.attributes.find((a) => a.uri === uri && a.local === local);
    if (qualified) {
        return qualified.value;
    }
    if (acceptBare) {
        return element.attributes.find((a) => a.uri === '' && a.local === local && !a.name.includes(':'))?.value;
    }
    return undefined;
}
