import type { ScalarValue } from './graph.js';

// === Source descriptor: parsed ontology file, not persisted ===

export interface ClassDeclaration {
    name: string;
    iri: string;
    parents: string[];
}

export interface ObjectPropertyDeclaration {
    name: string;
    iri: string;
    domain?: string;
    range?: string;
}

export interface IndividualDeclaration {
    name: string;
    iri: string;
    classes: string[];
}

export type AssertionObject =
    | { kind: 'individual'; name: string; iri: string }
    | { kind: 'literal'; value: ScalarValue; datatype?: string };

export interface PropertyAssertion {
    subject: string;
    predicate: string;
    predicateIri: string;
    object: AssertionObject;
}

export interface SourceDescriptor {
    source: string;
    namespaces: Record<string, string>;   // prefix -> URI, '' for the default namespace
    base?: string;
    ontologyIri?: string;
    classes: ClassDeclaration[];
    objectProperties: ObjectPropertyDeclaration[];
    individuals: IndividualDeclaration[];
    assertions: PropertyAssertion[];
}

// === Relation vocabulary ===

export interface RelationAlias {
    type: string;
    inverse?: boolean;
}

export interface RelationVocabularyConfig {
    canonical?: string[];
    aliases?: Record<string, string | RelationAlias>;
}

export interface CanonicalRelation {
    type: string;
    inverse: boolean;
}
