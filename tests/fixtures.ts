/**
 * Shared test fixtures: source files, descriptor builders, temp workbooks.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Workbook } from 'exceljs';
import type {
    AssertionObject,
    IndividualDeclaration,
    PropertyAssertion,
    SourceDescriptor,
} from '../src/types/ontology.js';
import type { ScalarValue } from '../src/types/graph.js';
import type { GraphConfig, GraphConfigInput } from '../src/config.js';
import { loadConfig } from '../src/config.js';
import { GraphStore } from '../src/graph/store.js';
import { loadRelationVocabulary } from '../src/ontology/relations.js';

// === Source files ===

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

export function fixturePath(name: string): string {
    return path.join(FIXTURES_DIR, name);
}

export const TEST_NS = 'http://example.org/test#';

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'ontology-graph-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Copy fixture files into a directory, optionally under new names
 */
export function copyFixtures(dir: string, files: Record<string, string>): string[] {
    return Object.entries(files).map(([target, fixture]) => {
        const destination = path.join(dir, target);
        fs.copyFileSync(fixturePath(fixture), destination);
        return destination;
    });
}

// === Descriptor builders ===

export function individual(name: string, ...classes: string[]): IndividualDeclaration {
    return { name, iri: `${TEST_NS}${name}`, classes };
}

export function link(subject: string, predicate: string, object: string): PropertyAssertion {
    const target: AssertionObject = { kind: 'individual', name: object, iri: `${TEST_NS}${object}` };
    return { subject, predicate, predicateIri: `${TEST_NS}${predicate}`, object: target };
}

export function literal(subject: string, predicate: string, value: ScalarValue): PropertyAssertion {
    return { subject, predicate, predicateIri: `${TEST_NS}${predicate}`, object: { kind: 'literal', value } };
}

export function descriptor(
    source: string,
    individuals: IndividualDeclaration[],
    assertions: PropertyAssertion[] = []
): SourceDescriptor {
    return {
        source,
        namespaces: { '': TEST_NS },
        classes: [],
        objectProperties: [],
        individuals,
        assertions,
    };
}

/**
 * Scenario 1 descriptor: a disease, a treatment and the link between them
 */
export const DIABETES_DESCRIPTOR = descriptor(
    'diabetes.owl',
    [individual('Diabetes', 'Disease'), individual('InsulinTherapy', 'Treatment')],
    [link('InsulinTherapy', 'treatsDisease', 'Diabetes')]
);

// === Stores and configuration ===

export function createStore(): GraphStore {
    return new GraphStore({ vocabulary: loadRelationVocabulary() });
}

export function testConfig(overrides: GraphConfigInput = {}): GraphConfig {
    return loadConfig({}, { logLevel: 'silent', ...overrides });
}

// === Workbooks ===

export type SheetRows = Array<Array<string | number | boolean | Date | null>>;

/**
 * Write an .xlsx file with one worksheet per entry
 */
export async function writeWorkbook(filePath: string, sheets: Record<string, SheetRows>): Promise<string> {
    const workbook = new Workbook();
    for (const [name, rows] of Object.entries(sheets)) {
        const worksheet = workbook.addWorksheet(name);
        for (const row of rows) {
            worksheet.addRow(row);
        }
    }
    await workbook.xlsx.writeFile(filePath);
    return filePath;
}
