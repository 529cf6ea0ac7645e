/**
 * Tests for the graph store: identity, relationships, merge reports,
 * queries and integrity
 */

import { GraphStore, GENERIC_TYPE } from '../src/graph/store.js';
import { normalizeKey } from '../src/graph/state.js';
import { GraphException } from '../src/types/errors.js';
import {
    DIABETES_DESCRIPTOR,
    createStore,
    descriptor,
    individual,
    link,
    literal,
} from './fixtures.js';

function idOf(store: GraphStore, name: string): string {
    const entity = store.findByName(name);
    if (!entity) {
        throw new Error(`No entity named ${name}`);
    }
    return entity.id;
}

describe('normalizeKey', () => {
    test('folds case, whitespace and Unicode composition', () => {
        expect(normalizeKey('  Insulin   Therapy ')).toBe('insulin therapy');
        expect(normalizeKey('Café')).toBe(normalizeKey('Café'));
    });
});

describe('GraphStore', () => {
    let store: GraphStore;

    beforeEach(() => {
        store = createStore();
    });

    describe('scenarios', () => {
        test('a disease, a treatment and their link give 2 entities and 1 relationship', () => {
            const report = store.mergeDescriptor(DIABETES_DESCRIPTOR);

            expect(report.entitiesCreated).toBe(2);
            expect(report.relationshipsCreated).toBe(1);
            expect(store.stats().totalEntities).toBe(2);
            expect(store.stats().totalRelationships).toBe(1);

            const [relationship] = store.exportGraph().relationships;
            expect(relationship.type).toBe('treatsDisease');
            expect(relationship.sourceId).toBe(idOf(store, 'InsulinTherapy'));
            expect(relationship.targetId).toBe(idOf(store, 'Diabetes'));
        });

        test('two descriptors declaring the same individual union their properties', () => {
            store.mergeDescriptor(descriptor('a.owl', [individual('Patient1', 'Patient')], [literal('Patient1', 'age', 45)]));
            store.mergeDescriptor(descriptor('b.owl', [individual('Patient1', 'Patient')], [literal('Patient1', 'smoker', false)]));

            const patients = store.query({ type: 'Patient' });
            expect(patients).toHaveLength(1);
            expect(patients[0].properties).toEqual({
                age: { value: 45, source: 'a.owl' },
                smoker: { value: false, source: 'b.owl' },
            });
            expect(patients[0].sources).toEqual(['a.owl', 'b.owl']);
        });

        test('query by type returns the one disease', () => {
            store.mergeDescriptor(DIABETES_DESCRIPTOR);

            const diseases = store.query({ type: 'Disease' });
            expect(diseases.map((e) => e.name)).toEqual(['Diabetes']);
        });

        test('annotations land in the annotation bag and leave relationships alone', () => {
            store.mergeDescriptor(DIABETES_DESCRIPTOR);
            const diabetesId = idOf(store, 'Diabetes');

            store.transaction((tx) => tx.setAnnotation(diabetesId, 'severity', 'chronic', 'notes.xlsx'));

            const lookup = store.getEntity(diabetesId);
            expect(lookup.found).toBe(true);
            if (lookup.found) {
                expect(lookup.entity.annotations.severity).toEqual({ value: 'chronic', source: 'notes.xlsx' });
                expect(lookup.entity.properties.severity).toBeUndefined();
            }
            const related = store.getRelated(diabetesId, { relationTypes: ['treatsDisease'] });
            expect(related).toHaveLength(1);
            expect(related[0].entity.name).toBe('InsulinTherapy');
        });
    });

    describe('upsertEntity', () => {
        test('is idempotent on the normalized key', () => {
            const first = store.upsertEntity('Insulin Therapy', 'Treatment');
            const second = store.upsertEntity('  insulin   THERAPY', 'Treatment');

            expect(first.created).toBe(true);
            expect(second).toEqual({ id: first.id, created: false });
            expect(store.stats().totalEntities).toBe(1);
            expect(store.findByName('Insulin Therapy')?.key).toBe('insulin therapy');
        });

        test('last write wins per property key', () => {
            store.upsertEntity('P1', 'Patient', { age: 40, ward: 'A' }, { source: 'first' });
            store.upsertEntity('P1', 'Patient', { age: 41 }, { source: 'second' });

            const [patient] = store.query({ name: 'P1' });
            expect(patient.properties).toEqual({
                age: { value: 41, source: 'second' },
                ward: { value: 'A', source: 'first' },
            });
        });

        test('a specific type replaces the stored one; the generic type never does', () => {
            const { id } = store.upsertEntity('X', GENERIC_TYPE);
            store.upsertEntity('X', 'Disease');
            store.upsertEntity('X', GENERIC_TYPE);

            const lookup = store.getEntity(id);
            expect(lookup.found && lookup.entity.type).toBe('Disease');
        });

        test('collects classes and keeps the latest IRI', () => {
            store.upsertEntity('Flu', 'Disease', {}, { classes: ['Disease'], iri: 'http://a#Flu' });
            store.upsertEntity('Flu', 'Infection', {}, { classes: ['Infection', 'Disease'], iri: 'http://b#Flu' });

            const flu = store.findByName('Flu');
            expect(flu?.classes).toEqual(['Disease', 'Infection']);
            expect(flu?.iri).toBe('http://b#Flu');
            expect(flu?.type).toBe('Infection');
        });

        test('stores a __proto__ key as an ordinary property', () => {
            store.upsertEntity('X', 'Thing', JSON.parse('{"__proto__":"p","value":1}'));
            store.upsertEntity('X', 'Thing', JSON.parse('{"__proto__":"q"}'), { source: 'second' });

            const properties = store.findByName('X')?.properties ?? {};
            expect(Object.entries(properties)).toEqual([
                ['__proto__', { value: 'q', source: 'second' }],
                ['value', { value: 1, source: 'api' }],
            ]);
            expect(Object.getPrototypeOf(properties)).toBe(Object.prototype);
            expect(store.query({ properties: { ['__proto__']: 'q' } }).map((e) => e.name)).toEqual(['X']);
        });

        test('rejects empty keys and non-scalar values', () => {
            expect(() => store.upsertEntity('   ', 'Disease')).toThrow(GraphException);
            expect(() => store.upsertEntity('P1', 'Patient', { nested: { a: 1 } })).toThrow("Property 'nested' must be a string, number or boolean");
            expect(() => store.upsertEntity('P1', 'Patient', { age: Number.NaN })).toThrow(GraphException);
            expect(store.stats().totalEntities).toBe(0);
        });
    });

    describe('addRelationship', () => {
        let patient: string;
        let disease: string;

        beforeEach(() => {
            patient = store.upsertEntity('P1', 'Patient').id;
            disease = store.upsertEntity('Asthma', 'Disease').id;
        });

        test('returns the existing id for the same canonical triple', () => {
            const first = store.addRelationship('hasDisease', patient, disease, { since: 2019 }, { source: 'a' });
            const second = store.addRelationship('diagnosedWith', patient, disease, { confirmed: true }, { source: 'b' });

            expect(second).toBe(first);
            const relationship = store.getRelationship(first);
            expect(relationship?.sources).toEqual(['a', 'b']);
            expect(relationship?.properties).toEqual({
                since: { value: 2019, source: 'a' },
                confirmed: { value: true, source: 'b' },
            });
            expect(store.stats().totalRelationships).toBe(1);
        });

        test('inverse aliases swap the endpoints', () => {
            const id = store.addRelationship('isDiseaseOf', disease, patient);

            const relationship = store.getRelationship(id);
            expect(relationship).toMatchObject({ type: 'hasDisease', sourceId: patient, targetId: disease });
            expect(store.addRelationship('hasDisease', patient, disease)).toBe(id);
        });

        test('throws DANGLING_REFERENCE when an endpoint is missing', () => {
            let caught: unknown;
            try {
                store.addRelationship('hasDisease', patient, 'missing-id');
            } catch (e) {
                caught = e;
            }

            expect(caught).toBeInstanceOf(GraphException);
            if (caught instanceof GraphException) {
                expect(caught.code).toBe('DANGLING_REFERENCE');
                expect(caught.error.details?.missing).toEqual(['missing-id']);
            }
            expect(store.stats().totalRelationships).toBe(0);
        });

        test('unknown relation types are stored as written', () => {
            const id = store.addRelationship('livesNear', patient, disease);
            expect(store.getRelationship(id)?.type).toBe('livesNear');
        });
    });

    describe('mergeDescriptor', () => {
        test('is idempotent', () => {
            const first = store.mergeDescriptor(DIABETES_DESCRIPTOR);
            const before = store.stats();
            const second = store.mergeDescriptor(DIABETES_DESCRIPTOR);

            expect(store.stats()).toEqual(before);
            expect(first.entitiesCreated).toBe(2);
            expect(second.entitiesCreated).toBe(0);
            expect(second.entitiesMerged).toBe(2);
            expect(second.relationshipsDeduplicated).toBe(1);
            expect(second.entries.filter((e) => e.code === 'DUPLICATE_ENTITY')).toHaveLength(2);
            expect(second.entries.every((e) => e.severity === 'info')).toBe(true);
        });

        test('disjoint descriptors give the same graph in either order', () => {
            const a = descriptor('a.owl', [individual('Flu', 'Disease'), individual('Rest', 'Treatment')], [link('Rest', 'treats', 'Flu')]);
            const b = descriptor('b.owl', [individual('P1', 'Patient'), individual('Asthma', 'Disease')], [link('P1', 'hasDisease', 'Asthma')]);

            const forward = createStore();
            forward.mergeDescriptor(a);
            forward.mergeDescriptor(b);
            const backward = createStore();
            backward.mergeDescriptor(b);
            backward.mergeDescriptor(a);

            const shape = (s: GraphStore) => {
                const graph = s.exportGraph();
                const names = new Map(graph.entities.map((e) => [e.id, e.name]));
                return {
                    entities: graph.entities.map((e) => `${e.type}:${e.name}`).sort(),
                    relationships: graph.relationships
                        .map((r) => `${names.get(r.sourceId)} ${r.type} ${names.get(r.targetId)}`)
                        .sort(),
                };
            };
            expect(shape(forward)).toEqual(shape(backward));
            expect(shape(forward).relationships).toEqual(['P1 hasDisease Asthma', 'Rest treatsDisease Flu']);
        });

        test('the later descriptor wins on overlapping properties', () => {
            store.mergeDescriptor(descriptor('a.owl', [individual('P1', 'Patient')], [literal('P1', 'age', 45)]));
            store.mergeDescriptor(descriptor('b.owl', [individual('P1', 'Patient')], [literal('P1', 'age', 46)]));

            expect(store.findByName('P1')?.properties.age).toEqual({ value: 46, source: 'b.owl' });
        });

        test('an assertion naming an undeclared individual gives no relationship and one warning', () => {
            const report = store.mergeDescriptor(descriptor(
                'dangling.owl',
                [individual('P1', 'Patient')],
                [link('P1', 'hasDisease', 'Ghost')]
            ));

            expect(report.relationshipsCreated).toBe(0);
            expect(store.stats().totalRelationships).toBe(0);
            expect(report.entries).toEqual([{
                severity: 'warning',
                code: 'DANGLING_REFERENCE',
                message: "Assertion P1 hasDisease refers to undeclared individual 'Ghost'",
                source: 'dangling.owl',
                details: { subject: 'P1', predicate: 'hasDisease', missing: 'Ghost' },
            }]);
        });

        test('assertions resolve against individuals loaded earlier', () => {
            store.mergeDescriptor(descriptor('a.owl', [individual('Asthma', 'Disease')]));
            const report = store.mergeDescriptor(descriptor('b.owl', [individual('P1', 'Patient')], [link('P1', 'hasDisease', 'Asthma')]));

            expect(report.relationshipsCreated).toBe(1);
            expect(report.entries).toEqual([]);
        });

        test('individuals without a class get the generic type', () => {
            store.mergeDescriptor(descriptor('a.owl', [individual('Thing1')]));

            expect(store.findByName('Thing1')?.type).toBe(GENERIC_TYPE);
        });

        test('keeps the source predicate on ingested relationships', () => {
            store.mergeDescriptor(descriptor(
                'a.owl',
                [individual('P1', 'Patient'), individual('Asthma', 'Disease')],
                [link('P1', 'diagnosedWith', 'Asthma')]
            ));

            const [relationship] = store.exportGraph().relationships;
            expect(relationship.type).toBe('hasDisease');
            expect(relationship.sourcePredicate).toBe('diagnosedWith');
            expect(relationship.sources).toEqual(['a.owl']);
        });
    });

    describe('transaction', () => {
        test('a failing transaction leaves the store untouched', () => {
            store.upsertEntity('P1', 'Patient', { age: 40 });

            expect(() => store.transaction((tx) => {
                const id = tx.idForKey('P1');
                if (id === undefined) throw new Error('missing');
                tx.setProperty(id, 'age', 99, 'tx');
                tx.upsertEntity('P2', 'Patient');
                tx.addRelationship('hasDisease', id, 'nowhere');
            })).toThrow(GraphException);

            expect(store.stats().totalEntities).toBe(1);
            expect(store.findByName('P1')?.properties.age.value).toBe(40);
        });

        test('readers never see a copy they can mutate', () => {
            const { id } = store.upsertEntity('P1', 'Patient', { age: 40 });

            const lookup = store.getEntity(id);
            if (lookup.found) {
                lookup.entity.properties.age.value = 1;
                lookup.entity.classes.push('Hacked');
            }

            const again = store.getEntity(id);
            expect(again.found && again.entity.properties.age.value).toBe(40);
            expect(again.found && again.entity.classes).toEqual([]);
        });
    });

    describe('setAnnotation', () => {
        test('explicit properties shadow annotations', () => {
            const { id } = store.upsertEntity('Asthma', 'Disease', { severity: 'variable' });

            const applied = store.transaction((tx) => tx.setAnnotation(id, 'severity', 'mild', 'notes.csv'));

            expect(applied).toBe(false);
            const asthma = store.findByName('Asthma');
            expect(asthma?.properties.severity.value).toBe('variable');
            expect(asthma?.annotations).toEqual({});
        });
    });

    describe('setAnnotation with inherited member names', () => {
        test('only own explicit properties shadow', () => {
            const { id } = store.upsertEntity('Diabetes', 'Disease');

            const applied = store.transaction((tx) => ['constructor', 'toString', 'hasOwnProperty', 'severity']
                .map((key) => tx.setAnnotation(id, key, `${key}-value`, 'notes.csv')));

            expect(applied).toEqual([true, true, true, true]);
            const diabetes = store.findByName('Diabetes');
            expect(Object.keys(diabetes?.annotations ?? {})).toEqual(['constructor', 'toString', 'hasOwnProperty', 'severity']);
            expect(store.query({ properties: { constructor: 'constructor-value' } }).map((e) => e.name)).toEqual(['Diabetes']);
        });
    });

    describe('queries', () => {
        beforeEach(() => {
            store.mergeDescriptor(descriptor(
                'clinic.owl',
                [
                    individual('Patient1', 'Patient'),
                    individual('Patient2', 'Patient'),
                    individual('Asthma', 'Disease'),
                    individual('Inhaler', 'Treatment'),
                ],
                [
                    literal('Patient1', 'age', 45),
                    literal('Patient2', 'age', 30),
                    link('Patient1', 'hasDisease', 'Asthma'),
                    link('Patient1', 'receivesTreatment', 'Inhaler'),
                    link('Inhaler', 'treatsDisease', 'Asthma'),
                ]
            ));
        });

        test('query filters by name substring and effective property value', () => {
            expect(store.query({ name: 'patient' }).map((e) => e.name)).toEqual(['Patient1', 'Patient2']);
            expect(store.query({ properties: { age: 45 } }).map((e) => e.name)).toEqual(['Patient1']);
            expect(store.query({ type: 'Patient', properties: { age: '45' } })).toEqual([]);

            store.transaction((tx) => {
                const id = tx.idForKey('Asthma');
                if (id !== undefined) tx.setAnnotation(id, 'severity', 'variable', 'notes.csv');
            });
            expect(store.query({ properties: { severity: 'variable' } }).map((e) => e.name)).toEqual(['Asthma']);
        });

        test('getEntity reports NOT_FOUND as a value', () => {
            const lookup = store.getEntity('nope');

            expect(lookup.found).toBe(false);
            if (!lookup.found) {
                expect(lookup.error.code).toBe('NOT_FOUND');
            }
        });

        test('getRelated honours direction and canonicalizes relation types', () => {
            const patient = idOf(store, 'Patient1');
            const asthma = idOf(store, 'Asthma');

            expect(store.getRelated(patient).map((r) => r.entity.name)).toEqual(['Asthma', 'Inhaler']);
            expect(store.getRelated(patient, { relationTypes: ['diagnosedWith'] }).map((r) => r.entity.name)).toEqual(['Asthma']);
            expect(store.getRelated(asthma, { direction: 'outgoing' })).toEqual([]);
            expect(store.getRelated(asthma, { direction: 'incoming' }).map((r) => r.entity.name)).toEqual(['Patient1', 'Inhaler']);
            expect(store.getRelated('nope')).toEqual([]);
        });

        test('findByName prefers an exact match', () => {
            store.upsertEntity('asthma attack', 'Event');

            expect(store.findByName('Asthma')?.type).toBe('Disease');
            expect(store.findByName('ASTHMA')?.type).toBe('Disease');
            expect(store.findByName('Asthma Attack')?.type).toBe('Event');
            expect(store.findByName('Migraine')).toBeUndefined();
        });

        test('search looks at names and values', () => {
            expect(store.search('inhal').map((e) => e.name)).toEqual(['Inhaler']);
            expect(store.search('45').map((e) => e.name)).toEqual(['Patient1']);
            expect(store.search('patient', 'Disease')).toEqual([]);
            expect(store.search('  ')).toEqual([]);
        });

        test('stats count by type', () => {
            expect(store.stats()).toEqual({
                totalEntities: 4,
                totalRelationships: 3,
                entityCountsByType: { Patient: 2, Disease: 1, Treatment: 1 },
                relationshipCountsByType: { hasDisease: 1, receivesTreatment: 1, treatsDisease: 1 },
            });
        });
    });

    describe('removal and integrity', () => {
        test('removeEntity cascades to its relationships', () => {
            store.mergeDescriptor(DIABETES_DESCRIPTOR);

            const result = store.removeEntity(idOf(store, 'Diabetes'));

            expect(result).toEqual({ removedRelationships: 1 });
            expect(store.stats().totalEntities).toBe(1);
            expect(store.stats().totalRelationships).toBe(0);
            expect(store.checkIntegrity()).toEqual({ valid: true, issues: [] });
            expect(store.findByName('Diabetes')).toBeUndefined();
        });

        test('removeRelationship removes only the edge', () => {
            store.mergeDescriptor(DIABETES_DESCRIPTOR);
            const [relationship] = store.exportGraph().relationships;

            store.removeRelationship(relationship.id);

            expect(store.stats()).toMatchObject({ totalEntities: 2, totalRelationships: 0 });
            expect(() => store.removeRelationship(relationship.id)).toThrow("Relationship '" + relationship.id + "' not found");
        });

        test('removeEntity throws NOT_FOUND for unknown ids', () => {
            expect(() => store.removeEntity('nope')).toThrow("Entity 'nope' not found");
        });

        test('a store built through the API stays consistent', () => {
            store.mergeDescriptor(DIABETES_DESCRIPTOR);
            const p = store.upsertEntity('P1', 'Patient').id;
            store.addRelationship('hasDisease', p, idOf(store, 'Diabetes'));
            store.addRelationship('receivesTreatment', p, idOf(store, 'InsulinTherapy'));

            expect(store.checkIntegrity()).toEqual({ valid: true, issues: [] });
        });
    });
});
