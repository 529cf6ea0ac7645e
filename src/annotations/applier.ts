/**
 * Annotation Applier
 *
 * Attaches annotation fields to the entities they name. Explicit
 * properties always win: a field whose key the entity already holds as a
 * property is counted as shadowed and left out.
 */

import type { AnnotationReport } from '../types/graph.js';
import type { AnnotationTable } from '../types/annotations.js';
import type { GraphStore } from '../graph/store.js';

export function applyAnnotations(store: GraphStore, table: AnnotationTable): AnnotationReport {
    const report: AnnotationReport = {
        source: table.source,
        matched: 0,
        unmatched: 0,
        fieldsApplied: 0,
        fieldsShadowed: 0,
        entries: [],
    };

    store.transaction((tx) => {
        for (const record of table.records) {
            const entity = tx.findByName(record.key);
            if (!entity) {
                report.unmatched++;
                report.entries.push({
                    severity: 'warning',
                    code: 'UNMATCHED_ANNOTATION',
                    message: `No entity named '${record.key}' for annotations in sheet '${record.sheet}'`,
                    source: table.source,
                    details: { key: record.key, sheet: record.sheet },
                });
                continue;
            }

            report.matched++;
            for (const [field, value] of Object.entries(record.fields)) {
                if (tx.setAnnotation(entity.id, field, value, table.source)) {
                    report.fieldsApplied++;
                } else {
                    report.fieldsShadowed++;
                }
            }
        }
    });

    return report;
}
