import type { ReportEntry, ScalarValue } from './graph.js';

export type AnnotationFields = Record<string, ScalarValue>;

/**
 * Fields for one entity key, merged over every row carrying that key
 */
export interface AnnotationRecord {
    key: string;          // Key cell as written in the first row that used it
    sheet: string;
    fields: AnnotationFields;
}

export interface SheetSummary {
    sheet: string;
    keyColumn?: string;
    rows: number;
}

/**
 * Rows of a sheet without an identifiable key column
 */
export interface UnkeyedSheet {
    sheet: string;
    rows: AnnotationFields[];
}

export interface AnnotationTable {
    source: string;
    records: AnnotationRecord[];
    sheets: SheetSummary[];
    unkeyed: UnkeyedSheet[];
    entries: ReportEntry[];
}
