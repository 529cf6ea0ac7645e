/**
 * Annotation Source Loader
 *
 * Reads a workbook (.xlsx, every sheet) or a .csv file into an
 * AnnotationTable keyed by entity name. Reading goes through exceljs; the
 * capability is switched by configuration, and when it is off the loader
 * reports DEPENDENCY_MISSING instead of reading anything.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Workbook } from 'exceljs';
import type { CellValue, Worksheet } from 'exceljs';
import type { Logger } from 'pino';
import type { ScalarValue } from '../types/graph.js';
import type { AnnotationFields, AnnotationRecord, AnnotationTable } from '../types/annotations.js';
import {
    createDependencyMissingError,
    createParseError,
    createSourceNotFoundError,
} from '../types/errors.js';
import { normalizeKey, putValue } from '../graph/state.js';
import { createChildLogger } from '../logger.js';

/** Header names that mark the key column, in order of preference */
const KEY_HEADERS = ['name', 'id'];

export interface AnnotationLoaderOptions {
    enabled?: boolean;
}

/**
 * Normalize a cell to a scalar. Blanks and error cells give undefined.
 */
export function toCellScalar(value: CellValue): ScalarValue | undefined {
    if (value === null || value === undefined) {
        return undefined;
    }
    if (typeof value === 'string') {
        const text = value.trim();
        return text === '' ? undefined : text;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'boolean') {
        return value;
    }
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
    }
    if ('richText' in value) {
        return toCellScalar(value.richText.map((run) => run.text).join(''));
    }
    if ('hyperlink' in value) {
        return toCellScalar(typeof value.text === 'string' ? value.text : value.hyperlink);
    }
    if ('error' in value) {
        return undefined;
    }
    // Formula: cached result
    return toCellScalar(value.result);
}

function headerName(value: CellValue, column: number): string {
    const scalar = toCellScalar(value);
    return scalar === undefined ? `column${column}` : String(scalar);
}

type Row = Map<number, ScalarValue>;

export class AnnotationLoader {
    readonly enabled: boolean;
    private readonly logger: Logger;

    constructor(options: AnnotationLoaderOptions = {}) {
        this.enabled = options.enabled ?? true;
        this.logger = createChildLogger({ component: 'annotation-loader' });
    }

    /**
     * Read one tabular file. `knownNames` are display names already in the
     * graph, used to find the key column of sheets without a name/id header.
     * Rejects with SOURCE_NOT_FOUND or PARSE_ERROR; never rejects when disabled.
     */
    async load(filePath: string, knownNames: Iterable<string> = []): Promise<AnnotationTable> {
        const table: AnnotationTable = { source: filePath, records: [], sheets: [], unkeyed: [], entries: [] };

        if (!this.enabled) {
            const { code, message } = createDependencyMissingError(filePath).error;
            table.entries.push({ severity: 'error', code, message, source: filePath });
            this.logger.warn({ source: filePath }, 'Annotation support disabled; file not read');
            return table;
        }

        try {
            await fs.promises.access(filePath, fs.constants.R_OK);
        } catch (e) {
            throw createSourceNotFoundError(filePath, e instanceof Error ? e.message : String(e));
        }

        const isCsv = path.extname(filePath).toLowerCase() === '.csv';
        const workbook = new Workbook();
        let worksheets: Worksheet[];
        try {
            if (isCsv) {
                worksheets = [await workbook.csv.readFile(filePath)];
            } else {
                await workbook.xlsx.readFile(filePath);
                worksheets = workbook.worksheets;
            }
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            this.logger.warn({ source: filePath, error: message }, 'Unreadable workbook');
            throw createParseError(filePath, message);
        }

        const known = new Set([...knownNames].map((name) => name.toLowerCase()));
        const records = new Map<string, AnnotationRecord>();
        for (const worksheet of worksheets) {
            const sheetName = isCsv ? path.basename(filePath) : worksheet.name;
            this.readSheet(worksheet, sheetName, known, records, table);
        }
        table.records = [...records.values()];

        this.logger.info({
            source: filePath,
            sheets: table.sheets.length,
            records: table.records.length,
            unkeyedSheets: table.unkeyed.length,
        }, 'Annotations read');
        return table;
    }

    private readSheet(
        worksheet: Worksheet,
        sheetName: string,
        known: Set<string>,
        records: Map<string, AnnotationRecord>,
        table: AnnotationTable
    ): void {
        const headers = new Map<number, string>();
        worksheet.getRow(1).eachCell((cell, column) => {
            headers.set(column, headerName(cell.value, column));
        });

        const rows: Row[] = [];
        worksheet.eachRow((row, rowNumber) => {
            if (rowNumber === 1) return;
            const cells: Row = new Map();
            row.eachCell((cell, column) => {
                const value = toCellScalar(cell.value);
                if (value !== undefined) cells.set(column, value);
            });
            if (cells.size > 0) rows.push(cells);
        });

        const fieldsOf = (row: Row, skip?: number): AnnotationFields => {
            const fields: AnnotationFields = {};
            for (const [column, value] of row) {
                if (column !== skip) {
                    putValue(fields, headers.get(column) ?? `column${column}`, value);
                }
            }
            return fields;
        };

        const keyColumn = this.findKeyColumn(headers, rows, known);
        if (keyColumn === undefined) {
            table.sheets.push({ sheet: sheetName, rows: rows.length });
            if (rows.length > 0) {
                table.unkeyed.push({ sheet: sheetName, rows: rows.map((row) => fieldsOf(row)) });
                table.entries.push({
                    severity: 'warning',
                    code: 'UNMATCHED_ANNOTATION',
                    message: `Sheet '${sheetName}' has no name/id column and no column matching a known entity; kept as unkeyed metadata`,
                    source: table.source,
                    details: { sheet: sheetName, rows: rows.length },
                });
            }
            return;
        }

        table.sheets.push({ sheet: sheetName, keyColumn: headers.get(keyColumn), rows: rows.length });
        for (const row of rows) {
            const keyValue = row.get(keyColumn);
            if (keyValue === undefined) continue;
            const key = String(keyValue).trim();
            const normalized = normalizeKey(key);
            const record = records.get(normalized);
            if (record) {
                for (const [field, value] of Object.entries(fieldsOf(row, keyColumn))) {
                    putValue(record.fields, field, value);
                }
            } else {
                records.set(normalized, { key, sheet: sheetName, fields: fieldsOf(row, keyColumn) });
            }
        }
    }

    /**
     * `name` or `id` header first, else the first column holding a known name
     */
    private findKeyColumn(headers: Map<number, string>, rows: Row[], known: Set<string>): number | undefined {
        const columns = [...headers.keys()].sort((a, b) => a - b);
        for (const wanted of KEY_HEADERS) {
            const column = columns.find((c) => headers.get(c)?.trim().toLowerCase() === wanted);
            if (column !== undefined) return column;
        }
        if (known.size === 0) {
            return undefined;
        }
        return columns.find((column) => rows.some((row) => {
            const value = row.get(column);
            return value !== undefined && known.has(String(value).trim().toLowerCase());
        }));
    }
}
