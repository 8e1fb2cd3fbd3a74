/**
 * Table input - validation, CSV loading and per-column statistics
 */

import { csvParse, max, mean, min } from 'd3';
import { StratTable } from '../types.js';

export interface ColumnStats {
    mean: number;
    min: number;
    max: number;
}

export interface ParseTableOptions {
    /** Column holding the index; defaults to the first column */
    indexColumn?: string;
}

const toNumber = (value: string | undefined): number => {
    const trimmed = (value ?? '').trim();
    if (trimmed.length === 0) return NaN;

    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : NaN;
};

/**
 * Check that every declared column exists and matches the index length.
 */
export function validateTable(table: StratTable): void {
    const rows = table.index.length;
    for (const col of table.columns) {
        const values = table.data[col];
        if (!values) {
            throw new Error(`Column "${col}" is declared but has no data`);
        }
        if (values.length !== rows) {
            throw new Error(`Column "${col}" has ${values.length} values, expected ${rows}`);
        }
    }
}

/**
 * Parse CSV text into a StratTable. Blank or non-numeric cells become NaN.
 */
export function parseStratTable(text: string, options: ParseTableOptions = {}): StratTable {
    const rows = csvParse(text);
    const header = rows.columns;
    if (header.length === 0) {
        throw new Error('CSV input has no header row');
    }

    const indexName = options.indexColumn ?? header[0];
    if (!header.includes(indexName)) {
        throw new Error(`Index column "${indexName}" not found in CSV header`);
    }

    const columns = header.filter(col => col !== indexName);
    const data: Record<string, number[]> = {};
    for (const col of columns) {
        data[col] = rows.map(row => toNumber(row[col]));
    }

    return {
        index: rows.map(row => toNumber(row[indexName])),
        indexName,
        columns,
        data
    };
}

/** Mean/min/max ignoring NaN; NaN when a column has no finite value */
export function columnStats(values: number[]): ColumnStats {
    return {
        mean: mean(values) ?? NaN,
        min: min(values) ?? NaN,
        max: max(values) ?? NaN
    };
}
