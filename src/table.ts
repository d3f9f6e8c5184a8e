/**
 * Table adapter - reads card fields from loosely-typed table rows
 * (a parsed spreadsheet or JSON export) through a column mapping.
 */

import { z } from 'zod';
import { GridConfig, RecordFields } from './types.js';
import { InvalidConfigError } from './errors.js';
import { formatIssues } from './config.js';
import { runCardGridPipeline, LayoutResult } from './layout/index.js';

export type TableRow = Readonly<Record<string, unknown>>;

export const TableColumnsSchema = z
    .object({
        section: z.string().min(1),
        title: z.string().min(1),
        subtitle: z.string().min(1),
        image: z.string().min(1).optional(),      // No column: every card gets a placeholder
        rowIndex: z.string().min(1).optional(),   // No column: position in the row list
    })
    .strict();

/** Which column holds each card field */
export type TableColumns = z.infer<typeof TableColumnsSchema>;

export function parseTableColumns(input: unknown): TableColumns {
    const result = TableColumnsSchema.safeParse(input);
    if (!result.success) {
        throw new InvalidConfigError(formatIssues(result.error));
    }
    return result.data;
}

/**
 * Build field accessors for table rows.
 */
export function tableFields(columns: TableColumns): RecordFields<TableRow> {
    const fields: RecordFields<TableRow> = {
        sectionKey: row => {
            const value = row[columns.section];
            return value === null || value === undefined ? null : cellText(value);
        },
        title: row => cellText(row[columns.title]),
        subtitle: row => cellText(row[columns.subtitle]),
        image: row => {
            if (columns.image === undefined) return null;
            const value = row[columns.image];
            return typeof value === 'string' && value.trim() !== '' ? value : null;
        }
    };

    const indexColumn = columns.rowIndex;
    if (indexColumn === undefined) return fields;

    return {
        ...fields,
        rowIndex: row => {
            const value = row[indexColumn];
            if (typeof value !== 'number' || !Number.isFinite(value)) {
                throw new InvalidConfigError([`${indexColumn}: row index must be a finite number, got ${JSON.stringify(value)}`]);
            }
            return value;
        }
    };
}

/**
 * Lay out table rows in one call.
 */
export function layoutTable(
    rows: readonly TableRow[],
    columns: TableColumns,
    config: GridConfig
): LayoutResult<TableRow> {
    return runCardGridPipeline({ records: rows, fields: tableFields(columns), config });
}

/** Cell value as display text; empty for missing cells */
export function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
    return JSON.stringify(value);
}
