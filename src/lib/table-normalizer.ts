/**
 * Table Normalizer
 *
 * Brings a raw grid to a fixed schema: resolves the header row, truncates to the
 * expected width and coerces a contiguous range of columns to numbers.
 */

import { log } from 'crawlee';
import { SchemaError } from './errors.js';
import type { RawGrid } from './table-extractor.js';
import type {
    CellValue,
    CoercionWarning,
    ColumnSpec,
    HeaderPromotion,
    NormalizedTable,
    SourceDescriptor,
    TableRow,
} from './types.js';

export type NormalizeOptions = Pick<
    SourceDescriptor,
    'tableIndex' | 'expectedColumnCount' | 'numericRangeStart' | 'numericRangeEnd' | 'headerPromotion'
>;

export type CoercionResult =
    | { ok: true; value: number | null }
    | { ok: false; raw: string };

const DECIMAL_PATTERN = /^-?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Best-effort text to number. Never throws; blank cells are missing, anything
 * else that does not read as a number comes back as a failure with the raw text.
 */
export function coerceNumeric(value: CellValue): CoercionResult {
    if (value === null) return { ok: true, value: null };
    if (typeof value === 'number') {
        return { ok: true, value: Number.isFinite(value) ? value : null };
    }

    const trimmed = value.trim();
    if (trimmed === '') return { ok: true, value: null };

    const cleaned = trimmed
        .replace(/[,\s]/g, '')
        .replace(/−/g, '-')
        .replace(/^\+/, '')
        .replace(/^[£$€]/, '')
        .replace(/%$/, '');

    if (!DECIMAL_PATTERN.test(cleaned)) {
        return { ok: false, raw: value };
    }
    return { ok: true, value: Number(cleaned) };
}

/**
 * Lowercase, collapse non-alphanumeric runs to "_" and trim underscores
 */
export function canonicalizeColumnName(name: string): string {
    const canonical = name
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '_')
        .replace(/^_+|_+$/g, '');
    return canonical || 'column';
}

/**
 * Suffix repeated names with _2, _3, ... in order of appearance
 */
export function dedupeColumnNames(names: string[]): string[] {
    const used = new Set<string>();
    return names.map(name => {
        let candidate = name;
        let n = 1;
        while (used.has(candidate)) {
            n++;
            candidate = `${name}_${n}`;
        }
        used.add(candidate);
        return candidate;
    });
}

export function canonicalizeColumnNames(names: string[]): string[] {
    return dedupeColumnNames(names.map(canonicalizeColumnName));
}

export function shouldPromoteHeader(grid: RawGrid, mode: HeaderPromotion = 'auto'): boolean {
    if (mode === 'always') return true;
    if (mode === 'never') return false;
    return grid.length > 0 && grid[0].length > 0 && grid[0][0] === '';
}

/**
 * Normalize one scraped table.
 *
 * Row 0 is the header row. When it is a dirty over-header (or promotion is forced),
 * it is dropped and row 1 is promoted, with its names canonicalized. Clean headers
 * keep their scraped names.
 */
export function normalizeTable(grid: RawGrid, options: NormalizeOptions): NormalizedTable {
    const { tableIndex, expectedColumnCount, numericRangeStart } = options;

    if (!Number.isInteger(expectedColumnCount) || expectedColumnCount < 1) {
        throw new SchemaError(`Expected column count must be a positive integer, got ${expectedColumnCount}`, {
            tableIndex,
        });
    }
    if (grid.length === 0) {
        throw new SchemaError('Table has no rows', { tableIndex });
    }

    const headerPromoted = shouldPromoteHeader(grid, options.headerPromotion);
    let headerNames: string[];
    let dataRows: string[][];

    if (headerPromoted) {
        if (grid.length < 2) {
            throw new SchemaError('Header promotion needs a second row but the table has only one', {
                tableIndex,
            });
        }
        headerNames = canonicalizeColumnNames(grid[1]);
        dataRows = grid.slice(2);
    } else {
        headerNames = dedupeColumnNames(grid[0]);
        dataRows = grid.slice(1);
    }

    if (expectedColumnCount > headerNames.length) {
        throw new SchemaError(
            `Expected ${expectedColumnCount} columns but the table has ${headerNames.length}`,
            { tableIndex }
        );
    }

    const rangeEnd = Math.min(options.numericRangeEnd ?? expectedColumnCount, expectedColumnCount);
    const columns: ColumnSpec[] = headerNames.slice(0, expectedColumnCount).map((name, i): ColumnSpec => {
        const position = i + 1;
        return {
            name,
            kind: position >= numericRangeStart && position <= rangeEnd ? 'numeric' : 'text',
        };
    });

    log.debug(`[Normalizer/table ${tableIndex}] Columns: ${columns.map(c => c.name).join(', ')}`);

    const warnings: CoercionWarning[] = [];
    const rows = dataRows.map((cells, rowIndex) => {
        const row: TableRow = {};
        columns.forEach((column, c) => {
            const raw = cells[c] ?? '';
            if (column.kind === 'text') {
                row[column.name] = raw;
                return;
            }

            const result = coerceNumeric(raw);
            if (result.ok) {
                row[column.name] = result.value;
            } else {
                row[column.name] = null;
                warnings.push({ column: column.name, row: rowIndex + 1, raw: result.raw });
            }
        });
        return row;
    });

    return { columns, rows, headerPromoted, warnings };
}
