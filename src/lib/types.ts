/**
 * Shared table and descriptor types
 */

/** `null` is the missing-value marker */
export type CellValue = string | number | null;

export type TableRow = Record<string, CellValue>;

export type ColumnKind = 'text' | 'numeric';

export interface ColumnSpec {
    name: string;
    kind: ColumnKind;
}

/**
 * How the normalizer decides whether row 0 is a throwaway over-header.
 * - auto: promote when the first cell of row 0 is empty
 * - always / never: skip the guess
 */
export type HeaderPromotion = 'auto' | 'always' | 'never';

/**
 * One league's page, target table and expected schema
 */
export interface SourceDescriptor {
    label: string;
    sourceId: string;
    /** 1-based position of the table on the page */
    tableIndex: number;
    expectedColumnCount: number;
    /** 1-based column position where numeric coercion starts */
    numericRangeStart: number;
    /** 1-based, inclusive; defaults to expectedColumnCount */
    numericRangeEnd?: number;
    headerPromotion?: HeaderPromotion;
}

/** A cell that could not be read as a number and was stored as missing */
export interface CoercionWarning {
    column: string;
    /** 1-based data row */
    row: number;
    raw: string;
}

export interface DataTable {
    columns: ColumnSpec[];
    rows: TableRow[];
}

export interface NormalizedTable extends DataTable {
    headerPromoted: boolean;
    warnings: CoercionWarning[];
}

export interface LeagueCoercionWarning extends CoercionWarning {
    league: string;
}

export interface SkippedLeague {
    league: string;
    tableIndex: number;
    error: string;
}

export interface CombinedTable extends DataTable {
    /** Labels of the leagues that made it into the table, in input order */
    leagues: string[];
    skipped: SkippedLeague[];
    warnings: LeagueCoercionWarning[];
}
