/**
 * Table Extractor
 *
 * Turns every <table> of a document into a rectangular grid of cell text.
 */

import { load } from 'cheerio';
import { ParseError } from './errors.js';

/** Row-major cell text; every row has the width of the table's widest row */
export type RawGrid = string[][];

function cellText(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Extract all tables in document order.
 * Rows of nested tables belong to the nested table only.
 */
export function extractTables(html: string): RawGrid[] {
    const $ = load(html);
    const grids: RawGrid[] = [];

    $('table').each((_, table) => {
        const rows: string[][] = [];

        $(table)
            .find('tr')
            .filter((_, tr) => $(tr).closest('table').is(table))
            .each((_, tr) => {
                const cells = $(tr)
                    .children('th, td')
                    .toArray()
                    .map(cell => cellText($(cell).text()));
                if (cells.length > 0) rows.push(cells);
            });

        // Pad ragged rows (spanning cells) so column positions always resolve
        const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
        grids.push(rows.map(row => [...row, ...Array<string>(width - row.length).fill('')]));
    });

    return grids;
}

/**
 * Pick a table by its 1-based position in the document
 */
export function selectTable(tables: RawGrid[], tableIndex: number): RawGrid {
    if (tables.length === 0) {
        throw new ParseError('Document contains no tables', { tableIndex });
    }
    if (!Number.isInteger(tableIndex) || tableIndex < 1) {
        throw new ParseError(`Table index must be a positive integer, got ${tableIndex}`, { tableIndex });
    }
    if (tableIndex > tables.length) {
        throw new ParseError(
            `Requested table ${tableIndex} but the page has only ${tables.length} tables`,
            { tableIndex }
        );
    }
    return tables[tableIndex - 1];
}
