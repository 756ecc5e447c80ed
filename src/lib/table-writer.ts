import { promises as fs } from 'fs';
import { join } from 'path';
import { stringify } from 'csv-stringify/sync';
import { log } from 'crawlee';
import type { CellValue, DataTable } from './types.js';

function formatCell(value: CellValue | undefined): string {
    if (value === null || value === undefined) return '';
    if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
    return value;
}

/**
 * Render a table as CSV: a header row of column names, then one line per row
 */
export function toCsv(table: DataTable): string {
    const header = table.columns.map(column => column.name);
    const records = table.rows.map(row => table.columns.map(column => formatCell(row[column.name])));
    return stringify([header, ...records]);
}

/**
 * Writes one output table to a flat file, replacing it on every run
 */
export class TableWriter {
    readonly filePath: string;

    constructor(
        private readonly outputDir: string,
        fileName: string
    ) {
        this.filePath = join(outputDir, fileName);
    }

    async write(table: DataTable): Promise<string> {
        await fs.mkdir(this.outputDir, { recursive: true });

        // Here we write to a temporary file first so readers never see a half-written table
        const tempPath = `${this.filePath}.tmp`;
        await fs.writeFile(tempPath, toCsv(table), 'utf-8');
        await fs.rename(tempPath, this.filePath);

        log.info(`[Writer] Wrote ${table.rows.length} rows to ${this.filePath}`);
        return this.filePath;
    }
}
