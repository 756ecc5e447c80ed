import { log } from 'crawlee';
import type { FailurePolicy } from './crawl.config.js';
import { PipelineError, SchemaError, describeError } from './errors.js';
import { extractTables, selectTable } from './table-extractor.js';
import { normalizeTable } from './table-normalizer.js';
import type { ColumnSpec, CombinedTable, NormalizedTable, SourceDescriptor, TableRow } from './types.js';

export const LEAGUE_COLUMN = 'league';

export type LeagueStatus = 'fetching' | 'normalizing' | 'done' | 'skipped' | 'failed';

export interface LeagueStatusDetail {
    rows?: number;
    error?: string;
}

/** Anything that can turn a source id into page HTML; PageFetcher in production */
export interface PageSource {
    fetch(sourceId: string): Promise<string>;
}

export interface BuildCombinedOptions {
    fetcher: PageSource;
    failurePolicy?: FailurePolicy;
    onLeagueStatus?: (league: string, status: LeagueStatus, detail?: LeagueStatusDetail) => void;
}

/**
 * Fetch, extract and normalize a single league's table
 */
export async function loadLeagueTable(
    descriptor: SourceDescriptor,
    fetcher: PageSource,
    onStatus?: (status: LeagueStatus) => void
): Promise<NormalizedTable> {
    onStatus?.('fetching');
    const html = await fetcher.fetch(descriptor.sourceId);

    onStatus?.('normalizing');
    const tables = extractTables(html);
    log.debug(`[Iterator/${descriptor.label}] Found ${tables.length} tables`);

    const grid = selectTable(tables, descriptor.tableIndex);
    const table = normalizeTable(grid, descriptor);

    if (table.warnings.length > 0) {
        const sample = table.warnings
            .slice(0, 3)
            .map(w => `${w.column} row ${w.row}: "${w.raw}"`)
            .join('; ');
        log.warning(
            `[Normalizer/${descriptor.label}] ${table.warnings.length} cells stored as missing (${sample})`
        );
    }
    return table;
}

function assertSameSchema(expected: ColumnSpec[], actual: ColumnSpec[], descriptor: SourceDescriptor): void {
    const width = Math.max(expected.length, actual.length);
    for (let i = 0; i < width; i++) {
        const want = expected[i]?.name;
        const got = actual[i]?.name;
        if (want !== got) {
            throw new SchemaError(
                `Column ${i + 1} is "${got ?? '(none)'}" but earlier leagues have "${want ?? '(none)'}"`,
                { league: descriptor.label, tableIndex: descriptor.tableIndex, column: got ?? want }
            );
        }
    }
}

/**
 * Build one table out of every league's table, tagging each row with its league label.
 * Leagues are processed strictly in order, one at a time.
 */
export async function buildCombined(
    descriptors: SourceDescriptor[],
    options: BuildCombinedOptions
): Promise<CombinedTable> {
    const failurePolicy = options.failurePolicy ?? 'abort';
    const combined: CombinedTable = { columns: [], rows: [], leagues: [], skipped: [], warnings: [] };
    let schema: ColumnSpec[] | null = null;

    for (const descriptor of descriptors) {
        const { label, tableIndex } = descriptor;

        try {
            const table = await loadLeagueTable(descriptor, options.fetcher, status =>
                options.onLeagueStatus?.(label, status)
            );

            if (table.columns.some(column => column.name === LEAGUE_COLUMN)) {
                throw new SchemaError(`Scraped table already has a "${LEAGUE_COLUMN}" column`, {
                    column: LEAGUE_COLUMN,
                });
            }

            if (schema === null) {
                schema = table.columns;
                combined.columns = [...table.columns, { name: LEAGUE_COLUMN, kind: 'text' }];
            } else {
                assertSameSchema(schema, table.columns, descriptor);
            }

            for (const row of table.rows) {
                const tagged: TableRow = { ...row, [LEAGUE_COLUMN]: label };
                combined.rows.push(tagged);
            }
            for (const warning of table.warnings) {
                combined.warnings.push({ ...warning, league: label });
            }
            combined.leagues.push(label);

            log.info(`[Iterator/${label}] Added ${table.rows.length} rows`);
            options.onLeagueStatus?.(label, 'done', { rows: table.rows.length });
        } catch (error) {
            if (error instanceof PipelineError) {
                error.annotate({ league: label, tableIndex });
            }
            const message = describeError(error);

            if (failurePolicy === 'skip') {
                log.warning(`[Iterator/${label}] Skipping league: ${message}`);
                combined.skipped.push({ league: label, tableIndex, error: message });
                options.onLeagueStatus?.(label, 'skipped', { error: message });
                continue;
            }

            log.error(`[Iterator/${label}] Aborting build: ${message}`);
            options.onLeagueStatus?.(label, 'failed', { error: message });
            throw error;
        }
    }

    return combined;
}
