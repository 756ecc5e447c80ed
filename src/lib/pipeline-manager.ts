import { EventEmitter } from 'events';
import { log } from 'crawlee';
import { crawlConfig, type CrawlConfig } from './crawl.config.js';
import { loadDatasetsFile, type DatasetConfig, type DeriveConfig } from './dataset-config.js';
import { deriveSquadMetrics, deriveStandingsMetrics } from './derived-metrics.js';
import { buildCombined, type LeagueStatus, type PageSource } from './league-iterator.js';
import { PageFetcher } from './page-fetcher.js';
import { TableWriter } from './table-writer.js';
import type { CombinedTable, DataTable } from './types.js';

export type LeagueRunStatus = 'queued' | LeagueStatus;

export interface LeagueState {
    dataset: string;
    league: string;
    status: LeagueRunStatus;
    rows: number;
    detail?: string;
}

export interface DatasetResult {
    name: string;
    combined: CombinedTable;
    table: DataTable;
    // null when no league made it into the table and nothing was written
    outputPath: string | null;
}

export interface PipelineManagerOptions {
    config?: CrawlConfig;
    // A shared fetcher keeps one politeness throttle across every dataset of the run
    fetcher?: PageSource;
}

export function applyDerivedMetrics(table: DataTable, derive: DeriveConfig): DataTable {
    switch (derive.kind) {
        case 'squad':
            return deriveSquadMetrics(table, derive.columns);
        case 'standings':
            return deriveStandingsMetrics(table, derive.scorerColumn);
        case 'none':
            return table;
    }
}

/**
 * Runs every configured dataset once, in order, and reports per-league progress
 * through 'state-update' events.
 */
export class PipelineManager extends EventEmitter {
    private readonly config: CrawlConfig;
    private readonly fetcher: PageSource;
    private datasets: DatasetConfig[] = [];
    private states: Map<string, LeagueState> = new Map();
    private isRunning = false;

    constructor(options: PipelineManagerOptions = {}) {
        super();
        this.config = options.config ?? crawlConfig;
        this.fetcher =
            options.fetcher ??
            new PageFetcher({
                baseUrl: this.config.baseUrl,
                minDelayMs: this.config.minDelayMs,
                timeoutSecs: this.config.timeoutSecs,
            });
    }

    async loadDatasets(configPath?: string): Promise<void> {
        this.setDatasets(await loadDatasetsFile(configPath ?? this.config.datasetsPath));
    }

    setDatasets(datasets: DatasetConfig[]): void {
        this.datasets = datasets;
        this.states.clear();
        for (const dataset of datasets) {
            for (const descriptor of dataset.leagues) {
                this.states.set(this.stateKey(dataset.name, descriptor.label), {
                    dataset: dataset.name,
                    league: descriptor.label,
                    status: 'queued',
                    rows: 0,
                });
            }
        }
        log.info(`Loaded ${datasets.length} datasets`);
        this.emit('state-update', this.getAllStates());
    }

    async runDataset(dataset: DatasetConfig): Promise<DatasetResult> {
        log.info(`[Pipeline/${dataset.name}] Building from ${dataset.leagues.length} leagues`);

        const combined = await buildCombined(dataset.leagues, {
            fetcher: this.fetcher,
            failurePolicy: this.config.failurePolicy,
            onLeagueStatus: (league, status, detail) => {
                this.updateState(this.stateKey(dataset.name, league), {
                    status,
                    ...(detail?.rows !== undefined ? { rows: detail.rows } : {}),
                    ...(detail?.error !== undefined ? { detail: detail.error } : {}),
                });
            },
        });

        let result: DatasetResult;
        if (combined.leagues.length === 0) {
            log.warning(
                `[Pipeline/${dataset.name}] No league succeeded (${combined.skipped.length} skipped), nothing written`
            );
            result = { name: dataset.name, combined, table: combined, outputPath: null };
        } else {
            const table = applyDerivedMetrics(combined, dataset.derive);
            const outputPath = await new TableWriter(this.config.outputDir, dataset.output).write(table);
            result = { name: dataset.name, combined, table, outputPath };
        }

        this.emit('dataset-complete', result);
        return result;
    }

    async runAll(): Promise<Map<string, DatasetResult>> {
        if (this.isRunning) {
            throw new Error('PipelineManager already running');
        }

        this.isRunning = true;
        const results: Map<string, DatasetResult> = new Map();
        try {
            for (const dataset of this.datasets) {
                results.set(dataset.name, await this.runDataset(dataset));
            }
        } finally {
            this.isRunning = false;
        }

        log.info(`Finished ${results.size} datasets`);
        return results;
    }

    getDatasetNames(): string[] {
        return this.datasets.map(dataset => dataset.name);
    }

    getAllStates(): LeagueState[] {
        return Array.from(this.states.values());
    }

    private stateKey(dataset: string, league: string): string {
        return `${dataset}-${league}`;
    }

    private updateState(key: string, updates: Partial<LeagueState>) {
        const current = this.states.get(key);
        if (current) {
            const newState = { ...current, ...updates };
            this.states.set(key, newState);
            this.emit('state-update', this.getAllStates());
        }
    }
}
