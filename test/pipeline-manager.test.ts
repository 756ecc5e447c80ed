import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { PipelineManager, type DatasetResult, type LeagueState } from '../src/lib/pipeline-manager.js';
import { loadCrawlConfig } from '../src/lib/crawl.config.js';
import { parseDatasetsFile } from '../src/lib/dataset-config.js';
import { FetchError } from '../src/lib/errors.js';
import { FakePageSource } from './helpers/fake-source.js';
import { pageHtml } from './helpers/html.js';

// Squad table with the site's two-row header: a group row with an empty first cell, then the real names
const SQUAD_PAGE = pageHtml([
    `<table>
        <thead>
            <tr><th></th><th></th><th colspan="2">Playing Time</th><th colspan="4">Performance</th></tr>
            <tr><th>Squad</th><th># Pl</th><th>MP</th><th>Min</th><th>Gls</th><th>Ast</th><th>CrdY</th><th>CrdR</th><th>xG</th></tr>
        </thead>
        <tbody>
            <tr><th>Arsenal</th><td>25</td><td>38</td><td>3,420</td><td>68</td><td>50</td><td>60</td><td>2</td><td>70.1</td></tr>
            <tr><th>Chelsea</th><td>30</td><td>38</td><td>3,420</td><td>0</td><td>4</td><td>—</td><td>1</td><td>55.0</td></tr>
        </tbody>
    </table>`,
]);

const DATASETS = parseDatasetsFile({
    datasets: [
        {
            name: 'squad-stats',
            output: 'squad_stats.csv',
            derive: { kind: 'squad' },
            leagues: [
                { label: 'Premier League', sourceId: '9/Premier-League-Stats', tableIndex: 1, expectedColumnCount: 8, numericRangeStart: 2 },
                { label: 'Serie A', sourceId: '11/Serie-A-Stats', tableIndex: 1, expectedColumnCount: 8, numericRangeStart: 2 },
            ],
        },
    ],
});

describe('PipelineManager', () => {
    let outputDir: string;

    beforeEach(async () => {
        outputDir = await fs.mkdtemp(join(tmpdir(), 'league-stats-'));
    });

    afterEach(async () => {
        await fs.rm(outputDir, { recursive: true, force: true });
    });

    function createManager(failurePolicy: 'abort' | 'skip', serieA: string | Error): PipelineManager {
        const config = { ...loadCrawlConfig({}), outputDir, failurePolicy };
        const fetcher = new FakePageSource({ '9/Premier-League-Stats': SQUAD_PAGE, '11/Serie-A-Stats': serieA });
        const manager = new PipelineManager({ config, fetcher });
        manager.setDatasets(DATASETS);
        return manager;
    }

    it('should start every league as queued', () => {
        const manager = createManager('abort', SQUAD_PAGE);

        expect(manager.getDatasetNames()).toEqual(['squad-stats']);
        expect(manager.getAllStates()).toEqual([
            { dataset: 'squad-stats', league: 'Premier League', status: 'queued', rows: 0 },
            { dataset: 'squad-stats', league: 'Serie A', status: 'queued', rows: 0 },
        ]);
    });

    it('should build, derive and write each dataset', async () => {
        const manager = createManager('abort', SQUAD_PAGE);

        const results = await manager.runAll();
        const result = results.get('squad-stats');

        expect(result?.table.rows).toHaveLength(4);
        expect(result?.table.columns.map(c => c.name)).toEqual([
            'squad', 'pl', 'mp', 'min', 'gls', 'ast', 'crdy', 'crdr', 'league',
            'goals_per_game', 'assist_rate', 'discipline_score', 'minutes_per_player',
        ]);
        expect(result?.table.rows[1]).toMatchObject({
            squad: 'Chelsea',
            min: 3420,
            crdy: null,
            league: 'Premier League',
            goals_per_game: 0,
            assist_rate: null,
            discipline_score: null,
            minutes_per_player: 114,
        });
        expect(result?.combined.warnings).toEqual([
            { column: 'crdy', row: 2, raw: '—', league: 'Premier League' },
            { column: 'crdy', row: 2, raw: '—', league: 'Serie A' },
        ]);

        const csv = await fs.readFile(join(outputDir, 'squad_stats.csv'), 'utf-8');
        const lines = csv.trimEnd().split('\n');
        expect(lines).toHaveLength(5);
        expect(lines[0]).toBe(
            'squad,pl,mp,min,gls,ast,crdy,crdr,league,goals_per_game,assist_rate,discipline_score,minutes_per_player'
        );
        expect(lines[2]).toBe('Chelsea,30,38,3420,0,4,,1,Premier League,0,,,114');
    });

    it('should emit state updates as leagues finish', async () => {
        const manager = createManager('abort', SQUAD_PAGE);
        const updates: LeagueState[][] = [];
        manager.on('state-update', (states: LeagueState[]) => updates.push(states));

        await manager.runAll();

        expect(updates.at(-1)).toEqual([
            { dataset: 'squad-stats', league: 'Premier League', status: 'done', rows: 2 },
            { dataset: 'squad-stats', league: 'Serie A', status: 'done', rows: 2 },
        ]);
    });

    it('should abort the run and write nothing when a league fails under the abort policy', async () => {
        const manager = createManager('abort', new FetchError('Request to x returned HTTP 429', 'x', 429));

        await expect(manager.runAll()).rejects.toThrow('Request to x returned HTTP 429');
        await expect(fs.readdir(outputDir)).resolves.toEqual([]);
        expect(manager.getAllStates()[1]).toEqual({
            dataset: 'squad-stats',
            league: 'Serie A',
            status: 'failed',
            rows: 0,
            detail: '[Serie A/table 1] FetchError: Request to x returned HTTP 429',
        });
    });

    it('should write the leagues that succeeded under the skip policy', async () => {
        const manager = createManager('skip', new FetchError('Request to x returned HTTP 429', 'x', 429));

        const result = (await manager.runAll()).get('squad-stats');

        expect(result?.combined.leagues).toEqual(['Premier League']);
        expect(result?.combined.skipped).toHaveLength(1);
        expect(result?.table.rows).toHaveLength(2);
        expect(manager.getAllStates()[1].status).toBe('skipped');
    });

    it('should report each finished dataset through dataset-complete', async () => {
        const manager = createManager('abort', SQUAD_PAGE);
        const completed: DatasetResult[] = [];
        manager.on('dataset-complete', (result: DatasetResult) => completed.push(result));

        await manager.runAll();

        expect(completed.map(result => result.name)).toEqual(['squad-stats']);
        expect(completed[0].outputPath).toBe(join(outputDir, 'squad_stats.csv'));
        expect(completed[0].table.rows).toHaveLength(4);
    });

    it('should finish the run without writing when every league is skipped', async () => {
        const config = { ...loadCrawlConfig({}), outputDir, failurePolicy: 'skip' as const };
        const fetcher = new FakePageSource({
            '9/Premier-League-Stats': new FetchError('Request to x failed: connection refused', 'x'),
            '11/Serie-A-Stats': new FetchError('Request to y failed: connection refused', 'y'),
        });
        const manager = new PipelineManager({ config, fetcher });
        manager.setDatasets(DATASETS);

        const result = (await manager.runAll()).get('squad-stats');

        expect(result?.outputPath).toBeNull();
        expect(result?.combined.leagues).toEqual([]);
        expect(result?.combined.skipped.map(skip => skip.league)).toEqual(['Premier League', 'Serie A']);
        expect(result?.table.columns).toEqual([]);
        expect(result?.table.rows).toEqual([]);
        expect(manager.getAllStates().map(state => state.status)).toEqual(['skipped', 'skipped']);
        await expect(fs.readdir(outputDir)).resolves.toEqual([]);
    });
});
