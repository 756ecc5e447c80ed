/**
 * Derived Metrics
 *
 * Post-processing over a combined table. Each function returns a new table with the
 * derived columns appended; missing inputs and zero denominators give missing values.
 */

import { SchemaError } from './errors.js';
import type { CellValue, ColumnSpec, DataTable, TableRow } from './types.js';

/**
 * Source columns of the squad metrics. Defaults are the canonical names of the
 * site's standard squad stats table.
 */
export interface SquadMetricColumns {
    goals: string;
    matchesPlayed: string;
    assists: string;
    yellowCards: string;
    redCards: string;
    totalMinutes: string;
    numberOfPlayers: string;
}

export const DEFAULT_SQUAD_COLUMNS: SquadMetricColumns = {
    goals: 'gls',
    matchesPlayed: 'mp',
    assists: 'ast',
    yellowCards: 'crdy',
    redCards: 'crdr',
    totalMinutes: 'min',
    numberOfPlayers: 'pl',
};

export const DEFAULT_SCORER_COLUMN = 'Top Team Scorer';

export interface ScorerSplit {
    name: string | null;
    goals: number | null;
}

const SCORER_PATTERN = /^(.+?)\s*-\s*(\d+)$/;

function requireColumns(table: DataTable, names: string[]): void {
    for (const name of names) {
        if (!table.columns.some(column => column.name === name)) {
            throw new SchemaError(`Derived metrics need column "${name}" which the table does not have`, {
                column: name,
            });
        }
    }
}

function numberOf(value: CellValue | undefined): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function safeDivide(numerator: number | null, denominator: number | null): number | null {
    if (numerator === null || denominator === null || denominator === 0) return null;
    return numerator / denominator;
}

function appendColumns(table: DataTable, added: ColumnSpec[], derive: (row: TableRow) => TableRow): DataTable {
    return {
        columns: [...table.columns, ...added],
        rows: table.rows.map(row => ({ ...row, ...derive(row) })),
    };
}

export function deriveSquadMetrics(
    table: DataTable,
    columns: SquadMetricColumns = DEFAULT_SQUAD_COLUMNS
): DataTable {
    requireColumns(table, Object.values(columns));

    return appendColumns(
        table,
        [
            { name: 'goals_per_game', kind: 'numeric' },
            { name: 'assist_rate', kind: 'numeric' },
            { name: 'discipline_score', kind: 'numeric' },
            { name: 'minutes_per_player', kind: 'numeric' },
        ],
        row => {
            const goals = numberOf(row[columns.goals]);
            const yellow = numberOf(row[columns.yellowCards]);
            const red = numberOf(row[columns.redCards]);

            return {
                goals_per_game: safeDivide(goals, numberOf(row[columns.matchesPlayed])),
                assist_rate: safeDivide(numberOf(row[columns.assists]), goals),
                discipline_score: yellow === null || red === null ? null : yellow + 2 * red,
                minutes_per_player: safeDivide(
                    numberOf(row[columns.totalMinutes]),
                    numberOf(row[columns.numberOfPlayers])
                ),
            };
        }
    );
}

/**
 * Split a "name - goals" cell, e.g. "Erling Haaland - 27"
 */
export function splitScorer(value: CellValue | undefined): ScorerSplit {
    if (typeof value !== 'string') return { name: null, goals: null };

    const match = SCORER_PATTERN.exec(value.trim());
    if (!match) return { name: null, goals: null };

    return { name: match[1].trim(), goals: parseInt(match[2], 10) };
}

export function deriveStandingsMetrics(table: DataTable, scorerColumn: string = DEFAULT_SCORER_COLUMN): DataTable {
    requireColumns(table, [scorerColumn]);

    return appendColumns(
        table,
        [
            { name: 'top_scorer', kind: 'text' },
            { name: 'top_scorer_goals', kind: 'numeric' },
        ],
        row => {
            const { name, goals } = splitScorer(row[scorerColumn]);
            return { top_scorer: name, top_scorer_goals: goals };
        }
    );
}
