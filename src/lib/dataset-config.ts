/**
 * Dataset configuration: which leagues to scrape, where their tables sit and
 * which derived metrics each output table gets.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { DEFAULT_SCORER_COLUMN, DEFAULT_SQUAD_COLUMNS } from './derived-metrics.js';

const positiveInt = z.number().int().min(1);

export const sourceDescriptorSchema = z
    .object({
        label: z.string().min(1),
        sourceId: z.string().min(1),
        tableIndex: positiveInt,
        expectedColumnCount: positiveInt,
        numericRangeStart: positiveInt,
        numericRangeEnd: positiveInt.optional(),
        headerPromotion: z.enum(['auto', 'always', 'never']).optional(),
    })
    .refine(d => d.numericRangeEnd === undefined || d.numericRangeEnd >= d.numericRangeStart, {
        message: 'numericRangeEnd must not be before numericRangeStart',
        path: ['numericRangeEnd'],
    });

const squadColumnsSchema = z.object({
    goals: z.string().default(DEFAULT_SQUAD_COLUMNS.goals),
    matchesPlayed: z.string().default(DEFAULT_SQUAD_COLUMNS.matchesPlayed),
    assists: z.string().default(DEFAULT_SQUAD_COLUMNS.assists),
    yellowCards: z.string().default(DEFAULT_SQUAD_COLUMNS.yellowCards),
    redCards: z.string().default(DEFAULT_SQUAD_COLUMNS.redCards),
    totalMinutes: z.string().default(DEFAULT_SQUAD_COLUMNS.totalMinutes),
    numberOfPlayers: z.string().default(DEFAULT_SQUAD_COLUMNS.numberOfPlayers),
});

const deriveSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('squad'),
        columns: squadColumnsSchema.default({}),
    }),
    z.object({
        kind: z.literal('standings'),
        scorerColumn: z.string().default(DEFAULT_SCORER_COLUMN),
    }),
    z.object({ kind: z.literal('none') }),
]);

export const datasetSchema = z.object({
    name: z.string().min(1),
    output: z.string().min(1),
    derive: deriveSchema.default({ kind: 'none' }),
    leagues: z.array(sourceDescriptorSchema),
});

export const datasetsFileSchema = z.object({
    datasets: z.array(datasetSchema),
});

export type DatasetConfig = z.infer<typeof datasetSchema>;
export type DeriveConfig = z.infer<typeof deriveSchema>;

export function parseDatasetsFile(json: unknown): DatasetConfig[] {
    const result = datasetsFileSchema.safeParse(json);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid dataset configuration: ${issues}`);
    }

    const names = new Set<string>();
    for (const dataset of result.data.datasets) {
        if (names.has(dataset.name)) {
            throw new Error(`Invalid dataset configuration: duplicate dataset name "${dataset.name}"`);
        }
        names.add(dataset.name);

        const labels = new Set<string>();
        for (const league of dataset.leagues) {
            if (labels.has(league.label)) {
                throw new Error(
                    `Invalid dataset configuration: league "${league.label}" appears twice in "${dataset.name}"`
                );
            }
            labels.add(league.label);
        }
    }
    return result.data.datasets;
}

export async function loadDatasetsFile(path: string): Promise<DatasetConfig[]> {
    const content = await readFile(path, 'utf-8');
    return parseDatasetsFile(JSON.parse(content));
}
