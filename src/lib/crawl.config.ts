/**
 * Crawl Configuration
 *
 * Centralized run settings with environment variable support.
 * Defaults are tuned for fbref.com, which bans clients that go above ~10 requests a minute.
 */

import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export type FailurePolicy = 'abort' | 'skip';

export type CrawlLogLevel = 'debug' | 'info' | 'warning' | 'error';

export interface CrawlConfig {
    baseUrl: string;
    // Minimum gap between two requests to the same host
    minDelayMs: number;
    timeoutSecs: number;
    failurePolicy: FailurePolicy;
    outputDir: string;
    datasetsPath: string;
    logLevel: CrawlLogLevel;
}

function parseFailurePolicy(value: string | undefined): FailurePolicy {
    if (value === undefined || value === '') return 'abort';
    if (value === 'abort' || value === 'skip') return value;
    throw new Error(`CRAWL_FAILURE_POLICY must be "abort" or "skip", got "${value}"`);
}

function parseLogLevel(value: string | undefined): CrawlLogLevel {
    switch (value) {
        case 'debug':
        case 'warning':
        case 'error':
            return value;
        default:
            return 'info';
    }
}

export function loadCrawlConfig(env: NodeJS.ProcessEnv = process.env): CrawlConfig {
    return {
        baseUrl: (env.CRAWL_BASE_URL || 'https://fbref.com/en/comps').replace(/\/+$/, ''),
        minDelayMs: parseInt(env.CRAWL_MIN_DELAY_MS || '6000', 10),
        timeoutSecs: parseInt(env.CRAWL_TIMEOUT_SECS || '30', 10),
        failurePolicy: parseFailurePolicy(env.CRAWL_FAILURE_POLICY),
        outputDir: env.CRAWL_OUTPUT_DIR || join(__dirname, '../../data'),
        datasetsPath: env.CRAWL_DATASETS_PATH || join(__dirname, '../../config/datasets.json'),
        logLevel: parseLogLevel(env.CRAWL_LOG_LEVEL),
    };
}

export const crawlConfig: CrawlConfig = loadCrawlConfig();
