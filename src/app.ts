import React from 'react';
import { render } from 'ink';
import { log, LoggerText, LogLevel } from 'crawlee';
import { crawlConfig, type CrawlLogLevel } from './lib/crawl.config.js';
import { describeError } from './lib/errors.js';
import { PipelineManager, type DatasetResult } from './lib/pipeline-manager.js';
import { Dashboard } from './ui/Dashboard.js';
import { getLogHandler } from './ui/log-store.js';

const LOG_LEVELS: Record<CrawlLogLevel, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warning: LogLevel.WARNING,
    error: LogLevel.ERROR,
};

async function main(): Promise<number> {
    const interactive = process.stdout.isTTY === true;

    // Route crawlee logs into the dashboard when it owns the terminal
    log.setOptions({
        level: LOG_LEVELS[crawlConfig.logLevel],
        ...(interactive ? { logger: getLogHandler() } : {}),
    });

    const pipelineManager = new PipelineManager();
    await pipelineManager.loadDatasets();

    const ui = interactive ? render(React.createElement(Dashboard, { pipelineManager })) : null;

    let outcome: { results: Map<string, DatasetResult> } | { error: unknown };
    try {
        outcome = { results: await pipelineManager.runAll() };
    } catch (error) {
        outcome = { error };
    } finally {
        if (ui) {
            ui.unmount();
            log.setOptions({ logger: new LoggerText() });
        }
    }

    if ('error' in outcome) {
        log.error(`Run aborted: ${describeError(outcome.error)}`);
        return 1;
    }

    for (const result of outcome.results.values()) {
        const skipped = result.combined.skipped.length;
        if (result.outputPath === null) {
            log.warning(`${result.name}: no league succeeded (${skipped} skipped), nothing written`);
            continue;
        }
        log.info(
            `${result.name}: ${result.table.rows.length} rows from ${result.combined.leagues.length} leagues` +
                (skipped > 0 ? ` (${skipped} skipped)` : '') +
                ` -> ${result.outputPath}`
        );
    }
    return 0;
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        // Fallback error reporting if the UI or configuration fails
        console.error(`Fatal error: ${describeError(error)}`);
        process.exitCode = 1;
    });
