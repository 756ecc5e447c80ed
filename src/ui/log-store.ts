import { Logger, LogLevel } from 'crawlee';
import { EventEmitter } from 'events';
import { appendFile, mkdir } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const LOG_DIR = join(__dirname, '../../logs');
const LOG_FILE = join(LOG_DIR, 'debug.log');

export type LogEntryLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: string;
    level: LogEntryLevel;
    message: string;
}

export class LogStore extends EventEmitter {
    private logs: LogEntry[] = [];
    private ready: Promise<void> | null = null;

    constructor(
        private readonly logFile: string | null = LOG_FILE,
        private readonly maxLogs = 1000
    ) {
        super();
    }

    add(level: LogEntryLevel, message: string) {
        const entry: LogEntry = {
            timestamp: new Date().toLocaleTimeString(),
            level,
            message
        };

        this.logs.push(entry);
        if (this.logs.length > this.maxLogs) {
            this.logs.shift();
        }
        this.emit('log', entry);

        if (this.logFile) {
            this.appendToFile(`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}\n`, this.logFile);
        }
    }

    getLogs(count = 50): LogEntry[] {
        return this.logs.slice(-count);
    }

    private appendToFile(line: string, file: string) {
        this.ready ??= mkdir(dirname(file), { recursive: true }).then(() => undefined);
        this.ready
            .then(() => appendFile(file, line))
            .catch(err => {
                // The dashboard owns stdout, stderr is the only place left
                console.error('Failed to write log:', err);
            });
    }
}

export const logStore = new LogStore();

export function toStoreLevel(level: LogLevel): LogEntryLevel {
    switch (level) {
        case LogLevel.ERROR:
        case LogLevel.SOFT_FAIL:
            return 'error';
        case LogLevel.WARNING:
            return 'warn';
        default:
            return 'info';
    }
}

// Custom logger to route crawlee logs into the dashboard and the debug log file
export class DashboardLogger extends Logger {
    constructor(private readonly store: LogStore = logStore) {
        super({
            prefix: 'Crawl',
        });
    }

    override _log(
        level: LogLevel,
        message: string,
        data?: unknown,
        exception?: unknown,
        opts?: Record<string, unknown>
    ): void {
        let finalMessage = message;
        if (exception) {
            finalMessage += ` - ${exception instanceof Error ? exception.message : String(exception)}`;
        }

        this.store.add(toStoreLevel(level), finalMessage);
    }
}

export function getLogHandler(store: LogStore = logStore) {
    return new DashboardLogger(store);
}
