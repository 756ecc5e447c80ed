/**
 * Pipeline Error Types
 *
 * Every failure raised while fetching, extracting or normalizing a league's table
 * carries the league, table and column it happened on, so a multi-league run can
 * report exactly where it stopped.
 */

export interface ErrorContext {
    league?: string;
    tableIndex?: number;
    column?: string;
}

export class PipelineError extends Error {
    league?: string;
    tableIndex?: number;
    column?: string;

    constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineError';
        this.league = context.league;
        this.tableIndex = context.tableIndex;
        this.column = context.column;
    }

    /**
     * Fill in context that was unknown where the error was raised.
     * Values already set are kept.
     */
    annotate(context: ErrorContext): this {
        this.league ??= context.league;
        this.tableIndex ??= context.tableIndex;
        this.column ??= context.column;
        return this;
    }
}

/** Network failure, timeout, non-2xx status or a blocked page */
export class FetchError extends PipelineError {
    readonly url: string;
    readonly status?: number;

    constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
        super(message, {}, options);
        this.name = 'FetchError';
        this.url = url;
        this.status = status;
    }
}

/** No tables in the document, or the requested table does not exist */
export class ParseError extends PipelineError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, context);
        this.name = 'ParseError';
    }
}

/** The table cannot be brought to the expected schema */
export class SchemaError extends PipelineError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, context);
        this.name = 'SchemaError';
    }
}

/**
 * Render an error for logs and the final report, e.g.
 * `[Premier League/table 3/column gls] SchemaError: ...`
 */
export function describeError(error: unknown): string {
    if (error instanceof PipelineError) {
        const location = [
            error.league,
            error.tableIndex !== undefined ? `table ${error.tableIndex}` : undefined,
            error.column !== undefined ? `column ${error.column}` : undefined,
        ].filter((part): part is string => part !== undefined);

        const prefix = location.length > 0 ? `[${location.join('/')}] ` : '';
        return `${prefix}${error.name}: ${error.message}`;
    }
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }
    return String(error);
}
