import { log } from 'crawlee';

export interface Clock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

// Helper for AbortSignal-aware sleep
async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(new Error('Aborted'));
            return;
        }
        const abortHandler = () => {
            clearTimeout(timeout);
            reject(new Error('Aborted'));
        };
        const timeout = setTimeout(() => {
            signal?.removeEventListener('abort', abortHandler);
            resolve();
        }, ms);
        signal?.addEventListener('abort', abortHandler, { once: true });
    });
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep,
};

/**
 * Politeness throttle: enforces a minimum gap between consecutive requests to
 * the same host. One instance is owned by a fetcher for the length of a run.
 */
export class HostThrottle {
    private readonly lastRequestAt: Map<string, number> = new Map();

    constructor(
        private readonly minIntervalMs: number,
        private readonly clock: Clock = systemClock,
    ) {}

    /**
     * Wait until a request to the URL's host is allowed, then claim the slot.
     * Resolves with the number of milliseconds spent waiting.
     */
    async waitTurn(url: string, signal?: AbortSignal): Promise<number> {
        const host = new URL(url).host;
        const last = this.lastRequestAt.get(host);
        let waited = 0;

        if (last !== undefined) {
            const elapsed = this.clock.now() - last;
            if (elapsed < this.minIntervalMs) {
                waited = this.minIntervalMs - elapsed;
                log.debug(`[Throttle/${host}] Waiting ${waited}ms before next request`);
                await this.clock.sleep(waited, signal);
            }
        }

        this.lastRequestAt.set(host, this.clock.now());
        return waited;
    }
}
