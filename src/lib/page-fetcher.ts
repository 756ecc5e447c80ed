import { CheerioCrawler, Configuration, log } from 'crawlee';
import { FetchError } from './errors.js';
import { HostThrottle, systemClock, type Clock } from './host-throttle.js';
import { detectChallengePage, readPageMetadata } from './page-validator.js';

export interface TransportResponse {
    url: string;
    status: number;
    body: string;
}

/**
 * A single GET, no retries. Implementations reject on network failure or timeout
 * and resolve with whatever status the server answered.
 */
export interface PageTransport {
    get(url: string): Promise<TransportResponse>;
}

export interface CrawleeTransportOptions {
    timeoutSecs: number;
}

/**
 * Transport backed by a crawlee CheerioCrawler. The crawler is created once and
 * re-run per page; results are matched back to callers through the request's uniqueKey.
 */
export function createCrawleeTransport(options: CrawleeTransportOptions): PageTransport {
    const responses: Map<string, TransportResponse> = new Map();
    const failures: Map<string, Error> = new Map();

    const crawler = new CheerioCrawler(
        {
            maxRequestRetries: 0,
            maxConcurrency: 1,
            requestHandlerTimeoutSecs: options.timeoutSecs,
            navigationTimeoutSecs: options.timeoutSecs,

            async requestHandler({ request, body, response }) {
                responses.set(request.uniqueKey, {
                    url: request.loadedUrl ?? request.url,
                    status: response.statusCode ?? 0,
                    body: typeof body === 'string' ? body : body.toString('utf-8'),
                });
            },

            failedRequestHandler({ request }, error) {
                failures.set(request.uniqueKey, error);
            },
        },
        // Nothing from a run is worth keeping on disk
        new Configuration({ persistStorage: false }),
    );

    return {
        async get(url: string): Promise<TransportResponse> {
            const uniqueKey = `${url}-${Date.now()}`;
            await crawler.run([{ url, uniqueKey }]);

            const response = responses.get(uniqueKey);
            const failure = failures.get(uniqueKey);
            responses.delete(uniqueKey);
            failures.delete(uniqueKey);

            if (response) return response;
            if (failure) throw failure;
            throw new Error(`No response recorded for ${url}`);
        },
    };
}

export interface PageFetcherOptions {
    baseUrl: string;
    minDelayMs: number;
    timeoutSecs?: number;
    transport?: PageTransport;
    clock?: Clock;
}

export class PageFetcher {
    readonly baseUrl: string;
    readonly throttle: HostThrottle;
    private readonly transport: PageTransport;

    constructor(options: PageFetcherOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.throttle = new HostThrottle(options.minDelayMs, options.clock ?? systemClock);
        this.transport = options.transport ?? createCrawleeTransport({ timeoutSecs: options.timeoutSecs ?? 30 });
    }

    buildUrl(sourceId: string): string {
        return `${this.baseUrl}/${sourceId.replace(/^\/+/, '')}`;
    }

    /**
     * Fetch the raw HTML of a source page, honouring the per-host politeness delay.
     */
    async fetch(sourceId: string): Promise<string> {
        const url = this.buildUrl(sourceId);
        await this.throttle.waitTurn(url);

        log.info(`[Fetcher] GET ${url}`);

        let response: TransportResponse;
        try {
            response = await this.transport.get(url);
        } catch (error) {
            if (error instanceof FetchError) throw error;
            const reason = error instanceof Error ? error.message : String(error);
            throw new FetchError(`Request to ${url} failed: ${reason}`, url, undefined, { cause: error });
        }

        if (response.status < 200 || response.status >= 300) {
            throw new FetchError(`Request to ${url} returned HTTP ${response.status}`, url, response.status);
        }

        const challenge = detectChallengePage(readPageMetadata(url, response.body));
        if (challenge.isBlocked) {
            throw new FetchError(`Blocked page served for ${url}: ${challenge.reasons.join(', ')}`, url, response.status);
        }

        log.debug(`[Fetcher] ${url} returned ${response.body.length} bytes`);
        return response.body;
    }
}
