import { Dispatcher, fetch } from 'undici';
import { FetchError, HTTPStatusError, NetworkError, ParseError } from '../errors';
import { AttributeSchema, FetchOptions, FetchResult, FetchTarget, ItemId } from '../types';
import { logger } from '../utils/logger';
import { runPool } from '../utils/workerPool';
import { extractAttributes, resolveSchema } from './attributeParser';

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_PROGRESS_INTERVAL_MS = 2_000;

const log = logger.child('Fetcher');

interface ResolvedTarget {
    url: string;
    id: ItemId;
}

export function resolveTarget(target: FetchTarget, index: number): ResolvedTarget {
    if (typeof target === 'string') return { url: target, id: index };
    return { url: target.url, id: target.id ?? index };
}

export function describeFailure(error: unknown): string {
    if (error instanceof Error) {
        if (error.name === 'TimeoutError' || error.name === 'AbortError') return 'timeout';
        // undici wraps socket errors as TypeError('fetch failed') with the real one in `cause`
        if (error.cause instanceof Error) return error.cause.message;
        return error.message;
    }
    return String(error);
}

/**
 * Fetches item metadata over one shared undici dispatcher. A single attempt per URL;
 * every failure comes back as a FetchError value in that URL's slot.
 */
export class MetadataFetcher {
    private readonly schema: AttributeSchema;
    private readonly timeoutMs: number;
    private readonly progressIntervalMs: number;
    private readonly headers: Record<string, string>;

    constructor(private readonly client: Dispatcher, options: FetchOptions = {}) {
        this.schema = resolveSchema(options.schema);
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.progressIntervalMs = options.progressIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
        this.headers = { Accept: 'application/json', ...options.headers };
    }

    public async fetchAll(targets: readonly FetchTarget[], concurrencyLimit: number): Promise<FetchResult[]> {
        const resolved = targets.map(resolveTarget);

        const results = await runPool(resolved, (target, index) => this.fetchOne(target, index), {
            limit: concurrencyLimit,
            progressIntervalMs: this.progressIntervalMs,
            onProgress: ({ completed, total }) => log.debug(`remaining tasks: ${total - completed}`)
        });

        const failed = results.filter(result => result instanceof FetchError).length;
        log.info(`Fetched ${results.length - failed}/${results.length} items (${failed} failed).`);
        return results;
    }

    public async fetchOne(target: ResolvedTarget, index: number): Promise<FetchResult> {
        const result = await this.request(target, index);
        if (result instanceof FetchError) {
            log.warn(`Unable to get data from URL: ${target.url}`);
            log.warn(`Error: ${result.message}`);
        }
        return result;
    }

    private async request({ url, id }: ResolvedTarget, index: number): Promise<FetchResult> {
        let status: number;
        let body: string;
        try {
            const response = await fetch(url, {
                dispatcher: this.client,
                headers: this.headers,
                signal: AbortSignal.timeout(this.timeoutMs)
            });
            status = response.status;

            if (!response.ok) {
                // release the connection back to the pool
                await response.body?.cancel().catch((error: unknown) => {
                    log.debug(`Could not discard body of ${url}:`, error);
                });
                return new HTTPStatusError(url, index, status);
            }

            body = await response.text();
        } catch (error) {
            return new NetworkError(url, index, describeFailure(error));
        }

        let document: unknown;
        try {
            document = JSON.parse(body);
        } catch (error) {
            return new ParseError(url, index, error instanceof Error ? error.message : 'invalid JSON');
        }

        const extracted = extractAttributes(document, this.schema);
        if (!extracted.ok) {
            return new ParseError(url, index, extracted.detail);
        }

        return { id, sourceUrl: url, attributes: extracted.attributes, rawStatus: status };
    }
}

export function fetchAll(
    targets: readonly FetchTarget[],
    concurrencyLimit: number,
    client: Dispatcher,
    options: FetchOptions = {}
): Promise<FetchResult[]> {
    return new MetadataFetcher(client, options).fetchAll(targets, concurrencyLimit);
}
