import { Agent, Dispatcher } from 'undici';
import { FetchError } from '../errors';
import { FetchResult, FetchTarget, ItemMetadata, ItemRarity, PipelineOptions, RarityRecord } from '../types';
import { logger } from '../utils/logger';
import { assertConcurrencyLimit } from '../utils/workerPool';
import { MetadataFetcher } from './metadataFetcher';
import { aggregate, FrequencyTable } from './occurrenceService';
import { assertCollectionSize, calculateRarity, summarizeItems } from './rarityService';

export const DEFAULT_CONCURRENCY = 10;

const log = logger.child('Pipeline');

export interface OccurrenceData {
    results: FetchResult[];
    table: FrequencyTable;
}

export interface RarityData extends OccurrenceData {
    records: RarityRecord[];
    items: ItemRarity[];
}

export function partitionResults(results: readonly FetchResult[]): { items: ItemMetadata[]; errors: FetchError[] } {
    const items: ItemMetadata[] = [];
    const errors: FetchError[] = [];
    for (const result of results) {
        if (result instanceof FetchError) errors.push(result);
        else items.push(result);
    }
    return { items, errors };
}

// Without an injected client, one Agent is scoped to this run and closed when it ends
async function withClient<T>(client: Dispatcher | undefined, run: (client: Dispatcher) => Promise<T>): Promise<T> {
    if (client) return run(client);

    const agent = new Agent({ connect: { keepAlive: true } });
    try {
        return await run(agent);
    } finally {
        await agent.close();
    }
}

/** Fetch only: one result per target, in input order. */
export async function getData(targets: readonly FetchTarget[], options: PipelineOptions = {}): Promise<FetchResult[]> {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    assertConcurrencyLimit(concurrency);

    log.info(`Fetching ${targets.length} targets (concurrency ${concurrency})...`);
    return withClient(options.client, client =>
        new MetadataFetcher(client, options).fetchAll(targets, concurrency)
    );
}

/** Fetch, then count (trait, value) occurrences over the items that succeeded. */
export async function getOccurrenceData(
    targets: readonly FetchTarget[],
    options: PipelineOptions = {}
): Promise<OccurrenceData> {
    const results = await getData(targets, options);
    const { items } = partitionResults(results);
    const table = aggregate(items);
    log.info(`Counted ${table.size} trait values across ${items.length} items.`);
    return { results, table };
}

/** Fetch, count, then score every pair against `collectionSize`. */
export async function getRarityData(
    targets: readonly FetchTarget[],
    collectionSize: number,
    options: PipelineOptions = {}
): Promise<RarityData> {
    // checked before any request goes out
    assertCollectionSize(collectionSize);

    const { results, table } = await getOccurrenceData(targets, options);
    const { items } = partitionResults(results);
    return {
        results,
        table,
        records: calculateRarity(table, collectionSize),
        items: summarizeItems(items, table, collectionSize)
    };
}
