import { InvalidConcurrencyLimit } from '../errors';

export interface PoolProgress {
    completed: number;
    total: number;
}

export interface PoolOptions {
    limit: number;
    onProgress?: (progress: PoolProgress) => void;
    progressIntervalMs?: number;
}

export function assertConcurrencyLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit < 1) {
        throw new InvalidConcurrencyLimit(limit);
    }
}

/**
 * Runs `task` over every item with at most `limit` tasks in flight and resolves once all
 * of them have settled. Each worker pulls the next index from a shared cursor and writes
 * into that index's slot, so results line up with `items` whatever order tasks finish in.
 *
 * `task` is expected not to reject; a rejection rejects the whole pool.
 */
export async function runPool<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
    options: PoolOptions
): Promise<R[]> {
    assertConcurrencyLimit(options.limit);

    const results = new Array<R>(items.length);
    let cursor = 0;
    let completed = 0;

    const report = () => options.onProgress?.({ completed, total: items.length });
    const timer = options.onProgress && options.progressIntervalMs
        ? setInterval(report, options.progressIntervalMs)
        : null;
    timer?.unref();

    async function worker(): Promise<void> {
        while (cursor < items.length) {
            const index = cursor++;
            results[index] = await task(items[index], index);
            completed++;
        }
    }

    try {
        const workers = Math.min(options.limit, items.length);
        await Promise.all(Array.from({ length: workers }, worker));
    } finally {
        if (timer) clearInterval(timer);
    }

    report();
    return results;
}
