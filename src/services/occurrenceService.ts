import { AttributeEntry, FrequencyEntry, ItemMetadata } from '../types';

function keyOf(trait: string, value: string): string {
    return JSON.stringify([trait, value]);
}

/**
 * Occurrence counts per (trait, value) pair, built once from a finished fetch.
 * Read-only after construction.
 */
export class FrequencyTable {
    private readonly counts: ReadonlyMap<string, FrequencyEntry>;

    constructor(entries: Iterable<FrequencyEntry>, public readonly itemCount: number) {
        const counts = new Map<string, FrequencyEntry>();
        for (const entry of entries) {
            counts.set(keyOf(entry.trait, entry.value), Object.freeze({ ...entry }));
        }
        this.counts = counts;
    }

    public get size(): number {
        return this.counts.size;
    }

    public get(trait: string, value: string): number {
        return this.counts.get(keyOf(trait, value))?.count ?? 0;
    }

    public has(trait: string, value: string): boolean {
        return this.counts.has(keyOf(trait, value));
    }

    public entries(): FrequencyEntry[] {
        return Array.from(this.counts.values());
    }

    public traits(): string[] {
        return Array.from(new Set(this.entries().map(entry => entry.trait)));
    }
}

/** Distinct (trait, value) pairs of one item, in first-seen order. */
export function uniqueAttributes(attributes: readonly AttributeEntry[]): AttributeEntry[] {
    const seen = new Set<string>();
    return attributes.filter(({ trait, value }) => {
        const key = keyOf(trait, value);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
    });
}

export function aggregate(items: readonly ItemMetadata[]): FrequencyTable {
    const counts = new Map<string, { trait: string; value: string; count: number }>();

    for (const item of items) {
        // a pair repeated inside one item still counts once for that item
        for (const { trait, value } of uniqueAttributes(item.attributes)) {
            const key = keyOf(trait, value);
            const entry = counts.get(key);
            if (entry) {
                entry.count++;
            } else {
                counts.set(key, { trait, value, count: 1 });
            }
        }
    }

    return new FrequencyTable(counts.values(), items.length);
}

/** `{ [trait]: { [value]: count } }`, the shape the HTTP API returns. */
export function toOccurrenceMap(table: FrequencyTable): Record<string, Record<string, number>> {
    const traits: Record<string, Record<string, number>> = {};
    for (const { trait, value, count } of table.entries()) {
        if (!traits[trait]) traits[trait] = {};
        traits[trait][value] = count;
    }
    return traits;
}
