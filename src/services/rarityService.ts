import { InvalidCollectionSize } from '../errors';
import { ItemId, ItemMetadata, ItemRarity, RarityRecord } from '../types';
import { FrequencyTable, uniqueAttributes } from './occurrenceService';

export function assertCollectionSize(collectionSize: number): void {
    if (!Number.isFinite(collectionSize) || collectionSize <= 0) {
        throw new InvalidCollectionSize(collectionSize);
    }
}

function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function compareRecords(a: RarityRecord, b: RarityRecord): number {
    return compareStrings(a.trait, b.trait) || compareStrings(a.value, b.value);
}

// numeric ids first, then string ids
function compareIds(a: ItemId, b: ItemId): number {
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'number') return -1;
    if (typeof b === 'number') return 1;
    return compareStrings(a, b);
}

function toRecord(trait: string, value: string, occurrenceCount: number, collectionSize: number): RarityRecord {
    return { trait, value, occurrenceCount, rarityScore: occurrenceCount / collectionSize };
}

/** One record per (trait, value) pair, sorted by trait then value. */
export function calculateRarity(table: FrequencyTable, collectionSize: number): RarityRecord[] {
    assertCollectionSize(collectionSize);

    return table.entries()
        .map(({ trait, value, count }) => toRecord(trait, value, count, collectionSize))
        .sort(compareRecords);
}

/**
 * Per-item view of the same scores. `statisticalScore` multiplies the item's record
 * scores, so the item holding the rarest combination has the lowest score.
 */
export function summarizeItems(
    items: readonly ItemMetadata[],
    table: FrequencyTable,
    collectionSize: number
): ItemRarity[] {
    assertCollectionSize(collectionSize);

    return items
        .map(item => {
            const attributes = uniqueAttributes(item.attributes);
            const records = attributes
                .map(({ trait, value }) => toRecord(trait, value, table.get(trait, value), collectionSize))
                .sort(compareRecords);

            return {
                id: item.id,
                sourceUrl: item.sourceUrl,
                attributeCount: attributes.length,
                records,
                statisticalScore: records.reduce((score, record) => score * record.rarityScore, 1)
            };
        })
        .sort((a, b) => compareIds(a.id, b.id));
}
