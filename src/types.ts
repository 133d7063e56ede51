import type { Dispatcher } from 'undici';
import type { FetchError } from './errors';

export interface AttributeEntry {
  readonly trait: string;
  readonly value: string;
}

/** Where to find the attribute list and its fields in a metadata document. */
export interface AttributeSchema {
  attributesField: string;
  traitFields: string[];    // tried in order, e.g. ['trait_type', 'trait']
  valueField: string;
}

export type ItemId = string | number;

// A bare URL takes its input index as id
export type FetchTarget = string | { url: string; id?: ItemId };

export interface ItemMetadata {
  id: ItemId;
  sourceUrl: string;
  attributes: readonly AttributeEntry[];
  rawStatus: number;
}

export type FetchResult = ItemMetadata | FetchError;

export interface FrequencyEntry {
  readonly trait: string;
  readonly value: string;
  readonly count: number;
}

export interface RarityRecord {
  trait: string;
  value: string;
  occurrenceCount: number;
  rarityScore: number;
}

export interface ItemRarity {
  id: ItemId;
  sourceUrl: string;
  attributeCount: number;   // distinct (trait, value) pairs, same basis as records
  records: RarityRecord[];
  statisticalScore: number; // product of record scores, lower = rarer
}

export interface FetchOptions {
  timeoutMs?: number;
  schema?: Partial<AttributeSchema>;
  progressIntervalMs?: number;
  headers?: Record<string, string>;
}

export interface PipelineOptions extends FetchOptions {
  client?: Dispatcher;
  concurrency?: number;
}
