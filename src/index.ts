export * from './types';
export * from './errors';
export { DEFAULT_SCHEMA, extractAttributes, resolveSchema } from './services/attributeParser';
export { MetadataFetcher, fetchAll, DEFAULT_TIMEOUT_MS } from './services/metadataFetcher';
export { FrequencyTable, aggregate, toOccurrenceMap } from './services/occurrenceService';
export { calculateRarity, summarizeItems } from './services/rarityService';
export {
  DEFAULT_CONCURRENCY,
  getData,
  getOccurrenceData,
  getRarityData,
  partitionResults,
  type OccurrenceData,
  type RarityData
} from './services/pipeline';
export { createApp } from './api/routes';
export { loadConfig, type AppConfig } from './config/configManager';
export { logger, Logger, LogLevel } from './utils/logger';
