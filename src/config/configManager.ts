import { ConfigError } from '../errors';
import { DEFAULT_SCHEMA } from '../services/attributeParser';
import { DEFAULT_TIMEOUT_MS } from '../services/metadataFetcher';
import { DEFAULT_CONCURRENCY } from '../services/pipeline';
import { AttributeSchema } from '../types';

export interface AppConfig {
  port: number;
  concurrency: number;
  requestTimeoutMs: number;
  maxConnections: number;
  schema: AttributeSchema;
  auth?: { user: string; password: string };
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(key, `expected a positive integer, got "${raw}"`);
  }
  return value;
}

function readList(env: Env, key: string, fallback: string[]): string[] {
  const items = (env[key] || '').split(',').map(s => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const authUser = env.AUTH_USER;
  const authPass = env.AUTH_PASSWORD;

  return {
    port: readPositiveInt(env, 'PORT', 3000),
    concurrency: readPositiveInt(env, 'CONCURRENCY', DEFAULT_CONCURRENCY),
    requestTimeoutMs: readPositiveInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    maxConnections: readPositiveInt(env, 'MAX_CONNECTIONS', 100),
    schema: {
      attributesField: env.ATTRIBUTES_FIELD?.trim() || DEFAULT_SCHEMA.attributesField,
      traitFields: readList(env, 'TRAIT_FIELD', DEFAULT_SCHEMA.traitFields),
      valueField: env.VALUE_FIELD?.trim() || DEFAULT_SCHEMA.valueField
    },
    // Basic auth only when both halves are present
    auth: authUser && authPass ? { user: authUser, password: authPass } : undefined
  };
}
