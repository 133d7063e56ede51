import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import { Dispatcher } from 'undici';
import { AppConfig } from '../config/configManager';
import { InvalidCollectionSize, InvalidConcurrencyLimit } from '../errors';
import { toOccurrenceMap } from '../services/occurrenceService';
import { getData, getOccurrenceData, getRarityData, partitionResults } from '../services/pipeline';
import { FetchTarget, PipelineOptions } from '../types';
import { logger } from '../utils/logger';

const log = logger.child('API');

class BadRequest extends Error { }

interface BatchRequest {
  targets: FetchTarget[];
  concurrency?: number;
}

function isTarget(value: unknown): value is FetchTarget {
  if (typeof value === 'string') return value.length > 0;
  if (typeof value !== 'object' || value === null) return false;
  const url: unknown = Reflect.get(value, 'url');
  const id: unknown = Reflect.get(value, 'id');
  return typeof url === 'string' && url.length > 0
    && (id === undefined || typeof id === 'string' || typeof id === 'number');
}

function readBatch(body: unknown): BatchRequest {
  if (typeof body !== 'object' || body === null) throw new BadRequest('Request body must be a JSON object');

  const urls: unknown = Reflect.get(body, 'urls');
  if (!Array.isArray(urls) || !urls.every(isTarget)) {
    throw new BadRequest('"urls" must be an array of URLs or { url, id } objects');
  }

  const concurrency: unknown = Reflect.get(body, 'concurrency');
  if (typeof concurrency === 'number') return { targets: urls, concurrency };
  if (concurrency !== undefined) throw new BadRequest('"concurrency" must be a number');

  return { targets: urls };
}

function readCollectionSize(body: unknown): number {
  const size: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'collectionSize') : undefined;
  if (typeof size !== 'number') throw new BadRequest('"collectionSize" must be a number');
  return size;
}

// Express 4 does not forward async rejections on its own
const route = (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export interface AppDependencies {
  client: Dispatcher;
  config: AppConfig;
}

export function createApp({ client, config }: AppDependencies): express.Express {
  const app = express();

  // Basic auth gate, only when credentials are configured
  app.use((req, res, next) => {
    if (!config.auth || req.path === '/health') return next();

    const b64auth = (req.headers.authorization || '').split(' ')[1] || '';
    const [login, password] = Buffer.from(b64auth, 'base64').toString().split(':');

    if (login === config.auth.user && password === config.auth.password) {
      return next();
    }

    log.warn(`Blocked unauthorized request from ${req.ip}`);
    res.set('WWW-Authenticate', 'Basic realm="Trait Rarity"');
    res.status(401).send('Authentication required.');
  });

  app.use(express.json({ limit: '5mb' }));

  const optionsFor = (concurrency?: number): PipelineOptions => ({
    client,
    concurrency: concurrency ?? config.concurrency,
    timeoutMs: config.requestTimeoutMs,
    schema: config.schema
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post('/api/data', route(async (req, res) => {
    const { targets, concurrency } = readBatch(req.body);
    const results = await getData(targets, optionsFor(concurrency));
    const { items, errors } = partitionResults(results);
    res.json({ items, errors });
  }));

  app.post('/api/occurrences', route(async (req, res) => {
    const { targets, concurrency } = readBatch(req.body);
    const { results, table } = await getOccurrenceData(targets, optionsFor(concurrency));
    res.json({
      occurrences: toOccurrenceMap(table),
      itemCount: table.itemCount,
      errors: partitionResults(results).errors
    });
  }));

  app.post('/api/rarity', route(async (req, res) => {
    const { targets, concurrency } = readBatch(req.body);
    const collectionSize = readCollectionSize(req.body);
    const { results, records, items } = await getRarityData(targets, collectionSize, optionsFor(concurrency));
    res.json({ records, items, errors: partitionResults(results).errors });
  }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof BadRequest || err instanceof InvalidCollectionSize || err instanceof InvalidConcurrencyLimit) {
      res.status(400).json({ error: err.message });
      return;
    }
    // body-parser marks malformed JSON with a 4xx status
    const status: unknown = typeof err === 'object' && err !== null ? Reflect.get(err, 'status') : undefined;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }
    log.error('Request failed:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
