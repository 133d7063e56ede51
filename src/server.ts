import 'dotenv/config';
import { Agent } from 'undici';
import { createApp } from './api/routes';
import { loadConfig } from './config/configManager';
import { logger } from './utils/logger';

const config = loadConfig();

// One keep-alive pool shared by every request the API fans out
const agent = new Agent({
  connect: {
    keepAlive: true,
    timeout: config.requestTimeoutMs
  },
  pipelining: 1,
  connections: config.maxConnections
});

const app = createApp({ client: agent, config });

const server = app.listen(config.port, () => {
  logger.info(`Trait rarity API listening on port ${config.port}`);
  logger.info(`Concurrency ${config.concurrency}, timeout ${config.requestTimeoutMs}ms, attributes field "${config.schema.attributesField}"`);
});

async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down...`);
  server.close();
  try {
    await agent.close();
  } catch (error) {
    logger.error('Error closing HTTP agent:', error);
  }
  process.exit(0);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
