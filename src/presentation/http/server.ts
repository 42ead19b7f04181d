#!/usr/bin/env node

/**
 * Main server file for the drive streamer
 *
 * Usage:
 *   npm run dev (or node dist/presentation/http/server.js after a build)
 *
 * Then request a file, optionally with a Range header:
 *   curl -H 'Range: bytes=0-1023' http://localhost:3000/files/<id>/stream
 */

import path from 'path';
import { Pool } from 'pg';
import config from '../../config';
import { createApp } from './app';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { FileLogger } from '../../infrastructure/logging/FileLogger';
import { PostgresFileRepository } from '../../infrastructure/metadata/PostgresFileRepository';
import { TelegramClientFactory } from '../../infrastructure/telegram/TelegramClientFactory';
import { ClientPool } from '../../infrastructure/clients/ClientPool';

const fileLogger = new FileLogger(path.join(config.RUNTIME_DIR, 'logs'), config.LOG_LEVEL);
const logger = new CompositeLogger([new ConsoleLogger(config.LOG_LEVEL), fileLogger]);

const fileRepository = new PostgresFileRepository(new Pool({ connectionString: config.DATABASE_URL }), logger);

const clientPool = new ClientPool(
  new TelegramClientFactory({ apiId: config.API_ID, apiHash: config.API_HASH }, logger),
  logger,
  {
    mode: config.MULTI_CLIENT ? 'shared' : 'dedicated',
    botTokens: config.BOT_TOKENS,
    poolSize: config.POOL_SIZE,
    idleTimeout: config.CLIENT_IDLE_TIMEOUT,
    retryDelay: config.CLIENT_RETRY_DELAY,
    defaultIdentity: config.SESSION ? { userId: 'default', session: config.SESSION } : undefined
  }
);

const app = createApp({ fileRepository, clientPool, logger });

const server = app.listen(config.PORT, () => {
  logger.info(`Drive streamer running on http://localhost:${config.PORT}`);
  logger.info(`Client mode: ${clientPool.mode}, transfer unit: ${config.TRANSFER_UNIT} bytes`);
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, stopping server...`);
  server.close();
  await clientPool.destroy();
  await fileRepository.close();
  logger.info('All clients disconnected');
  fileLogger.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
}
