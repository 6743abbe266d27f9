import 'dotenv/config';

import { loadEnv } from '@app/config';
import { createLogger } from '@app/logger';
import { createCatalogService } from '@app/pim';

import { buildServer } from './http/server.js';

const env = loadEnv();
const logger = createLogger({
  service: 'catalog-api',
  env: env.nodeEnv,
  level: env.logLevel,
});

const catalog = createCatalogService(env, logger);
const server = await buildServer({ env, logger, catalog });

try {
  await server.listen({ port: env.port, host: '0.0.0.0' });
  logger.info(
    {
      port: env.port,
      maxBatchItems: env.maxBatchItems,
      rpmLimit: env.rpmLimit,
      publish: env.enablePublish ? env.publishMode : 'off',
      warehouse: env.enableWarehouse ? env.warehouseMode : 'off',
    },
    'server listening'
  );
} catch (error) {
  logger.fatal({ error }, 'server failed to start');
  process.exitCode = 1;
  await catalog.close();
}

const shutdown = async (signal: string): Promise<void> => {
  logger.info({ signal }, 'shutdown started');
  try {
    await server.close();
    await catalog.close();
    logger.info({ signal }, 'shutdown complete');
  } catch (error) {
    logger.error({ error, signal }, 'shutdown failed');
  }
};

process.once('SIGTERM', () => void shutdown('SIGTERM'));
process.once('SIGINT', () => void shutdown('SIGINT'));
