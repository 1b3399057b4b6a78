import 'dotenv/config';
import { createServer } from 'node:http';
import { loadEnv } from '@shared/env';
import { createApp } from './app';
import { DrizzleCatalogStore } from './catalog/drizzle-catalog';
import { checkDatabaseHealth, createDatabase, createPool } from './db';
import { DrizzleSalesLedger } from './ledger/drizzle-ledger';
import { logger } from './lib/logger';
import { createServices } from './services';
import { createRedisClient, type RedisClient } from './session';

async function main() {
  const env = loadEnv(process.env);
  logger.info('Starting server initialization...', {
    environment: env.NODE_ENV,
    nodeVersion: process.version,
    timeZone: env.BUSINESS_TIMEZONE,
  });

  if (env.SYNC_API_KEYS.length === 0) {
    logger.warn('SYNC_API_KEYS is empty; the /api/v1 sync API will reject every request');
  }

  const pool = createPool(env.DATABASE_URL, env.NODE_ENV === 'production');
  const db = createDatabase(pool);

  let redis: RedisClient | undefined;
  if (env.REDIS_URL) {
    redis = createRedisClient(env.REDIS_URL);
    await redis.connect();
  }

  const services = createServices({
    catalog: new DrizzleCatalogStore(db),
    ledger: new DrizzleSalesLedger(db, env.BUSINESS_TIMEZONE),
    timeZone: env.BUSINESS_TIMEZONE,
    checkHealth: () => checkDatabaseHealth(pool),
  });

  const app = await createApp(services, env, { redis });
  const server = createServer(app);
  const port = parseInt(env.PORT, 10);

  server.listen({ port, host: '0.0.0.0' }, () => {
    logger.info('Server started successfully', { port, environment: env.NODE_ENV });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });
    server.close(() => {
      Promise.all([pool.end(), redis?.quit()])
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error while closing connections', {}, error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', {}, error);
  process.exit(1);
});
