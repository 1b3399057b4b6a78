import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool, type PoolConfig } from 'pg';
import * as schema from '@shared/schema';
import { logger } from './lib/logger';

export type Database = NodePgDatabase<typeof schema>;
/** The database handle or an open transaction; both run the same queries. */
export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export function createPool(connectionString: string, production: boolean): Pool {
  const config: PoolConfig = {
    connectionString,
    // Connection pooling settings
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 15000,
    maxUses: 7500,
    ssl: production ? { rejectUnauthorized: false } : false,
    application_name: 'harbor-pos',
    allowExitOnIdle: false,
  };

  const pool = new Pool(config);

  pool.on('connect', () => {
    logger.debug('Database client connected');
  });

  pool.on('error', (err) => {
    logger.error('Database pool error', {}, err);
  });

  return pool;
}

export function createDatabase(pool: Pool): Database {
  return drizzle(pool, { schema });
}

// Health check function for database
export async function checkDatabaseHealth(pool: Pool, timeoutMs: number = 5000): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Database health check timeout')), timeoutMs);
    });

    const healthCheckPromise = (async () => {
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
        return true;
      } finally {
        client.release();
      }
    })();

    return await Promise.race([healthCheckPromise, timeoutPromise]);
  } catch (error) {
    logger.error('Database health check failed', {}, error);
    return false;
  } finally {
    clearTimeout(timer);
  }
}
