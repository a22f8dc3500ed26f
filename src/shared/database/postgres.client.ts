/**
 * =============================================================================
 * POSTGRES CLIENT - node-postgres pool + drizzle-orm
 * =============================================================================
 *
 * One pool per process. Creating the pool does not open a connection; the
 * first query does.
 * =============================================================================
 */

import { Pool } from 'pg';
import type { Logger } from 'drizzle-orm';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from './schema';
import { config } from '../../config/environment';
import { logger } from '../services/logger.service';

export type DrizzleClient = NodePgDatabase<typeof schema>;

export function createPool(connectionString: string = config.database.url): Pool {
  const pool = new Pool({
    connectionString,
    max: config.database.poolSize,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  // An idle client losing its connection must not crash the process
  pool.on('error', (error) => {
    logger.error('PostgreSQL pool error', { error: error.message });
  });

  return pool;
}

const queryLogger: Logger = {
  logQuery(query: string, params: unknown[]): void {
    logger.debug('SQL', { query, paramCount: params.length });
  },
};

export function createDrizzleClient(pool: Pool): DrizzleClient {
  return drizzle(pool, { schema, logger: config.isDevelopment ? queryLogger : false });
}
