/**
 * =============================================================================
 * DATABASE - configured instance
 * =============================================================================
 *
 * DATABASE_DRIVER=postgres (default) → PostgresDatabase over a pg pool
 * DATABASE_DRIVER=memory             → MemoryDatabase (tests, quick local runs)
 *
 * Business logic only sees the Database interface, never the driver.
 * =============================================================================
 */

import { config, DatabaseDriver } from '../../config/environment';
import { logger } from '../services/logger.service';
import { Database } from './repository.interface';
import { MemoryDatabase } from './memory.database';
import { PostgresDatabase } from './postgres.database';
import { createPool } from './postgres.client';

export function createDatabase(driver: DatabaseDriver = config.database.driver): Database {
  if (driver === 'memory') {
    logger.info('Using in-memory database');
    return new MemoryDatabase();
  }
  return new PostgresDatabase(createPool());
}

export const db: Database = createDatabase();
