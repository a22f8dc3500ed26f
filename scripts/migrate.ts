/**
 * Apply the SQL migrations in /drizzle to DATABASE_URL.
 *
 *   npm run db:generate   # drizzle-kit writes the SQL and its schema snapshot
 *   npm run db:migrate
 */

import fs from 'fs';
import path from 'path';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { createPool } from '../src/shared/database/postgres.client';
import { PostgresDatabase } from '../src/shared/database/postgres.database';
import { logger, logError } from '../src/shared/services/logger.service';

const MIGRATIONS_FOLDER = path.join(__dirname, '..', 'drizzle');

async function main(): Promise<void> {
  if (!fs.existsSync(path.join(MIGRATIONS_FOLDER, 'meta', '_journal.json'))) {
    logger.error('❌ No migrations found. Run `npm run db:generate` first.', { folder: MIGRATIONS_FOLDER });
    process.exitCode = 1;
    return;
  }

  const database = new PostgresDatabase(createPool());
  try {
    await migrate(database.client, { migrationsFolder: MIGRATIONS_FOLDER });
    logger.info('✅ Migrations applied');
  } catch (error) {
    logError('❌ Migration failed', error);
    process.exitCode = 1;
  } finally {
    await database.close();
  }
}

void main();
