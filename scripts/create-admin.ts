/**
 * Create an admin user.
 *
 *   npm run create-admin -- --username alice --password 'long enough' [--no-superuser]
 */

import { adminService } from '../src/modules/admin/admin.service';
import { runCreateAdmin } from '../src/modules/admin/create-admin.command';
import { db } from '../src/shared/database/db';
import { AppError } from '../src/shared/types/error.types';
import { logError } from '../src/shared/services/logger.service';

async function main(): Promise<void> {
  try {
    const user = await runCreateAdmin(adminService, process.argv.slice(2));
    console.log(`✅ Admin user "${user.username}" created (superuser: ${user.isSuperuser})`);
  } catch (error) {
    if (error instanceof AppError) {
      console.error(`❌ ${error.message}`);
      const fields = error.details?.fields;
      if (Array.isArray(fields)) {
        for (const field of fields) {
          console.error(`   - ${JSON.stringify(field)}`);
        }
      }
    } else {
      logError('create-admin failed', error);
    }
    process.exitCode = 1;
  } finally {
    await db.close();
  }
}

void main();
