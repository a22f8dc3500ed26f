/**
 * =============================================================================
 * ADMIN MODULE - create-admin COMMAND
 * =============================================================================
 *
 *   npm run create-admin -- --username alice --password 'long enough'
 *   npm run create-admin -- --username bob --password 'long enough' --no-superuser
 *
 * Missing flags fall back to ADMIN_USERNAME / ADMIN_PASSWORD.
 * =============================================================================
 */

import { parseArgs } from 'util';
import { AdminService, AdminUserView } from './admin.service';
import { CreateAdminInput } from './admin.schema';
import { ValidationError } from '../../shared/types/error.types';

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        username: { type: 'string', short: 'u' },
        password: { type: 'string', short: 'p' },
        'no-superuser': { type: 'boolean', default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : 'Invalid arguments');
  }
}

export function parseCreateAdminArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): CreateAdminInput {
  const values = parseFlags(argv);

  const username = values.username ?? env.ADMIN_USERNAME;
  const password = values.password ?? env.ADMIN_PASSWORD;
  if (!username || !password) {
    throw new ValidationError('Username and password are required (--username/--password or ADMIN_USERNAME/ADMIN_PASSWORD)');
  }

  return { username, password, isSuperuser: !values['no-superuser'] };
}

export async function runCreateAdmin(
  service: Pick<AdminService, 'createAdminUser'>,
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<AdminUserView> {
  return service.createAdminUser(parseCreateAdminArgs(argv, env));
}
