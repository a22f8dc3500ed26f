/**
 * =============================================================================
 * ADMIN MODULE - SERVICE
 * =============================================================================
 *
 * Admin accounts, login and maintenance of stored lookups.
 *
 * SECURITY:
 * - Passwords hashed with bcrypt, never logged
 * - Only active superusers receive a token
 * - Same error for unknown user and wrong password
 * =============================================================================
 */

import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { config } from '../../config/environment';
import { logger } from '../../shared/services/logger.service';
import { db } from '../../shared/database/db';
import {
  AdminUserRecord,
  CountryRecord,
  Database,
  DatabaseStats,
  PaginatedResult,
} from '../../shared/database/repository.interface';
import {
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  ErrorCode,
  NotFoundError,
} from '../../shared/types/error.types';
import { AdminRole } from '../../shared/types/api.types';
import { ProviderClient, ProviderMetrics } from '../../shared/services/provider-client';
import { countriesApi } from '../../shared/services/countries-api.service';
import { weatherApi } from '../../shared/services/weather-api.service';
import { currencyApi } from '../../shared/services/currency-api.service';
import { newsApi } from '../../shared/services/news-api.service';
import { validateSchema } from '../../shared/utils/validation.utils';
import { createAdminSchema, CreateAdminInput } from './admin.schema';

const BCRYPT_ROUNDS = 10;
const ADMIN_ROLE: AdminRole = 'admin';

export type MonitoredProvider = Pick<ProviderClient, 'isAvailable' | 'getMetrics'>;

export interface AdminSettings {
  jwtSecret: string;
  tokenTtlSeconds: number;
}

/**
 * Admin user as returned by the API (no password hash)
 */
export interface AdminUserView {
  id: string;
  username: string;
  isSuperuser: boolean;
  isActive: boolean;
  lastLoginAt: string | null;
  createdAt: string;
}

export interface LoginResult {
  accessToken: string;
  expiresIn: number;
  user: AdminUserView;
}

export interface ProviderStatus extends ProviderMetrics {
  configured: boolean;
}

export interface AdminStats {
  database: DatabaseStats;
  providers: Record<string, ProviderStatus>;
}

export function toAdminUserView(user: AdminUserRecord): AdminUserView {
  return {
    id: user.id,
    username: user.username,
    isSuperuser: user.isSuperuser,
    isActive: user.isActive,
    lastLoginAt: user.lastLoginAt,
    createdAt: user.createdAt,
  };
}

export class AdminService {
  constructor(
    private readonly database: Database,
    private readonly providers: Record<string, MonitoredProvider>,
    private readonly settings: AdminSettings
  ) {}

  /**
   * Create an admin account (used by the create-admin command)
   */
  async createAdminUser(input: CreateAdminInput): Promise<AdminUserView> {
    const { username, password, isSuperuser } = validateSchema(createAdminSchema, input);

    if (await this.database.adminUsers.findByUsername(username)) {
      throw new ConflictError(`Admin user "${username}" already exists`);
    }

    const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
    const user = await this.database.adminUsers.create({
      username,
      passwordHash,
      isSuperuser,
      isActive: true,
    });

    logger.info('[ADMIN] Admin user created', { userId: user.id, username, isSuperuser });
    return toAdminUserView(user);
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const user = await this.database.adminUsers.findByUsername(username);
    const passwordMatches = user ? await bcrypt.compare(password, user.passwordHash) : false;

    if (!user || !passwordMatches || !user.isActive) {
      logger.warn('[ADMIN] Failed login attempt', { username });
      throw new AuthenticationError('Invalid username or password', ErrorCode.INVALID_CREDENTIALS);
    }

    if (!user.isSuperuser) {
      logger.warn('[ADMIN] Login refused - not a superuser', { userId: user.id });
      throw new AuthorizationError('Superuser access required');
    }

    const accessToken = jwt.sign(
      { userId: user.id, username: user.username, role: ADMIN_ROLE },
      this.settings.jwtSecret,
      { expiresIn: this.settings.tokenTtlSeconds }
    );

    const loginAt = new Date();
    await this.database.adminUsers.recordLogin(user.id, loginAt);
    logger.info('[ADMIN] Admin logged in', { userId: user.id });

    return {
      accessToken,
      expiresIn: this.settings.tokenTtlSeconds,
      user: toAdminUserView({ ...user, lastLoginAt: loginAt.toISOString() }),
    };
  }

  async getStats(): Promise<AdminStats> {
    const providers: Record<string, ProviderStatus> = {};
    for (const [name, provider] of Object.entries(this.providers)) {
      providers[name] = { configured: provider.isAvailable(), ...provider.getMetrics() };
    }

    return { database: await this.database.getStats(), providers };
  }

  async listCountries(page: number, limit: number): Promise<PaginatedResult<CountryRecord>> {
    return this.database.countries.list(page, limit);
  }

  /**
   * Delete a stored country with its cities, their snapshots and its news
   */
  async deleteCountry(alpha2code: string, deletedBy: string): Promise<void> {
    const deleted = await this.database.countries.deleteByAlpha2(alpha2code);
    if (!deleted) {
      throw new NotFoundError('Country', { alpha2code });
    }
    logger.info('[ADMIN] Country deleted', { alpha2code, deletedBy });
  }

  /**
   * Delete a stored city with its snapshots
   */
  async deleteCity(id: number, deletedBy: string): Promise<void> {
    const deleted = await this.database.cities.deleteById(id);
    if (!deleted) {
      throw new NotFoundError('City', { id });
    }
    logger.info('[ADMIN] City deleted', { cityId: id, deletedBy });
  }
}

export const adminService = new AdminService(
  db,
  { geography: countriesApi, weather: weatherApi, currency: currencyApi, news: newsApi },
  { jwtSecret: config.jwt.secret, tokenTtlSeconds: config.jwt.expiresInSeconds }
);
