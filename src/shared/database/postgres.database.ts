/**
 * =============================================================================
 * POSTGRES DATABASE - drizzle-orm repositories
 * =============================================================================
 *
 * Production implementation of the repository interfaces.
 *
 * - Lookups are create-if-absent: ON CONFLICT DO NOTHING, then re-read so the
 *   caller always gets the stored row (ours or a concurrent request's)
 * - Foreign key violations surface as ConflictError, same as MemoryDatabase
 * - Timestamps leave the repository as ISO strings
 * =============================================================================
 */

import { Pool } from 'pg';
import { and, asc, count, desc, eq, ilike, inArray } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import {
  countries,
  cities,
  weatherSnapshots,
  newsArticles,
  adminUsers,
  CountryRow,
  CityRow,
  WeatherSnapshotRow,
  NewsArticleRow,
  AdminUserRow,
} from './schema';
import { createDrizzleClient, DrizzleClient } from './postgres.client';
import {
  AdminUserRecord,
  AdminUserRepository,
  CityRecord,
  CityRepository,
  CityWithCountry,
  CountryRecord,
  CountryRepository,
  CountryShort,
  Database,
  DatabaseStats,
  NewAdminUser,
  NewCity,
  NewCountry,
  NewNewsArticle,
  NewWeatherSnapshot,
  NewsArticleRecord,
  NewsRepository,
  PaginatedResult,
  WeatherRepository,
  WeatherSnapshotRecord,
  paginate,
} from './repository.interface';
import { ConflictError } from '../types/error.types';

const FOREIGN_KEY_VIOLATION = '23503';
const UNIQUE_VIOLATION = '23505';

// =============================================================================
// ROW MAPPERS
// =============================================================================

export function toCountryRecord(row: CountryRow): CountryRecord {
  return {
    ...row,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export function toCityRecord(row: CityRow): CityRecord {
  return {
    ...row,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

export function toWeatherSnapshotRecord(row: WeatherSnapshotRow): WeatherSnapshotRecord {
  return {
    ...row,
    observedAt: row.observedAt.toISOString(),
    createdAt: row.createdAt.toISOString(),
  };
}

export function toNewsArticleRecord(row: NewsArticleRow): NewsArticleRecord {
  return {
    ...row,
    publishedAt: row.publishedAt.toISOString(),
    createdAt: row.createdAt.toISOString(),
  };
}

export function toAdminUserRecord(row: AdminUserRow): AdminUserRecord {
  return {
    ...row,
    lastLoginAt: row.lastLoginAt ? row.lastLoginAt.toISOString() : null,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

/**
 * Escape LIKE wildcards so user input only matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

function containsPattern(value: string): string {
  return `%${escapeLikePattern(value)}%`;
}

function hasPgErrorCode(error: unknown, code: string): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('code' in error && error.code === code) return true;
  return 'cause' in error && hasPgErrorCode(error.cause, code);
}

function isForeignKeyViolation(error: unknown): boolean {
  return hasPgErrorCode(error, FOREIGN_KEY_VIOLATION);
}

function cityKey(countryId: number, name: string): string {
  return `${countryId}:${name}`;
}

// =============================================================================
// REPOSITORIES
// =============================================================================

class PgCountryRepository implements CountryRepository {
  constructor(private readonly client: DrizzleClient) {}

  async findByAlpha2(alpha2code: string): Promise<CountryRecord | null> {
    const [row] = await this.client
      .select()
      .from(countries)
      .where(eq(countries.alpha2code, alpha2code))
      .limit(1);
    return row ? toCountryRecord(row) : null;
  }

  async searchByName(name: string): Promise<CountryRecord[]> {
    const rows = await this.client
      .select()
      .from(countries)
      .where(ilike(countries.name, containsPattern(name)))
      .orderBy(asc(countries.name));
    return rows.map(toCountryRecord);
  }

  async list(page: number, pageSize: number): Promise<PaginatedResult<CountryRecord>> {
    const [rows, total] = await Promise.all([
      this.client
        .select()
        .from(countries)
        .orderBy(asc(countries.name))
        .limit(pageSize)
        .offset((page - 1) * pageSize),
      this.count(),
    ]);
    return paginate(rows.map(toCountryRecord), total, page, pageSize);
  }

  async createMany(input: NewCountry[]): Promise<CountryRecord[]> {
    if (input.length === 0) return [];

    await this.client
      .insert(countries)
      .values(input)
      .onConflictDoNothing({ target: countries.alpha2code });

    const codes = [...new Set(input.map(c => c.alpha2code))];
    const rows = await this.client
      .select()
      .from(countries)
      .where(inArray(countries.alpha2code, codes));

    const byCode = new Map(rows.map(row => [row.alpha2code, toCountryRecord(row)]));
    return input.flatMap(c => byCode.get(c.alpha2code) ?? []);
  }

  async deleteByAlpha2(alpha2code: string): Promise<boolean> {
    const deleted = await this.client
      .delete(countries)
      .where(eq(countries.alpha2code, alpha2code))
      .returning({ id: countries.id });
    return deleted.length > 0;
  }

  async count(): Promise<number> {
    const [result] = await this.client.select({ value: count() }).from(countries);
    return result?.value ?? 0;
  }
}

class PgCityRepository implements CityRepository {
  constructor(private readonly client: DrizzleClient) {}

  private selectWithCountry() {
    return this.client
      .select({
        city: cities,
        country: { name: countries.name, alpha2code: countries.alpha2code },
      })
      .from(cities)
      .innerJoin(countries, eq(cities.countryId, countries.id));
  }

  private static toCityWithCountry(row: { city: CityRow; country: CountryShort }): CityWithCountry {
    return { ...toCityRecord(row.city), country: row.country };
  }

  async findById(id: number): Promise<CityWithCountry | null> {
    const [row] = await this.selectWithCountry().where(eq(cities.id, id)).limit(1);
    return row ? PgCityRepository.toCityWithCountry(row) : null;
  }

  async search(name: string, alpha2code?: string): Promise<CityWithCountry[]> {
    const rows = await this.selectWithCountry()
      .where(and(
        ilike(cities.name, containsPattern(name)),
        alpha2code ? eq(countries.alpha2code, alpha2code) : undefined,
      ))
      .orderBy(asc(cities.name), asc(cities.id));
    return rows.map(PgCityRepository.toCityWithCountry);
  }

  async createMany(input: NewCity[]): Promise<CityRecord[]> {
    if (input.length === 0) return [];

    try {
      await this.client
        .insert(cities)
        .values(input)
        .onConflictDoNothing({ target: [cities.countryId, cities.name] });
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new ConflictError('City references a country that does not exist', {
          countryIds: [...new Set(input.map(c => c.countryId))],
        });
      }
      throw error;
    }

    const rows = await this.client
      .select()
      .from(cities)
      .where(and(
        inArray(cities.countryId, [...new Set(input.map(c => c.countryId))]),
        inArray(cities.name, [...new Set(input.map(c => c.name))]),
      ));

    const byKey = new Map(rows.map(row => [cityKey(row.countryId, row.name), toCityRecord(row)]));
    return input.flatMap(c => byKey.get(cityKey(c.countryId, c.name)) ?? []);
  }

  async deleteById(id: number): Promise<boolean> {
    const deleted = await this.client
      .delete(cities)
      .where(eq(cities.id, id))
      .returning({ id: cities.id });
    return deleted.length > 0;
  }

  async count(): Promise<number> {
    const [result] = await this.client.select({ value: count() }).from(cities);
    return result?.value ?? 0;
  }
}

class PgWeatherRepository implements WeatherRepository {
  constructor(private readonly client: DrizzleClient) {}

  async create(snapshot: NewWeatherSnapshot): Promise<WeatherSnapshotRecord> {
    try {
      const [row] = await this.client
        .insert(weatherSnapshots)
        .values({ ...snapshot, observedAt: new Date(snapshot.observedAt) })
        .returning();
      return toWeatherSnapshotRecord(row);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new ConflictError('Weather snapshot references a city that does not exist', {
          cityId: snapshot.cityId,
        });
      }
      throw error;
    }
  }

  async listByCity(cityId: number, limit: number): Promise<WeatherSnapshotRecord[]> {
    const rows = await this.client
      .select()
      .from(weatherSnapshots)
      .where(eq(weatherSnapshots.cityId, cityId))
      .orderBy(desc(weatherSnapshots.observedAt), desc(weatherSnapshots.id))
      .limit(limit);
    return rows.map(toWeatherSnapshotRecord);
  }

  async count(): Promise<number> {
    const [result] = await this.client.select({ value: count() }).from(weatherSnapshots);
    return result?.value ?? 0;
  }
}

class PgNewsRepository implements NewsRepository {
  constructor(private readonly client: DrizzleClient) {}

  async listByCountry(countryId: number, limit: number): Promise<NewsArticleRecord[]> {
    const rows = await this.client
      .select()
      .from(newsArticles)
      .where(eq(newsArticles.countryId, countryId))
      .orderBy(desc(newsArticles.publishedAt), desc(newsArticles.id))
      .limit(limit);
    return rows.map(toNewsArticleRecord);
  }

  async createMany(input: NewNewsArticle[]): Promise<NewsArticleRecord[]> {
    if (input.length === 0) return [];

    try {
      const rows = await this.client
        .insert(newsArticles)
        .values(input.map(article => ({ ...article, publishedAt: new Date(article.publishedAt) })))
        .returning();
      return rows.map(toNewsArticleRecord);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new ConflictError('News article references a country that does not exist', {
          countryIds: [...new Set(input.map(article => article.countryId))],
        });
      }
      throw error;
    }
  }

  async count(): Promise<number> {
    const [result] = await this.client.select({ value: count() }).from(newsArticles);
    return result?.value ?? 0;
  }
}

class PgAdminUserRepository implements AdminUserRepository {
  constructor(private readonly client: DrizzleClient) {}

  async findById(id: string): Promise<AdminUserRecord | null> {
    const [row] = await this.client.select().from(adminUsers).where(eq(adminUsers.id, id)).limit(1);
    return row ? toAdminUserRecord(row) : null;
  }

  async findByUsername(username: string): Promise<AdminUserRecord | null> {
    const [row] = await this.client
      .select()
      .from(adminUsers)
      .where(eq(adminUsers.username, username))
      .limit(1);
    return row ? toAdminUserRecord(row) : null;
  }

  async create(user: NewAdminUser): Promise<AdminUserRecord> {
    try {
      const [row] = await this.client
        .insert(adminUsers)
        .values({ ...user, id: uuidv4() })
        .returning();
      return toAdminUserRecord(row);
    } catch (error) {
      if (hasPgErrorCode(error, UNIQUE_VIOLATION)) {
        throw new ConflictError(`Admin user "${user.username}" already exists`);
      }
      throw error;
    }
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    await this.client
      .update(adminUsers)
      .set({ lastLoginAt: at, updatedAt: at })
      .where(eq(adminUsers.id, id));
  }

  async count(): Promise<number> {
    const [result] = await this.client.select({ value: count() }).from(adminUsers);
    return result?.value ?? 0;
  }
}

// =============================================================================
// DATABASE
// =============================================================================

export class PostgresDatabase implements Database {
  readonly countries: CountryRepository;
  readonly cities: CityRepository;
  readonly weather: WeatherRepository;
  readonly news: NewsRepository;
  readonly adminUsers: AdminUserRepository;
  readonly client: DrizzleClient;

  constructor(private readonly pool: Pool) {
    this.client = createDrizzleClient(pool);
    this.countries = new PgCountryRepository(this.client);
    this.cities = new PgCityRepository(this.client);
    this.weather = new PgWeatherRepository(this.client);
    this.news = new PgNewsRepository(this.client);
    this.adminUsers = new PgAdminUserRepository(this.client);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async getStats(): Promise<DatabaseStats> {
    const [countryCount, cityCount, snapshotCount, newsCount, adminCount] = await Promise.all([
      this.countries.count(),
      this.cities.count(),
      this.weather.count(),
      this.news.count(),
      this.adminUsers.count(),
    ]);
    return {
      driver: 'postgres',
      countries: countryCount,
      cities: cityCount,
      weatherSnapshots: snapshotCount,
      newsArticles: newsCount,
      adminUsers: adminCount,
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
