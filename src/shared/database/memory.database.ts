/**
 * =============================================================================
 * MEMORY DATABASE - In-process storage
 * =============================================================================
 *
 * Same contract as PostgresDatabase, kept in Maps. Used by the test suite and
 * for local runs with DATABASE_DRIVER=memory. Data is lost on restart.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AdminUserRecord,
  AdminUserRepository,
  CityRecord,
  CityRepository,
  CityWithCountry,
  CountryRecord,
  CountryRepository,
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

interface MemoryTables {
  countries: Map<number, CountryRecord>;
  cities: Map<number, CityRecord>;
  weatherSnapshots: Map<number, WeatherSnapshotRecord>;
  newsArticles: Map<number, NewsArticleRecord>;
  adminUsers: Map<string, AdminUserRecord>;
  sequences: { countries: number; cities: number; weatherSnapshots: number; newsArticles: number };
}

function includesIgnoreCase(value: string, search: string): boolean {
  return value.toLowerCase().includes(search.toLowerCase());
}

function byName(a: { name: string; id: number }, b: { name: string; id: number }): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return a.id - b.id;
}

function cascadeCityDelete(tables: MemoryTables, cityId: number): void {
  for (const [id, snapshot] of tables.weatherSnapshots) {
    if (snapshot.cityId === cityId) tables.weatherSnapshots.delete(id);
  }
  tables.cities.delete(cityId);
}

class MemoryCountryRepository implements CountryRepository {
  constructor(private readonly tables: MemoryTables) {}

  private findSync(alpha2code: string): CountryRecord | null {
    for (const country of this.tables.countries.values()) {
      if (country.alpha2code === alpha2code) return country;
    }
    return null;
  }

  async findByAlpha2(alpha2code: string): Promise<CountryRecord | null> {
    return this.findSync(alpha2code);
  }

  async searchByName(name: string): Promise<CountryRecord[]> {
    return [...this.tables.countries.values()]
      .filter(country => includesIgnoreCase(country.name, name))
      .sort(byName);
  }

  async list(page: number, pageSize: number): Promise<PaginatedResult<CountryRecord>> {
    const all = [...this.tables.countries.values()].sort(byName);
    const offset = (page - 1) * pageSize;
    return paginate(all.slice(offset, offset + pageSize), all.length, page, pageSize);
  }

  async createMany(input: NewCountry[]): Promise<CountryRecord[]> {
    return input.map(country => {
      const existing = this.findSync(country.alpha2code);
      if (existing) return existing;

      const now = new Date().toISOString();
      const record: CountryRecord = {
        ...country,
        currencies: [...country.currencies],
        languages: country.languages.map(language => ({ ...language })),
        id: ++this.tables.sequences.countries,
        createdAt: now,
        updatedAt: now,
      };
      this.tables.countries.set(record.id, record);
      return record;
    });
  }

  async deleteByAlpha2(alpha2code: string): Promise<boolean> {
    const country = this.findSync(alpha2code);
    if (!country) return false;

    for (const city of [...this.tables.cities.values()]) {
      if (city.countryId === country.id) cascadeCityDelete(this.tables, city.id);
    }
    for (const [id, article] of this.tables.newsArticles) {
      if (article.countryId === country.id) this.tables.newsArticles.delete(id);
    }
    this.tables.countries.delete(country.id);
    return true;
  }

  async count(): Promise<number> {
    return this.tables.countries.size;
  }
}

class MemoryCityRepository implements CityRepository {
  constructor(private readonly tables: MemoryTables) {}

  private withCountry(city: CityRecord): CityWithCountry | null {
    const country = this.tables.countries.get(city.countryId);
    if (!country) return null;
    return { ...city, country: { name: country.name, alpha2code: country.alpha2code } };
  }

  async findById(id: number): Promise<CityWithCountry | null> {
    const city = this.tables.cities.get(id);
    return city ? this.withCountry(city) : null;
  }

  async search(name: string, alpha2code?: string): Promise<CityWithCountry[]> {
    return [...this.tables.cities.values()]
      .filter(city => includesIgnoreCase(city.name, name))
      .flatMap(city => this.withCountry(city) ?? [])
      .filter(city => !alpha2code || city.country.alpha2code === alpha2code)
      .sort(byName);
  }

  async createMany(input: NewCity[]): Promise<CityRecord[]> {
    const missing = input.filter(city => !this.tables.countries.has(city.countryId));
    if (missing.length > 0) {
      throw new ConflictError('City references a country that does not exist', {
        countryIds: [...new Set(missing.map(city => city.countryId))],
      });
    }

    return input.map(city => {
      const existing = [...this.tables.cities.values()]
        .find(stored => stored.countryId === city.countryId && stored.name === city.name);
      if (existing) return existing;

      const now = new Date().toISOString();
      const record: CityRecord = {
        ...city,
        id: ++this.tables.sequences.cities,
        createdAt: now,
        updatedAt: now,
      };
      this.tables.cities.set(record.id, record);
      return record;
    });
  }

  async deleteById(id: number): Promise<boolean> {
    if (!this.tables.cities.has(id)) return false;
    cascadeCityDelete(this.tables, id);
    return true;
  }

  async count(): Promise<number> {
    return this.tables.cities.size;
  }
}

class MemoryWeatherRepository implements WeatherRepository {
  constructor(private readonly tables: MemoryTables) {}

  async create(snapshot: NewWeatherSnapshot): Promise<WeatherSnapshotRecord> {
    if (!this.tables.cities.has(snapshot.cityId)) {
      throw new ConflictError('Weather snapshot references a city that does not exist', {
        cityId: snapshot.cityId,
      });
    }

    const record: WeatherSnapshotRecord = {
      ...snapshot,
      observedAt: new Date(snapshot.observedAt).toISOString(),
      id: ++this.tables.sequences.weatherSnapshots,
      createdAt: new Date().toISOString(),
    };
    this.tables.weatherSnapshots.set(record.id, record);
    return record;
  }

  async listByCity(cityId: number, limit: number): Promise<WeatherSnapshotRecord[]> {
    return [...this.tables.weatherSnapshots.values()]
      .filter(snapshot => snapshot.cityId === cityId)
      .sort((a, b) => b.observedAt.localeCompare(a.observedAt) || b.id - a.id)
      .slice(0, limit);
  }

  async count(): Promise<number> {
    return this.tables.weatherSnapshots.size;
  }
}

class MemoryNewsRepository implements NewsRepository {
  constructor(private readonly tables: MemoryTables) {}

  async listByCountry(countryId: number, limit: number): Promise<NewsArticleRecord[]> {
    return [...this.tables.newsArticles.values()]
      .filter(article => article.countryId === countryId)
      .sort((a, b) => b.publishedAt.localeCompare(a.publishedAt) || b.id - a.id)
      .slice(0, limit);
  }

  async createMany(input: NewNewsArticle[]): Promise<NewsArticleRecord[]> {
    const missing = input.filter(article => !this.tables.countries.has(article.countryId));
    if (missing.length > 0) {
      throw new ConflictError('News article references a country that does not exist', {
        countryIds: [...new Set(missing.map(article => article.countryId))],
      });
    }

    const createdAt = new Date().toISOString();
    return input.map(article => {
      const record: NewsArticleRecord = {
        ...article,
        publishedAt: new Date(article.publishedAt).toISOString(),
        id: ++this.tables.sequences.newsArticles,
        createdAt,
      };
      this.tables.newsArticles.set(record.id, record);
      return record;
    });
  }

  async count(): Promise<number> {
    return this.tables.newsArticles.size;
  }
}

class MemoryAdminUserRepository implements AdminUserRepository {
  constructor(private readonly tables: MemoryTables) {}

  async findById(id: string): Promise<AdminUserRecord | null> {
    return this.tables.adminUsers.get(id) ?? null;
  }

  async findByUsername(username: string): Promise<AdminUserRecord | null> {
    for (const user of this.tables.adminUsers.values()) {
      if (user.username === username) return user;
    }
    return null;
  }

  async create(user: NewAdminUser): Promise<AdminUserRecord> {
    if (await this.findByUsername(user.username)) {
      throw new ConflictError(`Admin user "${user.username}" already exists`);
    }

    const now = new Date().toISOString();
    const record: AdminUserRecord = {
      ...user,
      id: uuidv4(),
      lastLoginAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.tables.adminUsers.set(record.id, record);
    return record;
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    const user = this.tables.adminUsers.get(id);
    if (!user) return;
    this.tables.adminUsers.set(id, { ...user, lastLoginAt: at.toISOString(), updatedAt: at.toISOString() });
  }

  async count(): Promise<number> {
    return this.tables.adminUsers.size;
  }
}

export class MemoryDatabase implements Database {
  readonly countries: CountryRepository;
  readonly cities: CityRepository;
  readonly weather: WeatherRepository;
  readonly news: NewsRepository;
  readonly adminUsers: AdminUserRepository;
  private readonly tables: MemoryTables;

  constructor() {
    this.tables = {
      countries: new Map(),
      cities: new Map(),
      weatherSnapshots: new Map(),
      newsArticles: new Map(),
      adminUsers: new Map(),
      sequences: { countries: 0, cities: 0, weatherSnapshots: 0, newsArticles: 0 },
    };
    this.countries = new MemoryCountryRepository(this.tables);
    this.cities = new MemoryCityRepository(this.tables);
    this.weather = new MemoryWeatherRepository(this.tables);
    this.news = new MemoryNewsRepository(this.tables);
    this.adminUsers = new MemoryAdminUserRepository(this.tables);
  }

  async ping(): Promise<void> {
    // Always reachable
  }

  async getStats(): Promise<DatabaseStats> {
    return {
      driver: 'memory',
      countries: this.tables.countries.size,
      cities: this.tables.cities.size,
      weatherSnapshots: this.tables.weatherSnapshots.size,
      newsArticles: this.tables.newsArticles.size,
      adminUsers: this.tables.adminUsers.size,
    };
  }

  /** Drop every row and restart the id sequences */
  reset(): void {
    this.tables.countries.clear();
    this.tables.cities.clear();
    this.tables.weatherSnapshots.clear();
    this.tables.newsArticles.clear();
    this.tables.adminUsers.clear();
    this.tables.sequences = { countries: 0, cities: 0, weatherSnapshots: 0, newsArticles: 0 };
  }

  async close(): Promise<void> {
    this.reset();
  }
}
