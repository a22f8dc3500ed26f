/**
 * =============================================================================
 * REPOSITORY INTERFACE - Database Abstraction Layer
 * =============================================================================
 *
 * This interface defines the contract for all database operations.
 * Implementations:
 *   - PostgresDatabase (production, drizzle-orm over node-postgres)
 *   - MemoryDatabase (tests and local runs without PostgreSQL)
 *
 * Both enforce the same referential rules: a city or news article needs an
 * existing country, a weather snapshot needs an existing city, deletes
 * cascade downwards.
 * =============================================================================
 */

/**
 * Pagination result wrapper
 */
export interface PaginatedResult<T> {
  data: T[];
  pagination: {
    total: number;
    page: number;
    pageSize: number;
    totalPages: number;
    hasMore: boolean;
  };
}

/**
 * Base entity interface - all records have these fields
 */
export interface BaseEntity<Id = number> {
  id: Id;
  createdAt: string;
  updatedAt: string;
}

type NewRecord<T extends BaseEntity<unknown>> = Omit<T, 'id' | 'createdAt' | 'updatedAt'>;

// =============================================================================
// RECORDS
// =============================================================================

export interface LanguageInfo {
  name: string;
  nativeName: string;
}

export interface CountryRecord extends BaseEntity {
  name: string;
  alpha2code: string;
  alpha3code: string;
  capital: string;
  region: string;
  subregion: string;
  population: number;
  latitude: number | null;
  longitude: number | null;
  demonym: string;
  area: number | null;
  numericCode: string;
  flag: string;
  /** ISO 4217 codes */
  currencies: string[];
  languages: LanguageInfo[];
}

export interface CityRecord extends BaseEntity {
  countryId: number;
  name: string;
  stateOrRegion: string | null;
  latitude: number;
  longitude: number;
}

export interface CountryShort {
  name: string;
  alpha2code: string;
}

export interface CityWithCountry extends CityRecord {
  country: CountryShort;
}

export interface WeatherSnapshotRecord {
  id: number;
  cityId: number;
  /** Provider observation time (ISO, UTC) */
  observedAt: string;
  /** Celsius */
  temperature: number;
  /** hPa */
  pressure: number;
  /** Percent */
  humidity: number;
  /** m/s */
  windSpeed: number;
  description: string;
  /** Metres */
  visibility: number;
  /** Shift in seconds from UTC */
  timezoneOffset: number;
  createdAt: string;
}

export interface NewsArticleRecord {
  id: number;
  countryId: number;
  source: string;
  /** Empty when the provider has none */
  author: string;
  title: string;
  description: string;
  url: string;
  publishedAt: string;
  createdAt: string;
}

export interface AdminUserRecord extends BaseEntity<string> {
  username: string;
  passwordHash: string;
  isSuperuser: boolean;
  isActive: boolean;
  lastLoginAt: string | null;
}

export type NewCountry = NewRecord<CountryRecord>;
export type NewCity = NewRecord<CityRecord>;
export type NewWeatherSnapshot = Omit<WeatherSnapshotRecord, 'id' | 'createdAt'>;
export type NewNewsArticle = Omit<NewsArticleRecord, 'id' | 'createdAt'>;
export type NewAdminUser = Omit<NewRecord<AdminUserRecord>, 'lastLoginAt'>;

// =============================================================================
// REPOSITORIES
// =============================================================================

export interface CountryRepository {
  findByAlpha2(alpha2code: string): Promise<CountryRecord | null>;

  /** Case-insensitive substring match on the name, ordered by name */
  searchByName(name: string): Promise<CountryRecord[]>;

  list(page: number, pageSize: number): Promise<PaginatedResult<CountryRecord>>;

  /**
   * Insert countries whose alpha2code is not stored yet.
   * Returns the stored row for every input, in input order.
   */
  createMany(countries: NewCountry[]): Promise<CountryRecord[]>;

  /** Deletes the country with its cities, their snapshots and its news */
  deleteByAlpha2(alpha2code: string): Promise<boolean>;

  count(): Promise<number>;
}

export interface CityRepository {
  findById(id: number): Promise<CityWithCountry | null>;

  /** Case-insensitive substring match on the name, optionally within one country */
  search(name: string, alpha2code?: string): Promise<CityWithCountry[]>;

  /**
   * Insert cities not stored yet for their (countryId, name).
   * Returns the stored row for every input, in input order.
   */
  createMany(cities: NewCity[]): Promise<CityRecord[]>;

  /** Deletes the city with its snapshots */
  deleteById(id: number): Promise<boolean>;

  count(): Promise<number>;
}

export interface WeatherRepository {
  create(snapshot: NewWeatherSnapshot): Promise<WeatherSnapshotRecord>;

  /** Newest observation first */
  listByCity(cityId: number, limit: number): Promise<WeatherSnapshotRecord[]>;

  count(): Promise<number>;
}

export interface NewsRepository {
  /** Newest publication first */
  listByCountry(countryId: number, limit: number): Promise<NewsArticleRecord[]>;

  /** Returns the stored rows in input order */
  createMany(articles: NewNewsArticle[]): Promise<NewsArticleRecord[]>;

  count(): Promise<number>;
}

export interface AdminUserRepository {
  findById(id: string): Promise<AdminUserRecord | null>;
  findByUsername(username: string): Promise<AdminUserRecord | null>;
  create(user: NewAdminUser): Promise<AdminUserRecord>;
  recordLogin(id: string, at: Date): Promise<void>;
  count(): Promise<number>;
}

export interface DatabaseStats {
  driver: 'postgres' | 'memory';
  countries: number;
  cities: number;
  weatherSnapshots: number;
  newsArticles: number;
  adminUsers: number;
}

/**
 * Everything the services need from storage
 */
export interface Database {
  readonly countries: CountryRepository;
  readonly cities: CityRepository;
  readonly weather: WeatherRepository;
  readonly news: NewsRepository;
  readonly adminUsers: AdminUserRepository;

  /** Resolves when the store answers a trivial query */
  ping(): Promise<void>;
  getStats(): Promise<DatabaseStats>;
  close(): Promise<void>;
}

/**
 * Build a pagination wrapper from a page of rows and the total count
 */
export function paginate<T>(data: T[], total: number, page: number, pageSize: number): PaginatedResult<T> {
  const totalPages = Math.ceil(total / pageSize);
  return {
    data,
    pagination: {
      total,
      page,
      pageSize,
      totalPages,
      hasMore: page < totalPages
    }
  };
}
