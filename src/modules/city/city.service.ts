/**
 * =============================================================================
 * CITY MODULE - SERVICE
 * =============================================================================
 *
 * Same database-first flow as countries, with one extra step: every city is
 * stored under its country, so each country the provider mentions is resolved
 * (and stored) through the country service first. Cities whose country cannot
 * be resolved are dropped.
 * =============================================================================
 */

import { Database, CityWithCountry, CountryRecord, NewCity } from '../../shared/database/repository.interface';
import { db } from '../../shared/database/db';
import { countriesApi, CountriesApiService, CityInfo } from '../../shared/services/countries-api.service';
import { NotFoundError } from '../../shared/types/error.types';
import { logger } from '../../shared/services/logger.service';
import { CountryService, countryService } from '../country/country.service';

export type CitiesProvider = Pick<CountriesApiService, 'getCitiesByName'>;

export class CityService {
  constructor(
    private readonly database: Database,
    private readonly provider: CitiesProvider,
    private readonly countries: CountryService
  ) {}

  /**
   * Cities whose name contains `name`, optionally within one country
   */
  async searchCities(name: string, alpha2code?: string): Promise<CityWithCountry[]> {
    const stored = await this.database.cities.search(name, alpha2code);
    if (stored.length > 0) {
      return stored;
    }

    return this.fetchAndStore(name, alpha2code);
  }

  /**
   * The single city a weather lookup refers to. Prefers an exact
   * (case-insensitive) name match over a partial one.
   *
   * Stored partial matches ("New York" for "York") do not stop the search:
   * the provider is asked first, and a partial match is used only when it
   * has no exact one either.
   */
  async resolveCity(name: string, alpha2code: string): Promise<CityWithCountry> {
    const stored = await this.database.cities.search(name, alpha2code);
    const exact = CityService.pickBestMatch(stored, name);
    if (exact) {
      return exact;
    }

    try {
      await this.fetchAndStore(name, alpha2code);
    } catch (error) {
      if (!(error instanceof NotFoundError) || stored.length === 0) {
        throw error;
      }
    }

    const matches = await this.database.cities.search(name, alpha2code);
    const city = CityService.pickBestMatch(matches, name) ?? matches[0];
    if (!city) {
      throw new NotFoundError('City', { search: name, alpha2code });
    }
    return city;
  }

  /**
   * Stored city only - never calls the provider
   */
  async findStoredCity(name: string, alpha2code: string): Promise<CityWithCountry> {
    const matches = await this.database.cities.search(name, alpha2code);
    const city = CityService.pickBestMatch(matches, name);
    if (!city) {
      throw new NotFoundError('City', { search: name, alpha2code });
    }
    return city;
  }

  private static searchDetails(name: string, alpha2code?: string): Record<string, unknown> {
    return alpha2code ? { search: name, alpha2code } : { search: name };
  }

  private static pickBestMatch(cities: CityWithCountry[], name: string): CityWithCountry | undefined {
    const wanted = name.trim().toLowerCase();
    return cities.find(city => city.name.toLowerCase() === wanted);
  }

  private countryFor(countriesByCode: Map<string, CountryRecord>, city: CityInfo): CountryRecord {
    const country = countriesByCode.get(city.country.alpha2code);
    if (!country) {
      throw new Error(`Country ${city.country.alpha2code} was not resolved`);
    }
    return country;
  }

  private async fetchAndStore(name: string, alpha2code?: string): Promise<CityWithCountry[]> {
    const fetched = CityService.uniqueByCountryAndName(
      (await this.provider.getCitiesByName(name))
        .filter(city => !alpha2code || city.country.alpha2code === alpha2code)
    );
    if (fetched.length === 0) {
      throw new NotFoundError('City', CityService.searchDetails(name, alpha2code));
    }

    const countriesByCode = await this.resolveCountries(fetched);
    const resolved = fetched.filter(city => countriesByCode.has(city.country.alpha2code));
    if (resolved.length === 0) {
      throw new NotFoundError('City', CityService.searchDetails(name, alpha2code));
    }

    const newCities: NewCity[] = resolved.map(city => ({
      countryId: this.countryFor(countriesByCode, city).id,
      name: city.name,
      stateOrRegion: city.stateOrRegion,
      latitude: city.latitude,
      longitude: city.longitude,
    }));
    const saved = await this.database.cities.createMany(newCities);

    logger.info('[CITY] Stored cities from provider', { search: name, count: saved.length });

    // createMany keeps input order, so saved[i] belongs to resolved[i]
    return saved.map((city, index) => {
      const country = this.countryFor(countriesByCode, resolved[index]);
      return { ...city, country: { name: country.name, alpha2code: country.alpha2code } };
    });
  }

  /**
   * One city per (country, name), the first the provider listed.
   * Cities are stored under that key, so later namesakes would map onto the same row.
   */
  private static uniqueByCountryAndName(cities: CityInfo[]): CityInfo[] {
    const seen = new Set<string>();
    return cities.filter(city => {
      const key = `${city.country.alpha2code}:${city.name}`;
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  private async resolveCountries(cities: CityInfo[]): Promise<Map<string, CountryRecord>> {
    const codes = [...new Set(cities.map(city => city.country.alpha2code))];
    const resolved = new Map<string, CountryRecord>();

    // Sequential on purpose: one provider call at a time per request
    for (const code of codes) {
      try {
        resolved.set(code, await this.countries.getCountryByCode(code));
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
        logger.warn('[CITY] Skipping cities of an unknown country', { alpha2code: code });
      }
    }

    return resolved;
  }
}

export const cityService = new CityService(db, countriesApi, countryService);
