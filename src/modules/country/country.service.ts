/**
 * =============================================================================
 * COUNTRY MODULE - SERVICE
 * =============================================================================
 *
 * Database first, provider on a miss. Whatever the provider returns is stored
 * before it is served, so the second lookup never leaves the process.
 * =============================================================================
 */

import { Database, CountryRecord } from '../../shared/database/repository.interface';
import { db } from '../../shared/database/db';
import { countriesApi, CountriesApiService } from '../../shared/services/countries-api.service';
import { NotFoundError } from '../../shared/types/error.types';
import { logger } from '../../shared/services/logger.service';

export type CountriesProvider = Pick<CountriesApiService, 'getCountriesByName' | 'getCountryByCode'>;

export class CountryService {
  constructor(
    private readonly database: Database,
    private readonly provider: CountriesProvider
  ) {}

  /**
   * Countries whose name contains `name`
   */
  async searchCountries(name: string): Promise<CountryRecord[]> {
    const stored = await this.database.countries.searchByName(name);
    if (stored.length > 0) {
      return stored;
    }

    const fetched = await this.provider.getCountriesByName(name);
    if (fetched.length === 0) {
      throw new NotFoundError('Country', { search: name });
    }

    const saved = await this.database.countries.createMany(fetched);
    logger.info('[COUNTRY] Stored countries from provider', {
      search: name,
      codes: saved.map(country => country.alpha2code)
    });
    return saved;
  }

  /**
   * Country by ISO alpha-2 code (upper case)
   */
  async getCountryByCode(alpha2code: string): Promise<CountryRecord> {
    const stored = await this.database.countries.findByAlpha2(alpha2code);
    if (stored) {
      return stored;
    }

    const fetched = await this.provider.getCountryByCode(alpha2code);
    if (!fetched) {
      throw new NotFoundError('Country', { alpha2code });
    }

    const [saved] = await this.database.countries.createMany([fetched]);
    logger.info('[COUNTRY] Stored country from provider', { alpha2code: saved.alpha2code });
    return saved;
  }
}

export const countryService = new CountryService(db, countriesApi);
