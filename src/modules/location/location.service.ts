/**
 * =============================================================================
 * LOCATION MODULE - SERVICE
 * =============================================================================
 *
 * One response with everything known about a city:
 *   1. its country (stored or fetched)
 *   2. current weather (stored as a snapshot)
 *   3. exchange rates of the country's currencies against BASE_CURRENCY
 *
 * Steps run one after another. Missing rates leave `currencyRates` empty;
 * every other failure propagates.
 * =============================================================================
 */

import { CountryRecord, WeatherSnapshotRecord } from '../../shared/database/repository.interface';
import { NotFoundError } from '../../shared/types/error.types';
import { logger } from '../../shared/services/logger.service';
import { config } from '../../config/environment';
import { CountryService, countryService } from '../country/country.service';
import { WeatherService, weatherService } from '../weather/weather.service';
import { CurrencyService, currencyService } from '../currency/currency.service';

export interface LocationInfo {
  location: CountryRecord;
  weather: WeatherSnapshotRecord;
  currencyRates: Record<string, number>;
}

export class LocationService {
  constructor(
    private readonly countries: CountryService,
    private readonly weather: WeatherService,
    private readonly currency: CurrencyService,
    private readonly baseCurrency: string
  ) {}

  async getLocationInfo(cityName: string, alpha2code: string): Promise<LocationInfo> {
    const location = await this.countries.getCountryByCode(alpha2code);
    const { weather } = await this.weather.getCurrentWeather(cityName, alpha2code);
    const currencyRates = await this.getCountryRates(location);

    return { location, weather, currencyRates };
  }

  private async getCountryRates(country: CountryRecord): Promise<Record<string, number>> {
    if (country.currencies.length === 0) {
      return {};
    }

    try {
      const { rates } = await this.currency.getRates(this.baseCurrency);
      const countryRates: Record<string, number> = {};
      for (const code of country.currencies) {
        if (code in rates) {
          countryRates[code] = rates[code];
        }
      }
      return countryRates;
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      logger.warn('[LOCATION] No rates for base currency', { base: this.baseCurrency });
      return {};
    }
  }
}

export const locationService = new LocationService(
  countryService,
  weatherService,
  currencyService,
  config.baseCurrency
);
