/**
 * =============================================================================
 * WEATHER MODULE - SERVICE
 * =============================================================================
 *
 * Current weather always goes to the provider; every answer is appended to
 * the city's snapshot history. History reads the database only.
 * =============================================================================
 */

import { Database, CityWithCountry, WeatherSnapshotRecord } from '../../shared/database/repository.interface';
import { db } from '../../shared/database/db';
import { weatherApi, WeatherApiService } from '../../shared/services/weather-api.service';
import { NotFoundError } from '../../shared/types/error.types';
import { logger } from '../../shared/services/logger.service';
import { CityService, cityService } from '../city/city.service';

export type WeatherProvider = Pick<WeatherApiService, 'getWeather'>;

export interface CurrentWeather {
  city: CityWithCountry;
  weather: WeatherSnapshotRecord;
}

export interface WeatherHistory {
  city: CityWithCountry;
  snapshots: WeatherSnapshotRecord[];
}

export class WeatherService {
  constructor(
    private readonly database: Database,
    private readonly provider: WeatherProvider,
    private readonly cities: CityService
  ) {}

  async getCurrentWeather(cityName: string, alpha2code: string): Promise<CurrentWeather> {
    const city = await this.cities.resolveCity(cityName, alpha2code);

    const weather = await this.provider.getWeather(city.name, city.country.alpha2code);
    if (!weather) {
      throw new NotFoundError('Weather', { city: city.name, alpha2code: city.country.alpha2code });
    }

    const snapshot = await this.database.weather.create({ ...weather, cityId: city.id });
    logger.debug('[WEATHER] Snapshot stored', { cityId: city.id, observedAt: snapshot.observedAt });

    return { city, weather: snapshot };
  }

  async getHistory(cityName: string, alpha2code: string, limit: number): Promise<WeatherHistory> {
    const city = await this.cities.findStoredCity(cityName, alpha2code);
    const snapshots = await this.database.weather.listByCity(city.id, limit);
    return { city, snapshots };
  }
}

export const weatherService = new WeatherService(db, weatherApi, cityService);
