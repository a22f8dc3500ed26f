/**
 * =============================================================================
 * WEATHER API SERVICE - Weather provider (OpenWeatherMap current weather)
 * =============================================================================
 *
 * GET {base}/weather?units=metric&q={city},{alpha2}&appid={API_KEY_OPENWEATHER}
 * =============================================================================
 */

import { z } from 'zod';
import { ProviderClient, ProviderClientOptions } from './provider-client';
import { config } from '../../config/environment';
import type { NewWeatherSnapshot } from '../database/repository.interface';

const providerWeatherSchema = z.object({
  main: z.object({
    temp: z.number(),
    pressure: z.number(),
    humidity: z.number(),
  }),
  wind: z.object({
    speed: z.number(),
  }),
  weather: z.array(z.object({
    description: z.string(),
  })).min(1),
  // Missing when visibility is unknown
  visibility: z.number().optional(),
  dt: z.number().int(),
  timezone: z.number().int(),
});

export type ProviderWeather = z.infer<typeof providerWeatherSchema>;

/**
 * Current conditions, not yet tied to a stored city
 */
export type WeatherInfo = Omit<NewWeatherSnapshot, 'cityId'>;

export function toWeatherInfo(weather: ProviderWeather): WeatherInfo {
  return {
    observedAt: new Date(weather.dt * 1000).toISOString(),
    temperature: weather.main.temp,
    pressure: Math.round(weather.main.pressure),
    humidity: Math.round(weather.main.humidity),
    windSpeed: weather.wind.speed,
    description: weather.weather[0].description,
    visibility: Math.round(weather.visibility ?? 0),
    timezoneOffset: weather.timezone,
  };
}

export class WeatherApiService extends ProviderClient {
  protected readonly providerName = 'Weather provider';

  /**
   * Current weather for a city within a country, null when the provider does not know it
   */
  async getWeather(city: string, alpha2code: string): Promise<WeatherInfo | null> {
    const url = this.buildUrl('/weather', {
      units: 'metric',
      q: `${city},${alpha2code}`,
      appid: this.apiKey,
    });
    const result = await this.getJson(url, providerWeatherSchema);
    return result ? toWeatherInfo(result) : null;
  }
}

export function createWeatherApi(options: Partial<ProviderClientOptions> = {}): WeatherApiService {
  return new WeatherApiService({
    apiKey: config.providers.openWeatherKey,
    baseUrl: config.providers.weatherBaseUrl,
    timeoutMs: config.providers.requestTimeoutMs,
    ...options,
  });
}

export const weatherApi = createWeatherApi();
