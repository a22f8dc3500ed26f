/**
 * Shared test records
 */

import type { NewCountry, NewNewsArticle, NewWeatherSnapshot } from '../shared/database/repository.interface';
import type { CityInfo } from '../shared/services/countries-api.service';
import type { WeatherInfo } from '../shared/services/weather-api.service';
import type { NewsItem } from '../shared/services/news-api.service';

export function makeCountry(overrides: Partial<NewCountry> = {}): NewCountry {
  return {
    name: 'Testland',
    alpha2code: 'TL',
    alpha3code: 'TLD',
    capital: 'Capital City',
    region: 'Europe',
    subregion: 'Western Europe',
    population: 1000000,
    latitude: 10.5,
    longitude: 20.25,
    demonym: 'Testish',
    area: 1234.5,
    numericCode: '999',
    flag: 'https://flags.example.test/tl.svg',
    currencies: ['EUR'],
    languages: [{ name: 'Testish', nativeName: 'Testisch' }],
    ...overrides,
  };
}

export function makeCityInfo(overrides: Partial<CityInfo> = {}): CityInfo {
  return {
    name: 'Springfield',
    stateOrRegion: 'North',
    country: { name: 'Testland', alpha2code: 'TL' },
    latitude: 11.5,
    longitude: 21.5,
    ...overrides,
  };
}

export function makeWeatherInfo(overrides: Partial<WeatherInfo> = {}): WeatherInfo {
  return {
    observedAt: '2024-05-01T12:00:00.000Z',
    temperature: 18.5,
    pressure: 1013,
    humidity: 60,
    windSpeed: 3.6,
    description: 'scattered clouds',
    visibility: 10000,
    timezoneOffset: 7200,
    ...overrides,
  };
}

export function makeSnapshot(cityId: number, overrides: Partial<WeatherInfo> = {}): NewWeatherSnapshot {
  return { ...makeWeatherInfo(overrides), cityId };
}

export function makeNewsItem(overrides: Partial<NewsItem> = {}): NewsItem {
  return {
    source: 'Testland Herald',
    author: 'Jane Writer',
    title: 'Harbour reopens after storm',
    description: 'Ferries are running again.',
    url: 'https://news.example.test/harbour',
    publishedAt: '2024-05-01T09:30:00.000Z',
    ...overrides,
  };
}

export function makeNewsArticle(countryId: number, overrides: Partial<NewsItem> = {}): NewNewsArticle {
  return { ...makeNewsItem(overrides), countryId };
}
