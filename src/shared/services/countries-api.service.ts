/**
 * =============================================================================
 * COUNTRIES API SERVICE - Geography provider (apilayer geo)
 * =============================================================================
 *
 * - GET {base}/country/name/{name}  → countries matching a name
 * - GET {base}/country/code/{code}  → one country by ISO alpha-2 code
 * - GET {base}/city/name/{name}     → cities matching a name
 *
 * Authenticated with the `apikey` header (API_KEY_APILAYER).
 * Responses are mapped straight into repository input records.
 * =============================================================================
 */

import { z } from 'zod';
import { ProviderClient, ProviderClientOptions } from './provider-client';
import { config } from '../../config/environment';
import type { CountryShort, NewCountry } from '../database/repository.interface';

// =============================================================================
// PROVIDER PAYLOADS
// =============================================================================

const optionalText = z.string().nullish().transform(value => value?.trim() ?? '');
const optionalNumber = z.number().nullish().transform(value => value ?? null);

const providerCountrySchema = z.object({
  name: z.string().min(1),
  alpha2code: z.string().length(2),
  alpha3code: optionalText,
  capital: optionalText,
  region: optionalText,
  subregion: optionalText,
  population: z.number().nullish(),
  latitude: optionalNumber,
  longitude: optionalNumber,
  demonym: optionalText,
  area: optionalNumber,
  numeric_code: optionalText,
  flag: optionalText,
  currencies: z.array(z.object({ code: z.string().min(1) })).nullish(),
  languages: z.array(z.object({
    name: z.string().min(1),
    native_name: z.string().nullish(),
  })).nullish(),
});

export type ProviderCountry = z.infer<typeof providerCountrySchema>;

const countryListSchema = z.array(providerCountrySchema);
// The code endpoint has been seen answering with a bare object as well as a one-element list
const countryByCodeSchema = z.union([countryListSchema, providerCountrySchema]);

const providerCitySchema = z.object({
  name: z.string().min(1),
  state_or_region: z.string().nullish(),
  country: z.object({
    name: z.string().min(1),
    alpha2code: z.string().length(2),
  }),
  latitude: z.number(),
  longitude: z.number(),
});

const cityListSchema = z.array(providerCitySchema);

/**
 * City as returned by the provider, before it is tied to a stored country
 */
export interface CityInfo {
  name: string;
  stateOrRegion: string | null;
  country: CountryShort;
  latitude: number;
  longitude: number;
}

// =============================================================================
// MAPPERS
// =============================================================================

export function toNewCountry(country: ProviderCountry): NewCountry {
  const currencyCodes = (country.currencies ?? []).map(currency => currency.code.trim().toUpperCase());

  return {
    name: country.name.trim(),
    alpha2code: country.alpha2code.toUpperCase(),
    alpha3code: country.alpha3code.toUpperCase().slice(0, 3),
    capital: country.capital,
    region: country.region,
    subregion: country.subregion,
    population: Math.max(0, Math.round(country.population ?? 0)),
    latitude: country.latitude,
    longitude: country.longitude,
    demonym: country.demonym,
    area: country.area,
    numericCode: country.numeric_code.slice(0, 3),
    flag: country.flag,
    currencies: [...new Set(currencyCodes)],
    languages: (country.languages ?? []).map(language => ({
      name: language.name,
      nativeName: language.native_name ?? language.name,
    })),
  };
}

export function toCityInfo(city: z.infer<typeof providerCitySchema>): CityInfo {
  return {
    name: city.name.trim(),
    stateOrRegion: city.state_or_region?.trim() || null,
    country: {
      name: city.country.name.trim(),
      alpha2code: city.country.alpha2code.toUpperCase(),
    },
    latitude: city.latitude,
    longitude: city.longitude,
  };
}

// =============================================================================
// COUNTRIES API SERVICE CLASS
// =============================================================================

export class CountriesApiService extends ProviderClient {
  protected readonly providerName = 'Geography provider';

  private get authHeaders(): Record<string, string> {
    return { apikey: this.apiKey };
  }

  /**
   * Countries whose name matches. Empty when the provider knows none.
   */
  async getCountriesByName(name: string): Promise<NewCountry[]> {
    const url = this.buildUrl(`/country/name/${encodeURIComponent(name)}`);
    const result = await this.getJson(url, countryListSchema, { headers: this.authHeaders });
    return (result ?? []).map(toNewCountry);
  }

  /**
   * Country by ISO alpha-2 code, null when unknown
   */
  async getCountryByCode(alpha2code: string): Promise<NewCountry | null> {
    const url = this.buildUrl(`/country/code/${encodeURIComponent(alpha2code)}`);
    const result = await this.getJson(url, countryByCodeSchema, { headers: this.authHeaders });
    if (!result) return null;

    const list = Array.isArray(result) ? result : [result];
    const match = list.find(country => country.alpha2code.toUpperCase() === alpha2code.toUpperCase());
    return match ? toNewCountry(match) : null;
  }

  /**
   * Cities whose name matches. Empty when the provider knows none.
   */
  async getCitiesByName(name: string): Promise<CityInfo[]> {
    const url = this.buildUrl(`/city/name/${encodeURIComponent(name)}`);
    const result = await this.getJson(url, cityListSchema, { headers: this.authHeaders });
    return (result ?? []).map(toCityInfo);
  }
}

export function createCountriesApi(options: Partial<ProviderClientOptions> = {}): CountriesApiService {
  return new CountriesApiService({
    apiKey: config.providers.apilayerKey,
    baseUrl: config.providers.geoBaseUrl,
    timeoutMs: config.providers.requestTimeoutMs,
    ...options,
  });
}

export const countriesApi = createCountriesApi();
