/**
 * =============================================================================
 * WEATHER, CURRENCY & LOCATION SERVICES
 * =============================================================================
 */

import { MemoryDatabase } from '../shared/database/memory.database';
import { CountryService } from '../modules/country/country.service';
import { CityService } from '../modules/city/city.service';
import { WeatherService } from '../modules/weather/weather.service';
import { CurrencyService } from '../modules/currency/currency.service';
import { LocationService } from '../modules/location/location.service';
import { NewCountry } from '../shared/database/repository.interface';
import { CityInfo } from '../shared/services/countries-api.service';
import { WeatherInfo } from '../shared/services/weather-api.service';
import { CurrencyRates } from '../shared/services/currency-api.service';
import { NotFoundError, UpstreamServiceError } from '../shared/types/error.types';
import { makeCityInfo, makeCountry, makeWeatherInfo } from './fixtures';

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function buildServices(country: NewCountry = makeCountry()) {
  const database = new MemoryDatabase();
  const providers = {
    getCountriesByName: jest.fn<Promise<NewCountry[]>, [string]>().mockResolvedValue([country]),
    getCountryByCode: jest.fn<Promise<NewCountry | null>, [string]>()
      .mockImplementation(async code => (code === country.alpha2code ? country : null)),
    getCitiesByName: jest.fn<Promise<CityInfo[]>, [string]>()
      .mockResolvedValue([makeCityInfo({ country: { name: country.name, alpha2code: country.alpha2code } })]),
    getWeather: jest.fn<Promise<WeatherInfo | null>, [string, string]>().mockResolvedValue(makeWeatherInfo()),
    getRates: jest.fn<Promise<CurrencyRates | null>, [string]>()
      .mockResolvedValue({ base: 'USD', date: '2024-05-01', rates: { EUR: 0.93, GBP: 0.8 } }),
  };

  const countries = new CountryService(database, providers);
  const cities = new CityService(database, providers, countries);
  const weather = new WeatherService(database, providers, cities);
  const currency = new CurrencyService(providers);
  const location = new LocationService(countries, weather, currency, 'USD');

  return { database, providers, weather, currency, location };
}

describe('WeatherService', () => {
  it('stores a snapshot for every current-weather lookup', async () => {
    const { database, providers, weather } = buildServices();

    const first = await weather.getCurrentWeather('springfield', 'TL');
    await weather.getCurrentWeather('Springfield', 'TL');

    expect(providers.getWeather).toHaveBeenCalledWith('Springfield', 'TL');
    expect(first.city).toMatchObject({ name: 'Springfield', country: { alpha2code: 'TL' } });
    expect(first.weather).toMatchObject({
      cityId: first.city.id,
      observedAt: '2024-05-01T12:00:00.000Z',
      temperature: 18.5,
      description: 'scattered clouds',
    });
    expect(await database.weather.count()).toBe(2);
    expect(providers.getCitiesByName).toHaveBeenCalledTimes(1);
  });

  it('does not answer for a stored city whose name only contains the one asked for', async () => {
    const { providers, weather } = buildServices();
    providers.getCitiesByName.mockResolvedValueOnce([makeCityInfo({ name: 'New York' })]);
    await weather.getCurrentWeather('New York', 'TL');
    providers.getCitiesByName.mockResolvedValueOnce([
      makeCityInfo({ name: 'New York' }),
      makeCityInfo({ name: 'York', latitude: 53.9 }),
    ]);

    const result = await weather.getCurrentWeather('York', 'TL');

    expect(result.city.name).toBe('York');
    expect(providers.getWeather).toHaveBeenLastCalledWith('York', 'TL');
  });

  it('raises 404 when the provider has no weather for the city', async () => {
    const { database, providers, weather } = buildServices();
    providers.getWeather.mockResolvedValue(null);

    await expect(weather.getCurrentWeather('Springfield', 'TL')).rejects.toMatchObject({
      statusCode: 404,
      message: 'Weather not found',
    });
    expect(await database.weather.count()).toBe(0);
  });

  it('returns stored history newest first', async () => {
    const { providers, weather } = buildServices();
    providers.getWeather
      .mockResolvedValueOnce(makeWeatherInfo({ observedAt: '2024-05-01T10:00:00.000Z', temperature: 10 }))
      .mockResolvedValueOnce(makeWeatherInfo({ observedAt: '2024-05-01T11:00:00.000Z', temperature: 11 }));
    await weather.getCurrentWeather('Springfield', 'TL');
    await weather.getCurrentWeather('Springfield', 'TL');

    const history = await weather.getHistory('Springfield', 'TL', 10);

    expect(history.city.name).toBe('Springfield');
    expect(history.snapshots.map(s => s.temperature)).toEqual([11, 10]);
  });

  it('raises 404 for history of a city never looked up', async () => {
    const { weather } = buildServices();

    await expect(weather.getHistory('Springfield', 'TL', 10)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('CurrencyService', () => {
  it('raises 404 for an unknown base currency', async () => {
    const { providers, currency } = buildServices();
    providers.getRates.mockResolvedValue(null);

    await expect(currency.getRates('ZZZ')).rejects.toMatchObject({
      statusCode: 404,
      message: 'Currency rates not found',
      details: { base: 'ZZZ' },
    });
  });
});

describe('LocationService', () => {
  it('combines country, weather and the country currency rates', async () => {
    const { providers, location } = buildServices();

    const info = await location.getLocationInfo('Springfield', 'TL');

    expect(info.location).toMatchObject({ name: 'Testland', alpha2code: 'TL' });
    expect(info.weather).toMatchObject({ temperature: 18.5, humidity: 60 });
    expect(info.currencyRates).toEqual({ EUR: 0.93 });
    expect(providers.getRates).toHaveBeenCalledWith('USD');
    expect(providers.getCountryByCode).toHaveBeenCalledTimes(1);
  });

  it('leaves rates empty when the provider has none', async () => {
    const { providers, location } = buildServices();
    providers.getRates.mockResolvedValue(null);

    const info = await location.getLocationInfo('Springfield', 'TL');

    expect(info.currencyRates).toEqual({});
  });

  it('skips the rates call for a country without currencies', async () => {
    const { providers, location } = buildServices(makeCountry({ currencies: [] }));

    const info = await location.getLocationInfo('Springfield', 'TL');

    expect(info.currencyRates).toEqual({});
    expect(providers.getRates).not.toHaveBeenCalled();
  });

  it('propagates other rate failures', async () => {
    const { providers, location } = buildServices();
    providers.getRates.mockRejectedValue(new UpstreamServiceError('Currency provider', 'request failed'));

    await expect(location.getLocationInfo('Springfield', 'TL')).rejects.toBeInstanceOf(UpstreamServiceError);
  });

  it('raises 404 for an unknown country before calling anything else', async () => {
    const { providers, location } = buildServices();

    await expect(location.getLocationInfo('Springfield', 'ZZ')).rejects.toBeInstanceOf(NotFoundError);
    expect(providers.getWeather).not.toHaveBeenCalled();
  });
});
