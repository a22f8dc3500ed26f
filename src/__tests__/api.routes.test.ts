/**
 * =============================================================================
 * HTTP API - Express app on an ephemeral port
 * =============================================================================
 *
 * Real routing, middleware and in-memory database; provider clients are
 * stubbed so nothing leaves the process.
 * =============================================================================
 */

import { Server } from 'http';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { createApp } from '../app';
import { db } from '../shared/database/db';
import { MemoryDatabase } from '../shared/database/memory.database';
import { countriesApi } from '../shared/services/countries-api.service';
import { weatherApi } from '../shared/services/weather-api.service';
import { currencyApi } from '../shared/services/currency-api.service';
import { newsApi } from '../shared/services/news-api.service';
import { adminService } from '../modules/admin/admin.service';
import { UpstreamServiceError } from '../shared/types/error.types';
import { makeCityInfo, makeCountry, makeNewsItem, makeWeatherInfo } from './fixtures';

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
  logError: jest.fn(),
}));

const apiResponseSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }).optional(),
  meta: z.record(z.unknown()).optional(),
});

let server: Server;
let baseUrl: string;

async function request(path: string, init: RequestInit = {}) {
  const response = await fetch(`${baseUrl}${path}`, init);
  const body: unknown = await response.json();
  return { status: response.status, body };
}

async function api(path: string, init: RequestInit = {}) {
  const { status, body } = await request(path, init);
  return { status, body: apiResponseSchema.parse(body) };
}

async function loginAs(username: string, password: string): Promise<string> {
  const { body } = await api('/api/v1/admin/login', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ username, password }),
  });
  return z.object({ accessToken: z.string() }).parse(body.data).accessToken;
}

function bearer(token: string): RequestInit {
  return { headers: { Authorization: `Bearer ${token}` } };
}

beforeAll(async () => {
  server = createApp().listen(0, '127.0.0.1');
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

beforeEach(() => {
  if (db instanceof MemoryDatabase) {
    db.reset();
  }
  jest.spyOn(countriesApi, 'getCountriesByName').mockResolvedValue([makeCountry()]);
  jest.spyOn(countriesApi, 'getCountryByCode')
    .mockImplementation(async code => (code === 'TL' ? makeCountry() : null));
  jest.spyOn(countriesApi, 'getCitiesByName').mockResolvedValue([makeCityInfo()]);
  jest.spyOn(weatherApi, 'getWeather').mockResolvedValue(makeWeatherInfo());
  jest.spyOn(currencyApi, 'getRates')
    .mockResolvedValue({ base: 'USD', date: '2024-05-01', rates: { EUR: 0.93, GBP: 0.8 } });
  jest.spyOn(newsApi, 'getNews').mockResolvedValue([makeNewsItem()]);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('health', () => {
  it('GET /health', async () => {
    const { status, body } = await request('/health');

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy' });
  });

  it('GET /health/ready reports the database', async () => {
    const { status, body } = await request('/health/ready');

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ready', checks: { database: true } });
  });

  it('GET /version names the service', async () => {
    const { status, body } = await request('/version');

    expect(status).toBe(200);
    expect(body).toMatchObject({ name: 'geo-backend', environment: 'test' });
  });

  it('GET /health/ready answers 503 when the database is down', async () => {
    jest.spyOn(db, 'ping').mockRejectedValue(new Error('connection refused'));

    const { status, body } = await request('/health/ready');

    expect(status).toBe(503);
    expect(body).toMatchObject({ status: 'not_ready', checks: { database: false } });
  });
});

describe('countries', () => {
  it('searches by name', async () => {
    const { status, body } = await api('/api/v1/countries?search=test');

    expect(status).toBe(200);
    expect(body.success).toBe(true);
    expect(body.data).toMatchObject([{ name: 'Testland', alpha2code: 'TL', capital: 'Capital City' }]);
    expect(body.meta).toEqual({ total: 1 });
  });

  it('normalizes the country code', async () => {
    const { status, body } = await api('/api/v1/countries/tl');

    expect(status).toBe(200);
    expect(body.data).toMatchObject({ alpha2code: 'TL' });
    expect(countriesApi.getCountryByCode).toHaveBeenCalledWith('TL');
  });

  it('answers 404 for an unknown code', async () => {
    const { status, body } = await api('/api/v1/countries/zz');

    expect(status).toBe(404);
    expect(body.error).toEqual({ code: 'NOT_FOUND', message: 'Country not found', details: { alpha2code: 'ZZ' } });
  });

  it('answers 400 for a one-letter search', async () => {
    const { status, body } = await api('/api/v1/countries?search=a');

    expect(status).toBe(400);
    expect(body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Invalid request data',
      details: { fields: [{ field: 'search', message: 'Name must be at least 2 characters' }] },
    });
  });

  it('answers 502 when the provider fails', async () => {
    jest.spyOn(countriesApi, 'getCountriesByName')
      .mockRejectedValue(new UpstreamServiceError('Geography provider', 'responded with HTTP 500'));

    const { status, body } = await api('/api/v1/countries?search=test');

    expect(status).toBe(502);
    expect(body.error?.code).toBe('UPSTREAM_ERROR');
  });

  it('blocks script injection in the query', async () => {
    const { status, body } = await api('/api/v1/countries?search=%3Cscript%3E');

    expect(status).toBe(400);
    expect(body.error).toEqual({ code: 'BAD_REQUEST', message: 'Invalid request' });
  });
});

describe('cities, weather, currency, location', () => {
  it('GET /cities returns cities with their country', async () => {
    const { status, body } = await api('/api/v1/cities?search=Springfield&alpha2code=tl');

    expect(status).toBe(200);
    expect(body.data).toMatchObject([{ name: 'Springfield', country: { name: 'Testland', alpha2code: 'TL' } }]);
  });

  it('GET /weather stores a snapshot that /weather/history returns', async () => {
    const current = await api('/api/v1/weather?city=Springfield&alpha2code=TL');
    const history = await api('/api/v1/weather/history?city=Springfield&alpha2code=TL');

    expect(current.status).toBe(200);
    expect(current.body.data).toMatchObject({
      city: { name: 'Springfield' },
      weather: { temperature: 18.5, description: 'scattered clouds' },
    });
    expect(history.status).toBe(200);
    expect(history.body.data).toMatchObject({ snapshots: [{ temperature: 18.5 }] });
    expect(history.body.meta).toEqual({ limit: 10, total: 1 });
  });

  it('GET /weather/history rejects a limit above 100', async () => {
    const { status } = await api('/api/v1/weather/history?city=Springfield&alpha2code=TL&limit=101');

    expect(status).toBe(400);
  });

  it('GET /currency upper-cases the base', async () => {
    const { status, body } = await api('/api/v1/currency?base=usd');

    expect(status).toBe(200);
    expect(body.data).toEqual({ base: 'USD', date: '2024-05-01', rates: { EUR: 0.93, GBP: 0.8 } });
    expect(currencyApi.getRates).toHaveBeenCalledWith('USD');
  });

  it('GET /location combines everything', async () => {
    const { status, body } = await api('/api/v1/location?city=Springfield&alpha2code=TL');

    expect(status).toBe(200);
    expect(body.data).toMatchObject({
      location: { alpha2code: 'TL' },
      weather: { temperature: 18.5 },
      currencyRates: { EUR: 0.93 },
    });
  });

  it('GET /news returns headlines under their country', async () => {
    const { status, body } = await api('/api/v1/news?alpha2code=tl');

    expect(status).toBe(200);
    expect(body.data).toMatchObject({
      country: { name: 'Testland', alpha2code: 'TL' },
      articles: [{ source: 'Testland Herald', title: 'Harbour reopens after storm' }],
    });
    expect(body.meta).toEqual({ limit: 20, total: 1 });
    expect(newsApi.getNews).toHaveBeenCalledWith('TL');
  });

  it('GET /news answers 404 for an unknown country', async () => {
    const { status, body } = await api('/api/v1/news?alpha2code=ZZ');

    expect(status).toBe(404);
    expect(body.error).toEqual({ code: 'NOT_FOUND', message: 'Country not found', details: { alpha2code: 'ZZ' } });
  });

  it('answers 404 for an unknown route', async () => {
    const { status, body } = await api('/api/v1/nowhere');

    expect(status).toBe(404);
    expect(body.error).toEqual({ code: 'NOT_FOUND', message: 'Cannot GET /api/v1/nowhere' });
  });
});

describe('admin', () => {
  const PASSWORD = 'test-password';

  beforeEach(async () => {
    await adminService.createAdminUser({ username: 'root', password: PASSWORD });
  });

  it('requires a token', async () => {
    const { status, body } = await api('/api/v1/admin/stats');

    expect(status).toBe(401);
    expect(body.error?.code).toBe('UNAUTHORIZED');
  });

  it('rejects a bad password', async () => {
    const { status, body } = await api('/api/v1/admin/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ username: 'root', password: 'wrong-password' }),
    });

    expect(status).toBe(401);
    expect(body.error?.code).toBe('INVALID_CREDENTIALS');
  });

  it('rejects a malformed body', async () => {
    const { status, body } = await api('/api/v1/admin/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"username":',
    });

    expect(status).toBe(400);
    expect(body.error?.code).toBe('BAD_REQUEST');
  });

  it('rejects a token without the admin role', async () => {
    const token = jwt.sign({ userId: 'u1', username: 'viewer', role: 'viewer' }, 'test-secret');

    const { status, body } = await api('/api/v1/admin/stats', bearer(token));

    expect(status).toBe(403);
    expect(body.error?.code).toBe('FORBIDDEN');
  });

  it('rejects an expired token', async () => {
    const token = jwt.sign(
      { userId: 'u1', username: 'root', role: 'admin', exp: Math.floor(Date.now() / 1000) - 60 },
      'test-secret'
    );

    const { status, body } = await api('/api/v1/admin/stats', bearer(token));

    expect(status).toBe(401);
    expect(body.error?.code).toBe('TOKEN_EXPIRED');
  });

  it('rejects a token signed with another secret', async () => {
    const token = jwt.sign({ userId: 'u1', username: 'root', role: 'admin' }, 'other-secret');

    const { status, body } = await api('/api/v1/admin/stats', bearer(token));

    expect(status).toBe(401);
    expect(body.error?.code).toBe('INVALID_TOKEN');
  });

  it('shows stats to a logged-in superuser', async () => {
    const token = await loginAs('root', PASSWORD);

    const { status, body } = await api('/api/v1/admin/stats', bearer(token));

    expect(status).toBe(200);
    expect(body.data).toMatchObject({
      database: { driver: 'memory', countries: 0, adminUsers: 1 },
      providers: {
        geography: { configured: true },
        weather: { configured: true },
        currency: { configured: true },
        news: { configured: true },
      },
    });
  });

  it('lists and deletes stored countries', async () => {
    const token = await loginAs('root', PASSWORD);
    await api('/api/v1/cities?search=Springfield');

    const list = await api('/api/v1/admin/countries?page=1&limit=5', bearer(token));
    const removed = await api('/api/v1/admin/countries/tl', { method: 'DELETE', ...bearer(token) });
    const again = await api('/api/v1/admin/countries/tl', { method: 'DELETE', ...bearer(token) });

    expect(list.body.data).toMatchObject([{ alpha2code: 'TL' }]);
    expect(list.body.meta).toEqual({ page: 1, limit: 5, total: 1, hasMore: false });
    expect(removed.status).toBe(200);
    expect(removed.body.data).toEqual({ deleted: 'TL' });
    expect(again.status).toBe(404);
    expect(await db.cities.count()).toBe(0);
  });

  it('drops stored news with the country', async () => {
    const token = await loginAs('root', PASSWORD);
    await api('/api/v1/news?alpha2code=TL');

    await api('/api/v1/admin/countries/TL', { method: 'DELETE', ...bearer(token) });

    expect(await db.news.count()).toBe(0);
  });

  it('deletes a stored city', async () => {
    const token = await loginAs('root', PASSWORD);
    await api('/api/v1/cities?search=Springfield');
    const [city] = await db.cities.search('Springfield');

    const removed = await api(`/api/v1/admin/cities/${city.id}`, { method: 'DELETE', ...bearer(token) });
    const invalid = await api('/api/v1/admin/cities/abc', { method: 'DELETE', ...bearer(token) });

    expect(removed.body.data).toEqual({ deleted: city.id });
    expect(invalid.status).toBe(400);
  });
});
