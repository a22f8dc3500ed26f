/**
 * =============================================================================
 * MEMORY DATABASE - Repository contract tests
 * =============================================================================
 */

import { MemoryDatabase } from '../shared/database/memory.database';
import { ConflictError } from '../shared/types/error.types';
import { makeCountry, makeNewsArticle, makeSnapshot } from './fixtures';

describe('MemoryDatabase', () => {
  let database: MemoryDatabase;

  beforeEach(() => {
    database = new MemoryDatabase();
  });

  describe('countries', () => {
    it('round-trips every written field', async () => {
      const input = makeCountry();
      const [saved] = await database.countries.createMany([input]);

      const found = await database.countries.findByAlpha2('TL');

      expect(found).toEqual({
        ...input,
        id: saved.id,
        createdAt: saved.createdAt,
        updatedAt: saved.updatedAt,
      });
    });

    it('does not overwrite an existing country', async () => {
      const [first] = await database.countries.createMany([makeCountry({ name: 'Testland' })]);
      const [second] = await database.countries.createMany([makeCountry({ name: 'Renamed' })]);

      expect(second.id).toBe(first.id);
      expect(second.name).toBe('Testland');
      expect(await database.countries.count()).toBe(1);
    });

    it('returns stored rows in input order', async () => {
      await database.countries.createMany([makeCountry({ alpha2code: 'BB', name: 'Bravo' })]);

      const saved = await database.countries.createMany([
        makeCountry({ alpha2code: 'CC', name: 'Charlie' }),
        makeCountry({ alpha2code: 'BB', name: 'Bravo again' }),
      ]);

      expect(saved.map(c => c.alpha2code)).toEqual(['CC', 'BB']);
      expect(saved[1].name).toBe('Bravo');
    });

    it('searches names case-insensitively by substring', async () => {
      await database.countries.createMany([
        makeCountry({ alpha2code: 'NZ', name: 'New Zealand' }),
        makeCountry({ alpha2code: 'NC', name: 'New Caledonia' }),
        makeCountry({ alpha2code: 'FR', name: 'France' }),
      ]);

      const result = await database.countries.searchByName('NEW');

      expect(result.map(c => c.name)).toEqual(['New Caledonia', 'New Zealand']);
    });

    it('paginates sorted by name', async () => {
      await database.countries.createMany([
        makeCountry({ alpha2code: 'CC', name: 'Charlie' }),
        makeCountry({ alpha2code: 'AA', name: 'Alpha' }),
        makeCountry({ alpha2code: 'BB', name: 'Bravo' }),
      ]);

      const page = await database.countries.list(2, 2);

      expect(page.data.map(c => c.name)).toEqual(['Charlie']);
      expect(page.pagination).toEqual({ total: 3, page: 2, pageSize: 2, totalPages: 2, hasMore: false });
    });
  });

  describe('referential integrity', () => {
    it('rejects a city for an unknown country', async () => {
      await expect(database.cities.createMany([
        { countryId: 42, name: 'Nowhere', stateOrRegion: null, latitude: 0, longitude: 0 },
      ])).rejects.toBeInstanceOf(ConflictError);
      expect(await database.cities.count()).toBe(0);
    });

    it('rejects a snapshot for an unknown city', async () => {
      await expect(database.weather.create(makeSnapshot(7))).rejects.toMatchObject({
        statusCode: 409,
        code: 'CONFLICT',
      });
    });

    it('rejects news for an unknown country', async () => {
      await expect(database.news.createMany([makeNewsArticle(5)])).rejects.toBeInstanceOf(ConflictError);
      expect(await database.news.count()).toBe(0);
    });

    it('cascades a country delete to its cities, their snapshots and its news', async () => {
      const [country] = await database.countries.createMany([makeCountry()]);
      const [city] = await database.cities.createMany([
        { countryId: country.id, name: 'Springfield', stateOrRegion: null, latitude: 1, longitude: 2 },
      ]);
      await database.weather.create(makeSnapshot(city.id));
      await database.news.createMany([makeNewsArticle(country.id)]);

      expect(await database.countries.deleteByAlpha2('TL')).toBe(true);

      expect(await database.getStats()).toEqual({
        driver: 'memory',
        countries: 0,
        cities: 0,
        weatherSnapshots: 0,
        newsArticles: 0,
        adminUsers: 0,
      });
    });

    it('cascades a city delete to its snapshots only', async () => {
      const [country] = await database.countries.createMany([makeCountry()]);
      const [city] = await database.cities.createMany([
        { countryId: country.id, name: 'Springfield', stateOrRegion: null, latitude: 1, longitude: 2 },
      ]);
      await database.weather.create(makeSnapshot(city.id));

      expect(await database.cities.deleteById(city.id)).toBe(true);
      expect(await database.cities.deleteById(city.id)).toBe(false);
      expect(await database.weather.count()).toBe(0);
      expect(await database.countries.count()).toBe(1);
    });
  });

  describe('cities', () => {
    it('joins the country and filters by alpha2code', async () => {
      const [tl, xx] = await database.countries.createMany([
        makeCountry(),
        makeCountry({ alpha2code: 'XX', name: 'Elsewhere' }),
      ]);
      await database.cities.createMany([
        { countryId: tl.id, name: 'Springfield', stateOrRegion: 'North', latitude: 1, longitude: 2 },
        { countryId: xx.id, name: 'Springfield', stateOrRegion: null, latitude: 3, longitude: 4 },
      ]);

      const all = await database.cities.search('spring');
      const inXx = await database.cities.search('spring', 'XX');

      expect(all).toHaveLength(2);
      expect(inXx).toHaveLength(1);
      expect(inXx[0]).toMatchObject({
        name: 'Springfield',
        stateOrRegion: null,
        latitude: 3,
        country: { name: 'Elsewhere', alpha2code: 'XX' },
      });
    });

    it('is create-if-absent on (country, name)', async () => {
      const [country] = await database.countries.createMany([makeCountry()]);
      const city = { countryId: country.id, name: 'Springfield', stateOrRegion: null, latitude: 1, longitude: 2 };

      const [first] = await database.cities.createMany([city]);
      const [second] = await database.cities.createMany([{ ...city, latitude: 9 }]);

      expect(second).toEqual(first);
      expect(await database.cities.findById(first.id)).toMatchObject({ latitude: 1, country: { alpha2code: 'TL' } });
    });
  });

  describe('weather', () => {
    it('lists snapshots newest first up to the limit', async () => {
      const [country] = await database.countries.createMany([makeCountry()]);
      const [city] = await database.cities.createMany([
        { countryId: country.id, name: 'Springfield', stateOrRegion: null, latitude: 1, longitude: 2 },
      ]);
      await database.weather.create(makeSnapshot(city.id, { observedAt: '2024-05-01T10:00:00.000Z', temperature: 10 }));
      await database.weather.create(makeSnapshot(city.id, { observedAt: '2024-05-01T12:00:00.000Z', temperature: 12 }));
      await database.weather.create(makeSnapshot(city.id, { observedAt: '2024-05-01T11:00:00.000Z', temperature: 11 }));

      const latestTwo = await database.weather.listByCity(city.id, 2);

      expect(latestTwo.map(s => s.temperature)).toEqual([12, 11]);
    });
  });

  describe('news', () => {
    it('round-trips every written field', async () => {
      const [country] = await database.countries.createMany([makeCountry()]);
      const input = makeNewsArticle(country.id, { author: '' });

      const [saved] = await database.news.createMany([input]);

      expect(await database.news.listByCountry(country.id, 10)).toEqual([{
        ...input,
        id: saved.id,
        createdAt: saved.createdAt,
      }]);
    });

    it('lists a country\'s news newest first up to the limit', async () => {
      const [tl, xx] = await database.countries.createMany([
        makeCountry(),
        makeCountry({ alpha2code: 'XX', name: 'Elsewhere' }),
      ]);
      await database.news.createMany([
        makeNewsArticle(tl.id, { title: 'older', publishedAt: '2024-05-01T08:00:00.000Z' }),
        makeNewsArticle(tl.id, { title: 'newest', publishedAt: '2024-05-01T10:00:00.000Z' }),
        makeNewsArticle(xx.id, { title: 'elsewhere', publishedAt: '2024-05-01T11:00:00.000Z' }),
        makeNewsArticle(tl.id, { title: 'middle', publishedAt: '2024-05-01T09:00:00.000Z' }),
      ]);

      const latestTwo = await database.news.listByCountry(tl.id, 2);

      expect(latestTwo.map(article => article.title)).toEqual(['newest', 'middle']);
    });
  });

  describe('adminUsers', () => {
    it('rejects a duplicate username', async () => {
      const user = { username: 'admin', passwordHash: 'hash', isSuperuser: true, isActive: true };
      await database.adminUsers.create(user);

      await expect(database.adminUsers.create(user)).rejects.toBeInstanceOf(ConflictError);
    });

    it('records the last login', async () => {
      const created = await database.adminUsers.create({
        username: 'admin', passwordHash: 'hash', isSuperuser: true, isActive: true,
      });

      await database.adminUsers.recordLogin(created.id, new Date('2024-06-01T08:00:00.000Z'));

      const found = await database.adminUsers.findByUsername('admin');
      expect(found?.lastLoginAt).toBe('2024-06-01T08:00:00.000Z');
      expect(found?.id).toBe(created.id);
    });
  });
});
