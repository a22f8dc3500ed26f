/**
 * =============================================================================
 * NEWS MODULE - SERVICE
 * =============================================================================
 *
 * Headlines for a country, database first. The country itself is resolved
 * (and stored) through the country service, so every stored article hangs off
 * a stored country and goes away with it.
 * =============================================================================
 */

import { Database, CountryShort, NewsArticleRecord } from '../../shared/database/repository.interface';
import { db } from '../../shared/database/db';
import { newsApi, NewsApiService } from '../../shared/services/news-api.service';
import { NotFoundError } from '../../shared/types/error.types';
import { logger } from '../../shared/services/logger.service';
import { CountryService, countryService } from '../country/country.service';

export type NewsProvider = Pick<NewsApiService, 'getNews'>;

export interface CountryNews {
  country: CountryShort;
  articles: NewsArticleRecord[];
}

export class NewsService {
  constructor(
    private readonly database: Database,
    private readonly provider: NewsProvider,
    private readonly countries: CountryService
  ) {}

  async getNews(alpha2code: string, limit: number): Promise<CountryNews> {
    const country = await this.countries.getCountryByCode(alpha2code);
    const summary = { name: country.name, alpha2code: country.alpha2code };

    const stored = await this.database.news.listByCountry(country.id, limit);
    if (stored.length > 0) {
      return { country: summary, articles: stored };
    }

    const fetched = await this.provider.getNews(country.alpha2code);
    if (fetched.length === 0) {
      throw new NotFoundError('News', { alpha2code: country.alpha2code });
    }

    await this.database.news.createMany(fetched.map(item => ({ ...item, countryId: country.id })));
    logger.info('[NEWS] Stored articles from provider', { alpha2code: country.alpha2code, count: fetched.length });

    return { country: summary, articles: await this.database.news.listByCountry(country.id, limit) };
  }
}

export const newsService = new NewsService(db, newsApi, countryService);
