/**
 * =============================================================================
 * NEWS API SERVICE - Headlines provider (NewsAPI top headlines)
 * =============================================================================
 *
 * GET {base}/top-headlines?country={xx}&pageSize=N, `X-Api-Key` header
 * (API_KEY_NEWSAPI). A country the provider does not cover comes back as an
 * empty article list, not as an error.
 * =============================================================================
 */

import { z } from 'zod';
import { ProviderClient, ProviderClientOptions } from './provider-client';
import { config } from '../../config/environment';
import type { NewNewsArticle } from '../database/repository.interface';

const PAGE_SIZE = 20;

// Placeholder the provider puts in place of withdrawn articles
const REMOVED_MARKER = '[Removed]';

const providerArticleSchema = z.object({
  source: z.object({ name: z.string().nullish() }).nullish(),
  author: z.string().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  publishedAt: z.string().nullish(),
});

const headlinesSchema = z.object({
  status: z.literal('ok'),
  articles: z.array(providerArticleSchema),
});

export type ProviderArticle = z.infer<typeof providerArticleSchema>;

/**
 * Article as returned by the provider, before it is tied to a stored country
 */
export type NewsItem = Omit<NewNewsArticle, 'countryId'>;

export function toNewsItem(article: ProviderArticle): NewsItem | null {
  const title = article.title?.trim();
  const publishedAt = article.publishedAt ? new Date(article.publishedAt) : null;
  if (!title || title === REMOVED_MARKER || !publishedAt || isNaN(publishedAt.getTime())) {
    return null;
  }

  return {
    source: article.source?.name?.trim() || 'unknown',
    author: article.author?.trim() ?? '',
    title,
    description: article.description?.trim() ?? '',
    url: article.url?.trim() ?? '',
    publishedAt: publishedAt.toISOString(),
  };
}

export class NewsApiService extends ProviderClient {
  protected readonly providerName = 'News provider';

  /**
   * Current headlines for a country. Empty when the provider has none.
   */
  async getNews(alpha2code: string): Promise<NewsItem[]> {
    const url = this.buildUrl('/top-headlines', {
      country: alpha2code.toLowerCase(),
      pageSize: String(PAGE_SIZE),
    });
    const result = await this.getJson(url, headlinesSchema, { headers: { 'X-Api-Key': this.apiKey } });

    return (result?.articles ?? []).flatMap(article => toNewsItem(article) ?? []);
  }
}

export function createNewsApi(options: Partial<ProviderClientOptions> = {}): NewsApiService {
  return new NewsApiService({
    apiKey: config.providers.newsApiKey,
    baseUrl: config.providers.newsBaseUrl,
    timeoutMs: config.providers.requestTimeoutMs,
    ...options,
  });
}

export const newsApi = createNewsApi();
