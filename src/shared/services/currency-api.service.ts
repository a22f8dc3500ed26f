/**
 * =============================================================================
 * CURRENCY API SERVICE - Exchange rates provider (apilayer exchangerates_data)
 * =============================================================================
 *
 * GET {base}/latest?base={CODE}, `apikey` header (API_KEY_APILAYER).
 * An unknown base currency is reported as an `invalid_base_currency` error,
 * either with HTTP 400 or as `success: false`; only that counts as "not found".
 * Every other rejection (bad key, quota) is an upstream error.
 * =============================================================================
 */

import { z } from 'zod';
import { ProviderClient, ProviderClientOptions } from './provider-client';
import { config } from '../../config/environment';
import { UpstreamServiceError } from '../types/error.types';

const INVALID_BASE_CURRENCY = 'invalid_base_currency';

const providerErrorSchema = z.object({
  code: z.union([z.string(), z.number()]).optional(),
  type: z.string().optional(),
});

const providerRatesSchema = z.object({
  success: z.boolean().optional(),
  base: z.string().optional(),
  date: z.string().optional(),
  rates: z.record(z.number()).optional(),
  error: providerErrorSchema.optional(),
});

const errorBodySchema = z.object({ error: providerErrorSchema });

export function isInvalidBaseError(body: unknown): boolean {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return false;
  const { code, type } = parsed.data.error;
  return code === INVALID_BASE_CURRENCY || type === INVALID_BASE_CURRENCY;
}

export interface CurrencyRates {
  base: string;
  /** YYYY-MM-DD */
  date: string;
  rates: Record<string, number>;
}

export class CurrencyApiService extends ProviderClient {
  protected readonly providerName = 'Currency provider';

  /**
   * Latest rates against a base currency, null when the base is unknown
   */
  async getRates(base: string): Promise<CurrencyRates | null> {
    const url = this.buildUrl('/latest', { base });
    const result = await this.getJson(url, providerRatesSchema, {
      headers: { apikey: this.apiKey },
      notFoundWhen: (status, body) => status === 400 && isInvalidBaseError(body),
    });
    if (!result) {
      return null;
    }

    if (result.success === false) {
      if (isInvalidBaseError(result)) {
        return null;
      }
      throw new UpstreamServiceError(this.providerName, 'rejected the request', {
        providerCode: result.error?.code ?? result.error?.type,
      });
    }

    if (!result.base || !result.date || !result.rates) {
      throw new UpstreamServiceError(this.providerName, 'returned an unexpected payload');
    }

    return { base: result.base, date: result.date, rates: result.rates };
  }
}

export function createCurrencyApi(options: Partial<ProviderClientOptions> = {}): CurrencyApiService {
  return new CurrencyApiService({
    apiKey: config.providers.apilayerKey,
    baseUrl: config.providers.currencyBaseUrl,
    timeoutMs: config.providers.requestTimeoutMs,
    ...options,
  });
}

export const currencyApi = createCurrencyApi();
