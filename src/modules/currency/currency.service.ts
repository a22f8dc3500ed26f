/**
 * =============================================================================
 * CURRENCY MODULE - SERVICE
 * =============================================================================
 *
 * Exchange rates are served straight from the provider and never stored.
 * =============================================================================
 */

import { currencyApi, CurrencyApiService, CurrencyRates } from '../../shared/services/currency-api.service';
import { NotFoundError } from '../../shared/types/error.types';

export type CurrencyProvider = Pick<CurrencyApiService, 'getRates'>;

export class CurrencyService {
  constructor(private readonly provider: CurrencyProvider) {}

  /**
   * Latest rates against `base` (ISO 4217, upper case)
   */
  async getRates(base: string): Promise<CurrencyRates> {
    const rates = await this.provider.getRates(base);
    if (!rates) {
      throw new NotFoundError('Currency rates', { base });
    }
    return rates;
  }
}

export const currencyService = new CurrencyService(currencyApi);
