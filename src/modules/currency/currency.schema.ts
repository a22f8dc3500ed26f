import { z } from 'zod';
import { currencyCodeSchema } from '../../shared/utils/validation.utils';

/**
 * GET /currency?base=
 */
export const currencyRatesQuerySchema = z.object({
  base: currencyCodeSchema
});
