import { z } from 'zod';
import { alpha2CodeSchema, placeNameSchema } from '../../shared/utils/validation.utils';

// =============================================================================
// COUNTRY VALIDATION SCHEMAS
// =============================================================================

/**
 * GET /countries?search=
 */
export const countrySearchQuerySchema = z.object({
  search: placeNameSchema
});

/**
 * GET /countries/:alpha2code
 */
export const countryCodeParamsSchema = z.object({
  alpha2code: alpha2CodeSchema
});

export type CountrySearchQuery = z.infer<typeof countrySearchQuerySchema>;
export type CountryCodeParams = z.infer<typeof countryCodeParamsSchema>;
