import { z } from 'zod';
import { alpha2CodeSchema, placeNameSchema } from '../../shared/utils/validation.utils';

// =============================================================================
// CITY VALIDATION SCHEMAS
// =============================================================================

/**
 * GET /cities?search=&alpha2code=
 */
export const citySearchQuerySchema = z.object({
  search: placeNameSchema,
  alpha2code: alpha2CodeSchema.optional()
});

export type CitySearchQuery = z.infer<typeof citySearchQuerySchema>;
