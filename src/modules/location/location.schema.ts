import { z } from 'zod';
import { alpha2CodeSchema, placeNameSchema } from '../../shared/utils/validation.utils';

/**
 * GET /location?city=&alpha2code=
 */
export const locationQuerySchema = z.object({
  city: placeNameSchema,
  alpha2code: alpha2CodeSchema
});
