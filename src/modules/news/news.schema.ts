import { z } from 'zod';
import { alpha2CodeSchema } from '../../shared/utils/validation.utils';

// =============================================================================
// NEWS VALIDATION SCHEMAS
// =============================================================================

/**
 * GET /news?alpha2code=&limit=
 */
export const newsQuerySchema = z.object({
  alpha2code: alpha2CodeSchema,
  limit: z.coerce.number().int().min(1).max(100).default(20)
});

export type NewsQuery = z.infer<typeof newsQuerySchema>;
