import { z } from 'zod';
import { alpha2CodeSchema, placeNameSchema } from '../../shared/utils/validation.utils';

// =============================================================================
// WEATHER VALIDATION SCHEMAS
// =============================================================================

/**
 * GET /weather?city=&alpha2code=
 */
export const currentWeatherQuerySchema = z.object({
  city: placeNameSchema,
  alpha2code: alpha2CodeSchema
});

/**
 * GET /weather/history?city=&alpha2code=&limit=
 */
export const weatherHistoryQuerySchema = currentWeatherQuerySchema.extend({
  limit: z.coerce.number().int().min(1).max(100).default(10)
});

export type CurrentWeatherQuery = z.infer<typeof currentWeatherQuerySchema>;
export type WeatherHistoryQuery = z.infer<typeof weatherHistoryQuerySchema>;
