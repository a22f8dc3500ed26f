/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../types/error.types';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * ISO 3166-1 alpha-2 country code, normalized to upper case
 */
export const alpha2CodeSchema = z.string()
  .trim()
  .transform(val => val.toUpperCase())
  .refine(val => /^[A-Z]{2}$/.test(val), {
    message: 'Country code must be two letters (ISO 3166-1 alpha-2)'
  });

/**
 * ISO 4217 currency code, normalized to upper case
 */
export const currencyCodeSchema = z.string()
  .trim()
  .transform(val => val.toUpperCase())
  .refine(val => /^[A-Z]{3}$/.test(val), {
    message: 'Currency code must be three letters (ISO 4217)'
  });

/**
 * Place name used for searches (country or city)
 */
export const placeNameSchema = z.string()
  .trim()
  .min(2, 'Name must be at least 2 characters')
  .max(100, 'Name must be 100 characters or less');

/**
 * Numeric path id
 */
export const idParamSchema = z.object({
  id: z.coerce.number().int().positive()
});

/**
 * Pagination schema
 */
export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20)
});

// ============================================================
// VALIDATION HELPERS
// ============================================================

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on validation failure
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const fields = result.error.errors.map(e => ({
      field: e.path.join('.'),
      message: e.message
    }));
    throw new ValidationError('Invalid request data', { fields });
  }
  return result.data;
}
