/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared zod schemas and the helper that turns a ZodError into a 400.
 * =============================================================================
 */

import { z } from 'zod';
import { ValidationError } from '../../core/errors/AppError';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/**
 * Free-text address (one delivery line)
 */
export const addressSchema = z.string().trim().min(1, 'Address is required').max(500);

/**
 * Optional city appended to addresses that don't already mention it
 */
export const cityHintSchema = z.string().trim().max(100).optional();

// ============================================================
// VALIDATION
// ============================================================

/**
 * Synchronous schema validation - returns the parsed (transformed) data
 *
 * @throws ValidationError listing every failing field
 */
export function validateSchema<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}
