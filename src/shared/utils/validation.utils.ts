/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared validation schemas and utilities.
 * Used across all modules for consistent validation.
 *
 * Zod failures become ValidationError (400) with one
 * `{ field, message }` entry per issue.
 * =============================================================================
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../../core/errors/AppError';

// ============================================================
// COMMON SCHEMAS
// ============================================================

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Opaque identifier (trip, bus, hold, booking). No ':' - ids are embedded in store keys.
 */
export const idSchema = z.string().trim().min(1).max(100)
  .regex(ID_PATTERN, 'Only letters, digits, "-" and "_" are allowed');

/**
 * Seat identifier as printed on the layout, e.g. "A1", "L12"
 */
export const seatIdSchema = z.string().trim().min(1).max(10)
  .regex(ID_PATTERN, 'Only letters, digits, "-" and "_" are allowed');

/**
 * Non-empty list of distinct seat ids
 */
export const seatIdListSchema = z.array(seatIdSchema)
  .min(1, 'Select at least one seat')
  .refine(ids => new Set(ids).size === ids.length, { message: 'Seat ids must be unique' });

/**
 * Holder identifier (user id or anonymous session id)
 */
export const holderIdSchema = z.string().trim().min(1).max(100);

/**
 * PNR (10 chars, A-Z 0-9). Lower case is accepted and normalized.
 */
export const pnrSchema = z.string()
  .trim()
  .transform(val => val.toUpperCase())
  .refine(val => /^[A-Z0-9]{10}$/.test(val), { message: 'PNR must be 10 letters or digits' });

// ============================================================
// VALIDATION MIDDLEWARE
// ============================================================

function toValidationError(error: z.ZodError, message: string): ValidationError {
  const details = error.errors.map(e => ({
    field: e.path.join('.'),
    message: e.message
  }));
  return new ValidationError(message, details);
}

/**
 * Synchronous schema validation - validates data and returns parsed result
 * Throws ValidationError on validation failure
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @returns Validated and transformed data
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw toValidationError(result.error, 'Invalid request data');
  }
  return result.data;
}

/**
 * Request validation middleware
 * Validates request body against a Zod schema
 *
 * @param schema - Zod schema to validate against
 */
export function validateRequest<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(toValidationError(result.error, 'Invalid request data'));
      return;
    }

    // Replace body with validated data (includes transforms)
    req.body = result.data;
    next();
  };
}
