/**
 * Schema validation utilities using Zod
 */

import { z, ZodError } from 'zod';

/**
 * Individual validation error
 */
export interface ValidationError {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Error message */
  message: string;
  /** Error code */
  code: string;
}

/**
 * Flatten a ZodError into validation errors
 */
export function toValidationErrors(error: ZodError): ValidationError[] {
  return error.errors.map((e) => ({
    path: e.path,
    message: e.message,
    code: e.code,
  }));
}

/**
 * Render validation errors as one line per issue
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
    .join('; ');
}

// Common schema builders

/**
 * Schema for a non-empty string
 */
export const nonEmptyString = z.string().min(1);

/**
 * Schema for an http(s) URL
 */
export const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'URL must use http or https' });
