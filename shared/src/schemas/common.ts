/**
 * Common Zod Schemas
 *
 * Base schemas used by other domain schemas.
 * This file should NOT import from index.ts to avoid circular dependencies.
 */

import { z } from 'zod';

// Common validation schemas
export const idSchema = z.coerce.number().int().positive();

export const idParamSchema = z.object({
  id: idSchema,
});

export const productIdParamSchema = z.object({
  productId: idSchema,
});

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Calendar date as YYYY-MM-DD; rejects impossible dates like 2024-02-30 */
export const dateOnlySchema = z
  .string()
  .trim()
  .regex(DATE_ONLY, 'Date must be in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Date must be a real calendar date');

export const productNameSchema = z.string().trim().min(1, 'Product name is required').max(200);

export const quantitySchema = z
  .number({ invalid_type_error: 'Quantity must be a number' })
  .int('Quantity must be a whole number')
  .positive('Quantity must be greater than 0');

export const priceSchema = z
  .number({ invalid_type_error: 'Price must be a number' })
  .finite()
  .nonnegative('Price cannot be negative');

export const discountSchema = z
  .number({ invalid_type_error: 'Discount must be a number' })
  .min(0, 'Discount must be between 0 and 100')
  .max(100, 'Discount must be between 0 and 100');
