/**
 * Stock Schemas
 *
 * Direct mutations and the product filter query string.
 */

import { z } from 'zod';
import { parseDateBound } from '../utils/dateHelpers.js';

export const MutateStockSchema = z.object({
  delta: z
    .number({ invalid_type_error: 'Delta must be a number' })
    .int('Delta must be a whole number')
    .refine((value) => value !== 0, 'Delta must not be zero'),
  reason: z.string().trim().min(1, 'Reason is required').max(500),
});
export type MutateStockInput = z.infer<typeof MutateStockSchema>;

/** Empty inputs and unparseable numbers are ignored rather than rejected */
const optionalNumber = z.preprocess(
  (value) => (value === '' || value === null ? undefined : value),
  z.coerce.number().finite().optional()
).catch(undefined);

const optionalText = z.string().trim().optional().catch(undefined);

/** Rejected rather than ignored: a mistyped date would silently hide products */
const optionalDateBound = z
  .string()
  .trim()
  .optional()
  .refine(
    (value) => !value || parseDateBound(value) !== null,
    'Updated-after must be a date (YYYY-MM-DD) or an ISO-8601 timestamp'
  );

/**
 * Product filter criteria as sent in a query string
 *
 * @example
 * /api/products?name=cable&category=Chargers&stockMax=5
 */
export const ProductFilterQuerySchema = z.object({
  name: optionalText,
  category: optionalText,
  buyPriceMin: optionalNumber,
  buyPriceMax: optionalNumber,
  sellPriceMin: optionalNumber,
  sellPriceMax: optionalNumber,
  stockMin: optionalNumber,
  stockMax: optionalNumber,
  updatedAfter: optionalDateBound,
});
export type ProductFilterQuery = z.infer<typeof ProductFilterQuerySchema>;
