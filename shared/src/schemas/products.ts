/**
 * Product Schemas
 *
 * Manual add/update and bulk import inputs.
 */

import { z } from 'zod';
import { isKnownProductType } from '../config/productTaxonomy.js';
import { priceSchema, productNameSchema } from './common.js';

export const productTypeSchema = z
  .string()
  .trim()
  .refine(isKnownProductType, (value) => ({ message: `Unknown product type "${value}"` }));

const stockLevelSchema = z
  .number({ invalid_type_error: 'Stock must be a number' })
  .int('Stock must be a whole number')
  .nonnegative('Stock cannot be negative');

export const CreateProductSchema = z.object({
  name: productNameSchema,
  type: productTypeSchema,
  buyPrice: priceSchema,
  sellPrice: priceSchema,
  stock: stockLevelSchema.default(0),
});
export type CreateProductInput = z.input<typeof CreateProductSchema>;

export const UpdateProductSchema = z
  .object({
    name: productNameSchema,
    type: productTypeSchema,
    buyPrice: priceSchema,
    sellPrice: priceSchema,
    stock: stockLevelSchema,
  })
  .partial()
  .refine((value) => Object.values(value).some((field) => field !== undefined), 'Nothing to update');
export type UpdateProductInput = z.input<typeof UpdateProductSchema>;

export const ImportRowSchema = z.object({
  name: productNameSchema,
  type: productTypeSchema,
  buyPrice: priceSchema,
  sellPrice: priceSchema,
  quantity: stockLevelSchema,
});
export type ImportRow = z.infer<typeof ImportRowSchema>;

export const ImportBatchSchema = z.object({
  rows: z.array(z.unknown()).min(1, 'Import file contains no rows'),
});
export type ImportBatchInput = z.input<typeof ImportBatchSchema>;
