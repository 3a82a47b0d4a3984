/**
 * Sale Schemas
 */

import { z } from 'zod';
import { dateOnlySchema, discountSchema, priceSchema, productNameSchema, quantitySchema } from './common.js';

export const SaleInputSchema = z.object({
  date: dateOnlySchema,
  productName: productNameSchema,
  quantity: quantitySchema,
  unitPrice: priceSchema,
  discount: discountSchema.default(0),
});
export type SaleInput = z.input<typeof SaleInputSchema>;
