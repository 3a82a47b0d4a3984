/**
 * Damage Schemas
 */

import { z } from 'zod';
import { dateOnlySchema, productNameSchema, quantitySchema } from './common.js';

export const DamageInputSchema = z.object({
  date: dateOnlySchema,
  productName: productNameSchema,
  quantity: quantitySchema,
});
export type DamageInput = z.input<typeof DamageInputSchema>;
