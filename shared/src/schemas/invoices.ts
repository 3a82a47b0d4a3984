/**
 * Invoice Schemas
 *
 * An invoice is raised either straight from stock or against an earlier sale.
 */

import { z } from 'zod';
import { dateOnlySchema, discountSchema, idSchema, productNameSchema, quantitySchema } from './common.js';

const invoiceHeaderShape = {
  customerName: z.string().trim().min(1, 'Customer name is required').max(200),
  date: dateOnlySchema.optional(),
  invoiceNumber: z.string().trim().min(1).max(64).optional(),
};

export const StockInvoiceInputSchema = z.object({
  source: z.literal('stock'),
  ...invoiceHeaderShape,
  productName: productNameSchema,
  quantity: quantitySchema,
  discount: discountSchema.default(0),
});

/** Product, quantity and discount default to the sale's; when given they must match it */
export const SaleInvoiceInputSchema = z.object({
  source: z.literal('sale'),
  ...invoiceHeaderShape,
  saleId: idSchema,
  productName: productNameSchema.optional(),
  quantity: quantitySchema.optional(),
  discount: discountSchema.optional(),
});

export const InvoiceInputSchema = z.discriminatedUnion('source', [
  StockInvoiceInputSchema,
  SaleInvoiceInputSchema,
]);
export type InvoiceInput = z.input<typeof InvoiceInputSchema>;
export type StockInvoiceInput = z.infer<typeof StockInvoiceInputSchema>;
export type SaleInvoiceInput = z.infer<typeof SaleInvoiceInputSchema>;
