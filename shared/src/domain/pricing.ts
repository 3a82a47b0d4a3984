/**
 * Pricing: pure functions
 *
 * Money arithmetic for sales and invoices. No DB access.
 * Amounts are rounded to 2 decimals at every stored boundary.
 */

import { STOCK_CONFIG } from './constants.js';

export interface InvoiceTotals {
  subtotal: number;
  tax: number;
  grandTotal: number;
}

export function roundTo2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Line total after a percentage discount.
 * saleTotal(3, 10, 10) → 27
 */
export function saleTotal(quantity: number, unitPrice: number, discount: number): number {
  const subtotal = quantity * unitPrice;
  return roundTo2(subtotal - (subtotal * discount) / 100);
}

/**
 * Invoice totals for a single discounted line.
 * Tax is a flat rate on the discounted subtotal.
 */
export function invoiceTotals(lineTotal: number, vatRate: number = STOCK_CONFIG.vatRate): InvoiceTotals {
  const subtotal = roundTo2(lineTotal);
  const tax = roundTo2(subtotal * vatRate);
  return {
    subtotal,
    tax,
    grandTotal: roundTo2(subtotal + tax),
  };
}
