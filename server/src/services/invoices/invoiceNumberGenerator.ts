/**
 * Invoice Number Generator
 *
 * Format: INV-2024-03-09-140507 (local time of creation).
 * Two invoices in the same second get -2, -3, ... appended.
 *
 * Must run inside the write lock so the existence check and the insert
 * that follows cannot race.
 */

import type { Kysely } from 'kysely';
import type { DB } from '@stockledger/shared/database';
import { toCompactTimestamp } from '@stockledger/shared';

export const INVOICE_PREFIX = 'INV';

export function formatInvoiceNumber(date: Date = new Date(), prefix = INVOICE_PREFIX): string {
  return `${prefix}-${toCompactTimestamp(date)}`;
}

export async function invoiceNumberExists(db: Kysely<DB>, invoiceNumber: string): Promise<boolean> {
  const row = await db
    .selectFrom('invoice')
    .select('id')
    .where('invoiceNumber', '=', invoiceNumber)
    .executeTakeFirst();
  return row !== undefined;
}

/**
 * Next free invoice number for the given instant.
 */
export async function assignNextInvoiceNumber(db: Kysely<DB>, date: Date = new Date()): Promise<string> {
  const base = formatInvoiceNumber(date);
  let candidate = base;
  let suffix = 1;

  while (await invoiceNumberExists(db, candidate)) {
    suffix++;
    candidate = `${base}-${suffix}`;
  }
  return candidate;
}
