/**
 * Ledger Store
 *
 * Append-only stock ledger. Every function takes the executor to run on,
 * so callers compose them inside their own transaction.
 */

import { sql } from 'kysely';
import type { Kysely } from 'kysely';
import type { DB } from '@stockledger/shared/database';
import type { LedgerEntry } from '@stockledger/shared';

export interface AppendEntryParams {
    productId: number;
    delta: number;
    reason: string;
    /** ISO timestamp; the product's lastUpdated is set to the same value */
    at: string;
}

export async function appendEntry(db: Kysely<DB>, params: AppendEntryParams): Promise<LedgerEntry> {
    return db
        .insertInto('stock_ledger')
        .values({
            productId: params.productId,
            delta: params.delta,
            reason: params.reason,
            createdAt: params.at,
        })
        .returningAll()
        .executeTakeFirstOrThrow();
}

/**
 * Sum of all deltas for a product; 0 when it has no entries.
 */
export async function sumDeltas(db: Kysely<DB>, productId: number): Promise<number> {
    const row = await db
        .selectFrom('stock_ledger')
        .select(sql<number>`cast(coalesce(sum(${sql.ref('delta')}), 0) as integer)`.as('total'))
        .where('productId', '=', productId)
        .executeTakeFirst();
    return Number(row?.total ?? 0);
}

/**
 * Stock history, newest first.
 */
export async function listEntries(db: Kysely<DB>, productId: number): Promise<LedgerEntry[]> {
    return db
        .selectFrom('stock_ledger')
        .selectAll()
        .where('productId', '=', productId)
        .orderBy('createdAt', 'desc')
        .orderBy('id', 'desc')
        .execute();
}

export async function countEntries(db: Kysely<DB>, productId: number): Promise<number> {
    const row = await db
        .selectFrom('stock_ledger')
        .select(sql<number>`cast(count(*) as integer)`.as('count'))
        .where('productId', '=', productId)
        .executeTakeFirst();
    return Number(row?.count ?? 0);
}

/** Only for deleting the owning product */
export async function deleteEntriesForProduct(db: Kysely<DB>, productId: number): Promise<number> {
    const result = await db
        .deleteFrom('stock_ledger')
        .where('productId', '=', productId)
        .executeTakeFirst();
    return Number(result.numDeletedRows);
}
