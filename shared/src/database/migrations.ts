/**
 * Schema Migrations
 *
 * Kysely migrations kept in code so the store can be created at start-up
 * without a migrations folder on disk. Append new entries; never edit old ones.
 */

import { Migrator } from 'kysely';
import type { CreateTableBuilder, Kysely, Migration, MigrationProvider, MigrationResult } from 'kysely';
import type { DB } from './types.js';

function withId<T extends string>(table: CreateTableBuilder<T, never>): CreateTableBuilder<T, 'id'> {
    return table.addColumn('id', 'serial', (col) => col.primaryKey());
}

function buildMigrations(): Record<string, Migration> {
    return {
        '0001_stock_ledger': {
            async up(db: Kysely<unknown>): Promise<void> {
                await withId(db.schema.createTable('product'))
                    .addColumn('name', 'text', (col) => col.notNull().unique())
                    .addColumn('type', 'text', (col) => col.notNull())
                    .addColumn('buyPrice', 'double precision', (col) => col.notNull())
                    .addColumn('sellPrice', 'double precision', (col) => col.notNull())
                    .addColumn('stock', 'integer', (col) => col.notNull().defaultTo(0))
                    .addColumn('lastUpdated', 'text', (col) => col.notNull())
                    .addColumn('createdAt', 'text', (col) => col.notNull())
                    .execute();

                await withId(db.schema.createTable('stock_ledger'))
                    .addColumn('productId', 'integer', (col) => col.notNull().references('product.id'))
                    .addColumn('delta', 'integer', (col) => col.notNull())
                    .addColumn('reason', 'text', (col) => col.notNull())
                    .addColumn('createdAt', 'text', (col) => col.notNull())
                    .execute();

                await withId(db.schema.createTable('sale'))
                    .addColumn('date', 'text', (col) => col.notNull())
                    .addColumn('productId', 'integer', (col) => col.notNull().references('product.id'))
                    .addColumn('itemName', 'text', (col) => col.notNull())
                    .addColumn('quantity', 'integer', (col) => col.notNull())
                    .addColumn('unitPrice', 'double precision', (col) => col.notNull())
                    .addColumn('discount', 'double precision', (col) => col.notNull().defaultTo(0))
                    .addColumn('total', 'double precision', (col) => col.notNull())
                    .addColumn('createdAt', 'text', (col) => col.notNull())
                    .execute();

                await withId(db.schema.createTable('damage'))
                    .addColumn('date', 'text', (col) => col.notNull())
                    .addColumn('productId', 'integer', (col) => col.notNull().references('product.id'))
                    .addColumn('productName', 'text', (col) => col.notNull())
                    .addColumn('quantity', 'integer', (col) => col.notNull())
                    .addColumn('replaced', 'integer', (col) => col.notNull().defaultTo(0))
                    .addColumn('createdAt', 'text', (col) => col.notNull())
                    .execute();

                // saleId is a historical reference; the sale may be deleted later
                await withId(db.schema.createTable('invoice'))
                    .addColumn('invoiceNumber', 'text', (col) => col.notNull().unique())
                    .addColumn('date', 'text', (col) => col.notNull())
                    .addColumn('customerName', 'text', (col) => col.notNull())
                    .addColumn('subtotal', 'double precision', (col) => col.notNull())
                    .addColumn('tax', 'double precision', (col) => col.notNull())
                    .addColumn('grandTotal', 'double precision', (col) => col.notNull())
                    .addColumn('saleId', 'integer')
                    .addColumn('createdAt', 'text', (col) => col.notNull())
                    .execute();

                await withId(db.schema.createTable('invoice_item'))
                    .addColumn('invoiceId', 'integer', (col) => col.notNull().references('invoice.id').onDelete('cascade'))
                    .addColumn('productId', 'integer', (col) => col.notNull().references('product.id'))
                    .addColumn('productName', 'text', (col) => col.notNull())
                    .addColumn('quantity', 'integer', (col) => col.notNull())
                    .addColumn('unitPrice', 'double precision', (col) => col.notNull())
                    .addColumn('discount', 'double precision', (col) => col.notNull().defaultTo(0))
                    .addColumn('total', 'double precision', (col) => col.notNull())
                    .execute();

                await db.schema.createIndex('stock_ledger_product_idx').on('stock_ledger').column('productId').execute();
                await db.schema.createIndex('sale_product_idx').on('sale').column('productId').execute();
                await db.schema.createIndex('damage_product_idx').on('damage').column('productId').execute();
                await db.schema.createIndex('invoice_item_invoice_idx').on('invoice_item').column('invoiceId').execute();
                await db.schema.createIndex('invoice_item_product_idx').on('invoice_item').column('productId').execute();
            },

            async down(db: Kysely<unknown>): Promise<void> {
                await db.schema.dropTable('invoice_item').execute();
                await db.schema.dropTable('invoice').execute();
                await db.schema.dropTable('damage').execute();
                await db.schema.dropTable('sale').execute();
                await db.schema.dropTable('stock_ledger').execute();
                await db.schema.dropTable('product').execute();
            },
        },
    };
}

class InlineMigrationProvider implements MigrationProvider {
    async getMigrations(): Promise<Record<string, Migration>> {
        return buildMigrations();
    }
}

/**
 * Bring the schema up to date.
 *
 * @throws the migrator's error when a migration fails; earlier successful ones stay applied
 */
export async function migrateToLatest(db: Kysely<DB>): Promise<MigrationResult[]> {
    const migrator = new Migrator({
        db,
        provider: new InlineMigrationProvider(),
    });

    const { error, results } = await migrator.migrateToLatest();
    if (error) {
        throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
    }
    return results ?? [];
}
