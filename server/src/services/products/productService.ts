/**
 * Product Service
 *
 * Manual add/update/delete of products and the reads the other coordinators
 * share (lookup by id or name). Stock changes go through the mutation service
 * so every manual edit leaves a ledger entry.
 */

import { sql } from 'kysely';
import type { Kysely } from 'kysely';
import type { DB } from '@stockledger/shared/database';
import {
    CreateProductSchema,
    ConflictError,
    LEDGER_REASONS,
    NotFoundError,
    STOCK_ERROR_CODES,
    UpdateProductSchema,
    nowIso,
    validationErrorFromZod,
} from '@stockledger/shared';
import type {
    CreateProductInput,
    LedgerEntry,
    Product,
    ProductNameOption,
    UpdateProductInput,
} from '@stockledger/shared';
import { productLogger } from '../../utils/logger.js';
import { deleteEntriesForProduct, listEntries } from '../inventory/ledgerStore.js';
import type { StockMutationService } from '../inventory/stockMutationService.js';
import type { UnitOfWork } from '../inventory/unitOfWork.js';

// ---------------------------------------------------------------------------
// Lookups shared by the coordinators
// ---------------------------------------------------------------------------

export async function findProductById(db: Kysely<DB>, id: number): Promise<Product | undefined> {
    return db.selectFrom('product').selectAll().where('id', '=', id).executeTakeFirst();
}

export async function requireProductById(db: Kysely<DB>, id: number): Promise<Product> {
    const product = await findProductById(db, id);
    if (!product) throw new NotFoundError('Product', id);
    return product;
}

/**
 * Names are unique, so the display name resolves to exactly one product.
 */
export async function requireProductByName(db: Kysely<DB>, name: string): Promise<Product> {
    const product = await db.selectFrom('product').selectAll().where('name', '=', name).executeTakeFirst();
    if (!product) throw new NotFoundError('Product', name);
    return product;
}

async function assertNameAvailable(db: Kysely<DB>, name: string, exceptId?: number): Promise<void> {
    let query = db.selectFrom('product').select('id').where('name', '=', name);
    if (exceptId !== undefined) {
        query = query.where('id', '!=', exceptId);
    }
    const clash = await query.executeTakeFirst();
    if (clash) {
        throw new ConflictError(STOCK_ERROR_CODES.DUPLICATE, `Product "${name}" already exists`, { name });
    }
}

async function countReferences(db: Kysely<DB>, productId: number): Promise<number> {
    const row = await db
        .selectNoFrom((eb) => [
            eb.selectFrom('sale').select(sql<number>`cast(count(*) as integer)`.as('n')).where('productId', '=', productId).as('sales'),
            eb.selectFrom('damage').select(sql<number>`cast(count(*) as integer)`.as('n')).where('productId', '=', productId).as('damages'),
            eb.selectFrom('invoice_item').select(sql<number>`cast(count(*) as integer)`.as('n')).where('productId', '=', productId).as('invoiceItems'),
        ])
        .executeTakeFirstOrThrow();
    return Number(row.sales ?? 0) + Number(row.damages ?? 0) + Number(row.invoiceItems ?? 0);
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export interface StockHistory {
    product: Product;
    entries: LedgerEntry[];
}

export class ProductService {
    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly mutations: StockMutationService,
    ) {}

    async getProduct(id: number): Promise<Product> {
        return this.unitOfWork.read('getProduct', (db) => requireProductById(db, id));
    }

    /** Insertion order */
    async listProducts(): Promise<Product[]> {
        return this.unitOfWork.read('listProducts', (db) => db.selectFrom('product').selectAll().orderBy('id').execute());
    }

    async listProductNames(): Promise<ProductNameOption[]> {
        return this.unitOfWork.read('listProductNames', (db) =>
            db.selectFrom('product').select(['id', 'name']).orderBy('name').execute(),
        );
    }

    async getStockHistory(id: number): Promise<StockHistory> {
        return this.unitOfWork.read('getStockHistory', async (db) => {
            const product = await requireProductById(db, id);
            const entries = await listEntries(db, id);
            return { product, entries };
        });
    }

    /**
     * Create a product; an opening stock is credited as "Initial stock".
     */
    async createProduct(input: CreateProductInput): Promise<Product> {
        const parsed = CreateProductSchema.safeParse(input);
        if (!parsed.success) throw validationErrorFromZod(parsed.error);
        const data = parsed.data;

        const product = await this.unitOfWork.run('createProduct', async (ctx) => {
            await assertNameAvailable(ctx.trx, data.name);

            const now = nowIso();
            const created = await ctx.trx
                .insertInto('product')
                .values({
                    name: data.name,
                    type: data.type,
                    buyPrice: data.buyPrice,
                    sellPrice: data.sellPrice,
                    stock: 0,
                    lastUpdated: now,
                    createdAt: now,
                })
                .returning('id')
                .executeTakeFirstOrThrow();

            if (data.stock > 0) {
                await this.mutations.applyDelta(ctx, created.id, data.stock, LEDGER_REASONS.initialStock);
            }
            return requireProductById(ctx.trx, created.id);
        });

        productLogger.info({ productId: product.id, name: product.name, stock: product.stock }, 'Product created');
        return product;
    }

    /**
     * Update descriptive fields; a changed stock is written as a "Stock updated" delta.
     */
    async updateProduct(id: number, input: UpdateProductInput): Promise<Product> {
        const parsed = UpdateProductSchema.safeParse(input);
        if (!parsed.success) throw validationErrorFromZod(parsed.error);
        const { stock, ...fields } = parsed.data;

        const product = await this.unitOfWork.run('updateProduct', async (ctx) => {
            const current = await requireProductById(ctx.trx, id);
            if (fields.name !== undefined && fields.name !== current.name) {
                await assertNameAvailable(ctx.trx, fields.name, id);
            }

            await ctx.trx
                .updateTable('product')
                .set({ ...fields, lastUpdated: nowIso() })
                .where('id', '=', id)
                .execute();

            if (stock !== undefined && stock !== current.stock) {
                await this.mutations.applyDelta(ctx, id, stock - current.stock, LEDGER_REASONS.stockUpdated);
            }
            return requireProductById(ctx.trx, id);
        });

        productLogger.info({ productId: id }, 'Product updated');
        return product;
    }

    /**
     * Delete a product and its ledger. Refused while any sale, damage or
     * invoice line still points at it.
     */
    async deleteProduct(id: number): Promise<Product> {
        const product = await this.unitOfWork.run('deleteProduct', async (ctx) => {
            const current = await requireProductById(ctx.trx, id);

            const references = await countReferences(ctx.trx, id);
            if (references > 0) {
                throw new ConflictError(
                    STOCK_ERROR_CODES.PRODUCT_IN_USE,
                    `Product "${current.name}" is referenced by ${references} record(s) and cannot be deleted`,
                    { productId: id, references },
                );
            }

            await deleteEntriesForProduct(ctx.trx, id);
            await ctx.trx.deleteFrom('product').where('id', '=', id).execute();
            return current;
        });

        productLogger.info({ productId: id, name: product.name }, 'Product deleted');
        return product;
    }
}
