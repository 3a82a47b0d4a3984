/**
 * Sale Service
 *
 * Point-of-sale entries. Creating a sale takes its quantity out of stock,
 * editing it applies only the difference, deleting it puts the quantity back.
 */

import type { Kysely } from 'kysely';
import type { DB } from '@stockledger/shared/database';
import {
    LEDGER_REASONS,
    NotFoundError,
    SaleInputSchema,
    nowIso,
    saleTotal,
    validationErrorFromZod,
} from '@stockledger/shared';
import type { SaleInput, SaleRecord } from '@stockledger/shared';
import { saleLogger } from '../../utils/logger.js';
import type { StockMutationService } from '../inventory/stockMutationService.js';
import type { UnitOfWork } from '../inventory/unitOfWork.js';
import { requireProductByName } from '../products/productService.js';

export async function requireSale(db: Kysely<DB>, id: number): Promise<SaleRecord> {
    const sale = await db.selectFrom('sale').selectAll().where('id', '=', id).executeTakeFirst();
    if (!sale) throw new NotFoundError('Sale', id);
    return sale;
}

function parseSaleInput(input: SaleInput) {
    const parsed = SaleInputSchema.safeParse(input);
    if (!parsed.success) throw validationErrorFromZod(parsed.error);
    return parsed.data;
}

export class SaleService {
    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly mutations: StockMutationService,
    ) {}

    /** Newest business date first */
    async listSales(): Promise<SaleRecord[]> {
        return this.unitOfWork.read('listSales', (db) =>
            db.selectFrom('sale').selectAll().orderBy('date', 'desc').orderBy('id', 'desc').execute(),
        );
    }

    async getSale(id: number): Promise<SaleRecord> {
        return this.unitOfWork.read('getSale', (db) => requireSale(db, id));
    }

    async createSale(input: SaleInput): Promise<SaleRecord> {
        const data = parseSaleInput(input);

        const sale = await this.unitOfWork.run('createSale', async (ctx) => {
            const product = await requireProductByName(ctx.trx, data.productName);

            await this.mutations.applyDelta(ctx, product.id, -data.quantity, LEDGER_REASONS.sale(data.quantity, data.discount));

            return ctx.trx
                .insertInto('sale')
                .values({
                    date: data.date,
                    productId: product.id,
                    itemName: product.name,
                    quantity: data.quantity,
                    unitPrice: data.unitPrice,
                    discount: data.discount,
                    total: saleTotal(data.quantity, data.unitPrice, data.discount),
                    createdAt: nowIso(),
                })
                .returningAll()
                .executeTakeFirstOrThrow();
        });

        saleLogger.info({ saleId: sale.id, productId: sale.productId, quantity: sale.quantity }, 'Sale recorded');
        return sale;
    }

    /**
     * Replace a sale's values. On the same product only the quantity difference
     * moves; on a different product the old quantity returns to the old product
     * and the new quantity leaves the new one.
     */
    async updateSale(id: number, input: SaleInput): Promise<SaleRecord> {
        const data = parseSaleInput(input);

        const sale = await this.unitOfWork.run('updateSale', async (ctx) => {
            const current = await requireSale(ctx.trx, id);
            const product = await requireProductByName(ctx.trx, data.productName);

            if (product.id === current.productId) {
                const delta = current.quantity - data.quantity;
                if (delta !== 0) {
                    await this.mutations.applyDelta(ctx, product.id, delta, LEDGER_REASONS.saleEdit(current.quantity, data.quantity));
                }
            } else {
                await this.mutations.applyDelta(ctx, current.productId, current.quantity, LEDGER_REASONS.saleEdit(current.quantity, 0));
                await this.mutations.applyDelta(ctx, product.id, -data.quantity, LEDGER_REASONS.saleEdit(0, data.quantity));
            }

            return ctx.trx
                .updateTable('sale')
                .set({
                    date: data.date,
                    productId: product.id,
                    itemName: product.name,
                    quantity: data.quantity,
                    unitPrice: data.unitPrice,
                    discount: data.discount,
                    total: saleTotal(data.quantity, data.unitPrice, data.discount),
                })
                .where('id', '=', id)
                .returningAll()
                .executeTakeFirstOrThrow();
        });

        saleLogger.info({ saleId: id, quantity: sale.quantity }, 'Sale updated');
        return sale;
    }

    async deleteSale(id: number): Promise<SaleRecord> {
        const sale = await this.unitOfWork.run('deleteSale', async (ctx) => {
            const current = await requireSale(ctx.trx, id);
            await ctx.trx.deleteFrom('sale').where('id', '=', id).execute();
            await this.mutations.applyDelta(ctx, current.productId, current.quantity, LEDGER_REASONS.saleDeletion(current.quantity));
            return current;
        });

        saleLogger.info({ saleId: id, quantity: sale.quantity }, 'Sale deleted');
        return sale;
    }
}
