/**
 * Stock Mutation Service
 *
 * The only writer of product.stock. Each mutation checks the non-negative
 * rule, appends one ledger entry and updates the cached quantity inside the
 * caller's unit of work, so ledger and projection commit together.
 */

import {
    InsufficientStockError,
    MutateStockSchema,
    NotFoundError,
    ValidationError,
    nowIso,
    stockSuccess,
    validationErrorFromZod,
} from '@stockledger/shared';
import type { StockResult } from '@stockledger/shared';
import { inventoryLogger } from '../../utils/logger.js';
import { appendEntry } from './ledgerStore.js';
import type { LowStockNotifier } from './lowStockNotifier.js';
import { toStockError } from './unitOfWork.js';
import type { UnitOfWork, UnitOfWorkContext } from './unitOfWork.js';

export class StockMutationService {
    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly notifier: LowStockNotifier,
        private readonly lowStockThreshold: number,
    ) {}

    /**
     * Apply a signed delta inside an open unit of work.
     *
     * A zero delta writes nothing and returns the current quantity.
     *
     * @returns the new quantity
     * @throws InsufficientStockError when the result would go below zero
     */
    async applyDelta(ctx: UnitOfWorkContext, productId: number, delta: number, reason: string): Promise<number> {
        if (!Number.isInteger(delta)) {
            throw new ValidationError('Delta must be a whole number', [{ path: 'delta', message: 'Expected integer' }]);
        }

        const product = await ctx.trx
            .selectFrom('product')
            .select(['id', 'name', 'stock'])
            .where('id', '=', productId)
            .executeTakeFirst();

        if (!product) {
            throw new NotFoundError('Product', productId);
        }

        if (delta === 0) return product.stock;

        const newQuantity = product.stock + delta;
        if (newQuantity < 0) {
            throw new InsufficientStockError(productId, product.stock, -delta);
        }

        const at = nowIso();
        await appendEntry(ctx.trx, { productId, delta, reason, at });
        await ctx.trx
            .updateTable('product')
            .set({ stock: newQuantity, lastUpdated: at })
            .where('id', '=', productId)
            .execute();

        inventoryLogger.debug({ productId, delta, newQuantity, reason }, 'Stock mutated');

        if (newQuantity <= this.lowStockThreshold) {
            const event = { productId, name: product.name, quantity: newQuantity };
            ctx.afterCommit(() => this.notifier.publish(event));
        }

        return newQuantity;
    }

    /**
     * Public entry point: one atomic mutation, reported as a result object.
     */
    async mutateStock(productId: number, delta: number, reason: string): Promise<StockResult<number>> {
        const parsed = MutateStockSchema.safeParse({ delta, reason });
        if (!parsed.success) {
            return validationErrorFromZod(parsed.error).toResult();
        }

        try {
            const quantity = await this.unitOfWork.run('mutateStock', (ctx) =>
                this.applyDelta(ctx, productId, parsed.data.delta, parsed.data.reason),
            );
            return stockSuccess(quantity);
        } catch (error) {
            const stockError = toStockError('mutateStock', error);
            inventoryLogger.info({ productId, delta, code: stockError.code }, 'Stock mutation rejected');
            return stockError.toResult();
        }
    }
}
