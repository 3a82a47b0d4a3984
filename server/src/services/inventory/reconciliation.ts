/**
 * Reconciliation Process
 *
 * Detects drift between product.stock and the ledger sum and heals it by
 * appending a corrective entry. The cached quantity is treated as ground truth.
 *
 * Each product is checked in its own unit of work, so the stock read and the
 * ledger sum are taken together under the write lock. A failure on one
 * product is logged and skipped; reconcile() itself never throws.
 */

import { LEDGER_REASONS, nowIso } from '@stockledger/shared';
import type { DriftCorrection } from '@stockledger/shared';
import { reconciliationLogger } from '../../utils/logger.js';
import { appendEntry, sumDeltas } from './ledgerStore.js';
import type { UnitOfWork, UnitOfWorkContext } from './unitOfWork.js';

/** Log event name for an applied correction; informational, not an error */
export const DRIFT_DETECTED = 'DriftDetected';

export class ReconciliationService {
    constructor(private readonly unitOfWork: UnitOfWork) {}

    async reconcile(): Promise<DriftCorrection[]> {
        const started = Date.now();

        let productIds: number[];
        try {
            const rows = await this.unitOfWork.read('reconcile', (db) =>
                db.selectFrom('product').select('id').orderBy('id').execute(),
            );
            productIds = rows.map((row) => row.id);
        } catch (err) {
            reconciliationLogger.error({ err }, 'Could not list products for reconciliation');
            return [];
        }

        const corrections: DriftCorrection[] = [];
        let failed = 0;

        for (const productId of productIds) {
            try {
                const correction = await this.unitOfWork.run('reconcile', (ctx) => this.reconcileProduct(ctx, productId));
                if (correction) corrections.push(correction);
            } catch (err) {
                failed++;
                reconciliationLogger.error({ productId, err }, 'Reconciliation failed for product, skipping');
            }
        }

        reconciliationLogger.info(
            { checked: productIds.length, corrected: corrections.length, failed, durationMs: Date.now() - started },
            'Reconciliation complete',
        );
        return corrections;
    }

    /**
     * @returns the correction applied, or null when the product is consistent or gone
     */
    async reconcileProduct(ctx: UnitOfWorkContext, productId: number): Promise<DriftCorrection | null> {
        const product = await ctx.trx
            .selectFrom('product')
            .select(['id', 'name', 'stock'])
            .where('id', '=', productId)
            .executeTakeFirst();
        if (!product) return null;

        const ledgerSum = await sumDeltas(ctx.trx, productId);
        if (ledgerSum === product.stock) return null;

        const delta = product.stock - ledgerSum;
        await appendEntry(ctx.trx, {
            productId,
            delta,
            reason: LEDGER_REASONS.reconciliation,
            at: nowIso(),
        });

        const correction: DriftCorrection = {
            productId,
            productName: product.name,
            oldQty: ledgerSum,
            newQty: product.stock,
            delta,
        };
        reconciliationLogger.info({ event: DRIFT_DETECTED, ...correction }, 'Drift detected, corrective entry written');
        return correction;
    }
}
