/**
 * Stock Routes - direct mutations, reconciliation, summary and the low-stock stream
 */

import { Router } from 'express';
import { MutateStockSchema, STOCK_ERROR_HTTP_STATUS, productIdParamSchema } from '@stockledger/shared';
import { asyncHandler, parseWith, typedRoute } from '../middleware/asyncHandler.js';
import type { StockEngine } from '../services/stockEngine.js';
import { createLowStockStream } from './sse.js';

export function createStockRoutes(engine: StockEngine): Router {
    const router: Router = Router();

    /**
     * POST /api/stock/:productId/mutate
     * Body: { delta, reason }. Replies with the result object as-is.
     */
    router.post('/:productId/mutate', typedRoute(MutateStockSchema, async (req, res, body) => {
        const { productId } = parseWith(productIdParamSchema, req.params);
        const result = await engine.mutateStock(productId, body.delta, body.reason);

        if (result.success) {
            res.json({ productId, quantity: result.data });
            return;
        }
        res.status(STOCK_ERROR_HTTP_STATUS[result.error.code]).json({
            error: result.error.message,
            code: result.error.code,
            context: result.error.context,
        });
    }));

    router.post('/reconcile', asyncHandler(async (_req, res) => {
        const corrections = await engine.reconcile();
        res.json({ corrections, corrected: corrections.length });
    }));

    router.get('/summary', asyncHandler(async (_req, res) => {
        res.json(await engine.query.getStockSummary());
    }));

    router.get('/low-stock/stream', createLowStockStream(engine));

    return router;
}
