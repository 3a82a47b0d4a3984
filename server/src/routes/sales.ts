/**
 * Sale Routes
 */

import { Router } from 'express';
import { SaleInputSchema, idParamSchema } from '@stockledger/shared';
import { asyncHandler, parseWith, typedRoute } from '../middleware/asyncHandler.js';
import type { StockEngine } from '../services/stockEngine.js';

export function createSaleRoutes(engine: StockEngine): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (_req, res) => {
        res.json({ sales: await engine.sales.listSales() });
    }));

    router.get('/:id', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        res.json(await engine.sales.getSale(id));
    }));

    router.post('/', typedRoute(SaleInputSchema, async (_req, res, body) => {
        res.status(201).json(await engine.sales.createSale(body));
    }));

    router.put('/:id', typedRoute(SaleInputSchema, async (req, res, body) => {
        const { id } = parseWith(idParamSchema, req.params);
        res.json(await engine.sales.updateSale(id, body));
    }));

    router.delete('/:id', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        const sale = await engine.sales.deleteSale(id);
        res.json({ deleted: true, sale });
    }));

    return router;
}
