/**
 * Invoice Routes
 *
 * POST body is discriminated by `source`: "stock" or "sale".
 */

import { Router } from 'express';
import { InvoiceInputSchema, idParamSchema } from '@stockledger/shared';
import { asyncHandler, parseWith, typedRoute } from '../middleware/asyncHandler.js';
import type { StockEngine } from '../services/stockEngine.js';

export function createInvoiceRoutes(engine: StockEngine): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (_req, res) => {
        res.json({ invoices: await engine.invoices.listInvoices() });
    }));

    router.get('/:id', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        res.json(await engine.invoices.getInvoice(id));
    }));

    router.post('/', typedRoute(InvoiceInputSchema, async (_req, res, body) => {
        res.status(201).json(await engine.invoices.createInvoice(body));
    }));

    router.delete('/:id', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        const invoice = await engine.invoices.deleteInvoice(id);
        res.json({ deleted: true, invoice });
    }));

    return router;
}
