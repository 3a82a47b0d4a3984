/**
 * @fileoverview Product Routes - product CRUD, filtering, history and bulk import
 *
 * Key Gotchas:
 * - Route order matters: /names and /import must be before /:id
 * - GET / takes filter criteria from the query string; unparseable numbers are ignored
 * - DELETE answers 409 while sales, damages or invoices still reference the product
 */

import { Router } from 'express';
import {
    CreateProductSchema,
    ImportBatchSchema,
    ProductFilterQuerySchema,
    UpdateProductSchema,
    idParamSchema,
} from '@stockledger/shared';
import { asyncHandler, parseWith, typedRoute } from '../middleware/asyncHandler.js';
import type { StockEngine } from '../services/stockEngine.js';

export function createProductRoutes(engine: StockEngine): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (req, res) => {
        const criteria = parseWith(ProductFilterQuerySchema, req.query);
        const products = await engine.filterProducts(criteria);
        res.json({ products, total: products.length });
    }));

    router.get('/names', asyncHandler(async (_req, res) => {
        res.json({ products: await engine.products.listProductNames() });
    }));

    router.post('/import', typedRoute(ImportBatchSchema, async (_req, res, body) => {
        const summary = await engine.importer.importProducts(body);
        res.status(201).json(summary);
    }));

    router.get('/:id', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        res.json(await engine.products.getProduct(id));
    }));

    router.get('/:id/history', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        res.json(await engine.products.getStockHistory(id));
    }));

    router.post('/', typedRoute(CreateProductSchema, async (_req, res, body) => {
        const product = await engine.products.createProduct(body);
        res.status(201).json(product);
    }));

    router.put('/:id', typedRoute(UpdateProductSchema, async (req, res, body) => {
        const { id } = parseWith(idParamSchema, req.params);
        res.json(await engine.products.updateProduct(id, body));
    }));

    router.delete('/:id', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        const product = await engine.products.deleteProduct(id);
        res.json({ deleted: true, product });
    }));

    return router;
}
