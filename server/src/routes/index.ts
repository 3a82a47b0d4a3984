/**
 * API router: mounts every resource under /api
 */

import { Router } from 'express';
import type { StockEngine } from '../services/stockEngine.js';
import { createDamageRoutes } from './damages.js';
import { createInvoiceRoutes } from './invoices.js';
import { createProductRoutes } from './products.js';
import { createSaleRoutes } from './sales.js';
import { createStockRoutes } from './stock.js';

export function createApiRouter(engine: StockEngine): Router {
    const router: Router = Router();

    router.get('/health', (_req, res) => {
        res.json({ status: 'ok' });
    });

    router.use('/products', createProductRoutes(engine));
    router.use('/stock', createStockRoutes(engine));
    router.use('/sales', createSaleRoutes(engine));
    router.use('/damages', createDamageRoutes(engine));
    router.use('/invoices', createInvoiceRoutes(engine));

    return router;
}
