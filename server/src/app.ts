/**
 * Express application factory
 *
 * Kept free of listen() and process signals so tests can mount it with supertest.
 */

import express from 'express';
import type { Express } from 'express';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRouter } from './routes/index.js';
import type { StockEngine } from './services/stockEngine.js';
import { requestLogger } from './utils/logger.js';

export function createApp(engine: StockEngine): Express {
    const app = express();

    app.use(express.json({ limit: '5mb' }));
    app.use(requestLogger);

    app.use('/api', createApiRouter(engine));

    app.use((_req, res) => {
        res.status(404).json({ error: 'Route not found', code: 'NOT_FOUND' });
    });

    // Must be last
    app.use(errorHandler);

    return app;
}
