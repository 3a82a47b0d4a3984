/**
 * Server-Sent Events (SSE) endpoint for low-stock notifications
 *
 * Each connection subscribes to the engine's low-stock channel and
 * unsubscribes when the client goes away.
 *
 * Features:
 * - Event ID on every message, counted per engine so ids never repeat across its clients
 * - Connection health via heartbeat
 */

import type { Request, Response, RequestHandler } from 'express';
import type { StockEngine } from '../services/stockEngine.js';
import { httpLogger } from '../utils/logger.js';

export interface LowStockStreamEvent {
    type: 'connected' | 'low_stock';
    productId?: number;
    name?: string;
    quantity?: number;
}

const HEARTBEAT_MS = 30000;

/**
 * GET /api/stock/low-stock/stream
 */
export function createLowStockStream(engine: StockEngine): RequestHandler {
    let lastEventId = 0;

    const writeEvent = (res: Response, data: LowStockStreamEvent): void => {
        res.write(`id: ${++lastEventId}\ndata: ${JSON.stringify(data)}\n\n`);
    };

    return (req: Request, res: Response): void => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
        res.flushHeaders();

        // Prevent response timeout
        req.socket.setTimeout(0);

        writeEvent(res, { type: 'connected' });

        const unsubscribe = engine.subscribeLowStock((productId, name, quantity) => {
            writeEvent(res, { type: 'low_stock', productId, name, quantity });
        });

        const heartbeatInterval = setInterval(() => {
            res.write(`: heartbeat\n\n`);
        }, HEARTBEAT_MS);

        httpLogger.debug('Low-stock stream client connected');

        req.on('close', () => {
            clearInterval(heartbeatInterval);
            unsubscribe();
            httpLogger.debug('Low-stock stream client disconnected');
        });
    };
}
