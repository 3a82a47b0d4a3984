/**
 * Error handler mapping for failures raised outside the services
 */

import express from 'express';
import request from 'supertest';
import { NotFoundError } from '@stockledger/shared';
import { asyncHandler } from '../asyncHandler.js';
import { errorHandler } from '../errorHandler.js';

function appThrowing(error: unknown): express.Express {
    const app = express();
    app.get('/fail', asyncHandler(async () => {
        throw error;
    }));
    app.use(errorHandler);
    return app;
}

describe('errorHandler', () => {
    it('treats an error outside the taxonomy as a storage failure', async () => {
        const res = await request(appThrowing(new Error('connection reset'))).get('/fail');

        expect(res.status).toBe(500);
        expect(res.body).toEqual({
            error: 'The stock store could not complete the operation',
            code: 'STORAGE_ERROR',
            type: 'StorageError',
        });
    });

    it('passes taxonomy errors through with their status', async () => {
        const res = await request(appThrowing(new NotFoundError('Sale', 7))).get('/fail');

        expect(res.status).toBe(404);
        expect(res.body).toEqual({
            error: 'Sale 7 not found',
            code: 'NOT_FOUND',
            type: 'NotFoundError',
            context: { resourceType: 'Sale', resourceId: 7 },
        });
    });
});
