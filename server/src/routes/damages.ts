/**
 * Damage Routes
 */

import { Router } from 'express';
import { DamageInputSchema, idParamSchema } from '@stockledger/shared';
import { asyncHandler, parseWith, typedRoute } from '../middleware/asyncHandler.js';
import type { StockEngine } from '../services/stockEngine.js';

export function createDamageRoutes(engine: StockEngine): Router {
    const router: Router = Router();

    router.get('/', asyncHandler(async (_req, res) => {
        res.json(await engine.damages.listDamages());
    }));

    router.post('/', typedRoute(DamageInputSchema, async (_req, res, body) => {
        res.status(201).json(await engine.damages.createDamage(body));
    }));

    router.post('/:id/replace', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        res.json(await engine.damages.replaceDamage(id));
    }));

    router.delete('/:id', asyncHandler(async (req, res) => {
        const { id } = parseWith(idParamSchema, req.params);
        const damage = await engine.damages.deleteDamage(id);
        res.json({ deleted: true, damage });
    }));

    return router;
}
