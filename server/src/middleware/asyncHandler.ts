/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler: wraps async route handlers to catch errors automatically
 * typedRoute: combines Zod body validation + asyncHandler for type-safe routes
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';
import { validationErrorFromZod } from '@stockledger/shared';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void | Response>;

type TypedHandler<TBody> = (
    req: Request,
    res: Response,
    body: TBody,
) => Promise<void | Response>;

// ============================================
// asyncHandler: for unvalidated routes
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}

// ============================================
// Validation helpers
// ============================================

/**
 * Parse a value with a Zod schema, throwing the taxonomy's ValidationError.
 * Use for params and query strings inside asyncHandler.
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw validationErrorFromZod(result.error);
    }
    return result.data;
}

// ============================================
// typedRoute: Zod body validation + asyncHandler
// ============================================

/**
 * Combines Zod body validation with asyncHandler in one call.
 * Invalid bodies reach the error handler as a ValidationError (400).
 *
 * @example
 * router.post('/', typedRoute(SaleInputSchema, async (req, res, body) => {
 *     const sale = await engine.sales.createSale(body); // ← fully typed
 *     res.status(201).json(sale);
 * }));
 */
export function typedRoute<T extends z.ZodTypeAny>(
    schema: T,
    handler: TypedHandler<z.infer<T>>,
): RequestHandler {
    return asyncHandler(async (req, res) => {
        const body = parseWith(schema, req.body);
        await handler(req, res, body);
    });
}

export default asyncHandler;
