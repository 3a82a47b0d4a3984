/**
 * Centralized Error Handler Middleware
 * Maps the stock error taxonomy to HTTP responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { StockError, StorageError, ValidationError, validationErrorFromZod } from '@stockledger/shared';
import { httpLogger } from '../utils/logger.js';

/**
 * Error body shared by every failure response
 */
interface ErrorResponse {
    error: string;
    code: string;
    type: string;
    details?: unknown;
    context?: Record<string, unknown>;
    stack?: string;
}

/** body-parser marks malformed JSON with this type */
function isMalformedBody(err: unknown): boolean {
    return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Anything outside the taxonomy is treated as a storage failure */
function normalise(err: unknown, operation: string): StockError {
    if (err instanceof StockError) return err;
    if (err instanceof ZodError) return validationErrorFromZod(err);
    if (isMalformedBody(err)) return new ValidationError('Request body is not valid JSON');
    return new StorageError(operation, err);
}

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const stockError = normalise(err, `${req.method} ${req.path}`);
    const logContext = { method: req.method, path: req.path };

    if (!(stockError instanceof StorageError)) {
        httpLogger.info({ ...logContext, code: stockError.code, error: stockError.message }, 'Request rejected');

        const body: ErrorResponse = {
            error: stockError.userMessage,
            code: stockError.code,
            type: stockError.name,
            context: stockError.context,
        };
        if (stockError instanceof ValidationError) {
            body.details = stockError.details;
        }
        res.status(stockError.statusCode).json(body);
        return;
    }

    httpLogger.error({ ...logContext, err }, 'Request failed');

    // No internals in the body outside development
    const body: ErrorResponse = {
        error: stockError.userMessage,
        code: stockError.code,
        type: stockError.name,
    };
    if (process.env.NODE_ENV === 'development' && err instanceof Error) {
        body.stack = err.stack;
    }
    res.status(stockError.statusCode).json(body);
};

export default errorHandler;
