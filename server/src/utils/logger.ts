/**
 * Centralized logger using Pino
 * Structured logging with one child logger per engine module
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';

const isDev = env.NODE_ENV === 'development';
const isTest = env.NODE_ENV === 'test';

function defaultLevel(): string {
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: env.LOG_LEVEL || defaultLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

// Pretty output in development; JSON lines to stdout everywhere else
const logger: Logger = isDev
    ? pino({
        ...options,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    })
    : pino(options);

// Child loggers for the engine modules
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const reconciliationLogger: Logger = logger.child({ module: 'reconciliation' });
export const productLogger: Logger = logger.child({ module: 'products' });
export const saleLogger: Logger = logger.child({ module: 'sales' });
export const damageLogger: Logger = logger.child({ module: 'damages' });
export const invoiceLogger: Logger = logger.child({ module: 'invoices' });
export const importExportLogger: Logger = logger.child({ module: 'import-export' });
export const httpLogger: Logger = logger.child({ module: 'http' });
export const lifecycleLogger: Logger = logger.child({ module: 'lifecycle' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.url,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}
