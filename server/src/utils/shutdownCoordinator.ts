/**
 * Shutdown Coordinator
 *
 * Manages graceful shutdown for the HTTP server, background reconciliation
 * and the store. Handlers run in registration order, each with its own timeout,
 * so the store closes only after the server stops accepting writes.
 */

import { lifecycleLogger } from './logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private handlers = new Map<string, ShutdownHandler>();
    private isShuttingDown = false;

    /**
     * Register a shutdown handler
     * @param name - Unique identifier for the handler
     * @param handler - Function to call on shutdown
     * @param timeout - Max time to wait for handler (ms), default 10s
     */
    register(name: string, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            lifecycleLogger.warn({ name }, 'Shutdown handler already registered, replacing');
        }

        this.handlers.set(name, { name, handler, timeout });
        lifecycleLogger.debug({ name, timeout }, 'Shutdown handler registered');
    }

    unregister(name: string): void {
        if (this.handlers.delete(name)) {
            lifecycleLogger.debug({ name }, 'Shutdown handler unregistered');
        }
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    /**
     * Execute all shutdown handlers in registration order.
     * A failing or timed-out handler is logged and the next one still runs.
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.isShuttingDown) {
            lifecycleLogger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        lifecycleLogger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results: ShutdownResult[] = [];

        for (const { name, handler, timeout } of this.handlers.values()) {
            const start = Date.now();
            let timer: ReturnType<typeof setTimeout> | undefined;

            try {
                const timedOut = await Promise.race([
                    (async () => {
                        await handler();
                        return false;
                    })(),
                    new Promise<boolean>((resolve) => {
                        timer = setTimeout(() => resolve(true), timeout);
                    }),
                ]);

                const duration = Date.now() - start;
                if (timedOut) {
                    lifecycleLogger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                    results.push({ name, success: false, error: 'Timeout', duration });
                } else {
                    lifecycleLogger.debug({ name, duration }, 'Shutdown handler completed');
                    results.push({ name, success: true, duration });
                }
            } catch (error: unknown) {
                const duration = Date.now() - start;
                const errorMsg = error instanceof Error ? error.message : 'Unknown error';
                lifecycleLogger.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
                results.push({ name, success: false, error: errorMsg, duration });
            } finally {
                clearTimeout(timer);
            }
        }

        const successful = results.filter(r => r.success).length;
        lifecycleLogger.info({ successful, failed: results.length - successful, total: results.length }, 'Shutdown complete');
        return results;
    }
}

// ============================================
// EXPORTS
// ============================================

export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
