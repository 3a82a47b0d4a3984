/**
 * Server entry point
 *
 * Startup order: open store → migrate → build engine → reconcile → listen.
 * Shutdown runs in the reverse order through the shutdown coordinator.
 */

import { detectStoreKind, migrateToLatest, openKysely } from '@stockledger/shared/database';
import { createApp } from './app.js';
import { env } from './config/env.js';
import { createStockEngine } from './services/stockEngine.js';
import { lifecycleLogger, reconciliationLogger } from './utils/logger.js';
import { shutdownCoordinator } from './utils/shutdownCoordinator.js';

async function main(): Promise<void> {
    const store = detectStoreKind(env.DATABASE_URL);
    const db = openKysely({
        connectionString: env.DATABASE_URL,
        storageTimeoutMs: env.STORAGE_TIMEOUT_MS,
    });

    await migrateToLatest(db);
    lifecycleLogger.info({ store }, 'Store ready');

    const engine = createStockEngine({
        db,
        lowStockThreshold: env.LOW_STOCK_THRESHOLD,
        vatRate: env.VAT_RATE,
    });

    const corrections = await engine.reconcile();
    lifecycleLogger.info({ corrected: corrections.length }, 'Startup reconciliation complete');

    let reconcileTimer: ReturnType<typeof setInterval> | null = null;
    if (env.RECONCILE_INTERVAL_MS > 0) {
        reconcileTimer = setInterval(() => {
            engine.reconcile().catch((error: unknown) => {
                reconciliationLogger.error({ err: error }, 'Scheduled reconciliation failed');
            });
        }, env.RECONCILE_INTERVAL_MS);
    }

    const app = createApp(engine);
    const server = app.listen(env.PORT, () => {
        lifecycleLogger.info({ port: env.PORT, env: env.NODE_ENV }, 'Server listening');
    });

    shutdownCoordinator.register('http', () => new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    }));
    shutdownCoordinator.register('reconcile-timer', () => {
        if (reconcileTimer) clearInterval(reconcileTimer);
    });
    shutdownCoordinator.register('notifications', () => engine.drain());
    shutdownCoordinator.register('store', () => db.destroy());

    const onSignal = (signal: NodeJS.Signals): void => {
        lifecycleLogger.info({ signal }, 'Shutdown signal received');
        shutdownCoordinator.shutdown()
            .then((results) => {
                process.exit(results.every(r => r.success) ? 0 : 1);
            })
            .catch((error: unknown) => {
                lifecycleLogger.error({ err: error }, 'Shutdown failed');
                process.exit(1);
            });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
    lifecycleLogger.fatal({ err: error }, 'Server failed to start');
    process.exit(1);
});
