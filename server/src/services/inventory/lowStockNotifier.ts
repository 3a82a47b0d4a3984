/**
 * Low-Stock Notifier
 *
 * Observer set owned by one engine instance. Events are published only after
 * the mutation that caused them has committed, and each listener runs on the
 * deferred executor so a slow or failing listener never touches the mutation.
 */

import type { LowStockEvent } from '@stockledger/shared';
import type { DeferredExecutor } from '../deferredExecutor.js';
import { inventoryLogger } from '../../utils/logger.js';

export type LowStockListener = (productId: number, name: string, quantity: number) => void | Promise<void>;

export class LowStockNotifier {
    private listeners = new Set<LowStockListener>();

    constructor(private readonly executor: DeferredExecutor) {}

    /**
     * @returns unsubscribe function; calling it twice is harmless
     */
    subscribe(listener: LowStockListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    publish(event: LowStockEvent): void {
        inventoryLogger.info({ ...event }, 'Low stock');

        for (const listener of [...this.listeners]) {
            this.executor.enqueue(
                () => listener(event.productId, event.name, event.quantity),
                { productId: event.productId, action: 'low_stock' },
            );
        }
    }
}
