/**
 * Deferred Executor Service
 *
 * Runs low-stock listener callbacks after the unit of work that triggered
 * them has committed. SSE clients receive events as one such listener.
 *
 * Tasks are executed via setImmediate, in enqueue order.
 * Errors are logged and never reach the mutation that queued the task.
 *
 * Usage:
 * ```typescript
 * const executor = new DeferredExecutor();
 *
 * executor.enqueue(() => listener(productId, name, quantity), { productId, action: 'low_stock' });
 * ```
 */

import { inventoryLogger } from '../utils/logger.js';

type DeferredTask = () => Promise<void> | void;

/**
 * Optional metadata for task identification in error logs
 */
export interface TaskMetadata {
    productId?: number;
    action?: string;
}

interface QueuedTask {
    task: DeferredTask;
    metadata?: TaskMetadata;
}

export class DeferredExecutor {
    private queue: QueuedTask[] = [];
    private processing = false;
    private idleWaiters: Array<() => void> = [];

    /**
     * Add a task to the deferred execution queue
     * Task will run after current synchronous code completes
     */
    enqueue(task: DeferredTask, metadata?: TaskMetadata): void {
        this.queue.push({ task, metadata });

        // Start processing if not already running
        if (!this.processing) {
            setImmediate(() => {
                void this.process();
            });
        }
    }

    /**
     * Resolves once the queue is empty and nothing is running.
     */
    drain(): Promise<void> {
        if (!this.processing && this.queue.length === 0) return Promise.resolve();
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    /**
     * Process queued tasks
     * Runs each task in order, catching errors to prevent cascade failures
     */
    private async process(): Promise<void> {
        if (this.processing) return;
        this.processing = true;

        while (this.queue.length > 0) {
            const queuedTask = this.queue.shift();
            if (!queuedTask) continue;

            const { task, metadata } = queuedTask;

            try {
                await task();
            } catch (err) {
                inventoryLogger.error({ ...metadata, err }, 'Deferred task failed');
            }
        }

        this.processing = false;

        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }
}
