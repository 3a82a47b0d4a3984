/**
 * Unit of Work
 *
 * One atomic stock operation: acquire the process write lock, open a
 * transaction, run the body, commit, then fire the after-commit hooks.
 * On any failure the transaction rolls back and no hook runs.
 *
 * Reads go through read(): no lock and no transaction, but the same error
 * mapping, so a store outage surfaces as StorageError on every path.
 */

import type { Kysely, Transaction } from 'kysely';
import type { DB } from '@stockledger/shared/database';
import { StockError, StorageError } from '@stockledger/shared/errors';
import { inventoryLogger } from '../../utils/logger.js';
import type { WriteLock } from '../../utils/writeLock.js';

export interface UnitOfWorkContext {
    trx: Transaction<DB>;
    /** Register work to run only once the transaction has committed */
    afterCommit(hook: () => void): void;
}

/**
 * Normalise anything thrown inside a unit of work into the taxonomy.
 * Unknown errors are storage failures and are logged with their context.
 */
export function toStockError(operation: string, error: unknown): StockError {
    if (error instanceof StockError) return error;

    inventoryLogger.error({ operation, err: error }, 'Storage operation failed');
    return new StorageError(operation, error);
}

export class UnitOfWork {
    constructor(
        private readonly db: Kysely<DB>,
        private readonly lock: WriteLock,
    ) {}

    async run<T>(operation: string, body: (ctx: UnitOfWorkContext) => Promise<T>): Promise<T> {
        return this.lock.run(async () => {
            const hooks: Array<() => void> = [];

            let result: T;
            try {
                result = await this.db.transaction().execute((trx) =>
                    body({
                        trx,
                        afterCommit: (hook) => {
                            hooks.push(hook);
                        },
                    }),
                );
            } catch (error) {
                throw toStockError(operation, error);
            }

            for (const hook of hooks) {
                try {
                    hook();
                } catch (err) {
                    inventoryLogger.error({ operation, err }, 'After-commit hook failed');
                }
            }

            return result;
        });
    }

    async read<T>(operation: string, query: (db: Kysely<DB>) => Promise<T>): Promise<T> {
        try {
            return await query(this.db);
        } catch (error) {
            throw toStockError(operation, error);
        }
    }
}
