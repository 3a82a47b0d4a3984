/**
 * Kysely Factory
 *
 * Opens Kysely instances for the stock store. Both stores speak PostgreSQL:
 * a postgres:// URL connects to a server, anything else is an embedded
 * PGlite data directory (":memory:" for a throwaway in-process database).
 */

import { PGlite } from '@electric-sql/pglite';
import { CompiledQuery, Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import { PGlitePool } from './pglitePool.js';
import type { DB } from './types.js';

export type StoreKind = 'server' | 'embedded';

export interface KyselyOptions {
    /** postgres:// URL or embedded data directory; defaults to DATABASE_URL */
    connectionString?: string;
    /** Upper bound for connection waits and statements, in ms */
    storageTimeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_DATA_DIR = './stockledger-data';

export function detectStoreKind(connectionString: string): StoreKind {
    return /^postgres(ql)?:\/\//i.test(connectionString) ? 'server' : 'embedded';
}

function openEmbedded(location: string): PGlite {
    if (location === ':memory:' || location.startsWith('memory://')) {
        return new PGlite();
    }
    return new PGlite(location);
}

/**
 * Open a new, unshared Kysely instance.
 * Tests use this with ":memory:" to get an isolated store per case.
 */
export function openKysely(options: KyselyOptions = {}): Kysely<DB> {
    const connectionString = options.connectionString || process.env.DATABASE_URL || DEFAULT_DATA_DIR;
    const timeout = options.storageTimeoutMs ?? DEFAULT_TIMEOUT_MS;

    if (detectStoreKind(connectionString) === 'server') {
        const pool = new pg.Pool({
            connectionString,
            max: 10,
            connectionTimeoutMillis: timeout,
            statement_timeout: timeout,
        });
        return new Kysely<DB>({ dialect: new PostgresDialect({ pool }) });
    }

    const pool = new PGlitePool(openEmbedded(connectionString));
    return new Kysely<DB>({
        dialect: new PostgresDialect({
            pool,
            onCreateConnection: async (connection) => {
                await connection.executeQuery(CompiledQuery.raw(`set statement_timeout = ${Math.trunc(timeout)}`));
            },
        }),
    });
}
