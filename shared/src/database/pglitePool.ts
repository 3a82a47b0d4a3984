/**
 * Embedded PostgreSQL pool
 *
 * Adapts a PGlite instance to the pool shape Kysely's PostgresDialect drives.
 * PGlite is a single connection, so the pool hands out one client at a time
 * and queues the rest until it is released.
 */

import type { PGlite } from '@electric-sql/pglite';
import type { PostgresCursor, PostgresPool, PostgresPoolClient, PostgresQueryResult } from 'kysely';

type QueryCommand = PostgresQueryResult<unknown>['command'];

function commandOf(sqlText: string): QueryCommand {
    const keyword = /^\s*(\w+)/.exec(sqlText)?.[1]?.toUpperCase();
    switch (keyword) {
        case 'INSERT':
            return 'INSERT';
        case 'UPDATE':
            return 'UPDATE';
        case 'DELETE':
            return 'DELETE';
        default:
            return 'SELECT';
    }
}

class PGliteClient implements PostgresPoolClient {
    constructor(
        private readonly pglite: PGlite,
        private readonly onRelease: () => void,
    ) {}

    query<R>(sql: string, parameters: ReadonlyArray<unknown>): Promise<PostgresQueryResult<R>>;
    query<R>(cursor: PostgresCursor<R>): PostgresCursor<R>;
    query<R>(
        sqlOrCursor: string | PostgresCursor<R>,
        parameters: ReadonlyArray<unknown> = [],
    ): Promise<PostgresQueryResult<R>> | PostgresCursor<R> {
        if (typeof sqlOrCursor !== 'string') {
            throw new Error('Streaming cursors are not supported by the embedded store');
        }
        return this.run<R>(sqlOrCursor, parameters);
    }

    release(): void {
        this.onRelease();
    }

    private async run<R>(sqlText: string, parameters: ReadonlyArray<unknown>): Promise<PostgresQueryResult<R>> {
        const result = await this.pglite.query<R>(sqlText, [...parameters]);
        return {
            command: commandOf(sqlText),
            rowCount: result.affectedRows ?? result.rows.length,
            rows: result.rows,
        };
    }
}

export class PGlitePool implements PostgresPool {
    private readonly client: PGliteClient;
    private busy = false;
    private readonly waiters: Array<(client: PostgresPoolClient) => void> = [];

    constructor(private readonly pglite: PGlite) {
        this.client = new PGliteClient(pglite, () => this.release());
    }

    connect(): Promise<PostgresPoolClient> {
        if (!this.busy) {
            this.busy = true;
            return Promise.resolve(this.client);
        }
        return new Promise((resolve) => this.waiters.push(resolve));
    }

    async end(): Promise<void> {
        await this.pglite.close();
    }

    private release(): void {
        const next = this.waiters.shift();
        if (next) {
            next(this.client);
        } else {
            this.busy = false;
        }
    }
}
