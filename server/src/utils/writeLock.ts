/**
 * Write Lock
 *
 * Serialises every stock-mutating unit of work in this process so the
 * read-check-write sequence on a product's quantity cannot interleave.
 *
 * Single-process only: the engine owns its store exclusively.
 * Not re-entrant: code already holding the lock must not call run() again.
 */

export class WriteLock {
    private tail: Promise<void> = Promise.resolve();
    private waiting = 0;

    /**
     * Run `fn` once every earlier holder has finished.
     * The lock is released whether `fn` resolves or rejects.
     */
    async run<T>(fn: () => Promise<T>): Promise<T> {
        const previous = this.tail;
        let release: () => void = () => undefined;
        const current = new Promise<void>((resolve) => {
            release = resolve;
        });
        this.tail = previous.then(() => current);
        this.waiting++;

        try {
            await previous;
            return await fn();
        } finally {
            this.waiting--;
            release();
        }
    }

    /** Holders plus queued callers */
    get queueLength(): number {
        return this.waiting;
    }
}
