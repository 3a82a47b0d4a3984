/**
 * Debounced Product Filter
 *
 * Coalesces rapid criteria changes (typing in a search box, dragging a range)
 * into one evaluation once the criteria have been quiet for `delayMs`.
 */

import { STOCK_CONFIG } from '../constants.js';
import { applyProductFilters } from './productFilter.js';
import type { ProductFilterCriteria, ProductForFilter } from './productFilter.js';

export interface DebouncedProductFilterOptions<T extends ProductForFilter> {
    /** Read at evaluation time, so the latest collection is always filtered */
    source: () => T[];
    onResult: (items: T[], criteria: ProductFilterCriteria) => void;
    delayMs?: number;
}

export class DebouncedProductFilter<T extends ProductForFilter> {
    private criteria: ProductFilterCriteria = {};
    private timer: ReturnType<typeof setTimeout> | null = null;
    private readonly delayMs: number;

    constructor(private readonly options: DebouncedProductFilterOptions<T>) {
        this.delayMs = options.delayMs ?? STOCK_CONFIG.filterDebounceMs;
    }

    getCriteria(): ProductFilterCriteria {
        return { ...this.criteria };
    }

    isPending(): boolean {
        return this.timer !== null;
    }

    /**
     * Merge a partial change into the current criteria and restart the quiet period.
     * Setting a key to undefined clears that criterion.
     */
    update(change: ProductFilterCriteria): void {
        this.criteria = { ...this.criteria, ...change };
        this.schedule();
    }

    /**
     * Clear every criterion and evaluate immediately.
     */
    reset(): T[] {
        this.criteria = {};
        return this.flush();
    }

    /**
     * Cancel any pending run and evaluate now.
     */
    flush(): T[] {
        this.cancel();
        const criteria = this.getCriteria();
        const items = applyProductFilters(this.options.source(), criteria);
        this.options.onResult(items, criteria);
        return items;
    }

    dispose(): void {
        this.cancel();
    }

    private schedule(): void {
        this.cancel();
        this.timer = setTimeout(() => {
            this.timer = null;
            this.flush();
        }, this.delayMs);
    }

    private cancel(): void {
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
