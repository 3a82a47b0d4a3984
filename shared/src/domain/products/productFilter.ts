/**
 * Product Filter Engine
 *
 * Pure predicate over the product projection. No DB or Node-only deps.
 * All active criteria combine with AND; an absent criterion never excludes.
 */

import { ALL_CATEGORIES_SENTINELS, typeMatchesCategory } from '../../config/productTaxonomy.js';
import { parseDateBound } from '../../utils/dateHelpers.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Minimal product shape the predicate reads */
export interface ProductForFilter {
    name: string;
    type: string;
    buyPrice: number;
    sellPrice: number;
    stock: number;
    lastUpdated: string;
}

export interface ProductFilterCriteria {
    /** Case-insensitive substring, or a case-insensitive regular expression */
    name?: string;
    /** Leaf type or group name; "All" / "All Types" disables */
    category?: string;
    buyPriceMin?: number;
    buyPriceMax?: number;
    sellPriceMin?: number;
    sellPriceMax?: number;
    stockMin?: number;
    stockMax?: number;
    /** Inclusive lower bound on lastUpdated: YYYY-MM-DD (local midnight) or an ISO timestamp */
    updatedAfter?: string;
}

/** Criteria normalised once per evaluation pass */
export interface CompiledProductFilter {
    needle: string | null;
    pattern: RegExp | null;
    category: string | null;
    buyPriceMin: number | null;
    buyPriceMax: number | null;
    sellPriceMin: number | null;
    sellPriceMax: number | null;
    stockMin: number | null;
    stockMax: number | null;
    /** Epoch milliseconds */
    updatedAfter: number | null;
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

function compilePattern(source: string): RegExp | null {
    try {
        return new RegExp(source, 'i');
    } catch {
        // Invalid pattern: substring matching still applies
        return null;
    }
}

function bound(value: number | undefined): number | null {
    return value === undefined || Number.isNaN(value) ? null : value;
}

function isAllCategories(category: string): boolean {
    return ALL_CATEGORIES_SENTINELS.includes(category);
}

export function compileProductFilter(criteria: ProductFilterCriteria): CompiledProductFilter {
    const name = criteria.name?.trim() ?? '';
    const category = criteria.category?.trim() ?? '';
    const updatedAfter = criteria.updatedAfter?.trim() ?? '';

    return {
        needle: name ? name.toLowerCase() : null,
        pattern: name ? compilePattern(name) : null,
        category: category && !isAllCategories(category) ? category : null,
        buyPriceMin: bound(criteria.buyPriceMin),
        buyPriceMax: bound(criteria.buyPriceMax),
        sellPriceMin: bound(criteria.sellPriceMin),
        sellPriceMax: bound(criteria.sellPriceMax),
        stockMin: bound(criteria.stockMin),
        stockMax: bound(criteria.stockMax),
        updatedAfter: updatedAfter ? (parseDateBound(updatedAfter)?.getTime() ?? null) : null,
    };
}

/**
 * True when no criterion is active, i.e. every product passes.
 */
export function isEmptyFilter(filter: CompiledProductFilter): boolean {
    return Object.values(filter).every((value) => value === null);
}

// ---------------------------------------------------------------------------
// Predicate
// ---------------------------------------------------------------------------

function inRange(value: number, min: number | null, max: number | null): boolean {
    if (min !== null && value < min) return false;
    if (max !== null && value > max) return false;
    return true;
}

/**
 * Returns true if the product passes all active filters.
 */
export function productFilterPredicate(product: ProductForFilter, filter: CompiledProductFilter): boolean {
    if (filter.needle !== null) {
        const name = product.name.toLowerCase();
        const matches = name.includes(filter.needle) || (filter.pattern !== null && filter.pattern.test(name));
        if (!matches) return false;
    }

    if (filter.category !== null && !typeMatchesCategory(product.type, filter.category)) return false;

    if (!inRange(product.buyPrice, filter.buyPriceMin, filter.buyPriceMax)) return false;
    if (!inRange(product.sellPrice, filter.sellPriceMin, filter.sellPriceMax)) return false;
    if (!inRange(product.stock, filter.stockMin, filter.stockMax)) return false;

    if (filter.updatedAfter !== null && !(Date.parse(product.lastUpdated) >= filter.updatedAfter)) return false;

    return true;
}

/**
 * One-off evaluation of raw criteria against a single product.
 */
export function evaluateProductFilter(product: ProductForFilter, criteria: ProductFilterCriteria): boolean {
    return productFilterPredicate(product, compileProductFilter(criteria));
}

/**
 * Filter a collection, preserving its order.
 */
export function applyProductFilters<T extends ProductForFilter>(items: T[], criteria: ProductFilterCriteria): T[] {
    const filter = compileProductFilter(criteria);
    if (isEmptyFilter(filter)) return [...items];
    return items.filter((item) => productFilterPredicate(item, filter));
}
