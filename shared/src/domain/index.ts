/**
 * Domain layer: pure business logic with no DB access.
 */

export * from './constants.js';
export * from './pricing.js';
export * from './products/productFilter.js';
export * from './products/debouncedProductFilter.js';
