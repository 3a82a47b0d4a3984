/**
 * Shared Zod schemas for the stock ledger
 *
 * Input schemas shared between the engine, the HTTP surface and the CLI.
 */

// Re-export common schemas (base schemas without circular dependencies)
export * from './common.js';

// Re-export domain schemas
export * from './products.js';
export * from './stock.js';
export * from './sales.js';
export * from './damages.js';
export * from './invoices.js';
