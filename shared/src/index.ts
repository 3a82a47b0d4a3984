/**
 * @stockledger/shared - Shared types, schemas and domain logic
 *
 * Entity types, Zod input schemas, the error taxonomy, the product taxonomy
 * and pure domain functions used by the server and the CLI.
 * Database access lives behind the ./database subpath.
 */

// Entity types
export type * from './types/index.js';

// Zod schemas + inferred input types
export * from './schemas/index.js';

// Error taxonomy and result helpers
export * from './errors/index.js';

// Pure domain logic
export * from './domain/index.js';

// Product taxonomy
export * from './config/productTaxonomy.js';

// Utils (pure functions, no DB dependencies)
export * from './utils/index.js';
