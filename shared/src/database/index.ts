/**
 * Shared Database Module
 *
 * Kysely factory, table types and schema migrations for the stock store.
 */

// Kysely factory and instance management
export { openKysely, detectStoreKind } from './createKysely.js';
export type { KyselyOptions, StoreKind } from './createKysely.js';

// Migrations
export { migrateToLatest } from './migrations.js';

// Database types
export type * from './types.js';
