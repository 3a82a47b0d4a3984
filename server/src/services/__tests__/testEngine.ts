/**
 * Test helpers: an engine over a private in-memory PGlite store.
 */

import { migrateToLatest, openKysely } from '@stockledger/shared/database';
import type { CreateProductInput, Product } from '@stockledger/shared';
import { createStockEngine } from '../stockEngine.js';
import type { StockEngine, StockEngineOptions } from '../stockEngine.js';

export async function createTestEngine(options: Omit<StockEngineOptions, 'db'> = {}): Promise<StockEngine> {
    const db = openKysely({ connectionString: ':memory:' });
    await migrateToLatest(db);
    return createStockEngine({ db, ...options });
}

export async function destroyTestEngine(engine: StockEngine): Promise<void> {
    await engine.drain();
    await engine.db.destroy();
}

export function seedProduct(engine: StockEngine, overrides: Partial<CreateProductInput> = {}): Promise<Product> {
    return engine.products.createProduct({
        name: 'Wireless Mouse',
        type: 'Mouse',
        buyPrice: 8,
        sellPrice: 15,
        stock: 10,
        ...overrides,
    });
}

export async function currentStock(engine: StockEngine, productId: number): Promise<number> {
    const product = await engine.products.getProduct(productId);
    return product.stock;
}
