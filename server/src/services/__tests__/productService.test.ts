/**
 * Tests for manual product maintenance and bulk import
 */

import { StorageError } from '@stockledger/shared';
import { countEntries, listEntries } from '../inventory/ledgerStore.js';
import type { StockEngine } from '../stockEngine.js';
import { createTestEngine, currentStock, destroyTestEngine, seedProduct } from './testEngine.js';

describe('ProductService', () => {
    let engine: StockEngine;

    beforeEach(async () => {
        engine = await createTestEngine();
    });

    afterEach(async () => {
        await destroyTestEngine(engine);
    });

    describe('createProduct', () => {
        it('credits the opening stock as a ledger entry', async () => {
            const product = await seedProduct(engine);

            expect(product).toMatchObject({ name: 'Wireless Mouse', type: 'Mouse', buyPrice: 8, sellPrice: 15, stock: 10 });
            const entries = await listEntries(engine.db, product.id);
            expect(entries.map((e) => [e.delta, e.reason])).toEqual([[10, 'Initial stock']]);
        });

        it('writes no entry for a product created without stock', async () => {
            const product = await seedProduct(engine, { stock: undefined });

            expect(product.stock).toBe(0);
            expect(await countEntries(engine.db, product.id)).toBe(0);
        });

        it('rejects a duplicate name', async () => {
            await seedProduct(engine);

            await expect(seedProduct(engine)).rejects.toMatchObject({
                code: 'DUPLICATE',
                message: 'Product "Wireless Mouse" already exists',
            });
        });

        it('rejects a type outside the taxonomy', async () => {
            await expect(seedProduct(engine, { type: 'Toaster' })).rejects.toMatchObject({
                code: 'VALIDATION_ERROR',
                message: 'Unknown product type "Toaster"',
            });
        });
    });

    describe('updateProduct', () => {
        it('writes a stock change as a delta', async () => {
            const product = await seedProduct(engine);

            const updated = await engine.products.updateProduct(product.id, { stock: 4, sellPrice: 18 });

            expect(updated).toMatchObject({ stock: 4, sellPrice: 18 });
            const entries = await listEntries(engine.db, product.id);
            expect(entries.map((e) => [e.delta, e.reason])).toEqual([
                [-6, 'Stock updated'],
                [10, 'Initial stock'],
            ]);
        });

        it('writes no entry when stock is unchanged', async () => {
            const product = await seedProduct(engine);

            await engine.products.updateProduct(product.id, { name: 'Wireless Mouse', stock: 10 });

            expect(await countEntries(engine.db, product.id)).toBe(1);
        });

        it('rejects renaming onto another product', async () => {
            await seedProduct(engine);
            const keyboard = await seedProduct(engine, { name: 'Office Keyboard', type: 'Keyboard' });

            await expect(engine.products.updateProduct(keyboard.id, { name: 'Wireless Mouse' })).rejects.toMatchObject({
                code: 'DUPLICATE',
            });
        });

        it('reports an unknown product', async () => {
            await expect(engine.products.updateProduct(404, { sellPrice: 1 })).rejects.toMatchObject({
                code: 'NOT_FOUND',
                message: 'Product 404 not found',
            });
        });
    });

    describe('deleteProduct', () => {
        it('removes the product and its ledger', async () => {
            const product = await seedProduct(engine);

            await engine.products.deleteProduct(product.id);

            await expect(engine.products.getProduct(product.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
            expect(await countEntries(engine.db, product.id)).toBe(0);
        });

        it('refuses while a sale references the product', async () => {
            const product = await seedProduct(engine);
            await engine.sales.createSale({ date: '2024-03-09', productName: 'Wireless Mouse', quantity: 1, unitPrice: 15 });

            await expect(engine.products.deleteProduct(product.id)).rejects.toMatchObject({
                code: 'PRODUCT_IN_USE',
                message: 'Product "Wireless Mouse" is referenced by 1 record(s) and cannot be deleted',
            });
            expect(await currentStock(engine, product.id)).toBe(9);
        });
    });

    it('lists product names alphabetically', async () => {
        const mouse = await seedProduct(engine);
        const speaker = await seedProduct(engine, { name: 'Bluetooth Speaker Mini', type: 'Bluetooth Speaker' });

        expect(await engine.products.listProductNames()).toEqual([
            { id: speaker.id, name: 'Bluetooth Speaker Mini' },
            { id: mouse.id, name: 'Wireless Mouse' },
        ]);
    });

    it('returns the stock history with the product', async () => {
        const product = await seedProduct(engine);
        await engine.mutateStock(product.id, 2, 'Delivery');

        const history = await engine.products.getStockHistory(product.id);

        expect(history.product.stock).toBe(12);
        expect(history.entries.map((e) => e.reason)).toEqual(['Delivery', 'Initial stock']);
    });
});

describe('filterProducts', () => {
    let engine: StockEngine;

    beforeEach(async () => {
        engine = await createTestEngine();
    });

    afterEach(async () => {
        await destroyTestEngine(engine);
    });

    it('returns only the stocked charger for category Chargers with stockMin 1', async () => {
        await seedProduct(engine, { name: 'Car Charger Dual', type: 'Car Charger', stock: 0 });
        const stocked = await seedProduct(engine, { name: 'GaN Charger 65W', type: 'GaN Charger', stock: 5 });
        await seedProduct(engine, { name: 'Wireless Mouse', type: 'Mouse', stock: 9 });

        const result = await engine.filterProducts({ category: 'Chargers', stockMin: 1 });

        expect(result.map((p) => p.id)).toEqual([stocked.id]);
    });

    it('returns every product in insertion order without criteria', async () => {
        const first = await seedProduct(engine, { name: 'Wireless Mouse' });
        const second = await seedProduct(engine, { name: 'Office Keyboard', type: 'Keyboard' });

        const result = await engine.filterProducts();

        expect(result.map((p) => p.id)).toEqual([first.id, second.id]);
    });
    it('reads a bare updatedAfter date as local midnight', async () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        try {
            vi.setSystemTime(new Date(2024, 2, 9, 23, 45));
            await seedProduct(engine, { name: 'Office Keyboard', type: 'Keyboard' });
            vi.setSystemTime(new Date(2024, 2, 10, 0, 30));
            const early = await seedProduct(engine);

            const result = await engine.filterProducts({ updatedAfter: '2024-03-10' });

            expect(result.map((p) => p.id)).toEqual([early.id]);
        } finally {
            vi.useRealTimers();
        }
    });

    it('rejects an updatedAfter that is not a date', async () => {
        await seedProduct(engine);

        await expect(engine.filterProducts({ updatedAfter: 'yesterday' })).rejects.toMatchObject({
            code: 'VALIDATION_ERROR',
            details: [{ path: 'updatedAfter', message: 'Updated-after must be a date (YYYY-MM-DD) or an ISO-8601 timestamp' }],
        });
    });

    it('reports a store failure on the read path as a storage error', async () => {
        await seedProduct(engine);
        await engine.db.destroy();

        const failure = engine.filterProducts();

        await expect(failure).rejects.toBeInstanceOf(StorageError);
        await expect(failure).rejects.toMatchObject({ code: 'STORAGE_ERROR', context: { operation: 'filterProducts' } });
    });
});

describe('ProductImportService', () => {
    let engine: StockEngine;

    beforeEach(async () => {
        engine = await createTestEngine();
    });

    afterEach(async () => {
        await destroyTestEngine(engine);
    });

    it('creates new products and credits existing ones', async () => {
        const mouse = await seedProduct(engine);

        const summary = await engine.importer.importProducts({
            rows: [
                { name: 'Wireless Mouse', type: 'Mouse', buyPrice: 9, sellPrice: 16, quantity: 5 },
                { name: 'GaN Charger 65W', type: 'GaN Charger', buyPrice: 20, sellPrice: 35, quantity: 4 },
            ],
        });

        expect(summary).toEqual({ created: 1, updated: 1, unitsAdded: 9 });

        const updatedMouse = await engine.products.getProduct(mouse.id);
        expect(updatedMouse).toMatchObject({ stock: 15, buyPrice: 9, sellPrice: 16 });

        const [charger] = await engine.filterProducts({ name: 'GaN Charger 65W' });
        expect(charger?.stock).toBe(4);
        const entries = await listEntries(engine.db, charger?.id ?? 0);
        expect(entries.map((e) => [e.delta, e.reason])).toEqual([[4, 'Imported stock']]);
    });

    it('rejects the whole file when any row is invalid', async () => {
        const mouse = await seedProduct(engine);

        await expect(
            engine.importer.importProducts({
                rows: [
                    { name: 'Wireless Mouse', type: 'Mouse', buyPrice: 9, sellPrice: 16, quantity: 5 },
                    { name: 'Broken Row', type: 'Mouse', buyPrice: 1, sellPrice: 2, quantity: -1 },
                ],
            }),
        ).rejects.toMatchObject({
            code: 'VALIDATION_ERROR',
            message: 'Import rejected at row 2.quantity: Stock cannot be negative',
        });

        expect(await currentStock(engine, mouse.id)).toBe(10);
        expect(await engine.filterProducts()).toHaveLength(1);
    });

    it('rejects an empty file', async () => {
        await expect(engine.importer.importProducts({ rows: [] })).rejects.toMatchObject({
            message: 'Import file contains no rows',
        });
    });

    it('creates a product without a ledger entry for a zero quantity', async () => {
        const summary = await engine.importer.importProducts({
            rows: [{ name: 'Office Keyboard', type: 'Keyboard', buyPrice: 10, sellPrice: 18, quantity: 0 }],
        });

        expect(summary).toEqual({ created: 1, updated: 0, unitsAdded: 0 });
        const [keyboard] = await engine.filterProducts();
        expect(await countEntries(engine.db, keyboard?.id ?? 0)).toBe(0);
    });
});
