/**
 * Tests for drift detection and correction
 */

import { appendEntry, countEntries, listEntries, sumDeltas } from '../inventory/ledgerStore.js';
import type { StockEngine } from '../stockEngine.js';
import { createTestEngine, destroyTestEngine, seedProduct } from './testEngine.js';

describe('ReconciliationService', () => {
    let engine: StockEngine;

    beforeEach(async () => {
        engine = await createTestEngine();
    });

    afterEach(async () => {
        await destroyTestEngine(engine);
    });

    it('changes nothing when every product agrees with its ledger', async () => {
        const product = await seedProduct(engine);
        await engine.mutateStock(product.id, -4, 'Pick');

        expect(await engine.reconcile()).toEqual([]);
        expect(await countEntries(engine.db, product.id)).toBe(2);
    });

    it('writes one corrective entry for stock set outside the ledger, then nothing', async () => {
        const product = await seedProduct(engine);
        await engine.db.updateTable('product').set({ stock: 50 }).where('id', '=', product.id).execute();

        const first = await engine.reconcile();

        expect(first).toEqual([
            { productId: product.id, productName: 'Wireless Mouse', oldQty: 10, newQty: 50, delta: 40 },
        ]);
        const entries = await listEntries(engine.db, product.id);
        expect(entries).toHaveLength(2);
        expect(entries[0]).toMatchObject({ delta: 40, reason: 'Stock reconciliation' });
        expect(await sumDeltas(engine.db, product.id)).toBe(50);

        expect(await engine.reconcile()).toEqual([]);
        expect(await countEntries(engine.db, product.id)).toBe(2);
    });

    it('corrects downward drift with a negative entry', async () => {
        const product = await seedProduct(engine);
        await appendEntry(engine.db, {
            productId: product.id,
            delta: 3,
            reason: 'Stray entry',
            at: '2024-01-01T00:00:00.000Z',
        });

        const corrections = await engine.reconcile();

        expect(corrections).toEqual([
            { productId: product.id, productName: 'Wireless Mouse', oldQty: 13, newQty: 10, delta: -3 },
        ]);
        expect(await sumDeltas(engine.db, product.id)).toBe(10);
    });

    it('leaves the cached quantity untouched', async () => {
        const product = await seedProduct(engine);
        await engine.db.updateTable('product').set({ stock: 4 }).where('id', '=', product.id).execute();

        await engine.reconcile();

        const after = await engine.products.getProduct(product.id);
        expect(after.stock).toBe(4);
    });

    it('only reports the products that drifted', async () => {
        const steady = await seedProduct(engine, { name: 'Office Keyboard', type: 'Keyboard' });
        const drifted = await seedProduct(engine, { name: 'USB Hub 4-Port', type: 'USB Hub', stock: 0 });
        await engine.db.updateTable('product').set({ stock: 6 }).where('id', '=', drifted.id).execute();

        const corrections = await engine.reconcile();

        expect(corrections.map((c) => c.productId)).toEqual([drifted.id]);
        expect(await countEntries(engine.db, steady.id)).toBe(1);
    });

    it('skips a product whose check fails and still corrects the rest', async () => {
        const failing = await seedProduct(engine, { name: 'Office Keyboard', type: 'Keyboard' });
        const healthy = await seedProduct(engine, { name: 'USB Hub 4-Port', type: 'USB Hub', stock: 2 });
        await engine.db.updateTable('product').set({ stock: 9 }).where('id', 'in', [failing.id, healthy.id]).execute();

        const checkProduct = engine.reconciliation.reconcileProduct.bind(engine.reconciliation);
        const spy = vi.spyOn(engine.reconciliation, 'reconcileProduct').mockImplementation((ctx, productId) =>
            productId === failing.id ? Promise.reject(new Error('disk I/O error')) : checkProduct(ctx, productId),
        );

        const corrections = await engine.reconcile();

        expect(corrections).toEqual([
            { productId: healthy.id, productName: 'USB Hub 4-Port', oldQty: 2, newQty: 9, delta: 7 },
        ]);
        expect(await countEntries(engine.db, failing.id)).toBe(1);

        spy.mockRestore();
        const retried = await engine.reconcile();
        expect(retried).toEqual([
            { productId: failing.id, productName: 'Office Keyboard', oldQty: 10, newQty: 9, delta: -1 },
        ]);
    });
});

describe('ledgerStore', () => {
    let engine: StockEngine;

    beforeEach(async () => {
        engine = await createTestEngine();
    });

    afterEach(async () => {
        await destroyTestEngine(engine);
    });

    it('sums to zero for a product without entries', async () => {
        const product = await seedProduct(engine, { stock: 0 });
        expect(await sumDeltas(engine.db, product.id)).toBe(0);
        expect(await listEntries(engine.db, product.id)).toEqual([]);
    });

    it('lists entries newest first', async () => {
        const product = await seedProduct(engine, { stock: 0 });
        await appendEntry(engine.db, { productId: product.id, delta: 5, reason: 'First', at: '2024-01-01T00:00:00.000Z' });
        await appendEntry(engine.db, { productId: product.id, delta: -2, reason: 'Second', at: '2024-01-02T00:00:00.000Z' });

        const entries = await listEntries(engine.db, product.id);

        expect(entries.map((e) => e.reason)).toEqual(['Second', 'First']);
        expect(await sumDeltas(engine.db, product.id)).toBe(3);
    });
});
