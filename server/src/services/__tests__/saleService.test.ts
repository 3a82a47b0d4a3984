import { countEntries, listEntries, sumDeltas } from '../inventory/ledgerStore.js';
import type { StockEngine } from '../stockEngine.js';
import { createTestEngine, currentStock, destroyTestEngine, seedProduct } from './testEngine.js';

describe('SaleService', () => {
    let engine: StockEngine;

    beforeEach(async () => {
        engine = await createTestEngine();
    });

    afterEach(async () => {
        await destroyTestEngine(engine);
    });

    it('records a sale and takes its quantity out of stock', async () => {
        const product = await seedProduct(engine);

        const sale = await engine.sales.createSale({
            date: '2024-03-09',
            productName: 'Wireless Mouse',
            quantity: 3,
            unitPrice: 15,
            discount: 10,
        });

        expect(sale).toMatchObject({
            date: '2024-03-09',
            productId: product.id,
            itemName: 'Wireless Mouse',
            quantity: 3,
            unitPrice: 15,
            discount: 10,
            total: 40.5,
        });
        expect(await currentStock(engine, product.id)).toBe(7);
        const [latest] = await listEntries(engine.db, product.id);
        expect(latest).toMatchObject({ delta: -3, reason: 'Sale of 3 units with 10% discount' });
    });

    it('writes neither sale nor entry when stock is short', async () => {
        const product = await seedProduct(engine);

        await expect(
            engine.sales.createSale({ date: '2024-03-09', productName: 'Wireless Mouse', quantity: 11, unitPrice: 15 }),
        ).rejects.toMatchObject({ code: 'INSUFFICIENT_STOCK' });

        expect(await engine.sales.listSales()).toEqual([]);
        expect(await currentStock(engine, product.id)).toBe(10);
    });

    it('reports an unknown product name', async () => {
        await expect(
            engine.sales.createSale({ date: '2024-03-09', productName: 'Nope', quantity: 1, unitPrice: 1 }),
        ).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'Product Nope not found' });
    });

    it('rejects a discount above 100', async () => {
        await seedProduct(engine);

        await expect(
            engine.sales.createSale({ date: '2024-03-09', productName: 'Wireless Mouse', quantity: 1, unitPrice: 1, discount: 120 }),
        ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', message: 'Discount must be between 0 and 100' });
    });

    describe('updateSale', () => {
        it('moves only the quantity difference on the same product', async () => {
            const product = await seedProduct(engine);
            const sale = await engine.sales.createSale({ date: '2024-03-09', productName: 'Wireless Mouse', quantity: 3, unitPrice: 15 });

            const updated = await engine.sales.updateSale(sale.id, {
                date: '2024-03-10',
                productName: 'Wireless Mouse',
                quantity: 5,
                unitPrice: 15,
            });

            expect(updated).toMatchObject({ date: '2024-03-10', quantity: 5, total: 75 });
            expect(await currentStock(engine, product.id)).toBe(5);
            const [latest] = await listEntries(engine.db, product.id);
            expect(latest).toMatchObject({ delta: -2, reason: 'Sale edit (old: 3, new: 5)' });
        });

        it('returns stock to the old product when the product changes', async () => {
            const mouse = await seedProduct(engine);
            const keyboard = await seedProduct(engine, { name: 'Office Keyboard', type: 'Keyboard', stock: 8 });
            const sale = await engine.sales.createSale({ date: '2024-03-09', productName: 'Wireless Mouse', quantity: 3, unitPrice: 15 });

            const updated = await engine.sales.updateSale(sale.id, {
                date: '2024-03-09',
                productName: 'Office Keyboard',
                quantity: 2,
                unitPrice: 20,
            });

            expect(updated).toMatchObject({ productId: keyboard.id, itemName: 'Office Keyboard', quantity: 2, total: 40 });
            expect(await currentStock(engine, mouse.id)).toBe(10);
            expect(await currentStock(engine, keyboard.id)).toBe(6);
            expect(await sumDeltas(engine.db, mouse.id)).toBe(10);
            expect(await sumDeltas(engine.db, keyboard.id)).toBe(6);
        });

        it('rolls back the credit to the old product when the new product is short', async () => {
            const mouse = await seedProduct(engine);
            const keyboard = await seedProduct(engine, { name: 'Office Keyboard', type: 'Keyboard', stock: 1 });
            const sale = await engine.sales.createSale({ date: '2024-03-09', productName: 'Wireless Mouse', quantity: 3, unitPrice: 15 });

            await expect(
                engine.sales.updateSale(sale.id, { date: '2024-03-09', productName: 'Office Keyboard', quantity: 5, unitPrice: 20 }),
            ).rejects.toMatchObject({
                code: 'INSUFFICIENT_STOCK',
                context: { productId: keyboard.id, available: 1, requested: 5 },
            });

            expect(await engine.sales.getSale(sale.id)).toMatchObject({ productId: mouse.id, itemName: 'Wireless Mouse', quantity: 3 });
            expect(await currentStock(engine, mouse.id)).toBe(7);
            expect(await countEntries(engine.db, mouse.id)).toBe(2);
            expect(await sumDeltas(engine.db, mouse.id)).toBe(7);
            expect(await currentStock(engine, keyboard.id)).toBe(1);
            expect(await countEntries(engine.db, keyboard.id)).toBe(1);
        });

        it('leaves the sale unchanged when the new quantity exceeds stock', async () => {
            const product = await seedProduct(engine);
            const sale = await engine.sales.createSale({ date: '2024-03-09', productName: 'Wireless Mouse', quantity: 3, unitPrice: 15 });

            await expect(
                engine.sales.updateSale(sale.id, { date: '2024-03-09', productName: 'Wireless Mouse', quantity: 20, unitPrice: 15 }),
            ).rejects.toMatchObject({ code: 'INSUFFICIENT_STOCK' });

            expect(await engine.sales.getSale(sale.id)).toMatchObject({ quantity: 3 });
            expect(await currentStock(engine, product.id)).toBe(7);
        });
    });

    it('puts the quantity back when a sale is deleted', async () => {
        const product = await seedProduct(engine);
        const sale = await engine.sales.createSale({ date: '2024-03-09', productName: 'Wireless Mouse', quantity: 3, unitPrice: 15 });

        await engine.sales.deleteSale(sale.id);

        expect(await currentStock(engine, product.id)).toBe(10);
        const [latest] = await listEntries(engine.db, product.id);
        expect(latest).toMatchObject({ delta: 3, reason: 'Sale deletion (3 sold)' });
        await expect(engine.sales.getSale(sale.id)).rejects.toMatchObject({ code: 'NOT_FOUND', message: `Sale ${sale.id} not found` });
    });

    it('lists sales by business date, newest first', async () => {
        await seedProduct(engine);
        await engine.sales.createSale({ date: '2024-03-01', productName: 'Wireless Mouse', quantity: 1, unitPrice: 15 });
        await engine.sales.createSale({ date: '2024-03-05', productName: 'Wireless Mouse', quantity: 1, unitPrice: 15 });

        const sales = await engine.sales.listSales();

        expect(sales.map((s) => s.date)).toEqual(['2024-03-05', '2024-03-01']);
    });
});
