/**
 * Product Query
 *
 * Read side over the product projection: criteria filtering and the
 * stock summary. Never takes the write lock.
 */

import { sql } from 'kysely';
import {
    ProductFilterQuerySchema,
    STOCK_CONFIG,
    applyProductFilters,
    roundTo2,
    validationErrorFromZod,
} from '@stockledger/shared';
import type { Product, ProductFilterCriteria, StockSummary } from '@stockledger/shared';
import type { UnitOfWork } from '../inventory/unitOfWork.js';

export class ProductQueryService {
    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly lowStockThreshold: number,
    ) {}

    /**
     * Products matching every active criterion, in insertion order.
     */
    async filterProducts(criteria: ProductFilterCriteria = {}): Promise<Product[]> {
        const parsed = ProductFilterQuerySchema.safeParse(criteria);
        if (!parsed.success) throw validationErrorFromZod(parsed.error);

        const products = await this.unitOfWork.read('filterProducts', (db) =>
            db.selectFrom('product').selectAll().orderBy('id').execute(),
        );
        return applyProductFilters(products, parsed.data);
    }

    getStockSummary(): Promise<StockSummary> {
        const top = STOCK_CONFIG.summaryTopCount;

        return this.unitOfWork.read('getStockSummary', async (db) => {
            const totals = await db
                .selectFrom('product')
                .select([
                    sql<number>`cast(count(*) as integer)`.as('totalProducts'),
                    sql<number>`cast(coalesce(sum(${sql.ref('stock')}), 0) as integer)`.as('totalStock'),
                ])
                .executeTakeFirstOrThrow();

            const lowStock = await db
                .selectFrom('product')
                .select(['id', 'name', 'stock'])
                .where('stock', '<=', this.lowStockThreshold)
                .orderBy('stock')
                .orderBy('name')
                .execute();

            const topStockedItems = await db
                .selectFrom('product')
                .select(['id', 'name', 'stock'])
                .orderBy('stock', 'desc')
                .orderBy('name')
                .limit(top)
                .execute();

            const damaged = await db
                .selectFrom('damage')
                .select(sql<number>`cast(coalesce(sum(${sql.ref('quantity')}), 0) as integer)`.as('units'))
                .where('replaced', '=', 0)
                .executeTakeFirstOrThrow();

            const sales = await db
                .selectFrom('sale')
                .select([
                    sql<number>`coalesce(sum(${sql.ref('total')}), 0)`.as('totalSales'),
                    sql<number>`cast(coalesce(sum(${sql.ref('quantity')}), 0) as integer)`.as('totalSalesQuantity'),
                    sql<number>`cast(count(*) as integer)`.as('saleCount'),
                ])
                .executeTakeFirstOrThrow();

            // Products with sales cannot be deleted, so the join never drops a row
            const topSold = await db
                .selectFrom('sale')
                .innerJoin('product', 'product.id', 'sale.productId')
                .select([
                    'sale.productId',
                    'product.name',
                    sql<number>`cast(sum(${sql.ref('sale.quantity')}) as integer)`.as('unitsSold'),
                ])
                .groupBy(['sale.productId', 'product.name'])
                .orderBy('unitsSold', 'desc')
                .orderBy('product.name')
                .limit(top)
                .execute();

            const totalSales = Number(sales.totalSales);
            const saleCount = Number(sales.saleCount);

            return {
                totalProducts: Number(totals.totalProducts),
                totalStock: Number(totals.totalStock),
                lowStockThreshold: this.lowStockThreshold,
                lowStock,
                unreplacedDamagedUnits: Number(damaged.units),
                totalSales: roundTo2(totalSales),
                totalSalesQuantity: Number(sales.totalSalesQuantity),
                averageSale: saleCount === 0 ? 0 : roundTo2(totalSales / saleCount),
                topSoldItems: topSold.map((row) => ({
                    productId: row.productId,
                    name: row.name,
                    quantity: Number(row.unitsSold),
                })),
                topStockedItems,
            };
        });
    }
}
