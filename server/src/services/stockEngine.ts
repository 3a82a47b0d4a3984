/**
 * Stock Engine
 *
 * Composition root: wires one store to one write lock, one notifier and the
 * coordinators that share them. Everything is per instance, so tests can run
 * many engines side by side.
 */

import type { Kysely } from 'kysely';
import type { DB } from '@stockledger/shared/database';
import { STOCK_CONFIG } from '@stockledger/shared';
import type { DriftCorrection, Product, ProductFilterCriteria, StockResult } from '@stockledger/shared';
import { WriteLock } from '../utils/writeLock.js';
import { DeferredExecutor } from './deferredExecutor.js';
import { LowStockNotifier } from './inventory/lowStockNotifier.js';
import type { LowStockListener } from './inventory/lowStockNotifier.js';
import { ReconciliationService } from './inventory/reconciliation.js';
import { StockMutationService } from './inventory/stockMutationService.js';
import { UnitOfWork } from './inventory/unitOfWork.js';
import { DamageService } from './damages/damageService.js';
import { InvoiceService } from './invoices/invoiceService.js';
import { ProductImportService } from './products/productImport.js';
import { ProductQueryService } from './products/productQuery.js';
import { ProductService } from './products/productService.js';
import { SaleService } from './sales/saleService.js';

export interface StockEngineOptions {
    db: Kysely<DB>;
    lowStockThreshold?: number;
    vatRate?: number;
}

export interface StockEngine {
    readonly db: Kysely<DB>;
    readonly lowStockThreshold: number;
    readonly mutations: StockMutationService;
    readonly reconciliation: ReconciliationService;
    readonly products: ProductService;
    readonly importer: ProductImportService;
    readonly query: ProductQueryService;
    readonly sales: SaleService;
    readonly damages: DamageService;
    readonly invoices: InvoiceService;

    mutateStock(productId: number, delta: number, reason: string): Promise<StockResult<number>>;
    reconcile(): Promise<DriftCorrection[]>;
    filterProducts(criteria?: ProductFilterCriteria): Promise<Product[]>;
    subscribeLowStock(listener: LowStockListener): () => void;
    /** Resolves once every queued notification has been delivered */
    drain(): Promise<void>;
}

export function createStockEngine(options: StockEngineOptions): StockEngine {
    const { db } = options;
    const lowStockThreshold = options.lowStockThreshold ?? STOCK_CONFIG.lowStockThreshold;
    const vatRate = options.vatRate ?? STOCK_CONFIG.vatRate;

    const executor = new DeferredExecutor();
    const notifier = new LowStockNotifier(executor);
    const unitOfWork = new UnitOfWork(db, new WriteLock());
    const mutations = new StockMutationService(unitOfWork, notifier, lowStockThreshold);
    const reconciliation = new ReconciliationService(unitOfWork);
    const query = new ProductQueryService(unitOfWork, lowStockThreshold);

    return {
        db,
        lowStockThreshold,
        mutations,
        reconciliation,
        products: new ProductService(unitOfWork, mutations),
        importer: new ProductImportService(unitOfWork, mutations),
        query,
        sales: new SaleService(unitOfWork, mutations),
        damages: new DamageService(unitOfWork, mutations),
        invoices: new InvoiceService(unitOfWork, mutations, vatRate),

        mutateStock: (productId, delta, reason) => mutations.mutateStock(productId, delta, reason),
        reconcile: () => reconciliation.reconcile(),
        filterProducts: (criteria = {}) => query.filterProducts(criteria),
        subscribeLowStock: (listener) => notifier.subscribe(listener),
        drain: () => executor.drain(),
    };
}
