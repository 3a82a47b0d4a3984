/**
 * Database table types for Kysely
 *
 * Column names are camelCase and quoted by Kysely, so they match the
 * PostgreSQL schema on both the server and embedded stores. Timestamps are ISO-8601 text; booleans are 0/1 integers.
 */

import type { Generated, Insertable, Selectable } from 'kysely';

export interface ProductTable {
    id: Generated<number>;
    name: string;
    type: string;
    buyPrice: number;
    sellPrice: number;
    stock: number;
    lastUpdated: string;
    createdAt: string;
}

export interface StockLedgerTable {
    id: Generated<number>;
    productId: number;
    delta: number;
    reason: string;
    createdAt: string;
}

export interface SaleTable {
    id: Generated<number>;
    date: string;
    productId: number;
    itemName: string;
    quantity: number;
    unitPrice: number;
    discount: number;
    total: number;
    createdAt: string;
}

export interface DamageTable {
    id: Generated<number>;
    date: string;
    productId: number;
    productName: string;
    quantity: number;
    replaced: Generated<number>;
    createdAt: string;
}

export interface InvoiceTable {
    id: Generated<number>;
    invoiceNumber: string;
    date: string;
    customerName: string;
    subtotal: number;
    tax: number;
    grandTotal: number;
    saleId: number | null;
    createdAt: string;
}

export interface InvoiceItemTable {
    id: Generated<number>;
    invoiceId: number;
    productId: number;
    productName: string;
    quantity: number;
    unitPrice: number;
    discount: number;
    total: number;
}

export interface DB {
    product: ProductTable;
    stock_ledger: StockLedgerTable;
    sale: SaleTable;
    damage: DamageTable;
    invoice: InvoiceTable;
    invoice_item: InvoiceItemTable;
}

export type NewProductRow = Insertable<ProductTable>;
export type DamageRow = Selectable<DamageTable>;
