/**
 * Invoice Service
 *
 * Single-line invoices with VAT. An invoice raised from stock takes its
 * quantity out of stock; an invoice raised against an earlier sale only
 * documents that sale and never moves stock.
 */

import type { Kysely } from 'kysely';
import type { DB } from '@stockledger/shared/database';
import {
    ConflictError,
    InvoiceInputSchema,
    LEDGER_REASONS,
    NotFoundError,
    STOCK_ERROR_CODES,
    SaleMismatchError,
    invoiceTotals,
    nowIso,
    saleTotal,
    toDateOnly,
    validationErrorFromZod,
} from '@stockledger/shared';
import type {
    Invoice,
    InvoiceInput,
    InvoiceWithItem,
    Product,
    SaleInvoiceInput,
    SaleMismatchField,
} from '@stockledger/shared';
import { invoiceLogger } from '../../utils/logger.js';
import type { StockMutationService } from '../inventory/stockMutationService.js';
import type { UnitOfWork, UnitOfWorkContext } from '../inventory/unitOfWork.js';
import { requireProductById, requireProductByName } from '../products/productService.js';
import { requireSale } from '../sales/saleService.js';
import { assignNextInvoiceNumber, invoiceNumberExists } from './invoiceNumberGenerator.js';

interface InvoiceLine {
    product: Product;
    quantity: number;
    discount: number;
    saleId: number | null;
}

async function requireInvoice(db: Kysely<DB>, id: number): Promise<InvoiceWithItem> {
    const invoice = await db.selectFrom('invoice').selectAll().where('id', '=', id).executeTakeFirst();
    if (!invoice) throw new NotFoundError('Invoice', id);

    const item = await db.selectFrom('invoice_item').selectAll().where('invoiceId', '=', id).executeTakeFirst();
    if (!item) throw new NotFoundError('Invoice item for invoice', id);

    return { ...invoice, item };
}

export class InvoiceService {
    constructor(
        private readonly unitOfWork: UnitOfWork,
        private readonly mutations: StockMutationService,
        private readonly vatRate: number,
    ) {}

    async listInvoices(): Promise<Invoice[]> {
        return this.unitOfWork.read('listInvoices', (db) =>
            db.selectFrom('invoice').selectAll().orderBy('date', 'desc').orderBy('id', 'desc').execute(),
        );
    }

    async getInvoice(id: number): Promise<InvoiceWithItem> {
        return this.unitOfWork.read('getInvoice', (db) => requireInvoice(db, id));
    }

    async createInvoice(input: InvoiceInput): Promise<InvoiceWithItem> {
        const parsed = InvoiceInputSchema.safeParse(input);
        if (!parsed.success) throw validationErrorFromZod(parsed.error);
        const data = parsed.data;

        const invoice = await this.unitOfWork.run('createInvoice', async (ctx) => {
            const invoiceNumber = await this.resolveInvoiceNumber(ctx, data.invoiceNumber);

            const line: InvoiceLine = data.source === 'stock'
                ? {
                    product: await requireProductByName(ctx.trx, data.productName),
                    quantity: data.quantity,
                    discount: data.discount,
                    saleId: null,
                }
                : await this.lineFromSale(ctx, data);

            const unitPrice = line.product.sellPrice;
            const lineTotal = saleTotal(line.quantity, unitPrice, line.discount);
            const totals = invoiceTotals(lineTotal, this.vatRate);

            if (line.saleId === null) {
                await this.mutations.applyDelta(ctx, line.product.id, -line.quantity, LEDGER_REASONS.invoice(invoiceNumber));
            }

            const header = await ctx.trx
                .insertInto('invoice')
                .values({
                    invoiceNumber,
                    date: data.date ?? toDateOnly(),
                    customerName: data.customerName,
                    subtotal: totals.subtotal,
                    tax: totals.tax,
                    grandTotal: totals.grandTotal,
                    saleId: line.saleId,
                    createdAt: nowIso(),
                })
                .returningAll()
                .executeTakeFirstOrThrow();

            const item = await ctx.trx
                .insertInto('invoice_item')
                .values({
                    invoiceId: header.id,
                    productId: line.product.id,
                    productName: line.product.name,
                    quantity: line.quantity,
                    unitPrice,
                    discount: line.discount,
                    total: lineTotal,
                })
                .returningAll()
                .executeTakeFirstOrThrow();

            return { ...header, item };
        });

        invoiceLogger.info(
            { invoiceNumber: invoice.invoiceNumber, source: data.source, grandTotal: invoice.grandTotal },
            'Invoice created',
        );
        return invoice;
    }

    /**
     * Delete an invoice; a stock invoice returns its quantity, a sale invoice moves nothing.
     */
    async deleteInvoice(id: number): Promise<InvoiceWithItem> {
        const invoice = await this.unitOfWork.run('deleteInvoice', async (ctx) => {
            const current = await requireInvoice(ctx.trx, id);

            if (current.saleId === null) {
                await this.mutations.applyDelta(
                    ctx,
                    current.item.productId,
                    current.item.quantity,
                    LEDGER_REASONS.invoiceDeletion(current.invoiceNumber),
                );
            }

            await ctx.trx.deleteFrom('invoice_item').where('invoiceId', '=', id).execute();
            await ctx.trx.deleteFrom('invoice').where('id', '=', id).execute();
            return current;
        });

        invoiceLogger.info({ invoiceNumber: invoice.invoiceNumber, restored: invoice.saleId === null }, 'Invoice deleted');
        return invoice;
    }

    private async resolveInvoiceNumber(ctx: UnitOfWorkContext, requested: string | undefined): Promise<string> {
        if (requested === undefined) {
            return assignNextInvoiceNumber(ctx.trx);
        }
        if (await invoiceNumberExists(ctx.trx, requested)) {
            throw new ConflictError(STOCK_ERROR_CODES.DUPLICATE, `Invoice number '${requested}' already exists`, {
                invoiceNumber: requested,
            });
        }
        return requested;
    }

    /**
     * The sale is the source of truth; supplied fields only confirm it.
     */
    private async lineFromSale(ctx: UnitOfWorkContext, data: SaleInvoiceInput): Promise<InvoiceLine> {
        const sale = await requireSale(ctx.trx, data.saleId);
        const mismatches: SaleMismatchField[] = [];

        if (data.productName !== undefined) {
            const named = await ctx.trx.selectFrom('product').select('id').where('name', '=', data.productName).executeTakeFirst();
            if (!named || named.id !== sale.productId) mismatches.push('product');
        }
        if (data.quantity !== undefined && data.quantity !== sale.quantity) mismatches.push('quantity');
        if (data.discount !== undefined && data.discount !== sale.discount) mismatches.push('discount');

        if (mismatches.length > 0) {
            throw new SaleMismatchError(sale.id, mismatches);
        }

        return {
            product: await requireProductById(ctx.trx, sale.productId),
            quantity: sale.quantity,
            discount: sale.discount,
            saleId: sale.id,
        };
    }
}
