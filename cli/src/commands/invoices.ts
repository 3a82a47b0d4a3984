import { Command } from 'commander';
import type { Invoice, InvoiceWithItem } from '@stockledger/shared';
import { api } from '../api.js';
import { fail, field, heading, money, success, table, warn } from '../format.js';
import { confirm, parseInteger, parseNumber } from '../prompt.js';

interface InvoiceOptions {
  customer: string;
  sale?: number;
  product?: string;
  qty?: number;
  discount?: number;
  date?: string;
  number?: string;
}

/**
 * Request body for POST /api/invoices. --sale selects a sale invoice;
 * otherwise the invoice is raised from stock.
 */
export function invoiceBody(opts: InvoiceOptions): Record<string, unknown> {
  const header = { customerName: opts.customer, date: opts.date, invoiceNumber: opts.number };
  if (opts.sale !== undefined) {
    return {
      source: 'sale',
      ...header,
      saleId: opts.sale,
      productName: opts.product,
      quantity: opts.qty,
      discount: opts.discount,
    };
  }
  return {
    source: 'stock',
    ...header,
    productName: opts.product,
    quantity: opts.qty,
    discount: opts.discount ?? 0,
  };
}

function printInvoice(invoice: InvoiceWithItem): void {
  heading(`Invoice ${invoice.invoiceNumber}`);
  field('Date', invoice.date);
  field('Customer', invoice.customerName);
  field('Sale', invoice.saleId === null ? 'from stock' : `#${invoice.saleId}`);
  console.log();
  table([
    {
      Product: invoice.item.productName,
      Qty: invoice.item.quantity,
      Price: money(invoice.item.unitPrice),
      'Disc %': invoice.item.discount,
      Total: money(invoice.item.total),
    },
  ]);
  console.log();
  field('Subtotal', money(invoice.subtotal));
  field('VAT', money(invoice.tax));
  field('Grand total', money(invoice.grandTotal));
  console.log();
}

export function registerInvoiceCommands(program: Command): void {
  const invoices = program.command('invoices').description('Customer invoices');

  invoices
    .command('list')
    .description('List invoices, newest first')
    .action(async () => {
      const res = await api<{ invoices: Invoice[] }>('/api/invoices');
      if (!res.ok) fail('Failed to list invoices', res.error);

      heading(`Invoices (${res.data.invoices.length})`);
      table(
        res.data.invoices.map((i) => ({
          ID: i.id,
          Number: i.invoiceNumber,
          Date: i.date,
          Customer: i.customerName,
          Source: i.saleId === null ? 'stock' : `sale #${i.saleId}`,
          Total: money(i.grandTotal),
        }))
      );
      console.log();
    });

  invoices
    .command('show <id>')
    .description('Show one invoice with its line')
    .action(async (id: string) => {
      const res = await api<InvoiceWithItem>(`/api/invoices/${id}`);
      if (!res.ok) fail('Failed to load invoice', res.error);
      printInvoice(res.data);
    });

  invoices
    .command('add')
    .description('Raise an invoice from stock (--product, --qty) or for an earlier sale (--sale)')
    .requiredOption('-c, --customer <name>', 'Customer name')
    .option('--sale <id>', 'Invoice an existing sale', parseInteger)
    .option('-p, --product <name>', 'Product name')
    .option('-q, --qty <n>', 'Quantity', parseInteger)
    .option('--discount <percent>', 'Discount in percent', parseNumber)
    .option('--date <date>', 'Invoice date (YYYY-MM-DD), default today')
    .option('--number <invoiceNumber>', 'Explicit invoice number')
    .action(async (opts: InvoiceOptions) => {
      const res = await api<InvoiceWithItem>('/api/invoices', { method: 'POST', body: invoiceBody(opts) });
      if (!res.ok) fail('Invoice rejected', res.error);
      success(`Created invoice ${res.data.invoiceNumber}`);
      printInvoice(res.data);
    });

  invoices
    .command('delete <id>')
    .description('Delete an invoice; stock invoices return their quantity')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (id: string, opts: { yes?: boolean }) => {
      if (!(await confirm(`Delete invoice #${id}?`, opts.yes))) {
        warn('Cancelled');
        return;
      }
      const res = await api<{ invoice: InvoiceWithItem }>(`/api/invoices/${id}`, { method: 'DELETE' });
      if (!res.ok) fail('Failed to delete invoice', res.error);
      success(`Deleted invoice ${res.data.invoice.invoiceNumber}`);
    });
}
