import { Command } from 'commander';
import { toDateOnly } from '@stockledger/shared';
import type { SaleRecord } from '@stockledger/shared';
import { api } from '../api.js';
import { fail, heading, money, success, table, warn } from '../format.js';
import { confirm, parseInteger, parseNumber } from '../prompt.js';

interface SaleOptions {
  date: string;
  product: string;
  qty: number;
  price: number;
  discount: number;
}

function withSaleOptions(command: Command): Command {
  return command
    .requiredOption('-p, --product <name>', 'Product name')
    .requiredOption('-q, --qty <n>', 'Quantity sold', parseInteger)
    .requiredOption('--price <amount>', 'Unit price', parseNumber)
    .option('--discount <percent>', 'Discount in percent', parseNumber, 0)
    .option('--date <date>', 'Sale date (YYYY-MM-DD)', toDateOnly());
}

function saleBody(opts: SaleOptions) {
  return {
    date: opts.date,
    productName: opts.product,
    quantity: opts.qty,
    unitPrice: opts.price,
    discount: opts.discount,
  };
}

export function registerSaleCommands(program: Command): void {
  const sales = program.command('sales').description('Point-of-sale entries');

  sales
    .command('list')
    .description('List sales, newest first')
    .action(async () => {
      const res = await api<{ sales: SaleRecord[] }>('/api/sales');
      if (!res.ok) fail('Failed to list sales', res.error);

      heading(`Sales (${res.data.sales.length})`);
      table(
        res.data.sales.map((s) => ({
          ID: s.id,
          Date: s.date,
          Item: s.itemName,
          Qty: s.quantity,
          Price: money(s.unitPrice),
          'Disc %': s.discount,
          Total: money(s.total),
        }))
      );
      console.log();
    });

  withSaleOptions(sales.command('add').description('Record a sale'))
    .action(async (opts: SaleOptions) => {
      const res = await api<SaleRecord>('/api/sales', { method: 'POST', body: saleBody(opts) });
      if (!res.ok) fail('Sale rejected', res.error);
      success(`Sale #${res.data.id}: ${res.data.quantity} × ${res.data.itemName} = ${money(res.data.total)}`);
    });

  withSaleOptions(sales.command('edit <id>').description('Replace the values of a sale'))
    .action(async (id: string, opts: SaleOptions) => {
      const res = await api<SaleRecord>(`/api/sales/${id}`, { method: 'PUT', body: saleBody(opts) });
      if (!res.ok) fail('Sale edit rejected', res.error);
      success(`Sale #${res.data.id} updated: ${res.data.quantity} × ${res.data.itemName} = ${money(res.data.total)}`);
    });

  sales
    .command('delete <id>')
    .description('Delete a sale and return its quantity to stock')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (id: string, opts: { yes?: boolean }) => {
      if (!(await confirm(`Delete sale #${id}?`, opts.yes))) {
        warn('Cancelled');
        return;
      }
      const res = await api<{ sale: SaleRecord }>(`/api/sales/${id}`, { method: 'DELETE' });
      if (!res.ok) fail('Failed to delete sale', res.error);
      success(`Deleted sale #${res.data.sale.id}; ${res.data.sale.quantity} returned to stock`);
    });
}
