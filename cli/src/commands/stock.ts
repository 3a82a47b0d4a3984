import { Command } from 'commander';
import chalk from 'chalk';
import type { DriftCorrection, StockSummary } from '@stockledger/shared';
import { api } from '../api.js';
import { fail, field, heading, money, stockColor, success, table } from '../format.js';
import { parseInteger } from '../prompt.js';

export function registerStockCommands(program: Command): void {
  const stock = program.command('stock').description('Stock mutations, reconciliation and summary');

  stock
    .command('mutate <productId>')
    .description('Apply a signed stock adjustment, e.g. --delta -3 --reason "Counted shelf"')
    .requiredOption('-d, --delta <n>', 'Signed whole number of units', parseInteger)
    .requiredOption('-r, --reason <text>', 'Reason written to the ledger')
    .action(async (productId: string, opts: { delta: number; reason: string }) => {
      const res = await api<{ productId: number; quantity: number }>(`/api/stock/${productId}/mutate`, {
        method: 'POST',
        body: { delta: opts.delta, reason: opts.reason },
      });
      if (!res.ok) fail('Stock mutation rejected', res.error);
      success(`Product #${res.data.productId} now has ${res.data.quantity} in stock`);
    });

  stock
    .command('reconcile')
    .description('Correct drift between cached stock and the ledger')
    .action(async () => {
      const res = await api<{ corrections: DriftCorrection[]; corrected: number }>('/api/stock/reconcile', {
        method: 'POST',
      });
      if (!res.ok) fail('Reconciliation failed', res.error);

      if (res.data.corrected === 0) {
        success('Ledger and stock agree for every product');
        return;
      }
      heading(`Corrected ${res.data.corrected} product(s)`);
      table(
        res.data.corrections.map((c) => ({
          ID: c.productId,
          Product: c.productName,
          Ledger: c.oldQty,
          Stock: c.newQty,
          Correction: c.delta > 0 ? `+${c.delta}` : String(c.delta),
        }))
      );
      console.log();
    });

  stock
    .command('summary')
    .description('Totals, low stock, damaged units and best sellers')
    .action(async () => {
      const res = await api<StockSummary>('/api/stock/summary');
      if (!res.ok) fail('Failed to load summary', res.error);

      const s = res.data;
      heading('Stock Summary');
      field('Products', s.totalProducts);
      field('Units in stock', s.totalStock);
      field('Damaged (open)', s.unreplacedDamagedUnits);
      field('Sales total', money(s.totalSales));
      field('Units sold', s.totalSalesQuantity);
      field('Average sale', money(s.averageSale));

      heading(`Low stock (≤ ${s.lowStockThreshold})`);
      if (s.lowStock.length === 0) {
        console.log(chalk.dim('  Nothing low'));
      } else {
        table(s.lowStock.map((p) => ({ ID: p.id, Product: p.name, Stock: stockColor(p.stock, s.lowStockThreshold) })));
      }

      heading('Best sellers');
      if (s.topSoldItems.length === 0) {
        console.log(chalk.dim('  No sales yet'));
      } else {
        table(s.topSoldItems.map((item) => ({ ID: item.productId, Product: item.name, Sold: item.quantity })));
      }

      heading('Most stocked');
      if (s.topStockedItems.length === 0) {
        console.log(chalk.dim('  No products'));
      } else {
        table(s.topStockedItems.map((p) => ({ ID: p.id, Product: p.name, Stock: stockColor(p.stock, s.lowStockThreshold) })));
      }
      console.log();
    });
}
