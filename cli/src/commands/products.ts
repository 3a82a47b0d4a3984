import { readFileSync, writeFileSync } from 'node:fs';
import { Command } from 'commander';
import type { ImportSummary, LedgerEntry, Product } from '@stockledger/shared';
import { api } from '../api.js';
import { PRODUCT_CSV_COLUMNS, formatProductCsv, parseProductCsv } from '../csv.js';
import type { CsvImportRow } from '../csv.js';
import { fail, field, heading, json, money, stockColor, success, table, warn } from '../format.js';
import { confirm, parseInteger, parseNumber } from '../prompt.js';

interface ListOptions {
  name?: string;
  category?: string;
  stockMin?: number;
  stockMax?: number;
  buyMin?: number;
  buyMax?: number;
  sellMin?: number;
  sellMax?: number;
  updatedAfter?: string;
  json?: boolean;
}

/**
 * Query string for GET /api/products; unset options are left out.
 */
export function buildFilterQuery(opts: ListOptions): string {
  const params = new URLSearchParams();
  const entries: Array<[string, string | number | undefined]> = [
    ['name', opts.name],
    ['category', opts.category],
    ['stockMin', opts.stockMin],
    ['stockMax', opts.stockMax],
    ['buyPriceMin', opts.buyMin],
    ['buyPriceMax', opts.buyMax],
    ['sellPriceMin', opts.sellMin],
    ['sellPriceMax', opts.sellMax],
    ['updatedAfter', opts.updatedAfter],
  ];
  for (const [key, value] of entries) {
    if (value !== undefined && value !== '') params.set(key, String(value));
  }
  const query = params.toString();
  return query ? `?${query}` : '';
}

function withFilterOptions(command: Command): Command {
  return command
    .option('-n, --name <text>', 'Name substring or regular expression')
    .option('-c, --category <category>', 'Product type or group ("All" for every category)')
    .option('--stock-min <n>', 'Minimum stock', parseNumber)
    .option('--stock-max <n>', 'Maximum stock', parseNumber)
    .option('--buy-min <price>', 'Minimum buy price', parseNumber)
    .option('--buy-max <price>', 'Maximum buy price', parseNumber)
    .option('--sell-min <price>', 'Minimum sell price', parseNumber)
    .option('--sell-max <price>', 'Maximum sell price', parseNumber)
    .option('--updated-after <date>', 'Only products updated on or after YYYY-MM-DD (local midnight)');
}

function productRows(products: Product[]): Record<string, unknown>[] {
  return products.map((p) => ({
    ID: p.id,
    Name: p.name,
    Type: p.type,
    Buy: money(p.buyPrice),
    Sell: money(p.sellPrice),
    Stock: stockColor(p.stock),
    Updated: p.lastUpdated.slice(0, 10),
  }));
}

export function registerProductCommands(program: Command): void {
  const products = program.command('products').description('Product catalogue and stock history');

  withFilterOptions(products.command('list').description('List products, optionally filtered'))
    .option('--json', 'Print raw JSON')
    .action(async (opts: ListOptions) => {
      const res = await api<{ products: Product[]; total: number }>(`/api/products${buildFilterQuery(opts)}`);
      if (!res.ok) fail('Failed to list products', res.error);

      if (opts.json) {
        json(res.data.products);
        return;
      }
      heading(`Products (${res.data.total})`);
      table(productRows(res.data.products));
      console.log();
    });

  products
    .command('add <name>')
    .description('Add a product')
    .requiredOption('-t, --type <type>', 'Product type')
    .requiredOption('--buy <price>', 'Buy price', parseNumber)
    .requiredOption('--sell <price>', 'Sell price', parseNumber)
    .option('-s, --stock <n>', 'Opening stock', parseInteger, 0)
    .action(async (name: string, opts: { type: string; buy: number; sell: number; stock: number }) => {
      const res = await api<Product>('/api/products', {
        method: 'POST',
        body: { name, type: opts.type, buyPrice: opts.buy, sellPrice: opts.sell, stock: opts.stock },
      });
      if (!res.ok) fail('Failed to add product', res.error);
      success(`Added ${res.data.name} (#${res.data.id}) with ${res.data.stock} in stock`);
    });

  products
    .command('update <id>')
    .description('Update product fields; a new stock level is written as an adjustment')
    .option('--name <name>', 'New name')
    .option('-t, --type <type>', 'Product type')
    .option('--buy <price>', 'Buy price', parseNumber)
    .option('--sell <price>', 'Sell price', parseNumber)
    .option('-s, --stock <n>', 'Stock level', parseInteger)
    .action(async (id: string, opts: { name?: string; type?: string; buy?: number; sell?: number; stock?: number }) => {
      const res = await api<Product>(`/api/products/${id}`, {
        method: 'PUT',
        body: { name: opts.name, type: opts.type, buyPrice: opts.buy, sellPrice: opts.sell, stock: opts.stock },
      });
      if (!res.ok) fail('Failed to update product', res.error);
      success(`Updated ${res.data.name}: stock ${res.data.stock}, sell ${money(res.data.sellPrice)}`);
    });

  products
    .command('delete <id>')
    .description('Delete a product that no sale, damage or invoice references')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (id: string, opts: { yes?: boolean }) => {
      if (!(await confirm(`Delete product #${id}?`, opts.yes))) {
        warn('Cancelled');
        return;
      }
      const res = await api<{ product: Product }>(`/api/products/${id}`, { method: 'DELETE' });
      if (!res.ok) fail('Failed to delete product', res.error);
      success(`Deleted ${res.data.product.name}`);
    });

  products
    .command('history <id>')
    .description('Show the stock ledger of a product, newest first')
    .action(async (id: string) => {
      const res = await api<{ product: Product; entries: LedgerEntry[] }>(`/api/products/${id}/history`);
      if (!res.ok) fail('Failed to load history', res.error);

      const { product, entries } = res.data;
      heading(`${product.name} · stock ${product.stock}`);
      field('Type', product.type);
      field('Last updated', product.lastUpdated);
      console.log();
      table(
        entries.map((e) => ({
          When: e.createdAt.replace('T', ' ').slice(0, 19),
          Delta: e.delta > 0 ? `+${e.delta}` : String(e.delta),
          Reason: e.reason,
        }))
      );
      console.log();
    });

  products
    .command('import <file>')
    .description(`Import a product CSV (${PRODUCT_CSV_COLUMNS.join(',')})`)
    .action(async (file: string) => {
      let rows: CsvImportRow[];
      try {
        rows = parseProductCsv(readFileSync(file, 'utf-8'));
      } catch (err) {
        fail('Could not read CSV', { error: err instanceof Error ? err.message : String(err) });
      }

      const res = await api<ImportSummary>('/api/products/import', { method: 'POST', body: { rows } });
      if (!res.ok) fail('Import rejected', res.error);
      success(
        `Imported ${rows.length} rows: ${res.data.created} created, ${res.data.updated} updated, ${res.data.unitsAdded} units added`
      );
    });

  withFilterOptions(
    products
      .command('export <file>')
      .description(`Write products to a CSV file (${PRODUCT_CSV_COLUMNS.join(',')}), optionally filtered`)
  ).action(async (file: string, opts: ListOptions) => {
    const res = await api<{ products: Product[]; total: number }>(`/api/products${buildFilterQuery(opts)}`);
    if (!res.ok) fail('Failed to load products', res.error);

    try {
      writeFileSync(file, formatProductCsv(res.data.products), 'utf-8');
    } catch (err) {
      fail('Could not write CSV', { error: err instanceof Error ? err.message : String(err) });
    }
    success(`Exported ${res.data.total} products to ${file}`);
  });
}
