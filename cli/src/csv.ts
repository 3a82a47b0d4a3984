/**
 * Product CSV export and import
 *
 * Both use the product export layout:
 *   ID,Name,Type,Buy Price,Sell Price,Last Updated,Stock
 * On import ID and Last Updated are ignored; Stock becomes the quantity to credit.
 * Values are passed through for the server to validate, so a bad cell is
 * reported with its row number rather than silently dropped.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { Product } from '@stockledger/shared';

export const PRODUCT_CSV_COLUMNS = ['ID', 'Name', 'Type', 'Buy Price', 'Sell Price', 'Last Updated', 'Stock'] as const;

const REQUIRED_COLUMNS = ['Name', 'Type', 'Buy Price', 'Sell Price', 'Stock'] as const;

const recordsSchema = z.array(z.record(z.string()));

export interface CsvImportRow {
  name: string;
  type: string;
  buyPrice: number | string;
  sellPrice: number | string;
  quantity: number | string;
}

/** Numeric cells become numbers; anything unreadable stays as text */
function numeric(cell: string): number | string {
  if (cell === '') return cell;
  const value = Number(cell.replace(/,/g, ''));
  return Number.isFinite(value) ? value : cell;
}

export function parseProductCsv(content: string): CsvImportRow[] {
  const records = recordsSchema.parse(
    parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    })
  );

  const first = records[0];
  if (!first) return [];

  const missing = REQUIRED_COLUMNS.filter((column) => !(column in first));
  if (missing.length > 0) {
    throw new Error(`Missing column${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`);
  }

  return records.map((record) => ({
    name: record['Name'] ?? '',
    type: record['Type'] ?? '',
    buyPrice: numeric(record['Buy Price'] ?? ''),
    sellPrice: numeric(record['Sell Price'] ?? ''),
    quantity: numeric(record['Stock'] ?? ''),
  }));
}

export function formatProductCsv(products: Product[]): string {
  return stringify(
    products.map((p) => [p.id, p.name, p.type, p.buyPrice, p.sellPrice, p.lastUpdated, p.stock]),
    { header: true, columns: [...PRODUCT_CSV_COLUMNS] }
  );
}
