#!/usr/bin/env tsx

import { Command } from 'commander';
import { registerProductCommands } from './commands/products.js';
import { registerStockCommands } from './commands/stock.js';
import { registerSaleCommands } from './commands/sales.js';
import { registerDamageCommands } from './commands/damages.js';
import { registerInvoiceCommands } from './commands/invoices.js';
import { error } from './format.js';

const program = new Command();

program
  .name('stockledger')
  .description('Stock ledger CLI: products, stock, sales, damages and invoices')
  .version('1.0.0');

registerProductCommands(program);
registerStockCommands(program);
registerSaleCommands(program);
registerDamageCommands(program);
registerInvoiceCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parseAsync(args).catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
