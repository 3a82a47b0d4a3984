import { Command } from 'commander';
import chalk from 'chalk';
import { toDateOnly } from '@stockledger/shared';
import type { DamageListing, DamageRecord } from '@stockledger/shared';
import { api } from '../api.js';
import { fail, heading, success, table, warn } from '../format.js';
import { confirm, parseInteger } from '../prompt.js';

export function registerDamageCommands(program: Command): void {
  const damages = program.command('damages').description('Damaged units awaiting replacement');

  damages
    .command('list')
    .description('List damage entries')
    .action(async () => {
      const res = await api<DamageListing>('/api/damages');
      if (!res.ok) fail('Failed to list damages', res.error);

      heading(`Damages (${res.data.unreplacedUnits} units awaiting replacement)`);
      table(
        res.data.damages.map((d) => ({
          ID: d.id,
          Date: d.date,
          Product: d.productName,
          Qty: d.quantity,
          Status: d.replaced ? chalk.green('replaced') : chalk.yellow('open'),
        }))
      );
      console.log();
    });

  damages
    .command('add')
    .description('Record damaged units; they leave stock immediately')
    .requiredOption('-p, --product <name>', 'Product name')
    .requiredOption('-q, --qty <n>', 'Damaged quantity', parseInteger)
    .option('--date <date>', 'Date (YYYY-MM-DD)', toDateOnly())
    .action(async (opts: { product: string; qty: number; date: string }) => {
      const res = await api<DamageRecord>('/api/damages', {
        method: 'POST',
        body: { date: opts.date, productName: opts.product, quantity: opts.qty },
      });
      if (!res.ok) fail('Damage rejected', res.error);
      success(`Damage #${res.data.id}: ${res.data.quantity} × ${res.data.productName} out of stock`);
    });

  damages
    .command('replace <id>')
    .description('Mark damaged units as replaced and return them to stock')
    .action(async (id: string) => {
      const res = await api<DamageRecord>(`/api/damages/${id}/replace`, { method: 'POST' });
      if (!res.ok) fail('Replacement rejected', res.error);
      success(`Damage #${res.data.id} replaced; ${res.data.quantity} back in stock`);
    });

  damages
    .command('delete <id>')
    .description('Delete a damage entry; open entries return their units')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (id: string, opts: { yes?: boolean }) => {
      if (!(await confirm(`Delete damage entry #${id}?`, opts.yes))) {
        warn('Cancelled');
        return;
      }
      const res = await api<{ damage: DamageRecord }>(`/api/damages/${id}`, { method: 'DELETE' });
      if (!res.ok) fail('Failed to delete damage entry', res.error);
      success(`Deleted damage entry #${res.data.damage.id}`);
    });
}
