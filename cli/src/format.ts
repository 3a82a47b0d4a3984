/**
 * Output formatting utilities for CLI
 */

import { stripVTControlCharacters } from 'node:util';
import chalk from 'chalk';
import { STOCK_CONFIG } from '@stockledger/shared';
import type { ApiErrorBody } from './api.js';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/** Two decimals, no currency symbol */
export function money(value: number): string {
  return value.toFixed(2);
}

/**
 * Quantity coloured by level: red when empty, yellow at or below the threshold.
 */
export function stockColor(quantity: number, threshold: number = STOCK_CONFIG.lowStockThreshold): string {
  if (quantity === 0) return chalk.red(String(quantity));
  if (quantity <= threshold) return chalk.yellow(String(quantity));
  return chalk.green(String(quantity));
}

/**
 * Print a server error with its field details, then exit non-zero.
 */
export function fail(action: string, body: ApiErrorBody): never {
  error(`${action}: ${body.error}`);
  for (const detail of body.details ?? []) {
    console.log(chalk.gray(`    ${detail.path || '(body)'}: ${detail.message}`));
  }
  process.exit(1);
}

/** Width of a cell as it appears on screen, ignoring colour codes */
export function visibleLength(text: string): number {
  return stripVTControlCharacters(text).length;
}

function pad(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - visibleLength(text)));
}

/**
 * Lay rows out as aligned columns; returns the lines without printing them.
 */
export function formatTable(rows: Record<string, unknown>[], columns?: string[]): string[] {
  const first = rows[0];
  if (!first) return [chalk.dim('  No results')];

  const cols = columns || Object.keys(first);
  const widths = cols.map((c) =>
    Math.max(c.length, ...rows.map((r) => visibleLength(String(r[c] ?? ''))))
  );

  const header = cols.map((c, i) => pad(c, widths[i] ?? 0)).join('  ');
  const lines = [
    chalk.bold(`  ${header}`),
    chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`),
  ];
  for (const row of rows) {
    lines.push(`  ${cols.map((c, i) => pad(String(row[c] ?? ''), widths[i] ?? 0)).join('  ')}`);
  }
  return lines;
}

export function table(rows: Record<string, unknown>[], columns?: string[]): void {
  for (const line of formatTable(rows, columns)) {
    console.log(line);
  }
}
