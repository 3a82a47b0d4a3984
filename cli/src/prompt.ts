import { createInterface } from 'node:readline';
import { InvalidArgumentError } from 'commander';

function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Ask a yes/no question; anything but y/yes counts as no.
 * `assumeYes` (from --yes) skips the prompt.
 */
export async function confirm(question: string, assumeYes = false): Promise<boolean> {
  if (assumeYes) return true;
  const answer = await prompt(`${question} [y/N] `);
  return isYes(answer);
}

export function isYes(answer: string): boolean {
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}

// Commander argument parsers

export function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return n;
}

export function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return n;
}
