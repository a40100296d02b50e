import chalk from 'chalk';
import type { BroadcastFailure } from '../cleanups/errors.js';
import { formatFailures } from '../utils/formatter.js';

export function printFailures(context: string, failures: BroadcastFailure[]): void {
  if (failures.length === 0) return;
  console.warn(chalk.yellow(`${context}: ${failures.length} cleanup(s) failed`));
  for (const line of formatFailures(failures)) {
    console.warn(chalk.yellow(`  ${line}`));
  }
}
