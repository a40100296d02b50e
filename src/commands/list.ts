import chalk from 'chalk';
import type { Config } from '../models/config.model.js';
import { SettingsStore } from '../store/settings.js';
import { loadCleanups } from '../cleanups/load.js';
import { formatCleanupTable, isOutputFormat } from '../utils/formatter.js';
import { printFailures } from '../ui/warnings.js';

interface ListOptions {
  format?: string;
  all?: boolean;
}

export async function listCommand(opts: ListOptions, config: Config): Promise<void> {
  const settings = await SettingsStore.loadOrNull(config.settings.path);
  if (!settings) {
    console.error(chalk.red("Settings not found. Run 'dirtidy init' first."));
    process.exit(1);
  }

  const format = opts.format ?? 'table';
  if (!isOutputFormat(format)) {
    console.error(chalk.red(`Unknown format '${format}'. Use table, json or markdown.`));
    process.exit(1);
  }

  const { collection, failures } = loadCleanups(config, settings);
  printFailures('Reading settings', failures);

  const cleanups = opts.all ? collection.cleanups() : collection.cleanups().filter(c => c.active);
  if (cleanups.length === 0) {
    console.log(chalk.dim('No active cleanups. Use --all to show inactive ones.'));
    return;
  }

  console.log(formatCleanupTable(cleanups, format));
}
