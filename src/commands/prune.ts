import chalk from 'chalk';
import type { Config } from '../models/config.model.js';
import { SettingsStore } from '../store/settings.js';
import { loadCleanups, pruneSettings } from '../cleanups/load.js';
import { printFailures } from '../ui/warnings.js';

interface PruneOptions {
  dryRun?: boolean;
}

export async function pruneCommand(opts: PruneOptions, config: Config): Promise<void> {
  const settings = await SettingsStore.loadOrNull(config.settings.path);
  if (!settings) {
    console.error(chalk.red("Settings not found. Run 'dirtidy init' first."));
    process.exit(1);
  }

  const { collection, failures } = loadCleanups(config, settings);
  printFailures('Reading settings', failures);

  if (opts.dryRun) {
    const stale = settings.getCleanupIds().filter(id => !collection.has(id));
    console.log(stale.length ? stale.join('\n') : chalk.dim('Nothing to prune.'));
    return;
  }

  const removed = pruneSettings(collection, settings);
  if (removed.length === 0) {
    console.log(chalk.dim('Nothing to prune.'));
    return;
  }

  await settings.save();
  console.log(chalk.green(`Removed settings of ${removed.length} cleanup(s): ${removed.join(', ')}`));
}
