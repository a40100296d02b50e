import chalk from 'chalk';
import type { Config } from '../models/config.model.js';
import { SettingsStore } from '../store/settings.js';
import { CleanupCollection } from '../cleanups/collection.js';
import { printFailures } from '../ui/warnings.js';

interface InitOptions {
  force?: boolean;
}

export async function initCommand(opts: InitOptions, config: Config): Promise<void> {
  if (!opts.force) {
    const existing = await SettingsStore.loadOrNull(config.settings.path);
    if (existing) {
      console.error(chalk.yellow('Settings already exist. Use --force to reinitialize.'));
      process.exit(1);
    }
  }

  const settings = await SettingsStore.init(config.settings.path);
  const collection = new CleanupCollection();
  collection.addStandardActions();
  collection.addUserActions(config.cleanups.userCleanups);

  printFailures('Writing defaults', collection.broadcastSaveConfig(settings));
  await settings.save();

  console.log(chalk.green(`Wrote ${collection.size} cleanups to ${settings.path}`));
}
