import { select } from '@inquirer/prompts';
import chalk from 'chalk';
import type { Config } from '../models/config.model.js';
import { SettingsStore } from '../store/settings.js';
import { loadCleanups } from '../cleanups/load.js';
import { editCleanup } from '../ui/editor.js';
import { confirmAction } from '../ui/components/confirm.js';
import { printFailures } from '../ui/warnings.js';

export async function configureCommand(cleanupId: string | undefined, config: Config): Promise<void> {
  const settings = await SettingsStore.loadOrNull(config.settings.path);
  if (!settings) {
    console.error(chalk.red("Settings not found. Run 'dirtidy init' first."));
    process.exit(1);
  }

  const { collection, failures } = loadCleanups(config, settings);
  printFailures('Reading settings', failures);

  // Edits go to a detached copy; the live collection only sees them after saving
  const working = collection.clone();

  const id = cleanupId ?? await select<string>({
    message: 'Which cleanup?',
    choices: working.cleanups().map(c => ({
      name: `${c.title} ${chalk.dim(`(${c.id})`)}`,
      value: c.id,
    })),
    pageSize: 12,
  });

  const cleanup = working.lookup(id);
  if (!cleanup) {
    console.error(chalk.red(`Unknown cleanup '${id}'.`));
    process.exit(1);
  }

  await editCleanup(cleanup);

  const save = await confirmAction('Save changes?', true);
  if (!save) {
    console.log(chalk.dim('Changes discarded.'));
    return;
  }

  printFailures('Saving', working.broadcastSaveConfig(settings));
  await settings.save();
  printFailures('Reloading', collection.broadcastReadConfig(settings));

  console.log(chalk.green(`Saved '${cleanup.title}'.`));
}
