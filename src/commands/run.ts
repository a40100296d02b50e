import chalk from 'chalk';
import type { Config } from '../models/config.model.js';
import { SettingsStore } from '../store/settings.js';
import { loadCleanups } from '../cleanups/load.js';
import { FileInfo } from '../tree/file-info.js';
import { ShellRunner } from '../services/shell.js';
import { ActivityTracker } from '../services/activity.js';
import { confirmAction } from '../ui/components/confirm.js';
import { withSpinner } from '../ui/components/progress.js';
import { printFailures } from '../ui/warnings.js';
import { describeRefresh } from '../ui/refresh.js';
import { toError } from '../cleanups/errors.js';

interface RunOptions {
  yes?: boolean;
  dryRun?: boolean;
}

export async function runCommand(cleanupId: string, path: string, opts: RunOptions, config: Config): Promise<void> {
  const settings = await SettingsStore.loadOrNull(config.settings.path);
  if (!settings) {
    console.error(chalk.red("Settings not found. Run 'dirtidy init' first."));
    process.exit(1);
  }

  const { collection, failures } = loadCleanups(config, settings);
  printFailures('Reading settings', failures);

  const cleanup = collection.lookup(cleanupId);
  if (!cleanup) {
    const available = collection.cleanups().filter(c => c.active).map(c => c.id).join(', ');
    console.error(chalk.red(`Unknown cleanup '${cleanupId}'. Available: ${available || 'none'}`));
    process.exit(1);
  }

  let item: FileInfo;
  try {
    item = await FileInfo.fromPath(path);
  } catch (error) {
    console.error(chalk.red(`Cannot read ${path}: ${toError(error).message}`));
    process.exit(1);
  }

  printFailures('Selection', collection.broadcastSelectionChanged(item));
  if (!cleanup.enabled) {
    console.error(chalk.red(`Cannot run '${cleanupId}' on ${item.path}: cleanup is inactive or does not apply to this item`));
    process.exit(1);
  }

  if (opts.dryRun) {
    console.log(cleanup.expandVariables(item));
    return;
  }

  if (cleanup.askForConfirmation && !opts.yes) {
    const ok = await confirmAction(`Really run '${cleanup.title}' on ${item.path}?`, false);
    if (!ok) return;
  }

  const tracker = new ActivityTracker(settings, config.activity.feedbackThreshold);
  tracker.watch(collection);
  const runner = new ShellRunner(config.cleanups.shell);

  try {
    await withSpinner(`Running ${cleanup.title}...`, async (spinner) => {
      await cleanup.execute(item, runner);
      spinner.succeed(`${cleanup.title} finished on ${item.name}`);
    });
  } catch (error) {
    console.error(chalk.red(toError(error).message));
    process.exit(1);
  }

  await settings.save();
  console.log(chalk.dim(describeRefresh(cleanup.refreshPolicy, item)));
}
