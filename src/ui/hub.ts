import { select, input, Separator } from '@inquirer/prompts';
import chalk from 'chalk';
import { renderLogo } from './logo.js';
import { renderStatusBox } from './status.js';
import { confirmAction } from './components/confirm.js';
import { withSpinner } from './components/progress.js';
import { printFailures } from './warnings.js';
import { describeRefresh } from './refresh.js';
import { MenuHost } from '../cleanups/host.js';
import { loadCleanups } from '../cleanups/load.js';
import { toError } from '../cleanups/errors.js';
import { FileInfo } from '../tree/file-info.js';
import { ShellRunner } from '../services/shell.js';
import { ActivityTracker } from '../services/activity.js';
import type { SettingsStore } from '../store/settings.js';
import type { Config } from '../models/config.model.js';

const BACK = '__back__';

export async function launchHub(settings: SettingsStore, config: Config): Promise<void> {
  const host = new MenuHost();
  const { collection, failures } = loadCleanups(config, settings, host);
  printFailures('Reading settings', failures);

  const tracker = new ActivityTracker(settings, config.activity.feedbackThreshold);
  tracker.watch(collection);
  const runner = new ShellRunner(config.cleanups.shell);

  renderLogo();

  while (true) {
    renderStatusBox(collection, tracker);

    const path = await input({ message: 'Path to clean up (empty to exit):' });
    if (!path.trim()) return;

    let item: FileInfo;
    try {
      item = await FileInfo.fromPath(path.trim());
    } catch (error) {
      console.error(chalk.red(`Cannot read ${path}: ${toError(error).message}`));
      continue;
    }

    printFailures('Selection', collection.broadcastSelectionChanged(item));

    const enabled = host.getEnabled();
    if (enabled.length === 0) {
      console.log(chalk.yellow(`No active cleanup applies to ${item.path}.`));
      continue;
    }

    const selected = await select<string>({
      message: `Cleanup for ${item.name}:`,
      choices: [
        ...enabled.map(c => ({ name: c.title, value: c.id, description: c.expandVariables(item) })),
        new Separator(),
        { name: 'Back', value: BACK },
      ],
      pageSize: 12,
    });

    const cleanup = host.get(selected);
    if (selected === BACK || !cleanup) {
      collection.broadcastSelectionChanged(null);
      continue;
    }

    if (cleanup.askForConfirmation) {
      const ok = await confirmAction(`Really run '${cleanup.title}' on ${item.path}?`, false);
      if (!ok) continue;
    }

    try {
      await withSpinner(`Running ${cleanup.title}...`, async (spinner) => {
        await cleanup.execute(item, runner);
        spinner.succeed(`${cleanup.title} finished on ${item.name}`);
      });
      console.log(chalk.dim(describeRefresh(cleanup.refreshPolicy, item)));
    } catch (error) {
      console.error(chalk.red(toError(error).message));
    }

    await settings.save();
    collection.broadcastSelectionChanged(null);
  }
}
