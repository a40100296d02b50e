import { input, confirm, checkbox, select } from '@inquirer/prompts';
import type { Cleanup } from '../cleanups/cleanup.js';
import type { RefreshPolicy } from '../store/settings.model.js';

type Target = 'dirs' | 'files';

const REFRESH_CHOICES: Array<{ name: string; value: RefreshPolicy }> = [
  { name: 'No refresh', value: 'none' },
  { name: 'Refresh this entry', value: 'refresh-this' },
  { name: 'Refresh this entry\'s parent', value: 'refresh-parent' },
  { name: 'Assume entry has been deleted', value: 'assume-deleted' },
];

/** Prompts for every setting of `cleanup` and applies the answers to it. */
export async function editCleanup(cleanup: Cleanup): Promise<void> {
  const title = await input({ message: 'Title:', default: cleanup.title });
  const command = await input({
    message: 'Command line (%p = full path, %n = name):',
    default: cleanup.command,
  });
  const active = await confirm({ message: 'Enabled?', default: cleanup.active });

  const targets = await checkbox<Target>({
    message: 'Works for:',
    choices: [
      { name: 'Directories', value: 'dirs', checked: cleanup.worksForDir },
      { name: 'Files', value: 'files', checked: cleanup.worksForFile },
    ],
  });

  const recurse = await confirm({ message: 'Recurse into subdirectories?', default: cleanup.recurse });
  const askForConfirmation = await confirm({
    message: 'Ask for confirmation before running?',
    default: cleanup.askForConfirmation,
  });
  const refreshPolicy = await select<RefreshPolicy>({
    message: 'After running:',
    choices: REFRESH_CHOICES,
    default: cleanup.refreshPolicy,
  });

  cleanup.applySettings({
    title: title.trim() || cleanup.id,
    command: command.trim(),
    active,
    worksForDir: targets.includes('dirs'),
    worksForFile: targets.includes('files'),
    recurse,
    askForConfirmation,
    refreshPolicy,
  });
}
