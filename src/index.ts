#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './utils/config.js';
import { initCommand } from './commands/init.js';
import { listCommand } from './commands/list.js';
import { runCommand } from './commands/run.js';
import { configureCommand } from './commands/configure.js';
import { pruneCommand } from './commands/prune.js';
import { launchHub } from './ui/hub.js';
import { SettingsStore } from './store/settings.js';
import { toError } from './cleanups/errors.js';
import { VERSION } from './utils/version.js';

const program = new Command()
  .name('dirtidy')
  .description('Configurable cleanup actions for directory trees')
  .version(VERSION)
  .option('-s, --settings <path>', 'Settings directory');

async function config() {
  const opts = program.opts<{ settings?: string }>();
  return loadConfig({ settings: { path: opts.settings } });
}

program.command('init')
  .description('Write the default cleanups to the settings file')
  .option('--force', 'Overwrite existing settings')
  .action(async (opts: { force?: boolean }) => {
    await initCommand(opts, await config());
  });

program.command('list')
  .description('List cleanups')
  .option('--format <format>', 'table|json|markdown', 'table')
  .option('--all', 'Include inactive cleanups')
  .action(async (opts: { format?: string; all?: boolean }) => {
    await listCommand(opts, await config());
  });

program.command('run <cleanup> <path>')
  .description('Run a cleanup on a file or directory')
  .option('-y, --yes', 'Do not ask for confirmation')
  .option('--dry-run', 'Print the expanded command without running it')
  .action(async (cleanupId: string, path: string, opts: { yes?: boolean; dryRun?: boolean }) => {
    await runCommand(cleanupId, path, opts, await config());
  });

program.command('configure [cleanup]')
  .description('Edit a cleanup')
  .action(async (cleanupId: string | undefined) => {
    await configureCommand(cleanupId, await config());
  });

program.command('prune')
  .description('Remove saved settings of cleanups that no longer exist')
  .option('--dry-run', 'Only list what would be removed')
  .action(async (opts: { dryRun?: boolean }) => {
    await pruneCommand(opts, await config());
  });

// No subcommand → launch interactive hub
program.action(async () => {
  try {
    const cfg = await config();
    const settings = await SettingsStore.loadOrNull(cfg.settings.path);
    if (!settings) {
      console.error(chalk.red("Settings not found. Run 'dirtidy init' first."));
      process.exit(1);
    }
    await launchHub(settings, cfg);
  } catch (error) {
    if (toError(error).name === 'ExitPromptError') {
      // User cancelled with Ctrl+C
      process.exit(0);
    }
    throw error;
  }
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(toError(error).message));
  process.exit(1);
});
