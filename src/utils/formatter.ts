import Table from 'cli-table3';
import chalk from 'chalk';
import type { Cleanup } from '../cleanups/cleanup.js';

export type OutputFormat = 'table' | 'json' | 'markdown';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'table' || value === 'json' || value === 'markdown';
}

export function describeTargets(cleanup: Cleanup): string {
  const targets: string[] = [];
  if (cleanup.worksForDir) targets.push('dirs');
  if (cleanup.worksForFile) targets.push('files');
  return targets.join(', ') || '—';
}

export function formatCleanupTable(cleanups: Cleanup[], format: OutputFormat = 'table'): string {
  if (format === 'json') {
    return JSON.stringify(cleanups.map(c => ({
      id: c.id,
      title: c.title,
      command: c.command,
      active: c.active,
      userDefined: c.userDefined,
      worksForDir: c.worksForDir,
      worksForFile: c.worksForFile,
      recurse: c.recurse,
      askForConfirmation: c.askForConfirmation,
      refreshPolicy: c.refreshPolicy,
    })), null, 2);
  }

  if (format === 'markdown') {
    const lines = ['| ID | Title | Command | Works for | Active |', '|----|-------|---------|-----------|--------|'];
    for (const c of cleanups) {
      lines.push(`| ${c.id} | ${c.title} | \`${c.command || '—'}\` | ${describeTargets(c)} | ${c.active ? 'yes' : 'no'} |`);
    }
    return lines.join('\n');
  }

  // table format
  const isTTY = process.stdout.isTTY;
  if (!isTTY) {
    // Plain text for non-TTY
    return cleanups.map(c =>
      `${c.id}\t${c.title}\t${c.command || '—'}\t${c.active ? 'active' : 'inactive'}`
    ).join('\n');
  }

  const table = new Table({
    head: [
      chalk.bold('ID'),
      chalk.bold('Title'),
      chalk.bold('Command'),
      chalk.bold('Works for'),
      chalk.bold('Active'),
    ],
    colWidths: [34, 30, 40, 14, 8],
    wordWrap: true,
  });

  for (const c of cleanups) {
    table.push([
      c.id,
      c.title.slice(0, 28),
      c.command || '—',
      describeTargets(c),
      c.active ? chalk.green('yes') : chalk.dim('no'),
    ]);
  }

  return table.toString();
}

export function formatFailures(failures: { cleanupId: string; error: Error }[]): string[] {
  return failures.map(f => `${f.cleanupId}: ${f.error.message}`);
}
