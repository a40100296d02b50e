import boxen from 'boxen';
import chalk from 'chalk';
import type { CleanupCollection } from '../cleanups/collection.js';
import type { ActivityTracker } from '../services/activity.js';

export function renderStatusBox(collection: CleanupCollection, tracker: ActivityTracker): void {
  const all = collection.cleanups();
  const active = all.filter(c => c.active);
  const user = all.filter(c => c.userDefined);
  const userActive = user.filter(c => c.active);

  const lines = [
    `${chalk.bold(`${active.length} active`)} · ${all.length} cleanups`,
    `User defined: ${userActive.length}/${user.length} in use`,
    `Activity: ${tracker.points} points`,
  ];

  if (tracker.shouldAskForFeedback()) {
    lines.push('', chalk.yellow('You use dirtidy a lot. Feedback is welcome!'));
  }

  const box = boxen(lines.join('\n'), {
    padding: 1,
    borderColor: 'cyan',
    title: 'dirtidy',
    titleAlignment: 'left',
  });

  console.log(box);
}
