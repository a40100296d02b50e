import { Cleanup, type CleanupInit } from './cleanup.js';

export const USER_CLEANUP_PREFIX = 'cleanup_user_defined_';

const STANDARD_CLEANUPS: CleanupInit[] = [
  {
    id: 'cleanup_open_in_file_manager',
    title: 'Open in File Manager',
    command: 'xdg-open %p',
    worksForFile: true,
    refreshPolicy: 'none',
  },
  {
    id: 'cleanup_open_in_terminal',
    title: 'Open in Terminal',
    command: 'x-terminal-emulator',
    worksForFile: true,
    refreshPolicy: 'none',
  },
  {
    id: 'cleanup_compress_subtree',
    title: 'Compress',
    command: 'cd .. && tar cjvf %n.tar.bz2 %n && rm -rf %n',
    askForConfirmation: true,
    refreshPolicy: 'refresh-parent',
  },
  {
    id: 'cleanup_make_clean',
    title: 'make clean',
    command: 'make -s clean',
    refreshPolicy: 'refresh-this',
  },
  {
    id: 'cleanup_delete_trash',
    title: 'Delete Trash Files',
    command: 'rm -f *.o *~ *.bak *.auto core',
    recurse: true,
    refreshPolicy: 'refresh-this',
  },
  {
    id: 'cleanup_hard_delete',
    title: 'Delete (no way to undelete!)',
    command: 'rm -rf %p',
    worksForFile: true,
    askForConfirmation: true,
    refreshPolicy: 'assume-deleted',
  },
];

export function createStandardCleanups(): Cleanup[] {
  return STANDARD_CLEANUPS.map(init => new Cleanup(init));
}

export function createUserCleanup(number: number): Cleanup {
  return new Cleanup({
    id: `${USER_CLEANUP_PREFIX}${number}`,
    userDefined: true,
    title: `User Defined Cleanup #${number}`,
    command: '',
    active: false,
  });
}
