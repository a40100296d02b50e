import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Cleanup } from '../../src/cleanups/cleanup.js';
import { MenuHost } from '../../src/cleanups/host.js';
import { CleanupExecutionError } from '../../src/cleanups/errors.js';
import { FileInfo } from '../../src/tree/file-info.js';
import type { CommandRunner, CommandResult } from '../../src/services/shell.js';
import type { CleanupSettingsSource } from '../../src/store/settings.js';

function makeRunner(exitCode: number | null = 0, stderr = '') {
  const run = vi.fn<CommandRunner['run']>().mockResolvedValue({ exitCode, stdout: '', stderr } satisfies CommandResult);
  const runner: CommandRunner = { run };
  return { runner, run };
}

const dir = new FileInfo('/home/user/project', 'dir');
const file = new FileInfo('/home/user/project/notes.txt', 'file');

describe('Cleanup', () => {
  describe('defaults', () => {
    it('applies to active directories only', () => {
      const cleanup = new Cleanup({ id: 'x' });
      expect(cleanup.title).toBe('x');
      expect(cleanup.command).toBe('');
      expect(cleanup.active).toBe(true);
      expect(cleanup.worksForDir).toBe(true);
      expect(cleanup.worksForFile).toBe(false);
      expect(cleanup.recurse).toBe(false);
      expect(cleanup.askForConfirmation).toBe(false);
      expect(cleanup.refreshPolicy).toBe('none');
      expect(cleanup.userDefined).toBe(false);
      expect(cleanup.enabled).toBe(false);
      expect(cleanup.host).toBeNull();
    });
  });

  describe('worksFor and selectionChanged', () => {
    it('depends on item kind', () => {
      const cleanup = new Cleanup({ id: 'x', command: 'ls', worksForDir: true, worksForFile: false });
      expect(cleanup.worksFor(dir)).toBe(true);
      expect(cleanup.worksFor(file)).toBe(false);

      cleanup.worksForFile = true;
      expect(cleanup.worksFor(file)).toBe(true);
    });

    it('never applies when inactive or without a command', () => {
      expect(new Cleanup({ id: 'x', command: 'ls', active: false }).worksFor(dir)).toBe(false);
      expect(new Cleanup({ id: 'x', command: '   ' }).worksFor(dir)).toBe(false);
    });

    it('enables for a matching selection and disables when cleared', () => {
      const cleanup = new Cleanup({ id: 'x', command: 'ls' });
      cleanup.selectionChanged(dir);
      expect(cleanup.enabled).toBe(true);

      cleanup.selectionChanged(file);
      expect(cleanup.enabled).toBe(false);

      cleanup.selectionChanged(dir);
      cleanup.selectionChanged(null);
      expect(cleanup.enabled).toBe(false);
    });
  });

  describe('expandVariables', () => {
    it('quotes path and name and unescapes %%', () => {
      const cleanup = new Cleanup({ id: 'x', command: 'rm -rf %p && echo %n 100%%' });
      const item = new FileInfo("/tmp/a b/it's", 'file');

      expect(cleanup.expandVariables(item)).toBe(
        "rm -rf '/tmp/a b/it'\\''s' && echo 'it'\\''s' 100%",
      );
    });

    it('leaves unknown placeholders alone', () => {
      const cleanup = new Cleanup({ id: 'x', command: 'date +%Y' });
      expect(cleanup.expandVariables(dir)).toBe('date +%Y');
    });
  });

  describe('execute', () => {
    it('runs in the directory itself for directories', async () => {
      const { runner, run } = makeRunner();
      const cleanup = new Cleanup({ id: 'x', command: 'make -s clean' });

      await cleanup.execute(dir, runner);

      expect(run).toHaveBeenCalledOnce();
      expect(run).toHaveBeenCalledWith('make -s clean', '/home/user/project');
    });

    it('runs in the parent directory for files', async () => {
      const { runner, run } = makeRunner();
      const cleanup = new Cleanup({ id: 'x', command: 'gzip %n', worksForFile: true });

      await cleanup.execute(file, runner);

      expect(run).toHaveBeenCalledWith("gzip 'notes.txt'", '/home/user/project');
    });

    it('emits executed after success', async () => {
      const { runner } = makeRunner();
      const cleanup = new Cleanup({ id: 'x', command: 'ls' });
      const listener = vi.fn();
      cleanup.onExecuted(listener);

      await cleanup.execute(dir, runner);

      expect(listener).toHaveBeenCalledWith(cleanup);
    });

    it('rejects items it does not apply to', async () => {
      const { runner, run } = makeRunner();
      const cleanup = new Cleanup({ id: 'x', command: 'ls' });

      await expect(cleanup.execute(file, runner)).rejects.toThrow(
        "Cleanup 'x' does not apply to /home/user/project/notes.txt",
      );
      expect(run).not.toHaveBeenCalled();
    });

    it('fails on a non-zero exit code without emitting', async () => {
      const { runner } = makeRunner(2, 'make: *** No rule to make target \'clean\'.\n');
      const cleanup = new Cleanup({ id: 'x', command: 'make clean' });
      const listener = vi.fn();
      cleanup.onExecuted(listener);

      const result = cleanup.execute(dir, runner);
      await expect(result).rejects.toBeInstanceOf(CleanupExecutionError);
      await expect(result).rejects.toHaveProperty('exitCode', 2);
      await expect(result).rejects.toThrow(
        "Command 'make clean' exited with code 2: make: *** No rule to make target 'clean'.",
      );
      expect(listener).not.toHaveBeenCalled();
    });

    it('reports commands killed by a signal', async () => {
      const { runner } = makeRunner(null);
      const cleanup = new Cleanup({ id: 'x', command: 'sleep 100' });

      await expect(cleanup.execute(dir, runner)).rejects.toThrow("Command 'sleep 100' exited with a signal");
    });

    describe('recursive', () => {
      let tmpDir: string;

      beforeEach(async () => {
        tmpDir = await mkdtemp(join(tmpdir(), 'cleanup-test-'));
        await mkdir(join(tmpDir, 'b'));
        await mkdir(join(tmpDir, 'a', 'x'), { recursive: true });
        await writeFile(join(tmpDir, 'a', 'core'), 'dump');
      });

      afterEach(async () => {
        await rm(tmpDir, { recursive: true, force: true });
      });

      it('runs for subdirectories first, depth first', async () => {
        const { runner, run } = makeRunner();
        const cleanup = new Cleanup({ id: 'x', command: 'rm -f core', recurse: true });

        await cleanup.execute(await FileInfo.fromPath(tmpDir), runner);

        expect(run.mock.calls.map(([, cwd]) => cwd)).toEqual([
          join(tmpDir, 'a', 'x'),
          join(tmpDir, 'a'),
          join(tmpDir, 'b'),
          tmpDir,
        ]);
      });

      it('stops at the first failing directory', async () => {
        const { runner, run } = makeRunner(1);
        const cleanup = new Cleanup({ id: 'x', command: 'false', recurse: true });

        await expect(cleanup.execute(await FileInfo.fromPath(tmpDir), runner)).rejects.toBeInstanceOf(CleanupExecutionError);
        expect(run).toHaveBeenCalledOnce();
      });
    });
  });

  describe('clone', () => {
    it('copies settings but not host or listeners', async () => {
      const host = new MenuHost();
      const cleanup = new Cleanup({ id: 'x', title: 'X', command: 'ls', recurse: true, refreshPolicy: 'refresh-this' });
      cleanup.attach(host);
      cleanup.selectionChanged(dir);
      const listener = vi.fn();
      cleanup.onExecuted(listener);

      const copy = cleanup.clone();

      expect(copy).not.toBe(cleanup);
      expect(copy.id).toBe('x');
      expect(copy.toSettings()).toEqual(cleanup.toSettings());
      expect(copy.enabled).toBe(true);
      expect(copy.host).toBeNull();
      expect(host.get('x')).toBe(cleanup);

      const { runner } = makeRunner();
      copy.recurse = false;
      await copy.execute(dir, runner);
      expect(listener).not.toHaveBeenCalled();
    });

    it('keeps the user-defined flag', () => {
      const copy = new Cleanup({ id: 'u', userDefined: true }).clone();
      expect(copy.userDefined).toBe(true);
    });
  });

  describe('host', () => {
    it('registers on attach and unregisters on destroy', () => {
      const host = new MenuHost();
      const cleanup = new Cleanup({ id: 'x' });

      cleanup.attach(host);
      expect(host.get('x')).toBe(cleanup);
      expect(cleanup.host).toBe(host);

      cleanup.destroy();
      expect(host.get('x')).toBeUndefined();
      expect(cleanup.host).toBeNull();
    });

    it('moves between hosts', () => {
      const first = new MenuHost();
      const second = new MenuHost();
      const cleanup = new Cleanup({ id: 'x' });

      cleanup.attach(first);
      cleanup.attach(second);

      expect(first.get('x')).toBeUndefined();
      expect(second.get('x')).toBe(cleanup);
    });

    it('keeps the current host when a new host refuses', () => {
      const current = new MenuHost();
      const cleanup = new Cleanup({ id: 'x' });
      cleanup.attach(current);

      expect(() => cleanup.attach({
        register: () => {
          throw new Error('menu full');
        },
        unregister: () => undefined,
      })).toThrow('menu full');

      expect(cleanup.host).toBe(current);
      expect(current.get('x')).toBe(cleanup);
    });

    it('drops listeners on destroy', async () => {
      const cleanup = new Cleanup({ id: 'x', command: 'ls' });
      const listener = vi.fn();
      cleanup.onExecuted(listener);
      cleanup.destroy();

      await cleanup.execute(dir, makeRunner().runner);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('config', () => {
    const saved = {
      title: 'Saved',
      command: 'du -sh %p',
      active: false,
      worksForDir: false,
      worksForFile: true,
      recurse: true,
      askForConfirmation: true,
      refreshPolicy: 'assume-deleted' as const,
    };

    it('reads saved settings by id', () => {
      const source: CleanupSettingsSource = { getCleanup: id => (id === 'x' ? saved : undefined) };
      const cleanup = new Cleanup({ id: 'x' });

      cleanup.readConfig(source);

      expect(cleanup.toSettings()).toEqual(saved);
    });

    it('keeps defaults when nothing was saved', () => {
      const source: CleanupSettingsSource = { getCleanup: () => undefined };
      const cleanup = new Cleanup({ id: 'x', command: 'ls' });

      cleanup.readConfig(source);

      expect(cleanup.command).toBe('ls');
    });

    it('rejects invalid saved settings', () => {
      const source: CleanupSettingsSource = { getCleanup: () => JSON.parse('{"title": 42}') };
      const cleanup = new Cleanup({ id: 'x', command: 'ls' });

      expect(() => cleanup.readConfig(source)).toThrow();
      expect(cleanup.command).toBe('ls');
    });

    it('saves settings under its id', () => {
      const setCleanup = vi.fn();
      const cleanup = new Cleanup({ id: 'x', ...saved });

      cleanup.saveConfig({ setCleanup });

      expect(setCleanup).toHaveBeenCalledWith('x', saved);
    });
  });
});
