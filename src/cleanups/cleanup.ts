import { EventEmitter } from 'node:events';
import { CleanupSettingsSchema, type CleanupSettings, type RefreshPolicy } from '../store/settings.model.js';
import type { CleanupSettingsSink, CleanupSettingsSource } from '../store/settings.js';
import type { FileInfo } from '../tree/file-info.js';
import { shellQuote, type CommandRunner } from '../services/shell.js';
import type { CleanupHost } from './host.js';
import type { CleanupCollection } from './collection.js';
import { CleanupExecutionError } from './errors.js';

export interface CleanupInit extends Partial<CleanupSettings> {
  id: string;
  userDefined?: boolean;
}

const EXECUTED = 'executed';

/**
 * A user-invocable action on one item of the directory tree: a shell command
 * line with `%p` (full path) and `%n` (name) placeholders plus the rules that
 * decide which items it applies to.
 */
export class Cleanup {
  readonly id: string;
  readonly userDefined: boolean;

  title: string;
  command: string;
  active: boolean;
  worksForDir: boolean;
  worksForFile: boolean;
  recurse: boolean;
  askForConfirmation: boolean;
  refreshPolicy: RefreshPolicy;

  private _enabled = false;
  private _host: CleanupHost | null = null;
  private _owner: CleanupCollection | null = null;
  private events = new EventEmitter();

  constructor(init: CleanupInit) {
    this.id = init.id;
    this.userDefined = init.userDefined ?? false;
    this.title = init.title ?? init.id;
    this.command = init.command ?? '';
    this.active = init.active ?? true;
    this.worksForDir = init.worksForDir ?? true;
    this.worksForFile = init.worksForFile ?? false;
    this.recurse = init.recurse ?? false;
    this.askForConfirmation = init.askForConfirmation ?? false;
    this.refreshPolicy = init.refreshPolicy ?? 'none';
  }

  /**
   * Copy of the configuration only. The copy has no host and no listeners;
   * it is meant for save/restore, never for live use.
   */
  clone(): Cleanup {
    const copy = new Cleanup({ id: this.id, userDefined: this.userDefined, ...this.toSettings() });
    copy._enabled = this._enabled;
    return copy;
  }

  get host(): CleanupHost | null {
    return this._host;
  }

  /** Result of the last {@link selectionChanged} call. */
  get enabled(): boolean {
    return this._enabled;
  }

  /** Collection that currently owns this cleanup, if any. */
  get owner(): CleanupCollection | null {
    return this._owner;
  }

  claim(owner: CleanupCollection): void {
    this._owner = owner;
  }

  /** Nothing changes if the new host refuses the registration. */
  attach(host: CleanupHost | null): void {
    if (this._host === host) return;
    const previous = this._host;
    host?.register(this);
    this._host = host;
    previous?.unregister(this);
  }

  destroy(): void {
    this.attach(null);
    this._owner = null;
    this.events.removeAllListeners();
  }

  onExecuted(listener: (cleanup: Cleanup) => void): () => void {
    this.events.on(EXECUTED, listener);
    return () => {
      this.events.off(EXECUTED, listener);
    };
  }

  toSettings(): CleanupSettings {
    return {
      title: this.title,
      command: this.command,
      active: this.active,
      worksForDir: this.worksForDir,
      worksForFile: this.worksForFile,
      recurse: this.recurse,
      askForConfirmation: this.askForConfirmation,
      refreshPolicy: this.refreshPolicy,
    };
  }

  applySettings(settings: CleanupSettings): void {
    this.title = settings.title;
    this.command = settings.command;
    this.active = settings.active;
    this.worksForDir = settings.worksForDir;
    this.worksForFile = settings.worksForFile;
    this.recurse = settings.recurse;
    this.askForConfirmation = settings.askForConfirmation;
    this.refreshPolicy = settings.refreshPolicy;
  }

  /** Missing settings leave the current values untouched. */
  readConfig(source: CleanupSettingsSource): void {
    const saved = source.getCleanup(this.id);
    if (!saved) return;
    this.applySettings(CleanupSettingsSchema.parse(saved));
  }

  saveConfig(sink: CleanupSettingsSink): void {
    sink.setCleanup(this.id, this.toSettings());
  }

  worksFor(item: FileInfo): boolean {
    if (!this.active || this.command.trim() === '') return false;
    return item.isDir ? this.worksForDir : this.worksForFile;
  }

  /** `item` is null when the selection was cleared. */
  selectionChanged(item: FileInfo | null): void {
    this._enabled = item !== null && this.worksFor(item);
  }

  expandVariables(item: FileInfo): string {
    return this.command.replace(/%([pn%])/g, (_match, key: string) => {
      if (key === 'p') return shellQuote(item.path);
      if (key === 'n') return shellQuote(item.name);
      return '%';
    });
  }

  /**
   * Runs the command for `item`; with `recurse` set, first for every
   * subdirectory, deepest first.
   */
  async execute(item: FileInfo, runner: CommandRunner): Promise<void> {
    if (!this.worksFor(item)) {
      throw new Error(`Cleanup '${this.id}' does not apply to ${item.path}`);
    }

    await this.executeRecursive(item, runner);
    this.events.emit(EXECUTED, this);
  }

  private async executeRecursive(item: FileInfo, runner: CommandRunner): Promise<void> {
    if (this.recurse && item.isDir) {
      for (const dir of await item.subdirectories()) {
        await this.executeRecursive(dir, runner);
      }
    }

    const command = this.expandVariables(item);
    const result = await runner.run(command, item.workingDir);
    if (result.exitCode !== 0) {
      throw new CleanupExecutionError(command, result.exitCode, result.stderr);
    }
  }
}
