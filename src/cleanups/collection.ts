import { EventEmitter } from 'node:events';
import type { CleanupSettingsSink, CleanupSettingsSource } from '../store/settings.js';
import type { FileInfo } from '../tree/file-info.js';
import type { Cleanup } from './cleanup.js';
import type { CleanupHost } from './host.js';
import { createStandardCleanups, createUserCleanup } from './standard.js';
import { CleanupCopyError, CleanupOwnedError, DuplicateCleanupError, toError, type BroadcastFailure } from './errors.js';

/** Activity points reported each time a cleanup finishes. */
export const CLEANUP_ACTIVITY_POINTS = 10;

const USER_ACTIVITY = 'userActivity';

/**
 * Ordered set of cleanups: the standard ones plus a number of user-defined
 * ones. The collection owns its cleanups; removing or clearing destroys them.
 *
 * Ids are unique. {@link add} rejects a duplicate id with
 * {@link DuplicateCleanupError} instead of replacing the existing entry.
 */
export class CleanupCollection implements Iterable<Cleanup> {
  private entries: Cleanup[] = [];
  private index = new Map<string, number>();
  private nextUserNumber = 1;
  private _host: CleanupHost | null;
  private events = new EventEmitter();

  /** Every cleanup added later is registered with `host`. */
  constructor(host: CleanupHost | null = null) {
    this._host = host;
  }

  /**
   * Deep copy for save/restore. The copy and its cleanups have no host and
   * no listeners; do not wire it into the live UI.
   */
  static copyOf(src: CleanupCollection): CleanupCollection {
    const copy = new CleanupCollection();
    copy.assign(src);
    return copy;
  }

  clone(): CleanupCollection {
    return CleanupCollection.copyOf(this);
  }

  /**
   * Replaces this collection's content with a deep copy of `src`. Drops the
   * host. If a cleanup cannot be copied the collection is left empty and
   * {@link CleanupCopyError} is thrown.
   */
  assign(src: CleanupCollection): this {
    if (src === this) return this;

    const copies: Cleanup[] = [];
    let failure: CleanupCopyError | null = null;
    for (const cleanup of src.entries) {
      try {
        copies.push(cleanup.clone());
      } catch (error) {
        failure = new CleanupCopyError(cleanup.id, error);
        break;
      }
    }

    this.releaseAll();
    this._host = null;
    this.nextUserNumber = 1;

    if (failure) {
      for (const copy of copies) copy.destroy();
      throw failure;
    }

    for (const copy of copies) {
      this.add(copy);
    }
    this.nextUserNumber = src.nextUserNumber;
    return this;
  }

  get host(): CleanupHost | null {
    return this._host;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Number the next user-defined cleanup will get. Only {@link assign} lowers it. */
  get nextUserCleanupNumber(): number {
    return this.nextUserNumber;
  }

  /**
   * Takes ownership of `cleanup`. A cleanup owned by another collection is
   * rejected with {@link CleanupOwnedError}. If the host refuses the
   * registration the collection is left unchanged.
   */
  add(cleanup: Cleanup): void {
    if (this.index.has(cleanup.id)) {
      throw new DuplicateCleanupError(cleanup.id);
    }
    if (cleanup.owner !== null) {
      throw new CleanupOwnedError(cleanup.id);
    }

    cleanup.attach(this._host);
    cleanup.claim(this);
    this.entries.push(cleanup);
    this.index.set(cleanup.id, this.entries.length - 1);
    cleanup.onExecuted(() => this.cleanupExecuted());
  }

  /**
   * Adds the built-in cleanups. Not idempotent: a second call throws
   * {@link DuplicateCleanupError}, so clear first when reloading.
   */
  addStandardActions(): void {
    for (const cleanup of createStandardCleanups()) {
      this.add(cleanup);
    }
  }

  /**
   * A number is used up as soon as its cleanup is created, even when adding
   * it fails, so a taken id is skipped on the next call.
   */
  addUserActions(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`User cleanup count must be a non-negative integer, got ${count}`);
    }
    for (let i = 0; i < count; i++) {
      const cleanup = createUserCleanup(this.nextUserNumber++);
      this.add(cleanup);
    }
  }

  lookup(id: string): Cleanup | undefined {
    const position = this.index.get(id);
    return position === undefined ? undefined : this.entries[position];
  }

  get(id: string): Cleanup | undefined {
    return this.lookup(id);
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  remove(id: string): boolean {
    const position = this.index.get(id);
    if (position === undefined) return false;

    const [removed] = this.entries.splice(position, 1);
    this.rebuildIndex();
    removed?.destroy();
    return true;
  }

  /** Destroys every cleanup. User cleanup numbering continues where it was. */
  clear(): void {
    this.releaseAll();
  }

  /** Destroys every cleanup and drops activity listeners. */
  destroy(): void {
    this.releaseAll();
    this.events.removeAllListeners();
  }

  /** Shallow copy of the cleanups in presentation order. */
  cleanups(): Cleanup[] {
    return [...this.entries];
  }

  [Symbol.iterator](): Iterator<Cleanup> {
    return this.cleanups()[Symbol.iterator]();
  }

  broadcastReadConfig(source: CleanupSettingsSource): BroadcastFailure[] {
    return this.broadcast(cleanup => cleanup.readConfig(source));
  }

  broadcastSaveConfig(sink: CleanupSettingsSink): BroadcastFailure[] {
    return this.broadcast(cleanup => cleanup.saveConfig(sink));
  }

  /** `item` is null when the selection was cleared; it is passed on as such. */
  broadcastSelectionChanged(item: FileInfo | null): BroadcastFailure[] {
    return this.broadcast(cleanup => cleanup.selectionChanged(item));
  }

  onUserActivity(listener: (points: number) => void): () => void {
    this.events.on(USER_ACTIVITY, listener);
    return () => {
      this.events.off(USER_ACTIVITY, listener);
    };
  }

  protected cleanupExecuted(): void {
    this.events.emit(USER_ACTIVITY, CLEANUP_ACTIVITY_POINTS);
  }

  private broadcast(fn: (cleanup: Cleanup) => void): BroadcastFailure[] {
    const failures: BroadcastFailure[] = [];
    for (const cleanup of this.cleanups()) {
      try {
        fn(cleanup);
      } catch (error) {
        failures.push({ cleanupId: cleanup.id, error: toError(error) });
      }
    }
    return failures;
  }

  private releaseAll(): void {
    const released = this.entries;
    this.entries = [];
    this.index.clear();
    for (const cleanup of released) {
      cleanup.destroy();
    }
  }

  private rebuildIndex(): void {
    this.index.clear();
    this.entries.forEach((cleanup, position) => this.index.set(cleanup.id, position));
  }
}
