import type { Config } from '../models/config.model.js';
import type { SettingsStore } from '../store/settings.js';
import { CleanupCollection } from './collection.js';
import type { CleanupHost } from './host.js';
import type { BroadcastFailure } from './errors.js';

export interface LoadedCleanups {
  collection: CleanupCollection;
  failures: BroadcastFailure[];
}

/** Builds the standard and user cleanups and reads their saved settings. */
export function loadCleanups(config: Config, settings: SettingsStore, host: CleanupHost | null = null): LoadedCleanups {
  const collection = new CleanupCollection(host);
  collection.addStandardActions();
  collection.addUserActions(config.cleanups.userCleanups);
  const failures = collection.broadcastReadConfig(settings);
  return { collection, failures };
}

/**
 * Drops saved settings of cleanups the collection no longer has, e.g. user
 * cleanups above a lowered `userCleanups` count. Returns the dropped ids.
 */
export function pruneSettings(collection: CleanupCollection, settings: SettingsStore): string[] {
  const stale = settings.getCleanupIds().filter(id => !collection.has(id));
  for (const id of stale) {
    settings.removeCleanup(id);
  }
  return stale;
}
