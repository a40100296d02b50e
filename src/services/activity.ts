import type { SettingsStore } from '../store/settings.js';
import type { CleanupCollection } from '../cleanups/collection.js';

/**
 * Sums user activity points and keeps the total in the settings store.
 */
export class ActivityTracker {
  private settings: SettingsStore;
  private threshold: number;

  constructor(settings: SettingsStore, threshold: number) {
    this.settings = settings;
    this.threshold = threshold;
  }

  get points(): number {
    return this.settings.getActivityPoints();
  }

  trackActivity(points: number): void {
    this.settings.setActivityPoints(this.points + points);
  }

  /** Subscribes to the collection's activity signal; returns the unsubscribe. */
  watch(collection: CleanupCollection): () => void {
    return collection.onUserActivity(points => this.trackActivity(points));
  }

  shouldAskForFeedback(): boolean {
    return this.points >= this.threshold;
  }
}
