import type { Cleanup } from './cleanup.js';

/**
 * Registration context cleanups are wired into when added to a live
 * collection (menus, toolbars). Deep copies never have one.
 */
export interface CleanupHost {
  register(cleanup: Cleanup): void;
  unregister(cleanup: Cleanup): void;
}

export class MenuHost implements CleanupHost {
  private cleanups = new Map<string, Cleanup>();

  register(cleanup: Cleanup): void {
    this.cleanups.set(cleanup.id, cleanup);
  }

  unregister(cleanup: Cleanup): void {
    // A newer registration under the same id stays
    if (this.cleanups.get(cleanup.id) === cleanup) {
      this.cleanups.delete(cleanup.id);
    }
  }

  get(id: string): Cleanup | undefined {
    return this.cleanups.get(id);
  }

  getAll(): Cleanup[] {
    return [...this.cleanups.values()];
  }

  getEnabled(): Cleanup[] {
    return this.getAll().filter(c => c.enabled);
  }
}
