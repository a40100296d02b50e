import { readFile, writeFile, rename, mkdir, unlink } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { SettingsFileSchema, CleanupSettingsSchema, type SettingsFile, type CleanupSettings } from './settings.model.js';

/**
 * Where cleanups read their persisted configuration from.
 * {@link SettingsStore} is the file-backed implementation.
 */
export interface CleanupSettingsSource {
  getCleanup(id: string): CleanupSettings | undefined;
}

export interface CleanupSettingsSink {
  setCleanup(id: string, settings: CleanupSettings): void;
}

export class SettingsStore implements CleanupSettingsSource, CleanupSettingsSink {
  private data: SettingsFile;
  private filePath: string;

  private constructor(data: SettingsFile, filePath: string) {
    this.data = data;
    this.filePath = filePath;
  }

  static async init(settingsPath: string): Promise<SettingsStore> {
    const filePath = join(settingsPath, 'settings.json');
    const data: SettingsFile = {
      version: 1,
      cleanups: {},
      activity: { points: 0 },
    };
    const store = new SettingsStore(data, filePath);
    await store.save();
    return store;
  }

  static async load(settingsPath: string): Promise<SettingsStore> {
    const filePath = join(settingsPath, 'settings.json');
    const raw = await readFile(filePath, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    const data = SettingsFileSchema.parse(parsed);
    return new SettingsStore(data, filePath);
  }

  static async loadOrNull(settingsPath: string): Promise<SettingsStore | null> {
    try {
      return await SettingsStore.load(settingsPath);
    } catch (error) {
      if (isFileNotFound(error)) return null;
      throw error;
    }
  }

  /** In-memory store that is never written; `save()` on it is a no-op. */
  static memory(): SettingsStore {
    return new SettingsStore(SettingsFileSchema.parse({}), '');
  }

  get path(): string {
    return this.filePath;
  }

  async save(): Promise<void> {
    if (!this.filePath) return;
    const dir = dirname(this.filePath);
    await mkdir(dir, { recursive: true });
    const tmpPath = `${this.filePath}.${randomUUID()}.tmp`;
    const json = JSON.stringify(this.data, null, 2);
    await writeFile(tmpPath, json, 'utf-8');
    try {
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }

  getCleanup(id: string): CleanupSettings | undefined {
    const settings = this.data.cleanups[id];
    return settings ? { ...settings } : undefined;
  }

  setCleanup(id: string, settings: CleanupSettings): void {
    this.data.cleanups[id] = CleanupSettingsSchema.parse(settings);
  }

  removeCleanup(id: string): boolean {
    if (!(id in this.data.cleanups)) return false;
    delete this.data.cleanups[id];
    return true;
  }

  getCleanupIds(): string[] {
    return Object.keys(this.data.cleanups);
  }

  getActivityPoints(): number {
    return this.data.activity.points;
  }

  setActivityPoints(points: number): void {
    this.data.activity.points = points;
  }
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
