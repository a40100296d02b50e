import { stat, readdir } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

export type FileKind = 'dir' | 'file' | 'other';

/**
 * One item of the browsed directory tree, as cleanups see it.
 */
export class FileInfo {
  readonly path: string;
  readonly name: string;
  readonly kind: FileKind;
  readonly size: number;

  constructor(path: string, kind: FileKind, size = 0) {
    this.path = path;
    this.name = basename(path) || path;
    this.kind = kind;
    this.size = size;
  }

  static async fromPath(path: string): Promise<FileInfo> {
    const absolute = resolve(path);
    const stats = await stat(absolute);
    const kind: FileKind = stats.isDirectory() ? 'dir' : stats.isFile() ? 'file' : 'other';
    return new FileInfo(absolute, kind, stats.size);
  }

  get isDir(): boolean {
    return this.kind === 'dir';
  }

  /** Directory a command for this item runs in. */
  get workingDir(): string {
    return this.isDir ? this.path : dirname(this.path);
  }

  /** Direct subdirectories, sorted by name. Empty for non-directories. */
  async subdirectories(): Promise<FileInfo[]> {
    if (!this.isDir) return [];
    const entries = await readdir(this.path, { withFileTypes: true });
    return entries
      .filter(e => e.isDirectory())
      .map(e => e.name)
      .sort()
      .map(name => new FileInfo(join(this.path, name), 'dir'));
  }
}
