export class DuplicateCleanupError extends Error {
  readonly cleanupId: string;

  constructor(cleanupId: string) {
    super(`Cleanup '${cleanupId}' is already in this collection`);
    this.name = 'DuplicateCleanupError';
    this.cleanupId = cleanupId;
  }
}

export class CleanupOwnedError extends Error {
  readonly cleanupId: string;

  constructor(cleanupId: string) {
    super(`Cleanup '${cleanupId}' already belongs to another collection`);
    this.name = 'CleanupOwnedError';
    this.cleanupId = cleanupId;
  }
}

export class CleanupCopyError extends Error {
  constructor(cleanupId: string, cause: unknown) {
    super(`Failed to copy cleanup '${cleanupId}': ${toError(cause).message}`, { cause });
    this.name = 'CleanupCopyError';
  }
}

export class CleanupExecutionError extends Error {
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, stderr = '') {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
    super(`Command '${command}' exited with ${exitCode === null ? 'a signal' : `code ${exitCode}`}${detail}`);
    this.name = 'CleanupExecutionError';
    this.exitCode = exitCode;
  }
}

/** One cleanup's failure during a broadcast. */
export interface BroadcastFailure {
  cleanupId: string;
  error: Error;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
