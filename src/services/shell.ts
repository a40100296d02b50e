import { execFile } from 'node:child_process';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/** Runs one shell command line in a working directory. */
export interface CommandRunner {
  run(command: string, cwd: string): Promise<CommandResult>;
}

export class ShellRunner implements CommandRunner {
  private shell: string;

  constructor(shell: string) {
    this.shell = shell;
  }

  run(command: string, cwd: string): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(this.shell, ['-c', command], { cwd }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        // Non-zero exit is a result; failing to spawn is not
        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
        } else if (error.signal) {
          resolve({ exitCode: null, stdout, stderr });
        } else {
          reject(error);
        }
      });
    });
  }
}

/** Quotes a value for a POSIX shell command line. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
