/**
 * Thin process runner used by the git and docker operations
 */

import { execa } from 'execa';

/**
 * Captured result of one command; a non-zero exit is data, not an exception
 */
export interface ShellResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ShellOptions {
  cwd?: string;
}

export interface Shell {
  run(file: string, args: string[], options?: ShellOptions): Promise<ShellResult>;
}

export const execaShell: Shell = {
  async run(file: string, args: string[], options: ShellOptions = {}): Promise<ShellResult> {
    const result = await execa(file, args, { cwd: options.cwd, reject: false });
    return {
      command: result.command,
      // Spawn failures (binary not found) carry no exit code
      exitCode: result.exitCode ?? 1,
      stdout: result.stdout,
      stderr: result.stderr
    };
  }
};
