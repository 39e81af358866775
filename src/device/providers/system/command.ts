/**
 * Command Runner
 *
 * Runs helper binaries without a shell. Commands are asynchronous so a
 * provider timeout can fire while one is still running.
 */

import { execFile } from 'node:child_process';
import { CommandError } from '../../errors.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

export interface CommandOptions {
  timeoutMs?: number;
  env?: Record<string, string>;
}

/**
 * `code` on an execFile error is the exit status, or an errno string such as
 * ENOENT when the binary never ran. A killed process carries neither.
 */
export function commandFailure(command: string, error: Error & { code?: unknown }, stdout: string): CommandError {
  const exitCode = typeof error.code === 'number' ? error.code : undefined;
  return new CommandError(command, error, { stdout, exitCode });
}

export function runCommand(file: string, args: string[] = [], options: CommandOptions = {}): Promise<string> {
  const command = [file, ...args].join(' ');

  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      {
        encoding: 'utf8',
        timeout: options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
        maxBuffer: 4 * 1024 * 1024,
        env: options.env ? { ...process.env, ...options.env } : process.env,
      },
      (error, stdout) => {
        if (error) {
          reject(commandFailure(command, error, stdout));
          return;
        }
        resolve(stdout);
      },
    );
  });
}
