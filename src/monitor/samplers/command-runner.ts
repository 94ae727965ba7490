/**
 * Command Runner
 *
 * Capability for running an external tool with a deadline. Samplers only
 * ever spawn processes through this interface so tests can substitute a
 * fake without touching child_process.
 */

import { execFile } from 'node:child_process';
import { SensorUnavailableError, ToolMissingError } from '../errors.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  /** Kill the child and fail with SensorUnavailableError after this many ms */
  timeoutMs: number;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 1024 * 1024;

/**
 * Runs a command without a shell. A missing binary rejects with
 * ToolMissingError, an expired deadline with SensorUnavailableError, and a
 * non-zero exit resolves with its exit code.
 */
export const execCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      {
        encoding: 'utf8',
        timeout: options.timeoutMs,
        killSignal: 'SIGKILL',
        maxBuffer: MAX_OUTPUT_BYTES,
        env: { ...process.env, LC_ALL: 'C' },
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }

        if (error.code === 'ENOENT') {
          reject(new ToolMissingError(command, error));
          return;
        }

        if (error.killed) {
          reject(new SensorUnavailableError(command, `timed out after ${options.timeoutMs}ms`));
          return;
        }

        if (typeof error.code === 'number') {
          resolve({ stdout, stderr, exitCode: error.code });
          return;
        }

        reject(error);
      },
    );
  });
