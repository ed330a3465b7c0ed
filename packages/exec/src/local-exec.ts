/**
 * @wp-promote/exec - Local Execution
 *
 * Runs external tools (wp, rsync, tar) as child processes. Arguments are
 * passed as an argv array, never through a shell, so URLs and SQL reach
 * the tool verbatim.
 */

import { execFile } from 'node:child_process';
import {
  CommandError,
  type CommandRunner,
  type ExecOptions,
  type ExecResult,
} from '@wp-promote/shared';

const DEFAULT_TIMEOUT = 30 * 60 * 1000;
const MAX_BUFFER = 64 * 1024 * 1024;

export class LocalExec implements CommandRunner {
  async exec(file: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const { timeout = DEFAULT_TIMEOUT, cwd, env } = options;
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        {
          cwd,
          timeout,
          maxBuffer: MAX_BUFFER,
          env: env ? { ...process.env, ...env } : process.env,
        },
        (error, stdout, stderr) => {
          if (error && error.killed) {
            reject(new Error(`${file} timed out after ${timeout}ms`));
            return;
          }
          if (error && typeof error.code === 'string') {
            // ENOENT and friends: the tool itself could not be started
            reject(new Error(`${file} could not be started: ${error.code}`));
            return;
          }

          resolve({
            stdout: stdout || '',
            stderr: stderr || '',
            code: error ? (typeof error.code === 'number' ? error.code : 1) : 0,
            duration: Date.now() - startTime,
          });
        },
      );
    });
  }
}

/**
 * Run a command and throw CommandError on a non-zero exit.
 */
export async function runChecked(
  runner: CommandRunner,
  file: string,
  args: string[],
  options?: ExecOptions,
): Promise<ExecResult> {
  const result = await runner.exec(file, args, options);
  if (result.code !== 0) {
    throw new CommandError(`${file} ${args[0] ?? ''}`.trim(), result.code, result.stderr || result.stdout);
  }
  return result;
}

// ============================================================================
// Singleton & Factory
// ============================================================================

let instance: LocalExec | null = null;

export function getLocalExec(): LocalExec {
  if (!instance) {
    instance = new LocalExec();
  }
  return instance;
}
