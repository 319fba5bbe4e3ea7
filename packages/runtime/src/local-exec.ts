/**
 * @bgctl/runtime - Local Execution
 *
 * Runs the docker CLI on this host. Arguments are passed as an argv array,
 * never through a shell.
 */

import { execFile } from 'node:child_process';

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
  duration: number;
}

export interface ExecOptions {
  timeout?: number;
}

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: ExecOptions): Promise<ExecResult>;
}

export class LocalExec implements CommandRunner {
  /**
   * Resolves with the exit code for commands that ran (including non-zero exits).
   * Rejects when the binary cannot be spawned or the timeout kills it.
   */
  async run(file: string, args: readonly string[], options: ExecOptions = {}): Promise<ExecResult> {
    const { timeout = 60000 } = options;
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      execFile(
        file,
        [...args],
        { timeout, maxBuffer: 10 * 1024 * 1024 },
        (error, stdout, stderr) => {
          if (error && error.killed) {
            reject(new Error(`${file} timed out after ${timeout}ms`));
            return;
          }
          // spawn failures carry a string errno code (ENOENT, EACCES)
          if (error && typeof error.code === 'string') {
            reject(new Error(`Cannot run ${file}: ${error.message}`));
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

let instance: LocalExec | null = null;

export function getLocalExec(): LocalExec {
  if (!instance) {
    instance = new LocalExec();
  }
  return instance;
}
