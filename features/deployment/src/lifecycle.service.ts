/**
 * DeploymentLifecycle - bring the container set up or down
 *
 * Pure delegation to `docker compose`; nothing here decides anything.
 */

import type { CommandRunner, ExecResult } from '@bgctl/runtime';
import { LifecycleError, errorMessage } from '@bgctl/shared';

export interface DeploymentLifecycle {
  up(): Promise<void>;
  down(): Promise<void>;
  /** One opaque line per container, as the runtime prints it */
  listStatus(): Promise<string[]>;
}

export interface DockerComposeOptions {
  envFile: string;
  composeFile: string;
  timeoutMs?: number;
}

export class DockerComposeLifecycle implements DeploymentLifecycle {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: DockerComposeOptions,
  ) {}

  async up(): Promise<void> {
    await this.compose('up', ['up', '-d']);
  }

  async down(): Promise<void> {
    await this.compose('down', ['down']);
  }

  async listStatus(): Promise<string[]> {
    const result = await this.compose('ps', ['ps']);
    return result.stdout.split('\n').filter((line) => line.trim() !== '');
  }

  private async compose(action: string, args: string[]): Promise<ExecResult> {
    const { envFile, composeFile, timeoutMs = 300000 } = this.options;

    let result: ExecResult;
    try {
      result = await this.runner.run('docker', ['compose', '--env-file', envFile, '-f', composeFile, ...args], {
        timeout: timeoutMs,
      });
    } catch (error) {
      throw new LifecycleError(action, errorMessage(error));
    }

    if (result.code !== 0) {
      throw new LifecycleError(action, result.stderr.trim() || `exit code ${result.code}`);
    }
    return result;
  }
}
