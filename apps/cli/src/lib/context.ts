/**
 * @bgctl/cli - Command Context
 *
 * What every command handler gets: the logger, output sinks, and the
 * deployment services built from settings after the pre-flight check.
 */

import type { Command } from 'commander';
import ora from 'ora';
import { createOperatorLogger, type LoggerLike } from '@bgctl/logger';
import {
  createDeploymentServices,
  verifyDeploymentFiles,
  type DeploymentOverrides,
  type DeploymentServices,
} from '@bgctl/deployment';
import { loadLoggingSettings, loadSettings, type GlobalFlags } from './config.js';

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  logger?: LoggerLike;
  overrides?: DeploymentOverrides;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Defaults to whether stderr is a terminal */
  spinners?: boolean;
  /** Route log lines to stderr (machine-readable stdout) */
  quietStdout?: boolean;
  /** Builds the logger once log routing is known; ignored when `logger` is given */
  createLogger?: (options: { stderr: boolean }) => LoggerLike;
}

export class CommandContext {
  readonly env: NodeJS.ProcessEnv;
  private readonly overrides: DeploymentOverrides;
  private readonly stdout: (text: string) => void;
  private readonly stderr: (text: string) => void;
  private readonly spinners: boolean;
  private readonly injectedLogger: LoggerLike | undefined;
  private readonly createLogger: (options: { stderr: boolean }) => LoggerLike;
  private builtLogger: LoggerLike | undefined;
  private logsToStderr: boolean;

  constructor(deps: CliDependencies = {}) {
    this.env = deps.env ?? process.env;
    this.overrides = deps.overrides ?? {};
    this.stdout = deps.stdout ?? ((text) => process.stdout.write(text));
    this.stderr = deps.stderr ?? ((text) => process.stderr.write(text));
    this.spinners = deps.spinners ?? Boolean(process.stderr.isTTY);
    this.injectedLogger = deps.logger;
    this.logsToStderr = deps.quietStdout ?? false;
    this.createLogger =
      deps.createLogger ??
      (({ stderr }) => {
        const logging = loadLoggingSettings(this.env);
        return createOperatorLogger({ level: logging.logLevel, logDir: logging.logDir, stderr });
      });
  }

  get logger(): LoggerLike {
    if (this.injectedLogger) return this.injectedLogger;
    if (!this.builtLogger) {
      this.builtLogger = this.createLogger({ stderr: this.logsToStderr });
    }
    return this.builtLogger;
  }

  /** For commands whose stdout is machine-readable */
  routeLogsToStderr(): void {
    if (this.logsToStderr) return;
    this.logsToStderr = true;
    this.builtLogger = undefined;
  }

  /** Raw text to stdout */
  write(text: string): void {
    this.stdout(text);
  }

  /** One line to stdout */
  print(line: string): void {
    this.stdout(`${line}\n`);
  }

  /** Raw text to stderr (commander help and errors) */
  printError(text: string): void {
    this.stderr(text.endsWith('\n') ? text : `${text}\n`);
  }

  async services(command: Command): Promise<DeploymentServices> {
    const settings = loadSettings(this.env, command.optsWithGlobals<GlobalFlags>());
    await verifyDeploymentFiles(settings, this.logger);
    return createDeploymentServices(settings, this.logger, this.overrides);
  }

  spinner(text: string): ora.Ora {
    return ora({ text, isSilent: !this.spinners });
  }
}
