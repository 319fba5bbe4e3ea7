/**
 * @bgctl/cli - Commander Program Definition
 *
 * bgctl: Blue/Green deployment control
 *
 * start | stop | status | switch | reload | chaos | heal
 *
 * Handlers throw; `runCli` is the only place outcomes become exit codes.
 */

import { Command, CommanderError } from 'commander';
import { BlueGreenError, errorMessage, getVersion } from '@bgctl/shared';
import { createChaosCommand, createHealCommand } from './commands/chaos.cmd.js';
import { createStartCommand, createStopCommand } from './commands/lifecycle.cmd.js';
import { createStatusCommand } from './commands/status.cmd.js';
import { createReloadCommand, createSwitchCommand } from './commands/switch.cmd.js';
import { CommandContext, type CliDependencies } from './lib/context.js';
import { usage } from './lib/formatter.js';

export { CommandContext, type CliDependencies } from './lib/context.js';
export { loadSettings, loadLoggingSettings, type GlobalFlags } from './lib/config.js';
export * from './lib/formatter.js';

// ============================================================================
// Program Factory
// ============================================================================

export function createCLI(context: CommandContext): Command {
  const program = new Command();

  program
    .name('bgctl')
    .description('Blue/Green deployment control: switch pools, reload nginx, inject chaos')
    .version(getVersion())
    .option('--env-file <path>', 'Deployment env file (ACTIVE_POOL, ports)')
    .option('--compose-file <path>', 'Docker Compose file');

  program.addCommand(createStartCommand(context));
  program.addCommand(createStopCommand(context));
  program.addCommand(createStatusCommand(context));
  program.addCommand(createSwitchCommand(context));
  program.addCommand(createReloadCommand(context));
  program.addCommand(createChaosCommand(context));
  program.addCommand(createHealCommand(context));

  // --json output must stay parseable: decided after parsing so every spelling counts
  program.hook('preAction', (_program, actionCommand) => {
    if (actionCommand.opts<{ json?: boolean }>().json) {
      context.routeLogsToStderr();
    }
  });

  // addCommand() copies no settings: every command throws instead of exiting
  for (const command of [program, ...program.commands]) {
    command.exitOverride().configureOutput({
      writeOut: (text) => context.write(text),
      writeErr: (text) => context.printError(text),
    });
  }

  return program;
}

// ============================================================================
// Dispatcher
// ============================================================================

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const context = new CommandContext(deps);

  if (argv.length <= 2) {
    context.printError(usage());
    return 1;
  }

  try {
    await createCLI(context).parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version
      if (error.exitCode === 0) return 0;
      context.printError(usage());
      return 1;
    }
    if (error instanceof BlueGreenError) {
      context.logger.error(error.message, error.toJSON());
      return 1;
    }
    context.logger.error(errorMessage(error));
    return 1;
  }
}
