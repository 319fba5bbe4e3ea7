/**
 * @bgctl/cli - Switch / Reload Commands
 */

import { Command } from 'commander';
import { parsePool } from '@bgctl/shared';
import type { CommandContext } from '../lib/context.js';
import { formatReloadResult, formatSwitchResult } from '../lib/formatter.js';

export function createSwitchCommand(context: CommandContext): Command {
  return new Command('switch')
    .description("Switch the active pool ('blue' or 'green') and reload nginx")
    .argument('<pool>', "Target pool: 'blue' or 'green'")
    .action(async (pool: string, _options: Record<string, unknown>, command: Command) => {
      // rejected before any file is touched
      const target = parsePool(pool);
      const { switcher } = await context.services(command);

      const result = await switcher.switchTo(target);
      context.print(formatSwitchResult(result));
    });
}

export function createReloadCommand(context: CommandContext): Command {
  return new Command('reload')
    .description('Re-render the nginx config from the env file and reload it')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      const { switcher } = await context.services(command);

      const result = await switcher.retryReload();
      context.print(formatReloadResult(result));
    });
}
