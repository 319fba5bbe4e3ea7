/**
 * @bgctl/cli - Chaos / Heal Commands
 *
 * A failed injection exits 1. A failed heal is reported and exits 0:
 * the pool may never have been in chaos mode.
 */

import { Command } from 'commander';
import { parsePool, type PoolName } from '@bgctl/shared';
import type { CommandContext } from '../lib/context.js';
import { formatChaosResult } from '../lib/formatter.js';

function optionalPool(pool: string | undefined): PoolName | undefined {
  return pool === undefined ? undefined : parsePool(pool);
}

export function createChaosCommand(context: CommandContext): Command {
  return new Command('chaos')
    .description('Induce failure (chaos) on a pool, the active one by default')
    .argument('[pool]', "Target pool: 'blue' or 'green'")
    .action(async (pool: string | undefined, _options: Record<string, unknown>, command: Command) => {
      const target = optionalPool(pool);
      const { chaos } = await context.services(command);

      const result = await chaos.induceChaos(target);
      context.print(formatChaosResult(result));
    });
}

export function createHealCommand(context: CommandContext): Command {
  return new Command('heal')
    .description('Stop chaos mode on the failing pool')
    .argument('[pool]', "Target pool: 'blue' or 'green'")
    .option('--legacy', 'Always target the blue pool')
    .action(async (pool: string | undefined, options: { legacy?: boolean }, command: Command) => {
      const target = optionalPool(pool);
      const { chaos } = await context.services(command);

      const result = await chaos.healChaos(target, options.legacy ? 'legacy' : 'dynamic');
      context.print(formatChaosResult(result));
    });
}
