/**
 * @bgctl/cli - Lifecycle Commands
 *
 * start / stop: bring the whole container set up or down. A fresh proxy
 * container runs the stock nginx config, so start renders ACTIVE_POOL into
 * it right after `up`.
 */

import { Command } from 'commander';
import type { CommandContext } from '../lib/context.js';
import { formatReloadResult } from '../lib/formatter.js';

export function createStartCommand(context: CommandContext): Command {
  return new Command('start')
    .description('Start the entire deployment (docker compose up -d)')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      const { lifecycle, switcher } = await context.services(command);

      context.logger.info('Starting Blue/Green deployment services...');
      const spinner = context.spinner('docker compose up -d').start();
      try {
        await lifecycle.up();
        spinner.succeed('Containers started');
      } catch (error) {
        spinner.fail('docker compose up failed');
        throw error;
      }

      const applying = context.spinner('Applying nginx config').start();
      try {
        const result = await switcher.retryReload();
        applying.succeed('nginx config applied');
        context.print(formatReloadResult(result));
      } catch (error) {
        applying.fail('nginx config not applied');
        throw error;
      }
      context.logger.success("Deployment services started. Check status with 'bgctl status'.");
    });
}

export function createStopCommand(context: CommandContext): Command {
  return new Command('stop')
    .description('Stop and remove the entire deployment (docker compose down)')
    .action(async (_options: Record<string, unknown>, command: Command) => {
      const { lifecycle } = await context.services(command);

      context.logger.info('Stopping and cleaning up Blue/Green deployment services...');
      const spinner = context.spinner('docker compose down').start();
      try {
        await lifecycle.down();
        spinner.succeed('Containers removed');
      } catch (error) {
        spinner.fail('docker compose down failed');
        throw error;
      }
      context.logger.success('Deployment stopped and resources removed.');
    });
}
