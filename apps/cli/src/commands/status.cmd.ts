/**
 * @bgctl/cli - Status Command
 *
 * Persisted ACTIVE_POOL next to what the proxy actually serves. Fails only
 * when the env file is missing or invalid; probe and container-listing
 * failures are part of the report.
 */

import { Command } from 'commander';
import { ROUTING_PROBE_PATH } from '@bgctl/shared';
import type { CommandContext } from '../lib/context.js';
import { formatDrift, formatRouting, formatStatusHeader } from '../lib/formatter.js';

export function createStatusCommand(context: CommandContext): Command {
  return new Command('status')
    .description('Display current container status and active pool routing')
    .option('-j, --json', 'Output in JSON format')
    .action(async (options: { json?: boolean }, command: Command) => {
      const { status, config } = await context.services(command);
      const view = await status.snapshot();

      if (options.json) {
        context.print(JSON.stringify(view, null, 2));
        return;
      }

      const { logger } = context;
      for (const line of formatStatusHeader(view, config.source)) {
        logger.status(line);
      }

      logger.info('Docker Compose containers:');
      if (view.containersError) {
        logger.warn(`Could not list containers: ${view.containersError}`);
      }
      for (const line of view.containers) {
        context.print(line);
      }

      logger.info(`Current traffic routing via port ${view.publicPort} ${ROUTING_PROBE_PATH}:`);
      for (const line of formatRouting(view.routing)) {
        context.print(line);
      }

      const drift = formatDrift(view);
      if (drift) logger.warn(drift);

      logger.status('-------------------------------------');
    });
}
