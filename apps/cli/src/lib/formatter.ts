/**
 * @bgctl/cli - Output Formatters
 *
 * Terminal text for status views, switch/reload/chaos results and usage.
 */

import chalk from 'chalk';
import type { ChaosResult, ReloadResult, RoutingObservation, StatusView, SwitchResult } from '@bgctl/shared';

// ============================================================================
// Usage
// ============================================================================

const COMMANDS: Array<[string, string]> = [
  ['start', 'Start the entire deployment (docker compose up -d)'],
  ['stop', 'Stop and remove the entire deployment (docker compose down)'],
  ['status [--json]', 'Display current container status and active pool routing'],
  ['switch <pool>', "Switch the active pool ('blue' or 'green') and reload nginx"],
  ['reload', 'Re-render the nginx config from the env file and reload it'],
  ['chaos [pool]', 'Induce failure (chaos) on a pool, the active one by default'],
  ['heal [pool]', 'Stop chaos mode on the failing pool (--legacy: always blue)'],
];

export function usage(): string {
  const lines = [
    '',
    chalk.yellow('Usage: bgctl [--env-file <path>] [--compose-file <path>] <command>'),
    '',
    'Commands:',
    ...COMMANDS.map(([name, description]) => `  ${chalk.cyan(name.padEnd(16))}${description}`),
    '',
  ];
  return lines.join('\n');
}

// ============================================================================
// Status
// ============================================================================

/** `HTTP/1.1 200 OK` / `X-App-Pool: blue`, or why there is nothing to show */
export function formatRouting(routing: RoutingObservation): string[] {
  if (routing.error) {
    return [`Routing probe failed: ${routing.error}`];
  }

  const lines: string[] = [];
  if (routing.statusLine) lines.push(routing.statusLine);
  if (routing.servedBy !== 'unknown') {
    lines.push(`X-App-Pool: ${routing.servedBy}`);
  } else if (routing.header !== undefined) {
    lines.push(`X-App-Pool: ${routing.header} (not a pool name)`);
  } else {
    lines.push('X-App-Pool header missing');
  }
  return lines;
}

export function formatStatusHeader(view: StatusView, source: string): string[] {
  return [
    '--- Blue/Green Deployment Status ---',
    `Active Pool in ${source}: ${view.persistedPool}`,
    `Public Nginx Port: ${view.publicPort}`,
  ];
}

export function formatDrift(view: StatusView): string | null {
  if (!view.drift) return null;
  return `Traffic is served by ${view.routing.servedBy} but ACTIVE_POOL is ${view.persistedPool}.`;
}

// ============================================================================
// Results
// ============================================================================

export function formatSwitchResult(result: SwitchResult): string {
  if (!result.changed) {
    return chalk.gray(`  ${result.to} already active, nothing changed`);
  }
  return chalk.green(`  ${result.from} -> ${result.to}`) + chalk.gray(` (${result.durationMs}ms)`);
}

export function formatReloadResult(result: ReloadResult): string {
  return chalk.gray(
    `  active=${result.activePool} listen=${result.publicPort} upstream port=${result.internalPort}`,
  );
}

export function formatChaosResult(result: ChaosResult): string {
  const status = result.statusCode === undefined ? 'no response' : `HTTP ${result.statusCode}`;
  const line = `  ${result.action} ${result.pool} (port ${result.port}): ${status}`;
  return result.ok ? chalk.gray(line) : chalk.yellow(line);
}
