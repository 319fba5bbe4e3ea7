/**
 * @bgctl/shared - Switch, Chaos & Status Types
 */

import type { PoolName } from './pool.js';

// ============================================================================
// Switch Types
// ============================================================================

export interface SwitchResult {
  changed: boolean;
  from: PoolName;
  to: PoolName;
  durationMs: number;
}

export interface ReloadResult {
  activePool: PoolName;
  publicPort: number;
  internalPort: number;
}

// ============================================================================
// Chaos Types
// ============================================================================

export type ChaosAction = 'start' | 'stop';

/** 'legacy' always heals blue. */
export type HealMode = 'dynamic' | 'legacy';

export interface ChaosResult {
  pool: PoolName;
  port: number;
  action: ChaosAction;
  ok: boolean;
  statusCode?: number;
  error?: string;
}

// ============================================================================
// Status Types
// ============================================================================

export interface RoutingObservation {
  servedBy: PoolName | 'unknown';
  statusCode?: number;
  statusLine?: string;
  /** Raw X-App-Pool header when it did not name a pool */
  header?: string;
  error?: string;
}

export interface StatusView {
  persistedPool: PoolName;
  publicPort: number;
  containers: string[];
  containersError?: string;
  routing: RoutingObservation;
  drift: boolean;
}
