/**
 * @bgctl/shared - Pool identity
 */

import { InvalidPoolError } from '../errors/index.js';

export const POOL_NAMES = ['blue', 'green'] as const;

export type PoolName = (typeof POOL_NAMES)[number];

export function isPoolName(value: unknown): value is PoolName {
  return value === 'blue' || value === 'green';
}

/** Throws InvalidPoolError for anything but 'blue' or 'green' (case-sensitive). */
export function parsePool(value: string): PoolName {
  if (!isPoolName(value)) {
    throw new InvalidPoolError(value);
  }
  return value;
}

export function otherPool(pool: PoolName): PoolName {
  return pool === 'blue' ? 'green' : 'blue';
}
