/**
 * @bgctl/shared - Version (from the VERSION file at the repository root)
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export function getVersion(): string {
  // Environment variable override (for CI and packaged builds)
  if (process.env.BGCTL_VERSION) {
    return process.env.BGCTL_VERSION;
  }

  const candidates = [
    join(__dirname, '..', '..', '..', '..', 'VERSION'),
    join(process.cwd(), 'VERSION'),
  ];

  for (const p of candidates) {
    if (existsSync(p)) {
      return readFileSync(p, 'utf-8').trim();
    }
  }

  return '0.0.0';
}
