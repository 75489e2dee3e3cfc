/**
 * @cloudctl/shared - Version
 *
 * Client version and git revision shown in the dashboard status line.
 * Reads from the VERSION file at the repository root.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export function getVersion(): string {
  // Environment variable override (for release builds, CI, etc.)
  if (process.env.CLOUDCTL_VERSION) {
    return process.env.CLOUDCTL_VERSION;
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

  return 'devel';
}

export function getGitSha(): string {
  return process.env.CLOUDCTL_GIT_SHA || 'unknown';
}
