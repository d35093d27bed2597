/**
 * Repository revision lookup
 *
 * @module @phasegate/core/events/revision
 */

import { execFileSync } from 'node:child_process';
import { getLogger } from '../telemetry/logger.js';

/**
 * Current git HEAD for a directory, or null when git is missing or the
 * directory is not a repository. Never throws.
 */
export function resolveRepoRevision(cwd: string): string | null {
  try {
    const head = execFileSync('git', ['rev-parse', 'HEAD'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
    return head.length > 0 ? head : null;
  } catch (error) {
    getLogger().debug('git revision unavailable', { cwd, reason: error instanceof Error ? error.message : String(error) });
    return null;
  }
}

/**
 * Memoized revision provider for one repository root
 */
export function createRevisionProvider(cwd: string): () => string | null {
  let resolved = false;
  let revision: string | null = null;
  return () => {
    if (!resolved) {
      revision = resolveRepoRevision(cwd);
      resolved = true;
    }
    return revision;
  };
}
