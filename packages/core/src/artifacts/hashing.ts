/**
 * Content hashing and filesystem snapshots
 *
 * @module @phasegate/core/artifacts/hashing
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { STATE_DIR } from '../layout/layout.js';

/**
 * SHA-256 hex digest of a string or buffer
 */
export function sha256Hex(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * SHA-256 hex digest of a file's bytes
 */
export async function sha256File(path: string): Promise<string> {
  return sha256Hex(await fs.readFile(path));
}

/**
 * Relative posix path → content hash for every regular file under a root
 */
export type Snapshot = Map<string, string>;

/**
 * Top-level entries never included in a module snapshot
 */
export const SNAPSHOT_IGNORED = [STATE_DIR, '.git'] as const;

/**
 * Hash every regular file under root. Engine state and VCS metadata are
 * skipped so gate bookkeeping never shows up as a changed file.
 */
export async function snapshotTree(root: string, ignored: readonly string[] = SNAPSHOT_IGNORED): Promise<Snapshot> {
  const snapshot: Snapshot = new Map();

  async function walk(dir: string, prefix: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (!prefix && ignored.includes(entry.name)) {
        continue;
      }
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full, rel);
      } else if (entry.isFile()) {
        snapshot.set(rel, await sha256File(full));
      }
    }
  }

  await walk(root, '');
  return snapshot;
}

/**
 * Sorted paths that were added, removed or modified between two snapshots
 */
export function diffSnapshots(before: Snapshot, after: Snapshot): string[] {
  const changed = new Set<string>();

  for (const [path, hash] of after) {
    if (before.get(path) !== hash) {
      changed.add(path);
    }
  }
  for (const path of before.keys()) {
    if (!after.has(path)) {
      changed.add(path);
    }
  }

  return [...changed].sort();
}
