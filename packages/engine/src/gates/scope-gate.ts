/**
 * Scope Gate
 *
 * Checks that every file changed during an attempt lies under one of the
 * slice's allowed path prefixes. A path is allowed when it equals a prefix
 * or starts with prefix + "/"; `src` allows `src/a.ts` but not `srcfoo/a.ts`.
 *
 * @module @phasegate/engine/gates/scope-gate
 */

import { ConfigurationError, ScopeProof, writeRecord, type TaskPaths } from '@phasegate/core';
import { gateResult, type GateResult } from './types.js';

/**
 * Normalize allowed prefixes to posix, without leading/trailing slashes or
 * leading "./". "." and "" stand for the whole module.
 */
export function normalizeAllowedPaths(paths: readonly string[]): string[] {
  const normalized = paths.map((raw) => {
    let path = raw.replace(/\\/g, '/').trim();
    while (path.startsWith('./')) {
      path = path.slice(2);
    }
    path = path.replace(/^\/+|\/+$/g, '');
    return path === '.' ? '' : path;
  });
  return [...new Set(normalized)];
}

export function isPathAllowed(path: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => prefix === '' || path === prefix || path.startsWith(`${prefix}/`));
}

/**
 * Pure scope evaluation over changed paths
 */
export function evaluateScope(
  changedFiles: readonly string[],
  allowedPaths: readonly string[]
): { passed: boolean; violations: string[] } {
  const prefixes = normalizeAllowedPaths(allowedPaths);
  const violations = changedFiles.filter((path) => !isPathAllowed(path, prefixes));
  return { passed: violations.length === 0, violations };
}

/**
 * Refuse to run a required scope gate without allowed paths
 */
export function assertScopeConfigured(sliceId: string, allowedPaths: readonly string[]): void {
  if (allowedPaths.length === 0) {
    throw new ConfigurationError(`Slice ${sliceId} requires the scope gate but declares no allowed_paths`, {
      sliceId,
      gate: 'scope',
    });
  }
}

export interface ScopeGateInput {
  paths: TaskPaths;
  sliceId: string;
  changedFiles: readonly string[];
  allowedPaths: readonly string[];
  checkedAt: string;
}

/**
 * Evaluate scope and persist the proof
 */
export async function runScopeGate(input: ScopeGateInput): Promise<GateResult<ScopeProof>> {
  assertScopeConfigured(input.sliceId, input.allowedPaths);

  const { passed, violations } = evaluateScope(input.changedFiles, input.allowedPaths);
  const proofPath = input.paths.proofFile(input.sliceId, 'scope');
  const proof = await writeRecord(proofPath, ScopeProof, 'scope_proof', {
    kind: 'scope',
    task_id: input.paths.taskId,
    slice_id: input.sliceId,
    passed,
    allowed_paths: [...input.allowedPaths],
    changed_files: [...input.changedFiles],
    violations,
    checked_at: input.checkedAt,
  });

  return gateResult('scope', proof, proofPath, (p) => ({
    reason: 'scope_violation',
    detail: `Changed files outside allowed paths: ${p.violations.join(', ')}`,
  }));
}
