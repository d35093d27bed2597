/**
 * Slice Dependency Graph
 *
 * Validates a task's slice deps as a DAG when the slice spec is loaded, so a
 * cycle fails fast instead of stalling a retry loop on a dep that can never
 * finish.
 *
 * @module @phasegate/engine/tasks/slice-graph
 */

import { ConfigurationError, CyclicSliceDependencyError, type SliceSpec } from '@phasegate/core';

/**
 * Slice deps arranged in execution levels. Every slice in a level depends
 * only on slices in earlier levels.
 */
export interface SlicePlan {
  levels: string[][];
  dependencies: Map<string, Set<string>>;
  dependents: Map<string, Set<string>>;
}

/**
 * Validate slice deps and compute execution levels
 *
 * @throws ConfigurationError if a slice depends on an unknown slice
 * @throws CyclicSliceDependencyError if the deps form a cycle, self-deps included
 */
export function resolveSlicePlan(slices: readonly SliceSpec[]): SlicePlan {
  const dependencies = new Map<string, Set<string>>();
  const dependents = new Map<string, Set<string>>();

  for (const slice of slices) {
    dependencies.set(slice.slice_id, new Set(slice.deps));
    dependents.set(slice.slice_id, new Set());
  }

  for (const slice of slices) {
    for (const dep of slice.deps) {
      const reverse = dependents.get(dep);
      if (!reverse) {
        throw new ConfigurationError(`Slice ${slice.slice_id} depends on unknown slice ${dep}`, {
          sliceId: slice.slice_id,
          dependency: dep,
        });
      }
      reverse.add(slice.slice_id);
    }
  }

  // Detect cycles using DFS
  const visited = new Set<string>();
  const stack = new Set<string>();
  const path: string[] = [];

  function visit(sliceId: string): void {
    visited.add(sliceId);
    stack.add(sliceId);
    path.push(sliceId);

    for (const dep of dependencies.get(sliceId) ?? []) {
      if (!visited.has(dep)) {
        visit(dep);
      } else if (stack.has(dep)) {
        const start = path.indexOf(dep);
        throw new CyclicSliceDependencyError(path.slice(start).concat(dep));
      }
    }

    stack.delete(sliceId);
    path.pop();
  }

  for (const sliceId of dependencies.keys()) {
    if (!visited.has(sliceId)) {
      visit(sliceId);
    }
  }

  // Kahn's algorithm for levels
  const inDegree = new Map<string, number>();
  for (const [sliceId, deps] of dependencies) {
    inDegree.set(sliceId, deps.size);
  }

  const levels: string[][] = [];
  let frontier = [...inDegree.entries()].filter(([, degree]) => degree === 0).map(([id]) => id);

  while (frontier.length > 0) {
    levels.push(frontier);
    const next: string[] = [];
    for (const sliceId of frontier) {
      for (const dependent of dependents.get(sliceId) ?? []) {
        const degree = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, degree);
        if (degree === 0) {
          next.push(dependent);
        }
      }
    }
    frontier = next;
  }

  return { levels, dependencies, dependents };
}

/**
 * Deps of a slice that are not yet done
 */
export function pendingDependencies(slice: SliceSpec, doneSlices: ReadonlySet<string>): string[] {
  return slice.deps.filter((dep) => !doneSlices.has(dep));
}
