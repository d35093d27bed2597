/**
 * Slice Dependency Graph Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, CyclicSliceDependencyError, SliceSpec } from '@phasegate/core';
import { pendingDependencies, resolveSlicePlan } from '../slice-graph.js';

function slice(id: string, deps: string[] = []): SliceSpec {
  return SliceSpec.parse({
    slice_id: id,
    allowed_paths: ['src'],
    required_gates: ['scope'],
    deps,
    verify_commands: [],
  });
}

describe('resolveSlicePlan', () => {
  it('groups slices into execution levels', () => {
    const plan = resolveSlicePlan([slice('A'), slice('B', ['A']), slice('C', ['A']), slice('D', ['B', 'C'])]);
    expect(plan.levels).toEqual([['A'], ['B', 'C'], ['D']]);
    expect([...(plan.dependents.get('A') ?? [])]).toEqual(['B', 'C']);
  });

  it('rejects unknown dependencies', () => {
    expect(() => resolveSlicePlan([slice('A', ['Z'])])).toThrow(ConfigurationError);
    expect(() => resolveSlicePlan([slice('A', ['Z'])])).toThrow('Slice A depends on unknown slice Z');
  });

  it('rejects cycles with the cycle path', () => {
    let caught: unknown;
    try {
      resolveSlicePlan([slice('A', ['B']), slice('B', ['A'])]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CyclicSliceDependencyError);
    if (!(caught instanceof CyclicSliceDependencyError)) return;
    expect(caught.cycle).toEqual(['A', 'B', 'A']);
    expect(caught.message).toBe('Cyclic slice dependency detected: A -> B -> A');
  });

  it('rejects self dependencies', () => {
    expect(() => resolveSlicePlan([slice('A', ['A'])])).toThrow('Cyclic slice dependency detected: A -> A');
  });
});

describe('pendingDependencies', () => {
  it('returns deps that are not done', () => {
    expect(pendingDependencies(slice('C', ['A', 'B']), new Set(['A']))).toEqual(['B']);
    expect(pendingDependencies(slice('C', ['A']), new Set(['A']))).toEqual([]);
  });
});
