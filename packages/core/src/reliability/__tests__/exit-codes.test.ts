/**
 * Exit Code and Error Taxonomy Tests
 */

import { describe, it, expect } from 'vitest';
import {
  exitCodeForStatus,
  isOutcomeStatus,
  wrapError,
  PhasegateError,
  PolicyError,
  ConfigurationError,
  CyclicSliceDependencyError,
  DriftError,
} from '../../index.js';

describe('exitCodeForStatus', () => {
  it.each([
    ['ok', 0],
    ['blocked', 10],
    ['gate_failed', 10],
    ['review_failed', 10],
    ['failed', 10],
    ['replay_failed', 30],
    ['invariant_failed', 30],
    ['error', 20],
  ])('maps %s to %i', (status, code) => {
    expect(exitCodeForStatus(status)).toBe(code);
  });

  it('treats unknown statuses as errors', () => {
    expect(isOutcomeStatus('maybe')).toBe(false);
    expect(exitCodeForStatus('maybe')).toBe(20);
  });
});

describe('error taxonomy', () => {
  it('wraps foreign errors and keeps phasegate errors', () => {
    const policy = new PolicyError('no pipes');
    expect(wrapError(policy)).toBe(policy);

    const wrapped = wrapError(new TypeError('boom'));
    expect(wrapped).toBeInstanceOf(PhasegateError);
    expect(wrapped.code).toBe('UNHANDLED_ERROR');
    expect(wrapped.cause).toBeInstanceOf(TypeError);
    expect(wrapError('text').message).toBe('text');
  });

  it('keeps subclass identity and codes', () => {
    const cycle = new CyclicSliceDependencyError(['S-0001', 'S-0002', 'S-0001']);
    expect(cycle).toBeInstanceOf(ConfigurationError);
    expect(cycle.code).toBe('CYCLIC_DEPENDENCY');
    expect(cycle.message).toBe('Cyclic slice dependency detected: S-0001 -> S-0002 -> S-0001');

    const drift = new DriftError('Cannot approve plan with freeze drift', ['plan']);
    expect(drift.toJSON()).toMatchObject({ name: 'DriftError', code: 'FREEZE_DRIFT', context: { drift: ['plan'] } });
  });
});
