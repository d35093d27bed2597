/**
 * Gate Result Types
 *
 * A gate that runs but does not pass is an expected outcome, reported as a
 * GateFailure value next to its persisted proof. Only precondition and
 * programmer errors are thrown.
 *
 * @module @phasegate/engine/gates/types
 */

import type { ManifestGate } from '@phasegate/core';

export type GateName = ManifestGate | 'ready';

/**
 * Where a slice attempt stopped: a gate, the implement step, or the attempt budget
 */
export type PipelineStep = GateName | 'implement' | 'attempts';

export interface GateFailure {
  gate: PipelineStep;
  reason: string;
  detail: string;
}

/**
 * A gate's proof and where it was written
 */
export type GateResult<P> =
  | { passed: true; proof: P; proofPath: string }
  | { passed: false; proof: P; proofPath: string; failure: GateFailure };

export function gateResult<P extends { passed: boolean }>(
  gate: GateName,
  proof: P,
  proofPath: string,
  describeFailure: (proof: P) => { reason: string; detail: string }
): GateResult<P> {
  if (proof.passed) {
    return { passed: true, proof, proofPath };
  }
  return { passed: false, proof, proofPath, failure: { gate, ...describeFailure(proof) } };
}
