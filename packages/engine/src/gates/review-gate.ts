/**
 * Review Gate
 *
 * Records reviewer severity counts. Passes iff there are no P0 or P1
 * findings; P2/P3 are advisory.
 *
 * @module @phasegate/engine/gates/review-gate
 */

import { ReviewProof, writeRecord, type TaskPaths } from '@phasegate/core';
import { gateResult, type GateResult } from './types.js';

export interface ReviewFindings {
  reviewer: string;
  p0: number;
  p1: number;
  p2: number;
  p3: number;
  notes: string;
}

export const NO_FINDINGS: Omit<ReviewFindings, 'reviewer'> = { p0: 0, p1: 0, p2: 0, p3: 0, notes: '' };

export function reviewPasses(findings: Pick<ReviewFindings, 'p0' | 'p1'>): boolean {
  return findings.p0 === 0 && findings.p1 === 0;
}

export async function recordReview(
  paths: TaskPaths,
  sliceId: string,
  findings: ReviewFindings,
  recordedAt: string
): Promise<GateResult<ReviewProof>> {
  const proofPath = paths.proofFile(sliceId, 'review');
  const proof = await writeRecord(proofPath, ReviewProof, 'review_proof', {
    kind: 'review',
    task_id: paths.taskId,
    slice_id: sliceId,
    reviewer: findings.reviewer,
    p0: findings.p0,
    p1: findings.p1,
    p2: findings.p2,
    p3: findings.p3,
    passed: reviewPasses(findings),
    notes: findings.notes,
    recorded_at: recordedAt,
  });

  return gateResult('review', proof, proofPath, (p) => ({
    reason: 'review_blocking_findings',
    detail: `Review found P0=${p.p0} P1=${p.p1}`,
  }));
}
