/**
 * Freeze and Drift Detection
 *
 * A freeze records sha256 digests of plan.md and slices.json. It stays valid
 * only while both live files still hash to the stored values.
 *
 * @module @phasegate/engine/tasks/freeze
 */

import {
  DriftError,
  FreezeRecord,
  PreconditionError,
  readRecordIfExists,
  sha256File,
  type TaskPaths,
} from '@phasegate/core';

export type DriftTarget = 'plan' | 'slices';

export interface FreezeStatus {
  valid: boolean;
  freeze: FreezeRecord | null;
  drift: DriftTarget[];
  detail: string;
}

export async function computeFreezeHashes(paths: TaskPaths): Promise<{ plan_sha256: string; slices_sha256: string }> {
  return {
    plan_sha256: await sha256File(paths.planFile),
    slices_sha256: await sha256File(paths.slicesFile),
  };
}

/**
 * Compare the stored freeze with the live plan and slices
 */
export async function checkFreeze(paths: TaskPaths): Promise<FreezeStatus> {
  const freeze = await readRecordIfExists(paths.freezeFile, FreezeRecord, 'freeze');
  if (!freeze) {
    return { valid: false, freeze: null, drift: [], detail: 'missing freeze' };
  }

  const live = await computeFreezeHashes(paths);
  const drift: DriftTarget[] = [];
  if (live.plan_sha256 !== freeze.plan_sha256) drift.push('plan');
  if (live.slices_sha256 !== freeze.slices_sha256) drift.push('slices');

  return {
    valid: drift.length === 0,
    freeze,
    drift,
    detail: drift.length === 0 ? 'ok' : `${drift.join(' and ')} drift`,
  };
}

/**
 * Throw unless a drift-free freeze exists
 *
 * @throws PreconditionError when there is no freeze
 * @throws DriftError when plan or slices changed after the freeze
 */
export async function assertFreezeValid(paths: TaskPaths, action: string): Promise<FreezeRecord> {
  const status = await checkFreeze(paths);
  if (!status.freeze) {
    throw new PreconditionError(`Cannot ${action} without a freeze`, { taskId: paths.taskId });
  }
  if (!status.valid) {
    throw new DriftError(`Cannot ${action} with freeze drift (${status.detail})`, status.drift, {
      taskId: paths.taskId,
    });
  }
  return status.freeze;
}
