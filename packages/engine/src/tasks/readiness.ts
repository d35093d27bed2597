/**
 * Readiness Phase
 *
 * User acceptance, ready validation and ready approval:
 *
 *   executing → ready_validated → ready_approved
 *
 * @module @phasegate/engine/tasks/readiness
 */

import {
  ApprovalRecord,
  PreconditionError,
  ReadyProof,
  isTerminalStatus,
  loadProfile,
  planTransition,
  readRecordIfExists,
  validateTransition,
  writeRecord,
} from '@phasegate/core';
import { emit, timestamp, type EngineContext } from '../context.js';
import { handoffExists, runReadyGate } from '../gates/ready-gate.js';
import type { GateFailure } from '../gates/types.js';
import type { ApprovalInput } from './planning.js';
import { loadSlices, loadTaskState, transitionTask, withTask } from './task-store.js';

/**
 * Record the user-acceptance check demanded by some profiles
 */
export async function recordUserCheck(ctx: EngineContext, input: ApprovalInput): Promise<ApprovalRecord> {
  return withTask(ctx, 'task.user-check', input.moduleId, input.taskId, async (scope) => {
    const state = await loadTaskState(scope);
    if (isTerminalStatus(state.status)) {
      throw new PreconditionError(`Task ${scope.taskId} is ${state.status}`, { taskId: scope.taskId });
    }

    const path = scope.paths.approvalFile('user_check');
    const record = await writeRecord(path, ApprovalRecord, 'approval', {
      task_id: scope.taskId,
      kind: 'user_check',
      approved_by: input.approvedBy ?? ctx.actor,
      approved_at: timestamp(ctx),
      notes: input.notes ?? '',
    });

    await emit(ctx, {
      type: 'user_check.recorded',
      module_id: scope.moduleId,
      task_id: scope.taskId,
      payload: { approved_by: record.approved_by },
      artifacts: [path],
    });
    return record;
  });
}

export interface ReadyOutcome {
  status: 'ok' | 'failed';
  proof: ReadyProof;
  proofPath: string;
  handoffPath: string;
  failure: GateFailure | null;
}

/**
 * Run the ready gate. On pass the task moves to ready_validated; on failure
 * the status is left alone and `ready.failed` is appended.
 */
export async function validateReady(ctx: EngineContext, moduleId: string, taskId: string): Promise<ReadyOutcome> {
  return withTask(ctx, 'gate.validate-ready', moduleId, taskId, async (scope) => {
    const state = await loadTaskState(scope);
    planTransition(state.status, 'ready_validated', { allowEcho: true });

    const result = await runReadyGate({
      paths: scope.paths,
      moduleId,
      slices: await loadSlices(scope),
      profile: await loadProfile(ctx.layout, state.profile),
      config: ctx.config,
      checkedAt: timestamp(ctx),
      toRef: (path) => ctx.layout.toRef(path),
    });

    const base = { module_id: moduleId, task_id: taskId, artifacts: [result.proofPath, result.handoffPath] };
    if (!result.passed) {
      await emit(ctx, { ...base, type: 'ready.failed', payload: { failed: result.failure.detail } });
      ctx.logger.gateResult('ready', false, { failed: result.failure.detail });
      return {
        status: 'failed',
        proof: result.proof,
        proofPath: result.proofPath,
        handoffPath: result.handoffPath,
        failure: result.failure,
      };
    }

    await transitionTask(ctx, scope, 'ready_validated', { allowEcho: true });
    await emit(ctx, { ...base, type: 'ready.validated', payload: { checks: Object.keys(result.proof.checks).length } });
    ctx.logger.gateResult('ready', true);

    return {
      status: 'ok',
      proof: result.proof,
      proofPath: result.proofPath,
      handoffPath: result.handoffPath,
      failure: null,
    };
  });
}

/**
 * Sign off a validated task. Needs a passing ready proof and the handoff.
 */
export async function approveReady(ctx: EngineContext, input: ApprovalInput): Promise<ApprovalRecord> {
  return withTask(ctx, 'gate.approve-ready', input.moduleId, input.taskId, async (scope) => {
    const state = await loadTaskState(scope);
    validateTransition(state.status, 'ready_approved');

    const proof = await readRecordIfExists(scope.paths.readyProofFile, ReadyProof, 'ready_proof');
    if (!proof?.passed) {
      throw new PreconditionError(`Cannot approve ${scope.taskId} without a passing ready proof`, {
        taskId: scope.taskId,
      });
    }
    if (!(await handoffExists(scope.paths))) {
      throw new PreconditionError(`Cannot approve ${scope.taskId} without the READY handoff`, {
        taskId: scope.taskId,
      });
    }

    const path = scope.paths.approvalFile('ready');
    const approval = await writeRecord(path, ApprovalRecord, 'approval', {
      task_id: scope.taskId,
      kind: 'ready',
      approved_by: input.approvedBy ?? ctx.actor,
      approved_at: timestamp(ctx),
      notes: input.notes ?? '',
    });

    await transitionTask(ctx, scope, 'ready_approved', {
      event: {
        type: 'ready.approved',
        payload: { approved_by: approval.approved_by },
        artifacts: [scope.paths.readyProofFile, scope.paths.handoffFile, path],
      },
    });
    return approval;
  });
}
