/**
 * Operator Records
 *
 * Manual slice overrides and the task decision log.
 *
 * @module @phasegate/engine/tasks/operator
 */

import { DecisionRecord, PreconditionError, appendJsonLine, type SliceState, type SliceStatus } from '@phasegate/core';
import { emit, timestamp, type EngineContext } from '../context.js';
import { findSlice, loadSlices, loadTaskState, sliceStateOf, updateSliceState, withTask } from './task-store.js';

export interface MarkSliceInput {
  moduleId: string;
  taskId: string;
  sliceId: string;
  status: SliceStatus;
  note: string;
}

/**
 * Override a slice's runtime status. A slice reaches done only through a
 * passing run, and never leaves it.
 */
export async function markSlice(ctx: EngineContext, input: MarkSliceInput): Promise<SliceState> {
  return withTask(ctx, 'slice.mark', input.moduleId, input.taskId, async (scope) => {
    if (input.status === 'done') {
      throw new PreconditionError('Slices reach done only through a passing slice run', { sliceId: input.sliceId });
    }

    const slice = findSlice(await loadSlices(scope), input.sliceId);
    const before = sliceStateOf(ctx, await loadTaskState(scope), slice);
    const next = await updateSliceState(ctx, scope, slice, { status: input.status, lastError: input.note });

    await emit(ctx, {
      type: 'slice.marked',
      module_id: scope.moduleId,
      task_id: scope.taskId,
      slice_id: slice.slice_id,
      payload: { from: before.status, to: next.status, note: input.note },
    });
    return next;
  });
}

export interface DecisionInput {
  moduleId: string;
  taskId: string;
  decision: string;
  rationale?: string;
  decidedBy?: string;
}

export async function recordDecision(ctx: EngineContext, input: DecisionInput): Promise<DecisionRecord> {
  return withTask(ctx, 'task.decision', input.moduleId, input.taskId, async (scope) => {
    await loadTaskState(scope);

    const record = await appendJsonLine(scope.paths.decisionsFile, DecisionRecord, 'decision', {
      task_id: scope.taskId,
      decision: input.decision,
      rationale: input.rationale ?? '',
      decided_by: input.decidedBy ?? ctx.actor,
      decided_at: timestamp(ctx),
    });

    await emit(ctx, {
      type: 'decision.recorded',
      module_id: scope.moduleId,
      task_id: scope.taskId,
      payload: { decision: record.decision },
      artifacts: [scope.paths.decisionsFile],
    });
    return record;
  });
}
