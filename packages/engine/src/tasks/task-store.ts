/**
 * Task Store
 *
 * Loads and saves task state and slice specs, and routes every task status
 * change through the state machine with a matching event.
 *
 * @module @phasegate/engine/tasks/task-store
 */

import {
  NotFoundError,
  PreconditionError,
  SlicesDocument,
  SliceState,
  TaskState,
  canUpdateSlice,
  findModule,
  planTransition,
  readRecord,
  runWithLogContext,
  writeRecord,
  type SliceSpec,
  type SliceStatus,
  type TaskPaths,
  type TaskStatus,
} from '@phasegate/core';
import { emit, timestamp, type EngineContext } from '../context.js';
import { resolveSlicePlan } from './slice-graph.js';

/**
 * A task resolved to its module and paths
 */
export interface TaskScope {
  moduleId: string;
  modulePath: string;
  moduleRoot: string;
  taskId: string;
  paths: TaskPaths;
}

export async function resolveTask(ctx: EngineContext, moduleId: string, taskId: string): Promise<TaskScope> {
  const module = await findModule(ctx.layout, moduleId);
  return {
    moduleId,
    modulePath: module.path,
    moduleRoot: ctx.layout.moduleRoot(module.path),
    taskId,
    paths: ctx.layout.task(module.path, taskId),
  };
}

/**
 * Resolve a task and run an operation inside its log context
 */
export async function withTask<T>(
  ctx: EngineContext,
  command: string,
  moduleId: string,
  taskId: string,
  fn: (scope: TaskScope) => Promise<T>
): Promise<T> {
  return runWithLogContext({ command, moduleId, taskId, actor: ctx.actor }, async () =>
    fn(await resolveTask(ctx, moduleId, taskId))
  );
}

// =============================================================================
// Task State
// =============================================================================

export async function loadTaskState(scope: TaskScope): Promise<TaskState> {
  try {
    return await readRecord(scope.paths.taskFile, TaskState, 'task_state');
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new NotFoundError(`Task not found: ${scope.moduleId}/${scope.taskId}`, {
        moduleId: scope.moduleId,
        taskId: scope.taskId,
      });
    }
    throw error;
  }
}

export async function saveTaskState(ctx: EngineContext, scope: TaskScope, state: TaskState): Promise<TaskState> {
  return writeRecord(scope.paths.taskFile, TaskState, 'task_state', { ...state, updated_at: timestamp(ctx) });
}

/**
 * Load slices.json and validate its dependency graph
 */
export async function loadSlices(scope: TaskScope): Promise<SliceSpec[]> {
  const doc = await readRecord(scope.paths.slicesFile, SlicesDocument, 'slices');
  resolveSlicePlan(doc.slices);
  return doc.slices;
}

export function findSlice(slices: readonly SliceSpec[], sliceId: string): SliceSpec {
  const slice = slices.find((s) => s.slice_id === sliceId);
  if (!slice) {
    throw new NotFoundError(`Slice not found: ${sliceId}`, { sliceId, known: slices.map((s) => s.slice_id) });
  }
  return slice;
}

// =============================================================================
// Status Changes
// =============================================================================

export interface TransitionOptions {
  /** Required when moving to blocked */
  reason?: string;
  /** Accept a request for the current status as a no-op */
  allowEcho?: boolean;
  /** Event to append when the status actually changes */
  event?: {
    type: string;
    sliceId?: string;
    payload?: Record<string, unknown>;
    artifacts?: string[];
  };
}

/**
 * Move a task to a new status through the state machine
 */
export async function transitionTask(
  ctx: EngineContext,
  scope: TaskScope,
  to: TaskStatus,
  options: TransitionOptions = {}
): Promise<TaskState> {
  const state = await loadTaskState(scope);
  const plan = planTransition(state.status, to, { allowEcho: options.allowEcho });
  if (plan.kind === 'echo') {
    return state;
  }
  if (to === 'blocked' && !options.reason) {
    throw new PreconditionError('A reason is required to block a task', { taskId: scope.taskId });
  }

  const saved = await saveTaskState(ctx, scope, {
    ...state,
    status: to,
    blocked_reason: to === 'blocked' ? options.reason ?? null : null,
  });

  ctx.logger.notice('Task status changed', { taskId: scope.taskId, from: plan.from, to });

  if (options.event) {
    await emit(ctx, {
      type: options.event.type,
      module_id: scope.moduleId,
      task_id: scope.taskId,
      slice_id: options.event.sliceId ?? null,
      payload: { from: plan.from, to, ...options.event.payload },
      artifacts: options.event.artifacts,
    });
  }

  return saved;
}

// =============================================================================
// Slice State
// =============================================================================

export interface SliceStatePatch {
  status?: SliceStatus;
  attempts?: number;
  maxAttempts?: number;
  lastError?: string | null;
}

/**
 * Runtime state for a slice, created lazily on first use
 */
export function sliceStateOf(ctx: EngineContext, state: TaskState, slice: SliceSpec): SliceState {
  return (
    state.slices[slice.slice_id] ?? {
      status: 'pending',
      attempts: 0,
      max_attempts: slice.max_attempts ?? state.max_attempts,
      last_error: null,
      updated_at: timestamp(ctx),
    }
  );
}

/**
 * Update one slice's runtime state. A done slice is never moved off done.
 */
export async function updateSliceState(
  ctx: EngineContext,
  scope: TaskScope,
  slice: SliceSpec,
  patch: SliceStatePatch
): Promise<SliceState> {
  const state = await loadTaskState(scope);
  const current = sliceStateOf(ctx, state, slice);
  const nextStatus = patch.status ?? current.status;

  if (!canUpdateSlice(current.status, nextStatus)) {
    throw new PreconditionError(`Slice ${slice.slice_id} is done and cannot move to ${nextStatus}`, {
      sliceId: slice.slice_id,
    });
  }

  const next: SliceState = {
    status: nextStatus,
    attempts: patch.attempts ?? current.attempts,
    max_attempts: patch.maxAttempts ?? current.max_attempts,
    last_error: patch.lastError === undefined ? current.last_error : patch.lastError,
    updated_at: timestamp(ctx),
  };

  await saveTaskState(ctx, scope, { ...state, slices: { ...state.slices, [slice.slice_id]: next } });
  return next;
}
