/**
 * Task Status Views
 *
 * Read-only summaries for operators. Nothing here appends events.
 *
 * @module @phasegate/engine/tasks/status
 */

import { promises as fs } from 'node:fs';
import { TaskState, readRecordIfExists, readRegistry, type TaskStatus } from '@phasegate/core';
import type { EngineContext } from '../context.js';
import { checkFreeze } from './freeze.js';
import { resolveSlicePlan } from './slice-graph.js';
import { loadSlices, loadTaskState, resolveTask, sliceStateOf } from './task-store.js';

export interface SliceSummary {
  slice_id: string;
  title: string;
  deps: string[];
  status: string;
  attempts: number;
  max_attempts: number;
  last_error: string | null;
}

export interface TaskSummary {
  module_id: string;
  task_id: string;
  status: TaskStatus;
  blocked_reason: string | null;
  profile: string;
  freeze: { valid: boolean; detail: string };
  levels: string[][];
  slices: SliceSummary[];
}

export async function describeTask(ctx: EngineContext, moduleId: string, taskId: string): Promise<TaskSummary> {
  const scope = await resolveTask(ctx, moduleId, taskId);
  const state = await loadTaskState(scope);
  const slices = await loadSlices(scope);
  const freeze = await checkFreeze(scope.paths);

  return {
    module_id: moduleId,
    task_id: taskId,
    status: state.status,
    blocked_reason: state.blocked_reason,
    profile: state.profile,
    freeze: { valid: freeze.valid, detail: freeze.detail },
    levels: resolveSlicePlan(slices).levels,
    slices: slices.map((slice) => {
      const runtime = sliceStateOf(ctx, state, slice);
      return {
        slice_id: slice.slice_id,
        title: slice.title,
        deps: slice.deps,
        status: runtime.status,
        attempts: runtime.attempts,
        max_attempts: runtime.max_attempts,
        last_error: runtime.last_error,
      };
    }),
  };
}

export interface TaskListing {
  module_id: string;
  task_id: string;
  status: TaskStatus;
}

async function listDir(path: string): Promise<string[]> {
  try {
    return await fs.readdir(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Every task of every registered module (or of one module), sorted by id
 */
export async function listTasks(ctx: EngineContext, moduleId?: string): Promise<TaskListing[]> {
  const registry = await readRegistry(ctx.layout);
  const listings: TaskListing[] = [];

  for (const module of registry.modules) {
    if (moduleId && module.module_id !== moduleId) continue;

    const tasksDir = ctx.layout.tasksDir(module.path);
    for (const taskId of (await listDir(tasksDir)).sort()) {
      const state = await readRecordIfExists(ctx.layout.task(module.path, taskId).taskFile, TaskState, 'task_state');
      if (state) {
        listings.push({ module_id: module.module_id, task_id: taskId, status: state.status });
      }
    }
  }

  return listings;
}
