/**
 * Planning Phase
 *
 * Task creation, critic review, freeze and plan approval:
 *
 *   draft → critic_passed → frozen → plan_approved
 *
 * @module @phasegate/engine/tasks/planning
 */

import { promises as fs } from 'node:fs';
import {
  ApprovalRecord,
  CriticReport,
  FreezeRecord,
  PreconditionError,
  SlicesDocument,
  TaskState,
  findModule,
  loadProfile,
  parseRecord,
  readRecordIfExists,
  runWithLogContext,
  validateTransition,
  writeRecord,
  writeTextAtomic,
  type Profile,
  type SliceSpec,
  type SliceSpecInput,
} from '@phasegate/core';
import { emit, timestamp, type EngineContext } from '../context.js';
import { assertFreezeValid, computeFreezeHashes } from './freeze.js';
import { resolveSlicePlan } from './slice-graph.js';
import { loadSlices, loadTaskState, resolveTask, transitionTask, withTask, type TaskScope } from './task-store.js';

// =============================================================================
// Ids
// =============================================================================

const TASK_ID = /^T-(\d{4,})$/;

function pad(n: number): string {
  return String(n).padStart(4, '0');
}

/**
 * Next sequential task id for a module (T-0001, T-0002, ...)
 */
export async function nextTaskId(tasksDir: string): Promise<string> {
  let entries: string[];
  try {
    entries = await fs.readdir(tasksDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      entries = [];
    } else {
      throw error;
    }
  }

  const highest = entries.reduce((max, name) => {
    const match = TASK_ID.exec(name);
    return match ? Math.max(max, Number(match[1])) : max;
  }, 0);
  return `T-${pad(highest + 1)}`;
}

export function sliceIdFor(index: number): string {
  return `S-${pad(index + 1)}`;
}

// =============================================================================
// Create
// =============================================================================

/**
 * A slice as supplied by the caller. Missing ids are numbered S-0001...,
 * missing gates come from the profile.
 */
export type SliceDraft = Partial<SliceSpecInput>;

export interface CreateTaskInput {
  moduleId: string;
  title: string;
  goal?: string;
  missionId?: string | null;
  profile?: string;
  maxAttempts?: number;
  slices: readonly SliceDraft[];
}

export interface CreatedTask {
  scope: TaskScope;
  state: TaskState;
  slices: SliceSpec[];
}

function completeSlice(draft: SliceDraft, index: number, profile: Profile): SliceSpecInput {
  return {
    ...draft,
    slice_id: draft.slice_id ?? sliceIdFor(index),
    allowed_paths: draft.allowed_paths ?? [],
    required_gates: draft.required_gates ?? [...profile.required_gates],
    deps: draft.deps ?? [],
    verify_commands: draft.verify_commands ?? [],
  };
}

export function renderPlan(taskId: string, title: string, goal: string, slices: readonly SliceSpec[]): string {
  const lines = [`# ${taskId}: ${title}`, '', '## Goal', goal || 'Describe the outcome this task delivers.', '', '## Slices'];
  for (const slice of slices) {
    const deps = slice.deps.length > 0 ? `; after ${slice.deps.join(', ')}` : '';
    const allowed = slice.allowed_paths.length > 0 ? slice.allowed_paths.join(', ') : '(none)';
    lines.push(`- ${slice.slice_id}: ${slice.title || 'untitled'} (paths: ${allowed}; gates: ${slice.required_gates.join(', ')}${deps})`);
  }
  lines.push(
    '',
    '## Acceptance',
    '- Every slice reaches done with its required gates passing.',
    '- The ready gate passes and the handoff smoke steps succeed.',
    ''
  );
  return lines.join('\n');
}

/**
 * Create a draft task with its plan and slice specs
 *
 * @throws ConfigurationError for unknown slice dependencies
 * @throws CyclicSliceDependencyError when slice deps form a cycle
 */
export async function createTask(ctx: EngineContext, input: CreateTaskInput): Promise<CreatedTask> {
  return runWithLogContext({ command: 'task.new', moduleId: input.moduleId, actor: ctx.actor }, async () => {
    const profileName = input.profile ?? ctx.config.default_profile;
    const profile = await loadProfile(ctx.layout, profileName);

    const module = await findModule(ctx.layout, input.moduleId);
    const taskId = await nextTaskId(ctx.layout.tasksDir(module.path));
    const scope = await resolveTask(ctx, input.moduleId, taskId);

    const doc = parseRecord(SlicesDocument, 'slices', {
      task_id: taskId,
      slices: input.slices.map((draft, index) => completeSlice(draft, index, profile)),
    });
    resolveSlicePlan(doc.slices);

    const now = timestamp(ctx);
    await writeTextAtomic(scope.paths.planFile, renderPlan(taskId, input.title, input.goal ?? '', doc.slices));
    await writeRecord(scope.paths.slicesFile, SlicesDocument, 'slices', doc);
    const state = await writeRecord(scope.paths.taskFile, TaskState, 'task_state', {
      task_id: taskId,
      module_id: input.moduleId,
      mission_id: input.missionId ?? null,
      profile: profile.name,
      status: 'draft',
      blocked_reason: null,
      max_attempts: input.maxAttempts ?? ctx.config.default_max_attempts,
      slices: {},
      created_at: now,
      updated_at: now,
    });

    await emit(ctx, {
      type: 'task.created',
      mission_id: state.mission_id,
      module_id: input.moduleId,
      task_id: taskId,
      payload: { title: input.title, profile: state.profile, max_attempts: state.max_attempts, slices: doc.slices.length },
      artifacts: [scope.paths.taskFile, scope.paths.planFile, scope.paths.slicesFile],
    });
    for (const slice of doc.slices) {
      await emit(ctx, {
        type: 'slice.created',
        mission_id: state.mission_id,
        module_id: input.moduleId,
        task_id: taskId,
        slice_id: slice.slice_id,
        payload: { title: slice.title, deps: slice.deps, required_gates: slice.required_gates },
      });
    }

    ctx.logger.info('Task created', { taskId, slices: doc.slices.length });
    return { scope, state, slices: doc.slices };
  });
}

// =============================================================================
// Critic
// =============================================================================

export interface CriticInput {
  moduleId: string;
  taskId: string;
  p0: number;
  p1: number;
  p2: number;
  p3: number;
  notes?: string;
  reviewer?: string;
}

/**
 * Record a plan critic review; the task moves to critic_passed iff P0=P1=0
 */
export async function recordCritic(ctx: EngineContext, input: CriticInput): Promise<CriticReport> {
  return withTask(ctx, 'task.critic', input.moduleId, input.taskId, async (scope) => {
    const state = await loadTaskState(scope);
    validateTransition(state.status, 'critic_passed');

    const report = await writeRecord(scope.paths.criticFile, CriticReport, 'critic_report', {
      task_id: scope.taskId,
      reviewed_by: input.reviewer ?? ctx.actor,
      p0: input.p0,
      p1: input.p1,
      p2: input.p2,
      p3: input.p3,
      notes: input.notes ?? '',
      passed: input.p0 === 0 && input.p1 === 0,
      reviewed_at: timestamp(ctx),
    });

    const payload = { p0: report.p0, p1: report.p1, p2: report.p2, p3: report.p3 };
    if (report.passed) {
      await transitionTask(ctx, scope, 'critic_passed', {
        event: { type: 'task.critic_passed', payload, artifacts: [scope.paths.criticFile] },
      });
    } else {
      await emit(ctx, {
        type: 'task.critic_failed',
        module_id: scope.moduleId,
        task_id: scope.taskId,
        payload,
        artifacts: [scope.paths.criticFile],
      });
    }
    return report;
  });
}

// =============================================================================
// Freeze
// =============================================================================

/**
 * Hash plan.md and slices.json into freeze.json
 */
export async function freezeTask(ctx: EngineContext, moduleId: string, taskId: string): Promise<FreezeRecord> {
  return withTask(ctx, 'task.freeze', moduleId, taskId, async (scope) => {
    const state = await loadTaskState(scope);
    validateTransition(state.status, 'frozen');

    const critic = await readRecordIfExists(scope.paths.criticFile, CriticReport, 'critic_report');
    if (!critic?.passed) {
      throw new PreconditionError(`Cannot freeze ${taskId} without a passing critic report`, { taskId });
    }

    await loadSlices(scope);
    const hashes = await computeFreezeHashes(scope.paths);
    const freeze = await writeRecord(scope.paths.freezeFile, FreezeRecord, 'freeze', {
      task_id: taskId,
      ...hashes,
      frozen_at: timestamp(ctx),
    });

    await transitionTask(ctx, scope, 'frozen', {
      event: { type: 'task.frozen', payload: hashes, artifacts: [scope.paths.freezeFile] },
    });
    return freeze;
  });
}

// =============================================================================
// Plan Approval
// =============================================================================

export interface ApprovalInput {
  moduleId: string;
  taskId: string;
  approvedBy?: string;
  notes?: string;
}

/**
 * Approve the frozen plan
 *
 * @throws DriftError when plan.md or slices.json changed after the freeze
 */
export async function approvePlan(ctx: EngineContext, input: ApprovalInput): Promise<ApprovalRecord> {
  return withTask(ctx, 'task.approve-plan', input.moduleId, input.taskId, async (scope) => {
    const state = await loadTaskState(scope);
    validateTransition(state.status, 'plan_approved');
    await assertFreezeValid(scope.paths, 'approve plan');

    const path = scope.paths.approvalFile('plan');
    const approval = await writeRecord(path, ApprovalRecord, 'approval', {
      task_id: scope.taskId,
      kind: 'plan',
      approved_by: input.approvedBy ?? ctx.actor,
      approved_at: timestamp(ctx),
      notes: input.notes ?? '',
    });

    await transitionTask(ctx, scope, 'plan_approved', {
      event: { type: 'task.plan_approved', payload: { approved_by: approval.approved_by }, artifacts: [path] },
    });
    return approval;
  });
}
