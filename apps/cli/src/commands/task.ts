/**
 * phasegate task ...
 *
 * Planning commands: create a draft, record the critic, freeze, approve
 * the plan, record the user check and decisions, close.
 *
 * @module @phasegate/cli/commands/task
 */

import { resolve } from 'node:path';
import { SliceDraftsFile, readRecord } from '@phasegate/core';
import {
  approvePlan,
  closeTask,
  createTask,
  freezeTask,
  recordCritic,
  recordDecision,
  recordUserCheck,
  trackCommand,
} from '@phasegate/engine';
import type { CommandOutcome } from '../output.js';
import { targetScope, withEngine, type GlobalOptions } from '../session.js';

export interface TaskTarget {
  moduleId: string;
  taskId: string;
}

// =============================================================================
// task new
// =============================================================================

export interface NewTaskOptions {
  moduleId: string;
  title: string;
  /** JSON file holding the slice drafts */
  slices: string;
  goal?: string;
  profile?: string;
  missionId?: string;
  maxAttempts?: number;
}

export async function newTaskCommand(global: GlobalOptions, options: NewTaskOptions): Promise<CommandOutcome> {
  const file = await readRecord(resolve(options.slices), SliceDraftsFile, 'slice drafts');
  const drafts = Array.isArray(file) ? file : file.slices;

  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const created = await trackCommand(
      ctx,
      'task.new',
      { moduleId: options.moduleId, missionId: options.missionId },
      () =>
        createTask(ctx, {
          moduleId: options.moduleId,
          title: options.title,
          goal: options.goal,
          missionId: options.missionId,
          profile: options.profile,
          maxAttempts: options.maxAttempts,
          slices: drafts,
        })
    );

    const { paths } = created.scope;
    return {
      status: 'ok',
      module_id: created.state.module_id,
      task_id: created.state.task_id,
      task_status: created.state.status,
      slices: created.slices.map((s) => s.slice_id),
      plan: ctx.layout.toRef(paths.planFile),
      task: ctx.layout.toRef(paths.taskFile),
    };
  });
}

// =============================================================================
// task critic
// =============================================================================

export interface CriticOptions extends TaskTarget {
  p0: number;
  p1: number;
  p2: number;
  p3: number;
  notes?: string;
  reviewer?: string;
}

export async function criticCommand(global: GlobalOptions, options: CriticOptions): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const report = await trackCommand(ctx, 'task.critic', targetScope(options), () => recordCritic(ctx, options));
    return {
      status: report.passed ? 'ok' : 'failed',
      task_id: report.task_id,
      passed: report.passed,
      findings: { p0: report.p0, p1: report.p1, p2: report.p2, p3: report.p3 },
    };
  });
}

// =============================================================================
// task freeze / approve-plan / user-check / close
// =============================================================================

export async function freezeCommand(global: GlobalOptions, options: TaskTarget): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const freeze = await trackCommand(ctx, 'task.freeze', targetScope(options), () =>
      freezeTask(ctx, options.moduleId, options.taskId)
    );
    return {
      status: 'ok',
      task_id: freeze.task_id,
      plan_sha256: freeze.plan_sha256,
      slices_sha256: freeze.slices_sha256,
    };
  });
}

export interface ApproveOptions extends TaskTarget {
  approvedBy?: string;
  notes?: string;
}

export async function approvePlanCommand(global: GlobalOptions, options: ApproveOptions): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const approval = await trackCommand(ctx, 'task.approve-plan', targetScope(options), () => approvePlan(ctx, options));
    return { status: 'ok', task_id: approval.task_id, approved_by: approval.approved_by };
  });
}

export async function userCheckCommand(global: GlobalOptions, options: ApproveOptions): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const approval = await trackCommand(ctx, 'task.user-check', targetScope(options), () => recordUserCheck(ctx, options));
    return { status: 'ok', task_id: approval.task_id, approved_by: approval.approved_by };
  });
}

export async function closeCommand(global: GlobalOptions, options: TaskTarget): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const state = await trackCommand(ctx, 'task.close', targetScope(options), () =>
      closeTask(ctx, options.moduleId, options.taskId)
    );
    return { status: 'ok', task_id: state.task_id, task_status: state.status };
  });
}

// =============================================================================
// task decision
// =============================================================================

export interface DecisionOptions extends TaskTarget {
  decision: string;
  rationale?: string;
}

export async function decisionCommand(global: GlobalOptions, options: DecisionOptions): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const record = await trackCommand(ctx, 'task.decision', targetScope(options), () =>
      recordDecision(ctx, {
        moduleId: options.moduleId,
        taskId: options.taskId,
        decision: options.decision,
        rationale: options.rationale,
        decidedBy: ctx.actor,
      })
    );
    return { status: 'ok', task_id: record.task_id, decision: record.decision };
  });
}
