/**
 * phasegate gate validate-ready / phasegate gate approve-ready
 *
 * @module @phasegate/cli/commands/gate
 */

import { approveReady, trackCommand, validateReady } from '@phasegate/engine';
import type { CommandOutcome } from '../output.js';
import { targetScope, withEngine, type GlobalOptions } from '../session.js';
import type { ApproveOptions, TaskTarget } from './task.js';

export async function validateReadyCommand(global: GlobalOptions, options: TaskTarget): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const outcome = await trackCommand(ctx, 'gate.validate-ready', targetScope(options), () =>
      validateReady(ctx, options.moduleId, options.taskId)
    );

    const failed = Object.entries(outcome.proof.checks)
      .filter(([, check]) => !check.passed)
      .map(([name, check]) => ({ name, detail: check.detail }));

    return {
      status: outcome.status,
      task_id: options.taskId,
      ready: outcome.proof.passed,
      proof: ctx.layout.toRef(outcome.proofPath),
      handoff: ctx.layout.toRef(outcome.handoffPath),
      failed_checks: failed,
    };
  });
}

export async function approveReadyCommand(global: GlobalOptions, options: ApproveOptions): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const approval = await trackCommand(ctx, 'gate.approve-ready', targetScope(options), () =>
      approveReady(ctx, options)
    );
    return { status: 'ok', task_id: approval.task_id, approved_by: approval.approved_by };
  });
}
