/**
 * phasegate slice run / phasegate slice mark
 *
 * @module @phasegate/cli/commands/slice
 */

import { tokenizeCommand, type SliceStatus } from '@phasegate/core';
import { executeSlice, markSlice, trackCommand, type ReviewFindings } from '@phasegate/engine';
import type { CommandOutcome } from '../output.js';
import { targetScope, withEngine, type GlobalOptions } from '../session.js';

export interface SliceTarget {
  moduleId: string;
  taskId: string;
  sliceId: string;
}

// =============================================================================
// slice run
// =============================================================================

export interface RunSliceOptions extends SliceTarget {
  /** Implementation command line, tokenized without a shell */
  implement?: string;
  p0?: number;
  p1?: number;
  p2?: number;
  p3?: number;
  reviewNotes?: string;
  reviewer?: string;
  /** Overrides the declared verify commands */
  verifyCmd?: string[];
  /** Overrides the declared e2e commands */
  e2e?: string[];
}

function reviewFindings(options: RunSliceOptions): Partial<ReviewFindings> {
  const findings: Partial<ReviewFindings> = {};
  if (options.p0 !== undefined) findings.p0 = options.p0;
  if (options.p1 !== undefined) findings.p1 = options.p1;
  if (options.p2 !== undefined) findings.p2 = options.p2;
  if (options.p3 !== undefined) findings.p3 = options.p3;
  if (options.reviewNotes !== undefined) findings.notes = options.reviewNotes;
  if (options.reviewer !== undefined) findings.reviewer = options.reviewer;
  return findings;
}

export async function runSliceCommand(global: GlobalOptions, options: RunSliceOptions): Promise<CommandOutcome> {
  const implement = options.implement !== undefined ? tokenizeCommand(options.implement) : undefined;

  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const result = await trackCommand(ctx, 'slice.run', targetScope(options), () =>
      executeSlice(ctx, {
        moduleId: options.moduleId,
        taskId: options.taskId,
        sliceId: options.sliceId,
        implement,
        review: reviewFindings(options),
        verifyCommands: options.verifyCmd,
        e2eCommands: options.e2e,
      })
    );

    return {
      status: result.status,
      module_id: result.moduleId,
      task_id: result.taskId,
      slice_id: result.sliceId,
      attempts: result.attempts,
      max_attempts: result.maxAttempts,
      changed_files: result.changedFiles,
      gates: result.gates,
      manifest: result.manifestPath ? ctx.layout.toRef(result.manifestPath) : null,
      failure: result.failure,
      incident: result.incident ? { id: result.incident.id, kind: result.incident.kind } : null,
    };
  });
}

// =============================================================================
// slice mark
// =============================================================================

export interface MarkSliceOptions extends SliceTarget {
  status: SliceStatus;
  note: string;
}

export async function markSliceCommand(global: GlobalOptions, options: MarkSliceOptions): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const state = await trackCommand(ctx, 'slice.mark', targetScope(options), () => markSlice(ctx, options));
    return {
      status: 'ok',
      task_id: options.taskId,
      slice_id: options.sliceId,
      slice_status: state.status,
    };
  });
}
