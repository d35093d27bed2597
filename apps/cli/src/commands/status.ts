/**
 * phasegate status
 *
 * One task in detail, or every task of the repository (optionally of one
 * module). Read-only.
 *
 * @module @phasegate/cli/commands/status
 */

import { PreconditionError } from '@phasegate/core';
import { describeTask, listTasks } from '@phasegate/engine';
import type { CommandOutcome } from '../output.js';
import { withEngine, type GlobalOptions } from '../session.js';

export interface StatusOptions {
  moduleId?: string;
  taskId?: string;
}

export async function statusCommand(global: GlobalOptions, options: StatusOptions = {}): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    if (options.taskId) {
      if (!options.moduleId) {
        throw new PreconditionError('--task-id needs --module-id', { taskId: options.taskId });
      }
      return { status: 'ok', task: await describeTask(ctx, options.moduleId, options.taskId) };
    }
    return { status: 'ok', tasks: await listTasks(ctx, options.moduleId) };
  });
}
