/**
 * phasegate retro run
 *
 * @module @phasegate/cli/commands/retro
 */

import { runRetro, trackCommand } from '@phasegate/engine';
import type { CommandOutcome } from '../output.js';
import { targetScope, withEngine, type GlobalOptions } from '../session.js';
import type { TaskTarget } from './task.js';

export interface RetroOptions extends TaskTarget {
  feedback?: string;
}

export async function retroCommand(global: GlobalOptions, options: RetroOptions): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const result = await trackCommand(ctx, 'retro.run', targetScope(options), () => runRetro(ctx, options));
    return {
      status: 'ok',
      task_id: options.taskId,
      retro: ctx.layout.toRef(result.retroPath),
      patch: ctx.layout.toRef(result.patchPath),
      incidents: result.incidents,
      clusters: result.clusters,
    };
  });
}
