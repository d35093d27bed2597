/**
 * Command Events
 *
 * Brackets a mutating command with `command.started` and
 * `command.completed` / `command.failed` events.
 *
 * @module @phasegate/engine/workspace/command-tracking
 */

import { runWithLogContext, wrapError } from '@phasegate/core';
import { emit, type EngineContext } from '../context.js';

export interface CommandScope {
  missionId?: string;
  moduleId?: string;
  taskId?: string;
  sliceId?: string;
}

export async function trackCommand<T>(
  ctx: EngineContext,
  command: string,
  scope: CommandScope,
  fn: () => Promise<T>
): Promise<T> {
  const ids = {
    mission_id: scope.missionId ?? null,
    module_id: scope.moduleId ?? null,
    task_id: scope.taskId ?? null,
    slice_id: scope.sliceId ?? null,
  };

  return runWithLogContext({ command, ...scope, actor: ctx.actor }, async () => {
    await emit(ctx, { ...ids, type: 'command.started', payload: { command } });
    try {
      const result = await fn();
      await emit(ctx, { ...ids, type: 'command.completed', payload: { command } });
      return result;
    } catch (error) {
      const wrapped = wrapError(error);
      await emit(ctx, { ...ids, type: 'command.failed', payload: { command, code: wrapped.code, error: wrapped.message } });
      throw error;
    }
  });
}
