/**
 * Engine session for one CLI invocation
 *
 * @module @phasegate/cli/session
 */

import { resolve } from 'node:path';
import { closeEngine, openEngine, type CommandScope, type EngineContext } from '@phasegate/engine';

export type GlobalOptions = {
  /** Repository root, defaults to the working directory */
  root?: string;
  /** Actor recorded on events */
  actor?: string;
};

/**
 * Open the engine for the repository, run `fn`, and close the event log
 * whatever the outcome
 */
export async function withEngine<T>(
  global: GlobalOptions,
  fn: (ctx: EngineContext) => Promise<T>
): Promise<T> {
  const ctx = await openEngine(resolve(global.root ?? process.cwd()), { actor: global.actor });
  try {
    return await fn(ctx);
  } finally {
    closeEngine(ctx);
  }
}

/**
 * Command-event scope for a task or slice target
 */
export function targetScope(target: { moduleId: string; taskId: string; sliceId?: string }): CommandScope {
  return { moduleId: target.moduleId, taskId: target.taskId, sliceId: target.sliceId };
}
