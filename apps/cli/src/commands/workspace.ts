/**
 * phasegate bootstrap / phasegate module register
 *
 * @module @phasegate/cli/commands/workspace
 */

import { bootstrap, registerModule, trackCommand } from '@phasegate/engine';
import type { CommandOutcome } from '../output.js';
import { withEngine, type GlobalOptions } from '../session.js';

export async function bootstrapCommand(global: GlobalOptions): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const result = await bootstrap(ctx);
    return {
      status: 'ok',
      root: result.root,
      created: result.created,
    };
  });
}

export interface RegisterModuleOptions {
  moduleId: string;
  path: string;
}

export async function registerModuleCommand(
  global: GlobalOptions,
  options: RegisterModuleOptions
): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const entry = await trackCommand(ctx, 'module.register', { moduleId: options.moduleId }, () =>
      registerModule(ctx, { moduleId: options.moduleId, path: options.path })
    );
    return { status: 'ok', module: entry };
  });
}
