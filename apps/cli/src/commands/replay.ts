/**
 * phasegate replay --check
 *
 * Read-only: no command events are appended.
 *
 * @module @phasegate/cli/commands/replay
 */

import { replayCheck } from '@phasegate/engine';
import type { CommandOutcome } from '../output.js';
import { withEngine, type GlobalOptions } from '../session.js';

export interface ReplayOptions {
  /** Number of most recent events to replay */
  window?: number;
}

export async function replayCommand(global: GlobalOptions, options: ReplayOptions = {}): Promise<CommandOutcome> {
  return withEngine(global, async (ctx): Promise<CommandOutcome> => {
    const report = await replayCheck(ctx, options.window);
    return {
      ...report,
      status: report.status === 'ok' ? 'ok' : 'replay_failed',
    };
  });
}
