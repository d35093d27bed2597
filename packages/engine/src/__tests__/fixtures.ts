/**
 * Shared test fixtures: a throwaway repository with one registered module.
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger, type LocalConfig } from '@phasegate/core';
import { closeEngine, openEngine, type EngineContext } from '../context.js';
import { bootstrap, registerModule } from '../workspace/bootstrap.js';
import { approvePlan, createTask, freezeTask, recordCritic, type SliceDraft } from '../tasks/planning.js';

export const MODULE_ID = 'app';

const NODE = JSON.stringify(process.execPath);

/** Verify command that exits 0 */
export const PASS = `${NODE} -e "process.exit(0)"`;

/** Verify command that exits 1 */
export const FAIL = `${NODE} -e "process.exit(1)"`;

/**
 * Implement argv writing a file relative to the module root
 */
export function writeFileArgv(path: string, content = 'x'): string[] {
  return [
    process.execPath,
    '-e',
    `const fs = require('fs'); const p = require('path'); fs.mkdirSync(p.dirname(${JSON.stringify(path)}), { recursive: true }); fs.writeFileSync(${JSON.stringify(path)}, ${JSON.stringify(content)});`,
  ];
}

export interface TestRepo {
  root: string;
  ctx: EngineContext;
  cleanup: () => Promise<void>;
}

export function quietLogger(): Logger {
  return new Logger({ serviceName: 'phasegate-test', sink: () => undefined });
}

/**
 * Bootstrapped repository with module "app" at ./app
 */
export async function createRepo(config: Partial<LocalConfig> = {}): Promise<TestRepo> {
  const root = await fs.mkdtemp(join(tmpdir(), 'phasegate-engine-'));
  await fs.mkdir(join(root, '.phasegate', 'local'), { recursive: true });
  await fs.writeFile(join(root, '.phasegate', 'local', 'config.json'), JSON.stringify(config), 'utf-8');

  const ctx = await openEngine(root, { actor: 'tester', logger: quietLogger() });
  await bootstrap(ctx);
  await registerModule(ctx, { moduleId: MODULE_ID, path: 'app' });

  return {
    root,
    ctx,
    cleanup: async () => {
      closeEngine(ctx);
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}

/**
 * Create a task and take it through critic, freeze and plan approval
 */
export async function approvedTask(ctx: EngineContext, slices: readonly SliceDraft[]): Promise<string> {
  const { scope } = await createTask(ctx, { moduleId: MODULE_ID, title: 'Test task', slices });
  const taskId = scope.taskId;
  await recordCritic(ctx, { moduleId: MODULE_ID, taskId, p0: 0, p1: 0, p2: 1, p3: 0 });
  await freezeTask(ctx, MODULE_ID, taskId);
  await approvePlan(ctx, { moduleId: MODULE_ID, taskId });
  return taskId;
}

export async function eventTypes(ctx: EngineContext, taskId: string): Promise<string[]> {
  const events = await ctx.events.query({ taskId, limit: 1000 });
  return events.reverse().map((e) => e.type);
}
