/**
 * CLI Command Tests
 *
 * Commands run against a throwaway repository; verify and implement steps
 * are `node` invocations.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { InvalidArgumentError } from 'commander';
import { execute, printOutcome } from '../../output.js';
import { createProgram, parseCount, parsePositive } from '../../program.js';
import type { GlobalOptions } from '../../session.js';
import { approveReadyCommand, validateReadyCommand } from '../gate.js';
import { replayCommand } from '../replay.js';
import { retroCommand } from '../retro.js';
import { markSliceCommand, runSliceCommand } from '../slice.js';
import { statusCommand } from '../status.js';
import { approvePlanCommand, closeCommand, criticCommand, decisionCommand, freezeCommand, newTaskCommand } from '../task.js';
import { bootstrapCommand, registerModuleCommand } from '../workspace.js';

const NODE = JSON.stringify(process.execPath);
const PASS = `${NODE} -e "process.exit(0)"`;
const FAIL = `${NODE} -e "process.exit(1)"`;

let root: string;
let global: GlobalOptions;

async function writeSlices(slices: unknown): Promise<string> {
  const path = join(root, 'slices.json');
  await fs.writeFile(path, JSON.stringify(slices), 'utf-8');
  return path;
}

/**
 * Implement command that writes one file relative to the module root
 */
async function touchCommand(relativePath: string): Promise<string> {
  const script = join(root, 'touch.cjs');
  await fs.writeFile(
    script,
    "const fs = require('fs'); const p = require('path'); const f = process.argv[2]; fs.mkdirSync(p.dirname(f), { recursive: true }); fs.writeFileSync(f, 'x');",
    'utf-8'
  );
  return `${NODE} ${JSON.stringify(script)} ${relativePath}`;
}

async function plannedTask(verifyCommand: string): Promise<string> {
  const created = await newTaskCommand(global, {
    moduleId: 'app',
    title: 'Add greeting',
    slices: await writeSlices({ slices: [{ title: 'core', allowed_paths: ['src'], verify_commands: [verifyCommand] }] }),
  });
  const taskId = String(created.task_id);
  await criticCommand(global, { moduleId: 'app', taskId, p0: 0, p1: 0, p2: 0, p3: 0 });
  await freezeCommand(global, { moduleId: 'app', taskId });
  await approvePlanCommand(global, { moduleId: 'app', taskId, approvedBy: 'lead' });
  return taskId;
}

beforeEach(async () => {
  root = await fs.mkdtemp(join(tmpdir(), 'phasegate-cli-'));
  global = { root, actor: 'tester' };
  await bootstrapCommand(global);
  await registerModuleCommand(global, { moduleId: 'app', path: 'app' });
});

afterEach(async () => {
  process.exitCode = 0;
  await fs.rm(root, { recursive: true, force: true });
});

// =============================================================================
// Workflow
// =============================================================================

describe('workflow commands', () => {
  it('takes a task from creation to a clean replay', async () => {
    const created = await newTaskCommand(global, {
      moduleId: 'app',
      title: 'Add greeting',
      goal: 'Greet the user.',
      slices: await writeSlices([{ title: 'core', allowed_paths: ['src'], verify_commands: [PASS] }]),
    });
    expect(created).toMatchObject({
      status: 'ok',
      task_id: 'T-0001',
      task_status: 'draft',
      slices: ['S-0001'],
      plan: 'app/.phasegate/tasks/T-0001/plan.md',
    });

    const ids = { moduleId: 'app', taskId: 'T-0001' };
    const critic = await criticCommand(global, { ...ids, p0: 0, p1: 0, p2: 1, p3: 0 });
    expect(critic.status).toBe('ok');
    expect((await freezeCommand(global, ids)).status).toBe('ok');
    expect((await approvePlanCommand(global, { ...ids, approvedBy: 'lead' })).approved_by).toBe('lead');

    const run = await runSliceCommand(global, { ...ids, sliceId: 'S-0001', implement: await touchCommand('src/greet.ts') });
    expect(run).toMatchObject({
      status: 'ok',
      attempts: 1,
      changed_files: ['src/greet.ts'],
      gates: { scope: true, verify: true, review: true, e2e: null },
      manifest: 'app/.phasegate/run/tasks/T-0001/proofs/S-0001/manifest.json',
      failure: null,
      incident: null,
    });

    const ready = await validateReadyCommand(global, ids);
    expect(ready).toMatchObject({
      status: 'ok',
      ready: true,
      handoff: 'app/.phasegate/run/tasks/T-0001/proofs/READY/handoff.md',
      failed_checks: [],
    });

    expect((await approveReadyCommand(global, ids)).status).toBe('ok');
    const retro = await retroCommand(global, { ...ids, feedback: 'smooth' });
    expect(retro).toMatchObject({ status: 'ok', retro: 'app/.phasegate/tasks/T-0001/retro.md', incidents: 0 });
    expect((await closeCommand(global, ids)).task_status).toBe('closed');

    const replay = await replayCommand(global);
    expect(replay.status).toBe('ok');
    expect(replay.violations).toEqual([]);
    expect(replay.next).toEqual({ recommended: 'phasegate status' });
  });

  it('reports a failed verify as a gate outcome with its incident', async () => {
    const taskId = await plannedTask(FAIL);
    const run = await runSliceCommand(global, { moduleId: 'app', taskId, sliceId: 'S-0001' });

    expect(run).toMatchObject({
      status: 'gate_failed',
      attempts: 1,
      max_attempts: 2,
      gates: { scope: true, verify: false, review: null, e2e: null },
      incident: { kind: 'verify_fail' },
    });
    expect(printOutcome(run, () => undefined)).toBe(10);
  });

  it('runs --verify-cmd commands in place of the declared ones', async () => {
    const taskId = await plannedTask(FAIL);
    const run = await runSliceCommand(global, { moduleId: 'app', taskId, sliceId: 'S-0001', verifyCmd: [PASS] });

    expect(run).toMatchObject({ status: 'ok', gates: { scope: true, verify: true, review: true, e2e: null } });
  });

  it('passes review findings through to the review gate', async () => {
    const taskId = await plannedTask(PASS);
    const run = await runSliceCommand(global, { moduleId: 'app', taskId, sliceId: 'S-0001', p1: 1, reviewNotes: 'missing test' });

    expect(run.status).toBe('review_failed');
    expect(run.incident).toMatchObject({ kind: 'review_fail' });
  });

  it('marks a slice and records a decision', async () => {
    const taskId = await plannedTask(PASS);

    const marked = await markSliceCommand(global, {
      moduleId: 'app',
      taskId,
      sliceId: 'S-0001',
      status: 'blocked',
      note: 'waiting on API keys',
    });
    expect(marked).toEqual({ status: 'ok', task_id: taskId, slice_id: 'S-0001', slice_status: 'blocked' });

    const decision = await decisionCommand(global, { moduleId: 'app', taskId, decision: 'Ship without caching' });
    expect(decision).toEqual({ status: 'ok', task_id: taskId, decision: 'Ship without caching' });
  });

  it('maps replay violations to replay_failed', async () => {
    const taskId = await plannedTask(PASS);
    await runSliceCommand(global, { moduleId: 'app', taskId, sliceId: 'S-0001' });
    await fs.rm(join(root, 'app', '.phasegate', 'run', 'tasks', taskId, 'proofs', 'S-0001', 'manifest.json'));

    const replay = await replayCommand(global);
    expect(replay.status).toBe('replay_failed');
    expect(replay.next).toEqual({
      recommended: `phasegate slice run --module-id app --task-id ${taskId} --slice-id S-0001`,
    });
    expect(printOutcome(replay, () => undefined)).toBe(30);
  });
});

// =============================================================================
// Output and Errors
// =============================================================================

describe('execute', () => {
  it('prints one JSON document and returns the exit code', async () => {
    const lines: string[] = [];
    const code = await execute(() => statusCommand(global), (text) => lines.push(text));

    expect(code).toBe(0);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual({ status: 'ok', tasks: [] });
  });

  it('turns thrown errors into an error document with exit code 20', async () => {
    const lines: string[] = [];
    const code = await execute(
      () => statusCommand(global, { taskId: 'T-0001' }),
      (text) => lines.push(text)
    );

    expect(code).toBe(20);
    expect(JSON.parse(lines[0])).toEqual({
      status: 'error',
      code: 'PRECONDITION_FAILED',
      message: '--task-id needs --module-id',
      context: { taskId: 'T-0001' },
    });
  });

  it('reports an unknown module as not found', async () => {
    const lines: string[] = [];
    const code = await execute(
      async () => newTaskCommand(global, { moduleId: 'ghost', title: 'x', slices: await writeSlices([]) }),
      (text) => lines.push(text)
    );

    expect(code).toBe(20);
    expect(JSON.parse(lines[0])).toMatchObject({ status: 'error', code: 'NOT_FOUND' });
  });
});

// =============================================================================
// Program
// =============================================================================

describe('createProgram', () => {
  it('runs a command and sets the exit code', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await createProgram().parseAsync(['node', 'phasegate', '--root', root, '--actor', 'tester', 'status']);

    expect(process.exitCode).toBe(0);
    expect(write).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(write.mock.calls[0][0]))).toEqual({ status: 'ok', tasks: [] });
  });

  it('lists created tasks', async () => {
    await plannedTask(PASS);
    const result = await statusCommand(global, { moduleId: 'app' });
    expect(result.tasks).toEqual([{ module_id: 'app', task_id: 'T-0001', status: 'plan_approved' }]);
  });
});

describe('option parsers', () => {
  it('accepts non-negative integers for counts', () => {
    expect(parseCount('0')).toBe(0);
    expect(parseCount('3')).toBe(3);
    expect(() => parseCount('-1')).toThrow(InvalidArgumentError);
    expect(() => parseCount('1.5')).toThrow(InvalidArgumentError);
  });

  it('requires positive integers for budgets', () => {
    expect(parsePositive('2')).toBe(2);
    expect(() => parsePositive('0')).toThrow('Expected a positive integer.');
  });
});
