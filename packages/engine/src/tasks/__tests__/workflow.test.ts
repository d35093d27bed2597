/**
 * Task Workflow Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import {
  CyclicSliceDependencyError,
  DriftError,
  FreezeRecord,
  NotFoundError,
  PreconditionError,
  TransitionError,
  pathExists,
  readRecord,
  sha256Hex,
} from '@phasegate/core';
import {
  approvePlan,
  closeTask,
  createTask,
  describeTask,
  freezeTask,
  listTasks,
  markSlice,
  recordCritic,
  recordDecision,
  resolveTask,
  runRetro,
} from '../../index.js';
import { MODULE_ID, PASS, approvedTask, createRepo, eventTypes, type TestRepo } from '../../__tests__/fixtures.js';

let repo: TestRepo;

beforeEach(async () => {
  repo = await createRepo();
});

afterEach(async () => {
  await repo.cleanup();
});

const ONE_SLICE = [{ title: 'core', allowed_paths: ['src'], verify_commands: [PASS] }];

describe('createTask', () => {
  it('allocates sequential ids and writes the task files', async () => {
    const first = await createTask(repo.ctx, { moduleId: MODULE_ID, title: 'First', slices: ONE_SLICE });
    const second = await createTask(repo.ctx, { moduleId: MODULE_ID, title: 'Second', slices: ONE_SLICE });

    expect(first.scope.taskId).toBe('T-0001');
    expect(second.scope.taskId).toBe('T-0002');
    expect(first.state.status).toBe('draft');
    expect(first.state.max_attempts).toBe(2);
    expect(first.slices[0]?.slice_id).toBe('S-0001');
    expect(first.slices[0]?.required_gates).toEqual(['scope', 'verify', 'review']);

    const plan = await fs.readFile(first.scope.paths.planFile, 'utf-8');
    expect(plan.split('\n')[0]).toBe('# T-0001: First');
    expect(plan).toContain('- S-0001: core (paths: src; gates: scope, verify, review)');
  });

  it('emits task.created and one slice.created per slice', async () => {
    await createTask(repo.ctx, {
      moduleId: MODULE_ID,
      title: 'Two slices',
      slices: [...ONE_SLICE, { title: 'docs', allowed_paths: ['docs'], deps: ['S-0001'], verify_commands: [PASS] }],
    });
    expect(await eventTypes(repo.ctx, 'T-0001')).toEqual(['task.created', 'slice.created', 'slice.created']);
  });

  it('rejects cyclic slice graphs before writing anything', async () => {
    await expect(
      createTask(repo.ctx, {
        moduleId: MODULE_ID,
        title: 'Cycle',
        slices: [
          { slice_id: 'A', allowed_paths: ['src'], deps: ['B'] },
          { slice_id: 'B', allowed_paths: ['src'], deps: ['A'] },
        ],
      })
    ).rejects.toBeInstanceOf(CyclicSliceDependencyError);

    const scope = await resolveTask(repo.ctx, MODULE_ID, 'T-0001');
    expect(await pathExists(scope.paths.taskFile)).toBe(false);
  });

  it('rejects unknown modules', async () => {
    await expect(createTask(repo.ctx, { moduleId: 'nope', title: 'x', slices: [] })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});

describe('planning phase', () => {
  it('keeps a task in draft when the critic finds P1 issues', async () => {
    const { scope } = await createTask(repo.ctx, { moduleId: MODULE_ID, title: 'T', slices: ONE_SLICE });
    const report = await recordCritic(repo.ctx, { moduleId: MODULE_ID, taskId: scope.taskId, p0: 0, p1: 1, p2: 0, p3: 0 });

    expect(report.passed).toBe(false);
    expect((await describeTask(repo.ctx, MODULE_ID, scope.taskId)).status).toBe('draft');
    expect(await eventTypes(repo.ctx, scope.taskId)).toContain('task.critic_failed');
    await expect(freezeTask(repo.ctx, MODULE_ID, scope.taskId)).rejects.toBeInstanceOf(TransitionError);
  });

  it('freezes sha256 digests of plan and slices', async () => {
    const { scope } = await createTask(repo.ctx, { moduleId: MODULE_ID, title: 'T', slices: ONE_SLICE });
    await recordCritic(repo.ctx, { moduleId: MODULE_ID, taskId: scope.taskId, p0: 0, p1: 0, p2: 0, p3: 0 });
    const freeze = await freezeTask(repo.ctx, MODULE_ID, scope.taskId);

    const plan = await fs.readFile(scope.paths.planFile);
    expect(freeze.plan_sha256).toBe(sha256Hex(plan));
    expect(await readRecord(scope.paths.freezeFile, FreezeRecord, 'freeze')).toEqual(freeze);
  });

  it('refuses plan approval after plan drift without writing the approval', async () => {
    const { scope } = await createTask(repo.ctx, { moduleId: MODULE_ID, title: 'T', slices: ONE_SLICE });
    await recordCritic(repo.ctx, { moduleId: MODULE_ID, taskId: scope.taskId, p0: 0, p1: 0, p2: 0, p3: 0 });
    await freezeTask(repo.ctx, MODULE_ID, scope.taskId);
    await fs.appendFile(scope.paths.planFile, '\nOne more requirement.\n');

    const attempt = approvePlan(repo.ctx, { moduleId: MODULE_ID, taskId: scope.taskId });
    await expect(attempt).rejects.toBeInstanceOf(DriftError);
    await expect(approvePlan(repo.ctx, { moduleId: MODULE_ID, taskId: scope.taskId })).rejects.toThrow(
      'Cannot approve plan with freeze drift (plan drift)'
    );

    expect(await pathExists(scope.paths.approvalFile('plan'))).toBe(false);
    expect((await describeTask(repo.ctx, MODULE_ID, scope.taskId)).status).toBe('frozen');
  });

  it('moves through the planning statuses with matching events', async () => {
    const taskId = await approvedTask(repo.ctx, ONE_SLICE);
    expect((await describeTask(repo.ctx, MODULE_ID, taskId)).status).toBe('plan_approved');
    expect(await eventTypes(repo.ctx, taskId)).toEqual([
      'task.created',
      'slice.created',
      'task.critic_passed',
      'task.frozen',
      'task.plan_approved',
    ]);
  });
});

describe('operator records', () => {
  it('refuses to mark a slice done by hand', async () => {
    const taskId = await approvedTask(repo.ctx, ONE_SLICE);
    await expect(
      markSlice(repo.ctx, { moduleId: MODULE_ID, taskId, sliceId: 'S-0001', status: 'done', note: 'trust me' })
    ).rejects.toBeInstanceOf(PreconditionError);
  });

  it('marks a slice with a note', async () => {
    const taskId = await approvedTask(repo.ctx, ONE_SLICE);
    const state = await markSlice(repo.ctx, {
      moduleId: MODULE_ID,
      taskId,
      sliceId: 'S-0001',
      status: 'blocked',
      note: 'waiting on API access',
    });
    expect(state.status).toBe('blocked');
    expect(state.last_error).toBe('waiting on API access');
    expect(await eventTypes(repo.ctx, taskId)).toContain('slice.marked');
  });

  it('appends decisions', async () => {
    const taskId = await approvedTask(repo.ctx, ONE_SLICE);
    await recordDecision(repo.ctx, { moduleId: MODULE_ID, taskId, decision: 'Use SQLite', rationale: 'embedded' });
    await recordDecision(repo.ctx, { moduleId: MODULE_ID, taskId, decision: 'No timeouts' });

    const scope = await resolveTask(repo.ctx, MODULE_ID, taskId);
    const lines = (await fs.readFile(scope.paths.decisionsFile, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '{}').decided_by).toBe('tester');
  });
});

describe('retro and close', () => {
  it('requires ready_approved or blocked', async () => {
    const taskId = await approvedTask(repo.ctx, ONE_SLICE);
    await expect(runRetro(repo.ctx, { moduleId: MODULE_ID, taskId })).rejects.toBeInstanceOf(TransitionError);
    await expect(closeTask(repo.ctx, MODULE_ID, taskId)).rejects.toBeInstanceOf(TransitionError);
  });

  it('lists tasks per module', async () => {
    await createTask(repo.ctx, { moduleId: MODULE_ID, title: 'A', slices: ONE_SLICE });
    await approvedTask(repo.ctx, ONE_SLICE);
    expect(await listTasks(repo.ctx)).toEqual([
      { module_id: MODULE_ID, task_id: 'T-0001', status: 'draft' },
      { module_id: MODULE_ID, task_id: 'T-0002', status: 'plan_approved' },
    ]);
  });
});
