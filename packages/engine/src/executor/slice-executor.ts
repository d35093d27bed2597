/**
 * Slice Executor
 *
 * Runs one attempt of one slice through the gate pipeline:
 *
 *   preconditions → attempt budget → implement → scope → verify → review → e2e → proof pack
 *
 * Every precondition is checked before anything is written. A failing gate
 * ends the attempt with an incident; retryable failures leave the slice in
 * gate_failed/review_failed until attempts run out, contract violations
 * block the slice and the task at once.
 *
 * @module @phasegate/engine/executor/slice-executor
 */

import { join } from 'node:path';
import {
  ApprovalRecord,
  PolicyError,
  PreconditionError,
  ProofManifest,
  diffSnapshots,
  formatCommandLog,
  isExecutableStatus,
  loadProfile,
  readRecordIfExists,
  runCommand,
  runWithLogContext,
  snapshotTree,
  writeRecord,
  writeTextAtomic,
  type Incident,
  type IncidentKind,
  type ManifestGate,
  type Profile,
  type SliceSpec,
  type SliceStatus,
} from '@phasegate/core';
import { emit, fileStamp, timestamp, type EngineContext } from '../context.js';
import { runE2eGate, runVerifyGate } from '../gates/command-gate.js';
import { e2eRequiredFor } from '../gates/ready-gate.js';
import { NO_FINDINGS, recordReview, type ReviewFindings } from '../gates/review-gate.js';
import { runScopeGate } from '../gates/scope-gate.js';
import type { GateFailure, GateName } from '../gates/types.js';
import { assertFreezeValid } from '../tasks/freeze.js';
import {
  findSlice,
  loadSlices,
  loadTaskState,
  resolveTask,
  sliceStateOf,
  transitionTask,
  updateSliceState,
  type TaskScope,
} from '../tasks/task-store.js';
import { pendingDependencies } from '../tasks/slice-graph.js';
import { logIncident, resolveFailure } from './incidents.js';

// =============================================================================
// Types
// =============================================================================

export interface ExecuteSliceOptions {
  moduleId: string;
  taskId: string;
  sliceId: string;
  /** Implementation step run in the module directory before the gates */
  implement?: readonly string[];
  /** Review findings for this attempt; defaults to a clean review by the actor */
  review?: Partial<ReviewFindings>;
  /** Overrides the slice and profile verify commands; still subject to the command policy */
  verifyCommands?: readonly string[];
  /** Overrides the slice and profile e2e commands */
  e2eCommands?: readonly string[];
  env?: NodeJS.ProcessEnv;
}

export type SliceRunStatus = 'ok' | 'gate_failed' | 'review_failed' | 'blocked';

export interface SliceRunResult {
  status: SliceRunStatus;
  moduleId: string;
  taskId: string;
  sliceId: string;
  attempts: number;
  maxAttempts: number;
  changedFiles: string[];
  gates: Record<ManifestGate, boolean | null>;
  /** Proof paths written during this attempt */
  proofs: Partial<Record<ManifestGate, string>>;
  manifestPath: string | null;
  failure: GateFailure | null;
  incident: Incident | null;
}

interface Attempt {
  ctx: EngineContext;
  scope: TaskScope;
  slice: SliceSpec;
  attempts: number;
  maxAttempts: number;
  changedFiles: string[];
  gates: Record<ManifestGate, boolean | null>;
  proofs: Partial<Record<ManifestGate, string>>;
}

// =============================================================================
// Preconditions
// =============================================================================

async function checkPreconditions(ctx: EngineContext, scope: TaskScope, sliceId: string): Promise<SliceSpec> {
  const state = await loadTaskState(scope);
  if (!isExecutableStatus(state.status)) {
    throw new PreconditionError(
      `Task ${scope.taskId} is ${state.status}; slices run only in plan_approved, executing or ready_validated`,
      { taskId: scope.taskId, status: state.status }
    );
  }

  const approval = await readRecordIfExists(scope.paths.approvalFile('plan'), ApprovalRecord, 'approval');
  if (!approval) {
    throw new PreconditionError(`Task ${scope.taskId} has no plan approval`, { taskId: scope.taskId });
  }

  await assertFreezeValid(scope.paths, 'run a slice');

  const slices = await loadSlices(scope);
  const slice = findSlice(slices, sliceId);

  const done = new Set(
    Object.entries(state.slices)
      .filter(([, s]) => s.status === 'done')
      .map(([id]) => id)
  );
  const pending = pendingDependencies(slice, done);
  if (pending.length > 0) {
    throw new PreconditionError(`Slice ${sliceId} has unfinished dependencies: ${pending.join(', ')}`, {
      sliceId,
      pending,
    });
  }

  if (sliceStateOf(ctx, state, slice).status === 'done') {
    throw new PreconditionError(`Slice ${sliceId} is already done`, { sliceId });
  }

  return slice;
}

// =============================================================================
// Outcomes
// =============================================================================

function statusFor(sliceStatus: SliceStatus, blocked: boolean): SliceRunStatus {
  if (blocked) return 'blocked';
  return sliceStatus === 'review_failed' ? 'review_failed' : 'gate_failed';
}

async function fail(
  attempt: Attempt,
  kind: IncidentKind,
  failure: GateFailure,
  context: Record<string, unknown> = {}
): Promise<SliceRunResult> {
  const { ctx, scope, slice } = attempt;
  const outcome = resolveFailure(kind, attempt.attempts, attempt.maxAttempts);

  const incident = await logIncident(ctx, scope, {
    kind,
    sliceId: slice.slice_id,
    message: failure.detail,
    context: { gate: failure.gate, reason: failure.reason, attempts: attempt.attempts, ...context },
  });

  await updateSliceState(ctx, scope, slice, { status: outcome.sliceStatus, lastError: failure.detail });

  if (outcome.blockTask) {
    await transitionTask(ctx, scope, 'blocked', {
      reason: outcome.blockReason,
      event: {
        type: 'task.blocked',
        sliceId: slice.slice_id,
        payload: { reason: outcome.blockReason, incident_id: incident.id },
      },
    });
  }

  ctx.logger.gateResult(failure.gate, false, { sliceId: slice.slice_id, reason: failure.reason });

  return {
    status: statusFor(outcome.sliceStatus, outcome.blockTask),
    moduleId: scope.moduleId,
    taskId: scope.taskId,
    sliceId: slice.slice_id,
    attempts: attempt.attempts,
    maxAttempts: attempt.maxAttempts,
    changedFiles: attempt.changedFiles,
    gates: attempt.gates,
    proofs: attempt.proofs,
    manifestPath: null,
    failure,
    incident,
  };
}

async function gateEvent(
  attempt: Attempt,
  gate: GateName,
  type: string,
  payload: Record<string, unknown>,
  proofPath: string | null
): Promise<void> {
  await emit(attempt.ctx, {
    type,
    module_id: attempt.scope.moduleId,
    task_id: attempt.scope.taskId,
    slice_id: attempt.slice.slice_id,
    payload: { gate, attempt: attempt.attempts, ...payload },
    artifacts: proofPath ? [proofPath] : [],
  });
}

// =============================================================================
// Steps
// =============================================================================

async function runImplement(attempt: Attempt, argv: readonly string[], env?: NodeJS.ProcessEnv): Promise<GateFailure | null> {
  const { ctx, scope, slice } = attempt;
  const result = runCommand(argv, { cwd: scope.moduleRoot, env });
  const logPath = join(
    scope.paths.logsDir,
    `implement-${slice.slice_id}-a${attempt.attempts}-${fileStamp(timestamp(ctx))}.log`
  );
  await writeTextAtomic(logPath, formatCommandLog(`implement ${scope.taskId}/${slice.slice_id}`, [result]));

  if (result.exit_code === 0) {
    return null;
  }
  return {
    gate: 'implement',
    reason: 'implement_failed',
    detail: `Implement command ${argv.join(' ')} exited with ${result.exit_code}`,
  };
}

function verifyCommandsFor(slice: SliceSpec, profile: Profile, override?: readonly string[]): string[] {
  if (override && override.length > 0) return [...override];
  return slice.verify_commands.length > 0 ? slice.verify_commands : profile.default_commands['verify'] ?? [];
}

function e2eCommandsFor(slice: SliceSpec, profile: Profile, override?: readonly string[]): string[] {
  if (override && override.length > 0) return [...override];
  return slice.e2e_commands.length > 0 ? slice.e2e_commands : profile.e2e.commands;
}

async function runGates(attempt: Attempt, profile: Profile, options: ExecuteSliceOptions): Promise<SliceRunResult | null> {
  const { ctx, scope, slice } = attempt;
  const required = new Set(slice.required_gates);
  const checkedAt = timestamp(ctx);

  // Scope
  if (required.has('scope') || slice.allowed_paths.length > 0) {
    if (slice.allowed_paths.length === 0) {
      return fail(attempt, 'scope_config_missing', {
        gate: 'scope',
        reason: 'scope_config_missing',
        detail: `Slice ${slice.slice_id} requires the scope gate but declares no allowed_paths`,
      });
    }
    const result = await runScopeGate({
      paths: scope.paths,
      sliceId: slice.slice_id,
      changedFiles: attempt.changedFiles,
      allowedPaths: slice.allowed_paths,
      checkedAt,
    });
    attempt.gates.scope = result.passed;
    attempt.proofs.scope = result.proofPath;
    await gateEvent(
      attempt,
      'scope',
      result.passed ? 'scope.check.passed' : 'scope.check.failed',
      { changed_files: result.proof.changed_files, violations: result.proof.violations },
      result.proofPath
    );
    if (!result.passed && required.has('scope')) {
      return fail(attempt, 'scope_violation', result.failure, { violations: result.proof.violations });
    }
  }

  // Verify
  const verifyCommands = verifyCommandsFor(slice, profile, options.verifyCommands);
  if (required.has('verify') || verifyCommands.length > 0) {
    if (verifyCommands.length === 0) {
      return fail(attempt, 'verify_config_missing', {
        gate: 'verify',
        reason: 'commands_missing',
        detail: `Slice ${slice.slice_id} requires the verify gate but no verify commands are configured`,
      });
    }
    try {
      const result = await runVerifyGate(
        {
          paths: scope.paths,
          sliceId: slice.slice_id,
          commands: verifyCommands,
          cwd: scope.moduleRoot,
          required: required.has('verify'),
          checkedAt,
          attempt: attempt.attempts,
          env: options.env,
        },
        { allowlist: ctx.config.allowlist_commands, denylist: ctx.config.denylist_commands }
      );
      attempt.gates.verify = result.passed;
      attempt.proofs.verify = result.proofPath;
      await gateEvent(
        attempt,
        'verify',
        result.passed ? 'verify.passed' : 'verify.failed',
        { executed_count: result.proof.executed_count, failure_reason: result.proof.failure_reason },
        result.proofPath
      );
      if (!result.passed && required.has('verify')) {
        return fail(attempt, 'verify_fail', result.failure, { log_path: result.proof.log_path });
      }
    } catch (error) {
      if (!(error instanceof PolicyError)) throw error;
      attempt.gates.verify = false;
      await gateEvent(attempt, 'verify', 'verify.failed', { failure_reason: 'policy', error: error.message }, null);
      return fail(attempt, 'verify_policy_reject', { gate: 'verify', reason: 'policy_rejected', detail: error.message });
    }
  }

  // Review is always recorded; it only stops the slice when required
  const findings: ReviewFindings = { reviewer: ctx.actor, ...NO_FINDINGS, ...options.review };
  const review = await recordReview(scope.paths, slice.slice_id, findings, checkedAt);
  attempt.gates.review = review.passed;
  attempt.proofs.review = review.proofPath;
  await gateEvent(
    attempt,
    'review',
    review.passed ? 'review.passed' : 'review.failed',
    { reviewer: findings.reviewer, p0: findings.p0, p1: findings.p1, p2: findings.p2, p3: findings.p3 },
    review.proofPath
  );
  if (!review.passed && required.has('review')) {
    return fail(attempt, 'review_fail', review.failure);
  }

  // E2E
  if (e2eRequiredFor(slice, profile)) {
    const commands = e2eCommandsFor(slice, profile, options.e2eCommands);
    if (commands.length === 0) {
      return fail(attempt, 'e2e_missing', {
        gate: 'e2e',
        reason: 'commands_missing',
        detail: `Slice ${slice.slice_id} requires e2e but no e2e commands are configured`,
      });
    }
    try {
      const result = await runE2eGate({
        paths: scope.paths,
        sliceId: slice.slice_id,
        commands,
        cwd: scope.moduleRoot,
        required: true,
        checkedAt,
        attempt: attempt.attempts,
        env: options.env,
      });
      attempt.gates.e2e = result.passed;
      attempt.proofs.e2e = result.proofPath;
      await gateEvent(
        attempt,
        'e2e',
        result.passed ? 'e2e.passed' : 'e2e.failed',
        { executed_count: result.proof.executed_count, failure_reason: result.proof.failure_reason },
        result.proofPath
      );
      if (!result.passed) {
        return fail(attempt, 'e2e_fail', result.failure, { log_path: result.proof.log_path });
      }
    } catch (error) {
      if (!(error instanceof PolicyError)) throw error;
      return fail(attempt, 'e2e_missing', { gate: 'e2e', reason: 'commands_unrunnable', detail: error.message });
    }
  }

  return null;
}

async function completeSlice(attempt: Attempt): Promise<SliceRunResult> {
  const { ctx, scope, slice } = attempt;
  const manifestPath = scope.paths.manifestFile(slice.slice_id);
  const proofs: Record<string, string> = {};
  for (const [gate, path] of Object.entries(attempt.proofs)) {
    proofs[gate] = ctx.layout.toRef(path);
  }

  await writeRecord(manifestPath, ProofManifest, 'manifest', {
    kind: 'manifest',
    task_id: scope.taskId,
    slice_id: slice.slice_id,
    gates: attempt.gates,
    proofs,
    written_at: timestamp(ctx),
  });

  const base = { module_id: scope.moduleId, task_id: scope.taskId, slice_id: slice.slice_id };
  await emit(ctx, {
    ...base,
    type: 'proof.pack.written',
    payload: { gates: attempt.gates, manifest: ctx.layout.toRef(manifestPath) },
    artifacts: [manifestPath],
  });

  await updateSliceState(ctx, scope, slice, { status: 'done', lastError: null });

  await emit(ctx, {
    ...base,
    type: 'slice.completed',
    payload: { attempts: attempt.attempts },
    artifacts: [manifestPath],
  });

  ctx.logger.info('Slice completed', { sliceId: slice.slice_id, attempts: attempt.attempts });

  return {
    status: 'ok',
    moduleId: scope.moduleId,
    taskId: scope.taskId,
    sliceId: slice.slice_id,
    attempts: attempt.attempts,
    maxAttempts: attempt.maxAttempts,
    changedFiles: attempt.changedFiles,
    gates: attempt.gates,
    proofs: attempt.proofs,
    manifestPath,
    failure: null,
    incident: null,
  };
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Run one attempt of a slice
 *
 * @throws NotFoundError when the module, task or slice does not exist
 * @throws PreconditionError when the task cannot run slices or dependencies are unfinished
 * @throws DriftError when plan.md or slices.json changed after the freeze
 */
export async function executeSlice(ctx: EngineContext, options: ExecuteSliceOptions): Promise<SliceRunResult> {
  return runWithLogContext(
    { command: 'slice.run', moduleId: options.moduleId, taskId: options.taskId, sliceId: options.sliceId },
    async () => {
      const scope = await resolveTask(ctx, options.moduleId, options.taskId);
      const slice = await checkPreconditions(ctx, scope, options.sliceId);
      const state = await loadTaskState(scope);
      const profile = await loadProfile(ctx.layout, state.profile);

      if (state.status === 'plan_approved') {
        await transitionTask(ctx, scope, 'executing', {
          event: { type: 'task.executing', sliceId: slice.slice_id },
        });
      }

      const current = sliceStateOf(ctx, state, slice);
      const maxAttempts = slice.max_attempts ?? state.max_attempts;
      const attempt: Attempt = {
        ctx,
        scope,
        slice,
        attempts: current.attempts,
        maxAttempts,
        changedFiles: [],
        gates: { scope: null, verify: null, review: null, e2e: null },
        proofs: {},
      };

      if (current.attempts >= maxAttempts) {
        return fail(attempt, 'token_waste', {
          gate: 'attempts',
          reason: 'max_attempts_exceeded',
          detail: `Slice ${slice.slice_id} already used ${current.attempts} of ${maxAttempts} attempts`,
        });
      }

      attempt.attempts = current.attempts + 1;
      await updateSliceState(ctx, scope, slice, {
        status: 'running',
        attempts: attempt.attempts,
        maxAttempts,
      });
      await emit(ctx, {
        type: 'slice.attempt.started',
        module_id: scope.moduleId,
        task_id: scope.taskId,
        slice_id: slice.slice_id,
        payload: { attempt: attempt.attempts, max_attempts: maxAttempts },
      });

      const before = await snapshotTree(scope.moduleRoot);
      if (options.implement && options.implement.length > 0) {
        const implementFailure = await runImplement(attempt, options.implement, options.env);
        if (implementFailure) {
          attempt.changedFiles = diffSnapshots(before, await snapshotTree(scope.moduleRoot));
          return fail(attempt, 'implement_fail', implementFailure);
        }
      }
      attempt.changedFiles = diffSnapshots(before, await snapshotTree(scope.moduleRoot));

      const failed = await runGates(attempt, profile, options);
      return failed ?? completeSlice(attempt);
    }
  );
}
