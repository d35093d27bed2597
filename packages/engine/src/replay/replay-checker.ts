/**
 * Replay / Invariant Checker
 *
 * Replays a bounded window of the event log oldest-first against the live
 * filesystem and checks each event's ordering and artifact preconditions.
 * Read-only: it never appends events or writes files. Content problems are
 * collected as violations, never thrown.
 *
 * The report carries no timestamps, so two runs over unchanged inputs are
 * byte-identical.
 *
 * @module @phasegate/engine/replay/replay-checker
 */

import { existsSync } from 'node:fs';
import type { EventEnvelope, Layout } from '@phasegate/core';
import type { EngineContext } from '../context.js';

// =============================================================================
// Types
// =============================================================================

export const VIOLATION_KINDS = [
  'freeze_without_critic',
  'freeze_missing',
  'plan_approval_without_freeze',
  'plan_approval_missing',
  'proof_manifest_missing',
  'slice_complete_without_proof',
  'ready_without_plan_approval',
  'ready_proof_missing',
  'ready_handoff_missing',
  'ready_approval_without_validation',
  'ready_approval_missing',
  'retro_file_missing',
  'retro_patch_missing',
] as const;

export type ViolationKind = (typeof VIOLATION_KINDS)[number];

export interface Violation {
  kind: ViolationKind;
  event_id: string;
  module_id: string | null;
  task_id: string | null;
  slice_id: string | null;
  message: string;
  refs: string[];
}

export interface ReplayCheck {
  event_id: string;
  event_type: string;
  name: string;
  passed: boolean;
}

export interface ReplayReport {
  status: 'ok' | 'failed';
  events: number;
  checks: ReplayCheck[];
  violations: string[];
  violation_details: Violation[];
  refs: string[];
  next: { recommended: string };
}

// =============================================================================
// Remediation Lookup
// =============================================================================

type Scope = Pick<Violation, 'module_id' | 'task_id' | 'slice_id'>;

function taskArgs(scope: Scope): string {
  return `--module-id ${scope.module_id ?? '<module>'} --task-id ${scope.task_id ?? '<task>'}`;
}

const REMEDIATION: Record<ViolationKind, (scope: Scope) => string> = {
  freeze_without_critic: (s) => `phasegate task critic ${taskArgs(s)}`,
  freeze_missing: (s) => `phasegate task freeze ${taskArgs(s)}`,
  plan_approval_without_freeze: (s) => `phasegate task freeze ${taskArgs(s)}`,
  plan_approval_missing: (s) => `phasegate task approve-plan ${taskArgs(s)}`,
  proof_manifest_missing: (s) => `phasegate slice run ${taskArgs(s)} --slice-id ${s.slice_id ?? '<slice>'}`,
  slice_complete_without_proof: (s) => `phasegate slice run ${taskArgs(s)} --slice-id ${s.slice_id ?? '<slice>'}`,
  ready_without_plan_approval: (s) => `phasegate task approve-plan ${taskArgs(s)}`,
  ready_proof_missing: (s) => `phasegate gate validate-ready ${taskArgs(s)}`,
  ready_handoff_missing: (s) => `phasegate gate validate-ready ${taskArgs(s)}`,
  ready_approval_without_validation: (s) => `phasegate gate validate-ready ${taskArgs(s)}`,
  ready_approval_missing: (s) => `phasegate gate approve-ready ${taskArgs(s)}`,
  retro_file_missing: (s) => `phasegate retro run ${taskArgs(s)}`,
  retro_patch_missing: (s) => `phasegate retro run ${taskArgs(s)}`,
};

export const ALL_CLEAR_COMMAND = 'phasegate status';

export function recommendFor(violation: Violation | undefined): string {
  return violation ? REMEDIATION[violation.kind](violation) : ALL_CLEAR_COMMAND;
}

// =============================================================================
// Replay State
// =============================================================================

class ReplayState {
  readonly criticPassed = new Set<string>();
  readonly frozen = new Set<string>();
  readonly planApproved = new Set<string>();
  readonly readyValidated = new Set<string>();
  /** module:task:slice → manifest ref from the latest proof.pack.written */
  readonly manifests = new Map<string, string>();
  readonly checks: ReplayCheck[] = [];
  readonly violations: Violation[] = [];

  constructor(private readonly layout: Layout) {}

  exists(ref: string): boolean {
    return existsSync(this.layout.fromRef(ref));
  }

  check(event: EventEnvelope, name: string, passed: boolean): boolean {
    this.checks.push({ event_id: event.id, event_type: event.type, name, passed });
    return passed;
  }

  violate(event: EventEnvelope, kind: ViolationKind, message: string, refs: string[] = []): void {
    this.violations.push({
      kind,
      event_id: event.id,
      module_id: event.module_id,
      task_id: event.task_id,
      slice_id: event.slice_id,
      message,
      refs,
    });
  }
}

function taskKey(event: EventEnvelope): string {
  return `${event.module_id ?? ''}:${event.task_id ?? ''}`;
}

function sliceKey(event: EventEnvelope): string {
  return `${taskKey(event)}:${event.slice_id ?? ''}`;
}

function findRef(event: EventEnvelope, suffix: string): string | undefined {
  return event.artifact_refs.find((ref) => ref === suffix || ref.endsWith(`/${suffix}`));
}

function label(event: EventEnvelope): string {
  const slice = event.slice_id ? `/${event.slice_id}` : '';
  return `${event.type} ${event.module_id ?? '?'}/${event.task_id ?? '?'}${slice}`;
}

/**
 * Check that an expected artifact is referenced and present on disk
 */
function requireArtifact(
  state: ReplayState,
  event: EventEnvelope,
  name: string,
  suffix: string,
  kind: ViolationKind,
  what: string
): void {
  const ref = findRef(event, suffix);
  const passed = ref !== undefined && state.exists(ref);
  if (!state.check(event, name, passed)) {
    state.violate(
      event,
      kind,
      ref ? `${label(event)}: ${what} missing at ${ref}` : `${label(event)}: no ${what} referenced`,
      ref ? [ref] : []
    );
  }
}

function requirePrior(
  state: ReplayState,
  event: EventEnvelope,
  name: string,
  seen: Set<string>,
  kind: ViolationKind,
  prior: string
): void {
  if (!state.check(event, name, seen.has(taskKey(event)))) {
    state.violate(event, kind, `${label(event)}: no prior ${prior}`);
  }
}

// =============================================================================
// Event Handlers
// =============================================================================

function apply(state: ReplayState, event: EventEnvelope): void {
  const key = taskKey(event);

  switch (event.type) {
    case 'task.critic_passed':
      state.criticPassed.add(key);
      return;

    case 'task.frozen':
      requirePrior(state, event, 'critic_before_freeze', state.criticPassed, 'freeze_without_critic', 'task.critic_passed');
      requireArtifact(state, event, 'freeze_file_exists', 'freeze.json', 'freeze_missing', 'freeze record');
      state.frozen.add(key);
      return;

    case 'task.plan_approved':
      requirePrior(state, event, 'freeze_before_plan_approval', state.frozen, 'plan_approval_without_freeze', 'task.frozen');
      requireArtifact(state, event, 'plan_approval_exists', 'approvals/plan.json', 'plan_approval_missing', 'plan approval');
      state.planApproved.add(key);
      return;

    case 'proof.pack.written': {
      const ref = findRef(event, 'manifest.json');
      if (ref) {
        state.manifests.set(sliceKey(event), ref);
      }
      requireArtifact(state, event, 'proof_manifest_exists', 'manifest.json', 'proof_manifest_missing', 'proof manifest');
      return;
    }

    case 'slice.completed': {
      const ref = state.manifests.get(sliceKey(event)) ?? findRef(event, 'manifest.json');
      const passed = ref !== undefined && state.exists(ref);
      if (!state.check(event, 'slice_manifest_exists', passed)) {
        state.violate(
          event,
          'slice_complete_without_proof',
          ref ? `${label(event)}: proof manifest missing at ${ref}` : `${label(event)}: no proof manifest recorded`,
          ref ? [ref] : []
        );
      }
      return;
    }

    case 'ready.validated':
      requirePrior(state, event, 'plan_approval_before_ready', state.planApproved, 'ready_without_plan_approval', 'task.plan_approved');
      requireArtifact(state, event, 'ready_proof_exists', 'proofs/ready.json', 'ready_proof_missing', 'ready proof');
      requireArtifact(state, event, 'ready_handoff_exists', 'READY/handoff.md', 'ready_handoff_missing', 'READY handoff');
      state.readyValidated.add(key);
      return;

    case 'ready.approved': {
      requirePrior(state, event, 'validation_before_ready_approval', state.readyValidated, 'ready_approval_without_validation', 'ready.validated');
      const expected = ['proofs/ready.json', 'READY/handoff.md', 'approvals/ready.json'];
      const missing = expected.filter((suffix) => {
        const ref = findRef(event, suffix);
        return ref === undefined || !state.exists(ref);
      });
      if (!state.check(event, 'ready_approval_artifacts_exist', missing.length === 0)) {
        const refs = missing.flatMap((suffix) => {
          const ref = findRef(event, suffix);
          return ref ? [ref] : [];
        });
        state.violate(event, 'ready_approval_missing', `${label(event)}: missing ${missing.join(', ')}`, refs);
      }
      return;
    }

    case 'retro.completed': {
      requireArtifact(state, event, 'retro_file_exists', 'retro.md', 'retro_file_missing', 'retro narrative');
      const patch = event.artifact_refs.find((ref) => ref.includes('/patches/'));
      if (!state.check(event, 'retro_patch_exists', patch !== undefined && state.exists(patch))) {
        state.violate(
          event,
          'retro_patch_missing',
          patch ? `${label(event)}: patch proposal missing at ${patch}` : `${label(event)}: no patch proposal referenced`,
          patch ? [patch] : []
        );
      }
      return;
    }

    default:
      return;
  }
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Build a report from events already ordered oldest-first
 */
export function replayEvents(layout: Layout, events: readonly EventEnvelope[]): ReplayReport {
  const state = new ReplayState(layout);
  for (const event of events) {
    apply(state, event);
  }

  const messages = [...new Set(state.violations.map((v) => v.message))];
  const refs = [...new Set(state.violations.flatMap((v) => v.refs))].sort();

  return {
    status: state.violations.length === 0 ? 'ok' : 'failed',
    events: events.length,
    checks: state.checks,
    violations: messages,
    violation_details: state.violations,
    refs,
    next: { recommended: recommendFor(state.violations[0]) },
  };
}

/**
 * Replay the most recent `replay_window` events of the repository log
 */
export async function replayCheck(ctx: EngineContext, window = ctx.config.replay_window): Promise<ReplayReport> {
  const newestFirst = await ctx.events.query({ limit: window });
  const report = replayEvents(ctx.layout, [...newestFirst].reverse());

  if (report.status === 'failed') {
    ctx.logger.warn('Replay found violations', { violations: report.violation_details.length });
  } else {
    ctx.logger.info('Replay ok', { events: report.events, checks: report.checks.length });
  }
  return report;
}
