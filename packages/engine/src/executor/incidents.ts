/**
 * Incidents and Failure Policy
 *
 * Every blocking or failing slice outcome becomes an Incident, written to
 * the process-wide incident log and the task's own incident log, with a
 * matching `incident.logged` event.
 *
 * @module @phasegate/engine/executor/incidents
 */

import { randomBytes } from 'node:crypto';
import {
  Incident,
  appendJsonLine,
  type IncidentKind,
  type IncidentSeverity,
  type SliceStatus,
} from '@phasegate/core';
import { emit, timestamp, type EngineContext } from '../context.js';
import type { TaskScope } from '../tasks/task-store.js';

// =============================================================================
// Policy Table
// =============================================================================

interface IncidentPolicy {
  severity: IncidentSeverity;
  phase: string;
  /** Contract violations block immediately; the rest retry until attempts run out */
  blocking: boolean;
  /** Slice status for a retryable failure with attempts left */
  retryStatus: SliceStatus;
  /** Task blocked_reason */
  blockReason: string;
  remediation: string;
}

export const INCIDENT_POLICIES: Record<IncidentKind, IncidentPolicy> = {
  token_waste: {
    severity: 'high',
    phase: 'attempt',
    blocking: true,
    retryStatus: 'blocked',
    blockReason: 'max attempts exceeded',
    remediation: 'Split the slice or revise the plan, then re-run the critic and freeze before retrying.',
  },
  implement_fail: {
    severity: 'medium',
    phase: 'implement',
    blocking: false,
    retryStatus: 'gate_failed',
    blockReason: 'implement retries exceeded',
    remediation: 'Inspect the implement log, fix the failure and run the slice again.',
  },
  scope_config_missing: {
    severity: 'high',
    phase: 'scope',
    blocking: true,
    retryStatus: 'blocked',
    blockReason: 'scope configuration missing',
    remediation: 'Declare allowed_paths for the slice in slices.json, then re-freeze and re-approve the plan.',
  },
  scope_violation: {
    severity: 'high',
    phase: 'scope',
    blocking: true,
    retryStatus: 'blocked',
    blockReason: 'scope violation',
    remediation: 'Revert changes outside allowed_paths or amend the plan to include them.',
  },
  verify_policy_reject: {
    severity: 'high',
    phase: 'verify',
    blocking: false,
    retryStatus: 'gate_failed',
    blockReason: 'verify retries exceeded',
    remediation: 'Replace denied or piped verify commands with allowed single commands.',
  },
  verify_config_missing: {
    severity: 'high',
    phase: 'verify',
    blocking: true,
    retryStatus: 'blocked',
    blockReason: 'verify configuration missing',
    remediation: 'Declare verify_commands for the slice or default verify commands in the profile.',
  },
  verify_fail: {
    severity: 'medium',
    phase: 'verify',
    blocking: false,
    retryStatus: 'gate_failed',
    blockReason: 'verify retries exceeded',
    remediation: 'Read the verify log, fix the failing command and run the slice again.',
  },
  review_fail: {
    severity: 'medium',
    phase: 'review',
    blocking: false,
    retryStatus: 'review_failed',
    blockReason: 'review retries exceeded',
    remediation: 'Address the P0/P1 review findings and run the slice again.',
  },
  e2e_missing: {
    severity: 'high',
    phase: 'e2e',
    blocking: true,
    retryStatus: 'blocked',
    blockReason: 'e2e configuration missing',
    remediation: 'Declare runnable e2e commands on the slice or in the profile.',
  },
  e2e_fail: {
    severity: 'medium',
    phase: 'e2e',
    blocking: false,
    retryStatus: 'gate_failed',
    blockReason: 'e2e retries exceeded',
    remediation: 'Read the e2e log, fix the failing scenario and run the slice again.',
  },
};

export interface FailureOutcome {
  sliceStatus: SliceStatus;
  blockTask: boolean;
  blockReason: string;
}

/**
 * Decide slice and task consequences of a failure
 */
export function resolveFailure(kind: IncidentKind, attempts: number, maxAttempts: number): FailureOutcome {
  const policy = INCIDENT_POLICIES[kind];
  const exhausted = attempts >= maxAttempts;
  const block = policy.blocking || exhausted;
  return {
    sliceStatus: block ? 'blocked' : policy.retryStatus,
    blockTask: block,
    blockReason: policy.blockReason,
  };
}

// =============================================================================
// Incident Log
// =============================================================================

export interface IncidentInput {
  kind: IncidentKind;
  sliceId: string | null;
  message: string;
  context?: Record<string, unknown>;
}

export function newIncidentId(): string {
  return `INC-${randomBytes(6).toString('hex')}`;
}

/**
 * Write an incident to both logs and append `incident.logged`
 */
export async function logIncident(ctx: EngineContext, scope: TaskScope, input: IncidentInput): Promise<Incident> {
  const policy = INCIDENT_POLICIES[input.kind];
  const record = {
    id: newIncidentId(),
    severity: policy.severity,
    kind: input.kind,
    phase: policy.phase,
    module_id: scope.moduleId,
    task_id: scope.taskId,
    slice_id: input.sliceId,
    message: input.message,
    remediation: policy.remediation,
    context: input.context ?? {},
    created_at: timestamp(ctx),
  };

  const incident = await appendJsonLine(ctx.layout.incidentLogFile, Incident, 'incident', record);
  await appendJsonLine(scope.paths.incidentsFile, Incident, 'incident', record);

  const logData = { incidentId: incident.id, kind: incident.kind, incidentSeverity: incident.severity };
  if (policy.blocking) {
    ctx.logger.critical('Blocking incident logged', undefined, logData);
  } else {
    ctx.logger.warn('Incident logged', logData);
  }

  await emit(ctx, {
    type: 'incident.logged',
    module_id: scope.moduleId,
    task_id: scope.taskId,
    slice_id: input.sliceId,
    payload: {
      incident_id: incident.id,
      kind: incident.kind,
      severity: incident.severity,
      phase: incident.phase,
      message: incident.message,
    },
    artifacts: [scope.paths.incidentsFile],
  });

  return incident;
}
