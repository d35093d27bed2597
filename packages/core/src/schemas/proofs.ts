/**
 * Proof Record Types
 *
 * Machine-checkable evidence written by the gate pipeline under
 * <module>/.phasegate/run/tasks/<task_id>/proofs/. Each proof kind is a
 * tagged record so a reader can tell a scope proof from a verify proof
 * without inspecting its fields.
 *
 * @module @phasegate/core/schemas/proofs
 */

import { z } from 'zod';

const Timestamp = z.string().datetime();
const Severity = z.number().int().nonnegative();

// =============================================================================
// Gate Proofs
// =============================================================================

export const ScopeProof = z.object({
  kind: z.literal('scope'),
  task_id: z.string().min(1),
  slice_id: z.string().min(1),
  passed: z.boolean(),
  allowed_paths: z.array(z.string()),
  changed_files: z.array(z.string()),
  violations: z.array(z.string()),
  checked_at: Timestamp,
});

export type ScopeProof = z.infer<typeof ScopeProof>;

/**
 * One executed external command
 */
export const CommandResult = z.object({
  argv: z.array(z.string()).min(1),
  exit_code: z.number().int(),
  stdout: z.string(),
  stderr: z.string(),
  duration_ms: z.number().nonnegative(),
});

export type CommandResult = z.infer<typeof CommandResult>;

/**
 * Why a command gate did not pass, when no command exit code explains it
 */
export const CommandGateFailure = z.enum(['commands_missing', 'command_failed', 'spawn_error']);

export type CommandGateFailure = z.infer<typeof CommandGateFailure>;

const CommandGateProofBase = z.object({
  task_id: z.string().min(1),
  slice_id: z.string().min(1),
  passed: z.boolean(),
  executed_count: z.number().int().nonnegative(),
  failure_reason: CommandGateFailure.nullable(),
  commands: z.array(CommandResult),
  log_path: z.string().nullable(),
  duration_ms: z.number().nonnegative(),
  checked_at: Timestamp,
});

export const VerifyProof = CommandGateProofBase.extend({ kind: z.literal('verify') });

export type VerifyProof = z.infer<typeof VerifyProof>;

export const E2eProof = CommandGateProofBase.extend({ kind: z.literal('e2e') });

export type E2eProof = z.infer<typeof E2eProof>;

export const ReviewProof = z.object({
  kind: z.literal('review'),
  task_id: z.string().min(1),
  slice_id: z.string().min(1),
  reviewer: z.string().min(1),
  p0: Severity,
  p1: Severity,
  p2: Severity,
  p3: Severity,
  passed: z.boolean(),
  notes: z.string(),
  recorded_at: Timestamp,
});

export type ReviewProof = z.infer<typeof ReviewProof>;

// =============================================================================
// Ready Proof (task level)
// =============================================================================

export const ReadyCheck = z.object({
  passed: z.boolean(),
  detail: z.string(),
});

export type ReadyCheck = z.infer<typeof ReadyCheck>;

export const ReadyProof = z.object({
  kind: z.literal('ready'),
  task_id: z.string().min(1),
  passed: z.boolean(),
  checks: z.record(z.string(), ReadyCheck),
  checked_at: Timestamp,
});

export type ReadyProof = z.infer<typeof ReadyProof>;

// =============================================================================
// Proof-Pack Manifest
// =============================================================================

export const ManifestGate = z.enum(['scope', 'verify', 'review', 'e2e']);

export type ManifestGate = z.infer<typeof ManifestGate>;

/**
 * Per-slice record of which gates passed (null = not run) and where their
 * proofs live, relative to the repository root.
 */
export const ProofManifest = z.object({
  kind: z.literal('manifest'),
  task_id: z.string().min(1),
  slice_id: z.string().min(1),
  gates: z.object({
    scope: z.boolean().nullable(),
    verify: z.boolean().nullable(),
    review: z.boolean().nullable(),
    e2e: z.boolean().nullable(),
  }),
  proofs: z.record(z.string(), z.string()),
  written_at: Timestamp,
});

export type ProofManifest = z.infer<typeof ProofManifest>;

// =============================================================================
// Incidents
// =============================================================================

export const IncidentSeverity = z.enum(['low', 'medium', 'high', 'critical']);

export type IncidentSeverity = z.infer<typeof IncidentSeverity>;

export const IncidentKind = z.enum([
  'token_waste',
  'implement_fail',
  'scope_config_missing',
  'scope_violation',
  'verify_policy_reject',
  'verify_config_missing',
  'verify_fail',
  'review_fail',
  'e2e_missing',
  'e2e_fail',
]);

export type IncidentKind = z.infer<typeof IncidentKind>;

export const Incident = z.object({
  id: z.string().regex(/^INC-[0-9a-f]{12}$/),
  severity: IncidentSeverity,
  kind: IncidentKind,
  phase: z.string().min(1),
  module_id: z.string().min(1),
  task_id: z.string().min(1),
  slice_id: z.string().nullable(),
  message: z.string(),
  remediation: z.string(),
  context: z.record(z.string(), z.unknown()),
  created_at: Timestamp,
});

export type Incident = z.infer<typeof Incident>;
