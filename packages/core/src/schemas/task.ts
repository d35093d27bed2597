/**
 * Task Record Types
 *
 * Schemas for everything stored under <module>/.phasegate/tasks/<task_id>/.
 *
 * @module @phasegate/core/schemas/task
 */

import { z } from 'zod';

const Timestamp = z.string().datetime();
const Sha256 = z.string().regex(/^[0-9a-f]{64}$/, 'expected a sha256 hex digest');
const Severity = z.number().int().nonnegative();

// =============================================================================
// Task State Machine
// =============================================================================

/**
 * Task statuses.
 *
 *   draft → critic_passed → frozen → plan_approved → executing → ready_validated → ready_approved → retro_done → closed
 *                                                              ↘ blocked ↗ (from executing/ready_validated, on to retro_done)
 */
export const TaskStatus = z.enum([
  'draft',
  'critic_passed',
  'frozen',
  'plan_approved',
  'executing',
  'ready_validated',
  'ready_approved',
  'blocked',
  'retro_done',
  'closed',
]);

export type TaskStatus = z.infer<typeof TaskStatus>;

/**
 * The only legal task transitions
 */
export const TASK_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  draft: ['critic_passed'],
  critic_passed: ['frozen'],
  frozen: ['plan_approved'],
  plan_approved: ['executing'],
  executing: ['ready_validated', 'blocked'],
  ready_validated: ['ready_approved', 'blocked'],
  ready_approved: ['retro_done'],
  blocked: ['retro_done'],
  retro_done: ['closed'],
  closed: [],
};

/**
 * Statuses from which a slice attempt may start
 */
export const EXECUTABLE_STATUSES: readonly TaskStatus[] = ['plan_approved', 'executing', 'ready_validated'];

/**
 * Slice statuses. No transition table: any gate result may set any status,
 * but `done` is never left.
 */
export const SliceStatus = z.enum(['pending', 'running', 'gate_failed', 'review_failed', 'blocked', 'done']);

export type SliceStatus = z.infer<typeof SliceStatus>;

/**
 * Gates a slice may declare as required. E2E is requested separately.
 */
export const RequiredGate = z.enum(['scope', 'verify', 'review']);

export type RequiredGate = z.infer<typeof RequiredGate>;

export const DEFAULT_REQUIRED_GATES: readonly RequiredGate[] = ['scope', 'verify', 'review'];

// =============================================================================
// Slice Spec (slices.json)
// =============================================================================

export const SliceSpec = z.object({
  slice_id: z.string().min(1),
  title: z.string().default(''),
  allowed_paths: z.array(z.string()),
  required_gates: z.array(RequiredGate),
  deps: z.array(z.string()),
  traceability: z.array(z.string()).default([]),
  /** Overrides the task's max_attempts when set */
  max_attempts: z.number().int().positive().nullable().default(null),
  verify_commands: z.array(z.string()),
  e2e_required: z.boolean().default(false),
  e2e_commands: z.array(z.string()).default([]),
});

export type SliceSpec = z.infer<typeof SliceSpec>;

export type SliceSpecInput = z.input<typeof SliceSpec>;

/**
 * Slice drafts as an operator writes them: a bare array or `{slices: [...]}`,
 * with ids, gates and commands optional
 */
export const SliceDraftsFile = z.union([
  z.array(SliceSpec.partial()),
  z.object({ slices: z.array(SliceSpec.partial()) }),
]);

export type SliceDraftsFile = z.infer<typeof SliceDraftsFile>;

export const SlicesDocument = z
  .object({
    task_id: z.string().min(1),
    slices: z.array(SliceSpec),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.slices.forEach((slice, index) => {
      if (seen.has(slice.slice_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['slices', index, 'slice_id'],
          message: `duplicate slice_id ${slice.slice_id}`,
        });
      }
      seen.add(slice.slice_id);
    });
  });

export type SlicesDocument = z.infer<typeof SlicesDocument>;

// =============================================================================
// Task State (task.json)
// =============================================================================

export const SliceState = z.object({
  status: SliceStatus,
  attempts: z.number().int().nonnegative(),
  max_attempts: z.number().int().positive(),
  last_error: z.string().nullable(),
  updated_at: Timestamp,
});

export type SliceState = z.infer<typeof SliceState>;

export const TaskState = z
  .object({
    task_id: z.string().min(1),
    module_id: z.string().min(1),
    mission_id: z.string().nullable(),
    profile: z.string().min(1),
    status: TaskStatus,
    blocked_reason: z.string().nullable(),
    max_attempts: z.number().int().positive(),
    slices: z.record(z.string(), SliceState),
    created_at: Timestamp,
    updated_at: Timestamp,
  })
  .superRefine((task, ctx) => {
    if (task.status === 'blocked' && !task.blocked_reason) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['blocked_reason'],
        message: 'blocked_reason is required when status is blocked',
      });
    }
  });

export type TaskState = z.infer<typeof TaskState>;

// =============================================================================
// Critic, Freeze, Approvals, Decisions
// =============================================================================

export const CriticReport = z.object({
  task_id: z.string().min(1),
  reviewed_by: z.string().min(1),
  p0: Severity,
  p1: Severity,
  p2: Severity,
  p3: Severity,
  notes: z.string(),
  passed: z.boolean(),
  reviewed_at: Timestamp,
});

export type CriticReport = z.infer<typeof CriticReport>;

export const FreezeRecord = z.object({
  task_id: z.string().min(1),
  plan_sha256: Sha256,
  slices_sha256: Sha256,
  frozen_at: Timestamp,
});

export type FreezeRecord = z.infer<typeof FreezeRecord>;

export const ApprovalKind = z.enum(['plan', 'ready', 'user_check']);

export type ApprovalKind = z.infer<typeof ApprovalKind>;

export const ApprovalRecord = z.object({
  task_id: z.string().min(1),
  kind: ApprovalKind,
  approved_by: z.string().min(1),
  approved_at: Timestamp,
  notes: z.string(),
});

export type ApprovalRecord = z.infer<typeof ApprovalRecord>;

export const DecisionRecord = z.object({
  task_id: z.string().min(1),
  decision: z.string().min(1),
  rationale: z.string(),
  decided_by: z.string().min(1),
  decided_at: Timestamp,
});

export type DecisionRecord = z.infer<typeof DecisionRecord>;
