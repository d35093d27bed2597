/**
 * Ready Gate
 *
 * Task-level aggregate. Walks every slice spec and, for each gate the slice
 * requires, demands a passing proof; verify must also have executed at least
 * one command. E2E proofs are demanded where the slice or the profile asks
 * for e2e. Also checks the freeze, plan approval and, when required, a
 * recorded user check. Writes the readiness proof and a handoff document
 * with manual smoke-test steps.
 *
 * @module @phasegate/engine/gates/ready-gate
 */

import {
  ApprovalRecord,
  E2eProof,
  ProofManifest,
  ReadyProof,
  ReviewProof,
  ScopeProof,
  VerifyProof,
  pathExists,
  readRecordIfExists,
  writeRecord,
  writeTextAtomic,
  type LocalConfig,
  type Profile,
  type ReadyCheck,
  type SliceSpec,
  type TaskPaths,
} from '@phasegate/core';
import { checkFreeze } from '../tasks/freeze.js';
import { gateResult, type GateResult } from './types.js';

export const READY_CHECKS = [
  'freeze_valid',
  'plan_approval_exists',
  'latest_scope_proof_ok',
  'verify_coverage_ok',
  'review_ok',
  'e2e_ok_if_required',
  'user_check_recorded',
] as const;

export type ReadyCheckName = (typeof READY_CHECKS)[number];

export interface ReadyGateInput {
  paths: TaskPaths;
  moduleId: string;
  slices: readonly SliceSpec[];
  profile: Profile;
  config: LocalConfig;
  checkedAt: string;
  /** Converts absolute paths to the references shown in the handoff */
  toRef: (path: string) => string;
}

export function userCheckRequired(profile: Profile, config: LocalConfig): boolean {
  switch (config.user_check_mode) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'profile_optional':
      return profile.user_check_required;
  }
}

export function e2eRequiredFor(slice: SliceSpec, profile: Profile): boolean {
  return slice.e2e_required || profile.e2e.required;
}

function check(problems: string[]): ReadyCheck {
  return problems.length === 0 ? { passed: true, detail: 'ok' } : { passed: false, detail: problems.join('; ') };
}

async function sliceProblems(
  input: ReadyGateInput
): Promise<Record<'scope' | 'verify' | 'review' | 'e2e', string[]>> {
  const problems: Record<'scope' | 'verify' | 'review' | 'e2e', string[]> = { scope: [], verify: [], review: [], e2e: [] };
  const { paths } = input;

  for (const slice of input.slices) {
    const id = slice.slice_id;

    if (slice.required_gates.includes('scope')) {
      const proof = await readRecordIfExists(paths.proofFile(id, 'scope'), ScopeProof, 'scope_proof');
      if (!proof) problems.scope.push(`${id}: missing scope proof`);
      else if (!proof.passed) problems.scope.push(`${id}: scope proof failed`);
    }

    if (slice.required_gates.includes('verify')) {
      const proof = await readRecordIfExists(paths.proofFile(id, 'verify'), VerifyProof, 'verify_proof');
      if (!proof) problems.verify.push(`${id}: missing verify proof`);
      else if (!proof.passed) problems.verify.push(`${id}: verify proof failed`);
      else if (proof.executed_count === 0) problems.verify.push(`${id}: verify executed no commands`);
    }

    if (slice.required_gates.includes('review')) {
      const proof = await readRecordIfExists(paths.proofFile(id, 'review'), ReviewProof, 'review_proof');
      if (!proof) problems.review.push(`${id}: missing review proof`);
      else if (!proof.passed || proof.p0 !== 0 || proof.p1 !== 0) problems.review.push(`${id}: review has P0/P1 findings`);
    }

    if (e2eRequiredFor(slice, input.profile)) {
      const proof = await readRecordIfExists(paths.proofFile(id, 'e2e'), E2eProof, 'e2e_proof');
      if (!proof) problems.e2e.push(`${id}: missing e2e proof`);
      else if (!proof.passed) problems.e2e.push(`${id}: e2e proof failed`);
    }
  }

  return problems;
}

/**
 * Evaluate readiness without writing anything
 */
export async function evaluateReady(input: ReadyGateInput): Promise<Record<ReadyCheckName, ReadyCheck>> {
  const { paths } = input;
  const freeze = await checkFreeze(paths);
  const planApproval = await readRecordIfExists(paths.approvalFile('plan'), ApprovalRecord, 'approval');
  const problems = await sliceProblems(input);

  const e2eNeeded = input.slices.some((s) => e2eRequiredFor(s, input.profile));
  const userCheckNeeded = userCheckRequired(input.profile, input.config);
  const userCheck = userCheckNeeded
    ? await readRecordIfExists(paths.approvalFile('user_check'), ApprovalRecord, 'approval')
    : null;

  return {
    freeze_valid: { passed: freeze.valid, detail: freeze.detail },
    plan_approval_exists: planApproval
      ? { passed: true, detail: `approved by ${planApproval.approved_by}` }
      : { passed: false, detail: 'missing plan approval' },
    latest_scope_proof_ok: check(problems.scope),
    verify_coverage_ok: check(problems.verify),
    review_ok: check(problems.review),
    e2e_ok_if_required: e2eNeeded ? check(problems.e2e) : { passed: true, detail: 'not required' },
    user_check_recorded: !userCheckNeeded
      ? { passed: true, detail: 'not required' }
      : userCheck
        ? { passed: true, detail: `recorded by ${userCheck.approved_by}` }
        : { passed: false, detail: 'missing user check approval' },
  };
}

async function renderHandoff(input: ReadyGateInput, proof: ReadyProof): Promise<string> {
  const { paths } = input;
  const lines: string[] = [
    `# READY handoff for ${paths.taskId}`,
    '',
    `Module: ${input.moduleId}`,
    `Ready proof: ${input.toRef(paths.readyProofFile)}`,
    `Status: ${proof.passed ? 'ready' : 'not ready'}`,
    '',
    '## Proofs',
  ];

  for (const slice of input.slices) {
    const manifestPath = paths.manifestFile(slice.slice_id);
    const manifest = await readRecordIfExists(manifestPath, ProofManifest, 'manifest');
    lines.push(`- ${slice.slice_id}: ${manifest ? input.toRef(manifestPath) : 'no manifest'}`);
  }

  lines.push('', '## Checks');
  for (const name of READY_CHECKS) {
    const result = proof.checks[name];
    lines.push(`- [${result?.passed ? 'x' : ' '}] ${name}: ${result?.detail ?? 'not evaluated'}`);
  }

  const verifyCommands = [...new Set(input.slices.flatMap((s) => s.verify_commands))];
  lines.push(
    '',
    '## Manual smoke steps',
    '1. Check out the change under review and install its dependencies.',
    `2. Run the verify commands and confirm they pass: ${verifyCommands.length > 0 ? verifyCommands.map((c) => `\`${c}\``).join(', ') : '(none declared)'}.`,
    '3. Exercise the changed behaviour by hand and confirm it matches plan.md.',
    '',
    `Generated at ${proof.checked_at}`,
    ''
  );

  return lines.join('\n');
}

/**
 * Evaluate readiness, write ready.json and READY/handoff.md
 */
export async function runReadyGate(input: ReadyGateInput): Promise<GateResult<ReadyProof> & { handoffPath: string }> {
  const checks = await evaluateReady(input);
  const passed = READY_CHECKS.every((name) => checks[name].passed);

  const proofPath = input.paths.readyProofFile;
  const proof = await writeRecord(proofPath, ReadyProof, 'ready_proof', {
    kind: 'ready',
    task_id: input.paths.taskId,
    passed,
    checks,
    checked_at: input.checkedAt,
  });

  const handoffPath = input.paths.handoffFile;
  await writeTextAtomic(handoffPath, await renderHandoff(input, proof));

  const result = gateResult('ready', proof, proofPath, (p) => ({
    reason: 'ready_checks_failed',
    detail: READY_CHECKS.filter((name) => !p.checks[name]?.passed).join(', '),
  }));
  return { ...result, handoffPath };
}

export async function handoffExists(paths: TaskPaths): Promise<boolean> {
  return pathExists(paths.handoffFile);
}
