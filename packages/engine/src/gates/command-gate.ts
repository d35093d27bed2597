/**
 * Command Gates (verify, e2e)
 *
 * Tokenize declared commands, reject pipelines, apply the command policy
 * (verify only), then run every argv synchronously in the module directory.
 * A failing command does not stop the ones after it; the gate fails if any
 * exits non-zero. Output of every command is written to a log under the
 * task's run directory, named by slice, attempt and time.
 *
 * Policy problems are thrown as PolicyError before anything runs; a command
 * that runs and fails is a GateFailure.
 *
 * @module @phasegate/engine/gates/command-gate
 */

import { join } from 'node:path';
import {
  E2eProof,
  VerifyProof,
  enforceCommandPolicy,
  formatCommandLog,
  parseCommands,
  runCommand,
  writeRecord,
  writeTextAtomic,
  type CommandGateFailure,
  type CommandPolicy,
  type CommandResult,
  type TaskPaths,
} from '@phasegate/core';
import { fileStamp } from '../context.js';
import { gateResult, type GateResult } from './types.js';

export interface CommandGateInput {
  paths: TaskPaths;
  sliceId: string;
  commands: readonly string[];
  /** Module working directory */
  cwd: string;
  /** Zero commands fails the gate when true */
  required: boolean;
  checkedAt: string;
  /** Slice attempt number, keeps logs of attempts in the same second apart */
  attempt: number;
  env?: NodeJS.ProcessEnv;
}

interface CommandRun {
  passed: boolean;
  executed: CommandResult[];
  failureReason: CommandGateFailure | null;
  logPath: string | null;
  durationMs: number;
}

async function executeCommands(gate: 'verify' | 'e2e', argvs: string[][], input: CommandGateInput): Promise<CommandRun> {
  if (argvs.length === 0) {
    return {
      passed: !input.required,
      executed: [],
      failureReason: input.required ? 'commands_missing' : null,
      logPath: null,
      durationMs: 0,
    };
  }

  const executed: CommandResult[] = [];
  let failureReason: CommandGateFailure | null = null;

  for (const argv of argvs) {
    const result = runCommand(argv, { cwd: input.cwd, env: input.env });
    executed.push(result);
    if (result.exit_code !== 0) {
      failureReason = 'command_failed';
    }
  }

  const logName = `${gate}-${input.sliceId}-a${input.attempt}-${fileStamp(input.checkedAt)}.log`;
  const logPath = join(input.paths.logsDir, logName);
  await writeTextAtomic(logPath, formatCommandLog(`${gate} ${input.paths.taskId}/${input.sliceId}`, executed));

  return {
    passed: failureReason === null,
    executed,
    failureReason,
    logPath,
    durationMs: executed.reduce((sum, r) => sum + r.duration_ms, 0),
  };
}

function describeFailure(proof: { failure_reason: CommandGateFailure | null; commands: CommandResult[] }): {
  reason: string;
  detail: string;
} {
  if (proof.failure_reason === 'commands_missing') {
    return { reason: 'commands_missing', detail: 'Gate is required but no commands are configured' };
  }
  const failed = proof.commands.filter((c) => c.exit_code !== 0);
  return {
    reason: proof.failure_reason ?? 'command_failed',
    detail:
      failed.length > 0
        ? failed.map((c) => `${c.argv.join(' ')} exited with ${c.exit_code}`).join('; ')
        : 'command failed',
  };
}

/**
 * Run the verify gate. Commands are checked against the policy first.
 */
export async function runVerifyGate(input: CommandGateInput, policy: CommandPolicy): Promise<GateResult<VerifyProof>> {
  const argvs = parseCommands(input.commands);
  enforceCommandPolicy(argvs, policy);

  const run = await executeCommands('verify', argvs, input);
  const proofPath = input.paths.proofFile(input.sliceId, 'verify');
  const proof = await writeRecord(proofPath, VerifyProof, 'verify_proof', {
    kind: 'verify',
    task_id: input.paths.taskId,
    slice_id: input.sliceId,
    passed: run.passed,
    executed_count: run.executed.length,
    failure_reason: run.failureReason,
    commands: run.executed,
    log_path: run.logPath,
    duration_ms: run.durationMs,
    checked_at: input.checkedAt,
  });

  return gateResult('verify', proof, proofPath, describeFailure);
}

/**
 * Run the e2e gate. Same execution model as verify, without the command policy.
 */
export async function runE2eGate(input: CommandGateInput): Promise<GateResult<E2eProof>> {
  const argvs = parseCommands(input.commands);

  const run = await executeCommands('e2e', argvs, input);
  const proofPath = input.paths.proofFile(input.sliceId, 'e2e');
  const proof = await writeRecord(proofPath, E2eProof, 'e2e_proof', {
    kind: 'e2e',
    task_id: input.paths.taskId,
    slice_id: input.sliceId,
    passed: run.passed,
    executed_count: run.executed.length,
    failure_reason: run.failureReason,
    commands: run.executed,
    log_path: run.logPath,
    duration_ms: run.durationMs,
    checked_at: input.checkedAt,
  });

  return gateResult('e2e', proof, proofPath, describeFailure);
}
