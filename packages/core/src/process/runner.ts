/**
 * Process Runner
 *
 * Runs one argv to completion in a working directory, without a shell.
 * There is no timeout: a command runs until it exits or is killed from
 * outside.
 *
 * @module @phasegate/core/process/runner
 */

import { spawnSync } from 'node:child_process';
import type { CommandResult } from '../schemas/proofs.js';

/** Exit code recorded when the program could not be started */
export const SPAWN_FAILURE_EXIT_CODE = 127;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface RunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Run argv synchronously and capture exit code, stdout and stderr
 */
export function runCommand(argv: readonly string[], options: RunOptions): CommandResult {
  const [program, ...args] = argv;
  if (program === undefined) {
    throw new RangeError('runCommand requires a non-empty argv');
  }

  const started = Date.now();
  const result = spawnSync(program, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    encoding: 'utf-8',
    shell: false,
    maxBuffer: MAX_OUTPUT_BYTES,
  });
  const durationMs = Date.now() - started;

  if (result.error) {
    return {
      argv: [...argv],
      exit_code: SPAWN_FAILURE_EXIT_CODE,
      stdout: result.stdout ?? '',
      stderr: `${result.stderr ?? ''}${result.error.message}`,
      duration_ms: durationMs,
    };
  }

  let stderr = result.stderr;
  let exitCode = result.status ?? 1;
  if (result.signal) {
    stderr = `${stderr}terminated by signal ${result.signal}\n`;
    exitCode = result.status ?? 128;
  }

  return {
    argv: [...argv],
    exit_code: exitCode,
    stdout: result.stdout,
    stderr,
    duration_ms: durationMs,
  };
}

/**
 * Render captured command results as a plain-text log
 */
export function formatCommandLog(title: string, results: readonly CommandResult[]): string {
  const lines: string[] = [`# ${title}`, ''];
  for (const result of results) {
    lines.push(`$ ${result.argv.join(' ')}`);
    lines.push(`exit_code: ${result.exit_code}  duration_ms: ${result.duration_ms}`);
    lines.push('--- stdout ---');
    lines.push(result.stdout.trimEnd());
    lines.push('--- stderr ---');
    lines.push(result.stderr.trimEnd());
    lines.push('');
  }
  return `${lines.join('\n')}\n`;
}
