/**
 * CLI Output
 *
 * Every invocation prints exactly one JSON document on stdout and returns
 * the exit code for its status. Logs stay on stderr.
 *
 * @module @phasegate/cli/output
 */

import { EXIT_ERROR, exitCodeForStatus, getLogger, wrapError, type OutcomeStatus } from '@phasegate/core';

export type CommandOutcome = { status: OutcomeStatus } & Record<string, unknown>;

export type Writer = (text: string) => void;

const stdout: Writer = (text) => {
  process.stdout.write(text);
};

export function printOutcome(outcome: CommandOutcome, write: Writer = stdout): number {
  write(`${JSON.stringify(outcome, null, 2)}\n`);
  return exitCodeForStatus(outcome.status);
}

/**
 * Run a command body and report its outcome. Thrown errors become an
 * `error` document with exit code 20.
 */
export async function execute(fn: () => Promise<CommandOutcome>, write: Writer = stdout): Promise<number> {
  try {
    return printOutcome(await fn(), write);
  } catch (error) {
    const wrapped = wrapError(error);
    getLogger().error('Command failed', wrapped);
    printOutcome(
      { status: 'error', code: wrapped.code, message: wrapped.message, context: wrapped.context ?? {} },
      write
    );
    return EXIT_ERROR;
  }
}
