/**
 * Exit Code Contract
 *
 * Maps command outcome statuses to process exit codes for the CLI:
 *   0  - ok
 *   10 - blocked | gate_failed | review_failed | failed
 *   20 - error
 *   30 - replay_failed | invariant_failed
 *
 * @module @phasegate/core/reliability/exit-codes
 */

export const EXIT_OK = 0;
export const EXIT_GATE = 10;
export const EXIT_ERROR = 20;
export const EXIT_REPLAY = 30;

/**
 * Every status an engine operation may report
 */
export type OutcomeStatus =
  | 'ok'
  | 'blocked'
  | 'gate_failed'
  | 'review_failed'
  | 'failed'
  | 'replay_failed'
  | 'invariant_failed'
  | 'error';

const STATUS_EXIT_CODES: Record<OutcomeStatus, number> = {
  ok: EXIT_OK,
  blocked: EXIT_GATE,
  gate_failed: EXIT_GATE,
  review_failed: EXIT_GATE,
  failed: EXIT_GATE,
  replay_failed: EXIT_REPLAY,
  invariant_failed: EXIT_REPLAY,
  error: EXIT_ERROR,
};

export function isOutcomeStatus(value: string): value is OutcomeStatus {
  return Object.prototype.hasOwnProperty.call(STATUS_EXIT_CODES, value);
}

/**
 * Map an outcome status to its exit code. Unknown statuses are errors.
 */
export function exitCodeForStatus(status: string): number {
  return isOutcomeStatus(status) ? STATUS_EXIT_CODES[status] : EXIT_ERROR;
}
