/**
 * Task State Machine
 *
 * Validates task status transitions against TASK_TRANSITIONS.
 *
 * @module @phasegate/core/state-machine/task-state-machine
 */

import { TransitionError } from '../reliability/errors.js';
import { TASK_TRANSITIONS, EXECUTABLE_STATUSES, type TaskStatus, type SliceStatus } from '../schemas/task.js';

/**
 * Check if a task transition is listed in the table
 */
export function isValidTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

/**
 * Validate a task transition, throwing TransitionError if it is not in the table.
 * Same-state requests are not transitions and fail here too.
 */
export function validateTransition(from: TaskStatus, to: TaskStatus): void {
  if (!isValidTransition(from, to)) {
    throw new TransitionError(from, to, TASK_TRANSITIONS[from]);
  }
}

/**
 * Outcome of a status request: a real transition, or an echo of the
 * current status that changes nothing.
 */
export type TransitionPlan = { kind: 'transition'; from: TaskStatus; to: TaskStatus } | { kind: 'echo'; status: TaskStatus };

/**
 * Resolve a status request. Echo is only permitted when the caller asks
 * for it (re-running an idempotent step such as a re-freeze).
 */
export function planTransition(from: TaskStatus, to: TaskStatus, options: { allowEcho?: boolean } = {}): TransitionPlan {
  if (from === to && options.allowEcho) {
    return { kind: 'echo', status: from };
  }
  validateTransition(from, to);
  return { kind: 'transition', from, to };
}

/**
 * Check if a status is terminal (no further transitions possible)
 */
export function isTerminalStatus(status: TaskStatus): boolean {
  return TASK_TRANSITIONS[status].length === 0;
}

/**
 * Check if slice attempts may start from this task status
 */
export function isExecutableStatus(status: TaskStatus): boolean {
  return EXECUTABLE_STATUSES.includes(status);
}

/**
 * Slices have no transition table, but a finished slice stays finished
 */
export function canUpdateSlice(current: SliceStatus, next: SliceStatus): boolean {
  return current !== 'done' || next === 'done';
}
