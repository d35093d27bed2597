/**
 * Log Context Module
 *
 * Carries workflow identifiers (module, task, slice, command) through
 * async call chains so every log entry is correlated without threading
 * them through each function signature.
 *
 * @module @phasegate/core/telemetry/context
 */

import { AsyncLocalStorage } from 'node:async_hooks';

// =============================================================================
// Types
// =============================================================================

/**
 * Severity levels, lowest to highest
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';

export const SEVERITIES: readonly Severity[] = ['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL'];

/**
 * Identifiers attached to log entries emitted inside a context
 */
export interface LogContext {
  command?: string;
  missionId?: string;
  moduleId?: string;
  taskId?: string;
  sliceId?: string;
  actor?: string;
}

// =============================================================================
// Async Local Storage for Context Propagation
// =============================================================================

const contextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Get the current log context (if any)
 */
export function getLogContext(): LogContext | undefined {
  return contextStorage.getStore();
}

/**
 * Run a function with a log context layered over the current one
 */
export function runWithLogContext<T>(ctx: LogContext, fn: () => T): T {
  const parent = contextStorage.getStore();
  return contextStorage.run({ ...parent, ...ctx }, fn);
}

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((s) => s === value);
}
