/**
 * Slice Execution
 *
 * @module @phasegate/engine/executor
 */

export * from './incidents.js';
export * from './slice-executor.js';
