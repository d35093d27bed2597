/**
 * Task Workflow
 *
 * @module @phasegate/engine/tasks
 */

export * from './slice-graph.js';
export * from './freeze.js';
export * from './task-store.js';
export * from './planning.js';
export * from './readiness.js';
export * from './retro.js';
export * from './operator.js';
export * from './status.js';
