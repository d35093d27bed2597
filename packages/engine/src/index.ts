/**
 * @phasegate/engine - Phase-gated workflow engine
 *
 * This package provides:
 *
 * - Workspace bootstrap and module registration
 * - Task workflow: create, critic, freeze, approve, ready, retro, close
 * - Gate pipeline: scope, verify, review, e2e and the task-level ready gate
 * - Slice executor with attempt budget, blocking policy and incidents
 * - Replay checker over the event log and live artifacts
 *
 * @module @phasegate/engine
 */

// Engine context
export * from './context.js';

// Workspace bootstrap and module registry
export * from './workspace/index.js';

// Task workflow
export * from './tasks/index.js';

// Gates
export * from './gates/index.js';

// Slice execution
export * from './executor/index.js';

// Replay
export * from './replay/index.js';
