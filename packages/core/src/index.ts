/**
 * @phasegate/core - Foundations for the phase-gated workflow engine
 *
 * This module provides:
 * - Schemas: tagged, validated record types for every persisted artifact
 * - Artifacts: atomic artifact store, hashing and filesystem snapshots
 * - Events: the append-only event log (SQLite, in-memory)
 * - State machine: legal task transitions
 * - Process: command tokenizer, command policy and synchronous runner
 */

// Error taxonomy and exit codes
export * from './reliability/index.js';

// Structured logging
export * from './telemetry/index.js';

// Record schemas
export * from './schemas/index.js';

// Artifact store and hashing
export * from './artifacts/index.js';

// Repository layout
export { Layout, TaskPaths, STATE_DIR } from './layout/layout.js';

// Configuration
export * from './config/index.js';

// Module registry
export { readRegistry, writeRegistry, findModule, EMPTY_REGISTRY } from './registry/module-registry.js';

// Task state machine
export {
  isValidTransition,
  validateTransition,
  planTransition,
  isTerminalStatus,
  isExecutableStatus,
  canUpdateSlice,
  type TransitionPlan,
} from './state-machine/task-state-machine.js';

// Event log
export * from './events/index.js';

// External commands
export {
  tokenizeCommand,
  parseCommands,
  enforceCommandPolicy,
  type CommandPolicy,
} from './process/command-policy.js';
export { runCommand, formatCommandLog, SPAWN_FAILURE_EXIT_CODE, type RunOptions } from './process/runner.js';

// Version
export { ENGINE_VERSION, readEngineVersion } from './version.js';
