/**
 * Gate Pipeline
 *
 * @module @phasegate/engine/gates
 */

export * from './types.js';
export * from './scope-gate.js';
export * from './command-gate.js';
export * from './review-gate.js';
export * from './ready-gate.js';
