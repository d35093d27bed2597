/**
 * Replay / Invariant Checker
 *
 * @module @phasegate/engine/replay
 */

export * from './replay-checker.js';
