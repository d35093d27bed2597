/**
 * Workspace
 *
 * @module @phasegate/engine/workspace
 */

export * from './bootstrap.js';
export * from './command-tracking.js';
