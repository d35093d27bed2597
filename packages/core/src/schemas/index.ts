/**
 * Artifact Schemas
 *
 * @module @phasegate/core/schemas
 */

export * from './task.js';
export * from './proofs.js';
export * from './event.js';
export * from './config.js';
export { parseRecord, formatIssues } from './parse.js';
