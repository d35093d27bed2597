/**
 * Event Log
 *
 * @module @phasegate/core/events
 */

export type { EventLog, EventLogOptions, EventQuery } from './types.js';
export { SqliteEventLog, EVENT_LOG_SCHEMA_VERSION, buildEnvelope } from './sqlite-event-log.js';
export { InMemoryEventLog } from './memory-event-log.js';
export { resolveRepoRevision, createRevisionProvider } from './revision.js';
