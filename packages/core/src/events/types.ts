/**
 * Event Log Types
 *
 * @module @phasegate/core/events/types
 */

import type { EventEnvelope, EventInput } from '../schemas/event.js';

/**
 * Query filter. Every provided field must match; results are newest-first.
 */
export interface EventQuery {
  type?: string;
  missionId?: string;
  moduleId?: string;
  taskId?: string;
  sliceId?: string;
  /** Maximum rows returned, must be > 0 */
  limit: number;
}

/**
 * Append-only event log
 */
export interface EventLog {
  /**
   * Append one event. The log assigns id, ts, engine version and revision.
   */
  append(input: EventInput): Promise<EventEnvelope>;

  /**
   * Query events, newest first (ts descending, insertion order as tiebreak)
   */
  query(query: EventQuery): Promise<EventEnvelope[]>;

  close(): void;
}

export interface EventLogOptions {
  engineVersion: string;
  /** Default actor when an input names none */
  defaultActor?: string;
  /** Resolves the repository revision stamped on each event */
  revisionProvider?: () => string | null;
  /** Clock, for tests */
  now?: () => Date;
}
