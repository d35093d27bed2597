/**
 * In-Memory Event Log
 *
 * Same contract as the SQLite log, without persistence. Used for dry runs
 * and by callers that only need an ordered buffer of events.
 *
 * @module @phasegate/core/events/memory-event-log
 */

import type { EventEnvelope, EventInput } from '../schemas/event.js';
import { toEventTimestamp } from '../schemas/event.js';
import { assertQueryLimit, buildEnvelope } from './sqlite-event-log.js';
import type { EventLog, EventLogOptions, EventQuery } from './types.js';

export class InMemoryEventLog implements EventLog {
  private events: Array<{ seq: number; event: EventEnvelope }> = [];
  private nextSeq = 1;

  constructor(private readonly options: EventLogOptions) {}

  async append(input: EventInput): Promise<EventEnvelope> {
    const now = toEventTimestamp(this.options.now ? this.options.now() : new Date());
    const last = this.events.length > 0 ? this.events[this.events.length - 1].event.ts : null;
    const ts = last !== null && last > now ? last : now;

    const event = buildEnvelope(input, this.options, ts);
    this.events.push({ seq: this.nextSeq++, event });
    return event;
  }

  async query(query: EventQuery): Promise<EventEnvelope[]> {
    assertQueryLimit(query.limit);

    return this.events
      .filter(({ event }) => {
        if (query.type && event.type !== query.type) return false;
        if (query.missionId && event.mission_id !== query.missionId) return false;
        if (query.moduleId && event.module_id !== query.moduleId) return false;
        if (query.taskId && event.task_id !== query.taskId) return false;
        if (query.sliceId && event.slice_id !== query.sliceId) return false;
        return true;
      })
      .sort((a, b) => {
        if (a.event.ts !== b.event.ts) return a.event.ts < b.event.ts ? 1 : -1;
        return b.seq - a.seq;
      })
      .slice(0, query.limit)
      .map(({ event }) => event);
  }

  close(): void {
    this.events = [];
  }
}
