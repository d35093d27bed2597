/**
 * SQLite Event Log
 *
 * Durable append-only event log on better-sqlite3. Each append is a single
 * IMMEDIATE transaction, so a record is either fully committed or absent.
 * Update and delete are refused by triggers.
 *
 * Ordering: `seq` is an AUTOINCREMENT insertion counter, and `ts` never
 * moves backwards relative to the latest stored row, so (ts, seq) is
 * monotonic even if the wall clock steps back.
 *
 * @module @phasegate/core/events/sqlite-event-log
 */

import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../reliability/errors.js';
import { EventEnvelope, EventInput, toEventTimestamp } from '../schemas/event.js';
import { parseRecord } from '../schemas/parse.js';
import type { EventLog, EventLogOptions, EventQuery } from './types.js';

export const EVENT_LOG_SCHEMA_VERSION = 1;

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS events (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    ts TEXT NOT NULL,
    type TEXT NOT NULL,
    actor TEXT NOT NULL,
    mission_id TEXT,
    module_id TEXT,
    task_id TEXT,
    slice_id TEXT,
    repo_revision TEXT,
    worktree_path TEXT,
    payload_json TEXT NOT NULL,
    artifact_refs_json TEXT NOT NULL,
    engine_version TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_events_ts ON events(ts);
  CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
  CREATE INDEX IF NOT EXISTS idx_events_scope ON events(mission_id, module_id, task_id, slice_id);

  CREATE TRIGGER IF NOT EXISTS events_no_update BEFORE UPDATE ON events
  BEGIN
    SELECT RAISE(ABORT, 'events are append-only');
  END;

  CREATE TRIGGER IF NOT EXISTS events_no_delete BEFORE DELETE ON events
  BEGIN
    SELECT RAISE(ABORT, 'events are append-only');
  END;
`;

/**
 * Shape of a stored row
 */
const EventRow = z.object({
  id: z.string(),
  ts: z.string(),
  type: z.string(),
  actor: z.string(),
  mission_id: z.string().nullable(),
  module_id: z.string().nullable(),
  task_id: z.string().nullable(),
  slice_id: z.string().nullable(),
  repo_revision: z.string().nullable(),
  worktree_path: z.string().nullable(),
  payload_json: z.string(),
  artifact_refs_json: z.string(),
  engine_version: z.string(),
});

type EventRow = z.infer<typeof EventRow>;

const LatestTsRow = z.object({ ts: z.string().nullable() });

/**
 * Build a validated envelope from caller input
 */
export function buildEnvelope(
  input: EventInput,
  options: EventLogOptions,
  ts: string
): EventEnvelope {
  const parsed = parseRecord(EventInput, 'event input', input);
  return parseRecord(EventEnvelope, 'event', {
    id: randomUUID(),
    ts,
    type: parsed.type,
    actor: parsed.actor ?? options.defaultActor ?? 'engine',
    mission_id: parsed.mission_id ?? null,
    module_id: parsed.module_id ?? null,
    task_id: parsed.task_id ?? null,
    slice_id: parsed.slice_id ?? null,
    repo_revision: options.revisionProvider ? options.revisionProvider() : null,
    worktree_path: parsed.worktree_path ?? null,
    payload: parsed.payload ?? {},
    artifact_refs: parsed.artifact_refs ?? [],
    engine_version: options.engineVersion,
  });
}

export function assertQueryLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`Event query limit must be a positive integer, got ${limit}`);
  }
}

export class SqliteEventLog implements EventLog {
  private db: Database.Database;

  constructor(
    readonly path: string,
    private readonly options: EventLogOptions
  ) {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path, { timeout: 5000 });
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.migrate();
  }

  private migrate(): void {
    const current = this.db.pragma('user_version', { simple: true });
    const version = typeof current === 'number' ? current : 0;

    if (version > EVENT_LOG_SCHEMA_VERSION) {
      throw new ConfigurationError(
        `Event log schema version ${version} is newer than supported version ${EVENT_LOG_SCHEMA_VERSION}`,
        { path: this.path, version }
      );
    }

    this.db.exec(SCHEMA_SQL);
    if (version < EVENT_LOG_SCHEMA_VERSION) {
      this.db.pragma(`user_version = ${EVENT_LOG_SCHEMA_VERSION}`);
    }
  }

  async append(input: EventInput): Promise<EventEnvelope> {
    const insert = this.db.prepare(`
      INSERT INTO events (
        id, ts, type, actor, mission_id, module_id, task_id, slice_id,
        repo_revision, worktree_path, payload_json, artifact_refs_json, engine_version
      ) VALUES (
        @id, @ts, @type, @actor, @mission_id, @module_id, @task_id, @slice_id,
        @repo_revision, @worktree_path, @payload_json, @artifact_refs_json, @engine_version
      )
    `);
    const latest = this.db.prepare('SELECT MAX(ts) AS ts FROM events');

    const write = this.db.transaction((event: EventInput): EventEnvelope => {
      const now = toEventTimestamp(this.options.now ? this.options.now() : new Date());
      const last = LatestTsRow.parse(latest.get()).ts;
      const ts = last !== null && last > now ? last : now;

      const envelope = buildEnvelope(event, this.options, ts);
      insert.run({
        id: envelope.id,
        ts: envelope.ts,
        type: envelope.type,
        actor: envelope.actor,
        mission_id: envelope.mission_id,
        module_id: envelope.module_id,
        task_id: envelope.task_id,
        slice_id: envelope.slice_id,
        repo_revision: envelope.repo_revision,
        worktree_path: envelope.worktree_path,
        payload_json: JSON.stringify(envelope.payload),
        artifact_refs_json: JSON.stringify(envelope.artifact_refs),
        engine_version: envelope.engine_version,
      });
      return envelope;
    });

    return write.immediate(input);
  }

  async query(query: EventQuery): Promise<EventEnvelope[]> {
    assertQueryLimit(query.limit);

    let sql = 'SELECT * FROM events WHERE 1=1';
    const params: Array<string | number> = [];

    if (query.type) {
      sql += ' AND type = ?';
      params.push(query.type);
    }
    if (query.missionId) {
      sql += ' AND mission_id = ?';
      params.push(query.missionId);
    }
    if (query.moduleId) {
      sql += ' AND module_id = ?';
      params.push(query.moduleId);
    }
    if (query.taskId) {
      sql += ' AND task_id = ?';
      params.push(query.taskId);
    }
    if (query.sliceId) {
      sql += ' AND slice_id = ?';
      params.push(query.sliceId);
    }

    sql += ' ORDER BY ts DESC, seq DESC LIMIT ?';
    params.push(query.limit);

    const rows = z.array(EventRow).parse(this.db.prepare(sql).all(...params));
    return rows.map((row) => this.rowToEvent(row));
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private rowToEvent(row: EventRow): EventEnvelope {
    return parseRecord(
      EventEnvelope,
      'event',
      {
        id: row.id,
        ts: row.ts,
        type: row.type,
        actor: row.actor,
        mission_id: row.mission_id,
        module_id: row.module_id,
        task_id: row.task_id,
        slice_id: row.slice_id,
        repo_revision: row.repo_revision,
        worktree_path: row.worktree_path,
        payload: JSON.parse(row.payload_json),
        artifact_refs: JSON.parse(row.artifact_refs_json),
        engine_version: row.engine_version,
      },
      this.path
    );
  }
}
