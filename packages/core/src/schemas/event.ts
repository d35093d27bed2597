/**
 * Event Envelope
 *
 * One immutable audit fact in the event log.
 *
 * @module @phasegate/core/schemas/event
 */

import { z } from 'zod';

/**
 * UTC timestamp at second precision, e.g. 2026-01-31T09:15:00Z
 */
export const EventTimestamp = z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/, 'expected UTC second-precision timestamp');

export const EventEnvelope = z.object({
  id: z.string().min(1),
  ts: EventTimestamp,
  type: z.string().min(1),
  actor: z.string().min(1),
  mission_id: z.string().nullable(),
  module_id: z.string().nullable(),
  task_id: z.string().nullable(),
  slice_id: z.string().nullable(),
  repo_revision: z.string().nullable(),
  worktree_path: z.string().nullable(),
  payload: z.record(z.string(), z.unknown()),
  artifact_refs: z.array(z.string()),
  engine_version: z.string().min(1),
});

export type EventEnvelope = z.infer<typeof EventEnvelope>;

/**
 * What a caller supplies to append an event; the log fills in the rest
 */
export const EventInput = z.object({
  type: z.string().min(1),
  actor: z.string().min(1).optional(),
  mission_id: z.string().nullable().optional(),
  module_id: z.string().nullable().optional(),
  task_id: z.string().nullable().optional(),
  slice_id: z.string().nullable().optional(),
  worktree_path: z.string().nullable().optional(),
  payload: z.record(z.string(), z.unknown()).optional(),
  artifact_refs: z.array(z.string()).optional(),
});

export type EventInput = z.infer<typeof EventInput>;

/**
 * Format a date as a second-precision UTC timestamp
 */
export function toEventTimestamp(date: Date = new Date()): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}
