/**
 * Engine Context
 *
 * Everything an engine operation needs: the repository layout, the event
 * log, local config, a logger and the acting identity. One context is
 * opened per command invocation.
 *
 * @module @phasegate/engine/context
 */

import {
  Layout,
  SqliteEventLog,
  createLogger,
  createRevisionProvider,
  defaultActor,
  loadLocalConfig,
  readEngineVersion,
  toEventTimestamp,
  type EventEnvelope,
  type EventInput,
  type EventLog,
  type LocalConfig,
  type Logger,
} from '@phasegate/core';

export interface EngineContext {
  layout: Layout;
  events: EventLog;
  config: LocalConfig;
  logger: Logger;
  actor: string;
  now: () => Date;
}

export interface OpenEngineOptions {
  /** Actor recorded on events; defaults to PHASEGATE_ACTOR or "engine" */
  actor?: string;
  /** Event log override (defaults to the repository's SQLite log) */
  events?: EventLog;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Open an engine context for a repository root
 */
export async function openEngine(root: string, options: OpenEngineOptions = {}): Promise<EngineContext> {
  const layout = new Layout(root);
  const actor = options.actor ?? defaultActor();
  const now = options.now ?? (() => new Date());
  const config = await loadLocalConfig(layout);

  const events =
    options.events ??
    new SqliteEventLog(layout.eventLogFile, {
      engineVersion: readEngineVersion(layout.engineVersionFile),
      defaultActor: actor,
      revisionProvider: createRevisionProvider(layout.root),
      now,
    });

  return {
    layout,
    events,
    config,
    logger: options.logger ?? createLogger('phasegate-engine'),
    actor,
    now,
  };
}

export function closeEngine(ctx: EngineContext): void {
  ctx.events.close();
}

/**
 * Current time as a second-precision UTC timestamp
 */
export function timestamp(ctx: EngineContext): string {
  return toEventTimestamp(ctx.now());
}

/**
 * Compact form of a timestamp for file names, e.g. 20260301T100000Z
 */
export function fileStamp(ts: string): string {
  return ts.replace(/[-:]/g, '');
}

/**
 * Append an event with artifact paths converted to repository-relative refs
 */
export async function emit(
  ctx: EngineContext,
  input: Omit<EventInput, 'artifact_refs'> & { artifacts?: string[] }
): Promise<EventEnvelope> {
  const { artifacts, ...rest } = input;
  const event = await ctx.events.append({
    actor: ctx.actor,
    ...rest,
    artifact_refs: (artifacts ?? []).map((path) => ctx.layout.toRef(path)),
  });
  ctx.logger.debug('event appended', { eventType: event.type, eventId: event.id });
  return event;
}
