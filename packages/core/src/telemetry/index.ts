/**
 * Telemetry: structured logging with workflow context
 *
 * @module @phasegate/core/telemetry
 */

export {
  getLogContext,
  runWithLogContext,
  isSeverity,
  SEVERITIES,
  type Severity,
  type LogContext,
} from './context.js';

export {
  Logger,
  getLogger,
  setLogger,
  createLogger,
  type LoggerConfig,
  type LogEntry,
} from './logger.js';
