/**
 * Structured Logger Module
 *
 * Provides structured JSON logging with:
 * - Automatic log context injection (module/task/slice)
 * - Secret/token redaction
 * - Consistent field names
 *
 * Entries are written to stderr; stdout belongs to command output.
 *
 * @module @phasegate/core/telemetry/logger
 */

import { getLogContext, isSeverity, type Severity } from './context.js';

// =============================================================================
// Logger Configuration
// =============================================================================

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns */
  redactionPatterns?: RegExp[];
  /** Line sink, defaults to stderr */
  sink?: (line: string) => void;
}

/**
 * Default redaction patterns for sensitive data
 */
const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,
  /password['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /api[_-]?key['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /-----BEGIN[A-Z ]*PRIVATE KEY-----[\s\S]*?-----END[A-Z ]*PRIVATE KEY-----/g,
];

/**
 * Severity level ordering (higher = more severe)
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
};

// =============================================================================
// Log Entry Types
// =============================================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  service: string;

  command?: string;
  missionId?: string;
  moduleId?: string;
  taskId?: string;
  sliceId?: string;
  actor?: string;

  error?: {
    message: string;
    code?: string;
    stack?: string;
  };

  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Structured logger with log context integration
 */
export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? defaultSeverity(),
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
      sink: config.sink ?? ((line: string) => process.stderr.write(`${line}\n`)),
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  notice(message: string, data?: Record<string, unknown>): void {
    this.log('NOTICE', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', message, { ...data, ...formatError(error) });
  }

  critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('CRITICAL', message, { ...data, ...formatError(error) });
  }

  /**
   * Log a gate outcome at INFO (pass) or WARNING (fail)
   */
  gateResult(gate: string, passed: boolean, data?: Record<string, unknown>): void {
    const severity: Severity = passed ? 'INFO' : 'WARNING';
    this.log(severity, `Gate ${gate} ${passed ? 'passed' : 'failed'}`, {
      eventName: `gate.${gate}`,
      passed,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.config.minSeverity]) {
      return;
    }

    const entry = this.redact(this.buildEntry(severity, message, data));
    this.config.sink(JSON.stringify(entry));
  }

  private buildEntry(severity: Severity, message: string, data?: Record<string, unknown>): LogEntry {
    const ctx = getLogContext();

    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,
      ...this.config.defaultFields,
    };

    if (ctx) {
      if (ctx.command) entry.command = ctx.command;
      if (ctx.missionId) entry.missionId = ctx.missionId;
      if (ctx.moduleId) entry.moduleId = ctx.moduleId;
      if (ctx.taskId) entry.taskId = ctx.taskId;
      if (ctx.sliceId) entry.sliceId = ctx.sliceId;
      if (ctx.actor) entry.actor = ctx.actor;
    }

    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private redact(entry: LogEntry): LogEntry {
    const redactString = (value: string): string =>
      this.redactionPatterns.reduce((acc, pattern) => acc.replace(pattern, '[REDACTED]'), value);

    const walk = (value: unknown): unknown => {
      if (typeof value === 'string') return redactString(value);
      if (Array.isArray(value)) return value.map(walk);
      if (value !== null && typeof value === 'object') {
        return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, walk(v)]));
      }
      return value;
    };

    const redacted: LogEntry = { ...entry, message: redactString(entry.message) };
    for (const [key, value] of Object.entries(entry)) {
      if (key === 'severity' || key === 'message') continue;
      redacted[key] = walk(value);
    }
    return redacted;
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

function formatError(error: unknown): Record<string, unknown> {
  if (error === undefined || error === null) return {};

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      error: {
        message: error.message,
        code,
        stack: error.stack,
      },
    };
  }

  return { error: { message: String(error) } };
}

function defaultSeverity(): Severity {
  const fromEnv = process.env.PHASEGATE_LOG_LEVEL?.toUpperCase();
  if (fromEnv && isSeverity(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === 'test' ? 'WARNING' : 'INFO';
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger({ serviceName: 'phasegate' });
  }
  return defaultLogger;
}

/**
 * Set a custom default logger
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}

/**
 * Create a logger for a specific component
 */
export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    serviceName,
    ...config,
  });
}
