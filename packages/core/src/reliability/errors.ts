/**
 * Error Taxonomy
 *
 * Standard error types for the workflow engine.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error knows if it's retryable
 * - Gate outcomes are NOT errors; they are returned as GateFailure values
 *
 * @module @phasegate/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard phasegate error codes
 */
export type PhasegateErrorCode =
  // Persisted state
  | 'SCHEMA_VALIDATION'
  | 'NOT_FOUND'

  // Workflow discipline
  | 'INVALID_TRANSITION'
  | 'PRECONDITION_FAILED'
  | 'FREEZE_DRIFT'

  // Policy and configuration
  | 'POLICY_DENIED'
  | 'CONFIGURATION_ERROR'
  | 'CYCLIC_DEPENDENCY'

  // Internal errors
  | 'INTERNAL_ERROR'
  | 'UNHANDLED_ERROR';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Phasegate error options
 */
export interface PhasegateErrorOptions {
  /** Error code */
  code: PhasegateErrorCode;

  /** Whether the error is retryable */
  retryable?: boolean;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base phasegate error class
 *
 * All engine errors extend this for consistent handling.
 */
export class PhasegateError extends Error {
  readonly code: PhasegateErrorCode;
  readonly retryable: boolean;
  readonly context?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(message: string, options: PhasegateErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'PhasegateError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.context = options.context;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging/CLI output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// =============================================================================
// Persisted State Errors
// =============================================================================

/**
 * Persisted JSON is missing required keys or has the wrong shape
 */
export class SchemaValidationError extends PhasegateError {
  readonly kind: string;
  readonly issues: string[];

  constructor(kind: string, issues: string[], options?: { path?: string; cause?: Error }) {
    const where = options?.path ? ` at ${options.path}` : '';
    super(`Invalid ${kind}${where}: ${issues.join('; ')}`, {
      code: 'SCHEMA_VALIDATION',
      context: { kind, issues, path: options?.path },
      cause: options?.cause,
    });
    this.name = 'SchemaValidationError';
    this.kind = kind;
    this.issues = issues;
  }
}

/**
 * Lookup of a module, task, slice or artifact that does not exist
 */
export class NotFoundError extends PhasegateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'NOT_FOUND', context });
    this.name = 'NotFoundError';
  }
}

// =============================================================================
// Workflow Errors
// =============================================================================

/**
 * Illegal task status transition
 */
export class TransitionError extends PhasegateError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, allowed: readonly string[] = []) {
    const hint = allowed.length > 0 ? ` Allowed: ${allowed.join(', ')}` : ' No outgoing transitions.';
    super(`Invalid task transition: ${from} -> ${to}.${hint}`, {
      code: 'INVALID_TRANSITION',
      context: { from, to, allowed: [...allowed] },
    });
    this.name = 'TransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * A slice attempt or workflow step was requested before its prerequisites exist
 */
export class PreconditionError extends PhasegateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'PRECONDITION_FAILED', context });
    this.name = 'PreconditionError';
  }
}

/**
 * Live plan/slices hash no longer matches the stored freeze
 */
export class DriftError extends PhasegateError {
  readonly drift: Array<'plan' | 'slices'>;

  constructor(message: string, drift: Array<'plan' | 'slices'>, context?: Record<string, unknown>) {
    super(message, { code: 'FREEZE_DRIFT', context: { ...context, drift } });
    this.name = 'DriftError';
    this.drift = drift;
  }
}

// =============================================================================
// Policy and Configuration Errors
// =============================================================================

/**
 * Forbidden command token or pipeline syntax
 */
export class PolicyError extends PhasegateError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { code: 'POLICY_DENIED', context });
    this.name = 'PolicyError';
  }
}

/**
 * A required gate or setting has no usable configuration
 */
export class ConfigurationError extends PhasegateError {
  constructor(message: string, context?: Record<string, unknown>, code: PhasegateErrorCode = 'CONFIGURATION_ERROR') {
    super(message, { code, context });
    this.name = 'ConfigurationError';
  }
}

/**
 * Slice dependency graph contains a cycle
 */
export class CyclicSliceDependencyError extends ConfigurationError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Cyclic slice dependency detected: ${cycle.join(' -> ')}`, { cycle }, 'CYCLIC_DEPENDENCY');
    this.name = 'CyclicSliceDependencyError';
    this.cycle = cycle;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Wrap any error as a PhasegateError
 */
export function wrapError(error: unknown, defaults?: Partial<PhasegateErrorOptions>): PhasegateError {
  if (error instanceof PhasegateError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new PhasegateError(message, {
    code: defaults?.code ?? 'UNHANDLED_ERROR',
    retryable: defaults?.retryable ?? false,
    context: defaults?.context,
    cause,
  });
}
