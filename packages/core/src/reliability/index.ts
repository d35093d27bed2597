/**
 * Reliability: error taxonomy and exit-code contract
 *
 * @module @phasegate/core/reliability
 */

export {
  PhasegateError,
  SchemaValidationError,
  NotFoundError,
  TransitionError,
  PreconditionError,
  DriftError,
  PolicyError,
  ConfigurationError,
  CyclicSliceDependencyError,
  wrapError,
  type PhasegateErrorCode,
  type PhasegateErrorOptions,
} from './errors.js';

export {
  EXIT_OK,
  EXIT_GATE,
  EXIT_ERROR,
  EXIT_REPLAY,
  exitCodeForStatus,
  isOutcomeStatus,
  type OutcomeStatus,
} from './exit-codes.js';
