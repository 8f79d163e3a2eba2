/**
 * Structured Error System
 *
 * Machine-readable errors with codes, suggestions and details.
 * Construction defects and backend failures are thrown as LogicException;
 * negative query answers (UNSAT, not entailed) are never errors.
 */

/**
 * Error codes for theory construction and querying
 */
export type LogicErrorCode =
  | 'INVALID_CONFIG'            // Model configuration failed validation
  | 'INVALID_PROPOSITION'       // Name the solver cannot accept
  | 'INCOMPATIBLE_PROPOSITION'  // Same name registered under two roles
  | 'DANGLING_REFERENCE'        // Constraint names an unregistered proposition
  | 'INCONSISTENT_THEORY'       // Post-assembly self-check found no model
  | 'UNKNOWN_TARGET'            // Query names something the theory lacks
  | 'MODEL_LIMIT'               // Enumeration exceeded maxModels
  | 'BACKEND_ERROR';            // Solver crashed or returned a malformed result

/**
 * Structured error with code, message and suggestion
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  suggestion?: string;
  context?: string;          // The offending name or formula
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogicException);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * Type guard for exceptions raised by this library
 */
export function isLogicException(e: unknown): e is LogicException {
  return e instanceof LogicException;
}

export function createConfigError(
  message: string,
  issues: string[]
): LogicException {
  return new LogicException({
    code: 'INVALID_CONFIG',
    message: `Invalid model configuration: ${message}`,
    suggestion: 'Check ranks, deckSize and maxWarDepth against each other',
    details: { issues },
  });
}

export function createInvalidPropositionError(name: string): LogicException {
  return new LogicException({
    code: 'INVALID_PROPOSITION',
    message: `Invalid proposition name '${name}'`,
    suggestion: 'Use a letter followed by letters, digits or underscores',
    context: name,
  });
}

export function createIncompatiblePropositionError(
  name: string,
  existingRole: string,
  requestedRole: string
): LogicException {
  return new LogicException({
    code: 'INCOMPATIBLE_PROPOSITION',
    message: `Proposition '${name}' is already registered as '${existingRole}', not '${requestedRole}'`,
    suggestion: 'Give propositions with different meanings different names',
    context: name,
    details: { existingRole, requestedRole },
  });
}

export function createDanglingReferenceError(
  name: string,
  label: string
): LogicException {
  return new LogicException({
    code: 'DANGLING_REFERENCE',
    message: `Constraint '${label}' references unregistered proposition '${name}'`,
    suggestion: 'Register every proposition before building constraints over it',
    context: name,
    details: { label },
  });
}

/**
 * Create an inconsistent-theory error listing the conflicting constraint labels
 */
export function createInconsistentTheoryError(
  conflict: string[],
  minimal: boolean
): LogicException {
  return new LogicException({
    code: 'INCONSISTENT_THEORY',
    message: `Theory is unsatisfiable; conflicting constraints: ${conflict.join(', ')}`,
    suggestion: 'Check the listed constraints for contradictory rules',
    details: { conflict, minimal },
  });
}

export function createUnknownTargetError(name: string): LogicException {
  return new LogicException({
    code: 'UNKNOWN_TARGET',
    message: `Theory has no proposition or definition named '${name}'`,
    context: name,
  });
}

export function createModelLimitError(limit: number): LogicException {
  return new LogicException({
    code: 'MODEL_LIMIT',
    message: `Model enumeration exceeded the limit of ${limit} models`,
    suggestion: 'Add given facts to narrow the theory, or raise maxModels',
    details: { limit },
  });
}

export function createBackendError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'BACKEND_ERROR',
    message: `Solver backend error: ${message}`,
    details,
  });
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
