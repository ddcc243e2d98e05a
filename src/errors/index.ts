/**
 * Error Types
 *
 * Typed errors for lineup tracking. These extend Error to preserve
 * stack traces while adding a machine-readable code and context.
 */

/** Base error for all lineup tracking errors */
export class LineupTrackerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LineupTrackerError';
  }
}

/**
 * Required top-level data is missing or malformed.
 * Processing of the game stops; the caller should skip the game.
 */
export class StructuralError extends LineupTrackerError {
  constructor(
    message: string,
    public readonly field: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'STRUCTURAL_ERROR', { field, ...context });
    this.name = 'StructuralError';
  }
}

/** A clock or minutes string that does not follow its grammar */
export class FormatError extends LineupTrackerError {
  constructor(
    message: string,
    public readonly value: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'FORMAT_ERROR', { value, ...context });
    this.name = 'FormatError';
  }
}

/** Inconsistent roster data, e.g. one player id listed on both teams */
export class DataError extends LineupTrackerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DATA_ERROR', context);
    this.name = 'DataError';
  }
}

/**
 * A lineup state broke one of its invariants.
 * Signals a bug in the tracker, not bad input.
 */
export class InvariantViolation extends LineupTrackerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', context);
    this.name = 'InvariantViolation';
  }
}

/**
 * Type guard to check if an error is a LineupTrackerError
 */
export function isLineupTrackerError(
  error: unknown
): error is LineupTrackerError {
  return error instanceof LineupTrackerError;
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
