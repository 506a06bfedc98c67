/**
 * Typed exception classes
 */

export type RunstreakErrorType = 'CONFIGURATION' | 'STORAGE' | 'INVARIANT_VIOLATION';

export class RunstreakError extends Error {
  constructor(
    public readonly errorType: RunstreakErrorType,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RunstreakError';
  }
}

/**
 * Inconsistent or unparsable configuration; raised before any analysis runs
 */
export class ConfigurationError extends RunstreakError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION', message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * The backing store could not be read or written. Fatal for the current
 * analysis call.
 */
export class StorageError extends RunstreakError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super('STORAGE', message, details, { cause });
    this.name = 'StorageError';
  }
}

/**
 * Data the analysis relies on is internally inconsistent, e.g. the run to
 * commit mapping is corrupt
 */
export class InvariantViolationError extends RunstreakError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVARIANT_VIOLATION', message, details);
    this.name = 'InvariantViolationError';
  }
}
