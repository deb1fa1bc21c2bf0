/**
 * Base class for every error raised by the query engine. Catch this to
 * handle all engine failures in one place.
 */
export class QueryEngineError extends Error {
  override readonly name: string = 'QueryEngineError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Domain expression has the wrong shape: starved combinator, leftovers, bad leaf. */
export class MalformedDomainError extends QueryEngineError {
  override readonly name: string = 'MalformedDomainError';

  constructor(
    message: string,
    readonly position: number | null = null,
    cause?: unknown,
  ) {
    super(position === null ? message : `${message} (at term ${position})`, cause);
  }
}

/** An operator was requested against a field type it cannot apply to. */
export class UnsupportedOperatorError extends QueryEngineError {
  override readonly name: string = 'UnsupportedOperatorError';

  constructor(
    readonly operator: string,
    readonly field: string,
    readonly fieldType: string,
  ) {
    super(`Operator "${operator}" cannot be applied to ${fieldType} field "${field}"`);
  }
}

export class InvalidRangeError extends QueryEngineError {
  override readonly name: string = 'InvalidRangeError';

  constructor(
    readonly parameter: 'limit' | 'offset',
    readonly value: number,
  ) {
    super(`${parameter} must be a non-negative integer, got ${value}`);
  }
}

/** The query or one of its operations is internally inconsistent. */
export class CompilationError extends QueryEngineError {
  override readonly name: string = 'CompilationError';
}

/**
 * Wraps a failure reported by the backend. `detail` carries the native
 * message, `code` the native error code when the driver exposes one.
 */
export class ExecutionError extends QueryEngineError {
  override readonly name: string = 'ExecutionError';
  readonly detail: string;
  readonly code: string | number | null;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.detail = cause instanceof Error ? cause.message : String(cause);
    this.code = nativeErrorCode(cause);
  }
}

export class MappingError extends QueryEngineError {
  override readonly name: string = 'MappingError';

  constructor(
    readonly field: string,
    readonly fieldType: string,
    readonly rawValue: unknown,
    readonly collection: string | null = null,
  ) {
    super(
      `Cannot map value ${describeValue(rawValue)} of field "${field}"` +
        `${collection === null ? '' : ` in "${collection}"`} to ${fieldType}`,
    );
  }
}

export class ConfigError extends QueryEngineError {
  override readonly name: string = 'ConfigError';
}

function nativeErrorCode(cause: unknown): string | number | null {
  if (typeof cause !== 'object' || cause === null || !('code' in cause)) return null;
  const code = cause.code;
  return typeof code === 'string' || typeof code === 'number' ? code : null;
}

function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'object' && value !== null) {
    return `<${value.constructor?.name ?? 'object'}>`;
  }
  return String(value);
}
