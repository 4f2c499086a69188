/**
 * Error taxonomy for the resilience primitives.
 *
 * Errors raised by wrapped operations are never wrapped in these classes; they are
 * rethrown as-is. These classes only mark failures the primitives produce themselves.
 */

export type ErrorPredicate = (error: unknown) => boolean;

export type ErrorClass = new (...args: never[]) => Error;

export class ResilienceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ResilienceError';
  }
}

/** The call was rejected without being attempted because the circuit is open. */
export class CircuitOpenError extends ResilienceError {
  constructor(
    public readonly circuitName: string,
    public readonly retryAfterMs: number
  ) {
    super(`Circuit breaker is OPEN for ${circuitName}`);
    this.name = 'CircuitOpenError';
  }
}

export class TimeoutError extends ResilienceError {
  constructor(
    public readonly timeoutMs: number,
    public readonly operationName?: string | undefined
  ) {
    super(`${operationName ?? 'Operation'} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class ResilienceConfigError extends ResilienceError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`Invalid resilience configuration: ${field} ${message}`);
    this.name = 'ResilienceConfigError';
  }
}

export function isCircuitOpenError(error: unknown): error is CircuitOpenError {
  return error instanceof CircuitOpenError;
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Predicate matching errors that are instances of any of the given classes.
 * With no classes it matches everything.
 */
export function matchErrorTypes(...types: ErrorClass[]): ErrorPredicate {
  if (types.length === 0) {
    return () => true;
  }
  return (error: unknown) => types.some((type) => error instanceof type);
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  return new Error(`Non-error value thrown: ${String(value)}`);
}
