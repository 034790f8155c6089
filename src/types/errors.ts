/**
 * Global error types for the fan curve controller
 * Every domain failure carries a kind tag so logs and callers can tell them apart
 */

/**
 * Failure categories
 */
export type FanErrorKind = 'configuration' | 'sampling' | 'actuation' | 'telemetry';

/**
 * Base error for all controller failures
 */
export class FanControlError extends Error {
  readonly kind: FanErrorKind;

  constructor(kind: FanErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FanControlError';
    this.kind = kind;
  }
}

/**
 * Error thrown when control points or settings are unusable
 * Fatal at startup - the control loop must not start
 */
export class ConfigurationError extends FanControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the temperature source has no usable reading
 */
export class SamplingError extends FanControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('sampling', message, options);
    this.name = 'SamplingError';
  }
}

/**
 * Error thrown when a fan bank rejects a duty-cycle command
 */
export class ActuationError extends FanControlError {
  readonly bankId: number;

  constructor(bankId: number, message: string, options?: { cause?: unknown }) {
    super('actuation', message, options);
    this.name = 'ActuationError';
    this.bankId = bankId;
  }
}

/**
 * Error thrown when a telemetry record cannot be published
 */
export class TelemetryError extends FanControlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('telemetry', message, options);
    this.name = 'TelemetryError';
  }
}

/**
 * Describe any thrown value for a log line, prefixed with its kind when known
 * @param err - Caught value
 * @returns Message such as "[sampling] no temperature channels reported a value"
 */
export function describeError(err: unknown): string {
  if (err instanceof FanControlError) {
    return '[' + err.kind + '] ' + err.message;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
