/**
 * Custom error classes for ACLED API errors
 */

/**
 * Base error class for the errors a fetch can end with
 */
export class AcledError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AcledError';

    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace(this, new.target);
  }
}

/**
 * The HTTP exchange itself failed (network error, body that is not JSON)
 */
export class TransportError extends AcledError {
  public readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
    this.status = status;
  }
}

/**
 * The API answered with its error envelope, e.g. for a bad key
 */
export class ApiError extends AcledError {
  constructor(message: string) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * A record field did not hold the value its type promises
 */
export class ParseError extends AcledError {
  /** Name of the field in the API record, e.g. 'event_date' */
  public readonly field: string;

  constructor(field: string) {
    super(`API response could not be parsed: ${field}`);
    this.name = 'ParseError';
    this.field = field;
  }
}

/**
 * Client configuration or environment is invalid
 */
export class ConfigurationError extends AcledError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * The response matched neither envelope shape, or its `success`/`count`
 * fields contradict its contents.
 *
 * Not a subclass of AcledError, so `instanceof AcledError` checks around a
 * fetch do not catch it.
 */
export class EnvelopeContractError extends Error {
  public readonly body: unknown;

  constructor(message: string, body: unknown) {
    super(message);
    this.name = 'EnvelopeContractError';
    this.body = body;

    Error.captureStackTrace(this, EnvelopeContractError);
  }
}
