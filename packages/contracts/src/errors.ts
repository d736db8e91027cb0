/**
 * @fileoverview Error taxonomy for the market data pipeline.
 *
 * Every error extends {@link PipelineError} and carries:
 * - a machine-readable code (string constant)
 * - an optional structured data payload
 * - an ISO timestamp
 *
 * Callers branch on `code` (or the type guards below), never on message text.
 *
 * @module @mdpoc/contracts/errors
 */

/**
 * Error codes used across packages.
 */
export const ErrorCode = {
  FETCH: 'FETCH_ERROR',
  PARSE: 'PARSE_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  BAR_DATA: 'BAR_DATA_ERROR',
  CONNECTIVITY: 'CONNECTIVITY_ERROR',
  CONFIG: 'CONFIG_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class for all pipeline errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new PipelineError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class PipelineError extends Error {
  /** Machine-readable error code */
  readonly code: string;

  /** Structured context for debugging */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when the symbol roster page cannot be retrieved: network failure,
 * timeout or a non-2xx status.
 *
 * @example
 * ```typescript
 * throw new FetchError(
 *   'Failed to fetch symbol roster from https://example.com/list/: HTTP 503 Service Unavailable',
 *   { url: 'https://example.com/list/', status: 503 }
 * );
 * ```
 */
export class FetchError extends PipelineError {
  constructor(
    message: string,
    data: {
      url: string;
      status?: number;
      timeoutMs?: number;
      [key: string]: unknown;
    },
    options?: ErrorOptions
  ) {
    super(ErrorCode.FETCH, message, data, options);
    this.name = 'FetchError';
  }
}

/**
 * Thrown when a retrieved document does not have the expected structure.
 *
 * Signals that the source page layout probably changed, as opposed to a
 * transient network issue.
 */
export class ParseError extends PipelineError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(ErrorCode.PARSE, message, data);
    this.name = 'ParseError';
  }
}

/**
 * Thrown when a caller passes arguments that cannot be processed.
 */
export class InvalidInputError extends PipelineError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(ErrorCode.INVALID_INPUT, message, data);
    this.name = 'InvalidInputError';
  }
}

/**
 * Raised by a bar client when a symbol is unknown or has no data in the
 * requested range.
 */
export class BarDataError extends PipelineError {
  constructor(
    message: string,
    data: {
      symbol: string;
      provider?: string;
      [key: string]: unknown;
    },
    options?: ErrorOptions
  ) {
    super(ErrorCode.BAR_DATA, message, data, options);
    this.name = 'BarDataError';
  }
}

/**
 * Raised by a bar client when the provider cannot be reached: network
 * failure, timeout, throttling or a server-side error.
 */
export class ConnectivityError extends PipelineError {
  constructor(
    message: string,
    data: {
      symbol?: string;
      provider?: string;
      status?: number;
      [key: string]: unknown;
    },
    options?: ErrorOptions
  ) {
    super(ErrorCode.CONNECTIVITY, message, data, options);
    this.name = 'ConnectivityError';
  }
}

/**
 * Thrown when configuration fails schema validation.
 */
export class ConfigError extends PipelineError {
  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super(ErrorCode.CONFIG, message, data);
    this.name = 'ConfigError';
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

/**
 * Type guard for bar data errors, matched on `code`.
 */
export function isBarDataError(error: unknown): error is PipelineError {
  return isPipelineError(error) && error.code === ErrorCode.BAR_DATA;
}

/**
 * Type guard for connectivity errors, matched on `code`.
 */
export function isConnectivityError(error: unknown): error is PipelineError {
  return isPipelineError(error) && error.code === ErrorCode.CONNECTIVITY;
}

function innerCauseText(inner: unknown): string {
  if (inner instanceof Error) {
    if (inner.message) {
      return inner.message;
    }
    return 'code' in inner && typeof inner.code === 'string' ? inner.code : '';
  }
  return inner === undefined || inner === null ? '' : String(inner);
}

/**
 * Renders an unknown thrown value as a short cause string for messages.
 *
 * The `cause` of an error is followed one level, so a fetch rejection reads
 * `fetch failed (connect ECONNREFUSED 127.0.0.1:443)` rather than `fetch failed`.
 */
export function describeCause(cause: unknown): string {
  if (!(cause instanceof Error)) {
    return String(cause);
  }

  const inner = innerCauseText(cause.cause);
  if (!inner || inner === cause.message) {
    return cause.message;
  }
  return `${cause.message} (${inner})`;
}
