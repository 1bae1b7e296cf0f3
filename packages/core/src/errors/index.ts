/**
 * Base error for everything raised by the metrics pipeline
 */
export class MetricsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MetricsError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Network failures and non-2xx HTTP responses
 */
export class TransportError extends MetricsError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'TRANSPORT_ERROR', context);
    this.name = 'TransportError';
  }
}

/**
 * Response body is neither JSON nor recognizable delimited text
 */
export class DecodeError extends MetricsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DECODE_ERROR', context);
    this.name = 'DecodeError';
  }
}

/**
 * Payload decoded but its shape matches no known schema
 */
export class FormatError extends MetricsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'FORMAT_ERROR', context);
    this.name = 'FormatError';
  }
}

/**
 * Caller error: unknown resolution or layout, unsupported operation, bad configuration
 */
export class ConfigError extends MetricsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/**
 * Whether an error ends pagination without discarding what was already fetched
 */
export function isPageFailure(error: unknown): error is TransportError | DecodeError {
  return error instanceof TransportError || error instanceof DecodeError;
}
