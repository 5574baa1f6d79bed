export type BrokerErrorCode =
  | 'validation_error'
  | 'upstream_auth_error'
  | 'upstream_rejected'
  | 'upstream_unavailable';

/**
 * Base of the externally visible error taxonomy. Every failure the broker
 * produces is one of the four subclasses below; the gateway maps them to a
 * status code through `httpStatus`.
 */
export abstract class BrokerError extends Error {
  abstract readonly code: BrokerErrorCode;
  abstract readonly httpStatus: number;
}

/**
 * Malformed dashboard reference or RLS shape - never contacts upstream
 */
export class ValidationError extends BrokerError {
  readonly code = 'validation_error';
  readonly httpStatus = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UpstreamAuthError extends BrokerError {
  readonly code = 'upstream_auth_error';
  readonly httpStatus = 401;

  constructor(message: string, readonly upstreamStatus?: number) {
    super(message);
    this.name = 'UpstreamAuthError';
  }
}

/**
 * Raised by the upstream client when a business call is refused because the
 * admin session expired. Callers that can re-authenticate catch it; anywhere
 * else it surfaces as an ordinary UpstreamAuthError.
 */
export class SessionExpiredError extends UpstreamAuthError {
  constructor(message: string, upstreamStatus: number) {
    super(message, upstreamStatus);
    this.name = 'SessionExpiredError';
  }
}

export class UpstreamRejected extends BrokerError {
  readonly code = 'upstream_rejected';
  readonly httpStatus: number;

  constructor(message: string, readonly upstreamStatus: number) {
    super(message);
    this.name = 'UpstreamRejected';
    this.httpStatus = rejectedStatus(upstreamStatus);
  }
}

function rejectedStatus(upstreamStatus: number): number {
  if (upstreamStatus === 401 || upstreamStatus === 403) return 403;
  if (upstreamStatus === 404) return 404;
  if (upstreamStatus >= 400 && upstreamStatus < 500) return 400;
  // A 2xx whose body lacked the expected field
  return 502;
}

export class UpstreamUnavailable extends BrokerError {
  readonly code = 'upstream_unavailable';
  readonly httpStatus: number;

  constructor(message: string, readonly upstreamStatus?: number) {
    super(message);
    this.name = 'UpstreamUnavailable';
    this.httpStatus = upstreamStatus === undefined ? 503 : 502;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isBrokerError(error: unknown): error is BrokerError {
  return error instanceof BrokerError;
}
