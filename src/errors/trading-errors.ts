import type { VenueId } from '../venues/venue.types.js';

/**
 * Error taxonomy shared by every venue and the coordinator.
 *
 * The class decides handling: transient errors are retried, permanent ones
 * are returned to the caller, ambiguous ones are escalated for manual
 * reconciliation and critical ones halt the venue.
 */
export type ErrorClass = 'TRANSIENT' | 'PERMANENT' | 'AMBIGUOUS' | 'CRITICAL';

export type ErrorKind =
  | 'NETWORK_ERROR'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'AUTH_ERROR'
  | 'UNSUPPORTED_ORDER_KIND'
  | 'UNIT_MISMATCH'
  | 'RISK_REJECTED'
  | 'INVALID_ORDER'
  | 'VENUE_REJECTED'
  | 'INSUFFICIENT_FUNDS'
  | 'CONNECTION_UNAVAILABLE'
  | 'UNKNOWN_VENUE_ERROR'
  | 'UNKNOWN_VENUE'
  | 'INTERNAL_ERROR'
  | 'AMBIGUOUS'
  | 'CRITICAL';

export const ERROR_CLASS_BY_KIND: Readonly<Record<ErrorKind, ErrorClass>> = {
  NETWORK_ERROR: 'TRANSIENT',
  RATE_LIMITED: 'TRANSIENT',
  TIMEOUT: 'TRANSIENT',
  AUTH_ERROR: 'PERMANENT',
  UNSUPPORTED_ORDER_KIND: 'PERMANENT',
  UNIT_MISMATCH: 'PERMANENT',
  RISK_REJECTED: 'PERMANENT',
  INVALID_ORDER: 'PERMANENT',
  VENUE_REJECTED: 'PERMANENT',
  INSUFFICIENT_FUNDS: 'PERMANENT',
  CONNECTION_UNAVAILABLE: 'PERMANENT',
  UNKNOWN_VENUE_ERROR: 'PERMANENT',
  UNKNOWN_VENUE: 'PERMANENT',
  INTERNAL_ERROR: 'PERMANENT',
  AMBIGUOUS: 'AMBIGUOUS',
  CRITICAL: 'CRITICAL',
};

export interface TradingErrorOptions {
  venueId?: VenueId;
  venueCode?: string;
  cause?: unknown;
}

export class TradingError extends Error {
  readonly kind: ErrorKind;
  readonly errorClass: ErrorClass;
  readonly venueId?: VenueId;
  readonly venueCode?: string;

  constructor(kind: ErrorKind, message: string, options: TradingErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'TradingError';
    this.kind = kind;
    this.errorClass = ERROR_CLASS_BY_KIND[kind];
    this.venueId = options.venueId;
    this.venueCode = options.venueCode;
  }
}

export class NetworkError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('NETWORK_ERROR', message, options);
    this.name = 'NetworkError';
  }
}

export class RateLimitedError extends TradingError {
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    retryAfterMs?: number,
    options?: TradingErrorOptions
  ) {
    super('RATE_LIMITED', message, options);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class TimeoutError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('TIMEOUT', message, options);
    this.name = 'TimeoutError';
  }
}

export class AuthError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('AUTH_ERROR', message, options);
    this.name = 'AuthError';
  }
}

export class UnsupportedOrderKindError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('UNSUPPORTED_ORDER_KIND', message, options);
    this.name = 'UnsupportedOrderKindError';
  }
}

export class UnitMismatchError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('UNIT_MISMATCH', message, options);
    this.name = 'UnitMismatchError';
  }
}

export class InvalidOrderError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('INVALID_ORDER', message, options);
    this.name = 'InvalidOrderError';
  }
}

export class VenueRejectedError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('VENUE_REJECTED', message, options);
    this.name = 'VenueRejectedError';
  }
}

export class InsufficientFundsError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('INSUFFICIENT_FUNDS', message, options);
    this.name = 'InsufficientFundsError';
  }
}

export class ConnectionUnavailableError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('CONNECTION_UNAVAILABLE', message, options);
    this.name = 'ConnectionUnavailableError';
  }
}

/** A venue answered with a code this system has no mapping for. */
export class UnrecognizedVenueCodeError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('UNKNOWN_VENUE_ERROR', message, options);
    this.name = 'UnrecognizedVenueCodeError';
  }
}

/** No connection manager or translator is registered for the venue id. */
export class UnknownVenueError extends TradingError {
  constructor(venueId: VenueId) {
    super('UNKNOWN_VENUE', `No venue registered for id: ${venueId}`, {
      venueId,
    });
    this.name = 'UnknownVenueError';
  }
}

/** The order may or may not have reached the venue. Never retried. */
export class AmbiguousOrderError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('AMBIGUOUS', message, options);
    this.name = 'AmbiguousOrderError';
  }
}

export class CriticalVenueError extends TradingError {
  constructor(message: string, options?: TradingErrorOptions) {
    super('CRITICAL', message, options);
    this.name = 'CriticalVenueError';
  }
}

export function isTradingError(error: unknown): error is TradingError {
  return error instanceof TradingError;
}

export function isTransientError(error: unknown): boolean {
  return isTradingError(error) && error.errorClass === 'TRANSIENT';
}

/**
 * Normalizes anything thrown into the taxonomy. Errors that are not already
 * classified become INTERNAL_ERROR.
 */
export function toTradingError(error: unknown, venueId?: VenueId): TradingError {
  if (isTradingError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TradingError('INTERNAL_ERROR', message, { venueId, cause: error });
}

/**
 * Builds the concrete error class for a kind. Used where venue codes are
 * resolved to a kind first.
 */
export function createTradingError(
  kind: ErrorKind,
  message: string,
  options: TradingErrorOptions = {}
): TradingError {
  switch (kind) {
    case 'NETWORK_ERROR':
      return new NetworkError(message, options);
    case 'RATE_LIMITED':
      return new RateLimitedError(message, undefined, options);
    case 'TIMEOUT':
      return new TimeoutError(message, options);
    case 'AUTH_ERROR':
      return new AuthError(message, options);
    case 'UNSUPPORTED_ORDER_KIND':
      return new UnsupportedOrderKindError(message, options);
    case 'UNIT_MISMATCH':
      return new UnitMismatchError(message, options);
    case 'INVALID_ORDER':
      return new InvalidOrderError(message, options);
    case 'VENUE_REJECTED':
      return new VenueRejectedError(message, options);
    case 'INSUFFICIENT_FUNDS':
      return new InsufficientFundsError(message, options);
    case 'CONNECTION_UNAVAILABLE':
      return new ConnectionUnavailableError(message, options);
    case 'UNKNOWN_VENUE_ERROR':
      return new UnrecognizedVenueCodeError(message, options);
    case 'AMBIGUOUS':
      return new AmbiguousOrderError(message, options);
    case 'CRITICAL':
      return new CriticalVenueError(message, options);
    default:
      return new TradingError(kind, message, options);
  }
}
