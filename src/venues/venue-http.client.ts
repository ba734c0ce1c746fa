import {
  AmbiguousOrderError,
  AuthError,
  NetworkError,
  RateLimitedError,
  TimeoutError,
  VenueRejectedError,
} from '../errors/trading-errors.js';
import type { VenueId } from './venue.types.js';

export interface VenueHttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
  /**
   * Order placement: a failure after the request may have left the process
   * cannot be retried and is reported as ambiguous.
   */
  placement?: boolean;
}

export type FetchLike = (
  input: string,
  init: RequestInit
) => Promise<Response>;

// Socket errors raised before any byte is written
const UNSENT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

function causeCode(error: unknown): string | undefined {
  if (error instanceof Error && error.cause instanceof Error) {
    const code: unknown = Reflect.get(error.cause, 'code');
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * JSON request against a venue REST endpoint with the shared status mapping:
 * 401/403 auth, 429 rate limited (Retry-After honored), 503 unavailable,
 * other 5xx unavailable or ambiguous for placements. Other statuses return
 * their JSON body so the caller can read the venue's own error code.
 */
export async function requestVenueJson(
  venueId: VenueId,
  request: VenueHttpRequest,
  fetchImpl: FetchLike = fetch
): Promise<unknown> {
  const placement = request.placement === true;
  let response: Response;

  try {
    response = await fetchImpl(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.signal,
    });
  } catch (error) {
    if (request.signal?.aborted) {
      if (placement) {
        throw new AmbiguousOrderError(
          `Order request to ${venueId} exceeded its deadline`,
          { venueId, cause: error }
        );
      }
      throw new TimeoutError(`Request to ${venueId} exceeded its deadline`, {
        venueId,
        cause: error,
      });
    }

    const code = causeCode(error);
    if (!placement || (code !== undefined && UNSENT_ERROR_CODES.has(code))) {
      throw new NetworkError(
        `Request to ${venueId} failed: ${error instanceof Error ? error.message : String(error)}`,
        { venueId, cause: error }
      );
    }
    throw new AmbiguousOrderError(
      `Order request to ${venueId} lost its response: ${error instanceof Error ? error.message : String(error)}`,
      { venueId, cause: error }
    );
  }

  switch (response.status) {
    case 401:
    case 403:
      throw new AuthError(`${venueId} rejected the credentials (HTTP ${response.status})`, {
        venueId,
        venueCode: String(response.status),
      });
    case 429: {
      const retryAfter = response.headers.get('Retry-After');
      const retryAfterSeconds = retryAfter ? parseInt(retryAfter, 10) : NaN;
      throw new RateLimitedError(
        `${venueId} rate limit exceeded`,
        Number.isFinite(retryAfterSeconds) ? retryAfterSeconds * 1000 : undefined,
        { venueId, venueCode: '429' }
      );
    }
    case 503:
      throw new NetworkError(`${venueId} service unavailable (HTTP 503)`, {
        venueId,
        venueCode: '503',
      });
    case 500:
    case 502:
    case 504:
      if (placement) {
        throw new AmbiguousOrderError(
          `${venueId} answered HTTP ${response.status} to an order request`,
          { venueId, venueCode: String(response.status) }
        );
      }
      throw new NetworkError(`${venueId} server error (HTTP ${response.status})`, {
        venueId,
        venueCode: String(response.status),
      });
    default:
      break;
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    if (placement && response.ok) {
      throw new AmbiguousOrderError(
        `${venueId} accepted an order request with an unreadable body`,
        { venueId, cause: error }
      );
    }
    if (response.ok) {
      throw new NetworkError(`${venueId} returned an unreadable body`, {
        venueId,
        cause: error,
      });
    }
    throw new VenueRejectedError(
      `${venueId} API error: HTTP ${response.status} ${response.statusText}`,
      { venueId, venueCode: String(response.status) }
    );
  }

  return body;
}
