import type { ErrorKind } from '../errors/trading-errors.js';
import type { OrderIntent, OrderResult, OrderStatus } from './types/execution.types.js';

// Venue business rejections; other failures surface as ERROR
const REJECTION_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'VENUE_REJECTED',
  'INSUFFICIENT_FUNDS',
  'INVALID_ORDER',
  'RISK_REJECTED',
]);

export function statusForErrorKind(kind: ErrorKind): OrderStatus {
  if (kind === 'AMBIGUOUS') {
    return 'AMBIGUOUS';
  }
  return REJECTION_KINDS.has(kind) ? 'REJECTED' : 'ERROR';
}

export function failedResult(
  intent: OrderIntent,
  kind: ErrorKind,
  message: string,
  timestamp: Date = new Date()
): OrderResult {
  return {
    idempotencyKey: intent.idempotencyKey,
    venueId: intent.venueId,
    status: statusForErrorKind(kind),
    errorKind: kind,
    errorMessage: message,
    timestamp,
  };
}

export function hasFill(result: OrderResult): boolean {
  return (result.filledQuantity ?? 0) > 0 && result.filledPrice !== undefined;
}
