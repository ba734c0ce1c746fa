/**
 * Audit Sink Interface - Append-only record of order outcomes
 */

import type { OrderIntent, OrderResult } from '../types/execution.types.js';

export type AuditEventType = 'ORDER_RESULT' | 'RISK_REJECTION' | 'AMBIGUOUS_ACKNOWLEDGED';

export interface AuditRecord {
  eventType: AuditEventType;
  idempotencyKey: string;
  venueId: string;
  intent: OrderIntent;
  result: OrderResult;
  recordedAt: Date;
}

export interface AuditSink {
  /** Append one record keyed by the intent's idempotency key */
  append(record: AuditRecord): Promise<void>;

  /** Result of the most recent record under the key, or null if there is none */
  findLatestResult(idempotencyKey: string): Promise<OrderResult | null>;
}
