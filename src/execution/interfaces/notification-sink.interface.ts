/**
 * Notification Sink Interface - Fire-and-forget alerts to operators
 */

export type NotificationKind =
  | 'ORDER_FILLED'
  | 'ORDER_ACCEPTED'
  | 'ORDER_REJECTED'
  | 'ORDER_FAILED'
  | 'ORDER_AMBIGUOUS'
  | 'CONNECTION_DEGRADED'
  | 'VENUE_HALTED'
  | 'STRATEGY_HALTED'
  | 'STRATEGY_FAILED';

export interface NotificationSink {
  /**
   * Deliver a notification. Failures are logged by the caller and never
   * affect the outcome of the operation that triggered them.
   */
  notify(kind: NotificationKind, payload: Record<string, unknown>): Promise<void>;
}
