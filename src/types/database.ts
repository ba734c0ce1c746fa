/** Row shape of the `order_audit_log` table */
export interface OrderAuditRow {
  id?: string;
  event_type: string;
  idempotency_key: string;
  venue_id: string;
  symbol: string;
  side: string;
  order_kind: string;
  quantity: number;
  status: string;
  venue_order_id: string | null;
  error_kind: string | null;
  rejection_code: string | null;
  intent: Record<string, unknown>;
  result: Record<string, unknown>;
  recorded_at: string;
  created_at?: string;
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    readonly code?: string,
    readonly details?: string
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}
