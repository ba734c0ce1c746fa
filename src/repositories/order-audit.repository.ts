import { ERROR_CLASS_BY_KIND, type ErrorKind } from '../errors/trading-errors.js';
import type { AuditRecord, AuditSink } from '../execution/interfaces/index.js';
import type { OrderIntent, OrderResult, OrderStatus } from '../execution/types/execution.types.js';
import type { OrderAuditRow } from '../types/database.js';
import { readNumber, readString } from '../utils/guards.js';
import { BaseRepository } from './base.repository.js';

const AUDIT_TABLE = 'order_audit_log';

const ORDER_STATUSES: readonly OrderStatus[] = [
  'ACCEPTED',
  'REJECTED',
  'FILLED',
  'PARTIALLY_FILLED',
  'ERROR',
  'AMBIGUOUS',
];

function isErrorKind(value: string): value is ErrorKind {
  return value in ERROR_CLASS_BY_KIND;
}

/**
 * Append-only audit trail in Supabase. Rows are never updated; an
 * acknowledged ambiguous order gets a second row under the same key.
 */
export class OrderAuditRepository extends BaseRepository implements AuditSink {
  async append(record: AuditRecord): Promise<void> {
    this.validateRequired(record.idempotencyKey, 'idempotencyKey');
    this.validateTimestamp(record.recordedAt, 'recordedAt');

    const row = toAuditRow(record);
    const { error } = await this.client.from(AUDIT_TABLE).insert(row);

    if (error) {
      this.handleDatabaseError(error, 'append order audit record');
    }

    this.logger.debug(
      { idempotencyKey: record.idempotencyKey, eventType: record.eventType },
      'Order audit record stored'
    );
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<OrderAuditRow[]> {
    this.validateRequired(idempotencyKey, 'idempotencyKey');

    const { data, error } = await this.client
      .from(AUDIT_TABLE)
      .select('*')
      .eq('idempotency_key', idempotencyKey)
      .order('recorded_at', { ascending: true });

    if (error) {
      this.handleDatabaseError(error, 'find order audit records');
    }

    return data ?? [];
  }

  async findLatestResult(idempotencyKey: string): Promise<OrderResult | null> {
    this.validateRequired(idempotencyKey, 'idempotencyKey');

    const { data, error } = await this.client
      .from(AUDIT_TABLE)
      .select('*')
      .eq('idempotency_key', idempotencyKey)
      .order('recorded_at', { ascending: false })
      .limit(1);

    if (error) {
      this.handleDatabaseError(error, 'find latest order audit record');
    }

    const row: OrderAuditRow | undefined = data?.[0];
    return row ? fromAuditRow(row) : null;
  }
}

/** Rebuilds the stored result; null when the row's status is not one we write */
export function fromAuditRow(row: OrderAuditRow): OrderResult | null {
  const status = ORDER_STATUSES.find(candidate => candidate === row.status);
  if (!status) {
    return null;
  }
  const errorKind = row.error_kind !== null && isErrorKind(row.error_kind) ? row.error_kind : undefined;
  const timestamp = readString(row.result, 'timestamp');

  return {
    idempotencyKey: row.idempotency_key,
    venueId: row.venue_id,
    status,
    venueOrderId: row.venue_order_id ?? undefined,
    filledQuantity: readNumber(row.result, 'filledQuantity'),
    filledPrice: readNumber(row.result, 'filledPrice'),
    errorKind,
    errorMessage: readString(row.result, 'errorMessage'),
    timestamp: new Date(timestamp ?? row.recorded_at),
  };
}

export function toAuditRow(record: AuditRecord): OrderAuditRow {
  const { intent, result } = record;
  return {
    event_type: record.eventType,
    idempotency_key: record.idempotencyKey,
    venue_id: record.venueId,
    symbol: intent.symbol,
    side: intent.side,
    order_kind: intent.kind,
    quantity: intent.quantity,
    status: result.status,
    venue_order_id: result.venueOrderId ?? null,
    error_kind: result.errorKind ?? null,
    rejection_code: result.rejectionReason?.code ?? null,
    intent: serializeIntent(intent),
    result: serializeResult(result),
    recorded_at: record.recordedAt.toISOString(),
  };
}

function serializeIntent(intent: OrderIntent): Record<string, unknown> {
  return { ...intent, originator: { ...intent.originator }, createdAt: intent.createdAt.toISOString() };
}

function serializeResult(result: OrderResult): Record<string, unknown> {
  return { ...result, timestamp: result.timestamp.toISOString() };
}
