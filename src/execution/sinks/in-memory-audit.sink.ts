/**
 * In-memory audit sink, used when Supabase is not configured and in tests.
 */

import type { AuditRecord, AuditSink } from '../interfaces/index.js';
import type { OrderResult } from '../types/execution.types.js';

export class InMemoryAuditSink implements AuditSink {
  private readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }

  async findLatestResult(idempotencyKey: string): Promise<OrderResult | null> {
    const matches = this.findByIdempotencyKey(idempotencyKey);
    return matches[matches.length - 1]?.result ?? null;
  }

  list(): readonly AuditRecord[] {
    return this.records;
  }

  findByIdempotencyKey(idempotencyKey: string): AuditRecord[] {
    return this.records.filter(record => record.idempotencyKey === idempotencyKey);
  }
}
