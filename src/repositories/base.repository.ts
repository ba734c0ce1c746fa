import type { SupabaseClient } from '@supabase/supabase-js';
import type pino from 'pino';
import { getLogger } from '../config/logger.js';
import { DatabaseError } from '../types/database.js';
import { isRecord } from '../utils/guards.js';

/** The part of the Supabase client repositories query through */
export type TableClient = Pick<SupabaseClient, 'from'>;

export abstract class BaseRepository {
  protected logger: pino.Logger = getLogger();

  constructor(protected readonly client: TableClient) {}

  protected handleDatabaseError(error: unknown, operation: string): never {
    let message = `Database operation failed: ${operation}`;
    let code: string | undefined;
    let details: string | undefined;

    if (isRecord(error)) {
      if (typeof error['code'] === 'string') {
        code = error['code'];
      }
      if (typeof error['details'] === 'string') {
        details = error['details'];
      }
      if (typeof error['message'] === 'string') {
        message = `${message} - ${error['message']}`;
      }
    }

    this.logger.error({ operation, code, details, error: message }, 'Database operation failed');

    throw new DatabaseError(message, operation, code, details);
  }

  protected validateRequired(value: unknown, fieldName: string): void {
    if (value === null || value === undefined || value === '') {
      throw new Error(`${fieldName} is required`);
    }
  }

  protected validateTimestamp(value: Date, fieldName: string): void {
    if (!(value instanceof Date) || isNaN(value.getTime())) {
      throw new Error(`${fieldName} must be a valid Date`);
    }
  }
}
