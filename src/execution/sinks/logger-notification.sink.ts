import type pino from 'pino';
import { getComponentLogger } from '../../config/logger.js';
import type { NotificationKind, NotificationSink } from '../interfaces/index.js';

const WARNING_KINDS: ReadonlySet<NotificationKind> = new Set([
  'ORDER_FAILED',
  'ORDER_AMBIGUOUS',
  'CONNECTION_DEGRADED',
  'VENUE_HALTED',
  'STRATEGY_HALTED',
  'STRATEGY_FAILED',
]);

/** Writes notifications to the structured log; the default operator channel. */
export class LoggerNotificationSink implements NotificationSink {
  private readonly logger: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.logger = logger ?? getComponentLogger('notifications');
  }

  async notify(kind: NotificationKind, payload: Record<string, unknown>): Promise<void> {
    if (WARNING_KINDS.has(kind)) {
      this.logger.warn({ kind, ...payload }, `Notification: ${kind}`);
    } else {
      this.logger.info({ kind, ...payload }, `Notification: ${kind}`);
    }
  }
}
