/**
 * Execution Coordinator Service - Single entry point for order intents
 *
 * Flow per intent: dedup by idempotency key, shape validation, a lookup of
 * the key in the audit trail, venue lookup, sizing to the instrument grid,
 * risk check and reservation under one lock, dispatch with retry, result
 * translation, then best-effort side effects.
 */

import type pino from 'pino';
import { getComponentLogger } from '../../config/logger.js';
import {
  CriticalVenueError,
  ERROR_CLASS_BY_KIND,
  createTradingError,
  toTradingError,
  type TradingError,
} from '../../errors/trading-errors.js';
import type { VenueId } from '../../venues/venue.types.js';
import type { ConnectionStatus } from '../connection/connection-manager.js';
import type { VenueBinding, VenueRegistry } from '../connection/venue-registry.js';
import type {
  AuditEventType,
  AuditSink,
  NotificationKind,
  NotificationSink,
  PositionTracker,
} from '../interfaces/index.js';
import { signedQuantity, validateOrderIntent } from '../order-intent.js';
import { failedResult, hasFill } from '../order-result.js';
import { RetryExhaustedError, RetryPolicy } from '../retry/retry-policy.js';
import type { RiskGate } from '../risk/risk-gate.js';
import type {
  AccountSnapshot,
  OrderIntent,
  OrderResult,
  OrderStatus,
  PositionState,
  SideEffectFailure,
} from '../types/execution.types.js';
import { SerialLock } from '../../utils/serial-lock.js';

export interface ExecutionCoordinatorOptions {
  registry: VenueRegistry;
  riskGate: RiskGate;
  dispatchPolicy?: RetryPolicy;
  auditSink?: AuditSink;
  notificationSink?: NotificationSink;
  positionTracker?: PositionTracker;
  /** Live strategy count for the concurrency check */
  activeStrategyCount?: () => number;
  /** How long settled results stay available for duplicate submissions */
  resultRetentionMs?: number;
  clock?: () => Date;
}

export interface AmbiguousOrder {
  intent: OrderIntent;
  result: OrderResult;
}

/** Operator's reconciliation of an ambiguous order against the venue. */
export interface AmbiguousResolution {
  filledQuantity?: number;
  filledPrice?: number;
  venueOrderId?: string;
  /** Defaults to FILLED with a fill, REJECTED without */
  status?: Extract<OrderStatus, 'FILLED' | 'PARTIALLY_FILLED' | 'ACCEPTED' | 'REJECTED'>;
  note?: string;
}

interface Reservation {
  venueId: VenueId;
  symbol: string;
  signedQuantity: number;
}

interface SubmissionEntry {
  promise: Promise<OrderResult>;
  result?: OrderResult;
  settledAt?: number;
}

const DEFAULT_RESULT_RETENTION_MS = 24 * 60 * 60 * 1000;

const NOTIFICATION_BY_STATUS: Readonly<Record<OrderStatus, NotificationKind>> = {
  FILLED: 'ORDER_FILLED',
  PARTIALLY_FILLED: 'ORDER_FILLED',
  ACCEPTED: 'ORDER_ACCEPTED',
  REJECTED: 'ORDER_REJECTED',
  ERROR: 'ORDER_FAILED',
  AMBIGUOUS: 'ORDER_AMBIGUOUS',
};

export class ExecutionCoordinator {
  private readonly registry: VenueRegistry;
  private readonly riskGate: RiskGate;
  private readonly dispatchPolicy: RetryPolicy;
  private readonly auditSink?: AuditSink;
  private readonly notificationSink?: NotificationSink;
  private readonly positionTracker?: PositionTracker;
  private readonly activeStrategyCount: () => number;
  private readonly resultRetentionMs: number;
  private readonly clock: () => Date;
  private readonly logger: pino.Logger;

  private readonly submissions = new Map<string, SubmissionEntry>();
  private readonly reservations = new Map<string, Reservation>();
  private readonly ambiguous = new Map<string, AmbiguousOrder>();
  private readonly lock = new SerialLock();

  constructor(options: ExecutionCoordinatorOptions) {
    this.registry = options.registry;
    this.riskGate = options.riskGate;
    this.dispatchPolicy = options.dispatchPolicy ?? RetryPolicy.dispatch();
    this.auditSink = options.auditSink;
    this.notificationSink = options.notificationSink;
    this.positionTracker = options.positionTracker;
    this.activeStrategyCount = options.activeStrategyCount ?? (() => 0);
    this.resultRetentionMs = options.resultRetentionMs ?? DEFAULT_RESULT_RETENTION_MS;
    this.clock = options.clock ?? (() => new Date());
    this.logger = getComponentLogger('execution-coordinator');
  }

  /**
   * Submit an intent. Never rejects: every failure is reported in the
   * returned result. A key seen before yields the earlier result, or joins
   * the submission still in flight.
   */
  submit(intent: OrderIntent): Promise<OrderResult> {
    this.pruneSettled();

    const existing = this.submissions.get(intent.idempotencyKey);
    if (existing) {
      this.logger.info(
        { idempotencyKey: intent.idempotencyKey, settled: existing.result !== undefined },
        'Duplicate submission, returning prior result'
      );
      return existing.promise;
    }

    const entry: SubmissionEntry = { promise: this.process(intent) };
    this.submissions.set(intent.idempotencyKey, entry);
    entry.promise = entry.promise.then(result => {
      entry.result = result;
      entry.settledAt = this.clock().getTime();
      return result;
    });
    return entry.promise;
  }

  getResult(idempotencyKey: string): OrderResult | undefined {
    return this.submissions.get(idempotencyKey)?.result;
  }

  listAmbiguous(): AmbiguousOrder[] {
    return [...this.ambiguous.values()];
  }

  getAmbiguous(idempotencyKey: string): AmbiguousOrder | undefined {
    return this.ambiguous.get(idempotencyKey);
  }

  /**
   * Closes an ambiguous order after manual reconciliation. A reported fill is
   * applied to the venue snapshot; the reservation is released either way.
   */
  async acknowledgeAmbiguous(
    idempotencyKey: string,
    resolution: AmbiguousResolution = {}
  ): Promise<OrderResult> {
    const pending = this.ambiguous.get(idempotencyKey);
    if (!pending) {
      throw new Error(`No ambiguous order with idempotency key ${idempotencyKey}`);
    }

    const { intent } = pending;
    const filledQuantity = resolution.filledQuantity ?? 0;
    const resolved: OrderResult = {
      idempotencyKey,
      venueId: intent.venueId,
      status: resolution.status ?? (filledQuantity > 0 ? 'FILLED' : 'REJECTED'),
      venueOrderId: resolution.venueOrderId ?? pending.result.venueOrderId,
      filledQuantity: filledQuantity > 0 ? filledQuantity : undefined,
      filledPrice: filledQuantity > 0 ? resolution.filledPrice : undefined,
      errorMessage: resolution.note ?? 'Acknowledged by operator',
      timestamp: this.clock(),
    };

    this.ambiguous.delete(idempotencyKey);
    this.reservations.delete(idempotencyKey);
    this.applyFillToSnapshot(intent, resolved);

    const entry = this.submissions.get(idempotencyKey);
    const final = await this.runSideEffects(intent, resolved, 'AMBIGUOUS_ACKNOWLEDGED');
    if (entry) {
      entry.result = final;
      entry.promise = Promise.resolve(final);
      entry.settledAt = this.clock().getTime();
    }

    this.logger.warn({ idempotencyKey, status: final.status }, 'Ambiguous order acknowledged');
    return final;
  }

  /**
   * Looks the ambiguous order up at the venue by its client order id and
   * settles it from what the venue reports. Returns null, leaving the order
   * ambiguous, when the venue has no record of it.
   */
  async reconcileAmbiguous(idempotencyKey: string): Promise<OrderResult | null> {
    const pending = this.ambiguous.get(idempotencyKey);
    if (!pending) {
      throw new Error(`No ambiguous order with idempotency key ${idempotencyKey}`);
    }

    const { intent, result } = pending;
    const { manager, translator } = this.registry.get(intent.venueId);
    const order = await manager.getOrder({
      symbol: intent.symbol,
      venueOrderId: result.venueOrderId,
      clientOrderId: translator.clientOrderId(idempotencyKey),
    });

    if (!order) {
      this.logger.warn({ idempotencyKey, venueId: intent.venueId }, 'Venue has no record of the ambiguous order');
      return null;
    }

    if (order.filledQuantity > 0) {
      return this.acknowledgeAmbiguous(idempotencyKey, {
        filledQuantity: order.filledQuantity,
        filledPrice: order.averagePrice ?? undefined,
        venueOrderId: order.venueOrderId,
        status: order.status === 'FILLED' ? 'FILLED' : 'PARTIALLY_FILLED',
        note: `Reconciled against venue: ${order.status}`,
      });
    }

    return this.acknowledgeAmbiguous(idempotencyKey, {
      venueOrderId: order.venueOrderId,
      status: order.status === 'CANCELED' ? 'REJECTED' : 'ACCEPTED',
      note: `Reconciled against venue: ${order.status}`,
    });
  }

  getConnectionHealth(venueId: VenueId): ConnectionStatus {
    return this.registry.get(venueId).manager.getStatus();
  }

  listConnectionHealth(): ConnectionStatus[] {
    return this.registry.statuses();
  }

  /** Orders reserved against risk limits: in flight or awaiting acknowledgement */
  openOrderCount(): number {
    return this.reservations.size;
  }

  private async process(intent: OrderIntent): Promise<OrderResult> {
    const startedAt = Date.now();

    try {
      const problems = validateOrderIntent(intent);
      if (problems.length > 0) {
        return await this.runSideEffects(
          intent,
          failedResult(intent, 'INVALID_ORDER', problems.join('; '), this.clock()),
          'ORDER_RESULT'
        );
      }

      const recorded = await this.findRecordedResult(intent);
      if (recorded) {
        return recorded;
      }

      const binding = this.registry.get(intent.venueId);
      if (binding.manager.isHalted()) {
        throw new CriticalVenueError(`${intent.venueId} is halted`, { venueId: intent.venueId });
      }

      // Risk sees the quantity the venue will receive, not the requested one
      const sized = binding.translator.normalize(intent);

      const snapshot = await binding.manager.getAccountSnapshot({
        maxAgeMs: this.riskGate.getLimits().maxSnapshotAgeMs,
      });

      const rejection = await this.lock.runExclusive(() => this.validateAndReserve(binding, sized, snapshot));
      if (rejection) {
        return await this.runSideEffects(sized, rejection, 'RISK_REJECTION');
      }

      const result = await this.dispatch(binding, sized);
      if (result.status === 'AMBIGUOUS') {
        this.ambiguous.set(sized.idempotencyKey, { intent: sized, result });
      } else {
        this.reservations.delete(sized.idempotencyKey);
        this.applyFillToSnapshot(sized, result);
      }

      this.logger.info(
        {
          idempotencyKey: sized.idempotencyKey,
          venueId: sized.venueId,
          status: result.status,
          errorKind: result.errorKind,
          durationMs: Date.now() - startedAt,
        },
        'Order intent processed'
      );

      return await this.runSideEffects(sized, result, 'ORDER_RESULT');
    } catch (error) {
      const tradingError = toTradingError(error, intent.venueId);
      this.logger.error(
        { idempotencyKey: intent.idempotencyKey, venueId: intent.venueId, kind: tradingError.kind, error: tradingError.message },
        'Order intent failed before dispatch'
      );
      const binding = this.registry.has(intent.venueId) ? this.registry.get(intent.venueId) : undefined;
      if (tradingError.errorClass === 'CRITICAL' && binding && !binding.manager.isHalted()) {
        await this.escalate(binding, intent, tradingError);
      }
      return this.runSideEffects(
        intent,
        failedResult(intent, tradingError.kind, tradingError.message, this.clock()),
        'ORDER_RESULT'
      );
    }
  }

  /**
   * A key whose in-memory result was pruned may still be in the audit trail.
   * The lookup is best effort: when it fails the intent proceeds.
   */
  private async findRecordedResult(intent: OrderIntent): Promise<OrderResult | null> {
    if (!this.auditSink) {
      return null;
    }
    try {
      const recorded = await this.auditSink.findLatestResult(intent.idempotencyKey);
      if (recorded) {
        this.logger.info(
          { idempotencyKey: intent.idempotencyKey, status: recorded.status },
          'Idempotency key already settled in the audit trail'
        );
      }
      return recorded;
    } catch (error) {
      this.logger.warn(
        { idempotencyKey: intent.idempotencyKey, error: error instanceof Error ? error.message : String(error) },
        'Audit lookup failed, continuing without it'
      );
      return null;
    }
  }

  /**
   * Runs under the lock: checks the intent against the snapshot with every
   * outstanding reservation applied, then reserves. Returns the rejection
   * result, or null once reserved.
   */
  private validateAndReserve(
    binding: VenueBinding,
    intent: OrderIntent,
    fetched: AccountSnapshot
  ): OrderResult | null {
    // A fill applied while waiting for the lock is only in the cached copy
    const latest = binding.manager.getCachedSnapshot() ?? fetched;
    const projected = this.projectReservations(latest, intent.venueId);

    const decision = this.riskGate.validate(intent, projected, undefined, {
      now: this.clock(),
      activeStrategyCount: this.activeStrategyCount(),
      openOrderCount: this.reservations.size,
    });

    if (!decision.approved) {
      return {
        ...failedResult(intent, 'RISK_REJECTED', decision.reason.description, this.clock()),
        rejectionReason: decision.reason,
      };
    }

    this.reservations.set(intent.idempotencyKey, {
      venueId: intent.venueId,
      symbol: intent.symbol,
      signedQuantity: signedQuantity(intent.side, intent.quantity),
    });
    return null;
  }

  private projectReservations(snapshot: AccountSnapshot, venueId: VenueId): AccountSnapshot {
    const positions: Record<string, PositionState> = { ...snapshot.positions };
    for (const reservation of this.reservations.values()) {
      if (reservation.venueId !== venueId) {
        continue;
      }
      const current = positions[reservation.symbol] ?? { quantity: 0, averagePrice: 0, unrealizedPnl: 0 };
      positions[reservation.symbol] = { ...current, quantity: current.quantity + reservation.signedQuantity };
    }
    return { ...snapshot, positions };
  }

  /**
   * Transient failures, raised or reported by the venue, are retried under
   * the dispatch policy. Everything else ends the attempt loop.
   */
  private async dispatch(binding: VenueBinding, intent: OrderIntent): Promise<OrderResult> {
    const { manager, translator } = binding;

    try {
      return await this.dispatchPolicy.execute(
        async () => {
          await manager.ensureConnected();
          const request = translator.toVenueRequest(intent);
          const response = await manager.placeOrder(request);
          const result = translator.fromVenueResponse(response, intent);

          if (result.errorKind && ERROR_CLASS_BY_KIND[result.errorKind] === 'TRANSIENT') {
            throw createTradingError(result.errorKind, result.errorMessage ?? result.errorKind, {
              venueId: intent.venueId,
            });
          }
          return result;
        },
        {
          onRetry: ({ attempt, delayMs, error }) => {
            this.logger.warn(
              {
                idempotencyKey: intent.idempotencyKey,
                attempt,
                delayMs,
                error: error instanceof Error ? error.message : String(error),
              },
              'Retrying order dispatch'
            );
          },
        }
      );
    } catch (error) {
      const tradingError = toTradingError(
        error instanceof RetryExhaustedError ? error.lastError : error,
        intent.venueId
      );
      await this.escalate(binding, intent, tradingError);
      return failedResult(intent, tradingError.kind, tradingError.message, this.clock());
    }
  }

  private async escalate(binding: VenueBinding, intent: OrderIntent, error: TradingError): Promise<void> {
    if (error.errorClass === 'CRITICAL') {
      this.logger.error(
        { idempotencyKey: intent.idempotencyKey, venueId: intent.venueId, error: error.message },
        'Critical venue error, halting venue'
      );
      await binding.manager.halt(error.message);
    } else if (error.errorClass === 'AMBIGUOUS') {
      this.logger.error(
        { idempotencyKey: intent.idempotencyKey, venueId: intent.venueId, error: error.message },
        'Order outcome unknown, manual reconciliation required'
      );
    }
  }

  private applyFillToSnapshot(intent: OrderIntent, result: OrderResult): void {
    if (!hasFill(result) || result.filledPrice === undefined) {
      return;
    }
    this.registry
      .get(intent.venueId)
      .manager.applyFill(intent.symbol, signedQuantity(intent.side, result.filledQuantity ?? 0), result.filledPrice);
  }

  /** Position tracker, notification, audit. Failures never change the result. */
  private async runSideEffects(
    intent: OrderIntent,
    result: OrderResult,
    eventType: AuditEventType
  ): Promise<OrderResult> {
    const failures: SideEffectFailure[] = [];

    const attempt = async (effect: SideEffectFailure['effect'], action: () => Promise<void>): Promise<void> => {
      try {
        await action();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ effect, message });
        this.logger.error(
          { idempotencyKey: intent.idempotencyKey, effect, error: message },
          'Order side effect failed'
        );
      }
    };

    const { positionTracker, notificationSink, auditSink } = this;
    if (positionTracker && hasFill(result)) {
      await attempt('POSITION_TRACKER', () => positionTracker.recordFill(intent, result));
    }
    if (notificationSink) {
      await attempt('NOTIFICATION', () =>
        notificationSink.notify(NOTIFICATION_BY_STATUS[result.status], {
          idempotencyKey: intent.idempotencyKey,
          venueId: intent.venueId,
          symbol: intent.symbol,
          side: intent.side,
          quantity: intent.quantity,
          status: result.status,
          errorKind: result.errorKind,
          originator: intent.originator,
        })
      );
    }
    if (auditSink) {
      await attempt('AUDIT', () =>
        auditSink.append({
          eventType,
          idempotencyKey: intent.idempotencyKey,
          venueId: intent.venueId,
          intent,
          result,
          recordedAt: this.clock(),
        })
      );
    }

    return failures.length > 0 ? { ...result, sideEffectFailures: failures } : result;
  }

  /** Settled results past retention are forgotten; ambiguous ones are kept. */
  private pruneSettled(): void {
    const cutoff = this.clock().getTime() - this.resultRetentionMs;
    for (const [key, entry] of this.submissions) {
      if (entry.settledAt !== undefined && entry.settledAt < cutoff && !this.ambiguous.has(key)) {
        this.submissions.delete(key);
      }
    }
  }
}
