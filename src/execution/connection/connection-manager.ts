import type pino from 'pino';
import { getComponentLogger } from '../../config/logger.js';
import {
  AmbiguousOrderError,
  AuthError,
  ConnectionUnavailableError,
  CriticalVenueError,
  isTradingError,
  NetworkError,
  TimeoutError,
  type TradingError,
} from '../../errors/trading-errors.js';
import type {
  ClosePositionRequest,
  ClosePositionResult,
  VenueCredentials,
  VenueId,
  VenueOrderRef,
  VenueOrderState,
  VenueRequest,
  VenueResponse,
  VenueSession,
} from '../../venues/venue.types.js';
import { withDeadline } from '../../utils/deadline.js';
import type { NotificationSink } from '../interfaces/notification-sink.interface.js';
import { RetryExhaustedError, RetryPolicy } from '../retry/retry-policy.js';
import type {
  AccountSnapshot,
  ConnectionState,
  PositionState,
} from '../types/execution.types.js';

export interface ConnectionManagerOptions {
  session: VenueSession;
  credentials: VenueCredentials;
  reconnectPolicy?: RetryPolicy;
  /** Deadline for connect, snapshot and other non-order calls */
  callTimeoutMs?: number;
  /** Deadline for order placement; exceeding it is ambiguous */
  orderTimeoutMs?: number;
  notificationSink?: NotificationSink;
  clock?: () => Date;
}

export interface ConnectionStatus {
  venueId: VenueId;
  state: ConnectionState;
  reconnectExhausted: boolean;
  halted: boolean;
  haltReason?: string;
  lastError?: string;
  lastConnectedAt?: Date;
  lastHealthCheckAt?: Date;
  snapshotCapturedAt?: Date;
}

export type StateListener = (state: ConnectionState, previous: ConnectionState) => void;

/**
 * Owns the connection to one venue. State is mutated only here; every other
 * component reads it through getState/getStatus or reacts via onStateChange.
 */
export class ConnectionManager {
  readonly venueId: VenueId;
  private state: ConnectionState = 'DISCONNECTED';
  private reconnectExhausted = false;
  private haltReason: string | null = null;
  private connecting: Promise<void> | null = null;
  private reconnecting: Promise<void> | null = null;
  private snapshot: AccountSnapshot | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private lastError?: string;
  private lastConnectedAt?: Date;
  private lastHealthCheckAt?: Date;
  private readonly listeners = new Set<StateListener>();
  private readonly session: VenueSession;
  private readonly credentials: VenueCredentials;
  private readonly reconnectPolicy: RetryPolicy;
  private readonly callTimeoutMs: number;
  private readonly orderTimeoutMs: number;
  private readonly notificationSink?: NotificationSink;
  private readonly clock: () => Date;
  private readonly logger: pino.Logger;

  constructor(options: ConnectionManagerOptions) {
    this.session = options.session;
    this.venueId = options.session.venueId;
    this.credentials = options.credentials;
    this.reconnectPolicy = options.reconnectPolicy ?? RetryPolicy.reconnect();
    this.callTimeoutMs = options.callTimeoutMs ?? 10_000;
    this.orderTimeoutMs = options.orderTimeoutMs ?? 15_000;
    this.notificationSink = options.notificationSink;
    this.clock = options.clock ?? (() => new Date());
    this.logger = getComponentLogger('connection-manager', { venueId: this.venueId });
  }

  getState(): ConnectionState {
    return this.state;
  }

  getStatus(): ConnectionStatus {
    return {
      venueId: this.venueId,
      state: this.state,
      reconnectExhausted: this.reconnectExhausted,
      halted: this.haltReason !== null,
      haltReason: this.haltReason ?? undefined,
      lastError: this.lastError,
      lastConnectedAt: this.lastConnectedAt,
      lastHealthCheckAt: this.lastHealthCheckAt,
      snapshotCapturedAt: this.snapshot?.capturedAt,
    };
  }

  isHalted(): boolean {
    return this.haltReason !== null;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Idempotent: returns at once when connected and joins an in-flight
   * attempt otherwise.
   * @throws AuthError (state DISCONNECTED) or NetworkError (state DEGRADED)
   */
  async connect(): Promise<void> {
    this.assertNotHalted();
    if (this.state === 'CONNECTED') {
      return;
    }
    await this.connectShared();
  }

  /**
   * Returns at once when connected. Otherwise reconnects under the reconnect
   * policy; concurrent callers share one attempt. Once the policy is
   * exhausted every call fails fast until reconnect() or a successful
   * healthCheck().
   */
  async ensureConnected(): Promise<void> {
    this.assertNotHalted();
    if (this.state === 'CONNECTED') {
      return;
    }
    if (this.reconnectExhausted) {
      throw new ConnectionUnavailableError(
        `${this.venueId} reconnect attempts exhausted; manual reconnect required`,
        { venueId: this.venueId }
      );
    }

    if (!this.reconnecting) {
      this.reconnecting = this.runReconnect().finally(() => {
        this.reconnecting = null;
      });
    }
    await this.reconnecting;
  }

  /** Manual recovery path: clears the exhausted flag and connects now. */
  async reconnect(): Promise<ConnectionState> {
    this.assertNotHalted();
    this.reconnectExhausted = false;
    this.logger.info('Manual reconnect requested');
    if (this.state === 'CONNECTED') {
      return this.state;
    }
    await this.connectShared();
    return this.state;
  }

  /**
   * Lightweight round trip (account snapshot). From DEGRADED it makes one
   * reconnect attempt, which also clears an exhausted reconnect policy.
   */
  async healthCheck(): Promise<ConnectionState> {
    this.lastHealthCheckAt = this.clock();

    if (this.haltReason !== null || this.state === 'CONNECTING') {
      return this.state;
    }

    if (this.state === 'DEGRADED') {
      try {
        await this.connectShared();
        this.logger.info('Health-triggered reconnect succeeded');
      } catch (error) {
        this.logger.warn({ error: this.describe(error) }, 'Health-triggered reconnect failed');
        return this.state;
      }
    }

    if (this.state !== 'CONNECTED') {
      return this.state;
    }

    try {
      await this.refreshSnapshot();
    } catch (error) {
      this.logger.warn({ error: this.describe(error) }, 'Health check round trip failed');
    }
    return this.state;
  }

  async disconnect(): Promise<void> {
    this.stopSnapshotRefresh();
    try {
      await this.session.disconnect();
    } catch (error) {
      this.logger.warn({ error: this.describe(error) }, 'Venue session release failed');
    }
    this.setState('DISCONNECTED');
    this.logger.info('Disconnected');
  }

  /**
   * Sends one order. Exceeding the order deadline, or losing the response,
   * raises AmbiguousOrderError; the caller must not resend.
   */
  async placeOrder(request: VenueRequest): Promise<VenueResponse> {
    await this.ensureConnected();

    try {
      return await withDeadline(
        signal => this.session.placeOrder(request, signal),
        this.orderTimeoutMs,
        () =>
          new AmbiguousOrderError(
            `${this.venueId} order exceeded its ${this.orderTimeoutMs}ms deadline`,
            { venueId: this.venueId }
          )
      );
    } catch (error) {
      await this.observeFailure(error);
      throw error;
    }
  }

  cancelOrder(ref: VenueOrderRef): Promise<VenueOrderRef> {
    return this.call('cancel', signal => this.session.cancelOrder(ref, signal));
  }

  getOrder(ref: VenueOrderRef): Promise<VenueOrderState | null> {
    return this.call('order lookup', signal => this.session.getOrder(ref, signal));
  }

  listOpenOrders(symbol?: string): Promise<VenueOrderState[]> {
    return this.call('open orders', signal => this.session.listOpenOrders(symbol, signal));
  }

  /** A close is a market order: exceeding the order deadline is ambiguous. */
  async closePosition(request: ClosePositionRequest): Promise<ClosePositionResult> {
    await this.ensureConnected();

    try {
      return await withDeadline(
        signal => this.session.closePosition(request, signal),
        this.orderTimeoutMs,
        () =>
          new AmbiguousOrderError(
            `${this.venueId} position close exceeded its ${this.orderTimeoutMs}ms deadline`,
            { venueId: this.venueId }
          )
      );
    } catch (error) {
      await this.observeFailure(error);
      throw error;
    }
  }

  /**
   * Cached snapshot when younger than `maxAgeMs`, otherwise a fresh one.
   */
  async getAccountSnapshot(options: { maxAgeMs?: number } = {}): Promise<AccountSnapshot> {
    if (this.snapshot && options.maxAgeMs !== undefined) {
      const age = this.clock().getTime() - this.snapshot.capturedAt.getTime();
      if (age <= options.maxAgeMs) {
        return this.snapshot;
      }
    }

    await this.ensureConnected();
    return this.refreshSnapshot();
  }

  getCachedSnapshot(): AccountSnapshot | null {
    return this.snapshot;
  }

  startSnapshotRefresh(intervalMs: number): void {
    this.stopSnapshotRefresh();
    this.refreshTimer = setInterval(() => {
      this.refreshTick().catch(error => {
        this.logger.error({ error: this.describe(error) }, 'Snapshot refresh tick failed');
      });
    }, intervalMs);
    this.refreshTimer.unref();
  }

  stopSnapshotRefresh(): void {
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }
  }

  /**
   * Applies a fill to the cached snapshot so risk checks see it before the
   * next venue refresh.
   */
  applyFill(symbol: string, signedQuantity: number, price: number): void {
    if (!this.snapshot || signedQuantity === 0) {
      return;
    }

    const current: PositionState = this.snapshot.positions[symbol] ?? {
      quantity: 0,
      averagePrice: 0,
      unrealizedPnl: 0,
    };
    const quantity = current.quantity + signedQuantity;
    let averagePrice = current.averagePrice;

    if (current.quantity === 0 || Math.sign(current.quantity) === Math.sign(signedQuantity)) {
      averagePrice =
        (Math.abs(current.quantity) * current.averagePrice + Math.abs(signedQuantity) * price) /
        Math.abs(quantity);
    } else if (Math.sign(quantity) !== Math.sign(current.quantity) && quantity !== 0) {
      // Position flipped: the remainder was opened at the fill price
      averagePrice = price;
    }

    const positions: Record<string, PositionState> = { ...this.snapshot.positions };
    if (quantity === 0) {
      delete positions[symbol];
    } else {
      positions[symbol] = { quantity, averagePrice, unrealizedPnl: current.unrealizedPnl };
    }
    this.snapshot = { ...this.snapshot, positions };
  }

  /**
   * Critical venue condition: forces DISCONNECTED and refuses all work until
   * an operator calls operatorReset().
   */
  async halt(reason: string): Promise<void> {
    if (this.haltReason !== null) {
      return;
    }
    this.haltReason = reason;
    this.logger.error({ reason }, 'Venue halted');
    await this.disconnect();
    await this.alert('VENUE_HALTED', { reason });
  }

  operatorReset(): void {
    this.logger.warn({ previousReason: this.haltReason }, 'Operator reset');
    this.haltReason = null;
    this.reconnectExhausted = false;
  }

  private async runReconnect(): Promise<void> {
    try {
      await this.reconnectPolicy.execute(() => this.connectShared(), {
        backoffBeforeFirstAttempt: true,
        onRetry: ({ attempt, delayMs }) => {
          this.logger.info({ attempt, delayMs }, 'Reconnect attempt scheduled');
        },
      });
    } catch (error) {
      if (!(error instanceof RetryExhaustedError)) {
        throw error;
      }

      this.reconnectExhausted = true;
      this.setState('DEGRADED');
      this.logger.error(
        { attempts: error.attempts, error: this.describe(error.lastError) },
        'Reconnect attempts exhausted'
      );
      await this.alert('CONNECTION_DEGRADED', {
        attempts: error.attempts,
        error: this.describe(error.lastError),
      });
      throw new ConnectionUnavailableError(
        `${this.venueId} unreachable after ${error.attempts} reconnect attempts`,
        { venueId: this.venueId, cause: error.lastError }
      );
    }
  }

  private connectShared(): Promise<void> {
    if (!this.connecting) {
      this.connecting = this.connectOnce().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connectOnce(): Promise<void> {
    this.assertNotHalted();
    this.setState('CONNECTING');

    try {
      await withDeadline(
        signal => this.session.connect(this.credentials, signal),
        this.callTimeoutMs,
        () =>
          new TimeoutError(`${this.venueId} connect exceeded ${this.callTimeoutMs}ms`, {
            venueId: this.venueId,
          })
      );
    } catch (error) {
      const classified = this.classifyConnectError(error);
      this.lastError = classified.message;
      this.setState(classified instanceof AuthError ? 'DISCONNECTED' : 'DEGRADED');
      this.logger.warn({ kind: classified.kind, error: classified.message }, 'Connect failed');
      if (classified.errorClass === 'CRITICAL') {
        await this.halt(classified.message);
      }
      throw classified;
    }

    this.reconnectExhausted = false;
    this.lastConnectedAt = this.clock();
    this.lastError = undefined;
    this.setState('CONNECTED');
    this.logger.info('Connected');
  }

  private async refreshSnapshot(): Promise<AccountSnapshot> {
    try {
      const state = await withDeadline(
        signal => this.session.getAccountSnapshot(signal),
        this.callTimeoutMs,
        () =>
          new TimeoutError(`${this.venueId} account snapshot exceeded ${this.callTimeoutMs}ms`, {
            venueId: this.venueId,
          })
      );
      this.snapshot = { ...state, venueId: this.venueId, capturedAt: this.clock() };
      return this.snapshot;
    } catch (error) {
      await this.observeFailure(error);
      throw error;
    }
  }

  private async call<T>(operation: string, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
    await this.ensureConnected();

    try {
      return await withDeadline(
        run,
        this.callTimeoutMs,
        () =>
          new TimeoutError(`${this.venueId} ${operation} exceeded ${this.callTimeoutMs}ms`, {
            venueId: this.venueId,
          })
      );
    } catch (error) {
      await this.observeFailure(error);
      throw error;
    }
  }

  /** From DEGRADED the tick doubles as the automatic health check. */
  private async refreshTick(): Promise<void> {
    if (this.state === 'DEGRADED') {
      await this.healthCheck();
      return;
    }
    if (this.state !== 'CONNECTED') {
      return;
    }
    try {
      await this.refreshSnapshot();
    } catch (error) {
      this.logger.warn({ error: this.describe(error) }, 'Scheduled snapshot refresh failed');
    }
  }

  /**
   * Connection-level failures move the state; order-level ones do not. A
   * critical condition halts the venue.
   */
  private async observeFailure(error: unknown): Promise<void> {
    if (!isTradingError(error)) {
      return;
    }
    this.lastError = error.message;
    if (error.errorClass === 'CRITICAL') {
      await this.halt(error.message);
    } else if (error.kind === 'AUTH_ERROR') {
      this.setState('DISCONNECTED');
    } else if (error.kind === 'NETWORK_ERROR' || error.kind === 'TIMEOUT') {
      if (this.state === 'CONNECTED') {
        this.setState('DEGRADED');
      }
    }
  }

  private classifyConnectError(error: unknown): TradingError {
    if (isTradingError(error)) {
      return error;
    }
    return new NetworkError(`${this.venueId} connect failed: ${this.describe(error)}`, {
      venueId: this.venueId,
      cause: error,
    });
  }

  private assertNotHalted(): void {
    if (this.haltReason !== null) {
      throw new CriticalVenueError(`${this.venueId} is halted: ${this.haltReason}`, {
        venueId: this.venueId,
      });
    }
  }

  private setState(next: ConnectionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.logger.debug({ previous, next }, 'Connection state changed');
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.error({ error: this.describe(error) }, 'State listener threw');
      }
    }
  }

  private async alert(
    kind: 'CONNECTION_DEGRADED' | 'VENUE_HALTED',
    payload: Record<string, unknown>
  ): Promise<void> {
    if (!this.notificationSink) {
      return;
    }
    try {
      await this.notificationSink.notify(kind, { venueId: this.venueId, ...payload });
    } catch (error) {
      this.logger.error({ kind, error: this.describe(error) }, 'Alert delivery failed');
    }
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
