/**
 * Core types for the execution core
 */

import type { ErrorKind } from '../../errors/trading-errors.js';
import type { VenueId } from '../../venues/venue.types.js';

// Order Side Enum
export type OrderSide = 'BUY' | 'SELL';

// Order Kind Enum
export type OrderKind = 'MARKET' | 'LIMIT' | 'STOP';

export type OriginatorType = 'STRATEGY' | 'SIGNAL' | 'MANUAL';

// Order Result Status
export type OrderStatus =
  | 'ACCEPTED'
  | 'REJECTED'
  | 'FILLED'
  | 'PARTIALLY_FILLED'
  | 'ERROR'
  | 'AMBIGUOUS';

// Connection State owned by a venue's ConnectionManager
export type ConnectionState =
  | 'DISCONNECTED'
  | 'CONNECTING'
  | 'CONNECTED'
  | 'DEGRADED';

export interface Originator {
  type: OriginatorType;
  id: string;
}

/**
 * Core Data Models
 */

export interface OrderIntent {
  readonly idempotencyKey: string;
  readonly venueId: VenueId;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly kind: OrderKind;
  readonly quantity: number;
  /** Limit price for LIMIT, trigger price for STOP */
  readonly price?: number;
  readonly stopLoss?: number;
  readonly takeProfit?: number;
  /** Last market price the originator saw; entry reference for MARKET orders */
  readonly referencePrice?: number;
  readonly quantityUnit?: string;
  readonly currency?: string;
  readonly originator: Originator;
  readonly createdAt: Date;
}

export interface SideEffectFailure {
  effect: 'POSITION_TRACKER' | 'NOTIFICATION' | 'AUDIT';
  message: string;
}

export interface OrderResult {
  idempotencyKey: string;
  venueId: VenueId;
  status: OrderStatus;
  venueOrderId?: string;
  filledPrice?: number;
  filledQuantity?: number;
  errorKind?: ErrorKind;
  errorMessage?: string;
  rejectionReason?: RiskRejection;
  sideEffectFailures?: SideEffectFailure[];
  timestamp: Date;
}

export interface PositionState {
  /** Signed: positive long, negative short */
  quantity: number;
  averagePrice: number;
  unrealizedPnl: number;
}

/** Venue-reported account state before the manager stamps it. */
export interface AccountState {
  accountId: string;
  balance: number;
  equity: number;
  marginLevel: number | null;
  realizedPnlToday: number;
  positions: Readonly<Record<string, PositionState>>;
}

export interface AccountSnapshot extends AccountState {
  venueId: VenueId;
  capturedAt: Date;
}

/**
 * Risk Models
 */

export interface RiskLimits {
  /** Default absolute position cap per symbol */
  maxPositionSize: number;
  maxPositionSizeBySymbol: Readonly<Record<string, number>>;
  /** Cap on the sum of absolute positions within one venue account */
  maxAggregateExposure: number;
  maxConcurrentStrategies: number;
  maxOpenOrders: number;
  /** Positive amount; trading stops once the day's loss reaches it */
  maxDailyLoss: number;
  minRiskRewardRatio: number;
  maxSnapshotAgeMs: number;
}

export type RiskRejectionCode =
  | 'STALE_SNAPSHOT'
  | 'SYMBOL_NOT_TRADABLE'
  | 'MARKET_CLOSED'
  | 'POSITION_LIMIT_EXCEEDED'
  | 'AGGREGATE_EXPOSURE_EXCEEDED'
  | 'INVALID_STOP_LEVELS'
  | 'MISSING_REFERENCE_PRICE'
  | 'RISK_REWARD_TOO_LOW'
  | 'DAILY_LOSS_LIMIT_REACHED'
  | 'STRATEGY_LIMIT_EXCEEDED'
  | 'OPEN_ORDER_LIMIT_EXCEEDED';

export interface RiskRejection {
  code: RiskRejectionCode;
  description: string;
  current?: number;
  limit?: number;
}

export type RiskDecision =
  | { approved: true }
  | { approved: false; reason: RiskRejection };

export interface RiskContext {
  now?: Date;
  allowStaleSnapshot?: boolean;
  activeStrategyCount?: number;
  openOrderCount?: number;
}
