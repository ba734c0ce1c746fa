import type { OrderIntent, OrderKind, OrderResult, OrderSide } from '../execution/types/execution.types.js';
import type { VenueId } from '../venues/venue.types.js';

export type StrategyType = 'GRID' | 'MARTINGALE' | 'SIGNAL' | 'TREND';

export type StrategyRunStatus = 'RUNNING' | 'STOPPED' | 'HALTED' | 'FAILED';

// Strategy configuration: immutable input per instance
interface StrategyConfigBase {
  id: string;
  venueId: VenueId;
}

export interface GridStrategyConfig extends StrategyConfigBase {
  type: 'GRID';
  symbol: string;
  referencePrice: number;
  spacing: number;
  /** Levels on each side of the reference price */
  levels: number;
  quantity: number;
}

export interface MartingaleStrategyConfig extends StrategyConfigBase {
  type: 'MARTINGALE';
  symbol: string;
  side: OrderSide;
  baseQuantity: number;
  scaleFactor: number;
  maxLevel: number;
  /** Cumulative loss in quote currency that halts the instance */
  emergencyStopLoss: number;
  stopLossDistance: number;
  takeProfitDistance: number;
}

export interface SignalStrategyConfig extends StrategyConfigBase {
  type: 'SIGNAL';
  defaultQuantity: number;
  maxSignalAgeMs: number;
  /** LIMIT enters at the signal's entry price, MARKET references it */
  entryKind: Extract<OrderKind, 'MARKET' | 'LIMIT'>;
}

export interface TrendStrategyConfig extends StrategyConfigBase {
  type: 'TREND';
  symbol: string;
  fastPeriod: number;
  slowPeriod: number;
  quantity: number;
  trailingDistance: number;
}

export type StrategyConfig =
  | GridStrategyConfig
  | MartingaleStrategyConfig
  | SignalStrategyConfig
  | TrendStrategyConfig;

// Inputs
export interface MarketTick {
  venueId: VenueId;
  symbol: string;
  price: number;
  timestamp: Date;
}

export type SignalAction = 'BUY' | 'SELL';

export interface SignalRecord {
  signalId: string;
  symbol: string;
  action: SignalAction;
  entryPrice?: number;
  stopLoss?: number;
  takeProfit?: number;
  quantity?: number;
  venueId?: VenueId;
  timestamp: Date;
  source: string;
}

export type StrategyEvent =
  | { type: 'TICK'; tick: MarketTick }
  | { type: 'SIGNAL'; signal: SignalRecord }
  | { type: 'EXECUTION'; intent: OrderIntent; result: OrderResult };

/**
 * Common capability of every strategy. Run state is private to the
 * instance; the engine only sees intents and summaries.
 */
export interface TradingStrategy {
  readonly id: string;
  readonly type: StrategyType;
  readonly config: StrategyConfig;
  /** Intents to place when the instance starts */
  onStart(now: Date): OrderIntent[];
  onEvent(event: Exclude<StrategyEvent, { type: 'EXECUTION' }>, now: Date): OrderIntent[];
  /** Follow-up intents caused by an order outcome */
  onResult(intent: OrderIntent, result: OrderResult, now: Date): OrderIntent[];
  /** Set once the strategy has stopped itself */
  readonly haltReason: string | null;
  describeState(): Record<string, unknown>;
}

export interface StrategyRunSummary {
  id: string;
  type: StrategyType;
  venueId: VenueId;
  status: StrategyRunStatus;
  startedAt: Date;
  stoppedAt?: Date;
  intentsSubmitted: number;
  resultsReceived: number;
  haltReason?: string;
  lastError?: string;
  state: Record<string, unknown>;
}

// Collaborators
export interface OrderIntake {
  submit(intent: OrderIntent): Promise<OrderResult>;
}

export interface MarketFeed {
  ticks(venueId: VenueId, symbol: string, signal: AbortSignal): AsyncIterable<MarketTick>;
}

/** Lazy, restartable: each call starts a fresh sequence. */
export interface SignalSource {
  signals(signal: AbortSignal): AsyncIterable<SignalRecord>;
}
