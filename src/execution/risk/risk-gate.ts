/**
 * Risk Gate - Pre-trade checks every order intent must pass before dispatch
 */

import type pino from 'pino';
import { getComponentLogger } from '../../config/logger.js';
import { getInstrumentSpec, isMarketOpen, type InstrumentCatalog } from '../../config/instruments.js';
import { RiskLimitsError, validateRiskLimits } from '../../config/risk-limits.js';
import { entryPriceOf, signedQuantity } from '../order-intent.js';
import type {
  AccountSnapshot,
  OrderIntent,
  RiskContext,
  RiskDecision,
  RiskLimits,
  RiskRejection,
} from '../types/execution.types.js';

// Tolerance for limit comparisons on floating point quantities and prices
const EPSILON = 1e-9;

export interface RiskGateOptions {
  catalog: InstrumentCatalog;
  limits: RiskLimits;
  clock?: () => Date;
}

/**
 * Stateless apart from its limits: validate() reads the snapshot and never
 * mutates it. Checks run in a fixed order and stop at the first failure.
 */
export class RiskGate {
  private limits: Readonly<RiskLimits>;
  private readonly catalog: InstrumentCatalog;
  private readonly clock: () => Date;
  private readonly logger: pino.Logger;

  constructor(options: RiskGateOptions) {
    this.catalog = options.catalog;
    this.clock = options.clock ?? (() => new Date());
    this.logger = getComponentLogger('risk-gate');
    this.limits = this.freeze(options.limits);
  }

  getLimits(): Readonly<RiskLimits> {
    return this.limits;
  }

  /** Explicit replacement; limits never change behind a caller's back. */
  reloadLimits(limits: RiskLimits): void {
    this.limits = this.freeze(limits);
    this.logger.info({ limits: this.limits }, 'Risk limits reloaded');
  }

  validate(
    intent: OrderIntent,
    snapshot: AccountSnapshot,
    limits: Readonly<RiskLimits> = this.limits,
    context: RiskContext = {}
  ): RiskDecision {
    const now = context.now ?? this.clock();
    const checks: Array<() => RiskRejection | null> = [
      () => this.checkSnapshotAge(snapshot, limits, now, context.allowStaleSnapshot === true),
      () => this.checkTradable(intent, now),
      () => this.checkPositionLimits(intent, snapshot, limits),
      () => this.checkStopLevels(intent, limits),
      () => this.checkDailyLoss(snapshot, limits),
      () => this.checkConcurrency(limits, context),
    ];

    for (const check of checks) {
      const rejection = check();
      if (rejection) {
        this.logger.info(
          { idempotencyKey: intent.idempotencyKey, venueId: intent.venueId, symbol: intent.symbol, reason: rejection },
          'Order intent rejected by risk gate'
        );
        return { approved: false, reason: rejection };
      }
    }

    return { approved: true };
  }

  private checkSnapshotAge(
    snapshot: AccountSnapshot,
    limits: Readonly<RiskLimits>,
    now: Date,
    allowStale: boolean
  ): RiskRejection | null {
    const ageMs = now.getTime() - snapshot.capturedAt.getTime();
    if (allowStale || ageMs <= limits.maxSnapshotAgeMs) {
      return null;
    }
    return {
      code: 'STALE_SNAPSHOT',
      current: ageMs,
      limit: limits.maxSnapshotAgeMs,
      description: `Account snapshot is ${ageMs}ms old, maximum is ${limits.maxSnapshotAgeMs}ms`,
    };
  }

  private checkTradable(intent: OrderIntent, now: Date): RiskRejection | null {
    const spec = getInstrumentSpec(this.catalog, intent.venueId, intent.symbol);
    if (!spec || !spec.tradable) {
      return {
        code: 'SYMBOL_NOT_TRADABLE',
        description: `${intent.symbol} is not tradable on ${intent.venueId}`,
      };
    }
    if (!isMarketOpen(spec, now)) {
      return {
        code: 'MARKET_CLOSED',
        description: `${intent.symbol} market is closed at ${now.toISOString()}`,
      };
    }
    return null;
  }

  /**
   * Orders that do not increase the absolute position are always allowed,
   * so an over-limit book can still be reduced.
   */
  private checkPositionLimits(
    intent: OrderIntent,
    snapshot: AccountSnapshot,
    limits: Readonly<RiskLimits>
  ): RiskRejection | null {
    const current = snapshot.positions[intent.symbol]?.quantity ?? 0;
    const resulting = current + signedQuantity(intent.side, intent.quantity);
    if (Math.abs(resulting) <= Math.abs(current) + EPSILON) {
      return null;
    }

    const symbolLimit = limits.maxPositionSizeBySymbol[intent.symbol] ?? limits.maxPositionSize;
    if (Math.abs(resulting) > symbolLimit + EPSILON) {
      return {
        code: 'POSITION_LIMIT_EXCEEDED',
        current: Math.abs(resulting),
        limit: symbolLimit,
        description: `Resulting ${intent.symbol} position ${Math.abs(resulting)} exceeds maximum ${symbolLimit}`,
      };
    }

    let aggregate = Math.abs(resulting);
    for (const [symbol, position] of Object.entries(snapshot.positions)) {
      if (symbol !== intent.symbol) {
        aggregate += Math.abs(position.quantity);
      }
    }
    if (aggregate > limits.maxAggregateExposure + EPSILON) {
      return {
        code: 'AGGREGATE_EXPOSURE_EXCEEDED',
        current: aggregate,
        limit: limits.maxAggregateExposure,
        description: `Aggregate exposure ${aggregate} exceeds maximum ${limits.maxAggregateExposure}`,
      };
    }
    return null;
  }

  private checkStopLevels(intent: OrderIntent, limits: Readonly<RiskLimits>): RiskRejection | null {
    const { stopLoss, takeProfit } = intent;
    if (stopLoss === undefined && takeProfit === undefined) {
      return null;
    }

    const entry = entryPriceOf(intent);
    if (entry === undefined) {
      return {
        code: 'MISSING_REFERENCE_PRICE',
        description: 'Stop-loss or take-profit given without a limit or reference price',
      };
    }

    const isBuy = intent.side === 'BUY';
    const stopOnWrongSide = stopLoss !== undefined && (isBuy ? stopLoss >= entry : stopLoss <= entry);
    const targetOnWrongSide = takeProfit !== undefined && (isBuy ? takeProfit <= entry : takeProfit >= entry);
    if (stopOnWrongSide || targetOnWrongSide) {
      return {
        code: 'INVALID_STOP_LEVELS',
        description: `${intent.side} at ${entry} needs stop-loss ${isBuy ? 'below' : 'above'} and take-profit ${isBuy ? 'above' : 'below'} entry`,
      };
    }

    if (stopLoss === undefined || takeProfit === undefined) {
      return null;
    }

    const ratio = Math.abs(takeProfit - entry) / Math.abs(entry - stopLoss);
    if (ratio + EPSILON < limits.minRiskRewardRatio) {
      return {
        code: 'RISK_REWARD_TOO_LOW',
        current: ratio,
        limit: limits.minRiskRewardRatio,
        description: `Risk/reward ${ratio.toFixed(2)} is below minimum ${limits.minRiskRewardRatio}`,
      };
    }
    return null;
  }

  private checkDailyLoss(snapshot: AccountSnapshot, limits: Readonly<RiskLimits>): RiskRejection | null {
    let unrealized = 0;
    for (const position of Object.values(snapshot.positions)) {
      unrealized += position.unrealizedPnl;
    }
    const loss = -(snapshot.realizedPnlToday + unrealized);

    if (loss + EPSILON >= limits.maxDailyLoss) {
      return {
        code: 'DAILY_LOSS_LIMIT_REACHED',
        current: loss,
        limit: limits.maxDailyLoss,
        description: `Daily loss ${loss.toFixed(2)} reached limit ${limits.maxDailyLoss}`,
      };
    }
    return null;
  }

  private checkConcurrency(limits: Readonly<RiskLimits>, context: RiskContext): RiskRejection | null {
    const strategies = context.activeStrategyCount ?? 0;
    if (strategies > limits.maxConcurrentStrategies) {
      return {
        code: 'STRATEGY_LIMIT_EXCEEDED',
        current: strategies,
        limit: limits.maxConcurrentStrategies,
        description: `${strategies} active strategies exceed maximum ${limits.maxConcurrentStrategies}`,
      };
    }

    const openOrders = context.openOrderCount ?? 0;
    if (openOrders >= limits.maxOpenOrders) {
      return {
        code: 'OPEN_ORDER_LIMIT_EXCEEDED',
        current: openOrders,
        limit: limits.maxOpenOrders,
        description: `${openOrders} orders in flight, maximum is ${limits.maxOpenOrders}`,
      };
    }
    return null;
  }

  private freeze(limits: RiskLimits): Readonly<RiskLimits> {
    const errors = validateRiskLimits(limits);
    if (errors.length > 0) {
      throw new RiskLimitsError(errors);
    }
    return Object.freeze({
      ...limits,
      maxPositionSizeBySymbol: Object.freeze({ ...limits.maxPositionSizeBySymbol }),
    });
  }
}
