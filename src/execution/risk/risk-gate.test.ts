import { describe, it, expect, beforeEach } from 'vitest';
import fc from 'fast-check';
import { RiskGate } from './risk-gate.js';
import { RiskLimitsError } from '../../config/risk-limits.js';
import type { AccountSnapshot, PositionState, RiskLimits } from '../types/execution.types.js';
import { buildIntent, MARKET_CLOSED_TIME, MARKET_OPEN_TIME, testCatalog } from '../tests/setup.js';

const limits: RiskLimits = {
  maxPositionSize: 1,
  maxPositionSizeBySymbol: { EURUSD: 5 },
  maxAggregateExposure: 5,
  maxConcurrentStrategies: 3,
  maxOpenOrders: 5,
  maxDailyLoss: 500,
  minRiskRewardRatio: 1.5,
  maxSnapshotAgeMs: 30_000,
};

function snapshot(
  positions: Record<string, Partial<PositionState>> = {},
  overrides: Partial<AccountSnapshot> = {}
): AccountSnapshot {
  const full: Record<string, PositionState> = {};
  for (const [symbol, position] of Object.entries(positions)) {
    full[symbol] = { quantity: 0, averagePrice: 100, unrealizedPnl: 0, ...position };
  }
  return {
    venueId: 'mt5',
    accountId: 'acc-1',
    balance: 10_000,
    equity: 10_000,
    marginLevel: null,
    realizedPnlToday: 0,
    positions: full,
    capturedAt: MARKET_OPEN_TIME,
    ...overrides,
  };
}

describe('RiskGate', () => {
  let gate: RiskGate;

  beforeEach(() => {
    gate = new RiskGate({ catalog: testCatalog(), limits, clock: () => MARKET_OPEN_TIME });
  });

  it('should approve an order within every limit', () => {
    expect(gate.validate(buildIntent(), snapshot())).toEqual({ approved: true });
  });

  describe('Position Limits', () => {
    it('should reject a buy that takes the position past the maximum', () => {
      const decision = gate.validate(
        buildIntent({ quantity: 0.5 }),
        snapshot({ XAUUSD: { quantity: 0.8 } })
      );

      expect(decision).toMatchObject({
        approved: false,
        reason: { code: 'POSITION_LIMIT_EXCEEDED', limit: 1 },
      });
    });

    it('should approve a position landing exactly on the maximum', () => {
      const decision = gate.validate(
        buildIntent({ quantity: 0.2 }),
        snapshot({ XAUUSD: { quantity: 0.8 } })
      );

      expect(decision.approved).toBe(true);
    });

    it('should always allow orders that reduce the position', () => {
      const decision = gate.validate(
        buildIntent({ side: 'SELL', quantity: 0.5 }),
        snapshot({ XAUUSD: { quantity: 1.5 } })
      );

      expect(decision.approved).toBe(true);
    });

    it('should use per-symbol overrides', () => {
      const decision = gate.validate(
        buildIntent({ symbol: 'EURUSD', quantity: 3 }),
        snapshot()
      );

      expect(decision.approved).toBe(true);
    });

    it('should reject orders that push aggregate exposure past the maximum', () => {
      const decision = gate.validate(
        buildIntent({ quantity: 0.6 }),
        snapshot({ EURUSD: { quantity: -4.5 } })
      );

      expect(decision).toMatchObject({
        approved: false,
        reason: { code: 'AGGREGATE_EXPOSURE_EXCEEDED', limit: 5 },
      });
    });

    it('should decide exactly at the per-symbol boundary', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 100 }), fc.integer({ min: 1, max: 100 }), (held, ordered) => {
          const decision = gate.validate(
            buildIntent({ quantity: ordered / 100 }),
            snapshot({ XAUUSD: { quantity: held / 100 } })
          );
          return decision.approved === held + ordered <= 100;
        }),
        { numRuns: 200 }
      );
    });
  });

  describe('Stop Levels', () => {
    it('should reject a risk/reward ratio below the minimum', () => {
      const decision = gate.validate(
        buildIntent({ referencePrice: 100, stopLoss: 95, takeProfit: 102 }),
        snapshot()
      );

      expect(decision).toMatchObject({
        approved: false,
        reason: { code: 'RISK_REWARD_TOO_LOW', limit: 1.5 },
      });
      expect(!decision.approved && decision.reason.current).toBeCloseTo(0.4, 9);
    });

    it('should approve a sufficient risk/reward ratio', () => {
      const decision = gate.validate(
        buildIntent({ referencePrice: 100, stopLoss: 95, takeProfit: 110 }),
        snapshot()
      );

      expect(decision.approved).toBe(true);
    });

    it('should use the limit price as entry for limit orders', () => {
      const decision = gate.validate(
        buildIntent({ kind: 'LIMIT', side: 'SELL', price: 100, referencePrice: 90, stopLoss: 104, takeProfit: 92 }),
        snapshot()
      );

      expect(decision.approved).toBe(true);
    });

    it('should reject levels on the wrong side of entry', () => {
      const decision = gate.validate(
        buildIntent({ referencePrice: 100, stopLoss: 101 }),
        snapshot()
      );

      expect(decision).toMatchObject({ approved: false, reason: { code: 'INVALID_STOP_LEVELS' } });
    });

    it('should reject protective levels without an entry reference', () => {
      const decision = gate.validate(
        buildIntent({ referencePrice: undefined, stopLoss: 95 }),
        snapshot()
      );

      expect(decision).toMatchObject({ approved: false, reason: { code: 'MISSING_REFERENCE_PRICE' } });
    });
  });

  describe('Market State', () => {
    it('should reject stale snapshots unless explicitly allowed', () => {
      const old = snapshot({}, { capturedAt: new Date(MARKET_OPEN_TIME.getTime() - 31_000) });

      expect(gate.validate(buildIntent(), old)).toMatchObject({
        approved: false,
        reason: { code: 'STALE_SNAPSHOT', current: 31_000, limit: 30_000 },
      });
      expect(gate.validate(buildIntent(), old, undefined, { allowStaleSnapshot: true }).approved).toBe(true);
    });

    it('should reject orders while the market is closed', () => {
      const decision = gate.validate(
        buildIntent(),
        snapshot({}, { capturedAt: MARKET_CLOSED_TIME }),
        undefined,
        { now: MARKET_CLOSED_TIME }
      );

      expect(decision).toMatchObject({ approved: false, reason: { code: 'MARKET_CLOSED' } });
    });

    it('should reject symbols that are not tradable or unknown', () => {
      expect(
        gate.validate(buildIntent({ venueId: 'okx', symbol: 'DELISTED-USDT', quantity: 1 }), snapshot())
      ).toMatchObject({ approved: false, reason: { code: 'SYMBOL_NOT_TRADABLE' } });
      expect(gate.validate(buildIntent({ symbol: 'GBPJPY' }), snapshot())).toMatchObject({
        approved: false,
        reason: { code: 'SYMBOL_NOT_TRADABLE' },
      });
    });

    it('should check snapshot freshness before anything else', () => {
      const decision = gate.validate(
        buildIntent({ quantity: 5 }),
        snapshot({}, { capturedAt: new Date(0) })
      );

      expect(decision).toMatchObject({ approved: false, reason: { code: 'STALE_SNAPSHOT' } });
    });
  });

  describe('Account Limits', () => {
    it('should stop trading once the daily loss limit is reached', () => {
      const decision = gate.validate(
        buildIntent(),
        snapshot({ EURUSD: { quantity: 1, unrealizedPnl: -100 } }, { realizedPnlToday: -400 })
      );

      expect(decision).toMatchObject({
        approved: false,
        reason: { code: 'DAILY_LOSS_LIMIT_REACHED', current: 500, limit: 500 },
      });
    });

    it('should enforce strategy and open order counts', () => {
      expect(gate.validate(buildIntent(), snapshot(), undefined, { activeStrategyCount: 4 })).toMatchObject({
        approved: false,
        reason: { code: 'STRATEGY_LIMIT_EXCEEDED' },
      });
      expect(gate.validate(buildIntent(), snapshot(), undefined, { openOrderCount: 5 })).toMatchObject({
        approved: false,
        reason: { code: 'OPEN_ORDER_LIMIT_EXCEEDED' },
      });
    });
  });

  describe('Limits Lifecycle', () => {
    it('should never mutate the snapshot', () => {
      const frozen = Object.freeze(snapshot({ XAUUSD: { quantity: 0.8 } }));

      expect(() => gate.validate(buildIntent({ quantity: 0.5 }), frozen)).not.toThrow();
      expect(frozen.positions['XAUUSD']?.quantity).toBe(0.8);
    });

    it('should apply reloaded limits to later validations', () => {
      gate.reloadLimits({ ...limits, maxPositionSize: 0.05 });

      expect(gate.validate(buildIntent({ quantity: 0.1 }), snapshot())).toMatchObject({
        approved: false,
        reason: { code: 'POSITION_LIMIT_EXCEEDED', limit: 0.05 },
      });
    });

    it('should refuse invalid limits', () => {
      expect(() => gate.reloadLimits({ ...limits, maxDailyLoss: -1 })).toThrow(RiskLimitsError);
      expect(gate.getLimits().maxDailyLoss).toBe(500);
    });
  });
});
