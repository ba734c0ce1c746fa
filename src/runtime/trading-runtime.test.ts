import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TradingRuntime } from './trading-runtime.js';
import { parseEnvironment } from '../config/env.js';
import { InMemoryAuditSink } from '../execution/sinks/in-memory-audit.sink.js';
import { FakeVenueSession, MARKET_OPEN_TIME, mt5Credentials, testCatalog } from '../execution/tests/setup.js';
import type { RiskLimits } from '../execution/types/execution.types.js';
import type { SignalRecord, SignalStrategyConfig } from '../strategy/strategy.types.js';

const limits: RiskLimits = {
  maxPositionSize: 1,
  maxPositionSizeBySymbol: {},
  maxAggregateExposure: 5,
  maxConcurrentStrategies: 3,
  maxOpenOrders: 5,
  maxDailyLoss: 500,
  minRiskRewardRatio: 1.5,
  maxSnapshotAgeMs: 30_000,
};

const signalStrategy: SignalStrategyConfig = {
  type: 'SIGNAL',
  id: 'gold-signals',
  venueId: 'mt5',
  defaultQuantity: 0.05,
  maxSignalAgeMs: 60_000,
  entryKind: 'MARKET',
};

const goldSignal: SignalRecord = {
  signalId: 'sig-7',
  symbol: 'XAUUSD',
  action: 'BUY',
  entryPrice: 100,
  timestamp: MARKET_OPEN_TIME,
  source: 'test-channel',
};

describe('TradingRuntime', () => {
  let session: FakeVenueSession;
  let audit: InMemoryAuditSink;
  let runtime: TradingRuntime;

  beforeEach(() => {
    session = new FakeVenueSession('mt5');
    audit = new InMemoryAuditSink();
    runtime = new TradingRuntime({
      env: parseEnvironment({ NODE_ENV: 'test', LOG_LEVEL: 'silent' }),
      catalog: testCatalog(),
      limits,
      venues: [{ session, credentials: mt5Credentials }],
      auditSink: audit,
      signalSource: {
        async *signals() {
          yield goldSignal;
        },
      },
      strategies: [signalStrategy, { ...signalStrategy, id: 'okx-signals', venueId: 'okx' }],
      clock: () => MARKET_OPEN_TIME,
    });
  });

  it('should connect venues and start strategies for registered venues only', async () => {
    const summaries = await runtime.start();

    expect(runtime.isStarted).toBe(true);
    expect(session.connectCalls).toBe(1);
    expect(runtime.registry.get('mt5').manager.getState()).toBe('CONNECTED');
    expect(summaries.map(summary => summary.id)).toEqual(['gold-signals']);

    await runtime.stop();
  });

  it('should route strategy intents through the coordinator to the venue', async () => {
    await runtime.start();

    await vi.waitFor(() => {
      expect(audit.list()).toHaveLength(1);
    });
    const [record] = audit.list();
    expect(record?.eventType).toBe('ORDER_RESULT');
    expect(record?.intent).toMatchObject({ symbol: 'XAUUSD', side: 'BUY', quantity: 0.05 });
    expect(record?.result.status).toBe('FILLED');
    expect(session.placed).toHaveLength(1);

    await runtime.stop();
  });

  it('should stop strategies and disconnect venues on stop', async () => {
    await runtime.start();

    await runtime.stop();

    expect(runtime.isStarted).toBe(false);
    expect(runtime.engine.getStrategy('gold-signals')?.status).toBe('STOPPED');
    expect(session.disconnectCalls).toBe(1);
    expect(runtime.engine.activeCount()).toBe(0);
  });
});
