import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { Mt5Session } from './mt5.session.js';
import type { FetchLike } from '../venue-http.client.js';
import { ConnectionManager } from '../../execution/connection/connection-manager.js';
import { VenueRegistry } from '../../execution/connection/venue-registry.js';
import { RetryPolicy } from '../../execution/retry/retry-policy.js';
import { RiskGate } from '../../execution/risk/risk-gate.js';
import { ExecutionCoordinator } from '../../execution/services/execution-coordinator.service.js';
import { Mt5OrderTranslator } from '../../execution/translation/mt5.translator.js';
import type { RiskLimits } from '../../execution/types/execution.types.js';
import { buildIntent, MARKET_OPEN_TIME, mt5Credentials, testCatalog } from '../../execution/tests/setup.js';

interface Reply {
  status?: number;
  body: unknown;
}

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

const account = {
  login: 1001,
  balance: 10_000,
  equity: 10_050,
  margin_level: 850,
  realized_pnl_today: 12,
};

describe('Mt5Session', () => {
  let routes: Record<string, Reply>;
  let fetchImpl: Mock<FetchLike>;
  let session: Mt5Session;

  function callsTo(route: string): number {
    return fetchImpl.mock.calls.filter(([input, init]) => `${init.method} ${new URL(input).pathname}` === route)
      .length;
  }

  beforeEach(() => {
    routes = {
      'POST /session': { body: { connected: true, login: 1001 } },
      'POST /session/close': { body: { closed: true } },
      'GET /account': { body: account },
      'GET /positions': { body: [] },
    };
    fetchImpl = vi.fn(async (input: string, init: RequestInit) => {
      const route = `${init.method} ${new URL(input).pathname}`;
      const reply = routes[route];
      if (!reply) {
        throw new Error(`unexpected request ${route}`);
      }
      return new Response(JSON.stringify(reply.body), { status: reply.status ?? 200 });
    });
    session = new Mt5Session({ bridgeUrl: 'http://bridge.test', fetchImpl });
  });

  describe('connect', () => {
    it('should attach with the bearer token and account header', async () => {
      await session.connect(mt5Credentials);

      expect(fetchImpl).toHaveBeenCalledWith(
        'http://bridge.test/session',
        expect.objectContaining({
          method: 'POST',
          headers: expect.objectContaining({ Authorization: 'Bearer test-token', 'X-MT5-Account': '1001' }),
        })
      );
    });

    it('should refuse a bridge logged into another account', async () => {
      routes['POST /session'] = { body: { connected: true, login: 2002 } };

      await expect(session.connect(mt5Credentials)).rejects.toMatchObject({
        kind: 'CRITICAL',
        message: 'MT5 bridge reports account 2002, session is bound to 1001',
      });
    });
  });

  describe('placeOrder', () => {
    it('should treat an answer without retcode as ambiguous', async () => {
      await session.connect(mt5Credentials);
      routes['POST /order'] = { body: { status: 'ok' } };

      await expect(
        session.placeOrder({
          venue: 'mt5',
          body: {
            action: 'DEAL',
            symbol: 'XAUUSD',
            type: 'BUY',
            volume: 0.1,
            deviation: 20,
            comment: 'k1',
            clientOrderId: 'k1',
          },
        })
      ).rejects.toMatchObject({ kind: 'AMBIGUOUS' });
    });
  });

  describe('getAccountSnapshot', () => {
    it('should weight the average price of several positions in one symbol', async () => {
      await session.connect(mt5Credentials);
      routes['GET /positions'] = {
        body: [
          { symbol: 'XAUUSD', type: 'BUY', volume: 0.1, price_open: 2000, profit: 5 },
          { symbol: 'XAUUSD', type: 'BUY', volume: 0.3, price_open: 2100, profit: -1 },
          { symbol: 'EURUSD', type: 'SELL', volume: 1, price_open: 1.1, profit: 2 },
        ],
      };

      const snapshot = await session.getAccountSnapshot();

      expect(snapshot).toMatchObject({
        accountId: '1001',
        balance: 10_000,
        equity: 10_050,
        marginLevel: 850,
        realizedPnlToday: 12,
      });
      expect(snapshot.positions['XAUUSD']?.quantity).toBeCloseTo(0.4, 9);
      expect(snapshot.positions['XAUUSD']?.averagePrice).toBeCloseTo(2075, 6);
      expect(snapshot.positions['XAUUSD']?.unrealizedPnl).toBe(4);
      expect(snapshot.positions['EURUSD']).toEqual({ quantity: -1, averagePrice: 1.1, unrealizedPnl: 2 });
    });

    it('should raise a critical error when the bridge reports another login', async () => {
      await session.connect(mt5Credentials);
      routes['GET /account'] = { body: { ...account, login: 2002 } };

      await expect(session.getAccountSnapshot()).rejects.toMatchObject({ kind: 'CRITICAL' });
    });
  });

  describe('order management', () => {
    beforeEach(async () => {
      await session.connect(mt5Credentials);
    });

    it('should cancel by ticket', async () => {
      routes['POST /order/cancel'] = { body: { retcode: 10009, comment: 'done', order: 5001 } };

      const ref = await session.cancelOrder({ symbol: 'XAUUSD', venueOrderId: '5001' });

      expect(ref).toEqual({ symbol: 'XAUUSD', venueOrderId: '5001', clientOrderId: undefined });
      const [, init] = fetchImpl.mock.lastCall ?? [];
      expect(init?.body).toBe('{"symbol":"XAUUSD","ticket":5001}');
    });

    it('should raise the retcode kind when a cancel is refused', async () => {
      routes['POST /order/cancel'] = { body: { retcode: 10013, comment: 'Invalid request' } };

      await expect(session.cancelOrder({ symbol: 'XAUUSD', venueOrderId: '5001' })).rejects.toMatchObject({
        kind: 'INVALID_ORDER',
        venueCode: '10013',
        message: 'MT5 cancel failed: 10013 Invalid request',
      });
    });

    it('should require a ticket or a client order id', async () => {
      await expect(session.cancelOrder({ symbol: 'XAUUSD' })).rejects.toMatchObject({ kind: 'INVALID_ORDER' });
    });

    it('should look an order up by client order id', async () => {
      routes['GET /orders/lookup'] = {
        body: {
          order: {
            ticket: 5001,
            symbol: 'XAUUSD',
            type: 'SELL_LIMIT',
            state: 'PARTIAL',
            volume_initial: 0.3,
            volume_current: 0.1,
            price_open: 2100,
            client_order_id: 'key-1',
          },
        },
      };

      const order = await session.getOrder({ symbol: 'XAUUSD', clientOrderId: 'key-1' });

      expect(order).toEqual({
        symbol: 'XAUUSD',
        venueOrderId: '5001',
        clientOrderId: 'key-1',
        side: 'SELL',
        status: 'PARTIALLY_FILLED',
        quantity: 0.3,
        filledQuantity: 0.2,
        averagePrice: 2100,
      });
      expect(fetchImpl.mock.lastCall?.[0]).toBe('http://bridge.test/orders/lookup?symbol=XAUUSD&clientOrderId=key-1');
    });

    it('should return null for an order the bridge does not know', async () => {
      routes['GET /orders/lookup'] = { body: { order: null } };

      await expect(session.getOrder({ symbol: 'XAUUSD', clientOrderId: 'key-9' })).resolves.toBeNull();
    });

    it('should list open orders for a symbol', async () => {
      routes['GET /orders'] = {
        body: [
          {
            ticket: 5002,
            symbol: 'XAUUSD',
            type: 'BUY_LIMIT',
            state: 'PLACED',
            volume_initial: 0.1,
            volume_current: 0.1,
            price_open: 1990,
          },
        ],
      };

      const orders = await session.listOpenOrders('XAUUSD');

      expect(orders).toEqual([
        {
          symbol: 'XAUUSD',
          venueOrderId: '5002',
          clientOrderId: undefined,
          side: 'BUY',
          status: 'OPEN',
          quantity: 0.1,
          filledQuantity: 0,
          averagePrice: null,
        },
      ]);
      expect(fetchImpl.mock.lastCall?.[0]).toBe('http://bridge.test/orders?symbol=XAUUSD');
    });

    it('should close a position', async () => {
      routes['POST /position/close'] = { body: { retcode: 10009, comment: 'done' } };

      await expect(session.closePosition({ symbol: 'XAUUSD' })).resolves.toEqual({
        symbol: 'XAUUSD',
        closed: true,
        message: 'Position closed',
      });
    });

    it('should report that there was no position to close', async () => {
      routes['POST /position/close'] = { body: { retcode: 10036, comment: 'Position already closed' } };

      await expect(session.closePosition({ symbol: 'XAUUSD' })).resolves.toEqual({
        symbol: 'XAUUSD',
        closed: false,
        message: 'Position already closed',
      });
    });

    it('should treat a close answer without retcode as ambiguous', async () => {
      routes['POST /position/close'] = { body: {} };

      await expect(session.closePosition({ symbol: 'XAUUSD' })).rejects.toMatchObject({ kind: 'AMBIGUOUS' });
    });
  });

  describe('through the execution coordinator', () => {
    let manager: ConnectionManager;
    let coordinator: ExecutionCoordinator;

    beforeEach(() => {
      const clock = () => MARKET_OPEN_TIME;
      const noSleep = async () => {};
      manager = new ConnectionManager({
        session,
        credentials: mt5Credentials,
        reconnectPolicy: RetryPolicy.reconnect({ sleep: noSleep }),
        clock,
      });
      const registry = new VenueRegistry();
      registry.register(manager, new Mt5OrderTranslator(testCatalog()));
      coordinator = new ExecutionCoordinator({
        registry,
        riskGate: new RiskGate({ catalog: testCatalog(), limits, clock }),
        dispatchPolicy: RetryPolicy.dispatch({ sleep: noSleep, jitterFactor: 0 }),
        clock,
      });
    });

    it('should send a malformed acknowledgement once and report it ambiguous', async () => {
      routes['POST /order'] = { body: { status: 'ok' } };

      const result = await coordinator.submit(buildIntent({ idempotencyKey: 'bridge-1' }));

      expect(result).toMatchObject({ status: 'AMBIGUOUS', errorKind: 'AMBIGUOUS' });
      expect(callsTo('POST /order')).toBe(1);
      expect(coordinator.listAmbiguous().map(entry => entry.intent.idempotencyKey)).toEqual(['bridge-1']);
    });

    it('should halt the venue when the bridge switches accounts', async () => {
      routes['GET /account'] = { body: { ...account, login: 2002 } };
      routes['POST /order'] = { body: { retcode: 10009, comment: 'done', volume: 0.1, price: 100 } };

      const result = await coordinator.submit(buildIntent({ idempotencyKey: 'bridge-2' }));

      expect(result).toMatchObject({ status: 'ERROR', errorKind: 'CRITICAL' });
      expect(manager.isHalted()).toBe(true);
      expect(callsTo('POST /order')).toBe(0);
    });
  });
});
