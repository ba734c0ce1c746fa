import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createApp } from '../app.js';
import { parseEnvironment } from '../config/env.js';
import { AmbiguousOrderError } from '../errors/trading-errors.js';
import { InMemoryAuditSink } from '../execution/sinks/in-memory-audit.sink.js';
import {
  buildIntent,
  FakeVenueSession,
  MARKET_OPEN_TIME,
  mt5Credentials,
  testCatalog,
} from '../execution/tests/setup.js';
import { TradingRuntime } from '../runtime/trading-runtime.js';

const env = parseEnvironment({ NODE_ENV: 'test', LOG_LEVEL: 'silent' });

describe('HTTP routes', () => {
  let runtime: TradingRuntime;
  let session: FakeVenueSession;
  let app: FastifyInstance;

  beforeEach(async () => {
    session = new FakeVenueSession('mt5');
    runtime = new TradingRuntime({
      env,
      catalog: testCatalog(),
      limits: {
        maxPositionSize: 1,
        maxPositionSizeBySymbol: {},
        maxAggregateExposure: 5,
        maxConcurrentStrategies: 3,
        maxOpenOrders: 5,
        maxDailyLoss: 500,
        minRiskRewardRatio: 1.5,
        maxSnapshotAgeMs: 30_000,
      },
      venues: [{ session, credentials: mt5Credentials }],
      auditSink: new InMemoryAuditSink(),
      clock: () => MARKET_OPEN_TIME,
    });
    await runtime.start();
    app = await createApp(runtime, { env });
  });

  afterEach(async () => {
    await app.close();
    await runtime.stop();
  });

  describe('health', () => {
    it('should report connected venues', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'ok',
        environment: 'test',
        venues: 1,
        openOrders: 0,
        activeStrategies: 0,
      });
    });

    it('should return per-venue connection status', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/venues/mt5' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ venueId: 'mt5', state: 'CONNECTED', halted: false });
    });

    it('should return 404 for an unknown venue', async () => {
      const response = await app.inject({ method: 'GET', url: '/health/venues/binance' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('No venue registered for id: binance');
    });
  });

  describe('strategies', () => {
    it('should list running strategies and return one by id', async () => {
      runtime.engine.start({
        id: 'gold-signals',
        type: 'SIGNAL',
        venueId: 'mt5',
        defaultQuantity: 0.05,
        maxSignalAgeMs: 60_000,
        entryKind: 'MARKET',
      });

      const listed = await app.inject({ method: 'GET', url: '/strategies' });
      expect(listed.statusCode).toBe(200);
      expect(listed.json().strategies).toHaveLength(1);

      const fetched = await app.inject({ method: 'GET', url: '/strategies/gold-signals' });
      expect(fetched.statusCode).toBe(200);
      expect(fetched.json()).toMatchObject({ id: 'gold-signals', type: 'SIGNAL', venueId: 'mt5', status: 'RUNNING' });
    });

    it('should return 404 for an unknown strategy', async () => {
      const response = await app.inject({ method: 'GET', url: '/strategies/missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('Unknown strategy missing');
    });
  });

  describe('operator', () => {
    async function leaveAmbiguous(key: string): Promise<void> {
      session.placeHandler = async () => {
        throw new AmbiguousOrderError('response lost');
      };
      await runtime.coordinator.submit(buildIntent({ idempotencyKey: key }));
    }

    it('should refuse to reconnect a halted venue and recover after a reset', async () => {
      await runtime.registry.get('mt5').manager.halt('account swapped');

      const refused = await app.inject({ method: 'POST', url: '/operator/venues/mt5/reconnect' });
      expect(refused.statusCode).toBe(409);
      expect(refused.json().error).toMatchObject({ kind: 'CRITICAL', message: 'mt5 is halted: account swapped' });

      const reset = await app.inject({ method: 'POST', url: '/operator/venues/mt5/reset' });
      expect(reset.statusCode).toBe(200);
      expect(reset.json()).toEqual({ venueId: 'mt5', state: 'CONNECTED' });
      expect(runtime.registry.get('mt5').manager.isHalted()).toBe(false);
    });

    it('should run a health check on demand', async () => {
      const response = await app.inject({ method: 'POST', url: '/operator/venues/mt5/health-check' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ venueId: 'mt5', state: 'CONNECTED' });
    });

    it('should return 404 when reconnecting an unknown venue', async () => {
      const response = await app.inject({ method: 'POST', url: '/operator/venues/binance/reconnect' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('No venue registered for id: binance');
    });

    it('should list and cancel open orders', async () => {
      session.orders.push({
        symbol: 'XAUUSD',
        venueOrderId: '5002',
        side: 'BUY',
        status: 'OPEN',
        quantity: 0.1,
        filledQuantity: 0,
        averagePrice: null,
      });

      const listed = await app.inject({ method: 'GET', url: '/operator/venues/mt5/orders?symbol=XAUUSD' });
      expect(listed.statusCode).toBe(200);
      expect(listed.json().orders).toHaveLength(1);

      const canceled = await app.inject({
        method: 'POST',
        url: '/operator/venues/mt5/orders/cancel',
        payload: { symbol: 'XAUUSD', venueOrderId: '5002' },
      });
      expect(canceled.statusCode).toBe(200);
      expect(canceled.json()).toEqual({ symbol: 'XAUUSD', venueOrderId: '5002' });

      const after = await app.inject({ method: 'GET', url: '/operator/venues/mt5/orders' });
      expect(after.json()).toEqual({ orders: [] });
    });

    it('should reject a cancel without a symbol', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/operator/venues/mt5/orders/cancel',
        payload: { venueOrderId: '5002' },
      });

      expect(response.statusCode).toBe(400);
      expect(session.canceled).toEqual([]);
    });

    it('should report a close with no open position', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/operator/venues/mt5/positions/close',
        payload: { symbol: 'XAUUSD' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ symbol: 'XAUUSD', closed: false, message: 'No open position' });
    });

    it('should list and acknowledge an ambiguous order', async () => {
      await leaveAmbiguous('amb-http-1');

      const listed = await app.inject({ method: 'GET', url: '/operator/orders/ambiguous' });
      expect(listed.json().orders).toEqual([
        expect.objectContaining({ idempotencyKey: 'amb-http-1', venueId: 'mt5', symbol: 'XAUUSD', quantity: 0.1 }),
      ]);

      const acknowledged = await app.inject({
        method: 'POST',
        url: '/operator/orders/ambiguous/amb-http-1/acknowledge',
        payload: { filledQuantity: 0.1, filledPrice: 101, note: 'Checked terminal history' },
      });
      expect(acknowledged.statusCode).toBe(200);
      expect(acknowledged.json()).toMatchObject({
        idempotencyKey: 'amb-http-1',
        status: 'FILLED',
        filledQuantity: 0.1,
        filledPrice: 101,
        errorMessage: 'Checked terminal history',
      });
      expect(runtime.coordinator.listAmbiguous()).toEqual([]);
    });

    it('should reconcile an ambiguous order against the venue', async () => {
      await leaveAmbiguous('amb-http-2');
      session.orders.push({
        symbol: 'XAUUSD',
        venueOrderId: '5003',
        clientOrderId: 'amb-http-2',
        side: 'BUY',
        status: 'FILLED',
        quantity: 0.1,
        filledQuantity: 0.1,
        averagePrice: 100.5,
      });

      const response = await app.inject({ method: 'POST', url: '/operator/orders/ambiguous/amb-http-2/reconcile' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'FILLED',
        venueOrderId: '5003',
        filledQuantity: 0.1,
        filledPrice: 100.5,
      });
    });

    it('should answer 202 when the venue has no record of the order', async () => {
      await leaveAmbiguous('amb-http-3');

      const response = await app.inject({ method: 'POST', url: '/operator/orders/ambiguous/amb-http-3/reconcile' });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ idempotencyKey: 'amb-http-3', reconciled: false });
      expect(runtime.coordinator.getAmbiguous('amb-http-3')).toBeDefined();
    });

    it('should return 404 for an unknown ambiguous key', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/operator/orders/ambiguous/missing/acknowledge',
        payload: {},
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().error.message).toBe('No ambiguous order with key missing');
    });

    describe('with an operator token', () => {
      let guarded: FastifyInstance;

      beforeEach(async () => {
        guarded = await createApp(runtime, { env: { ...env, OPERATOR_TOKEN: 'test-operator-token' } });
      });

      afterEach(async () => {
        await guarded.close();
      });

      it('should refuse a request without the token', async () => {
        const response = await guarded.inject({ method: 'GET', url: '/operator/orders/ambiguous' });

        expect(response.statusCode).toBe(401);
        expect(response.json().error.message).toBe('Operator token required');
      });

      it('should refuse a wrong token', async () => {
        const response = await guarded.inject({
          method: 'GET',
          url: '/operator/orders/ambiguous',
          headers: { 'x-operator-token': 'wrong-token' },
        });

        expect(response.statusCode).toBe(401);
      });

      it('should accept the configured token', async () => {
        const response = await guarded.inject({
          method: 'GET',
          url: '/operator/orders/ambiguous',
          headers: { 'x-operator-token': 'test-operator-token' },
        });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({ orders: [] });
      });

      it('should leave the health routes open', async () => {
        const response = await guarded.inject({ method: 'GET', url: '/health/venues/mt5' });

        expect(response.statusCode).toBe(200);
      });
    });
  });
});
