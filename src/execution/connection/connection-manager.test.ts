import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConnectionManager } from './connection-manager.js';
import { VenueRegistry } from './venue-registry.js';
import { RetryPolicy } from '../retry/retry-policy.js';
import {
  AmbiguousOrderError,
  AuthError,
  ConnectionUnavailableError,
  CriticalVenueError,
  NetworkError,
  UnknownVenueError,
} from '../../errors/trading-errors.js';
import { FakeVenueSession, mt5Credentials } from '../tests/setup.js';
import type { ConnectionState } from '../types/execution.types.js';
import type { OrderTranslator } from '../interfaces/order-translator.interface.js';

describe('ConnectionManager', () => {
  let session: FakeVenueSession;
  let delays: number[];
  let notify: ReturnType<typeof vi.fn>;
  let manager: ConnectionManager;
  let now: Date;

  beforeEach(() => {
    session = new FakeVenueSession('mt5');
    delays = [];
    notify = vi.fn().mockResolvedValue(undefined);
    now = new Date('2024-01-03T12:00:00Z');
    manager = new ConnectionManager({
      session,
      credentials: mt5Credentials,
      reconnectPolicy: RetryPolicy.reconnect({
        sleep: async (ms: number) => {
          delays.push(ms);
        },
      }),
      orderTimeoutMs: 25,
      notificationSink: { notify },
      clock: () => now,
    });
  });

  describe('connect', () => {
    it('should move through CONNECTING to CONNECTED', async () => {
      const transitions: ConnectionState[] = [];
      manager.onStateChange(state => transitions.push(state));

      await manager.connect();

      expect(transitions).toEqual(['CONNECTING', 'CONNECTED']);
      expect(manager.getState()).toBe('CONNECTED');
    });

    it('should be idempotent', async () => {
      await Promise.all([manager.connect(), manager.connect()]);
      await manager.connect();

      expect(session.connectCalls).toBe(1);
    });

    it('should stay DISCONNECTED on authentication failure', async () => {
      session.connectFailures.push(new AuthError('bad token'));

      await expect(manager.connect()).rejects.toBeInstanceOf(AuthError);
      expect(manager.getState()).toBe('DISCONNECTED');
    });

    it('should become DEGRADED on network failure', async () => {
      session.connectFailures.push(new NetworkError('connection refused'));

      await expect(manager.connect()).rejects.toBeInstanceOf(NetworkError);
      expect(manager.getState()).toBe('DEGRADED');
    });

    it('should classify unexpected connect failures as network errors', async () => {
      session.connectFailures.push(new Error('socket hang up'));

      await expect(manager.connect()).rejects.toBeInstanceOf(NetworkError);
      expect(manager.getState()).toBe('DEGRADED');
    });
  });

  describe('ensureConnected', () => {
    it('should return immediately when connected', async () => {
      await manager.connect();
      await manager.ensureConnected();

      expect(session.connectCalls).toBe(1);
      expect(delays).toEqual([]);
    });

    it('should give up after five reconnect attempts and then fail fast', async () => {
      for (let i = 0; i < 5; i++) {
        session.connectFailures.push(new NetworkError('unreachable'));
      }

      await expect(manager.ensureConnected()).rejects.toBeInstanceOf(ConnectionUnavailableError);

      expect(delays).toEqual([1000, 2000, 4000, 8000, 16000]);
      expect(session.connectCalls).toBe(5);
      expect(manager.getState()).toBe('DEGRADED');
      expect(manager.getStatus().reconnectExhausted).toBe(true);
      expect(notify).toHaveBeenCalledTimes(1);
      expect(notify).toHaveBeenCalledWith(
        'CONNECTION_DEGRADED',
        expect.objectContaining({ venueId: 'mt5', attempts: 5 })
      );

      await expect(manager.ensureConnected()).rejects.toBeInstanceOf(ConnectionUnavailableError);
      expect(session.connectCalls).toBe(5);
    });

    it('should share one reconnect between concurrent callers', async () => {
      await Promise.all([manager.ensureConnected(), manager.ensureConnected(), manager.ensureConnected()]);

      expect(session.connectCalls).toBe(1);
      expect(manager.getState()).toBe('CONNECTED');
    });

    it('should not retry authentication failures', async () => {
      session.connectFailures.push(new AuthError('revoked'));

      await expect(manager.ensureConnected()).rejects.toBeInstanceOf(AuthError);
      expect(session.connectCalls).toBe(1);
      expect(manager.getState()).toBe('DISCONNECTED');
    });

    it('should recover through a manual reconnect', async () => {
      for (let i = 0; i < 5; i++) {
        session.connectFailures.push(new NetworkError('unreachable'));
      }
      await expect(manager.ensureConnected()).rejects.toBeInstanceOf(ConnectionUnavailableError);

      const state = await manager.reconnect();

      expect(state).toBe('CONNECTED');
      await manager.ensureConnected();
      expect(session.connectCalls).toBe(6);
    });
  });

  describe('healthCheck', () => {
    it('should refresh the snapshot when connected', async () => {
      await manager.connect();

      const state = await manager.healthCheck();

      expect(state).toBe('CONNECTED');
      expect(session.snapshotCalls).toBe(1);
      expect(manager.getCachedSnapshot()?.capturedAt).toEqual(now);
    });

    it('should degrade when the round trip fails', async () => {
      await manager.connect();
      session.snapshotFailures.push(new NetworkError('reset'));

      await expect(manager.healthCheck()).resolves.toBe('DEGRADED');
    });

    it('should clear an exhausted reconnect policy after a successful reconnect', async () => {
      for (let i = 0; i < 5; i++) {
        session.connectFailures.push(new NetworkError('unreachable'));
      }
      await expect(manager.ensureConnected()).rejects.toBeInstanceOf(ConnectionUnavailableError);

      const state = await manager.healthCheck();

      expect(state).toBe('CONNECTED');
      expect(manager.getStatus().reconnectExhausted).toBe(false);
      await expect(manager.ensureConnected()).resolves.toBeUndefined();
    });

    it('should make a single attempt from DEGRADED', async () => {
      session.connectFailures.push(new NetworkError('down'), new NetworkError('still down'));
      await expect(manager.connect()).rejects.toBeInstanceOf(NetworkError);

      const state = await manager.healthCheck();

      expect(state).toBe('DEGRADED');
      expect(session.connectCalls).toBe(2);
      expect(delays).toEqual([]);
    });
  });

  describe('scheduled refresh', () => {
    it('should recover a DEGRADED venue without a caller asking', async () => {
      for (let i = 0; i < 5; i++) {
        session.connectFailures.push(new NetworkError('unreachable'));
      }
      await expect(manager.ensureConnected()).rejects.toBeInstanceOf(ConnectionUnavailableError);
      expect(manager.getState()).toBe('DEGRADED');

      vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
      try {
        manager.startSnapshotRefresh(1000);
        await vi.advanceTimersByTimeAsync(1000);
      } finally {
        manager.stopSnapshotRefresh();
        vi.useRealTimers();
      }

      await vi.waitFor(() => expect(manager.getState()).toBe('CONNECTED'));
      await vi.waitFor(() => expect(session.snapshotCalls).toBe(1));
      expect(manager.getStatus().reconnectExhausted).toBe(false);
      expect(session.connectCalls).toBe(6);
    });
  });

  describe('critical conditions', () => {
    it('should halt when a snapshot reports a critical venue error', async () => {
      await manager.connect();
      session.snapshotFailures.push(new CriticalVenueError('account swapped'));

      await expect(manager.getAccountSnapshot()).rejects.toBeInstanceOf(CriticalVenueError);

      expect(manager.isHalted()).toBe(true);
      expect(manager.getStatus().haltReason).toBe('account swapped');
      expect(notify).toHaveBeenCalledWith('VENUE_HALTED', { venueId: 'mt5', reason: 'account swapped' });
    });

    it('should halt when connect reports a critical venue error', async () => {
      session.connectFailures.push(new CriticalVenueError('wrong login'));

      await expect(manager.connect()).rejects.toBeInstanceOf(CriticalVenueError);

      expect(manager.isHalted()).toBe(true);
      expect(manager.getState()).toBe('DISCONNECTED');
    });
  });

  describe('order queries', () => {
    beforeEach(() => {
      session.orders = [
        {
          symbol: 'XAUUSD',
          venueOrderId: '5001',
          clientOrderId: 'k1',
          side: 'BUY',
          status: 'OPEN',
          quantity: 0.1,
          filledQuantity: 0,
          averagePrice: null,
        },
      ];
    });

    it('should look orders up by client id', async () => {
      await expect(manager.getOrder({ symbol: 'XAUUSD', clientOrderId: 'k1' })).resolves.toMatchObject({
        venueOrderId: '5001',
        status: 'OPEN',
      });
      expect(session.connectCalls).toBe(1);
    });

    it('should cancel through the session', async () => {
      const ref = await manager.cancelOrder({ symbol: 'XAUUSD', clientOrderId: 'k1' });

      expect(ref).toEqual({ symbol: 'XAUUSD', clientOrderId: 'k1', venueOrderId: '5001' });
      await expect(manager.listOpenOrders('XAUUSD')).resolves.toEqual([]);
    });

    it('should report a position close past the order deadline as ambiguous', async () => {
      await manager.connect();
      vi.spyOn(session, 'closePosition').mockImplementation(() => new Promise(() => undefined));

      await expect(manager.closePosition({ symbol: 'XAUUSD' })).rejects.toBeInstanceOf(AmbiguousOrderError);
    });
  });

  describe('placeOrder', () => {
    it('should report a missed deadline as ambiguous', async () => {
      await manager.connect();
      session.placeHandler = () => new Promise(() => undefined);

      await expect(
        manager.placeOrder({
          venue: 'mt5',
          body: {
            action: 'DEAL',
            symbol: 'XAUUSD',
            type: 'BUY',
            volume: 0.1,
            deviation: 20,
            comment: 'k',
            clientOrderId: 'k',
          },
        })
      ).rejects.toBeInstanceOf(AmbiguousOrderError);
      expect(session.placed).toHaveLength(1);
    });
  });

  describe('account snapshots', () => {
    it('should serve the cached snapshot within maxAgeMs', async () => {
      await manager.connect();
      await manager.getAccountSnapshot();
      now = new Date(now.getTime() + 500);

      await manager.getAccountSnapshot({ maxAgeMs: 1000 });
      expect(session.snapshotCalls).toBe(1);

      now = new Date(now.getTime() + 1000);
      await manager.getAccountSnapshot({ maxAgeMs: 1000 });
      expect(session.snapshotCalls).toBe(2);
    });

    it('should apply fills to the cached snapshot', async () => {
      await manager.connect();
      await manager.getAccountSnapshot();

      manager.applyFill('XAUUSD', 0.2, 100);
      manager.applyFill('XAUUSD', 0.2, 110);
      const position = manager.getCachedSnapshot()?.positions['XAUUSD'];
      expect(position?.quantity).toBeCloseTo(0.4, 9);
      expect(position?.averagePrice).toBeCloseTo(105, 9);

      manager.applyFill('XAUUSD', -0.4, 120);
      expect(manager.getCachedSnapshot()?.positions['XAUUSD']).toBeUndefined();
    });
  });

  describe('halt', () => {
    it('should force DISCONNECTED and refuse work until an operator reset', async () => {
      await manager.connect();

      await manager.halt('unexpected position');

      expect(manager.getState()).toBe('DISCONNECTED');
      expect(session.disconnectCalls).toBe(1);
      expect(notify).toHaveBeenCalledWith('VENUE_HALTED', { venueId: 'mt5', reason: 'unexpected position' });
      await expect(manager.ensureConnected()).rejects.toBeInstanceOf(CriticalVenueError);

      manager.operatorReset();
      await manager.connect();
      expect(manager.getState()).toBe('CONNECTED');
    });
  });

  describe('disconnect', () => {
    it('should release the session from any state', async () => {
      session.connectFailures.push(new NetworkError('down'));
      await expect(manager.connect()).rejects.toBeInstanceOf(NetworkError);

      await manager.disconnect();

      expect(manager.getState()).toBe('DISCONNECTED');
      expect(session.disconnectCalls).toBe(1);
    });
  });
});

describe('VenueRegistry', () => {
  const translator = (venueId: string): OrderTranslator => ({
    venueId,
    toVenueRequest: () => {
      throw new Error('unused');
    },
    fromVenueResponse: () => {
      throw new Error('unused');
    },
    normalize: intent => intent,
    clientOrderId: key => key,
  });

  it('should refuse a second manager for the same venue', () => {
    const registry = new VenueRegistry();
    const first = new ConnectionManager({ session: new FakeVenueSession('mt5'), credentials: mt5Credentials });
    const second = new ConnectionManager({ session: new FakeVenueSession('mt5'), credentials: mt5Credentials });

    registry.register(first, translator('mt5'));

    expect(() => registry.register(second, translator('mt5'))).toThrow(CriticalVenueError);
    expect(registry.venueIds()).toEqual(['mt5']);
  });

  it('should raise UnknownVenueError for unregistered venues', () => {
    const registry = new VenueRegistry();

    expect(() => registry.get('kraken')).toThrow(UnknownVenueError);
  });
});
