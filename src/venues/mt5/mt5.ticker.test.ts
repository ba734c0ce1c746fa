import { describe, it, expect, vi, type Mock } from 'vitest';
import { Mt5TickerSource } from './mt5.ticker.js';
import type { FetchLike } from '../venue-http.client.js';
import type { Mt5Credentials } from './mt5.types.js';

const mt5Credentials: Mt5Credentials = { venue: 'mt5', token: 'test-token', account: '1001' };

function replying(body: unknown): Mock<FetchLike> {
  return vi.fn<FetchLike>(async () => new Response(JSON.stringify(body), { status: 200 }));
}

describe('Mt5TickerSource', () => {
  it('should read the last price with the bridge credentials', async () => {
    const fetchImpl = replying({ symbol: 'XAUUSD', bid: 2000, ask: 2001, last: 2000.4 });
    const source = new Mt5TickerSource({ bridgeUrl: 'http://bridge.test', credentials: mt5Credentials, fetchImpl });

    await expect(source.lastPrice('XAUUSD')).resolves.toBe(2000.4);
    expect(fetchImpl).toHaveBeenCalledWith(
      'http://bridge.test/ticker?symbol=XAUUSD',
      expect.objectContaining({
        method: 'GET',
        headers: expect.objectContaining({ Authorization: 'Bearer test-token', 'X-MT5-Account': '1001' }),
      })
    );
  });

  it('should fall back to the mid price when no trade price is set', async () => {
    const source = new Mt5TickerSource({
      bridgeUrl: 'http://bridge.test',
      credentials: mt5Credentials,
      fetchImpl: replying({ symbol: 'EURUSD', bid: 1.1, ask: 1.2, last: 0 }),
    });

    await expect(source.lastPrice('EURUSD')).resolves.toBeCloseTo(1.15, 9);
  });

  it('should raise a network error when the tick has no price', async () => {
    const source = new Mt5TickerSource({
      bridgeUrl: 'http://bridge.test',
      credentials: mt5Credentials,
      fetchImpl: replying({ symbol: 'XAUUSD' }),
    });

    await expect(source.lastPrice('XAUUSD')).rejects.toMatchObject({
      kind: 'NETWORK_ERROR',
      message: 'MT5 bridge has no price for XAUUSD',
    });
  });
});
