import { describe, it, expect, vi, type Mock } from 'vitest';
import { OkxTickerSource } from './okx.ticker.js';
import type { FetchLike } from '../venue-http.client.js';

function replying(body: unknown): Mock<FetchLike> {
  return vi.fn<FetchLike>(async () => new Response(JSON.stringify(body), { status: 200 }));
}

describe('OkxTickerSource', () => {
  it('should read the last price without signing', async () => {
    const fetchImpl = replying({ code: '0', msg: '', data: [{ instId: 'BTC-USDT-SWAP', last: '43000.5' }] });
    const source = new OkxTickerSource({ baseUrl: 'https://okx.test', simulated: true, fetchImpl });

    await expect(source.lastPrice('BTC-USDT-SWAP')).resolves.toBe(43000.5);

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://okx.test/api/v5/market/ticker?instId=BTC-USDT-SWAP');
    expect(init?.headers).toEqual({ Accept: 'application/json', 'x-simulated-trading': '1' });
  });

  it('should raise the mapped kind for a venue error code', async () => {
    const source = new OkxTickerSource({
      baseUrl: 'https://okx.test',
      simulated: false,
      fetchImpl: replying({ code: '51001', msg: 'Instrument ID does not exist', data: [] }),
    });

    await expect(source.lastPrice('NOPE-USDT')).rejects.toMatchObject({
      kind: 'INVALID_ORDER',
      venueCode: '51001',
      message: 'OKX ticker failed: 51001 Instrument ID does not exist',
    });
  });

  it('should treat an empty ticker as a network error', async () => {
    const source = new OkxTickerSource({
      baseUrl: 'https://okx.test',
      simulated: false,
      fetchImpl: replying({ code: '0', msg: '', data: [] }),
    });

    await expect(source.lastPrice('BTC-USDT-SWAP')).rejects.toMatchObject({ kind: 'NETWORK_ERROR' });
  });
});
