import { NetworkError } from '../../errors/trading-errors.js';
import { isRecord, readNumeric } from '../../utils/guards.js';
import { requestVenueJson, type FetchLike } from '../venue-http.client.js';
import type { TickerSource } from '../venue.types.js';
import type { Mt5Credentials } from './mt5.types.js';

export interface Mt5TickerConfig {
  bridgeUrl: string;
  credentials: Mt5Credentials;
  fetchImpl?: FetchLike;
}

/** Reads the bridge's symbol tick; falls back to the bid/ask mid when no trade price is set. */
export class Mt5TickerSource implements TickerSource {
  readonly venueId = 'mt5';
  private readonly fetchImpl: FetchLike;

  constructor(private readonly config: Mt5TickerConfig) {
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async lastPrice(symbol: string, signal?: AbortSignal): Promise<number> {
    const { token, account } = this.config.credentials;
    const raw = await requestVenueJson(
      this.venueId,
      {
        method: 'GET',
        url: `${this.config.bridgeUrl}/ticker?symbol=${encodeURIComponent(symbol)}`,
        headers: {
          Authorization: `Bearer ${token}`,
          'X-MT5-Account': account,
          Accept: 'application/json',
        },
        signal,
      },
      this.fetchImpl
    );
    if (!isRecord(raw)) {
      throw new NetworkError('MT5 bridge returned a malformed tick', { venueId: this.venueId });
    }

    const last = readNumeric(raw, 'last');
    if (last !== undefined && last > 0) {
      return last;
    }
    const bid = readNumeric(raw, 'bid');
    const ask = readNumeric(raw, 'ask');
    if (bid === undefined || ask === undefined || bid <= 0 || ask <= 0) {
      throw new NetworkError(`MT5 bridge has no price for ${symbol}`, { venueId: this.venueId });
    }
    return (bid + ask) / 2;
  }
}
