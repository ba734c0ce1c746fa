import { createTradingError, NetworkError } from '../../errors/trading-errors.js';
import { isRecord, readNumeric, readRecords, readString } from '../../utils/guards.js';
import { buildQueryString } from './okx-signer.js';
import { OKX_SUCCESS_CODE, okxKindForCode } from './okx.codes.js';
import { OKX_ENDPOINTS } from './okx.types.js';
import { requestVenueJson, type FetchLike } from '../venue-http.client.js';
import type { TickerSource } from '../venue.types.js';

export interface OkxTickerConfig {
  baseUrl: string;
  simulated: boolean;
  fetchImpl?: FetchLike;
}

/** Public ticker endpoint; market data needs no signature. */
export class OkxTickerSource implements TickerSource {
  readonly venueId = 'okx';
  private readonly fetchImpl: FetchLike;

  constructor(private readonly config: OkxTickerConfig) {
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async lastPrice(symbol: string, signal?: AbortSignal): Promise<number> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.simulated) {
      headers['x-simulated-trading'] = '1';
    }

    const raw = await requestVenueJson(
      this.venueId,
      {
        method: 'GET',
        url: `${this.config.baseUrl}${OKX_ENDPOINTS.TICKER}?${buildQueryString({ instId: symbol })}`,
        headers,
        signal,
      },
      this.fetchImpl
    );
    if (!isRecord(raw)) {
      throw new NetworkError('OKX returned a malformed ticker envelope', { venueId: this.venueId });
    }

    const code = readString(raw, 'code') ?? '';
    if (code !== OKX_SUCCESS_CODE) {
      const kind = okxKindForCode(code);
      throw createTradingError(
        kind === 'AMBIGUOUS' ? 'TIMEOUT' : kind,
        `OKX ticker failed: ${code} ${readString(raw, 'msg') ?? ''}`.trim(),
        { venueId: this.venueId, venueCode: code }
      );
    }

    const [ticker] = readRecords(raw, 'data');
    const last = ticker ? readNumeric(ticker, 'last') : undefined;
    if (last === undefined || last <= 0) {
      throw new NetworkError(`OKX ticker for ${symbol} has no last price`, { venueId: this.venueId });
    }
    return last;
  }
}
