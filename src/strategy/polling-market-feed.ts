import type pino from 'pino';
import { setTimeout as delay } from 'node:timers/promises';
import { getComponentLogger } from '../config/logger.js';
import { isTransientError, UnknownVenueError } from '../errors/trading-errors.js';
import type { TickerSource, VenueId } from '../venues/venue.types.js';
import type { MarketFeed, MarketTick } from './strategy.types.js';

export type FeedSleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PollingMarketFeedOptions {
  sources: TickerSource[];
  intervalMs: number;
  sleep?: FeedSleep;
  clock?: () => Date;
}

const defaultSleep: FeedSleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

/**
 * Market feed that polls each venue's ticker at a fixed interval. Transient
 * read failures skip a beat; anything else ends the feed.
 */
export class PollingMarketFeed implements MarketFeed {
  private readonly sources = new Map<VenueId, TickerSource>();
  private readonly intervalMs: number;
  private readonly sleep: FeedSleep;
  private readonly clock: () => Date;
  private readonly logger: pino.Logger;

  constructor(options: PollingMarketFeedOptions) {
    for (const source of options.sources) {
      this.sources.set(source.venueId, source);
    }
    this.intervalMs = options.intervalMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? (() => new Date());
    this.logger = getComponentLogger('market-feed');
  }

  async *ticks(venueId: VenueId, symbol: string, signal: AbortSignal): AsyncIterable<MarketTick> {
    const source = this.sources.get(venueId);
    if (!source) {
      throw new UnknownVenueError(venueId);
    }

    while (!signal.aborted) {
      let price: number | undefined;
      try {
        price = await source.lastPrice(symbol, signal);
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        if (!isTransientError(error)) {
          throw error;
        }
        this.logger.warn(
          { venueId, symbol, error: error instanceof Error ? error.message : String(error) },
          'Ticker read failed, retrying next interval'
        );
      }

      if (price !== undefined) {
        yield { venueId, symbol, price, timestamp: this.clock() };
      }
      await this.sleep(this.intervalMs, signal);
    }
  }
}
