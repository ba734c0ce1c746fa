import { getLogger } from '../config/logger.js';
import type { FetchLike } from './venue-http.client.js';
import type { VenueConfiguration } from './venue-config.js';
import type { TickerSource, VenueSession } from './venue.types.js';
import { Mt5Session } from './mt5/mt5.session.js';
import { Mt5TickerSource } from './mt5/mt5.ticker.js';
import { OkxSession } from './okx/okx.session.js';
import { OkxTickerSource } from './okx/okx.ticker.js';

/**
 * Creates venue sessions and market data sources from configuration.
 */
export class VenueFactory {
  static createSession(config: VenueConfiguration, fetchImpl?: FetchLike): VenueSession {
    const logger = getLogger();

    switch (config.type) {
      case 'okx':
        logger.info({ venueId: 'okx', simulated: config.simulated }, 'Creating OKX venue session');
        return new OkxSession({
          baseUrl: config.baseUrl,
          simulated: config.simulated,
          settleCurrency: config.settleCurrency,
          fetchImpl,
        });

      case 'mt5':
        logger.info({ venueId: 'mt5' }, 'Creating MT5 venue session');
        return new Mt5Session({ bridgeUrl: config.bridgeUrl, fetchImpl });
    }
  }

  static createTickerSource(config: VenueConfiguration, fetchImpl?: FetchLike): TickerSource {
    switch (config.type) {
      case 'okx':
        return new OkxTickerSource({ baseUrl: config.baseUrl, simulated: config.simulated, fetchImpl });

      case 'mt5':
        return new Mt5TickerSource({ bridgeUrl: config.bridgeUrl, credentials: config.credentials, fetchImpl });
    }
  }
}
