import { getEnvironmentConfig, type EnvironmentConfig } from '../config/env.js';
import type { OkxCredentials } from './okx/okx.types.js';
import type { Mt5Credentials } from './mt5/mt5.types.js';
import type { KnownVenueId } from './venue.types.js';

/**
 * Venue configuration from environment variables. A venue whose settings
 * are incomplete is left out of the runtime rather than failing startup.
 */

export class VenueConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VenueConfigurationError';
  }
}

export interface OkxVenueConfig {
  type: 'okx';
  baseUrl: string;
  simulated: boolean;
  settleCurrency: string;
  credentials: OkxCredentials;
}

export interface Mt5VenueConfig {
  type: 'mt5';
  bridgeUrl: string;
  credentials: Mt5Credentials;
}

export type VenueConfiguration = OkxVenueConfig | Mt5VenueConfig;

export function getOkxConfig(env: EnvironmentConfig = getEnvironmentConfig()): OkxVenueConfig {
  if (!env.OKX_API_KEY || !env.OKX_SECRET_KEY || !env.OKX_PASSPHRASE) {
    throw new VenueConfigurationError(
      'OKX configuration incomplete. Required: OKX_API_KEY, OKX_SECRET_KEY, OKX_PASSPHRASE'
    );
  }

  return {
    type: 'okx',
    baseUrl: env.OKX_API_URL,
    simulated: env.OKX_SIMULATED,
    settleCurrency: 'USDT',
    credentials: {
      venue: 'okx',
      apiKey: env.OKX_API_KEY,
      secretKey: env.OKX_SECRET_KEY,
      passphrase: env.OKX_PASSPHRASE,
    },
  };
}

export function getMt5Config(env: EnvironmentConfig = getEnvironmentConfig()): Mt5VenueConfig {
  if (!env.MT5_BRIDGE_URL || !env.MT5_BRIDGE_TOKEN || !env.MT5_ACCOUNT) {
    throw new VenueConfigurationError(
      'MT5 configuration incomplete. Required: MT5_BRIDGE_URL, MT5_BRIDGE_TOKEN, MT5_ACCOUNT'
    );
  }

  return {
    type: 'mt5',
    bridgeUrl: env.MT5_BRIDGE_URL,
    credentials: {
      venue: 'mt5',
      token: env.MT5_BRIDGE_TOKEN,
      account: env.MT5_ACCOUNT,
    },
  };
}

export function getVenueConfig(
  venue: KnownVenueId,
  env: EnvironmentConfig = getEnvironmentConfig()
): VenueConfiguration {
  switch (venue) {
    case 'okx':
      return getOkxConfig(env);
    case 'mt5':
      return getMt5Config(env);
  }
}

export function getAllAvailableVenueConfigs(
  env: EnvironmentConfig = getEnvironmentConfig()
): VenueConfiguration[] {
  const configs: VenueConfiguration[] = [];

  if (env.OKX_API_KEY && env.OKX_SECRET_KEY && env.OKX_PASSPHRASE) {
    configs.push(getOkxConfig(env));
  }
  if (env.MT5_BRIDGE_URL && env.MT5_BRIDGE_TOKEN && env.MT5_ACCOUNT) {
    configs.push(getMt5Config(env));
  }

  return configs;
}
