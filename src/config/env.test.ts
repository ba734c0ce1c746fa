import { describe, it, expect } from 'vitest';
import { EnvironmentError, parseEnvironment } from './env.js';
import { loadRiskLimits, RiskLimitsError, validateRiskLimits } from './risk-limits.js';
import { getAllAvailableVenueConfigs, getOkxConfig, VenueConfigurationError } from '../venues/venue-config.js';

describe('parseEnvironment', () => {
  it('should apply defaults for an empty environment', () => {
    const env = parseEnvironment({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      LOG_LEVEL: 'info',
      OKX_API_URL: 'https://www.okx.com',
      OKX_SIMULATED: true,
      ORDER_TIMEOUT_MS: 15_000,
      MARKET_POLL_MS: 5_000,
      STRATEGIES_AUTOSTART: false,
    });
    expect(env.SUPABASE_URL).toBeUndefined();
    expect(env.OPERATOR_TOKEN).toBeUndefined();
  });

  it('should read booleans and numbers', () => {
    const env = parseEnvironment({
      OKX_SIMULATED: 'false',
      STRATEGIES_AUTOSTART: 'yes',
      RISK_MAX_DAILY_LOSS: '250',
    });

    expect(env.OKX_SIMULATED).toBe(false);
    expect(env.STRATEGIES_AUTOSTART).toBe(true);
    expect(env.RISK_MAX_DAILY_LOSS).toBe(250);
  });

  it('should reject an out of range port', () => {
    expect(() => parseEnvironment({ PORT: '70000' })).toThrow('PORT must be between 1 and 65535. Got: 70000');
  });

  it('should reject an unknown log level', () => {
    expect(() => parseEnvironment({ LOG_LEVEL: 'trace' })).toThrow(EnvironmentError);
  });

  it('should reject a malformed bridge url', () => {
    expect(() => parseEnvironment({ MT5_BRIDGE_URL: 'bridge' })).toThrow('MT5_BRIDGE_URL must be a valid URL. Got: bridge');
  });

  it('should reject a negative risk limit', () => {
    expect(() => parseEnvironment({ RISK_MAX_OPEN_ORDERS: '-1' })).toThrow(
      'RISK_MAX_OPEN_ORDERS must be a positive number. Got: -1'
    );
  });
});

describe('venue configuration', () => {
  it('should include only venues with complete settings', () => {
    const env = parseEnvironment({
      OKX_API_KEY: 'test-key',
      OKX_SECRET_KEY: 'test-secret',
      OKX_PASSPHRASE: 'test-passphrase',
      MT5_BRIDGE_URL: 'http://localhost:8228',
      MT5_BRIDGE_TOKEN: 'test-token',
    });

    expect(getAllAvailableVenueConfigs(env).map(config => config.type)).toEqual(['okx']);
  });

  it('should explain which OKX settings are required', () => {
    expect(() => getOkxConfig(parseEnvironment({ OKX_API_KEY: 'test-key' }))).toThrow(VenueConfigurationError);
  });
});

describe('risk limits', () => {
  it('should combine environment scalars with per-symbol caps', () => {
    const limits = loadRiskLimits(parseEnvironment({ RISK_MAX_POSITION_SIZE: '3' }));

    expect(limits.maxPositionSize).toBe(3);
    expect(limits.maxPositionSizeBySymbol['XAUUSD']).toBe(1);
    expect(Object.isFrozen(limits)).toBe(true);
  });

  it('should list every invalid limit', () => {
    const errors = validateRiskLimits({
      maxPositionSize: 1,
      maxPositionSizeBySymbol: { XAUUSD: 0 },
      maxAggregateExposure: 0,
      maxConcurrentStrategies: 3,
      maxOpenOrders: 5,
      maxDailyLoss: 500,
      minRiskRewardRatio: 1.5,
      maxSnapshotAgeMs: 30_000,
    });

    expect(errors).toEqual([
      'maxAggregateExposure must be a positive number',
      'maxPositionSizeBySymbol.XAUUSD must be a positive number',
    ]);
    expect(new RiskLimitsError(errors).message).toBe(
      'Invalid risk limits: maxAggregateExposure must be a positive number; maxPositionSizeBySymbol.XAUUSD must be a positive number'
    );
  });
});
