import { config } from 'dotenv';

// Load environment variables once
config();

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface EnvironmentConfig {
  NODE_ENV: NodeEnv;
  PORT: number;
  LOG_LEVEL: LogLevel;
  // Audit persistence (optional, in-memory audit when absent)
  SUPABASE_URL?: string;
  SUPABASE_SERVICE_ROLE_KEY?: string;
  // OKX V5 REST
  OKX_API_URL: string;
  OKX_API_KEY?: string;
  OKX_SECRET_KEY?: string;
  OKX_PASSPHRASE?: string;
  OKX_SIMULATED: boolean;
  // MT5 HTTP bridge
  MT5_BRIDGE_URL?: string;
  MT5_BRIDGE_TOKEN?: string;
  MT5_ACCOUNT?: string;
  // Risk defaults
  RISK_MAX_POSITION_SIZE: number;
  RISK_MAX_AGGREGATE_EXPOSURE: number;
  RISK_MAX_CONCURRENT_STRATEGIES: number;
  RISK_MAX_OPEN_ORDERS: number;
  RISK_MAX_DAILY_LOSS: number;
  RISK_MIN_RISK_REWARD: number;
  RISK_MAX_SNAPSHOT_AGE_MS: number;
  // Deadlines and cadences
  VENUE_CALL_TIMEOUT_MS: number;
  ORDER_TIMEOUT_MS: number;
  SNAPSHOT_REFRESH_MS: number;
  MARKET_POLL_MS: number;
  // Shared secret for the operator routes (x-operator-token header)
  OPERATOR_TOKEN?: string;
  // Start config/strategies.json entries with the server
  STRATEGIES_AUTOSTART: boolean;
}

class EnvironmentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EnvironmentError';
  }
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent',
];

function validateNodeEnv(value: string | undefined): NodeEnv {
  if (!value) {
    return 'development';
  }

  const match = NODE_ENVS.find(env => env === value);
  if (!match) {
    throw new EnvironmentError(
      `NODE_ENV must be one of: ${NODE_ENVS.join(', ')}. Got: ${value}`
    );
  }

  return match;
}

function validatePort(value: string | undefined): number {
  if (!value) {
    return 3000;
  }

  const port = parseInt(value, 10);

  if (isNaN(port)) {
    throw new EnvironmentError(`PORT must be a valid number. Got: ${value}`);
  }

  if (port < 1 || port > 65535) {
    throw new EnvironmentError(
      `PORT must be between 1 and 65535. Got: ${port}`
    );
  }

  return port;
}

function validateLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return 'info';
  }

  const match = LOG_LEVELS.find(level => level === value);
  if (!match) {
    throw new EnvironmentError(
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}. Got: ${value}`
    );
  }

  return match;
}

function validateOptionalUrl(
  value: string | undefined,
  name: string
): string | undefined {
  if (!value) {
    return undefined;
  }

  try {
    new URL(value);
  } catch {
    throw new EnvironmentError(`${name} must be a valid URL. Got: ${value}`);
  }

  return value;
}

function validatePositiveNumber(
  value: string | undefined,
  name: string,
  fallback: number
): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new EnvironmentError(`${name} must be a positive number. Got: ${value}`);
  }

  return parsed;
}

function validateBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  return ['1', 'true', 'yes'].includes(value.toLowerCase());
}

function validateOptionalString(value: string | undefined): string | undefined {
  return value || undefined;
}

/**
 * Parses a raw environment map. Exposed separately from the cached accessor
 * so callers can validate an arbitrary map.
 */
export function parseEnvironment(
  source: NodeJS.ProcessEnv
): EnvironmentConfig {
  return {
    NODE_ENV: validateNodeEnv(source['NODE_ENV']),
    PORT: validatePort(source['PORT']),
    LOG_LEVEL: validateLogLevel(source['LOG_LEVEL']),
    SUPABASE_URL: validateOptionalUrl(source['SUPABASE_URL'], 'SUPABASE_URL'),
    SUPABASE_SERVICE_ROLE_KEY: validateOptionalString(
      source['SUPABASE_SERVICE_ROLE_KEY']
    ),
    OKX_API_URL:
      validateOptionalUrl(source['OKX_API_URL'], 'OKX_API_URL') ??
      'https://www.okx.com',
    OKX_API_KEY: validateOptionalString(source['OKX_API_KEY']),
    OKX_SECRET_KEY: validateOptionalString(source['OKX_SECRET_KEY']),
    OKX_PASSPHRASE: validateOptionalString(source['OKX_PASSPHRASE']),
    OKX_SIMULATED: validateBoolean(source['OKX_SIMULATED'], true),
    MT5_BRIDGE_URL: validateOptionalUrl(
      source['MT5_BRIDGE_URL'],
      'MT5_BRIDGE_URL'
    ),
    MT5_BRIDGE_TOKEN: validateOptionalString(source['MT5_BRIDGE_TOKEN']),
    MT5_ACCOUNT: validateOptionalString(source['MT5_ACCOUNT']),
    RISK_MAX_POSITION_SIZE: validatePositiveNumber(
      source['RISK_MAX_POSITION_SIZE'],
      'RISK_MAX_POSITION_SIZE',
      1
    ),
    RISK_MAX_AGGREGATE_EXPOSURE: validatePositiveNumber(
      source['RISK_MAX_AGGREGATE_EXPOSURE'],
      'RISK_MAX_AGGREGATE_EXPOSURE',
      5
    ),
    RISK_MAX_CONCURRENT_STRATEGIES: validatePositiveNumber(
      source['RISK_MAX_CONCURRENT_STRATEGIES'],
      'RISK_MAX_CONCURRENT_STRATEGIES',
      10
    ),
    RISK_MAX_OPEN_ORDERS: validatePositiveNumber(
      source['RISK_MAX_OPEN_ORDERS'],
      'RISK_MAX_OPEN_ORDERS',
      20
    ),
    RISK_MAX_DAILY_LOSS: validatePositiveNumber(
      source['RISK_MAX_DAILY_LOSS'],
      'RISK_MAX_DAILY_LOSS',
      500
    ),
    RISK_MIN_RISK_REWARD: validatePositiveNumber(
      source['RISK_MIN_RISK_REWARD'],
      'RISK_MIN_RISK_REWARD',
      1.5
    ),
    RISK_MAX_SNAPSHOT_AGE_MS: validatePositiveNumber(
      source['RISK_MAX_SNAPSHOT_AGE_MS'],
      'RISK_MAX_SNAPSHOT_AGE_MS',
      30_000
    ),
    VENUE_CALL_TIMEOUT_MS: validatePositiveNumber(
      source['VENUE_CALL_TIMEOUT_MS'],
      'VENUE_CALL_TIMEOUT_MS',
      10_000
    ),
    ORDER_TIMEOUT_MS: validatePositiveNumber(
      source['ORDER_TIMEOUT_MS'],
      'ORDER_TIMEOUT_MS',
      15_000
    ),
    SNAPSHOT_REFRESH_MS: validatePositiveNumber(
      source['SNAPSHOT_REFRESH_MS'],
      'SNAPSHOT_REFRESH_MS',
      15_000
    ),
    MARKET_POLL_MS: validatePositiveNumber(
      source['MARKET_POLL_MS'],
      'MARKET_POLL_MS',
      5_000
    ),
    OPERATOR_TOKEN: validateOptionalString(source['OPERATOR_TOKEN']),
    STRATEGIES_AUTOSTART: validateBoolean(source['STRATEGIES_AUTOSTART'], false),
  };
}

let environmentConfig: EnvironmentConfig | null = null;

export function getEnvironmentConfig(): EnvironmentConfig {
  if (environmentConfig) {
    return environmentConfig;
  }

  environmentConfig = parseEnvironment(process.env);
  return environmentConfig;
}

export { EnvironmentError };
