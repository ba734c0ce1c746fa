import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { RiskLimits } from '../execution/types/execution.types.js';
import { getEnvironmentConfig, type EnvironmentConfig } from './env.js';
import { isRecord } from '../utils/guards.js';

export const DEFAULT_RISK_LIMITS_PATH = fileURLToPath(
  new URL('../../config/risk-limits.json', import.meta.url)
);

export class RiskLimitsError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Invalid risk limits: ${errors.join('; ')}`);
    this.name = 'RiskLimitsError';
  }
}

/**
 * Returns a list of problems; empty when the limits are usable.
 */
export function validateRiskLimits(limits: RiskLimits): string[] {
  const errors: string[] = [];
  const positive: Array<keyof RiskLimits> = [
    'maxPositionSize',
    'maxAggregateExposure',
    'maxConcurrentStrategies',
    'maxOpenOrders',
    'maxDailyLoss',
    'minRiskRewardRatio',
    'maxSnapshotAgeMs',
  ];

  for (const field of positive) {
    const value = limits[field];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      errors.push(`${field} must be a positive number`);
    }
  }

  for (const [symbol, value] of Object.entries(limits.maxPositionSizeBySymbol)) {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`maxPositionSizeBySymbol.${symbol} must be a positive number`);
    }
  }

  return errors;
}

function readSymbolLimits(path: string): Record<string, number> {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const bySymbol: unknown = isRecord(raw) ? raw['maxPositionSizeBySymbol'] : undefined;
  const limits: Record<string, number> = {};

  if (isRecord(bySymbol)) {
    for (const [symbol, value] of Object.entries(bySymbol)) {
      if (typeof value === 'number') {
        limits[symbol] = value;
      }
    }
  }
  return limits;
}

/**
 * Scalar limits from the environment, per-symbol caps from
 * config/risk-limits.json (or RISK_LIMITS_PATH).
 */
export function loadRiskLimits(
  env: EnvironmentConfig = getEnvironmentConfig(),
  path: string = process.env['RISK_LIMITS_PATH'] ?? DEFAULT_RISK_LIMITS_PATH
): Readonly<RiskLimits> {
  const limits: RiskLimits = {
    maxPositionSize: env.RISK_MAX_POSITION_SIZE,
    maxPositionSizeBySymbol: Object.freeze(readSymbolLimits(path)),
    maxAggregateExposure: env.RISK_MAX_AGGREGATE_EXPOSURE,
    maxConcurrentStrategies: env.RISK_MAX_CONCURRENT_STRATEGIES,
    maxOpenOrders: env.RISK_MAX_OPEN_ORDERS,
    maxDailyLoss: env.RISK_MAX_DAILY_LOSS,
    minRiskRewardRatio: env.RISK_MIN_RISK_REWARD,
    maxSnapshotAgeMs: env.RISK_MAX_SNAPSHOT_AGE_MS,
  };

  const errors = validateRiskLimits(limits);
  if (errors.length > 0) {
    throw new RiskLimitsError(errors);
  }
  return Object.freeze(limits);
}
