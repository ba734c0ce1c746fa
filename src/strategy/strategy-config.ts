import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { isRecord, readNumber, readString } from '../utils/guards.js';
import { GridStrategy } from './strategies/grid.strategy.js';
import { MartingaleStrategy } from './strategies/martingale.strategy.js';
import { SignalDrivenStrategy } from './strategies/signal-driven.strategy.js';
import { TrendFollowingStrategy } from './strategies/trend-following.strategy.js';
import type { StrategyConfig, TradingStrategy } from './strategy.types.js';

export const DEFAULT_STRATEGIES_PATH = fileURLToPath(
  new URL('../../config/strategies.json', import.meta.url)
);

export class StrategyConfigurationError extends Error {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly value?: unknown
  ) {
    super(message);
    this.name = 'StrategyConfigurationError';
  }
}

function requireString(raw: Record<string, unknown>, key: string): string {
  const value = readString(raw, key);
  if (value === undefined || value.trim() === '') {
    throw new StrategyConfigurationError(`${key} is required`, key, raw[key]);
  }
  return value;
}

function requirePositive(raw: Record<string, unknown>, key: string): number {
  const value = readNumber(raw, key);
  if (value === undefined || value <= 0) {
    throw new StrategyConfigurationError(`${key} must be a positive number`, key, raw[key]);
  }
  return value;
}

function requireInteger(raw: Record<string, unknown>, key: string): number {
  const value = requirePositive(raw, key);
  if (!Number.isInteger(value)) {
    throw new StrategyConfigurationError(`${key} must be a positive integer`, key, value);
  }
  return value;
}

function requireOneOf<T extends string>(
  raw: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T {
  const value = raw[key];
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new StrategyConfigurationError(`${key} must be one of ${allowed.join(', ')}`, key, value);
  }
  return match;
}

/**
 * Validates one raw configuration entry and returns the typed config.
 */
export function parseStrategyConfig(raw: unknown): StrategyConfig {
  if (!isRecord(raw)) {
    throw new StrategyConfigurationError('Strategy configuration must be an object', 'config', raw);
  }

  const id = requireString(raw, 'id');
  const venueId = requireString(raw, 'venueId');
  const type = requireOneOf(raw, 'type', ['GRID', 'MARTINGALE', 'SIGNAL', 'TREND'] as const);

  switch (type) {
    case 'GRID':
      return {
        type,
        id,
        venueId,
        symbol: requireString(raw, 'symbol'),
        referencePrice: requirePositive(raw, 'referencePrice'),
        spacing: requirePositive(raw, 'spacing'),
        levels: requireInteger(raw, 'levels'),
        quantity: requirePositive(raw, 'quantity'),
      };

    case 'MARTINGALE': {
      const scaleFactor = requirePositive(raw, 'scaleFactor');
      if (scaleFactor < 1) {
        throw new StrategyConfigurationError('scaleFactor must be at least 1', 'scaleFactor', scaleFactor);
      }
      return {
        type,
        id,
        venueId,
        symbol: requireString(raw, 'symbol'),
        side: requireOneOf(raw, 'side', ['BUY', 'SELL'] as const),
        baseQuantity: requirePositive(raw, 'baseQuantity'),
        scaleFactor,
        maxLevel: requireInteger(raw, 'maxLevel'),
        emergencyStopLoss: requirePositive(raw, 'emergencyStopLoss'),
        stopLossDistance: requirePositive(raw, 'stopLossDistance'),
        takeProfitDistance: requirePositive(raw, 'takeProfitDistance'),
      };
    }

    case 'SIGNAL':
      return {
        type,
        id,
        venueId,
        defaultQuantity: requirePositive(raw, 'defaultQuantity'),
        maxSignalAgeMs: requirePositive(raw, 'maxSignalAgeMs'),
        entryKind: requireOneOf(raw, 'entryKind', ['MARKET', 'LIMIT'] as const),
      };

    case 'TREND': {
      const fastPeriod = requireInteger(raw, 'fastPeriod');
      const slowPeriod = requireInteger(raw, 'slowPeriod');
      if (fastPeriod >= slowPeriod) {
        throw new StrategyConfigurationError(
          `fastPeriod (${fastPeriod}) must be shorter than slowPeriod (${slowPeriod})`,
          'fastPeriod',
          fastPeriod
        );
      }
      return {
        type,
        id,
        venueId,
        symbol: requireString(raw, 'symbol'),
        fastPeriod,
        slowPeriod,
        quantity: requirePositive(raw, 'quantity'),
        trailingDistance: requirePositive(raw, 'trailingDistance'),
      };
    }
  }
}

export function parseStrategyConfigs(raw: unknown): StrategyConfig[] {
  const entries: unknown = isRecord(raw) ? raw['strategies'] : raw;
  if (!Array.isArray(entries)) {
    throw new StrategyConfigurationError('Expected a list of strategies', 'strategies', entries);
  }

  const configs = entries.map(parseStrategyConfig);
  const seen = new Set<string>();
  for (const config of configs) {
    if (seen.has(config.id)) {
      throw new StrategyConfigurationError(`Duplicate strategy id ${config.id}`, 'id', config.id);
    }
    seen.add(config.id);
  }
  return configs;
}

/** Reads config/strategies.json, or STRATEGIES_PATH when set. */
export function loadStrategyConfigs(
  path: string = process.env['STRATEGIES_PATH'] ?? DEFAULT_STRATEGIES_PATH
): StrategyConfig[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseStrategyConfigs(raw);
}

export function createStrategy(config: StrategyConfig): TradingStrategy {
  switch (config.type) {
    case 'GRID':
      return new GridStrategy(config);
    case 'MARTINGALE':
      return new MartingaleStrategy(config);
    case 'SIGNAL':
      return new SignalDrivenStrategy(config);
    case 'TREND':
      return new TrendFollowingStrategy(config);
  }
}
