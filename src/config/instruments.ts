import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { OrderKind } from '../execution/types/execution.types.js';
import type { VenueId } from '../venues/venue.types.js';
import { isRecord, readNumber, readString } from '../utils/guards.js';

export interface TradingSession {
  /** 0 = Sunday, UTC */
  days: number[];
  /** "HH:MM" UTC, inclusive */
  open: string;
  /** "HH:MM" UTC, exclusive; "24:00" closes at midnight */
  close: string;
}

export interface InstrumentSpec {
  symbol: string;
  tickSize: number;
  lotSize: number;
  minQuantity: number;
  quantityUnit: string;
  quoteCurrency: string;
  orderKinds: readonly OrderKind[];
  tradable: boolean;
  /** null means the market never closes */
  tradingHours: { sessions: TradingSession[] } | null;
  contractType: string;
  contractSize: number;
  tradeMode?: string;
}

export type InstrumentCatalog = ReadonlyMap<
  VenueId,
  ReadonlyMap<string, Readonly<InstrumentSpec>>
>;

export class InstrumentConfigError extends Error {
  constructor(public readonly errors: string[]) {
    super(`Invalid instrument configuration: ${errors.join('; ')}`);
    this.name = 'InstrumentConfigError';
  }
}

const ORDER_KINDS: readonly OrderKind[] = ['MARKET', 'LIMIT', 'STOP'];
const TIME_PATTERN = /^([01]\d|2[0-4]):([0-5]\d)$/;

export const DEFAULT_INSTRUMENTS_PATH = fileURLToPath(
  new URL('../../config/instruments.json', import.meta.url)
);

function parseSessions(
  raw: unknown,
  path: string,
  errors: string[]
): { sessions: TradingSession[] } | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const rawSessions: unknown = isRecord(raw) ? raw['sessions'] : undefined;
  if (!Array.isArray(rawSessions)) {
    errors.push(`${path}.tradingHours must be null or { sessions: [] }`);
    return null;
  }

  const sessions: TradingSession[] = [];
  rawSessions.forEach((entry: unknown, index: number) => {
    const at = `${path}.tradingHours.sessions[${index}]`;
    if (!isRecord(entry)) {
      errors.push(`${at} must be an object`);
      return;
    }
    const rawDays: unknown = entry['days'];
    const days = Array.isArray(rawDays)
      ? rawDays.filter(
          (day: unknown): day is number =>
            typeof day === 'number' && Number.isInteger(day) && day >= 0 && day <= 6
        )
      : [];
    const open = readString(entry, 'open');
    const close = readString(entry, 'close');
    if (days.length === 0) {
      errors.push(`${at}.days must list weekdays 0-6`);
    }
    if (!open || !TIME_PATTERN.test(open) || !close || !TIME_PATTERN.test(close)) {
      errors.push(`${at} open/close must be HH:MM`);
      return;
    }
    sessions.push({ days, open, close });
  });

  return { sessions };
}

function parseInstrument(
  symbol: string,
  raw: unknown,
  path: string,
  errors: string[]
): InstrumentSpec | null {
  if (!isRecord(raw)) {
    errors.push(`${path} must be an object`);
    return null;
  }

  const tickSize = readNumber(raw, 'tickSize');
  const lotSize = readNumber(raw, 'lotSize');
  const minQuantity = readNumber(raw, 'minQuantity');
  const quantityUnit = readString(raw, 'quantityUnit');
  const quoteCurrency = readString(raw, 'quoteCurrency');
  const contractType = readString(raw, 'contractType') ?? 'SPOT';
  const contractSize = readNumber(raw, 'contractSize') ?? 1;
  const rawKinds: unknown = raw['orderKinds'];
  const orderKinds = Array.isArray(rawKinds)
    ? ORDER_KINDS.filter(kind => rawKinds.includes(kind))
    : [];

  if (tickSize === undefined || tickSize <= 0) {
    errors.push(`${path}.tickSize must be a positive number`);
  }
  if (lotSize === undefined || lotSize <= 0) {
    errors.push(`${path}.lotSize must be a positive number`);
  }
  if (minQuantity === undefined || minQuantity <= 0) {
    errors.push(`${path}.minQuantity must be a positive number`);
  }
  if (!quantityUnit) {
    errors.push(`${path}.quantityUnit is required`);
  }
  if (!quoteCurrency) {
    errors.push(`${path}.quoteCurrency is required`);
  }
  if (orderKinds.length === 0) {
    errors.push(`${path}.orderKinds must list at least one of ${ORDER_KINDS.join(', ')}`);
  }

  const tradingHours = parseSessions(raw['tradingHours'], path, errors);

  if (
    tickSize === undefined ||
    lotSize === undefined ||
    minQuantity === undefined ||
    !quantityUnit ||
    !quoteCurrency
  ) {
    return null;
  }

  return {
    symbol,
    tickSize,
    lotSize,
    minQuantity,
    quantityUnit,
    quoteCurrency,
    orderKinds,
    tradable: raw['tradable'] !== false,
    tradingHours,
    contractType,
    contractSize,
    tradeMode: readString(raw, 'tradeMode'),
  };
}

/**
 * Validates a raw `{ venueId: { symbol: spec } }` document and freezes it.
 */
export function parseInstrumentCatalog(raw: unknown): InstrumentCatalog {
  const errors: string[] = [];
  const catalog = new Map<VenueId, ReadonlyMap<string, Readonly<InstrumentSpec>>>();

  if (!isRecord(raw)) {
    throw new InstrumentConfigError(['root must be an object keyed by venue id']);
  }

  for (const [venueId, instruments] of Object.entries(raw)) {
    if (!isRecord(instruments)) {
      errors.push(`${venueId} must be an object keyed by symbol`);
      continue;
    }
    const specs = new Map<string, Readonly<InstrumentSpec>>();
    for (const [symbol, spec] of Object.entries(instruments)) {
      const parsed = parseInstrument(symbol, spec, `${venueId}.${symbol}`, errors);
      if (parsed) {
        specs.set(symbol, Object.freeze(parsed));
      }
    }
    catalog.set(venueId, specs);
  }

  if (errors.length > 0) {
    throw new InstrumentConfigError(errors);
  }

  return catalog;
}

export function loadInstrumentCatalog(
  path: string = process.env['INSTRUMENTS_PATH'] ?? DEFAULT_INSTRUMENTS_PATH
): InstrumentCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return parseInstrumentCatalog(raw);
}

export function getInstrumentSpec(
  catalog: InstrumentCatalog,
  venueId: VenueId,
  symbol: string
): Readonly<InstrumentSpec> | undefined {
  return catalog.get(venueId)?.get(symbol);
}

function minutesOf(time: string): number {
  const [hours, minutes] = time.split(':');
  return Number(hours) * 60 + Number(minutes);
}

/**
 * Market calendar check against the instrument's weekly UTC sessions.
 */
export function isMarketOpen(spec: InstrumentSpec, now: Date): boolean {
  if (spec.tradingHours === null) {
    return true;
  }

  const day = now.getUTCDay();
  const minute = now.getUTCHours() * 60 + now.getUTCMinutes();

  return spec.tradingHours.sessions.some(
    session =>
      session.days.includes(day) &&
      minute >= minutesOf(session.open) &&
      minute < minutesOf(session.close)
  );
}
