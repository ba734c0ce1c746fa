import type { ErrorKind } from '../../errors/trading-errors.js';

/**
 * MetaTrader 5 terminal reached through an HTTP bridge that forwards
 * `order_send` requests and account queries to the terminal.
 */

export interface Mt5Credentials {
  venue: 'mt5';
  token: string;
  account: string;
}

export type Mt5TradeAction = 'DEAL' | 'PENDING';

export type Mt5OrderType =
  | 'BUY'
  | 'SELL'
  | 'BUY_LIMIT'
  | 'SELL_LIMIT'
  | 'BUY_STOP'
  | 'SELL_STOP';

export interface Mt5OrderRequest {
  readonly action: Mt5TradeAction;
  readonly symbol: string;
  readonly type: Mt5OrderType;
  readonly volume: number;
  readonly price?: number;
  readonly sl?: number;
  readonly tp?: number;
  /** Max slippage in points for market deals */
  readonly deviation: number;
  /** Terminal comment, limited to 31 characters */
  readonly comment: string;
  /** Full idempotency key, deduplicated by the bridge */
  readonly clientOrderId: string;
}

export interface Mt5OrderResult {
  readonly retcode: number;
  readonly comment: string;
  readonly order?: number;
  readonly deal?: number;
  readonly volume?: number;
  readonly price?: number;
}

export interface Mt5VenueRequest {
  venue: 'mt5';
  body: Mt5OrderRequest;
}

export interface Mt5VenueResponse {
  venue: 'mt5';
  result: Mt5OrderResult;
}

/** Trade server return codes (MqlTradeResult.retcode) */
export const MT5_RETCODES = {
  REQUOTE: 10004,
  REJECT: 10006,
  CANCEL: 10007,
  PLACED: 10008,
  DONE: 10009,
  DONE_PARTIAL: 10010,
  ERROR: 10011,
  TIMEOUT: 10012,
  INVALID: 10013,
  INVALID_VOLUME: 10014,
  INVALID_PRICE: 10015,
  INVALID_STOPS: 10016,
  TRADE_DISABLED: 10017,
  MARKET_CLOSED: 10018,
  NO_MONEY: 10019,
  PRICE_CHANGED: 10020,
  PRICE_OFF: 10021,
  TOO_MANY_REQUESTS: 10024,
  CONNECTION: 10031,
} as const;

const MT5_RETCODE_KINDS: ReadonlyMap<number, ErrorKind> = new Map<number, ErrorKind>([
  [MT5_RETCODES.REQUOTE, 'NETWORK_ERROR'],
  [MT5_RETCODES.PRICE_CHANGED, 'NETWORK_ERROR'],
  [MT5_RETCODES.PRICE_OFF, 'NETWORK_ERROR'],
  [MT5_RETCODES.TOO_MANY_REQUESTS, 'RATE_LIMITED'],
  [MT5_RETCODES.CONNECTION, 'NETWORK_ERROR'],
  [MT5_RETCODES.TIMEOUT, 'AMBIGUOUS'],
  [MT5_RETCODES.REJECT, 'VENUE_REJECTED'],
  [MT5_RETCODES.CANCEL, 'VENUE_REJECTED'],
  [MT5_RETCODES.ERROR, 'VENUE_REJECTED'],
  [MT5_RETCODES.INVALID, 'INVALID_ORDER'],
  [MT5_RETCODES.INVALID_VOLUME, 'INVALID_ORDER'],
  [MT5_RETCODES.INVALID_PRICE, 'INVALID_ORDER'],
  [MT5_RETCODES.INVALID_STOPS, 'INVALID_ORDER'],
  [MT5_RETCODES.TRADE_DISABLED, 'VENUE_REJECTED'],
  [MT5_RETCODES.MARKET_CLOSED, 'VENUE_REJECTED'],
  [MT5_RETCODES.NO_MONEY, 'INSUFFICIENT_FUNDS'],
]);

export function mt5KindForRetcode(retcode: number): ErrorKind {
  return MT5_RETCODE_KINDS.get(retcode) ?? 'UNKNOWN_VENUE_ERROR';
}

export const MT5_POSITION_CLOSED_RETCODE = 10036;

/** Order row as reported by the bridge's order lookups */
export type Mt5OrderState =
  | 'STARTED'
  | 'PLACED'
  | 'PARTIAL'
  | 'FILLED'
  | 'CANCELED'
  | 'REJECTED'
  | 'EXPIRED';
