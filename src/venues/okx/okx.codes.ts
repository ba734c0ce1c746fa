import type { ErrorKind } from '../../errors/trading-errors.js';

/**
 * OKX V5 error codes and their taxonomy kind. Codes missing from this table
 * resolve to UNKNOWN_VENUE_ERROR.
 */
const OKX_CODE_KINDS: Readonly<Record<string, ErrorKind>> = {
  '50001': 'NETWORK_ERROR', // service temporarily unavailable
  '50004': 'AMBIGUOUS', // endpoint request timeout, order state unknown
  '50011': 'RATE_LIMITED',
  '50013': 'NETWORK_ERROR', // systems busy
  '50061': 'RATE_LIMITED', // sub-account rate limit
  '50100': 'AUTH_ERROR',
  '50101': 'AUTH_ERROR',
  '50102': 'AUTH_ERROR',
  '50103': 'AUTH_ERROR',
  '50104': 'AUTH_ERROR',
  '50105': 'AUTH_ERROR',
  '50106': 'AUTH_ERROR',
  '50107': 'AUTH_ERROR',
  '50108': 'AUTH_ERROR',
  '50109': 'AUTH_ERROR',
  '50110': 'AUTH_ERROR',
  '50111': 'AUTH_ERROR',
  '50112': 'AUTH_ERROR',
  '50113': 'AUTH_ERROR',
  '51000': 'INVALID_ORDER',
  '51001': 'INVALID_ORDER', // instrument does not exist
  '51004': 'VENUE_REJECTED', // leverage tier position cap
  '51006': 'INVALID_ORDER', // price outside limit
  '51008': 'INSUFFICIENT_FUNDS',
  '51009': 'VENUE_REJECTED', // order placement blocked
  '51010': 'VENUE_REJECTED',
  '51016': 'VENUE_REJECTED', // duplicated clOrdId
  '51020': 'INVALID_ORDER', // size below minimum
  '51121': 'INVALID_ORDER', // size not a lot multiple
  '51127': 'INSUFFICIENT_FUNDS',
  '51400': 'VENUE_REJECTED', // cancellation failed
  '51401': 'VENUE_REJECTED', // already canceled
  '51402': 'VENUE_REJECTED', // already completed
  '51603': 'INVALID_ORDER', // order does not exist
  '51023': 'VENUE_REJECTED', // position does not exist
};

export const OKX_ORDER_NOT_FOUND_CODE = '51603';
export const OKX_NO_POSITION_CODE = '51023';

export const OKX_SUCCESS_CODE = '0';

export function okxKindForCode(code: string): ErrorKind {
  return OKX_CODE_KINDS[code] ?? 'UNKNOWN_VENUE_ERROR';
}
