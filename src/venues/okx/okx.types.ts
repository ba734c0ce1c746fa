/**
 * OKX V5 API type definitions
 *
 * Production: https://www.okx.com
 * Demo trading: same host with the x-simulated-trading header
 */

export interface OkxCredentials {
  venue: 'okx';
  apiKey: string;
  secretKey: string;
  passphrase: string;
}

export interface OkxApiResponse<T> {
  readonly code: string;
  readonly msg: string;
  readonly data: T[];
}

export type OkxOrderSide = 'buy' | 'sell';
export type OkxOrderType = 'market' | 'limit';
export type OkxTradeMode = 'cross' | 'isolated' | 'cash';

export type OkxOrderState =
  | 'live'
  | 'partially_filled'
  | 'filled'
  | 'canceled'
  | 'mmp_canceled';

/** Protective orders attached to the parent order */
export interface OkxAttachedAlgo {
  readonly tpTriggerPx?: string;
  readonly tpOrdPx?: string;
  readonly slTriggerPx?: string;
  readonly slOrdPx?: string;
}

export interface OkxOrderRequest {
  readonly instId: string;
  readonly tdMode: OkxTradeMode;
  readonly side: OkxOrderSide;
  readonly ordType: OkxOrderType;
  readonly sz: string;
  readonly px?: string;
  readonly clOrdId: string;
  readonly attachAlgoOrds?: OkxAttachedAlgo[];
}

/** Trigger (stop) order placed through /trade/order-algo */
export interface OkxAlgoOrderRequest {
  readonly instId: string;
  readonly tdMode: OkxTradeMode;
  readonly side: OkxOrderSide;
  readonly ordType: 'trigger';
  readonly sz: string;
  readonly triggerPx: string;
  /** -1 executes at market once triggered */
  readonly orderPx: string;
  readonly algoClOrdId: string;
  readonly attachAlgoOrds?: OkxAttachedAlgo[];
}

export interface OkxOrderDetail {
  readonly ordId: string;
  readonly state: OkxOrderState | string;
  readonly fillSz: number;
  readonly avgPx: number | null;
}

export type OkxVenueRequest =
  | { venue: 'okx'; kind: 'order'; body: OkxOrderRequest }
  | { venue: 'okx'; kind: 'algo'; body: OkxAlgoOrderRequest };

export interface OkxVenueResponse {
  venue: 'okx';
  kind: 'order' | 'algo';
  /** Effective code: the per-order sCode when present, else the top-level code */
  code: string;
  message: string;
  ordId?: string;
  detail?: OkxOrderDetail;
}

export const OKX_ENDPOINTS = {
  ACCOUNT_CONFIG: '/api/v5/account/config',
  BALANCE: '/api/v5/account/balance',
  POSITIONS: '/api/v5/account/positions',
  PLACE_ORDER: '/api/v5/trade/order',
  PLACE_ALGO_ORDER: '/api/v5/trade/order-algo',
  ORDER_DETAIL: '/api/v5/trade/order',
  CANCEL_ORDER: '/api/v5/trade/cancel-order',
  PENDING_ORDERS: '/api/v5/trade/orders-pending',
  CLOSE_POSITION: '/api/v5/trade/close-position',
  TICKER: '/api/v5/market/ticker',
} as const;
