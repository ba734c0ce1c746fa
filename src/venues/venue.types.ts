import type { AccountState, OrderSide } from '../execution/types/execution.types.js';
import type { OkxCredentials, OkxVenueRequest, OkxVenueResponse } from './okx/okx.types.js';
import type { Mt5Credentials, Mt5VenueRequest, Mt5VenueResponse } from './mt5/mt5.types.js';

/**
 * Venue identity. Components key everything by this string, so a new venue
 * only needs a session, a translator and a registry entry.
 */
export type VenueId = string;

export const KNOWN_VENUES = ['okx', 'mt5'] as const;
export type KnownVenueId = (typeof KNOWN_VENUES)[number];

export type VenueCredentials = OkxCredentials | Mt5Credentials;

/** Venue-native payload produced by an OrderTranslator. */
export type VenueRequest = OkxVenueRequest | Mt5VenueRequest;

/** Venue-native answer consumed by an OrderTranslator. */
export type VenueResponse = OkxVenueResponse | Mt5VenueResponse;

/** Identifies one order at a venue, by venue id or by the client id sent with it. */
export interface VenueOrderRef {
  symbol: string;
  venueOrderId?: string;
  clientOrderId?: string;
}

export type VenueOrderStatus = 'OPEN' | 'PARTIALLY_FILLED' | 'FILLED' | 'CANCELED';

export interface VenueOrderState {
  symbol: string;
  venueOrderId: string;
  clientOrderId?: string;
  side: OrderSide;
  status: VenueOrderStatus;
  quantity: number;
  filledQuantity: number;
  averagePrice: number | null;
}

export interface ClosePositionRequest {
  symbol: string;
  /** OKX margin mode of the position; ignored by MT5 */
  marginMode?: 'cross' | 'isolated';
}

export interface ClosePositionResult {
  symbol: string;
  closed: boolean;
  message: string;
}

/**
 * Low-level connection to one venue. Implementations throw taxonomy errors
 * (`TradingError`) for transport failures and return venue-level answers,
 * including business rejections, as `VenueResponse`.
 */
export interface VenueSession {
  readonly venueId: VenueId;
  connect(credentials: VenueCredentials, signal?: AbortSignal): Promise<void>;
  placeOrder(request: VenueRequest, signal?: AbortSignal): Promise<VenueResponse>;
  getAccountSnapshot(signal?: AbortSignal): Promise<AccountState>;
  /** @throws a taxonomy error when the venue refuses the cancel */
  cancelOrder(ref: VenueOrderRef, signal?: AbortSignal): Promise<VenueOrderRef>;
  /** Null when the venue has no order under that reference */
  getOrder(ref: VenueOrderRef, signal?: AbortSignal): Promise<VenueOrderState | null>;
  listOpenOrders(symbol?: string, signal?: AbortSignal): Promise<VenueOrderState[]>;
  /** Market-closes the whole position in `symbol` */
  closePosition(request: ClosePositionRequest, signal?: AbortSignal): Promise<ClosePositionResult>;
  disconnect(): Promise<void>;
}

/** Last traded price for a symbol, read from a public market endpoint. */
export interface TickerSource {
  readonly venueId: VenueId;
  lastPrice(symbol: string, signal?: AbortSignal): Promise<number>;
}
