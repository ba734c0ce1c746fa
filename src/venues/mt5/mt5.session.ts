import type pino from 'pino';
import { getComponentLogger } from '../../config/logger.js';
import {
  AmbiguousOrderError,
  AuthError,
  createTradingError,
  CriticalVenueError,
  InvalidOrderError,
  NetworkError,
} from '../../errors/trading-errors.js';
import type { AccountState, PositionState } from '../../execution/types/execution.types.js';
import { isRecord, readNumeric, readString } from '../../utils/guards.js';
import { mergePosition } from '../position-merge.js';
import { requestVenueJson, type FetchLike } from '../venue-http.client.js';
import type {
  ClosePositionRequest,
  ClosePositionResult,
  VenueCredentials,
  VenueOrderRef,
  VenueOrderState,
  VenueOrderStatus,
  VenueRequest,
  VenueResponse,
  VenueSession,
} from '../venue.types.js';
import { MT5_POSITION_CLOSED_RETCODE, MT5_RETCODES, mt5KindForRetcode, type Mt5OrderState } from './mt5.types.js';

type BridgeCredentials = { token: string; account: string };

const MT5_ORDER_STATUS: Readonly<Record<Mt5OrderState, VenueOrderStatus>> = {
  STARTED: 'OPEN',
  PLACED: 'OPEN',
  PARTIAL: 'PARTIALLY_FILLED',
  FILLED: 'FILLED',
  CANCELED: 'CANCELED',
  REJECTED: 'CANCELED',
  EXPIRED: 'CANCELED',
};

function isMt5OrderState(value: string | undefined): value is Mt5OrderState {
  return value !== undefined && value in MT5_ORDER_STATUS;
}

export interface Mt5SessionConfig {
  bridgeUrl: string;
  fetchImpl?: FetchLike;
}

/**
 * Session against the MT5 HTTP bridge. The bridge owns the terminal login;
 * this side authenticates with a bearer token scoped to one account.
 */
export class Mt5Session implements VenueSession {
  readonly venueId = 'mt5';
  private credentials: BridgeCredentials | null = null;
  private readonly logger: pino.Logger;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly config: Mt5SessionConfig) {
    this.logger = getComponentLogger('mt5-session');
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async connect(credentials: VenueCredentials, signal?: AbortSignal): Promise<void> {
    if (credentials.venue !== 'mt5') {
      throw new AuthError('MT5 session received credentials for another venue', {
        venueId: this.venueId,
      });
    }
    if (!credentials.token || !credentials.account) {
      throw new AuthError('MT5 bridge token and account are required', {
        venueId: this.venueId,
      });
    }

    const body = await this.request(
      'POST',
      '/session',
      { token: credentials.token, account: credentials.account },
      JSON.stringify({ account: credentials.account }),
      signal
    );
    if (!isRecord(body) || body['connected'] !== true) {
      throw new NetworkError(
        `MT5 bridge could not attach to the terminal: ${isRecord(body) ? readString(body, 'error') ?? 'unknown' : 'malformed response'}`,
        { venueId: this.venueId }
      );
    }

    this.assertAccount(readNumeric(body, 'login'), credentials.account);
    this.credentials = { token: credentials.token, account: credentials.account };
    this.logger.info({ account: credentials.account }, 'MT5 bridge session attached');
  }

  async placeOrder(request: VenueRequest, signal?: AbortSignal): Promise<VenueResponse> {
    if (request.venue !== 'mt5') {
      throw new NetworkError('MT5 session cannot place a request built for another venue', {
        venueId: this.venueId,
      });
    }
    const credentials = this.requireCredentials();
    const body = await this.request('POST', '/order', credentials, JSON.stringify(request.body), signal, true);
    const retcode = isRecord(body) ? readNumeric(body, 'retcode') : undefined;

    // The bridge answered, so the terminal may have executed the order
    if (!isRecord(body) || retcode === undefined) {
      throw new AmbiguousOrderError('MT5 bridge returned an order result without retcode', {
        venueId: this.venueId,
      });
    }

    return {
      venue: 'mt5',
      result: {
        retcode,
        comment: readString(body, 'comment') ?? '',
        order: readNumeric(body, 'order'),
        deal: readNumeric(body, 'deal'),
        volume: readNumeric(body, 'volume'),
        price: readNumeric(body, 'price'),
      },
    };
  }

  async getAccountSnapshot(signal?: AbortSignal): Promise<AccountState> {
    const credentials = this.requireCredentials();
    const account = await this.request('GET', '/account', credentials, undefined, signal);
    const positions = await this.request('GET', '/positions', credentials, undefined, signal);

    if (!isRecord(account) || !Array.isArray(positions)) {
      throw new NetworkError('MT5 bridge returned a malformed account state', {
        venueId: this.venueId,
      });
    }

    const login = readNumeric(account, 'login');
    this.assertAccount(login, credentials.account);

    const positionMap: Record<string, PositionState> = {};
    for (const position of positions.filter(isRecord)) {
      const symbol = readString(position, 'symbol');
      const volume = readNumeric(position, 'volume') ?? 0;
      if (!symbol || volume === 0) {
        continue;
      }
      const signed = readString(position, 'type') === 'SELL' ? -volume : volume;
      positionMap[symbol] = mergePosition(
        positionMap[symbol],
        signed,
        readNumeric(position, 'price_open') ?? 0,
        readNumeric(position, 'profit') ?? 0
      );
    }

    return {
      accountId: String(login ?? credentials.account),
      balance: readNumeric(account, 'balance') ?? 0,
      equity: readNumeric(account, 'equity') ?? 0,
      marginLevel: readNumeric(account, 'margin_level') ?? null,
      realizedPnlToday: readNumeric(account, 'realized_pnl_today') ?? 0,
      positions: positionMap,
    };
  }

  async cancelOrder(ref: VenueOrderRef, signal?: AbortSignal): Promise<VenueOrderRef> {
    const credentials = this.requireCredentials();
    const ticket = this.requireTicketOrClientId(ref);

    const body = await this.request(
      'POST',
      '/order/cancel',
      credentials,
      JSON.stringify({ symbol: ref.symbol, ticket, clientOrderId: ref.clientOrderId }),
      signal
    );
    const retcode = isRecord(body) ? readNumeric(body, 'retcode') : undefined;
    if (!isRecord(body) || retcode === undefined) {
      throw new NetworkError('MT5 bridge returned a cancel result without retcode', { venueId: this.venueId });
    }
    if (retcode !== MT5_RETCODES.DONE) {
      const kind = mt5KindForRetcode(retcode);
      throw createTradingError(
        kind === 'AMBIGUOUS' ? 'TIMEOUT' : kind,
        `MT5 cancel failed: ${retcode} ${readString(body, 'comment') ?? ''}`.trim(),
        { venueId: this.venueId, venueCode: String(retcode) }
      );
    }

    const order = readNumeric(body, 'order');
    this.logger.info({ symbol: ref.symbol, ticket: order ?? ticket }, 'MT5 order canceled');
    return {
      symbol: ref.symbol,
      venueOrderId: order !== undefined ? String(order) : ref.venueOrderId,
      clientOrderId: ref.clientOrderId,
    };
  }

  async getOrder(ref: VenueOrderRef, signal?: AbortSignal): Promise<VenueOrderState | null> {
    const credentials = this.requireCredentials();
    const ticket = this.requireTicketOrClientId(ref);
    const params = new URLSearchParams({ symbol: ref.symbol });
    if (ticket !== undefined) {
      params.set('ticket', String(ticket));
    }
    if (ref.clientOrderId) {
      params.set('clientOrderId', ref.clientOrderId);
    }

    const body = await this.request('GET', `/orders/lookup?${params.toString()}`, credentials, undefined, signal);
    if (!isRecord(body)) {
      throw new NetworkError('MT5 bridge returned a malformed order lookup', { venueId: this.venueId });
    }
    const order = body['order'];
    return isRecord(order) ? this.toOrderState(order) : null;
  }

  async listOpenOrders(symbol?: string, signal?: AbortSignal): Promise<VenueOrderState[]> {
    const credentials = this.requireCredentials();
    const path = symbol ? `/orders?${new URLSearchParams({ symbol }).toString()}` : '/orders';

    const body = await this.request('GET', path, credentials, undefined, signal);
    if (!Array.isArray(body)) {
      throw new NetworkError('MT5 bridge returned a malformed order list', { venueId: this.venueId });
    }
    return body.filter(isRecord).map(order => this.toOrderState(order));
  }

  async closePosition(request: ClosePositionRequest, signal?: AbortSignal): Promise<ClosePositionResult> {
    const credentials = this.requireCredentials();
    const body = await this.request(
      'POST',
      '/position/close',
      credentials,
      JSON.stringify({ symbol: request.symbol }),
      signal,
      true
    );
    const retcode = isRecord(body) ? readNumeric(body, 'retcode') : undefined;
    if (!isRecord(body) || retcode === undefined) {
      throw new AmbiguousOrderError('MT5 bridge returned a close result without retcode', {
        venueId: this.venueId,
      });
    }

    const comment = readString(body, 'comment') ?? '';
    if (retcode === MT5_POSITION_CLOSED_RETCODE) {
      return { symbol: request.symbol, closed: false, message: comment || 'No open position' };
    }
    if (retcode !== MT5_RETCODES.DONE && retcode !== MT5_RETCODES.DONE_PARTIAL) {
      throw createTradingError(mt5KindForRetcode(retcode), `MT5 close failed: ${retcode} ${comment}`.trim(), {
        venueId: this.venueId,
        venueCode: String(retcode),
      });
    }

    this.logger.info({ symbol: request.symbol, retcode }, 'MT5 position closed');
    return {
      symbol: request.symbol,
      closed: true,
      message: retcode === MT5_RETCODES.DONE ? 'Position closed' : 'Position partially closed',
    };
  }

  async disconnect(): Promise<void> {
    const credentials = this.credentials;
    this.credentials = null;
    if (!credentials) {
      return;
    }
    try {
      await this.request('POST', '/session/close', credentials, '{}');
    } catch (error) {
      // Local state is already released; the bridge expires idle sessions
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'MT5 bridge session close failed'
      );
    }
  }

  private requireCredentials(): BridgeCredentials {
    if (!this.credentials) {
      throw new NetworkError('MT5 session is not connected', { venueId: this.venueId });
    }
    return this.credentials;
  }

  /** The bridge must stay logged into the account this session was opened for. */
  private assertAccount(login: number | undefined, account: string): void {
    if (login !== undefined && String(login) !== account) {
      throw new CriticalVenueError(`MT5 bridge reports account ${login}, session is bound to ${account}`, {
        venueId: this.venueId,
      });
    }
  }

  private requireTicketOrClientId(ref: VenueOrderRef): number | undefined {
    const ticket = ref.venueOrderId !== undefined ? Number(ref.venueOrderId) : undefined;
    if (ticket !== undefined && !Number.isInteger(ticket)) {
      throw new InvalidOrderError(`MT5 ticket must be an integer. Got: ${ref.venueOrderId}`, {
        venueId: this.venueId,
      });
    }
    if (ticket === undefined && !ref.clientOrderId) {
      throw new InvalidOrderError('An order ticket or client order id is required', { venueId: this.venueId });
    }
    return ticket;
  }

  private toOrderState(order: Record<string, unknown>): VenueOrderState {
    const state = readString(order, 'state');
    const initial = readNumeric(order, 'volume_initial') ?? 0;
    const remaining = readNumeric(order, 'volume_current') ?? initial;
    const filled = Number((initial - remaining).toFixed(8));
    const ticket = readNumeric(order, 'ticket');
    return {
      symbol: readString(order, 'symbol') ?? '',
      venueOrderId: ticket !== undefined ? String(ticket) : '',
      clientOrderId: readString(order, 'client_order_id'),
      side: (readString(order, 'type') ?? 'BUY').startsWith('SELL') ? 'SELL' : 'BUY',
      status: isMt5OrderState(state) ? MT5_ORDER_STATUS[state] : 'OPEN',
      quantity: initial,
      filledQuantity: filled,
      averagePrice: filled > 0 ? readNumeric(order, 'price_current') ?? readNumeric(order, 'price_open') ?? null : null,
    };
  }

  private request(
    method: 'GET' | 'POST',
    path: string,
    credentials: BridgeCredentials,
    body: string | undefined,
    signal?: AbortSignal,
    placement = false
  ): Promise<unknown> {
    return requestVenueJson(
      this.venueId,
      {
        method,
        url: `${this.config.bridgeUrl}${path}`,
        headers: {
          Authorization: `Bearer ${credentials.token}`,
          'X-MT5-Account': credentials.account,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body,
        signal,
        placement,
      },
      this.fetchImpl
    );
  }
}
