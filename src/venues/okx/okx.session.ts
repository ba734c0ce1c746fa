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
import { isRecord, readNumeric, readRecords, readString } from '../../utils/guards.js';
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
import {
  OKX_NO_POSITION_CODE,
  OKX_ORDER_NOT_FOUND_CODE,
  OKX_SUCCESS_CODE,
  okxKindForCode,
} from './okx.codes.js';
import { buildQueryString, OkxSigner } from './okx-signer.js';
import { OKX_ENDPOINTS, type OkxOrderDetail, type OkxVenueResponse } from './okx.types.js';

const OKX_ORDER_STATUS: Readonly<Record<string, VenueOrderStatus>> = {
  live: 'OPEN',
  partially_filled: 'PARTIALLY_FILLED',
  filled: 'FILLED',
  canceled: 'CANCELED',
  mmp_canceled: 'CANCELED',
};

export interface OkxSessionConfig {
  baseUrl: string;
  simulated: boolean;
  /** Currency whose cash balance is reported as the account balance */
  settleCurrency: string;
  fetchImpl?: FetchLike;
  clock?: () => Date;
}

interface OkxEnvelope {
  code: string;
  msg: string;
  data: Record<string, unknown>[];
}

/**
 * OKX V5 REST session. Transport failures surface as taxonomy errors;
 * order-level answers, including rejections, are returned for translation.
 */
export class OkxSession implements VenueSession {
  readonly venueId = 'okx';
  private signer: OkxSigner | null = null;
  /** Account uid seen at connect; every snapshot must report the same one */
  private uid: string | undefined;
  private readonly logger: pino.Logger;
  private readonly fetchImpl: FetchLike;
  private readonly clock: () => Date;

  constructor(private readonly config: OkxSessionConfig) {
    this.logger = getComponentLogger('okx-session');
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.clock = config.clock ?? (() => new Date());
  }

  async connect(credentials: VenueCredentials, signal?: AbortSignal): Promise<void> {
    if (credentials.venue !== 'okx') {
      throw new AuthError('OKX session received credentials for another venue', {
        venueId: this.venueId,
      });
    }
    if (!credentials.apiKey || !credentials.secretKey || !credentials.passphrase) {
      throw new AuthError('OKX API key, secret and passphrase are required', {
        venueId: this.venueId,
      });
    }

    const signer = new OkxSigner(
      credentials.apiKey,
      credentials.secretKey,
      credentials.passphrase
    );
    const envelope = await this.request(signer, 'GET', OKX_ENDPOINTS.ACCOUNT_CONFIG, undefined, signal);
    this.assertSuccess(envelope, 'account config');

    this.signer = signer;
    this.uid = envelope.data[0] ? readString(envelope.data[0], 'uid') : undefined;
    this.logger.info({ uid: this.uid, simulated: this.config.simulated }, 'OKX session authenticated');
  }

  async placeOrder(request: VenueRequest, signal?: AbortSignal): Promise<VenueResponse> {
    if (request.venue !== 'okx') {
      throw new NetworkError('OKX session cannot place a request built for another venue', {
        venueId: this.venueId,
      });
    }
    const signer = this.requireSigner();
    const endpoint =
      request.kind === 'algo' ? OKX_ENDPOINTS.PLACE_ALGO_ORDER : OKX_ENDPOINTS.PLACE_ORDER;

    const envelope = await this.request(signer, 'POST', endpoint, JSON.stringify(request.body), signal, true);
    const ack = envelope.data[0];
    const sCode = ack ? readString(ack, 'sCode') : undefined;
    const useOrderCode = sCode !== undefined && sCode !== '';

    const response: OkxVenueResponse = {
      venue: 'okx',
      kind: request.kind,
      code: useOrderCode ? sCode : envelope.code,
      message: (useOrderCode && ack ? readString(ack, 'sMsg') : undefined) || envelope.msg,
      ordId: ack ? readString(ack, request.kind === 'algo' ? 'algoId' : 'ordId') : undefined,
    };

    if (
      response.code === OKX_SUCCESS_CODE &&
      request.kind === 'order' &&
      request.body.ordType === 'market' &&
      response.ordId
    ) {
      response.detail = await this.fetchOrderDetail(signer, request.body.instId, response.ordId, signal);
    }

    return response;
  }

  async getAccountSnapshot(signal?: AbortSignal): Promise<AccountState> {
    const signer = this.requireSigner();

    const config = await this.request(signer, 'GET', OKX_ENDPOINTS.ACCOUNT_CONFIG, undefined, signal);
    this.assertSuccess(config, 'account config');
    const uid = config.data[0] ? readString(config.data[0], 'uid') : undefined;
    if (this.uid !== undefined && uid !== undefined && uid !== this.uid) {
      throw new CriticalVenueError(`OKX reports account ${uid}, session is bound to ${this.uid}`, {
        venueId: this.venueId,
      });
    }

    const balance = await this.request(signer, 'GET', OKX_ENDPOINTS.BALANCE, undefined, signal);
    this.assertSuccess(balance, 'balance');
    const positions = await this.request(signer, 'GET', OKX_ENDPOINTS.POSITIONS, undefined, signal);
    this.assertSuccess(positions, 'positions');

    const account = balance.data[0] ?? {};
    const settle = readRecords(account, 'details').find(
      detail => readString(detail, 'ccy') === this.config.settleCurrency
    );

    const positionMap: Record<string, PositionState> = {};
    let realizedPnlToday = 0;
    for (const position of positions.data) {
      const instId = readString(position, 'instId');
      const size = readNumeric(position, 'pos') ?? 0;
      if (!instId || size === 0) {
        continue;
      }
      const signed = readString(position, 'posSide') === 'short' ? -Math.abs(size) : size;
      positionMap[instId] = mergePosition(
        positionMap[instId],
        signed,
        readNumeric(position, 'avgPx') ?? 0,
        readNumeric(position, 'upl') ?? 0
      );
      realizedPnlToday += readNumeric(position, 'realizedPnl') ?? 0;
    }

    return {
      accountId: uid ?? this.uid ?? 'okx',
      balance: settle ? readNumeric(settle, 'cashBal') ?? 0 : 0,
      equity: readNumeric(account, 'totalEq') ?? 0,
      marginLevel: readNumeric(account, 'mgnRatio') ?? null,
      realizedPnlToday,
      positions: positionMap,
    };
  }

  async cancelOrder(ref: VenueOrderRef, signal?: AbortSignal): Promise<VenueOrderRef> {
    const signer = this.requireSigner();
    this.assertIdentified(ref);

    const body = JSON.stringify({ instId: ref.symbol, ordId: ref.venueOrderId, clOrdId: ref.clientOrderId });
    const envelope = await this.request(signer, 'POST', OKX_ENDPOINTS.CANCEL_ORDER, body, signal);
    const ack = envelope.data[0];
    const sCode = ack ? readString(ack, 'sCode') : undefined;
    const code = sCode !== undefined && sCode !== '' ? sCode : envelope.code;
    if (code !== OKX_SUCCESS_CODE) {
      const kind = okxKindForCode(code);
      throw createTradingError(
        kind === 'AMBIGUOUS' ? 'TIMEOUT' : kind,
        `OKX cancel failed: ${code} ${(ack ? readString(ack, 'sMsg') : undefined) || envelope.msg}`,
        { venueId: this.venueId, venueCode: code }
      );
    }

    this.logger.info({ instId: ref.symbol, ordId: ref.venueOrderId, clOrdId: ref.clientOrderId }, 'OKX order canceled');
    return {
      symbol: ref.symbol,
      venueOrderId: (ack ? readString(ack, 'ordId') : undefined) || ref.venueOrderId,
      clientOrderId: (ack ? readString(ack, 'clOrdId') : undefined) || ref.clientOrderId,
    };
  }

  async getOrder(ref: VenueOrderRef, signal?: AbortSignal): Promise<VenueOrderState | null> {
    const signer = this.requireSigner();
    this.assertIdentified(ref);

    const query = buildQueryString({ instId: ref.symbol, ordId: ref.venueOrderId, clOrdId: ref.clientOrderId });
    const envelope = await this.request(signer, 'GET', `${OKX_ENDPOINTS.ORDER_DETAIL}?${query}`, undefined, signal);
    if (envelope.code === OKX_ORDER_NOT_FOUND_CODE) {
      return null;
    }
    this.assertSuccess(envelope, 'order lookup');

    const order = envelope.data[0];
    return order ? this.toOrderState(order, ref.symbol) : null;
  }

  async listOpenOrders(symbol?: string, signal?: AbortSignal): Promise<VenueOrderState[]> {
    const signer = this.requireSigner();
    const query = buildQueryString({ instId: symbol });
    const path = query ? `${OKX_ENDPOINTS.PENDING_ORDERS}?${query}` : OKX_ENDPOINTS.PENDING_ORDERS;

    const envelope = await this.request(signer, 'GET', path, undefined, signal);
    this.assertSuccess(envelope, 'pending orders');
    return envelope.data.map(order => this.toOrderState(order, symbol ?? ''));
  }

  async closePosition(request: ClosePositionRequest, signal?: AbortSignal): Promise<ClosePositionResult> {
    const signer = this.requireSigner();
    const body = JSON.stringify({ instId: request.symbol, mgnMode: request.marginMode ?? 'cross' });

    const envelope = await this.request(signer, 'POST', OKX_ENDPOINTS.CLOSE_POSITION, body, signal, true);
    if (envelope.code === OKX_NO_POSITION_CODE) {
      return { symbol: request.symbol, closed: false, message: envelope.msg || 'No open position' };
    }
    this.assertSuccess(envelope, 'close position');

    this.logger.info({ instId: request.symbol }, 'OKX position closed');
    return { symbol: request.symbol, closed: true, message: 'Position closed' };
  }

  async disconnect(): Promise<void> {
    // REST only: dropping the signer ends the session
    this.signer = null;
  }

  private assertIdentified(ref: VenueOrderRef): void {
    if (!ref.venueOrderId && !ref.clientOrderId) {
      throw new InvalidOrderError('An order id or client order id is required', { venueId: this.venueId });
    }
  }

  private toOrderState(order: Record<string, unknown>, fallbackSymbol: string): VenueOrderState {
    const avgPx = readNumeric(order, 'avgPx');
    const clOrdId = readString(order, 'clOrdId');
    return {
      symbol: readString(order, 'instId') ?? fallbackSymbol,
      venueOrderId: readString(order, 'ordId') ?? '',
      clientOrderId: clOrdId || undefined,
      side: readString(order, 'side') === 'sell' ? 'SELL' : 'BUY',
      status: OKX_ORDER_STATUS[readString(order, 'state') ?? 'live'] ?? 'OPEN',
      quantity: readNumeric(order, 'sz') ?? 0,
      filledQuantity: readNumeric(order, 'accFillSz') ?? 0,
      // OKX sends avgPx "0" or "" until something fills
      averagePrice: avgPx === undefined || avgPx === 0 ? null : avgPx,
    };
  }

  private requireSigner(): OkxSigner {
    if (!this.signer) {
      throw new NetworkError('OKX session is not connected', { venueId: this.venueId });
    }
    return this.signer;
  }

  private async fetchOrderDetail(
    signer: OkxSigner,
    instId: string,
    ordId: string,
    signal?: AbortSignal
  ): Promise<OkxOrderDetail | undefined> {
    const query = buildQueryString({ instId, ordId });
    try {
      const envelope = await this.request(
        signer,
        'GET',
        `${OKX_ENDPOINTS.ORDER_DETAIL}?${query}`,
        undefined,
        signal
      );
      const detail = envelope.data[0];
      if (envelope.code !== OKX_SUCCESS_CODE || !detail) {
        this.logger.warn({ ordId, code: envelope.code }, 'OKX order detail unavailable');
        return undefined;
      }
      return {
        ordId,
        state: readString(detail, 'state') ?? 'live',
        fillSz: readNumeric(detail, 'accFillSz') ?? readNumeric(detail, 'fillSz') ?? 0,
        avgPx: readNumeric(detail, 'avgPx') ?? null,
      };
    } catch (error) {
      // The order itself was acknowledged; report it as accepted without fill data
      this.logger.warn(
        { ordId, error: error instanceof Error ? error.message : String(error) },
        'OKX order detail lookup failed'
      );
      return undefined;
    }
  }

  private async request(
    signer: OkxSigner,
    method: 'GET' | 'POST',
    requestPath: string,
    body: string | undefined,
    signal: AbortSignal | undefined,
    placement = false
  ): Promise<OkxEnvelope> {
    const timestamp = this.clock().toISOString();
    const raw = await requestVenueJson(
      this.venueId,
      {
        method,
        url: `${this.config.baseUrl}${requestPath}`,
        headers: signer.headers(method, requestPath, body ?? '', timestamp, this.config.simulated),
        body,
        signal,
        placement,
      },
      this.fetchImpl
    );

    const code = isRecord(raw) ? readString(raw, 'code') : undefined;
    if (!isRecord(raw) || (placement && code === undefined)) {
      if (placement) {
        throw new AmbiguousOrderError('OKX accepted an order request but returned a malformed envelope', {
          venueId: this.venueId,
        });
      }
      throw new NetworkError('OKX returned a malformed envelope', { venueId: this.venueId });
    }

    return {
      code: code ?? '',
      msg: readString(raw, 'msg') ?? '',
      data: readRecords(raw, 'data'),
    };
  }

  private assertSuccess(envelope: OkxEnvelope, operation: string): void {
    if (envelope.code === OKX_SUCCESS_CODE) {
      return;
    }
    const kind = okxKindForCode(envelope.code);
    throw createTradingError(
      kind === 'AMBIGUOUS' ? 'TIMEOUT' : kind,
      `OKX ${operation} failed: ${envelope.code} ${envelope.msg}`,
      { venueId: this.venueId, venueCode: envelope.code }
    );
  }
}
