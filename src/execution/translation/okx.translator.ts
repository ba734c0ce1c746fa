import type { InstrumentCatalog } from '../../config/instruments.js';
import { OKX_SUCCESS_CODE, okxKindForCode } from '../../venues/okx/okx.codes.js';
import type {
  OkxAttachedAlgo,
  OkxOrderSide,
  OkxTradeMode,
  OkxVenueRequest,
} from '../../venues/okx/okx.types.js';
import type { VenueResponse } from '../../venues/venue.types.js';
import type { OrderIntent, OrderResult } from '../types/execution.types.js';
import { BaseOrderTranslator } from './base-order.translator.js';
import { formatToStep } from './rounding.js';

const TRADE_MODES: readonly OkxTradeMode[] = ['cash', 'cross', 'isolated'];

function toTradeMode(value: string | undefined): OkxTradeMode {
  return TRADE_MODES.find(mode => mode === value) ?? 'cross';
}

/** OKX client ids: up to 32 alphanumerics */
export function toOkxClientId(idempotencyKey: string): string {
  return idempotencyKey.replace(/[^A-Za-z0-9]/g, '').slice(0, 32);
}

export class OkxOrderTranslator extends BaseOrderTranslator {
  constructor(catalog: InstrumentCatalog) {
    super('okx', catalog);
  }

  override clientOrderId(idempotencyKey: string): string {
    return toOkxClientId(idempotencyKey);
  }

  override toVenueRequest(intent: OrderIntent): OkxVenueRequest {
    const order = this.prepare(intent);
    const { spec } = order;
    const side: OkxOrderSide = intent.side === 'BUY' ? 'buy' : 'sell';
    const tdMode = toTradeMode(spec.tradeMode);
    const sz = formatToStep(order.quantity, spec.lotSize);
    const clientId = toOkxClientId(intent.idempotencyKey);

    const attached: OkxAttachedAlgo = {
      ...(order.stopLoss === undefined
        ? {}
        : { slTriggerPx: formatToStep(order.stopLoss, spec.tickSize), slOrdPx: '-1' }),
      ...(order.takeProfit === undefined
        ? {}
        : { tpTriggerPx: formatToStep(order.takeProfit, spec.tickSize), tpOrdPx: '-1' }),
    };
    const attachAlgoOrds = Object.keys(attached).length > 0 ? [attached] : undefined;

    if (intent.kind === 'STOP') {
      return {
        venue: 'okx',
        kind: 'algo',
        body: {
          instId: intent.symbol,
          tdMode,
          side,
          ordType: 'trigger',
          sz,
          triggerPx: formatToStep(order.price ?? 0, spec.tickSize),
          orderPx: '-1',
          algoClOrdId: clientId,
          attachAlgoOrds,
        },
      };
    }

    return {
      venue: 'okx',
      kind: 'order',
      body: {
        instId: intent.symbol,
        tdMode,
        side,
        ordType: intent.kind === 'LIMIT' ? 'limit' : 'market',
        sz,
        px: order.price === undefined ? undefined : formatToStep(order.price, spec.tickSize),
        clOrdId: clientId,
        attachAlgoOrds,
      },
    };
  }

  override fromVenueResponse(response: VenueResponse, intent: OrderIntent): OrderResult {
    if (response.venue !== 'okx') {
      return this.failureResult(intent, 'UNKNOWN_VENUE_ERROR', `Unexpected ${response.venue} response on okx`);
    }

    if (response.code !== OKX_SUCCESS_CODE) {
      return {
        ...this.failureResult(intent, okxKindForCode(response.code), `${response.code} ${response.message}`.trim()),
        venueOrderId: response.ordId || undefined,
      };
    }

    const base = { ...this.baseResult(intent), venueOrderId: response.ordId };
    const detail = response.detail;

    if (!detail) {
      return { ...base, status: 'ACCEPTED' };
    }

    switch (detail.state) {
      case 'filled':
        return {
          ...base,
          status: 'FILLED',
          filledQuantity: detail.fillSz,
          filledPrice: detail.avgPx ?? undefined,
        };
      case 'partially_filled':
        return {
          ...base,
          status: 'PARTIALLY_FILLED',
          filledQuantity: detail.fillSz,
          filledPrice: detail.avgPx ?? undefined,
        };
      case 'canceled':
      case 'mmp_canceled':
        if (detail.fillSz > 0) {
          return {
            ...base,
            status: 'PARTIALLY_FILLED',
            filledQuantity: detail.fillSz,
            filledPrice: detail.avgPx ?? undefined,
          };
        }
        return {
          ...this.failureResult(intent, 'VENUE_REJECTED', `Order ${detail.ordId} was canceled by the venue`),
          venueOrderId: response.ordId,
        };
      default:
        return { ...base, status: 'ACCEPTED' };
    }
  }
}
