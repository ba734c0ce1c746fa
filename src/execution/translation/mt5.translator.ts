import type { InstrumentCatalog } from '../../config/instruments.js';
import { MT5_RETCODES, mt5KindForRetcode, type Mt5OrderType, type Mt5VenueRequest } from '../../venues/mt5/mt5.types.js';
import type { VenueResponse } from '../../venues/venue.types.js';
import type { OrderIntent, OrderResult } from '../types/execution.types.js';
import { BaseOrderTranslator } from './base-order.translator.js';

const DEFAULT_DEVIATION_POINTS = 20;

function orderTypeFor(intent: OrderIntent): Mt5OrderType {
  switch (intent.kind) {
    case 'MARKET':
      return intent.side;
    case 'LIMIT':
      return intent.side === 'BUY' ? 'BUY_LIMIT' : 'SELL_LIMIT';
    case 'STOP':
      return intent.side === 'BUY' ? 'BUY_STOP' : 'SELL_STOP';
  }
}

export class Mt5OrderTranslator extends BaseOrderTranslator {
  constructor(
    catalog: InstrumentCatalog,
    private readonly deviationPoints: number = DEFAULT_DEVIATION_POINTS
  ) {
    super('mt5', catalog);
  }

  override clientOrderId(idempotencyKey: string): string {
    return idempotencyKey;
  }

  override toVenueRequest(intent: OrderIntent): Mt5VenueRequest {
    const order = this.prepare(intent);

    return {
      venue: 'mt5',
      body: {
        action: intent.kind === 'MARKET' ? 'DEAL' : 'PENDING',
        symbol: intent.symbol,
        type: orderTypeFor(intent),
        volume: order.quantity,
        price: order.price,
        sl: order.stopLoss,
        tp: order.takeProfit,
        deviation: this.deviationPoints,
        comment: intent.idempotencyKey.replace(/-/g, '').slice(0, 31),
        clientOrderId: intent.idempotencyKey,
      },
    };
  }

  override fromVenueResponse(response: VenueResponse, intent: OrderIntent): OrderResult {
    if (response.venue !== 'mt5') {
      return this.failureResult(intent, 'UNKNOWN_VENUE_ERROR', `Unexpected ${response.venue} response on mt5`);
    }

    const { result } = response;
    const venueOrderId = result.order !== undefined ? String(result.order) : undefined;
    const base = { ...this.baseResult(intent), venueOrderId };

    switch (result.retcode) {
      case MT5_RETCODES.DONE:
        if (intent.kind !== 'MARKET') {
          return { ...base, status: 'ACCEPTED' };
        }
        return {
          ...base,
          status: 'FILLED',
          filledQuantity: result.volume,
          filledPrice: result.price,
        };
      case MT5_RETCODES.DONE_PARTIAL:
        return {
          ...base,
          status: 'PARTIALLY_FILLED',
          filledQuantity: result.volume,
          filledPrice: result.price,
        };
      case MT5_RETCODES.PLACED:
        return { ...base, status: 'ACCEPTED' };
      default:
        return {
          ...this.failureResult(
            intent,
            mt5KindForRetcode(result.retcode),
            `${result.retcode} ${result.comment}`.trim()
          ),
          venueOrderId,
        };
    }
  }
}
