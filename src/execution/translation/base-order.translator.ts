/**
 * Base Order Translator - Shared validation and rounding for venue translators
 */

import {
  type ErrorKind,
  InvalidOrderError,
  UnitMismatchError,
  UnsupportedOrderKindError,
} from '../../errors/trading-errors.js';
import { getInstrumentSpec, type InstrumentCatalog, type InstrumentSpec } from '../../config/instruments.js';
import type { OrderTranslator } from '../interfaces/order-translator.interface.js';
import type { OrderIntent, OrderResult } from '../types/execution.types.js';
import type { VenueId, VenueRequest, VenueResponse } from '../../venues/venue.types.js';
import { roundToStep } from './rounding.js';
import { failedResult } from '../order-result.js';

export interface RoundedOrder {
  spec: Readonly<InstrumentSpec>;
  quantity: number;
  price?: number;
  stopLoss?: number;
  takeProfit?: number;
}

export abstract class BaseOrderTranslator implements OrderTranslator {
  constructor(
    readonly venueId: VenueId,
    protected readonly catalog: InstrumentCatalog
  ) {}

  abstract toVenueRequest(intent: OrderIntent): VenueRequest;

  abstract fromVenueResponse(response: VenueResponse, intent: OrderIntent): OrderResult;

  abstract clientOrderId(idempotencyKey: string): string;

  normalize(intent: OrderIntent): OrderIntent {
    const order = this.prepare(intent);
    return {
      ...intent,
      quantity: order.quantity,
      price: order.price ?? intent.price,
      stopLoss: order.stopLoss,
      takeProfit: order.takeProfit,
    };
  }

  /**
   * Resolves the instrument, checks kind and units, and rounds every numeric
   * field to the instrument grid.
   */
  protected prepare(intent: OrderIntent): RoundedOrder {
    const spec = getInstrumentSpec(this.catalog, this.venueId, intent.symbol);
    if (!spec) {
      throw new InvalidOrderError(`Unknown instrument ${intent.symbol} on ${this.venueId}`, {
        venueId: this.venueId,
      });
    }

    if (!spec.orderKinds.includes(intent.kind)) {
      throw new UnsupportedOrderKindError(
        `${this.venueId} does not support ${intent.kind} orders for ${intent.symbol}`,
        { venueId: this.venueId }
      );
    }

    if (intent.quantityUnit !== undefined && intent.quantityUnit !== spec.quantityUnit) {
      throw new UnitMismatchError(
        `${intent.symbol} quantity is in ${spec.quantityUnit}, intent uses ${intent.quantityUnit}`,
        { venueId: this.venueId }
      );
    }
    if (intent.currency !== undefined && intent.currency !== spec.quoteCurrency) {
      throw new UnitMismatchError(
        `${intent.symbol} is quoted in ${spec.quoteCurrency}, intent uses ${intent.currency}`,
        { venueId: this.venueId }
      );
    }

    return {
      spec,
      quantity: this.roundQuantity(intent, spec),
      price: this.roundEntryPrice(intent, spec),
      stopLoss:
        intent.stopLoss === undefined
          ? undefined
          : roundToStep(intent.stopLoss, spec.tickSize, intent.side === 'BUY' ? 'ceil' : 'floor'),
      takeProfit:
        intent.takeProfit === undefined
          ? undefined
          : roundToStep(intent.takeProfit, spec.tickSize, intent.side === 'BUY' ? 'floor' : 'ceil'),
    };
  }

  /**
   * Buys round down to the lot. Sells round down too, except that a
   * positive sell below the venue minimum is raised to the minimum so a
   * residual position can always be closed.
   */
  protected roundQuantity(intent: OrderIntent, spec: InstrumentSpec): number {
    const rounded = roundToStep(intent.quantity, spec.lotSize, 'floor');

    if (rounded >= spec.minQuantity) {
      return rounded;
    }
    if (intent.side === 'SELL' && intent.quantity > 0) {
      return spec.minQuantity;
    }
    throw new InvalidOrderError(
      `${intent.symbol} quantity ${intent.quantity} is below the minimum ${spec.minQuantity} after rounding`,
      { venueId: this.venueId }
    );
  }

  /** Limit buys round down and limit sells up; stop triggers round to nearest. */
  protected roundEntryPrice(intent: OrderIntent, spec: InstrumentSpec): number | undefined {
    if (intent.price === undefined || intent.kind === 'MARKET') {
      return undefined;
    }
    if (intent.kind === 'STOP') {
      return roundToStep(intent.price, spec.tickSize, 'nearest');
    }
    return roundToStep(intent.price, spec.tickSize, intent.side === 'BUY' ? 'floor' : 'ceil');
  }

  protected baseResult(intent: OrderIntent): Pick<OrderResult, 'idempotencyKey' | 'venueId' | 'timestamp'> {
    return {
      idempotencyKey: intent.idempotencyKey,
      venueId: this.venueId,
      timestamp: new Date(),
    };
  }

  protected failureResult(intent: OrderIntent, kind: ErrorKind, message: string): OrderResult {
    return { ...failedResult(intent, kind, message), venueId: this.venueId };
  }
}
