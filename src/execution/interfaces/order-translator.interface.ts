/**
 * Order Translator Interface - Pure mapping between the venue-agnostic order
 * model and one venue's wire format
 */

import type { OrderIntent, OrderResult } from '../types/execution.types.js';
import type { VenueId, VenueRequest, VenueResponse } from '../../venues/venue.types.js';

export interface OrderTranslator {
  readonly venueId: VenueId;

  /**
   * Build the venue request for an intent, rounding quantity and prices to
   * the instrument's lot and tick sizes.
   * @throws UnsupportedOrderKindError, UnitMismatchError or InvalidOrderError
   */
  toVenueRequest(intent: OrderIntent): VenueRequest;

  /**
   * The intent as it would be sent: quantity, price and protective levels
   * rounded to the instrument grid. Same errors as toVenueRequest.
   */
  normalize(intent: OrderIntent): OrderIntent;

  /** Client order id the venue stores for an idempotency key */
  clientOrderId(idempotencyKey: string): string;

  /**
   * Map a venue answer to an OrderResult. Unrecognized venue codes become
   * UNKNOWN_VENUE_ERROR results.
   */
  fromVenueResponse(response: VenueResponse, intent: OrderIntent): OrderResult;
}
