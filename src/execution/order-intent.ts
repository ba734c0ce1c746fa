import { v4 as uuidv4 } from 'uuid';
import type { OrderIntent, OrderKind, OrderSide, Originator } from './types/execution.types.js';
import type { VenueId } from '../venues/venue.types.js';

export interface OrderIntentInput {
  venueId: VenueId;
  symbol: string;
  side: OrderSide;
  kind: OrderKind;
  quantity: number;
  price?: number;
  stopLoss?: number;
  takeProfit?: number;
  referencePrice?: number;
  quantityUnit?: string;
  currency?: string;
  originator: Originator;
  /** Supply to derive the key from an upstream id; generated otherwise */
  idempotencyKey?: string;
  createdAt?: Date;
}

/**
 * Creates an immutable intent. The idempotency key is fixed here and travels
 * unchanged through every retry.
 */
export function createOrderIntent(input: OrderIntentInput): OrderIntent {
  return Object.freeze({
    ...input,
    originator: Object.freeze({ ...input.originator }),
    idempotencyKey: input.idempotencyKey ?? uuidv4(),
    createdAt: input.createdAt ?? new Date(),
  });
}

function isPositive(value: number | undefined): boolean {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Shape checks that need no market data. Returns an empty list when valid.
 */
export function validateOrderIntent(intent: OrderIntent): string[] {
  const errors: string[] = [];

  if (!intent.idempotencyKey) {
    errors.push('idempotencyKey is required');
  }
  if (!intent.venueId) {
    errors.push('venueId is required');
  }
  if (!intent.symbol) {
    errors.push('symbol is required');
  }
  if (intent.side !== 'BUY' && intent.side !== 'SELL') {
    errors.push(`side must be BUY or SELL. Got: ${String(intent.side)}`);
  }
  if (!isPositive(intent.quantity)) {
    errors.push('quantity must be a positive number');
  }
  if ((intent.kind === 'LIMIT' || intent.kind === 'STOP') && !isPositive(intent.price)) {
    errors.push(`${intent.kind} orders require a positive price`);
  }
  if (intent.stopLoss !== undefined && !isPositive(intent.stopLoss)) {
    errors.push('stopLoss must be a positive number');
  }
  if (intent.takeProfit !== undefined && !isPositive(intent.takeProfit)) {
    errors.push('takeProfit must be a positive number');
  }
  if (!intent.originator?.id) {
    errors.push('originator id is required');
  }

  return errors;
}

/** Entry price used for risk/reward: limit/trigger price, else the reference. */
export function entryPriceOf(intent: OrderIntent): number | undefined {
  return intent.kind === 'MARKET' ? intent.referencePrice : intent.price ?? intent.referencePrice;
}

export function signedQuantity(side: OrderSide, quantity: number): number {
  return side === 'BUY' ? quantity : -quantity;
}
