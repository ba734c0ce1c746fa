import type { PositionState } from '../execution/types/execution.types.js';

/**
 * Folds one venue position row into the per-symbol entry. Quantities and
 * PnL add up; the average price is weighted by each row's size.
 */
export function mergePosition(
  existing: PositionState | undefined,
  signedQuantity: number,
  averagePrice: number,
  unrealizedPnl: number
): PositionState {
  if (!existing) {
    return { quantity: signedQuantity, averagePrice, unrealizedPnl };
  }

  const previousWeight = Math.abs(existing.quantity);
  const weight = Math.abs(signedQuantity);
  const totalWeight = previousWeight + weight;

  return {
    quantity: existing.quantity + signedQuantity,
    averagePrice:
      totalWeight === 0
        ? averagePrice
        : (existing.averagePrice * previousWeight + averagePrice * weight) / totalWeight,
    unrealizedPnl: existing.unrealizedPnl + unrealizedPnl,
  };
}
