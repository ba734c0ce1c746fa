/**
 * Position Tracker Interface - Local book of filled quantities per venue
 */

import type { OrderIntent, OrderResult } from '../types/execution.types.js';

export interface TrackedPosition {
  venueId: string;
  symbol: string;
  /** Signed: positive long, negative short */
  quantity: number;
  averagePrice: number;
  realizedPnl: number;
}

export interface PositionTracker {
  recordFill(intent: OrderIntent, result: OrderResult): Promise<void>;
  getPosition(venueId: string, symbol: string): TrackedPosition | undefined;
  listPositions(): TrackedPosition[];
}
