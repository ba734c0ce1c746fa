import { v5 as uuidv5 } from 'uuid';
import type { OrderIntent, OrderResult } from '../../execution/types/execution.types.js';
import type { SignalStrategyConfig, StrategyEvent } from '../strategy.types.js';
import { BaseStrategy } from './base.strategy.js';

const SIGNAL_KEY_NAMESPACE = '6f1c2f1e-8f4a-4c55-9a3e-2b7d1f0c9a41';

/** Same strategy and signal id always give the same idempotency key. */
export function signalIntentKey(strategyId: string, signalId: string): string {
  return uuidv5(`${strategyId}:${signalId}`, SIGNAL_KEY_NAMESPACE);
}

/**
 * One intent per fresh signal. Stale signals are discarded and a signal id
 * is acted on at most once.
 */
export class SignalDrivenStrategy extends BaseStrategy<SignalStrategyConfig> {
  private readonly seen = new Set<string>();
  private executed = 0;
  private discarded = 0;
  private results = 0;

  constructor(config: SignalStrategyConfig) {
    super(config, 'SIGNAL');
  }

  override onEvent(event: Exclude<StrategyEvent, { type: 'EXECUTION' }>, now: Date): OrderIntent[] {
    if (event.type !== 'SIGNAL') {
      return [];
    }

    const { signal } = event;
    if (this.seen.has(signal.signalId)) {
      this.logger.debug({ signalId: signal.signalId }, 'Signal already handled');
      return [];
    }
    this.seen.add(signal.signalId);

    if (signal.venueId !== undefined && signal.venueId !== this.config.venueId) {
      this.logger.debug({ signalId: signal.signalId, venueId: signal.venueId }, 'Signal targets another venue');
      return [];
    }

    const ageMs = now.getTime() - signal.timestamp.getTime();
    if (ageMs > this.config.maxSignalAgeMs) {
      this.discarded++;
      this.logger.info(
        { signalId: signal.signalId, ageMs, maxSignalAgeMs: this.config.maxSignalAgeMs },
        'Stale signal discarded'
      );
      return [];
    }

    const useLimit = this.config.entryKind === 'LIMIT' && signal.entryPrice !== undefined;
    this.executed++;
    return [
      this.createIntent(
        {
          idempotencyKey: signalIntentKey(this.config.id, signal.signalId),
          symbol: signal.symbol,
          side: signal.action,
          kind: useLimit ? 'LIMIT' : 'MARKET',
          quantity: signal.quantity ?? this.config.defaultQuantity,
          price: useLimit ? signal.entryPrice : undefined,
          referencePrice: signal.entryPrice,
          stopLoss: signal.stopLoss,
          takeProfit: signal.takeProfit,
        },
        now
      ),
    ];
  }

  override onResult(intent: OrderIntent, result: OrderResult): OrderIntent[] {
    this.results++;
    if (result.status === 'REJECTED' || result.status === 'ERROR') {
      this.logger.warn(
        { idempotencyKey: intent.idempotencyKey, errorKind: result.errorKind, reason: result.errorMessage },
        'Signal order not executed'
      );
    }
    return [];
  }

  override describeState(): Record<string, unknown> {
    return {
      signalsSeen: this.seen.size,
      executed: this.executed,
      discarded: this.discarded,
      results: this.results,
    };
  }
}
