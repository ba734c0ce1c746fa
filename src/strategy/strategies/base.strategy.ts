import type pino from 'pino';
import { getComponentLogger } from '../../config/logger.js';
import { createOrderIntent, type OrderIntentInput } from '../../execution/order-intent.js';
import type { OrderIntent, OrderResult, OriginatorType } from '../../execution/types/execution.types.js';
import type { StrategyConfig, StrategyEvent, StrategyType, TradingStrategy } from '../strategy.types.js';

export type IntentDraft = Omit<OrderIntentInput, 'venueId' | 'originator' | 'createdAt'>;

export abstract class BaseStrategy<C extends StrategyConfig> implements TradingStrategy {
  protected readonly logger: pino.Logger;
  private halted: string | null = null;

  constructor(
    readonly config: C,
    private readonly originatorType: OriginatorType = 'STRATEGY'
  ) {
    this.logger = getComponentLogger('strategy', { strategyId: config.id, strategyType: config.type });
  }

  get id(): string {
    return this.config.id;
  }

  get type(): StrategyType {
    return this.config.type;
  }

  get haltReason(): string | null {
    return this.halted;
  }

  onStart(_now: Date): OrderIntent[] {
    return [];
  }

  abstract onEvent(event: Exclude<StrategyEvent, { type: 'EXECUTION' }>, now: Date): OrderIntent[];

  abstract onResult(intent: OrderIntent, result: OrderResult, now: Date): OrderIntent[];

  abstract describeState(): Record<string, unknown>;

  protected halt(reason: string): void {
    if (this.halted !== null) {
      return;
    }
    this.halted = reason;
    this.logger.warn({ reason }, 'Strategy halted itself');
  }

  protected createIntent(draft: IntentDraft, now: Date): OrderIntent {
    return createOrderIntent({
      ...draft,
      venueId: this.config.venueId,
      originator: { type: this.originatorType, id: this.config.id },
      createdAt: now,
    });
  }
}
