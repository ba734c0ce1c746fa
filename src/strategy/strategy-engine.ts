import type pino from 'pino';
import { getComponentLogger } from '../config/logger.js';
import { toTradingError } from '../errors/trading-errors.js';
import type { NotificationSink } from '../execution/interfaces/index.js';
import { failedResult } from '../execution/order-result.js';
import type { OrderIntent, OrderResult } from '../execution/types/execution.types.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { createStrategy } from './strategy-config.js';
import type {
  MarketFeed,
  OrderIntake,
  SignalSource,
  StrategyConfig,
  StrategyEvent,
  StrategyRunStatus,
  StrategyRunSummary,
  TradingStrategy,
} from './strategy.types.js';

export interface StrategyEngineOptions {
  intake: OrderIntake;
  marketFeed?: MarketFeed;
  signalSource?: SignalSource;
  notificationSink?: NotificationSink;
  strategyFactory?: (config: StrategyConfig) => TradingStrategy;
  clock?: () => Date;
}

interface StrategyInstance {
  strategy: TradingStrategy;
  mailbox: AsyncQueue<StrategyEvent>;
  controller: AbortController;
  status: StrategyRunStatus;
  startedAt: Date;
  stoppedAt?: Date;
  intentsSubmitted: number;
  resultsReceived: number;
  lastError?: string;
  inFlight: Set<Promise<void>>;
  loop: Promise<void>;
  feeds: Promise<void>[];
}

/**
 * Supervises strategy instances. Each instance owns a mailbox and a loop;
 * instances share nothing, and one failing leaves the others running.
 */
export class StrategyEngine {
  private readonly instances = new Map<string, StrategyInstance>();
  private readonly intake: OrderIntake;
  private readonly marketFeed?: MarketFeed;
  private readonly signalSource?: SignalSource;
  private readonly notificationSink?: NotificationSink;
  private readonly strategyFactory: (config: StrategyConfig) => TradingStrategy;
  private readonly clock: () => Date;
  private readonly logger: pino.Logger;

  constructor(options: StrategyEngineOptions) {
    this.intake = options.intake;
    this.marketFeed = options.marketFeed;
    this.signalSource = options.signalSource;
    this.notificationSink = options.notificationSink;
    this.strategyFactory = options.strategyFactory ?? createStrategy;
    this.clock = options.clock ?? (() => new Date());
    this.logger = getComponentLogger('strategy-engine');
  }

  start(config: StrategyConfig): StrategyRunSummary {
    const current = this.instances.get(config.id);
    if (current && current.status === 'RUNNING') {
      throw new Error(`Strategy ${config.id} is already running`);
    }

    const strategy = this.strategyFactory(config);
    const instance: StrategyInstance = {
      strategy,
      mailbox: new AsyncQueue<StrategyEvent>(),
      controller: new AbortController(),
      status: 'RUNNING',
      startedAt: this.clock(),
      intentsSubmitted: 0,
      resultsReceived: 0,
      inFlight: new Set(),
      loop: Promise.resolve(),
      feeds: [],
    };
    this.instances.set(config.id, instance);

    instance.loop = this.run(instance);
    instance.feeds = this.startFeeds(instance, config);

    this.logger.info({ strategyId: config.id, type: config.type, venueId: config.venueId }, 'Strategy started');
    return this.summarize(instance);
  }

  /**
   * Stops new intents at once. Submissions already handed to the intake run
   * to completion before this resolves.
   */
  async stop(strategyId: string): Promise<StrategyRunSummary> {
    const instance = this.instances.get(strategyId);
    if (!instance) {
      throw new Error(`Unknown strategy ${strategyId}`);
    }

    if (instance.status === 'RUNNING') {
      this.finish(instance, 'STOPPED');
    }
    await this.settle(instance);
    this.logger.info({ strategyId }, 'Strategy stopped');
    return this.summarize(instance);
  }

  async stopAll(): Promise<StrategyRunSummary[]> {
    return Promise.all([...this.instances.keys()].map(id => this.stop(id)));
  }

  /** Hands an event to a running instance. Returns false when none accepts it. */
  deliver(strategyId: string, event: StrategyEvent): boolean {
    const instance = this.instances.get(strategyId);
    if (!instance || instance.status !== 'RUNNING') {
      return false;
    }
    return instance.mailbox.push(event);
  }

  deliverExecution(originatorId: string, intent: OrderIntent, result: OrderResult): boolean {
    return this.deliver(originatorId, { type: 'EXECUTION', intent, result });
  }

  listActiveStrategies(): StrategyRunSummary[] {
    return this.listStrategies().filter(summary => summary.status === 'RUNNING');
  }

  listStrategies(): StrategyRunSummary[] {
    return [...this.instances.values()].map(instance => this.summarize(instance));
  }

  getStrategy(strategyId: string): StrategyRunSummary | undefined {
    const instance = this.instances.get(strategyId);
    return instance ? this.summarize(instance) : undefined;
  }

  activeCount(): number {
    let count = 0;
    for (const instance of this.instances.values()) {
      if (instance.status === 'RUNNING') {
        count++;
      }
    }
    return count;
  }

  /** Resolves once the instance loop, its feeds and in-flight submissions are done. */
  private async settle(instance: StrategyInstance): Promise<void> {
    await Promise.allSettled([instance.loop, ...instance.feeds]);
    while (instance.inFlight.size > 0) {
      await Promise.allSettled([...instance.inFlight]);
    }
  }

  private async run(instance: StrategyInstance): Promise<void> {
    const { strategy, mailbox, controller } = instance;

    try {
      this.submitAll(instance, strategy.onStart(this.clock()));

      for await (const event of mailbox) {
        if (controller.signal.aborted) {
          break;
        }
        const now = this.clock();
        let intents: OrderIntent[];
        if (event.type === 'EXECUTION') {
          instance.resultsReceived++;
          intents = strategy.onResult(event.intent, event.result, now);
        } else {
          intents = strategy.onEvent(event, now);
        }
        this.submitAll(instance, intents);

        if (strategy.haltReason !== null) {
          this.finish(instance, 'HALTED');
          await this.alert('STRATEGY_HALTED', instance, { reason: strategy.haltReason });
        }
      }
    } catch (error) {
      instance.lastError = error instanceof Error ? error.message : String(error);
      this.logger.error({ strategyId: strategy.id, error: instance.lastError }, 'Strategy failed');
      this.finish(instance, 'FAILED');
      await this.alert('STRATEGY_FAILED', instance, { error: instance.lastError });
    }
  }

  private submitAll(instance: StrategyInstance, intents: OrderIntent[]): void {
    for (const intent of intents) {
      if (instance.controller.signal.aborted) {
        return;
      }
      instance.intentsSubmitted++;

      const submission = this.intake
        .submit(intent)
        .catch((error: unknown) => {
          const tradingError = toTradingError(error, intent.venueId);
          return failedResult(intent, tradingError.kind, tradingError.message, this.clock());
        })
        .then(result => {
          if (!instance.mailbox.push({ type: 'EXECUTION', intent, result })) {
            this.logger.debug(
              { strategyId: instance.strategy.id, idempotencyKey: intent.idempotencyKey, status: result.status },
              'Result arrived after strategy stopped'
            );
          }
        })
        .finally(() => {
          instance.inFlight.delete(submission);
        });
      instance.inFlight.add(submission);
    }
  }

  private startFeeds(instance: StrategyInstance, config: StrategyConfig): Promise<void>[] {
    const { signal } = instance.controller;
    const feeds: Promise<void>[] = [];

    if (config.type === 'SIGNAL') {
      const source = this.signalSource;
      if (source) {
        feeds.push(this.pump(instance, source.signals(signal), record => ({ type: 'SIGNAL', signal: record })));
      }
    } else if (this.marketFeed) {
      const ticks = this.marketFeed.ticks(config.venueId, config.symbol, signal);
      feeds.push(this.pump(instance, ticks, tick => ({ type: 'TICK', tick })));
    }
    return feeds;
  }

  private async pump<T>(
    instance: StrategyInstance,
    source: AsyncIterable<T>,
    toEvent: (item: T) => StrategyEvent
  ): Promise<void> {
    try {
      for await (const item of source) {
        if (instance.controller.signal.aborted || !instance.mailbox.push(toEvent(item))) {
          break;
        }
      }
    } catch (error) {
      if (instance.controller.signal.aborted) {
        return;
      }
      instance.lastError = error instanceof Error ? error.message : String(error);
      this.logger.error({ strategyId: instance.strategy.id, error: instance.lastError }, 'Strategy feed failed');
      this.finish(instance, 'FAILED');
      await this.alert('STRATEGY_FAILED', instance, { error: instance.lastError });
    }
  }

  private finish(instance: StrategyInstance, status: Exclude<StrategyRunStatus, 'RUNNING'>): void {
    if (instance.status !== 'RUNNING') {
      return;
    }
    instance.status = status;
    instance.stoppedAt = this.clock();
    instance.controller.abort();
    instance.mailbox.close();
  }

  private async alert(
    kind: 'STRATEGY_HALTED' | 'STRATEGY_FAILED',
    instance: StrategyInstance,
    payload: Record<string, unknown>
  ): Promise<void> {
    if (!this.notificationSink) {
      return;
    }
    try {
      await this.notificationSink.notify(kind, { strategyId: instance.strategy.id, ...payload });
    } catch (error) {
      this.logger.error(
        { kind, error: error instanceof Error ? error.message : String(error) },
        'Strategy alert delivery failed'
      );
    }
  }

  private summarize(instance: StrategyInstance): StrategyRunSummary {
    const { strategy } = instance;
    return {
      id: strategy.id,
      type: strategy.type,
      venueId: strategy.config.venueId,
      status: instance.status,
      startedAt: instance.startedAt,
      stoppedAt: instance.stoppedAt,
      intentsSubmitted: instance.intentsSubmitted,
      resultsReceived: instance.resultsReceived,
      haltReason: strategy.haltReason ?? undefined,
      lastError: instance.lastError,
      state: strategy.describeState(),
    };
  }
}
