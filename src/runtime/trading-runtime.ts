import type pino from 'pino';
import { getEnvironmentConfig, type EnvironmentConfig } from '../config/env.js';
import { loadInstrumentCatalog, type InstrumentCatalog } from '../config/instruments.js';
import { getComponentLogger } from '../config/logger.js';
import { loadRiskLimits } from '../config/risk-limits.js';
import { getSupabaseClient } from '../config/supabase.js';
import { ConnectionManager } from '../execution/connection/connection-manager.js';
import { VenueRegistry } from '../execution/connection/venue-registry.js';
import type { AuditSink, NotificationSink, PositionTracker } from '../execution/interfaces/index.js';
import { RiskGate } from '../execution/risk/risk-gate.js';
import { ExecutionCoordinator } from '../execution/services/execution-coordinator.service.js';
import { InMemoryAuditSink } from '../execution/sinks/in-memory-audit.sink.js';
import { InMemoryPositionTracker } from '../execution/sinks/in-memory-position.tracker.js';
import { LoggerNotificationSink } from '../execution/sinks/logger-notification.sink.js';
import { TranslatorRegistry } from '../execution/translation/translator-registry.js';
import type { RiskLimits } from '../execution/types/execution.types.js';
import { OrderAuditRepository } from '../repositories/order-audit.repository.js';
import { PollingMarketFeed } from '../strategy/polling-market-feed.js';
import { StrategyEngine } from '../strategy/strategy-engine.js';
import type { MarketFeed, SignalSource, StrategyConfig, StrategyRunSummary } from '../strategy/strategy.types.js';
import { getAllAvailableVenueConfigs } from '../venues/venue-config.js';
import { VenueFactory } from '../venues/venue-factory.js';
import type { VenueCredentials, VenueSession } from '../venues/venue.types.js';

export interface VenueWiring {
  session: VenueSession;
  credentials: VenueCredentials;
}

export interface TradingRuntimeOptions {
  env?: EnvironmentConfig;
  catalog?: InstrumentCatalog;
  limits?: RiskLimits;
  /** Sessions to run; built from the environment when omitted */
  venues?: VenueWiring[];
  auditSink?: AuditSink;
  notificationSink?: NotificationSink;
  positionTracker?: PositionTracker;
  /** Polls the configured venues' tickers when omitted and venues come from the environment */
  marketFeed?: MarketFeed;
  signalSource?: SignalSource;
  /** Started by start(); entries for unregistered venues are skipped */
  strategies?: StrategyConfig[];
  clock?: () => Date;
}

function venuesFromEnvironment(env: EnvironmentConfig): VenueWiring[] {
  return getAllAvailableVenueConfigs(env).map(config => ({
    session: VenueFactory.createSession(config),
    credentials: config.credentials,
  }));
}

function marketFeedFromEnvironment(env: EnvironmentConfig): MarketFeed {
  return new PollingMarketFeed({
    sources: getAllAvailableVenueConfigs(env).map(config => VenueFactory.createTickerSource(config)),
    intervalMs: env.MARKET_POLL_MS,
  });
}

function defaultAuditSink(): AuditSink {
  const client = getSupabaseClient();
  return client ? new OrderAuditRepository(client) : new InMemoryAuditSink();
}

/**
 * Process-wide wiring: one connection manager per venue, one coordinator,
 * one strategy engine submitting through it.
 */
export class TradingRuntime {
  readonly registry: VenueRegistry;
  readonly riskGate: RiskGate;
  readonly coordinator: ExecutionCoordinator;
  readonly engine: StrategyEngine;
  private readonly env: EnvironmentConfig;
  private readonly strategies: StrategyConfig[];
  private readonly logger: pino.Logger;
  private started = false;

  constructor(options: TradingRuntimeOptions = {}) {
    this.env = options.env ?? getEnvironmentConfig();
    this.logger = getComponentLogger('runtime');
    this.strategies = options.strategies ?? [];

    const catalog = options.catalog ?? loadInstrumentCatalog();
    const limits = options.limits ?? loadRiskLimits(this.env);
    const notificationSink = options.notificationSink ?? new LoggerNotificationSink();
    const translators = TranslatorRegistry.withBuiltins(catalog);

    this.registry = new VenueRegistry();
    for (const { session, credentials } of options.venues ?? venuesFromEnvironment(this.env)) {
      const manager = new ConnectionManager({
        session,
        credentials,
        callTimeoutMs: this.env.VENUE_CALL_TIMEOUT_MS,
        orderTimeoutMs: this.env.ORDER_TIMEOUT_MS,
        notificationSink,
        clock: options.clock,
      });
      this.registry.register(manager, translators.get(session.venueId));
    }

    this.riskGate = new RiskGate({ catalog, limits, clock: options.clock });
    this.coordinator = new ExecutionCoordinator({
      registry: this.registry,
      riskGate: this.riskGate,
      auditSink: options.auditSink ?? defaultAuditSink(),
      notificationSink,
      positionTracker: options.positionTracker ?? new InMemoryPositionTracker(),
      activeStrategyCount: () => this.engine.activeCount(),
      clock: options.clock,
    });
    this.engine = new StrategyEngine({
      intake: this.coordinator,
      marketFeed: options.marketFeed ?? (options.venues ? undefined : marketFeedFromEnvironment(this.env)),
      signalSource: options.signalSource,
      notificationSink,
      clock: options.clock,
    });
  }

  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Connects every venue, starts snapshot refresh and the configured
   * strategies. A venue that fails to connect stays registered and is
   * retried on the first order.
   */
  async start(): Promise<StrategyRunSummary[]> {
    if (this.started) {
      return this.engine.listStrategies();
    }
    this.started = true;

    const venueIds = this.registry.venueIds();
    const outcomes = await this.registry.connectAll();
    outcomes.forEach((outcome, index) => {
      const venueId = venueIds[index];
      if (outcome.status === 'rejected') {
        this.logger.error(
          { venueId, error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason) },
          'Venue connection failed at startup'
        );
      } else {
        this.logger.info({ venueId }, 'Venue connected');
      }
    });

    for (const venueId of venueIds) {
      this.registry.get(venueId).manager.startSnapshotRefresh(this.env.SNAPSHOT_REFRESH_MS);
    }

    const summaries: StrategyRunSummary[] = [];
    for (const config of this.strategies) {
      if (!this.registry.has(config.venueId)) {
        this.logger.warn({ strategyId: config.id, venueId: config.venueId }, 'Strategy venue not configured, skipping');
        continue;
      }
      summaries.push(this.engine.start(config));
    }

    this.logger.info({ venues: venueIds, strategies: summaries.length }, 'Trading runtime started');
    return summaries;
  }

  /** Stops strategies first so no intent reaches a closing venue. */
  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;

    await this.engine.stopAll();
    for (const venueId of this.registry.venueIds()) {
      this.registry.get(venueId).manager.stopSnapshotRefresh();
    }
    await this.registry.disconnectAll();
    this.logger.info('Trading runtime stopped');
  }
}
