#!/usr/bin/env node

import { Command } from 'commander';
import { TradingRuntime } from '../runtime/trading-runtime.js';
import { createOrderIntent, type OrderIntentInput } from '../execution/order-intent.js';
import type { OrderKind, OrderSide } from '../execution/types/execution.types.js';
import { loadStrategyConfigs } from '../strategy/strategy-config.js';
import type { VenueOrderRef, VenueOrderState } from '../venues/venue.types.js';

/**
 * Operator CLI: venue health, one-off orders, order management and
 * strategy file checks.
 */

export interface SubmitOptions {
  venue: string;
  symbol: string;
  side: string;
  kind: string;
  quantity: string;
  price?: string;
  stopLoss?: string;
  takeProfit?: string;
  referencePrice?: string;
  key?: string;
  operator: string;
}

const SIDES: readonly OrderSide[] = ['BUY', 'SELL'];
const KINDS: readonly OrderKind[] = ['MARKET', 'LIMIT', 'STOP'];

function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number. Got: ${value}`);
  }
  return parsed;
}

export function toOrderInput(options: SubmitOptions): OrderIntentInput {
  const side = SIDES.find(candidate => candidate === options.side.toUpperCase());
  if (!side) {
    throw new Error(`--side must be BUY or SELL. Got: ${options.side}`);
  }
  const kind = KINDS.find(candidate => candidate === options.kind.toUpperCase());
  if (!kind) {
    throw new Error(`--kind must be one of ${KINDS.join(', ')}. Got: ${options.kind}`);
  }
  const quantity = parseNumberOption('quantity', options.quantity);
  if (quantity === undefined) {
    throw new Error('--quantity is required');
  }

  return {
    venueId: options.venue,
    symbol: options.symbol,
    side,
    kind,
    quantity,
    price: parseNumberOption('price', options.price),
    stopLoss: parseNumberOption('stop-loss', options.stopLoss),
    takeProfit: parseNumberOption('take-profit', options.takeProfit),
    referencePrice: parseNumberOption('reference-price', options.referencePrice),
    idempotencyKey: options.key,
    originator: { type: 'MANUAL', id: options.operator },
  };
}

export interface OrderRefOptions {
  venue: string;
  symbol: string;
  orderId?: string;
  clientId?: string;
}

export function toOrderRef(options: OrderRefOptions): VenueOrderRef {
  if (!options.orderId && !options.clientId) {
    throw new Error('--order-id or --client-id is required');
  }
  return { symbol: options.symbol, venueOrderId: options.orderId, clientOrderId: options.clientId };
}

export function formatOrder(order: VenueOrderState): string {
  const fill = order.averagePrice === null ? '' : ` @ ${order.averagePrice}`;
  const client = order.clientOrderId ? ` (${order.clientOrderId})` : '';
  return `${order.venueOrderId}${client} ${order.side} ${order.filledQuantity}/${order.quantity} ${order.symbol} ${order.status}${fill}`;
}

async function withRuntime<T>(run: (runtime: TradingRuntime) => Promise<T>): Promise<T> {
  const runtime = new TradingRuntime();
  await runtime.start();
  try {
    return await run(runtime);
  } finally {
    await runtime.stop();
  }
}

const program = new Command();

program
  .name('trading-cli')
  .description('Multi-venue execution core operator tools')
  .version('1.0.0');

program
  .command('health')
  .description('Connect every configured venue and print its status')
  .action(async () => {
    try {
      const statuses = await withRuntime(async runtime => runtime.coordinator.listConnectionHealth());

      if (statuses.length === 0) {
        console.log('⚠️  No venues configured');
        return;
      }
      for (const status of statuses) {
        const marker = status.state === 'CONNECTED' ? '✅' : '❌';
        console.log(`${marker} ${status.venueId}: ${status.state}`);
        if (status.lastError) {
          console.log(`  - Last error: ${status.lastError}`);
        }
      }
    } catch (error) {
      console.error('❌ Health check failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command('submit')
  .description('Submit one order through the risk gate')
  .requiredOption('-v, --venue <venue>', 'Venue id (okx, mt5)')
  .requiredOption('-s, --symbol <symbol>', 'Venue symbol (e.g., XAUUSD, BTC-USDT-SWAP)')
  .requiredOption('--side <side>', 'BUY or SELL')
  .requiredOption('-q, --quantity <quantity>', 'Order quantity')
  .option('-k, --kind <kind>', 'MARKET, LIMIT or STOP', 'MARKET')
  .option('-p, --price <price>', 'Limit or trigger price')
  .option('--stop-loss <price>', 'Stop-loss price')
  .option('--take-profit <price>', 'Take-profit price')
  .option('--reference-price <price>', 'Current market price for risk checks')
  .option('--key <key>', 'Idempotency key; reuse it to retry safely')
  .option('--operator <name>', 'Recorded as the order originator', 'cli')
  .action(async (options: SubmitOptions) => {
    try {
      const intent = createOrderIntent(toOrderInput(options));
      console.log(`🚀 Submitting ${intent.side} ${intent.quantity} ${intent.symbol} on ${intent.venueId}`);
      console.log(`Idempotency key: ${intent.idempotencyKey}`);

      const result = await withRuntime(runtime => runtime.coordinator.submit(intent));

      console.log(`📊 Status: ${result.status}`);
      if (result.venueOrderId) {
        console.log(`  - Venue order: ${result.venueOrderId}`);
      }
      if (result.filledQuantity !== undefined) {
        console.log(`  - Filled: ${result.filledQuantity} @ ${result.filledPrice ?? 'n/a'}`);
      }
      if (result.rejectionReason) {
        console.log(`  - Rejection: ${result.rejectionReason.code} ${result.rejectionReason.description}`);
      }
      if (result.errorMessage) {
        console.log(`  - Error: ${result.errorKind ?? 'UNKNOWN'} ${result.errorMessage}`);
      }

      if (result.status === 'REJECTED' || result.status === 'ERROR' || result.status === 'AMBIGUOUS') {
        process.exit(1);
      }
    } catch (error) {
      console.error('❌ Submit failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command('orders')
  .description('List open orders on a venue')
  .requiredOption('-v, --venue <venue>', 'Venue id (okx, mt5)')
  .option('-s, --symbol <symbol>', 'Only orders in this symbol')
  .action(async (options: { venue: string; symbol?: string }) => {
    try {
      const orders = await withRuntime(runtime =>
        runtime.registry.get(options.venue).manager.listOpenOrders(options.symbol)
      );
      if (orders.length === 0) {
        console.log('No open orders');
        return;
      }
      for (const order of orders) {
        console.log(`  - ${formatOrder(order)}`);
      }
    } catch (error) {
      console.error('❌ Order listing failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command('order')
  .description('Show one order as the venue reports it')
  .requiredOption('-v, --venue <venue>', 'Venue id (okx, mt5)')
  .requiredOption('-s, --symbol <symbol>', 'Venue symbol')
  .option('--order-id <id>', 'Venue order id')
  .option('--client-id <id>', 'Client order id')
  .action(async (options: OrderRefOptions) => {
    try {
      const ref = toOrderRef(options);
      const order = await withRuntime(runtime => runtime.registry.get(options.venue).manager.getOrder(ref));
      if (!order) {
        console.log('❌ Order not found');
        process.exit(1);
      }
      console.log(`📊 ${formatOrder(order)}`);
    } catch (error) {
      console.error('❌ Order lookup failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command('cancel')
  .description('Cancel a resting order')
  .requiredOption('-v, --venue <venue>', 'Venue id (okx, mt5)')
  .requiredOption('-s, --symbol <symbol>', 'Venue symbol')
  .option('--order-id <id>', 'Venue order id')
  .option('--client-id <id>', 'Client order id')
  .action(async (options: OrderRefOptions) => {
    try {
      const ref = toOrderRef(options);
      const canceled = await withRuntime(runtime => runtime.registry.get(options.venue).manager.cancelOrder(ref));
      console.log(`✅ Cancel accepted for ${canceled.venueOrderId ?? canceled.clientOrderId ?? ref.symbol}`);
    } catch (error) {
      console.error('❌ Cancel failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command('close')
  .description('Market-close the whole position in a symbol')
  .requiredOption('-v, --venue <venue>', 'Venue id (okx, mt5)')
  .requiredOption('-s, --symbol <symbol>', 'Venue symbol')
  .option('--isolated', 'OKX isolated margin position')
  .action(async (options: { venue: string; symbol: string; isolated?: boolean }) => {
    try {
      const result = await withRuntime(runtime =>
        runtime.registry.get(options.venue).manager.closePosition({
          symbol: options.symbol,
          marginMode: options.isolated ? 'isolated' : undefined,
        })
      );
      console.log(`${result.closed ? '✅' : '⚠️ '} ${result.symbol}: ${result.message}`);
    } catch (error) {
      console.error('❌ Close failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command('strategies')
  .description('Validate a strategy configuration file')
  .option('-f, --file <path>', 'Strategy file (defaults to config/strategies.json)')
  .action((options: { file?: string }) => {
    try {
      const configs = loadStrategyConfigs(options.file);
      console.log(`✅ ${configs.length} strategies valid`);
      for (const config of configs) {
        console.log(`  - ${config.id}: ${config.type} on ${config.venueId}`);
      }
    } catch (error) {
      console.error('❌ Invalid strategy configuration:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

if (import.meta.url === `file://${process.argv[1]}`) {
  program.parseAsync().catch(error => {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}

export { program };
