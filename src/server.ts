import { createApp } from './app.js';
import { getEnvironmentConfig } from './config/env.js';
import { getLogger } from './config/logger.js';
import { getSupabaseClient, testSupabaseConnection } from './config/supabase.js';
import { TradingRuntime } from './runtime/trading-runtime.js';
import { loadStrategyConfigs } from './strategy/strategy-config.js';

async function startServer(): Promise<void> {
  const env = getEnvironmentConfig();
  const logger = getLogger();

  logger.info('Starting server initialization');

  // Audit persistence is optional; a failing check is logged, not fatal
  const client = getSupabaseClient();
  if (client && !(await testSupabaseConnection(client))) {
    logger.warn('Audit database unreachable, inserts will be retried per order');
  }

  const runtime = new TradingRuntime({
    env,
    strategies: env.STRATEGIES_AUTOSTART ? loadStrategyConfigs() : [],
  });
  await runtime.start();

  const app = await createApp(runtime, { env });

  let shuttingDown = false;
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ event: 'server_shutdown', signal }, 'Server shutting down');

    try {
      // Stop accepting requests, then let strategies and in-flight orders finish
      await app.close();
      logger.info('Server closed successfully');

      await runtime.stop();
      logger.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });

  process.on('unhandledRejection', reason => {
    logger.error({ event: 'unhandled_rejection', reason }, 'Unhandled promise rejection');
  });

  process.on('uncaughtException', error => {
    logger.fatal(
      {
        event: 'uncaught_exception',
        error: { name: error.name, message: error.message, stack: error.stack },
      },
      'Uncaught exception'
    );
    process.exit(1);
  });

  const address = await app.listen({ port: env.PORT, host: '0.0.0.0' });

  logger.info(
    { event: 'server_startup', address, environment: env.NODE_ENV, nodeVersion: process.version },
    'Server listening'
  );
}

startServer().catch(error => {
  const logger = getLogger();
  logger.fatal({ error }, 'Unhandled error during server startup');
  process.exit(1);
});
