import Fastify, { type FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { getComponentLogger } from './config/logger.js';
import { getEnvironmentConfig, type EnvironmentConfig } from './config/env.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerOperatorRoutes } from './routes/operator.js';
import { registerStrategyRoutes } from './routes/strategy.js';
import type { TradingRuntime } from './runtime/trading-runtime.js';

export interface CreateAppOptions {
  env?: EnvironmentConfig;
}

export async function createApp(runtime: TradingRuntime, options: CreateAppOptions = {}): Promise<FastifyInstance> {
  const env = options.env ?? getEnvironmentConfig();
  const logger = getComponentLogger('http');

  const app = Fastify({
    logger: false, // We handle logging ourselves
    disableRequestLogging: true,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    genReqId: () => uuidv4(),
  });

  app.addHook('onRequest', async request => {
    request.startTime = Date.now();
  });

  app.addHook('onResponse', async (request, reply) => {
    const responseTime = Date.now() - (request.startTime ?? Date.now());
    logger.info(
      { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode, responseTime },
      `${request.method} ${request.url} ${reply.statusCode} - ${responseTime}ms`
    );
  });

  app.setErrorHandler(async (error, request, reply) => {
    logger.error(
      {
        requestId: request.id,
        method: request.method,
        url: request.url,
        error: { name: error.name, message: error.message, stack: error.stack },
      },
      'Request failed'
    );

    const statusCode = error.statusCode ?? 500;
    const message =
      env.NODE_ENV === 'production' && statusCode >= 500 ? 'Internal Server Error' : error.message;

    await reply.code(statusCode).send({
      error: {
        message,
        statusCode,
        requestId: request.id,
      },
    });
  });

  await registerHealthRoutes(app, runtime);
  await registerStrategyRoutes(app, runtime);
  await registerOperatorRoutes(app, runtime, env);

  return app;
}

declare module 'fastify' {
  interface FastifyRequest {
    startTime?: number;
  }
}
