import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { getEnvironmentConfig } from '../config/env.js';
import { isTradingError } from '../errors/trading-errors.js';
import type { TradingRuntime } from '../runtime/trading-runtime.js';

export interface HealthResponse {
  status: 'ok' | 'degraded';
  environment: string;
  uptime: number;
  venues: number;
  openOrders: number;
  activeStrategies: number;
}

const startTime = Date.now();

export async function registerHealthRoutes(
  fastify: FastifyInstance,
  runtime: TradingRuntime
): Promise<void> {
  await fastify.register(async function healthRoutes(fastify: FastifyInstance) {
    fastify.get(
      '/health',
      {
        schema: {
          response: {
            200: {
              type: 'object',
              properties: {
                status: { type: 'string', enum: ['ok', 'degraded'] },
                environment: { type: 'string' },
                uptime: { type: 'number' },
                venues: { type: 'number' },
                openOrders: { type: 'number' },
                activeStrategies: { type: 'number' },
              },
              required: ['status', 'environment', 'uptime'],
            },
          },
        },
      },
      async (_request: FastifyRequest, reply: FastifyReply) => {
        const statuses = runtime.coordinator.listConnectionHealth();
        // Degraded while any venue is not connected
        const healthy = statuses.every(status => status.state === 'CONNECTED' && !status.halted);

        const response: HealthResponse = {
          status: healthy ? 'ok' : 'degraded',
          environment: getEnvironmentConfig().NODE_ENV,
          uptime: Date.now() - startTime,
          venues: statuses.length,
          openOrders: runtime.coordinator.openOrderCount(),
          activeStrategies: runtime.engine.activeCount(),
        };

        await reply.code(200).type('application/json').send(response);
      }
    );

    fastify.get('/health/venues', async (_request, reply) => {
      await reply.code(200).send({ venues: runtime.coordinator.listConnectionHealth() });
    });

    fastify.get<{ Params: { venueId: string } }>('/health/venues/:venueId', async (request, reply) => {
      try {
        await reply.code(200).send(runtime.coordinator.getConnectionHealth(request.params.venueId));
      } catch (error) {
        if (isTradingError(error) && error.kind === 'UNKNOWN_VENUE') {
          await reply.code(404).send({ error: { message: error.message, statusCode: 404 } });
          return;
        }
        throw error;
      }
    });
  });
}
