import type { FastifyInstance } from 'fastify';
import type { TradingRuntime } from '../runtime/trading-runtime.js';

interface StrategyParams {
  Params: { id: string };
}

export async function registerStrategyRoutes(
  fastify: FastifyInstance,
  runtime: TradingRuntime
): Promise<void> {
  const { engine } = runtime;

  await fastify.register(async function strategyRoutes(fastify: FastifyInstance) {
    fastify.get('/strategies', async (_request, reply) => {
      await reply.code(200).send({ strategies: engine.listStrategies() });
    });

    fastify.get<StrategyParams>('/strategies/:id', async (request, reply) => {
      const summary = engine.getStrategy(request.params.id);
      if (!summary) {
        await reply.code(404).send({ error: { message: `Unknown strategy ${request.params.id}`, statusCode: 404 } });
        return;
      }
      await reply.code(200).send(summary);
    });
  });
}
