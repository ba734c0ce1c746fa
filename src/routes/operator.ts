import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { timingSafeEqual } from 'node:crypto';
import type { EnvironmentConfig } from '../config/env.js';
import { getComponentLogger } from '../config/logger.js';
import { isTradingError } from '../errors/trading-errors.js';
import type { AmbiguousOrder, AmbiguousResolution } from '../execution/services/execution-coordinator.service.js';
import type { TradingRuntime } from '../runtime/trading-runtime.js';

interface VenueParams {
  Params: { venueId: string };
}

interface AmbiguousParams {
  Params: { key: string };
}

interface OrdersQuery extends VenueParams {
  Querystring: { symbol?: string };
}

interface CancelRequest extends VenueParams {
  Body: { symbol: string; venueOrderId?: string; clientOrderId?: string };
}

interface CloseRequest extends VenueParams {
  Body: { symbol: string; marginMode?: 'cross' | 'isolated' };
}

interface AcknowledgeRequest extends AmbiguousParams {
  Body: AmbiguousResolution;
}

const OPERATOR_TOKEN_HEADER = 'x-operator-token';

const acknowledgeSchema = {
  body: {
    type: 'object',
    additionalProperties: false,
    properties: {
      filledQuantity: { type: 'number', minimum: 0 },
      filledPrice: { type: 'number', exclusiveMinimum: 0 },
      venueOrderId: { type: 'string', minLength: 1 },
      status: { type: 'string', enum: ['FILLED', 'PARTIALLY_FILLED', 'ACCEPTED', 'REJECTED'] },
      note: { type: 'string' },
    },
  },
} as const;

const cancelSchema = {
  body: {
    type: 'object',
    required: ['symbol'],
    additionalProperties: false,
    properties: {
      symbol: { type: 'string', minLength: 1 },
      venueOrderId: { type: 'string', minLength: 1 },
      clientOrderId: { type: 'string', minLength: 1 },
    },
  },
} as const;

const closeSchema = {
  body: {
    type: 'object',
    required: ['symbol'],
    additionalProperties: false,
    properties: {
      symbol: { type: 'string', minLength: 1 },
      marginMode: { type: 'string', enum: ['cross', 'isolated'] },
    },
  },
} as const;

function tokensMatch(supplied: string, expected: string): boolean {
  const a = Buffer.from(supplied);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

function failureStatus(error: unknown): number | undefined {
  if (!isTradingError(error)) {
    return undefined;
  }
  switch (error.kind) {
    case 'UNKNOWN_VENUE':
      return 404;
    case 'CRITICAL':
      return 409;
    case 'INVALID_ORDER':
      return 400;
    default:
      return 503;
  }
}

async function sendFailure(reply: FastifyReply, error: unknown): Promise<void> {
  const statusCode = failureStatus(error);
  if (statusCode === undefined) {
    throw error;
  }
  const kind = isTradingError(error) ? error.kind : undefined;
  const message = error instanceof Error ? error.message : String(error);
  await reply.code(statusCode).send({ error: { message, statusCode, kind } });
}

function describeAmbiguous({ intent, result }: AmbiguousOrder): Record<string, unknown> {
  return {
    idempotencyKey: intent.idempotencyKey,
    venueId: intent.venueId,
    symbol: intent.symbol,
    side: intent.side,
    kind: intent.kind,
    quantity: intent.quantity,
    venueOrderId: result.venueOrderId,
    errorMessage: result.errorMessage,
    since: result.timestamp.toISOString(),
  };
}

/**
 * Manual recovery controls: venue reconnect, halt reset and health checks,
 * order management and settlement of ambiguous orders. Guarded by
 * OPERATOR_TOKEN when it is set.
 */
export async function registerOperatorRoutes(
  fastify: FastifyInstance,
  runtime: TradingRuntime,
  env: EnvironmentConfig
): Promise<void> {
  const { coordinator, registry } = runtime;
  const token = env.OPERATOR_TOKEN;
  const logger = getComponentLogger('operator-routes');

  if (!token && env.NODE_ENV === 'production') {
    logger.warn('OPERATOR_TOKEN is not set, operator routes are unauthenticated');
  }

  await fastify.register(async function operatorRoutes(fastify: FastifyInstance) {
    fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
      if (!token) {
        return;
      }
      const supplied = request.headers[OPERATOR_TOKEN_HEADER];
      if (typeof supplied !== 'string' || !tokensMatch(supplied, token)) {
        logger.warn({ url: request.url, requestId: request.id }, 'Operator request without a valid token');
        return reply.code(401).send({ error: { message: 'Operator token required', statusCode: 401 } });
      }
    });

    fastify.post<VenueParams>('/operator/venues/:venueId/reconnect', async (request, reply) => {
      const { venueId } = request.params;
      try {
        const state = await registry.get(venueId).manager.reconnect();
        logger.info({ venueId, state }, 'Operator reconnect');
        await reply.code(200).send({ venueId, state });
      } catch (error) {
        await sendFailure(reply, error);
      }
    });

    fastify.post<VenueParams>('/operator/venues/:venueId/reset', async (request, reply) => {
      const { venueId } = request.params;
      try {
        const { manager } = registry.get(venueId);
        manager.operatorReset();
        const state = await manager.reconnect();
        // halt() stopped the refresh timer
        manager.startSnapshotRefresh(env.SNAPSHOT_REFRESH_MS);
        logger.warn({ venueId, state }, 'Operator reset');
        await reply.code(200).send({ venueId, state });
      } catch (error) {
        await sendFailure(reply, error);
      }
    });

    fastify.post<VenueParams>('/operator/venues/:venueId/health-check', async (request, reply) => {
      const { venueId } = request.params;
      try {
        const state = await registry.get(venueId).manager.healthCheck();
        await reply.code(200).send({ venueId, state });
      } catch (error) {
        await sendFailure(reply, error);
      }
    });

    fastify.get<OrdersQuery>('/operator/venues/:venueId/orders', async (request, reply) => {
      try {
        const orders = await registry.get(request.params.venueId).manager.listOpenOrders(request.query.symbol);
        await reply.code(200).send({ orders });
      } catch (error) {
        await sendFailure(reply, error);
      }
    });

    fastify.post<CancelRequest>(
      '/operator/venues/:venueId/orders/cancel',
      { schema: cancelSchema },
      async (request, reply) => {
        const { venueId } = request.params;
        try {
          const ref = await registry.get(venueId).manager.cancelOrder(request.body);
          logger.info({ venueId, ...ref }, 'Operator cancel');
          await reply.code(200).send(ref);
        } catch (error) {
          await sendFailure(reply, error);
        }
      }
    );

    fastify.post<CloseRequest>(
      '/operator/venues/:venueId/positions/close',
      { schema: closeSchema },
      async (request, reply) => {
        const { venueId } = request.params;
        try {
          const result = await registry.get(venueId).manager.closePosition(request.body);
          logger.info({ venueId, ...result }, 'Operator close position');
          await reply.code(200).send(result);
        } catch (error) {
          await sendFailure(reply, error);
        }
      }
    );

    fastify.get('/operator/orders/ambiguous', async (_request, reply) => {
      await reply.code(200).send({ orders: coordinator.listAmbiguous().map(describeAmbiguous) });
    });

    fastify.post<AcknowledgeRequest>(
      '/operator/orders/ambiguous/:key/acknowledge',
      { schema: acknowledgeSchema },
      async (request, reply) => {
        const { key } = request.params;
        if (!coordinator.getAmbiguous(key)) {
          await reply.code(404).send({ error: { message: `No ambiguous order with key ${key}`, statusCode: 404 } });
          return;
        }
        const result = await coordinator.acknowledgeAmbiguous(key, request.body ?? {});
        await reply.code(200).send(result);
      }
    );

    fastify.post<AmbiguousParams>('/operator/orders/ambiguous/:key/reconcile', async (request, reply) => {
      const { key } = request.params;
      if (!coordinator.getAmbiguous(key)) {
        await reply.code(404).send({ error: { message: `No ambiguous order with key ${key}`, statusCode: 404 } });
        return;
      }
      try {
        const result = await coordinator.reconcileAmbiguous(key);
        if (!result) {
          await reply.code(202).send({ idempotencyKey: key, reconciled: false });
          return;
        }
        await reply.code(200).send(result);
      } catch (error) {
        await sendFailure(reply, error);
      }
    });
  });
}
