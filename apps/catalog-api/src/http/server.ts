import { randomUUID } from 'node:crypto';

import type { AppEnv } from '@app/config';
import { setRequestIdAttribute, type Logger } from '@app/logger';
import type { CatalogService } from '@app/pim';
import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';

import { catalogRoutes } from '../routes/catalog.js';
import { errorEnvelope } from './envelope.js';
import { mapError } from './error-mapping.js';

export type CatalogApi = Pick<
  CatalogService,
  'enrichOne' | 'enrichBatch' | 'predictOne' | 'predictBatch'
>;

export type BuildServerOptions = Readonly<{
  env: AppEnv;
  logger: Logger;
  catalog: CatalogApi;
}>;

function withoutQuery(url: string): string {
  const q = url.indexOf('?');
  return q === -1 ? url : url.slice(0, q);
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { env, logger, catalog } = options;

  const server = Fastify({
    trustProxy: true,
    bodyLimit: 10 * 1024 * 1024,
    connectionTimeout: 10_000,
    requestTimeout: 120_000,
    requestIdHeader: 'x-request-id',
    genReqId(req) {
      const header = req.headers['x-request-id'];
      if (typeof header === 'string' && header.trim()) return header.trim();
      return randomUUID();
    },
  });

  const startedAt = new WeakMap<FastifyRequest, bigint>();

  server.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
    setRequestIdAttribute(request.id);
    startedAt.set(request, process.hrtime.bigint());

    logger.debug(
      { requestId: request.id, method: request.method, path: withoutQuery(request.url) },
      'request received'
    );
  });

  server.addHook('onResponse', async (request, reply) => {
    const startNs = startedAt.get(request);
    const durationMs = startNs === undefined ? 0 : Number(process.hrtime.bigint() - startNs) / 1e6;

    logger.info(
      {
        requestId: request.id,
        method: request.method,
        path: withoutQuery(request.url),
        statusCode: reply.statusCode,
        durationMs: Math.round(durationMs * 100) / 100,
      },
      'request completed'
    );
  });

  server.setErrorHandler(async (error, request, reply) => {
    const mapped = mapError(error, env.nodeEnv);
    if (mapped.statusCode >= 500) {
      logger.error({ requestId: request.id, error }, 'request failed');
    } else {
      logger.warn(
        { requestId: request.id, code: mapped.code, error: mapped.message },
        'request rejected'
      );
    }

    return reply
      .status(mapped.statusCode)
      .send(errorEnvelope(request.id, mapped.code, mapped.message, mapped.details));
  });

  server.setNotFoundHandler(async (request, reply) => {
    const route = `${request.method} ${withoutQuery(request.url)}`;
    return reply
      .status(404)
      .send(errorEnvelope(request.id, 'NOT_FOUND', `Route ${route} not found`));
  });

  server.get('/health/live', async (_request, reply) => {
    return reply.status(200).send({ status: 'alive' });
  });

  server.get('/health', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  await server.register(catalogRoutes, { logger, catalog });

  return server;
}
