import type { Logger } from '@app/logger';
import { toBatchResultWire, toEnrichedWire, toPredictionWire } from '@app/pim';
import type { StageTimings } from '@app/types';
import {
  BatchRequestSchema,
  LegacyPredictRequestSchema,
  ProductRecordPayloadSchema,
} from '@app/validation';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';

import type { CatalogApi } from '../http/server.js';
import { successEnvelope } from '../http/envelope.js';
import { toProductRecord } from '../records.js';

type CatalogPluginOptions = Readonly<{
  logger: Logger;
  catalog: CatalogApi;
}>;

export const catalogRoutes: FastifyPluginAsync<CatalogPluginOptions> = async (
  server: FastifyInstance,
  options
) => {
  const { logger, catalog } = options;

  const logTimings = (
    requestId: string,
    operation: string,
    timings: StageTimings,
    counts: Record<string, number> = {}
  ): void => {
    logger.info({ requestId, operation, timings, ...counts }, 'catalog request served');
  };

  server.post('/v1/enrich', async (request, reply) => {
    const record = toProductRecord(ProductRecordPayloadSchema.parse(request.body));
    const { record: enriched, timings } = await catalog.enrichOne(record);
    logTimings(request.id, 'enrich', timings);
    return reply.send(successEnvelope(request.id, toEnrichedWire(enriched)));
  });

  server.post('/v1/enrich/batch', async (request, reply) => {
    const { items } = BatchRequestSchema.parse(request.body);
    const { result, timings } = await catalog.enrichBatch(items.map(toProductRecord));
    logTimings(request.id, 'enrich_batch', timings, {
      items: result.items.length,
      errors: result.errors.length,
    });
    return reply.send(successEnvelope(request.id, toBatchResultWire(result, toEnrichedWire)));
  });

  server.post('/v1/predict', async (request, reply) => {
    const record = toProductRecord(ProductRecordPayloadSchema.parse(request.body));
    const { record: prediction, timings } = await catalog.predictOne(record);
    logTimings(request.id, 'predict', timings);
    return reply.send(successEnvelope(request.id, toPredictionWire(prediction)));
  });

  server.post('/v1/predict/batch', async (request, reply) => {
    const { items } = BatchRequestSchema.parse(request.body);
    const { result, timings } = await catalog.predictBatch(items.map(toProductRecord));
    logTimings(request.id, 'predict_batch', timings, {
      items: result.items.length,
      errors: result.errors.length,
    });
    return reply.send(successEnvelope(request.id, toBatchResultWire(result, toPredictionWire)));
  });

  // Deprecated: kept for clients still posting `{records}`.
  server.post('/predict', async (request, reply) => {
    const { records } = LegacyPredictRequestSchema.parse(request.body);
    const { result, timings } = await catalog.predictBatch(records.map(toProductRecord));
    logTimings(request.id, 'predict_legacy', timings, {
      items: result.items.length,
      errors: result.errors.length,
    });
    reply.header('deprecation', 'true');
    reply.header('link', '</v1/predict/batch>; rel="successor-version"');
    return reply.send(successEnvelope(request.id, toBatchResultWire(result, toPredictionWire)));
  });
};
