import { describe, expect, it, vi } from 'vitest';

import { createSilentLogger } from '@app/logger';
import type { AttributeCandidate, IngestedRecord, ProductRecord } from '@app/types';

import type { AttributeExtractor } from '../extractors/types.js';
import { OutputDispatcher } from '../outputs/output-dispatcher.js';
import { CatalogService } from '../services/catalog-service.js';
import { AdmissionError, CollaboratorError, StageError } from '../services/errors.js';
import { TokenBucket } from '../services/token-bucket.js';

function product(productId: string, title = 'Oak Table', description = ''): ProductRecord {
  return { productId, title, description };
}

const textExtractor = {
  source: 'text' as const,
  extract: vi.fn(async (record: IngestedRecord): Promise<AttributeCandidate[]> => {
    if (record.title === 'broken') {
      throw new CollaboratorError(
        'malformed_input',
        'Record has neither title nor description text'
      );
    }
    return [
      {
        attributeName: 'category',
        value: record.title,
        confidence: 0.8,
        source: 'text',
        evidence: [],
      },
    ];
  }),
} satisfies AttributeExtractor;

const visionExtractor: AttributeExtractor = { source: 'vision', extract: async () => [] };

function service(overrides: {
  publish?: () => Promise<string>;
  rateLimiter?: TokenBucket | null;
  maxTextChars?: number;
  recordTimeoutMs?: number;
  textExtractor?: AttributeExtractor;
} = {}) {
  const publish = vi.fn(overrides.publish ?? (async () => 'id'));
  const catalog = new CatalogService({
    maxBatchItems: 50,
    maxTextChars: overrides.maxTextChars ?? 10_000,
    recordTimeoutMs: overrides.recordTimeoutMs ?? 1_000,
    batchConcurrency: 4,
    rateLimiter: overrides.rateLimiter ?? null,
    ingestor: { ingest: async (record) => ({ ...record, imageLocalPath: null }) },
    textExtractor: overrides.textExtractor ?? textExtractor,
    visionExtractor,
    outputs: new OutputDispatcher({
      publisher: { kind: 'fake', publish },
      sink: null,
      validateEvents: false,
      logger: createSilentLogger(),
    }),
    logger: createSilentLogger(),
  });
  return { catalog, publish };
}

describe('catalog-service', () => {
  it('times out only the record whose enrich stage never returns', async () => {
    const hangingText: AttributeExtractor = {
      source: 'text',
      extract: (record) =>
        record.productId === 'b'
          ? new Promise<AttributeCandidate[]>(() => undefined)
          : textExtractor.extract(record),
    };
    const { catalog } = service({ recordTimeoutMs: 50, textExtractor: hangingText });

    const { result } = await catalog.predictBatch([
      product('a', 'Desk'),
      product('b', 'Sofa'),
      product('c', 'Bench'),
    ]);

    expect(result.items.map((entry) => entry.index)).toEqual([0, 2]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({
      index: 1,
      productId: 'b',
      stage: 'enrich',
      errorType: 'timeout',
    });
  });

  it('returns successes and staged errors together, ordered by index', async () => {
    const { catalog, publish } = service();

    const { result, timings } = await catalog.predictBatch([
      product('a', 'Desk'),
      product('b', 'broken'),
      product('c', 'Bench'),
    ]);

    expect(
      result.items.map((entry) => [entry.index, entry.item.finalPredictions.category?.value])
    ).toEqual([
      [0, 'Desk'],
      [2, 'Bench'],
    ]);
    expect(result.errors).toEqual([
      {
        index: 1,
        productId: 'b',
        stage: 'enrich',
        errorType: 'malformed_input',
        message: 'Record has neither title nor description text',
      },
    ]);
    expect(publish).toHaveBeenCalledTimes(2);
    expect(Object.keys(timings)).toEqual(['ingestMs', 'enrichMs', 'visionMs', 'fuseMs']);
  });

  it('rejects an oversized batch before running any record', async () => {
    textExtractor.extract.mockClear();
    const { catalog } = service();
    const records = Array.from({ length: 51 }, (_, index) => product(`p-${index}`));

    await expect(catalog.predictBatch(records)).rejects.toMatchObject({
      errorType: 'batch_limit_exceeded',
    });
    expect(textExtractor.extract).not.toHaveBeenCalled();
  });

  it('keeps results intact when publishing fails', async () => {
    const { catalog } = service({
      publish: async () => {
        throw new Error('broker down');
      },
    });
    const { result } = await catalog.predictBatch([product('a'), product('b')]);
    expect(result.items).toHaveLength(2);
    expect(result.errors).toEqual([]);
  });

  it('throws typed errors for single records', async () => {
    const { catalog } = service({ maxTextChars: 5 });
    await expect(catalog.predictOne(product('long', 'Extendable Table'))).rejects.toBeInstanceOf(
      AdmissionError
    );

    const { catalog: lenient } = service();
    await expect(lenient.predictOne(product('x', 'broken'))).rejects.toBeInstanceOf(StageError);
  });

  it('rate limits requests across calls', async () => {
    const bucket = new TokenBucket({ capacity: 1, refillPerMinute: 1, now: () => 0 });
    const { catalog } = service({ rateLimiter: bucket });

    await catalog.enrichOne(product('a'));
    await expect(catalog.enrichBatch([product('b')])).rejects.toMatchObject({
      errorType: 'rate_limited',
    });
  });

  it('enriches single records without publishing', async () => {
    const { catalog, publish } = service();
    const { record } = await catalog.enrichOne(product('a', 'Sofa'));
    expect(record.predictions.category?.value).toBe('Sofa');
    expect(publish).not.toHaveBeenCalled();
  });

  it('ingests records without running extractors', async () => {
    textExtractor.extract.mockClear();
    const { catalog } = service();
    const { result } = await catalog.ingestBatch([product('a'), product('b')]);
    expect(result.items.map((entry) => entry.item.imageLocalPath)).toEqual([null, null]);
    expect(textExtractor.extract).not.toHaveBeenCalled();
  });
});
