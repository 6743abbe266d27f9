import { loadEnv, type AppEnv } from '@app/config';
import { createSilentLogger } from '@app/logger';
import {
  CatalogService,
  CollaboratorError,
  OutputDispatcher,
  type AttributeExtractor,
  type TokenBucket,
} from '@app/pim';

export const testEnv: AppEnv = loadEnv({ NODE_ENV: 'test', LOG_LEVEL: 'error' });

/** Text yields the title as category; vision agrees on titles starting with "Table". */
export const textExtractor: AttributeExtractor = {
  source: 'text',
  extract: async (record) => {
    if (record.title === 'broken') {
      throw new CollaboratorError('unreachable_resource', 'Keyword service is unreachable');
    }
    return [
      {
        attributeName: 'category',
        value: record.title,
        confidence: 0.8,
        source: 'text',
        evidence: [`title: ${record.title}`],
      },
    ];
  },
};

export const visionExtractor: AttributeExtractor = {
  source: 'vision',
  extract: async (record) =>
    record.title.startsWith('Table')
      ? [
          {
            attributeName: 'category',
            value: 'table',
            confidence: 0.7,
            source: 'vision',
            evidence: ['vision label: table (dining_table)'],
          },
        ]
      : [],
};

export function createTestCatalog(
  overrides: { maxTextChars?: number; rateLimiter?: TokenBucket | null } = {}
): CatalogService {
  const logger = createSilentLogger();
  return new CatalogService({
    maxBatchItems: 50,
    maxTextChars: overrides.maxTextChars ?? 10_000,
    recordTimeoutMs: 1_000,
    batchConcurrency: 4,
    rateLimiter: overrides.rateLimiter ?? null,
    ingestor: { ingest: async (record) => ({ ...record, imageLocalPath: null }) },
    textExtractor,
    visionExtractor,
    outputs: new OutputDispatcher({ publisher: null, sink: null, validateEvents: false, logger }),
    logger,
  });
}
