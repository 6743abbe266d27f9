import type { AppEnv } from '@app/config';
import type { Logger } from '@app/logger';
import type {
  BatchResult,
  EnrichedRecord,
  IngestedRecord,
  PredictionRecord,
  ProductRecord,
  StageTimings,
} from '@app/types';

import { TextAttributeExtractor } from '../extractors/text-extractor.js';
import type { AttributeExtractor, ImageIngestor } from '../extractors/types.js';
import { VisionAttributeExtractor } from '../extractors/vision-extractor.js';
import { createOutputDispatcher, OutputDispatcher } from '../outputs/output-dispatcher.js';
import { AdmissionGuard } from './admission-guard.js';
import { BatchOrchestrator, type RecordRunner } from './batch-orchestrator.js';
import type { Clock } from './deadline.js';
import { CachingImageIngestor } from './image-ingest.js';
import { RecordPipeline, sumTimings, type PipelineOutcome } from './record-pipeline.js';
import { createRateLimiter, type TokenBucket } from './token-bucket.js';

export type SingleResult<T> = Readonly<{ record: T; timings: StageTimings }>;
export type BatchRunResult<T> = Readonly<{ result: BatchResult<T>; timings: StageTimings }>;

export type CatalogServiceOptions = Readonly<{
  maxBatchItems: number;
  maxTextChars: number;
  recordTimeoutMs: number;
  batchConcurrency: number;
  rateLimiter: TokenBucket | null;
  ingestor: ImageIngestor;
  textExtractor: AttributeExtractor;
  visionExtractor: AttributeExtractor;
  outputs: OutputDispatcher;
  logger: Logger;
  now?: Clock;
}>;

/**
 * Request-level entry points. Each call is admitted first; single-record calls throw the
 * AdmissionError or StageError, batch calls return successes and errors side by side.
 */
export class CatalogService {
  private readonly guard: AdmissionGuard;
  private readonly pipeline: RecordPipeline;
  private readonly orchestrator: BatchOrchestrator;

  constructor(private readonly options: CatalogServiceOptions) {
    this.guard = new AdmissionGuard(
      { maxBatchItems: options.maxBatchItems, maxTextChars: options.maxTextChars },
      options.rateLimiter
    );
    this.pipeline = new RecordPipeline({
      ingestor: options.ingestor,
      textExtractor: options.textExtractor,
      visionExtractor: options.visionExtractor,
      logger: options.logger,
      recordTimeoutMs: options.recordTimeoutMs,
      ...(options.now ? { now: options.now } : {}),
    });
    this.orchestrator = new BatchOrchestrator(options.batchConcurrency, options.logger);
  }

  async ingestBatch(records: readonly ProductRecord[]): Promise<BatchRunResult<IngestedRecord>> {
    return this.runBatch(records, (record) => this.pipeline.runIngest(record));
  }

  async enrichOne(record: ProductRecord): Promise<SingleResult<EnrichedRecord>> {
    const admitted = this.guard.admitOne(record);
    if (!admitted.ok) throw admitted.error;
    return this.unwrap(await this.pipeline.runEnrich(admitted.value));
  }

  async enrichBatch(records: readonly ProductRecord[]): Promise<BatchRunResult<EnrichedRecord>> {
    return this.runBatch(records, (record) => this.pipeline.runEnrich(record));
  }

  async predictOne(record: ProductRecord): Promise<SingleResult<PredictionRecord>> {
    const admitted = this.guard.admitOne(record);
    if (!admitted.ok) throw admitted.error;
    const single = this.unwrap(await this.pipeline.run(admitted.value));
    await this.options.outputs.dispatch([single.record]);
    return single;
  }

  async predictBatch(records: readonly ProductRecord[]): Promise<BatchRunResult<PredictionRecord>> {
    const run = await this.runBatch(records, (record) => this.pipeline.run(record));
    await this.options.outputs.dispatch(run.result.items.map((entry) => entry.item));
    return run;
  }

  async close(): Promise<void> {
    await this.options.outputs.close();
  }

  private async runBatch<T>(
    records: readonly ProductRecord[],
    runner: RecordRunner<T>
  ): Promise<BatchRunResult<T>> {
    const admitted = this.guard.admitBatch(records);
    if (!admitted.ok) throw admitted.error;
    const { accepted, rejected } = admitted.value;
    const run = await this.orchestrator.runBatch(accepted, runner, rejected);
    return { result: run.result, timings: run.timings };
  }

  private unwrap<T>(outcome: PipelineOutcome<T>): SingleResult<T> {
    if (!outcome.ok) throw outcome.error;
    return { record: outcome.value, timings: sumTimings([outcome.timings]) };
  }
}

/** Wires the default collaborators from configuration. */
export function createCatalogService(env: AppEnv, logger: Logger): CatalogService {
  return new CatalogService({
    maxBatchItems: env.maxBatchItems,
    maxTextChars: env.maxTextChars,
    recordTimeoutMs: env.recordTimeoutMs,
    batchConcurrency: env.batchConcurrency,
    rateLimiter: createRateLimiter({ rpmLimit: env.rpmLimit, capacity: env.rateLimitCapacity }),
    ingestor: new CachingImageIngestor({ cacheDir: env.cacheDir, timeoutMs: env.ingestTimeoutMs }),
    textExtractor: new TextAttributeExtractor(),
    visionExtractor: new VisionAttributeExtractor(),
    outputs: createOutputDispatcher(env, logger),
    logger,
  });
}
