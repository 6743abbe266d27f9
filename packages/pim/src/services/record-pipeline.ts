import { OTEL_ATTR, setSpanAttribute, withSpan, type Logger } from '@app/logger';
import type {
  AttributeCandidate,
  AttributeName,
  EnrichedRecord,
  IngestedRecord,
  PredictionRecord,
  ProductMetadata,
  ProductRecord,
  StageTimings,
} from '@app/types';

import type { AttributeExtractor, ImageIngestor } from '../extractors/types.js';
import { type Clock, Deadline, runWithDeadline } from './deadline.js';
import { classifyStageFailure, type StageError } from './errors.js';
import { fuse, sanitizeCandidates } from './fusion-engine.js';

type ExecutionStage = StageError['stage'];

export type PipelineOutcome<T> =
  | { ok: true; value: T; timings: StageTimings }
  | { ok: false; error: StageError; timings: StageTimings };

export type RecordPipelineDeps = Readonly<{
  ingestor: ImageIngestor;
  textExtractor: AttributeExtractor;
  visionExtractor: AttributeExtractor;
  logger: Logger;
  recordTimeoutMs: number;
  now?: Clock;
}>;

const TIMING_KEY = {
  ingest: 'ingestMs',
  enrich: 'enrichMs',
  vision: 'visionMs',
  fuse: 'fuseMs',
} as const satisfies Record<ExecutionStage, keyof StageTimings>;

export function emptyTimings(): StageTimings {
  return { ingestMs: 0, enrichMs: 0, visionMs: 0, fuseMs: 0 };
}

export function sumTimings(all: readonly StageTimings[]): StageTimings {
  const total = emptyTimings();
  for (const timings of all) {
    total.ingestMs += timings.ingestMs;
    total.enrichMs += timings.enrichMs;
    total.visionMs += timings.visionMs;
    total.fuseMs += timings.fuseMs;
  }
  return total;
}

function metadataOf(record: ProductRecord): ProductMetadata {
  return {
    brand: record.brand ?? null,
    sku: record.sku ?? null,
    price: record.price ?? null,
    currency: record.currency ?? null,
  };
}

/** Keeps the most confident text candidate per attribute for the enrich response. */
function topCandidates(
  candidates: readonly AttributeCandidate[]
): Partial<Record<AttributeName, AttributeCandidate>> {
  const top: Partial<Record<AttributeName, AttributeCandidate>> = {};
  for (const candidate of candidates) {
    const current = top[candidate.attributeName];
    if (!current || candidate.confidence > current.confidence) {
      top[candidate.attributeName] = candidate;
    }
  }
  return top;
}

/**
 * Drives one record through ingest, enrich, vision and fuse under a single deadline.
 * Failures never throw out of the `run*` methods; they come back as a StageError outcome.
 */
export class RecordPipeline {
  private readonly now: Clock;

  constructor(private readonly deps: RecordPipelineDeps) {
    this.now = deps.now ?? Date.now;
  }

  startDeadline(): Deadline {
    return Deadline.after(this.deps.recordTimeoutMs, this.now);
  }

  async run(
    record: ProductRecord,
    deadline: Deadline = this.startDeadline()
  ): Promise<PipelineOutcome<PredictionRecord>> {
    const timings = emptyTimings();
    try {
      const ingested = await this.stage('ingest', record, deadline, timings, (signal) =>
        this.deps.ingestor.ingest(record, signal)
      );
      const textCandidates = await this.stage('enrich', record, deadline, timings, (signal) =>
        this.deps.textExtractor.extract(ingested, signal)
      );
      const visionCandidates = await this.stage('vision', record, deadline, timings, (signal) =>
        this.deps.visionExtractor.extract(ingested, signal)
      );
      const prediction = await this.stage('fuse', record, deadline, timings, async () => {
        const candidates = sanitizeCandidates([...textCandidates, ...visionCandidates]);
        setSpanAttribute(OTEL_ATTR.CANDIDATE_COUNT, candidates.length);
        return fuse(record.productId, record.title, candidates);
      });
      return { ok: true, value: { ...prediction, ...metadataOf(record) }, timings };
    } catch (error) {
      return { ok: false, error: this.asStageError(error, record), timings };
    }
  }

  async runIngest(
    record: ProductRecord,
    deadline: Deadline = this.startDeadline()
  ): Promise<PipelineOutcome<IngestedRecord>> {
    const timings = emptyTimings();
    try {
      const ingested = await this.stage('ingest', record, deadline, timings, (signal) =>
        this.deps.ingestor.ingest(record, signal)
      );
      return { ok: true, value: ingested, timings };
    } catch (error) {
      return { ok: false, error: this.asStageError(error, record), timings };
    }
  }

  async runEnrich(
    record: ProductRecord,
    deadline: Deadline = this.startDeadline()
  ): Promise<PipelineOutcome<EnrichedRecord>> {
    const timings = emptyTimings();
    try {
      const ingested = await this.stage('ingest', record, deadline, timings, (signal) =>
        this.deps.ingestor.ingest(record, signal)
      );
      const candidates = await this.stage('enrich', record, deadline, timings, (signal) =>
        this.deps.textExtractor.extract(ingested, signal)
      );
      return {
        ok: true,
        value: { ...ingested, predictions: topCandidates(sanitizeCandidates(candidates)) },
        timings,
      };
    } catch (error) {
      return { ok: false, error: this.asStageError(error, record), timings };
    }
  }

  private async stage<T>(
    stage: ExecutionStage,
    record: ProductRecord,
    deadline: Deadline,
    timings: StageTimings,
    fn: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const started = this.now();
    try {
      return await withSpan(
        `catalog.pipeline.${stage}`,
        { [OTEL_ATTR.PIPELINE_STAGE]: stage, [OTEL_ATTR.PRODUCT_ID]: record.productId },
        () => runWithDeadline({ stage, productId: record.productId, deadline, fn })
      );
    } catch (error) {
      throw classifyStageFailure(stage, error, record.productId);
    } finally {
      timings[TIMING_KEY[stage]] += Math.max(0, this.now() - started);
    }
  }

  private asStageError(error: unknown, record: ProductRecord): StageError {
    const stageError = classifyStageFailure('fuse', error, record.productId);
    this.deps.logger.warn(
      {
        productId: record.productId,
        stage: stageError.stage,
        errorType: stageError.errorType,
        error: stageError.message,
      },
      'Record failed in pipeline'
    );
    return stageError;
  }
}
