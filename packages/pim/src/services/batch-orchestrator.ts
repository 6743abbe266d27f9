import { OTEL_ATTR, withSpan, type Logger } from '@app/logger';
import type { BatchError, BatchResult, IndexedItem, ProductRecord, StageTimings } from '@app/types';

import { classifyStageFailure } from './errors.js';
import type { PipelineOutcome } from './record-pipeline.js';
import { emptyTimings, sumTimings } from './record-pipeline.js';

export type RecordRunner<T> = (record: ProductRecord, index: number) => Promise<PipelineOutcome<T>>;

export type BatchRun<T> = Readonly<{
  result: BatchResult<T>;
  timings: StageTimings;
}>;

/**
 * Runs `processor` over `items` with at most `maxConcurrency` in flight. Results keep the
 * input order. `processor` is expected to settle every item itself.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrency: number,
  processor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  async function processNext(): Promise<void> {
    while (nextIndex < items.length) {
      const currentIndex = nextIndex++;
      const item = items[currentIndex];
      if (item === undefined) continue;
      results[currentIndex] = await processor(item, currentIndex);
    }
  }

  const workerCount = Math.max(1, Math.min(Math.floor(maxConcurrency), items.length));
  const workers = Array.from({ length: workerCount }, () => processNext());
  await Promise.all(workers);
  return results;
}

export function byIndex(a: { index: number }, b: { index: number }): number {
  return a.index - b.index;
}

/** Fans a batch out over a per-record runner; one record's failure never touches another. */
export class BatchOrchestrator {
  constructor(
    private readonly concurrency: number,
    private readonly logger: Logger
  ) {}

  async runBatch<T>(
    entries: readonly IndexedItem<ProductRecord>[],
    runner: RecordRunner<T>,
    admissionErrors: readonly BatchError[] = []
  ): Promise<BatchRun<T>> {
    return withSpan('catalog.batch', { [OTEL_ATTR.BATCH_SIZE]: entries.length }, async () => {
      const outcomes = await runWithConcurrency(entries, this.concurrency, async (entry) => {
        try {
          const outcome = await withSpan(
            'catalog.batch.record',
            {
              [OTEL_ATTR.BATCH_INDEX]: entry.index,
              [OTEL_ATTR.PRODUCT_ID]: entry.item.productId,
            },
            () => runner(entry.item, entry.index)
          );
          return { entry, outcome };
        } catch (error) {
          const outcome: PipelineOutcome<T> = {
            ok: false,
            error: classifyStageFailure('fuse', error, entry.item.productId),
            timings: emptyTimings(),
          };
          return { entry, outcome };
        }
      });

      const items: IndexedItem<T>[] = [];
      const errors: BatchError[] = [...admissionErrors];
      for (const { entry, outcome } of outcomes) {
        if (outcome.ok) {
          items.push({ index: entry.index, item: outcome.value });
          continue;
        }
        errors.push({
          index: entry.index,
          productId: entry.item.productId,
          stage: outcome.error.stage,
          errorType: outcome.error.errorType,
          message: outcome.error.message,
        });
      }
      items.sort(byIndex);
      errors.sort(byIndex);

      this.logger.info(
        {
          batchSize: entries.length + admissionErrors.length,
          succeeded: items.length,
          failed: errors.length,
        },
        'Batch processed'
      );

      return {
        result: { items, errors },
        timings: sumTimings(outcomes.map(({ outcome }) => outcome.timings)),
      };
    });
  }
}
