import type { BatchError, IndexedItem, ProductRecord } from '@app/types';

import { AdmissionError } from './errors.js';
import type { TokenBucket } from './token-bucket.js';

export type AdmissionLimits = Readonly<{
  maxBatchItems: number;
  maxTextChars: number;
}>;

export type Admission<T> = { ok: true; value: T } | { ok: false; error: AdmissionError };

export type AdmittedBatch = Readonly<{
  accepted: IndexedItem<ProductRecord>[];
  rejected: BatchError[];
}>;

/** Characters in title plus description, counted by code point. */
export function textLength(record: Pick<ProductRecord, 'title' | 'description'>): number {
  return Array.from(record.title).length + Array.from(record.description).length;
}

/**
 * Checks run in a fixed order before any IO: rate limit, batch size, then per-item text size.
 * One token is consumed per request, whatever happens to its items afterwards.
 */
export class AdmissionGuard {
  constructor(
    private readonly limits: AdmissionLimits,
    private readonly rateLimiter: TokenBucket | null
  ) {}

  admitBatch(records: readonly ProductRecord[]): Admission<AdmittedBatch> {
    const rate = this.consumeToken();
    if (rate) return { ok: false, error: rate };

    if (records.length > this.limits.maxBatchItems) {
      return {
        ok: false,
        error: new AdmissionError(
          'batch_limit_exceeded',
          `Batch has ${records.length} items; the limit is ${this.limits.maxBatchItems}`
        ),
      };
    }

    const accepted: IndexedItem<ProductRecord>[] = [];
    const rejected: BatchError[] = [];
    records.forEach((record, index) => {
      const length = textLength(record);
      if (length > this.limits.maxTextChars) {
        rejected.push({
          index,
          productId: record.productId,
          stage: 'admission',
          errorType: 'text_limit_exceeded',
          message: this.textLimitMessage(length),
        });
        return;
      }
      accepted.push({ index, item: record });
    });

    return { ok: true, value: { accepted, rejected } };
  }

  admitOne(record: ProductRecord): Admission<ProductRecord> {
    const rate = this.consumeToken();
    if (rate) return { ok: false, error: rate };

    const length = textLength(record);
    if (length > this.limits.maxTextChars) {
      return {
        ok: false,
        error: new AdmissionError(
          'text_limit_exceeded',
          this.textLimitMessage(length),
          record.productId
        ),
      };
    }
    return { ok: true, value: record };
  }

  private consumeToken(): AdmissionError | null {
    if (!this.rateLimiter || this.rateLimiter.tryConsume()) return null;
    return new AdmissionError('rate_limited', 'Rate limit exceeded; retry later');
  }

  private textLimitMessage(length: number): string {
    return `Text length ${length} exceeds the limit of ${this.limits.maxTextChars} characters`;
  }
}
