import type { PipelineStage } from '@app/types';

import { StageError } from './errors.js';

export type Clock = () => number;

/** Largest delay `setTimeout` honours; longer delays fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Absolute point in time after which a record's remaining stages must not run. */
export class Deadline {
  private constructor(
    readonly expiresAt: number,
    private readonly now: Clock
  ) {}

  /** `timeoutMs <= 0` yields a deadline that never expires. */
  static after(timeoutMs: number, now: Clock = Date.now): Deadline {
    const expiresAt = timeoutMs > 0 ? now() + timeoutMs : Number.POSITIVE_INFINITY;
    return new Deadline(expiresAt, now);
  }

  static never(): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY, Date.now);
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  isExpired(): boolean {
    return this.now() >= this.expiresAt;
  }
}

/**
 * Runs one stage against the deadline. When the deadline passes mid-stage the signal handed
 * to `fn` is aborted and the returned promise rejects with a timeout StageError, without
 * waiting for `fn` to settle.
 */
export async function runWithDeadline<T>(params: {
  stage: Exclude<PipelineStage, 'admission'>;
  productId: string;
  deadline: Deadline;
  fn: (signal: AbortSignal) => Promise<T>;
}): Promise<T> {
  const { stage, productId, deadline, fn } = params;

  if (deadline.isExpired()) {
    throw new StageError({
      stage,
      errorType: 'timeout',
      message: `Record deadline exceeded before ${stage} stage`,
      productId,
    });
  }

  const controller = new AbortController();
  const remaining = deadline.remainingMs();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = Number.isFinite(remaining)
    ? new Promise<never>((_, reject) => {
        let budget = remaining;
        const arm = (): void => {
          const delay = Math.min(budget, MAX_TIMER_DELAY_MS);
          budget -= delay;
          timer = setTimeout(() => {
            if (budget > 0) {
              arm();
              return;
            }
            const error = new StageError({
              stage,
              errorType: 'timeout',
              message: `Record deadline exceeded during ${stage} stage`,
              productId,
            });
            controller.abort(error);
            reject(error);
          }, delay);
        };
        arm();
      })
    : null;

  try {
    const work = Promise.resolve().then(() => fn(controller.signal));
    return timeoutPromise ? await Promise.race([work, timeoutPromise]) : await work;
  } finally {
    if (timer) clearTimeout(timer);
  }
}
