import type { Clock } from './deadline.js';

export type TokenBucketOptions = Readonly<{
  capacity: number;
  refillPerMinute: number;
  now?: Clock;
}>;

/**
 * Process-wide request limiter. Refill is computed from elapsed time at each call and
 * clamped to capacity; check-refill-consume has no await, so concurrent requests on the
 * event loop cannot interleave inside it.
 */
export class TokenBucket {
  readonly capacity: number;
  readonly refillPerMinute: number;
  private readonly now: Clock;
  private tokens: number;
  private lastRefill: number;

  constructor(options: TokenBucketOptions) {
    if (!(options.capacity > 0)) {
      throw new Error(`Invalid token bucket capacity: ${options.capacity}`);
    }
    if (!(options.refillPerMinute > 0)) {
      throw new Error(`Invalid token bucket refill rate: ${options.refillPerMinute}`);
    }
    this.capacity = options.capacity;
    this.refillPerMinute = options.refillPerMinute;
    this.now = options.now ?? Date.now;
    this.tokens = options.capacity;
    this.lastRefill = this.now();
  }

  tryConsume(amount = 1): boolean {
    this.refill();
    if (this.tokens < amount) return false;
    this.tokens -= amount;
    return true;
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const current = this.now();
    const elapsedMs = Math.max(0, current - this.lastRefill);
    this.lastRefill = current;
    if (elapsedMs === 0) return;
    const refilled = (elapsedMs * this.refillPerMinute) / 60_000;
    this.tokens = Math.min(this.capacity, this.tokens + refilled);
  }
}

/** A rate of 0 disables limiting. */
export function createRateLimiter(params: {
  rpmLimit: number;
  capacity?: number;
  now?: Clock;
}): TokenBucket | null {
  if (params.rpmLimit <= 0) return null;
  const capacity = params.capacity && params.capacity > 0 ? params.capacity : params.rpmLimit;
  return new TokenBucket({
    capacity,
    refillPerMinute: params.rpmLimit,
    ...(params.now ? { now: params.now } : {}),
  });
}
