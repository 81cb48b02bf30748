import type { Scheduler } from './scheduler.js';

export interface TokenBucketOptions {
  readonly capacity: number;
  readonly refillPerSecond: number;
}

export type AcquireResult =
  | { readonly acquired: true; readonly waitedMs: number }
  | { readonly acquired: false; readonly retryAfterMs: number };

/**
 * Token bucket owned by one source. `acquire` waits for a token when the wait
 * fits inside `maxWaitMs` and otherwise reports how long the caller would
 * have to wait.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly options: TokenBucketOptions,
    private readonly scheduler: Scheduler,
  ) {
    this.tokens = options.capacity;
    this.lastRefill = scheduler.now();
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }

  async acquire(maxWaitMs: number, signal?: AbortSignal): Promise<AcquireResult> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return { acquired: true, waitedMs: 0 };
    }

    const waitMs = Math.ceil(((1 - this.tokens) / this.options.refillPerSecond) * 1000);
    if (waitMs > maxWaitMs) {
      return { acquired: false, retryAfterMs: waitMs };
    }

    // reserve the token now so concurrent callers queue behind it
    this.tokens -= 1;
    try {
      await this.scheduler.sleep(waitMs, signal);
    } catch (error) {
      this.tokens += 1;
      throw error;
    }
    return { acquired: true, waitedMs: waitMs };
  }

  private refill(): void {
    const now = this.scheduler.now();
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    if (elapsedSeconds > 0) {
      this.tokens = Math.min(this.options.capacity, this.tokens + elapsedSeconds * this.options.refillPerSecond);
      this.lastRefill = now;
    }
  }
}
