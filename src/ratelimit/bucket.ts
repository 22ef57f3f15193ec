import { z } from "zod";
import { TokenBucketConfigSchema } from "../gatehouse/config.js";
import { GatehouseError } from "../gatehouse/errors.js";
import type { AcquireOptions, BlockingLimiter } from "./types.js";

export type TokenBucketLimiterOptions = z.input<typeof TokenBucketConfigSchema>;

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Token bucket shared by every request (keys are ignored).
 *
 * A refill task started by the constructor adds one token per interval until
 * `close()` stops it. Waiters from `acquire` are served first-in first-out
 * before tokens accumulate in the bucket again.
 */
export class TokenBucketLimiter implements BlockingLimiter {
  private readonly capacity: number;
  private readonly refillIntervalMs: number;
  private tokens: number;
  private readonly waiters: Waiter[] = [];
  private timer: ReturnType<typeof setInterval> | undefined;

  constructor(options: TokenBucketLimiterOptions) {
    const config = TokenBucketConfigSchema.parse(options);
    this.capacity = config.capacity;
    this.refillIntervalMs = config.refillIntervalMs;
    this.tokens = Math.min(config.initialTokens ?? config.capacity, config.capacity);

    this.timer = setInterval(() => this.refill(), this.refillIntervalMs);
    this.timer.unref();
  }

  /** Tokens currently in the bucket. */
  get available(): number {
    return this.tokens;
  }

  /** Callers blocked in `acquire`. */
  get queued(): number {
    return this.waiters.length;
  }

  get closed(): boolean {
    return this.timer === undefined;
  }

  /**
   * Take a token if there is one.
   *
   * @throws GatehouseError LIMITER_CLOSED after `close()`
   */
  async shouldLimit(_key?: string): Promise<boolean> {
    this.assertOpen();
    if (this.tokens > 0) {
      this.tokens--;
      return false;
    }
    return true;
  }

  /**
   * Take a token, waiting for the refill task if the bucket is empty.
   *
   * @throws GatehouseError LIMITER_TIMEOUT when the wait times out or the signal aborts
   * @throws GatehouseError LIMITER_CLOSED when the limiter is (or gets) closed
   */
  async acquire(options: AcquireOptions = {}): Promise<void> {
    this.assertOpen();
    if (this.tokens > 0) {
      this.tokens--;
      return;
    }
    if (options.signal?.aborted) {
      throw new GatehouseError("LIMITER_TIMEOUT", "Wait for capacity was cancelled");
    }
    return this.waitForToken(options);
  }

  /**
   * Stop the refill task and fail every waiter. Returns how many were waiting.
   */
  close(): number {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    const count = this.waiters.length;
    while (this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      if (waiter) {
        this.detach(waiter);
        waiter.reject(new GatehouseError("LIMITER_CLOSED", "Limiter closed"));
      }
    }
    return count;
  }

  private refill(): void {
    const next = this.waiters.shift();
    if (next) {
      this.detach(next);
      next.resolve();
      return;
    }
    if (this.tokens < this.capacity) {
      this.tokens++;
    }
  }

  private waitForToken(options: AcquireOptions): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const entry: Waiter = { resolve, reject };

      const giveUp = (message: string) => {
        const idx = this.waiters.indexOf(entry);
        if (idx !== -1) {
          this.waiters.splice(idx, 1);
        }
        this.detach(entry);
        reject(new GatehouseError("LIMITER_TIMEOUT", message));
      };

      if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
        const timeoutMs = options.timeoutMs;
        entry.timeoutId = setTimeout(() => giveUp(`Wait for capacity exceeded ${timeoutMs}ms`), timeoutMs);
      }

      if (options.signal) {
        entry.signal = options.signal;
        entry.onAbort = () => giveUp("Wait for capacity was cancelled");
        options.signal.addEventListener("abort", entry.onAbort, { once: true });
      }

      this.waiters.push(entry);
    });
  }

  private detach(waiter: Waiter): void {
    if (waiter.timeoutId) {
      clearTimeout(waiter.timeoutId);
    }
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener("abort", waiter.onAbort);
    }
  }

  private assertOpen(): void {
    if (this.timer === undefined) {
      throw new GatehouseError("LIMITER_CLOSED", "Limiter closed");
    }
  }
}
