import { z } from "zod";
import { SlidingWindowConfigSchema } from "../gatehouse/config.js";
import type { RateLimiter } from "./types.js";

/**
 * In-process sliding window limiter.
 *
 * Keeps the admission timestamps of each key and admits a request while fewer
 * than `max` of them fall inside the trailing window. Keys whose newest
 * admission has left the window are swept out at most once per window.
 */

export type SlidingWindowLimiterOptions = z.input<typeof SlidingWindowConfigSchema> & {
  /** Milliseconds since the epoch */
  clock?: () => number;
};

export class SlidingWindowLimiter implements RateLimiter {
  private readonly windows: Map<string, number[]> = new Map();
  private readonly windowMs: number;
  private readonly max: number;
  private readonly clock: () => number;
  private lastSweep: number;

  constructor(options: SlidingWindowLimiterOptions = {}) {
    const config = SlidingWindowConfigSchema.parse(options);
    this.windowMs = config.windowMs;
    this.max = config.max;
    this.clock = options.clock ?? Date.now;
    this.lastSweep = this.clock();
  }

  /** Keys currently tracked. */
  get size(): number {
    return this.windows.size;
  }

  async shouldLimit(key: string): Promise<boolean> {
    const now = this.clock();
    this.sweep(now);
    const timestamps = this.evict(key, now);

    if (timestamps.length >= this.max) {
      return true;
    }

    timestamps.push(now);
    this.windows.set(key, timestamps);
    return false;
  }

  /**
   * Requests `key` may still make in the current window.
   */
  remaining(key: string): number {
    return Math.max(0, this.max - this.evict(key, this.clock()).length);
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  clear(): void {
    this.windows.clear();
  }

  private sweep(now: number): void {
    if (now - this.lastSweep < this.windowMs) {
      return;
    }
    this.lastSweep = now;
    const windowStart = now - this.windowMs;
    for (const [key, timestamps] of this.windows) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || newest <= windowStart) {
        this.windows.delete(key);
      }
    }
  }

  private evict(key: string, now: number): number[] {
    const windowStart = now - this.windowMs;
    const timestamps = (this.windows.get(key) ?? []).filter((t) => t > windowStart);
    if (timestamps.length === 0) {
      this.windows.delete(key);
    } else {
      this.windows.set(key, timestamps);
    }
    return timestamps;
  }
}
