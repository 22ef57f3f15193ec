import { z } from "zod";
import { ActiveLimitConfigSchema } from "../gatehouse/config.js";
import type { ActiveLimiter } from "./types.js";

export type ActiveCountLimiterOptions = z.input<typeof ActiveLimitConfigSchema>;

/**
 * In-process limit on requests in flight per key.
 * `shouldLimit` counts a request only when it admits it.
 */
export class ActiveCountLimiter implements ActiveLimiter {
  private readonly counts: Map<string, number> = new Map();
  private readonly max: number;

  constructor(options: ActiveCountLimiterOptions = {}) {
    this.max = ActiveLimitConfigSchema.parse(options).max;
  }

  async shouldLimit(key: string): Promise<boolean> {
    const current = this.counts.get(key) ?? 0;
    if (current >= this.max) {
      return true;
    }
    this.counts.set(key, current + 1);
    return false;
  }

  async release(key: string): Promise<void> {
    const current = this.counts.get(key) ?? 0;
    if (current <= 1) {
      this.counts.delete(key);
    } else {
      this.counts.set(key, current - 1);
    }
  }

  active(key: string): number {
    return this.counts.get(key) ?? 0;
  }
}
