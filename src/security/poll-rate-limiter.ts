// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export interface PollRateLimitConfig {
  maxPerMinute: number;
}

interface MinuteBucket {
  minute: number;
  count: number;
}

function currentMinute(): number {
  return Math.floor(Date.now() / 60_000);
}

/**
 * Per-device counter bucketed by calendar minute, held in process memory.
 * Each instance counts on its own; this damps misbehaving devices and is not
 * a fleet-wide quota.
 */
export class PollRateLimiter {
  private readonly buckets = new Map<string, MinuteBucket>();

  constructor(private readonly config: PollRateLimitConfig) {}

  allow(deviceKey: string): boolean {
    const minute = currentMinute();
    // Read and write happen in one synchronous step, so concurrent polls cannot lose an increment.
    const current = this.buckets.get(deviceKey);
    const next: MinuteBucket =
      current && current.minute === minute
        ? { minute, count: current.count + 1 }
        : { minute, count: 1 };
    this.buckets.set(deviceKey, next);
    return next.count <= this.config.maxPerMinute;
  }

  /** Drops buckets from earlier minutes. Returns how many were removed. */
  sweep(): number {
    const minute = currentMinute();
    let removed = 0;
    for (const [key, bucket] of this.buckets) {
      if (bucket.minute < minute) {
        this.buckets.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  reset(deviceKey: string): void {
    this.buckets.delete(deviceKey);
  }

  get trackedKeys(): number {
    return this.buckets.size;
  }
}
