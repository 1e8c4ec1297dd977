// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

/**
 * Backing store for replay protection. Uniqueness of (deviceId, nonce) must be
 * enforced by the store itself so that several server instances see each
 * other's nonces.
 */
export interface NonceStore {
  /** Deletes every nonce whose request timestamp is strictly below `minTsSec`. */
  purgeNoncesOlderThan(minTsSec: number): Promise<number>;
  /** Insert-if-absent. Resolves false when (deviceId, nonce) already exists. */
  registerNonce(deviceId: string, nonce: string, tsSec: number): Promise<boolean>;
}

export interface NonceCheckResult {
  accepted: boolean;
  purged: number;
}

export class NonceGuard {
  constructor(
    private readonly store: NonceStore,
    private readonly windowSec: number
  ) {}

  async check(deviceId: string, nonce: string, tsSec: number, nowSec: number): Promise<NonceCheckResult> {
    const purged = await this.store.purgeNoncesOlderThan(nowSec - this.windowSec);
    const accepted = await this.store.registerNonce(deviceId, nonce, tsSec);
    return { accepted, purged };
  }
}

/**
 * In-memory implementation for tests and development.
 * Production uses PostgresStore.
 */
export class InMemoryNonceStore implements NonceStore {
  private readonly entries = new Map<string, { deviceId: string; nonce: string; tsSec: number }>();

  private static keyOf(deviceId: string, nonce: string): string {
    return JSON.stringify([deviceId, nonce]);
  }

  async purgeNoncesOlderThan(minTsSec: number): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.tsSec < minTsSec) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  async registerNonce(deviceId: string, nonce: string, tsSec: number): Promise<boolean> {
    const key = InMemoryNonceStore.keyOf(deviceId, nonce);
    if (this.entries.has(key)) return false;
    this.entries.set(key, { deviceId, nonce, tsSec });
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}
