/**
 * Ghostline — src/lib/lruCache.ts
 * WHAT: Size-bounded cache with a per-entry deadline.
 * Guild prefixes and mute roles are read on every message; Bungie item definitions rarely change.
 *
 * A Map keeps insertion order, so re-inserting on read moves a key to the newest end and
 * eviction drops the first key.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export interface LRUCacheOptions {
  max: number;
  ttlMs: number;
}

interface Entry<V> {
  value: V;
  expiresAt: number;
}

export class LRUCache<K, V> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly max: number;
  private readonly ttlMs: number;

  constructor({ max, ttlMs }: LRUCacheOptions) {
    if (!Number.isInteger(max) || max < 1) throw new RangeError(`LRUCache max must be a positive integer, got ${max}`);
    if (ttlMs <= 0) throw new RangeError(`LRUCache ttlMs must be positive, got ${ttlMs}`);
    this.max = max;
    this.ttlMs = ttlMs;
  }

  /** Undefined on a miss or an expired entry. A hit becomes the newest entry. */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    this.entries.delete(key);
    if (entry.expiresAt < Date.now()) return undefined;
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: K, value: V): void {
    this.entries.delete(key);
    if (this.entries.size >= this.max) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, expiresAt: Date.now() + this.ttlMs });
  }

  /** Cached value, or `load(key)` stored and returned. A null result is cached too. */
  remember(key: K, load: (key: K) => V): V {
    const hit = this.get(key);
    if (hit !== undefined) return hit;
    const value = load(key);
    this.set(key, value);
    return value;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Counts expired entries that have not been read since expiring. */
  get size(): number {
    return this.entries.size;
  }
}
