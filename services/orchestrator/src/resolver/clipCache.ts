/**
 * In-memory search cache keyed by the original search string.
 * Entries expire relative to their last access and are only removed by sweep().
 */

import type { CacheEntry, ClipDescriptor } from "@clipcast/shared";

export const DEFAULT_CACHE_EXPIRATION_MS = 30 * 24 * 60 * 60 * 1000;

export type ClipCacheOptions = {
  expirationMs?: number;
  now?: () => number;
};

export class ClipCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly expirationMs: number;
  private readonly now: () => number;

  constructor(options: ClipCacheOptions = {}) {
    this.expirationMs = options.expirationMs ?? DEFAULT_CACHE_EXPIRATION_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns the cached clip and records the access
   */
  get(key: string): ClipDescriptor | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    entry.searchFrequency += 1;
    entry.lastAccessed = this.now();
    return entry.clip;
  }

  /**
   * Entry without touching it
   */
  peek(key: string): Readonly<CacheEntry> | undefined {
    return this.entries.get(key);
  }

  set(key: string, clip: ClipDescriptor): void {
    this.entries.set(key, { clip, searchFrequency: 1, lastAccessed: this.now() });
  }

  /**
   * Remove entries idle for longer than the expiration.
   * Returns the number removed.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.lastAccessed > this.expirationMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }
}
