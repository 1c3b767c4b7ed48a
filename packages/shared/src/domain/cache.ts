import type { ClipDescriptor } from "./clip";

/**
 * Search cache entry, keyed by the original search string.
 * lastAccessed is epoch milliseconds.
 */
export type CacheEntry = {
  clip: ClipDescriptor;
  searchFrequency: number;
  lastAccessed: number;
};
