/**
 * Clip Resolver
 *
 * Turns a command argument into exactly one clip:
 * - direct URL or id lookup
 * - random pick from widening lookback windows
 * - fuzzy title search over a channel's catalog (cached)
 */

import type { ClipDescriptor, ResolveOutcome, SearchFilter } from "@clipcast/shared";
import { defaultLogger, type ILogger } from "../lib/logger";
import { InvalidReferenceError } from "../lib/errors";
import type { CatalogApi } from "./types";
import type { ClipCache } from "./clipCache";
import { scoreTitle, tokenize } from "./titleMatch";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Ascending lookback windows in days; null is the channel's whole history */
export const LOOKBACK_WINDOWS_DAYS: readonly (number | null)[] = [1, 7, 30, 365, null];

export const RANDOM_WINDOW_MAX_PAGES = 10;
export const TITLE_SEARCH_MAX_PAGES = 50;
export const EXACT_MATCH_SCORE = 0.99;
export const MIN_MATCH_SCORE = 0.5;

const CLIP_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export type ClipResolverOptions = {
  logger?: ILogger;
  /** Uniform [0, 1) source for random selection */
  random?: () => number;
  now?: () => number;
};

/**
 * Clip identifier from the last non-empty path segment of a URL.
 * Bare ids and scheme-less URLs are accepted.
 */
export function extractClipId(reference: string): string {
  const trimmed = reference.trim();
  if (!trimmed) {
    throw new InvalidReferenceError(reference, "empty reference");
  }

  const path = URL.canParse(trimmed) ? new URL(trimmed).pathname : trimmed.split(/[?#]/)[0];
  const clipId = path.split("/").filter((segment) => segment.length > 0).at(-1);

  if (!clipId || !CLIP_ID_PATTERN.test(clipId)) {
    throw new InvalidReferenceError(reference, "no clip identifier in reference");
  }
  return clipId;
}

export function matchesFilter(clip: ClipDescriptor, filter: SearchFilter): boolean {
  return (!filter.featuredOnly || clip.isFeatured) && clip.durationSeconds <= filter.maxDurationSeconds;
}

export function candidateWindows(maxAgeDays: number): (number | null)[] {
  return LOOKBACK_WINDOWS_DAYS.filter((days) => days === null || days >= maxAgeDays);
}

export class ClipResolver {
  private readonly logger: ILogger;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    private readonly catalog: CatalogApi,
    private readonly cache: ClipCache,
    options: ClipResolverOptions = {}
  ) {
    this.logger = (options.logger || defaultLogger).child({ component: "resolver" });
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  async resolveByUrl(url: string): Promise<ResolveOutcome> {
    return this.resolveById(extractClipId(url));
  }

  async resolveById(clipId: string): Promise<ResolveOutcome> {
    if (!CLIP_ID_PATTERN.test(clipId)) {
      throw new InvalidReferenceError(clipId, "malformed clip identifier");
    }

    const clip = await this.catalog.getClipById(clipId);
    if (!clip) {
      this.logger.warn("Clip not found upstream", { operation: "resolveById", clipId });
      return { status: "not_found", reason: "upstream_miss" };
    }

    this.logger.debug("Clip resolved", { operation: "resolveById", clipId });
    return { status: "found", clip, source: "upstream" };
  }

  async resolveRandom(channel: string, filter: SearchFilter): Promise<ResolveOutcome> {
    const broadcasterId = await this.catalog.getChannelIdByHandle(channel);
    if (!broadcasterId) {
      this.logger.warn("Channel not found", { operation: "resolveRandom", channel });
      return { status: "not_found", reason: "unknown_channel" };
    }

    for (const days of candidateWindows(filter.maxAgeDays)) {
      const clips = await this.listWindow(broadcasterId, days);

      let candidates = clips.filter((clip) => matchesFilter(clip, filter));
      if (candidates.length === 0 && filter.featuredOnly) {
        candidates = clips.filter((clip) => matchesFilter(clip, { ...filter, featuredOnly: false }));
        if (candidates.length > 0) {
          this.logger.debug("No featured clip in window, using non-featured", { channel, windowDays: days });
        }
      }

      if (candidates.length > 0) {
        const index = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1);
        const clip = candidates[index];
        this.logger.info("Random clip selected", {
          operation: "resolveRandom",
          channel,
          clipId: clip.id,
          windowDays: days,
          candidates: candidates.length,
        });
        return { status: "found", clip, source: "upstream" };
      }
    }

    this.logger.warn("No clip matched any lookback window", { operation: "resolveRandom", channel, filter });
    return { status: "not_found", reason: "no_match" };
  }

  async searchByTitle(channel: string, query: string): Promise<ResolveOutcome> {
    const queryTokens = tokenize(query);
    if (queryTokens.length === 0) {
      throw new InvalidReferenceError(query, "empty search term");
    }

    const cached = this.cache.get(query);
    if (cached) {
      this.logger.debug("Search cache hit", { operation: "searchByTitle", query, clipId: cached.id });
      return { status: "found", clip: cached, source: "cache" };
    }

    const broadcasterId = await this.catalog.getChannelIdByHandle(channel);
    if (!broadcasterId) {
      this.logger.warn("Channel not found", { operation: "searchByTitle", channel });
      return { status: "not_found", reason: "unknown_channel" };
    }

    let best: { clip: ClipDescriptor; score: number } | null = null;
    let cursor: string | undefined;

    for (let page = 0; page < TITLE_SEARCH_MAX_PAGES; page++) {
      const result = await this.catalog.listChannelClips({ broadcasterId, cursor });

      for (const clip of result.clips) {
        const score = scoreTitle(queryTokens, clip.title);
        if (score >= EXACT_MATCH_SCORE) {
          this.cache.set(query, clip);
          this.logger.info("Title match found", { operation: "searchByTitle", query, clipId: clip.id, score, page });
          return { status: "found", clip, source: "upstream" };
        }
        if (!best || score > best.score) {
          best = { clip, score };
        }
      }

      if (!result.cursor || result.clips.length === 0) break;
      cursor = result.cursor;
    }

    if (best && best.score >= MIN_MATCH_SCORE) {
      this.cache.set(query, best.clip);
      this.logger.info("Best title match accepted", {
        operation: "searchByTitle",
        query,
        clipId: best.clip.id,
        score: best.score,
      });
      return { status: "found", clip: best.clip, source: "upstream" };
    }

    this.logger.warn("No clip title matched", { operation: "searchByTitle", channel, query, bestScore: best?.score });
    return { status: "not_found", reason: "no_match" };
  }

  private async listWindow(broadcasterId: string, days: number | null): Promise<ClipDescriptor[]> {
    const now = this.now();
    const startedAt = days === null ? undefined : new Date(now - days * DAY_MS).toISOString();
    const endedAt = days === null ? undefined : new Date(now).toISOString();

    const clips: ClipDescriptor[] = [];
    let cursor: string | undefined;
    for (let page = 0; page < RANDOM_WINDOW_MAX_PAGES; page++) {
      const result = await this.catalog.listChannelClips({ broadcasterId, startedAt, endedAt, cursor });
      clips.push(...result.clips);
      if (!result.cursor || result.clips.length === 0) break;
      cursor = result.cursor;
    }
    return clips;
  }
}
