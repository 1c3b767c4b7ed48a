/**
 * A single recorded highlight as reported by the streaming platform.
 * Instances are frozen when created and replaced, never edited, on re-fetch.
 */
export type ClipDescriptor = {
  /** Platform clip identifier (slug) */
  readonly id: string;
  /** Canonical clip URL */
  readonly url: string;
  readonly title: string;
  readonly broadcasterName: string;
  readonly broadcasterId: string;
  readonly creatorName: string;
  readonly gameId: string;
  /** Duration in seconds (fractional) */
  readonly durationSeconds: number;
  readonly isFeatured: boolean;
  /** ISO-8601 creation time */
  readonly createdAt: string;
  readonly thumbnailUrl: string;
};

/**
 * Per-request constraints for random selection
 */
export type SearchFilter = {
  featuredOnly: boolean;
  maxDurationSeconds: number;
  maxAgeDays: number;
};

/**
 * Why a resolution produced no clip
 */
export type NotFoundReason = "upstream_miss" | "unknown_channel" | "no_match" | "no_history";

export type ResolveOutcome =
  | { status: "found"; clip: ClipDescriptor; source: "upstream" | "cache" }
  | { status: "not_found"; reason: NotFoundReason };
