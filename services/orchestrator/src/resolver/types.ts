import type { ClipDescriptor } from "@clipcast/shared";

export type ClipListQuery = {
  broadcasterId: string;
  /** ISO-8601 lower bound on creation time */
  startedAt?: string;
  /** ISO-8601 upper bound on creation time */
  endedAt?: string;
  /** Opaque pagination cursor from the previous page */
  cursor?: string;
  /** Page size */
  first?: number;
};

export type ClipPage = {
  clips: ClipDescriptor[];
  /** Absent on the last page */
  cursor?: string;
};

/**
 * Catalog capability the resolver depends on
 */
export interface CatalogApi {
  getClipById(clipId: string): Promise<ClipDescriptor | null>;
  getChannelIdByHandle(handle: string): Promise<string | null>;
  listChannelClips(query: ClipListQuery): Promise<ClipPage>;
  getGameName(gameId: string): Promise<string | null>;
}
