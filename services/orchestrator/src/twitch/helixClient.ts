/**
 * Helix (Twitch REST API) catalog client
 *
 * Implements the catalog capability used by the resolver:
 * - clip lookup by id
 * - channel handle to broadcaster id
 * - cursor-paginated clip listing
 * - game name lookup for the embed page
 */

import type { z } from "zod";
import type { ClipDescriptor } from "@clipcast/shared";
import { defaultLogger, type ILogger } from "../lib/logger";
import {
  CredentialExpiredError,
  ExternalServiceError,
  RateLimitError,
  TimeoutError,
  TransientUpstreamError,
} from "../lib/errors";
import { withRetry } from "../lib/retry";
import { withCredentialRefresh, type CredentialSource } from "../lib/credentials";
import type { CatalogApi, ClipListQuery, ClipPage } from "../resolver/types";
import {
  HelixClipsResponseSchema,
  HelixGamesResponseSchema,
  HelixUsersResponseSchema,
  type HelixClip,
} from "./schemas";

export type HelixClientConfig = {
  /** Base URL including the /helix prefix */
  baseUrl: string;
  clientId: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  maxRetries: number;
  /** Initial retry delay in milliseconds */
  retryDelayMs: number;
  /** Default page size for clip listings (Helix max is 100) */
  pageSize: number;
  logger?: ILogger;
};

export const DEFAULT_HELIX_CLIENT_CONFIG: HelixClientConfig = {
  baseUrl: process.env.TWITCH_API_BASE_URL || "https://api.twitch.tv/helix",
  clientId: process.env.TWITCH_CLIENT_ID || "",
  timeoutMs: 10000,
  maxRetries: 3,
  retryDelayMs: 500,
  pageSize: 100,
  logger: defaultLogger,
};

const SERVICE = "twitch";

export class HelixCatalogClient implements CatalogApi {
  private config: HelixClientConfig;
  private logger: ILogger;

  constructor(
    private readonly credentials: CredentialSource,
    config?: Partial<HelixClientConfig>
  ) {
    this.config = { ...DEFAULT_HELIX_CLIENT_CONFIG, ...config };
    this.logger = (this.config.logger || defaultLogger).child({ component: "helix" });
  }

  async getClipById(clipId: string): Promise<ClipDescriptor | null> {
    const body = await this.get("/clips", { id: clipId }, HelixClipsResponseSchema);
    const clip = body.data[0];
    return clip ? toClipDescriptor(clip) : null;
  }

  async getChannelIdByHandle(handle: string): Promise<string | null> {
    const login = handle.trim().replace(/^@/, "").toLowerCase();
    if (!login) return null;

    const body = await this.get("/users", { login }, HelixUsersResponseSchema);
    return body.data[0]?.id ?? null;
  }

  async listChannelClips(query: ClipListQuery): Promise<ClipPage> {
    const body = await this.get(
      "/clips",
      {
        broadcaster_id: query.broadcasterId,
        first: String(query.first ?? this.config.pageSize),
        started_at: query.startedAt,
        ended_at: query.endedAt,
        after: query.cursor,
      },
      HelixClipsResponseSchema
    );

    return {
      clips: body.data.map(toClipDescriptor),
      cursor: body.pagination?.cursor || undefined,
    };
  }

  async getGameName(gameId: string): Promise<string | null> {
    if (!gameId) return null;

    const body = await this.get("/games", { id: gameId }, HelixGamesResponseSchema);
    return body.data[0]?.name ?? null;
  }

  /**
   * GET with credential refresh outside and retry/backoff inside
   */
  private async get<T>(
    endpoint: string,
    params: Record<string, string | undefined>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const url = this.buildUrl(endpoint, params);
    const operationName = `helix ${endpoint}`;

    return withCredentialRefresh(
      this.credentials,
      (token) =>
        withRetry(() => this.fetchOnce(url, endpoint, token, schema), {
          maxRetries: this.config.maxRetries,
          initialDelayMs: this.config.retryDelayMs,
          timeoutMs: this.config.timeoutMs * 2,
          logger: this.logger,
          operationName,
        }),
      { logger: this.logger, operationName }
    );
  }

  private async fetchOnce<T>(
    url: string,
    endpoint: string,
    token: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    try {
      this.logger.debug("Helix request", { url, endpoint });
      response = await fetch(url, {
        method: "GET",
        headers: {
          "Client-ID": this.config.clientId,
          Authorization: `Bearer ${token}`,
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TimeoutError(endpoint, this.config.timeoutMs, { url });
      }
      const cause = error instanceof Error ? error : undefined;
      throw new TransientUpstreamError(SERVICE, cause?.message ?? String(error), { url }, cause);
    } finally {
      clearTimeout(timeout);
    }

    if (response.status === 401) {
      throw new CredentialExpiredError(SERVICE, { url });
    }

    if (response.status === 429) {
      throw new RateLimitError(SERVICE, parseRetryAfter(response.headers, Date.now()), { url });
    }

    if (response.status >= 500) {
      throw new TransientUpstreamError(SERVICE, `HTTP ${response.status}`, { url, status: response.status });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      throw new ExternalServiceError(SERVICE, `HTTP ${response.status}: ${errorText}`, {
        url,
        status: response.status,
      });
    }

    const json: unknown = await response.json();
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, "unexpected response shape", {
        url,
        issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }

    this.logger.debug("Helix response received", { url, endpoint });
    return parsed.data;
  }

  private buildUrl(endpoint: string, params: Record<string, string | undefined>): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== "") search.append(key, value);
    }
    return `${this.config.baseUrl}${endpoint}?${search.toString()}`;
  }
}

/**
 * Milliseconds to wait before retrying a 429.
 * Helix sends Ratelimit-Reset as epoch seconds; Retry-After is delta seconds.
 */
export function parseRetryAfter(headers: Headers, nowMs: number): number | undefined {
  const reset = headers.get("ratelimit-reset");
  if (reset !== null && /^\d+$/.test(reset)) {
    return Math.max(0, Number(reset) * 1000 - nowMs);
  }

  const retryAfter = headers.get("retry-after");
  if (retryAfter !== null && /^\d+(\.\d+)?$/.test(retryAfter)) {
    return Math.round(Number(retryAfter) * 1000);
  }

  return undefined;
}

export function toClipDescriptor(clip: HelixClip): ClipDescriptor {
  return Object.freeze({
    id: clip.id,
    url: clip.url,
    title: clip.title,
    broadcasterName: clip.broadcaster_name,
    broadcasterId: clip.broadcaster_id,
    creatorName: clip.creator_name,
    gameId: clip.game_id,
    durationSeconds: clip.duration,
    isFeatured: clip.is_featured ?? false,
    createdAt: clip.created_at,
    thumbnailUrl: clip.thumbnail_url,
  });
}
