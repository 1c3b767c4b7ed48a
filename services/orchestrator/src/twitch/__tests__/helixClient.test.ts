import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { HelixCatalogClient, parseRetryAfter } from "../helixClient";
import type { CredentialSource } from "../../lib/credentials";
import { ExternalServiceError } from "../../lib/errors";
import { Logger } from "../../lib/logger";

const BASE = "https://api.test/helix";

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function helixClip(overrides: Record<string, unknown> = {}) {
  return {
    id: "AbCdEf123",
    url: "https://clips.twitch.tv/AbCdEf123",
    embed_url: "https://clips.twitch.tv/embed?clip=AbCdEf123",
    broadcaster_id: "1001",
    broadcaster_name: "channelX",
    creator_id: "2002",
    creator_name: "viewer_one",
    video_id: "",
    game_id: "509658",
    language: "en",
    title: "Pog moment",
    view_count: 42,
    created_at: "2024-05-01T12:00:00Z",
    thumbnail_url: "https://clips-media.test/thumb.jpg",
    duration: 30,
    vod_offset: null,
    is_featured: true,
    ...overrides,
  };
}

function staticCredentials(token = "test-token"): CredentialSource {
  return {
    current: vi.fn(async () => token),
    refresh: vi.fn(async () => null),
  };
}

const fetchMock = vi.fn<typeof fetch>();

function lastRequest(index: number): { url: URL; headers: Headers } {
  const [input, init] = fetchMock.mock.calls[index];
  return { url: new URL(String(input)), headers: new Headers(init?.headers) };
}

function createClient(credentials: CredentialSource = staticCredentials()) {
  return new HelixCatalogClient(credentials, {
    baseUrl: BASE,
    clientId: "test-client",
    retryDelayMs: 1,
    logger: new Logger({}, "ERROR"),
  });
}

describe("HelixCatalogClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("looks up a clip by id and maps it to a frozen descriptor", async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse({ data: [helixClip()], pagination: {} }));

    const clip = await createClient().getClipById("AbCdEf123");

    expect(clip).toEqual({
      id: "AbCdEf123",
      url: "https://clips.twitch.tv/AbCdEf123",
      title: "Pog moment",
      broadcasterName: "channelX",
      broadcasterId: "1001",
      creatorName: "viewer_one",
      gameId: "509658",
      durationSeconds: 30,
      isFeatured: true,
      createdAt: "2024-05-01T12:00:00Z",
      thumbnailUrl: "https://clips-media.test/thumb.jpg",
    });
    expect(Object.isFrozen(clip)).toBe(true);

    const { url, headers } = lastRequest(0);
    expect(url.toString()).toBe(`${BASE}/clips?id=AbCdEf123`);
    expect(headers.get("Client-ID")).toBe("test-client");
    expect(headers.get("Authorization")).toBe("Bearer test-token");
  });

  it("returns null when the clip is unknown", async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse({ data: [], pagination: {} }));

    await expect(createClient().getClipById("missing")).resolves.toBeNull();
  });

  it("resolves a handle after normalising it", async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse({ data: [{ id: "1001", login: "channelx" }] }));

    await expect(createClient().getChannelIdByHandle("@ChannelX ")).resolves.toBe("1001");
    expect(lastRequest(0).url.searchParams.get("login")).toBe("channelx");
  });

  it("passes window bounds and cursor when listing clips", async () => {
    fetchMock.mockImplementationOnce(async () =>
      jsonResponse({ data: [helixClip({ is_featured: undefined })], pagination: { cursor: "next-page" } })
    );

    const page = await createClient().listChannelClips({
      broadcasterId: "1001",
      startedAt: "2024-05-01T00:00:00.000Z",
      endedAt: "2024-05-08T00:00:00.000Z",
      cursor: "this-page",
    });

    expect(page.cursor).toBe("next-page");
    expect(page.clips[0].isFeatured).toBe(false);

    const params = lastRequest(0).url.searchParams;
    expect(params.get("broadcaster_id")).toBe("1001");
    expect(params.get("first")).toBe("100");
    expect(params.get("started_at")).toBe("2024-05-01T00:00:00.000Z");
    expect(params.get("ended_at")).toBe("2024-05-08T00:00:00.000Z");
    expect(params.get("after")).toBe("this-page");
  });

  it("treats an empty cursor as the last page", async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse({ data: [], pagination: { cursor: "" } }));

    const page = await createClient().listChannelClips({ broadcasterId: "1001" });

    expect(page).toEqual({ clips: [], cursor: undefined });
  });

  it("refreshes the token once after a 401", async () => {
    const credentials: CredentialSource = {
      current: vi.fn(async () => "stale-token"),
      refresh: vi.fn(async () => "fresh-token"),
    };
    fetchMock
      .mockImplementationOnce(async () => jsonResponse({ message: "Invalid OAuth token" }, 401))
      .mockImplementationOnce(async () => jsonResponse({ data: [{ id: "509658", name: "Just Chatting" }] }));

    await expect(createClient(credentials).getGameName("509658")).resolves.toBe("Just Chatting");
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(lastRequest(1).headers.get("Authorization")).toBe("Bearer fresh-token");
  });

  it("retries server errors", async () => {
    fetchMock
      .mockImplementationOnce(async () => jsonResponse({ message: "unavailable" }, 503))
      .mockImplementationOnce(async () => jsonResponse({ data: [helixClip()], pagination: {} }));

    const clip = await createClient().getClipById("AbCdEf123");

    expect(clip?.id).toBe("AbCdEf123");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("retries a 429 after the hinted delay", async () => {
    fetchMock
      .mockImplementationOnce(async () => jsonResponse({ message: "slow down" }, 429, { "Retry-After": "0" }))
      .mockImplementationOnce(async () => jsonResponse({ data: [], pagination: {} }));

    await expect(createClient().getClipById("AbCdEf123")).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ message: "bad request" }, 400));

    await expect(createClient().getClipById("AbCdEf123")).rejects.toBeInstanceOf(ExternalServiceError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects bodies that do not match the schema", async () => {
    fetchMock.mockImplementationOnce(async () => jsonResponse({ data: [{ id: 5 }] }));

    await expect(createClient().getClipById("AbCdEf123")).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it("skips the game lookup for an empty id", async () => {
    await expect(createClient().getGameName("")).resolves.toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("parseRetryAfter", () => {
  it("reads Ratelimit-Reset as epoch seconds", () => {
    const headers = new Headers({ "Ratelimit-Reset": "1700000010" });
    expect(parseRetryAfter(headers, 1700000000000)).toBe(10000);
  });

  it("reads Retry-After as seconds", () => {
    expect(parseRetryAfter(new Headers({ "Retry-After": "3" }), 0)).toBe(3000);
  });

  it("returns undefined without a hint", () => {
    expect(parseRetryAfter(new Headers(), 0)).toBeUndefined();
  });
});
