import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TwitchTokenProvider } from "../tokenProvider";
import { CredentialExpiredError } from "../../lib/errors";
import { Logger } from "../../lib/logger";

const fetchMock = vi.fn<typeof fetch>();
const quiet = new Logger({}, "ERROR");

function tokenResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function sentBody(index: number): URLSearchParams {
  const init = fetchMock.mock.calls[index][1];
  return new URLSearchParams(String(init?.body));
}

describe("TwitchTokenProvider", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("uses the refresh-token grant when a refresh token is configured", async () => {
    fetchMock.mockImplementationOnce(async () =>
      tokenResponse({ access_token: "fresh-token", refresh_token: "next-refresh", expires_in: 3600 })
    );
    const provider = new TwitchTokenProvider({
      clientId: "test-client",
      clientSecret: "test-secret",
      accessToken: "stale-token",
      refreshToken: "test-refresh",
      authBaseUrl: "https://auth.test/oauth2",
      logger: quiet,
    });

    await expect(provider.current()).resolves.toBe("stale-token");
    await expect(provider.refresh()).resolves.toBe("fresh-token");
    await expect(provider.current()).resolves.toBe("fresh-token");

    expect(String(fetchMock.mock.calls[0][0])).toBe("https://auth.test/oauth2/token");
    const body = sentBody(0);
    expect(body.get("grant_type")).toBe("refresh_token");
    expect(body.get("refresh_token")).toBe("test-refresh");
    expect(body.get("client_secret")).toBe("test-secret");
  });

  it("fetches an app token on first use when none is configured", async () => {
    fetchMock.mockImplementationOnce(async () => tokenResponse({ access_token: "app-token" }));
    const provider = new TwitchTokenProvider({
      clientId: "test-client",
      clientSecret: "test-secret",
      authBaseUrl: "https://auth.test/oauth2",
      logger: quiet,
    });

    await expect(provider.current()).resolves.toBe("app-token");
    expect(sentBody(0).get("grant_type")).toBe("client_credentials");
  });

  it("shares one request between concurrent refreshes", async () => {
    fetchMock.mockImplementation(async () => tokenResponse({ access_token: "fresh-token" }));
    const provider = new TwitchTokenProvider({
      clientId: "test-client",
      clientSecret: "test-secret",
      authBaseUrl: "https://auth.test/oauth2",
      logger: quiet,
    });

    const [a, b] = await Promise.all([provider.refresh(), provider.refresh()]);

    expect([a, b]).toEqual(["fresh-token", "fresh-token"]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("returns null without a client secret", async () => {
    const provider = new TwitchTokenProvider({
      clientId: "test-client",
      accessToken: "stale-token",
      authBaseUrl: "https://auth.test/oauth2",
      logger: quiet,
    });

    await expect(provider.refresh()).resolves.toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("returns null when the token endpoint rejects the grant", async () => {
    fetchMock.mockImplementationOnce(async () => tokenResponse({ message: "invalid refresh token" }, 400));
    const provider = new TwitchTokenProvider({
      clientId: "test-client",
      clientSecret: "test-secret",
      refreshToken: "test-refresh",
      authBaseUrl: "https://auth.test/oauth2",
      logger: quiet,
    });

    await expect(provider.current()).rejects.toBeInstanceOf(CredentialExpiredError);
  });
});
