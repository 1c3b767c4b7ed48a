import { describe, it, expect, vi } from "vitest";
import { withCredentialRefresh, type CredentialSource } from "../credentials";
import { CredentialExpiredError, TransientUpstreamError } from "../errors";

function sourceWith(current: string, refreshed: string | null): CredentialSource {
  return {
    current: vi.fn(async () => current),
    refresh: vi.fn(async () => refreshed),
  };
}

describe("withCredentialRefresh", () => {
  it("refreshes once and repeats the call with the new token", async () => {
    const source = sourceWith("stale-token", "fresh-token");
    const fn = vi.fn(async (token: string) => {
      if (token === "stale-token") throw new CredentialExpiredError("twitch");
      return `used ${token}`;
    });

    await expect(withCredentialRefresh(source, fn)).resolves.toBe("used fresh-token");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(source.refresh).toHaveBeenCalledTimes(1);
  });

  it("fails the call when refresh yields no token", async () => {
    const source = sourceWith("stale-token", null);
    const fn = vi.fn(async () => {
      throw new CredentialExpiredError("twitch");
    });

    await expect(withCredentialRefresh(source, fn)).rejects.toBeInstanceOf(CredentialExpiredError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("fails the call when refresh returns the same token", async () => {
    const source = sourceWith("stale-token", "stale-token");
    const fn = vi.fn(async () => {
      throw new CredentialExpiredError("twitch");
    });

    await expect(withCredentialRefresh(source, fn)).rejects.toBeInstanceOf(CredentialExpiredError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("passes other errors through without refreshing", async () => {
    const source = sourceWith("test-token", "fresh-token");
    const fn = vi.fn(async () => {
      throw new TransientUpstreamError("twitch", "HTTP 503");
    });

    await expect(withCredentialRefresh(source, fn)).rejects.toBeInstanceOf(TransientUpstreamError);
    expect(source.refresh).not.toHaveBeenCalled();
  });
});
