/**
 * OAuth token source for Helix requests
 */

import { defaultLogger, type ILogger } from "../lib/logger";
import { CredentialExpiredError } from "../lib/errors";
import type { CredentialSource } from "../lib/credentials";
import { TokenResponseSchema } from "./schemas";

export type TokenProviderConfig = {
  clientId: string;
  clientSecret?: string;
  accessToken?: string;
  refreshToken?: string;
  /** OAuth base URL, e.g. https://id.twitch.tv/oauth2 */
  authBaseUrl: string;
  timeoutMs?: number;
  logger?: ILogger;
};

/**
 * Holds the current access token and renews it with the refresh-token
 * grant, or the client-credentials grant when only a secret is configured.
 * Concurrent refresh calls share one token request.
 */
export class TwitchTokenProvider implements CredentialSource {
  private accessToken: string | null;
  private refreshToken: string | null;
  private inflight: Promise<string | null> | null = null;
  private readonly logger: ILogger;

  constructor(private readonly config: TokenProviderConfig) {
    this.accessToken = config.accessToken ?? null;
    this.refreshToken = config.refreshToken ?? null;
    this.logger = (config.logger || defaultLogger).child({ component: "twitch-auth" });
  }

  async current(): Promise<string> {
    if (this.accessToken) return this.accessToken;

    const token = await this.refresh();
    if (!token) {
      throw new CredentialExpiredError("twitch", { reason: "no access token available" });
    }
    return token;
  }

  refresh(): Promise<string | null> {
    if (!this.inflight) {
      this.inflight = this.requestToken().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async requestToken(): Promise<string | null> {
    const { clientId, clientSecret } = this.config;
    if (!clientSecret) {
      this.logger.warn("Token refresh unavailable: no client secret configured");
      return null;
    }

    const body = new URLSearchParams({ client_id: clientId, client_secret: clientSecret });
    if (this.refreshToken) {
      body.set("grant_type", "refresh_token");
      body.set("refresh_token", this.refreshToken);
    } else {
      body.set("grant_type", "client_credentials");
    }
    const grantType = body.get("grant_type");

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs ?? 10000);

    try {
      const response = await fetch(`${this.config.authBaseUrl}/token`, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: body.toString(),
        signal: controller.signal,
      });

      if (!response.ok) {
        this.logger.error("Token request rejected", undefined, { status: response.status, grantType });
        return null;
      }

      const parsed = TokenResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        this.logger.error("Token response malformed", parsed.error, { grantType });
        return null;
      }

      this.accessToken = parsed.data.access_token;
      if (parsed.data.refresh_token) {
        this.refreshToken = parsed.data.refresh_token;
      }
      this.logger.info("Access token renewed", { grantType, expiresIn: parsed.data.expires_in });
      return this.accessToken;
    } catch (error) {
      this.logger.error("Token request failed", error, { grantType });
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }
}
