/**
 * Twitch catalog wiring
 */

import type { AppConfig } from "../lib/config";
import type { ILogger } from "../lib/logger";
import { HelixCatalogClient } from "./helixClient";
import { TwitchTokenProvider } from "./tokenProvider";

export { HelixCatalogClient, parseRetryAfter, toClipDescriptor, type HelixClientConfig } from "./helixClient";
export { TwitchTokenProvider, type TokenProviderConfig } from "./tokenProvider";

export function createTwitchCatalog(config: AppConfig["twitch"], logger: ILogger): HelixCatalogClient {
  const tokens = new TwitchTokenProvider({
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    accessToken: config.accessToken,
    refreshToken: config.refreshToken,
    authBaseUrl: config.authBaseUrl,
    logger,
  });

  return new HelixCatalogClient(tokens, {
    baseUrl: config.apiBaseUrl,
    clientId: config.clientId,
    logger,
  });
}
