/**
 * Access-token handling for upstream calls
 */

import { CredentialExpiredError } from "./errors";
import type { ILogger } from "./logger";

export interface CredentialSource {
  /** Token to use for the next request */
  current(): Promise<string>;
  /** Obtain a fresh token, or null when no refresh is possible */
  refresh(): Promise<string | null>;
}

/**
 * Run fn with the current token. On CredentialExpiredError, refresh once
 * and repeat. A refresh that yields no new token fails this call only.
 */
export async function withCredentialRefresh<T>(
  source: CredentialSource,
  fn: (token: string) => Promise<T>,
  options: { logger?: ILogger; operationName?: string } = {}
): Promise<T> {
  const token = await source.current();

  try {
    return await fn(token);
  } catch (error) {
    if (!(error instanceof CredentialExpiredError)) {
      throw error;
    }

    options.logger?.warn("credential_expired", { operation: options.operationName });
    const refreshed = await source.refresh();

    if (refreshed === null || refreshed === token) {
      options.logger?.error("credential_refresh_failed", error, { operation: options.operationName });
      throw error;
    }

    return fn(refreshed);
  }
}
