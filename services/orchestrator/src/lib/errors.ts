/**
 * Unified error types for the orchestrator
 *
 * Error classification drives:
 * - Retry decisions (transient vs permanent)
 * - User-facing notices vs operator log detail
 */

/**
 * Error codes for categorization
 */
export const ErrorCode = {
  // Request errors (never retry)
  VALIDATION_ERROR: "VALIDATION_ERROR",
  INVALID_REFERENCE: "INVALID_REFERENCE",

  // Upstream catalog errors
  UPSTREAM_MISS: "UPSTREAM_MISS",
  UPSTREAM_ERROR: "UPSTREAM_ERROR",
  TRANSIENT_UPSTREAM_FAILURE: "TRANSIENT_UPSTREAM_FAILURE",
  RATE_LIMIT_EXCEEDED: "RATE_LIMIT_EXCEEDED",
  CREDENTIAL_EXPIRED: "CREDENTIAL_EXPIRED",

  // Local surfaces
  COMPOSITION_SURFACE_UNREADY: "COMPOSITION_SURFACE_UNREADY",
  HOSTING_FAILURE: "HOSTING_FAILURE",
  STATE_STORE_ERROR: "STATE_STORE_ERROR",

  // Infrastructure errors
  TIMEOUT_ERROR: "TIMEOUT_ERROR",
  NETWORK_ERROR: "NETWORK_ERROR",

  // Unknown
  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class for the orchestrator
 */
export class ClipcastError extends Error {
  public readonly timestamp: string;

  constructor(
    message: string,
    public readonly code: ErrorCodeType,
    public readonly context: Record<string, unknown> = {},
    public readonly isRetryable: boolean = false,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = "ClipcastError";
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp,
      cause: this.cause?.message,
    };
  }
}

/**
 * Validation error - bad configuration or request body, never retry
 */
export class ValidationError extends ClipcastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION_ERROR, context, false);
    this.name = "ValidationError";
  }
}

/**
 * A clip reference from which no identifier could be extracted.
 * User-correctable.
 */
export class InvalidReferenceError extends ClipcastError {
  constructor(reference: string, reason: string, context?: Record<string, unknown>) {
    super(`Invalid clip reference: ${reason}`, ErrorCode.INVALID_REFERENCE, { reference, ...context }, false);
    this.name = "InvalidReferenceError";
  }
}

/**
 * Non-retryable upstream reply (4xx other than 401/429, malformed body)
 */
export class ExternalServiceError extends ClipcastError {
  constructor(
    service: string,
    message: string,
    context?: Record<string, unknown>,
    isRetryable = false,
    cause?: Error
  ) {
    super(`${service} error: ${message}`, ErrorCode.UPSTREAM_ERROR, { service, ...context }, isRetryable, cause);
    this.name = "ExternalServiceError";
  }
}

/**
 * Network failure or 5xx from an upstream - always retryable
 */
export class TransientUpstreamError extends ClipcastError {
  constructor(service: string, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(
      `${service} unavailable: ${message}`,
      ErrorCode.TRANSIENT_UPSTREAM_FAILURE,
      { service, ...context },
      true,
      cause
    );
    this.name = "TransientUpstreamError";
  }
}

/**
 * Rate limit error - retryable after the hinted delay
 */
export class RateLimitError extends ClipcastError {
  constructor(
    service: string,
    public readonly retryAfterMs?: number,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(
      `Rate limit exceeded for ${service}`,
      ErrorCode.RATE_LIMIT_EXCEEDED,
      { service, retryAfterMs, ...context },
      true,
      cause
    );
    this.name = "RateLimitError";
  }
}

/**
 * Access token rejected. Handled by one refresh attempt, not by backoff.
 */
export class CredentialExpiredError extends ClipcastError {
  constructor(service: string, context?: Record<string, unknown>) {
    super(`Credential rejected by ${service}`, ErrorCode.CREDENTIAL_EXPIRED, { service, ...context }, false);
    this.name = "CredentialExpiredError";
  }
}

/**
 * The compositing surface could not be created or verified
 */
export class CompositionSurfaceUnreadyError extends ClipcastError {
  constructor(step: string, context?: Record<string, unknown>) {
    super(
      `Composition surface not ready: ${step}`,
      ErrorCode.COMPOSITION_SURFACE_UNREADY,
      { step, ...context },
      false
    );
    this.name = "CompositionSurfaceUnreadyError";
  }
}

/**
 * Local HTTP listener could not be bound
 */
export class HostingError extends ClipcastError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(`Hosting failure: ${message}`, ErrorCode.HOSTING_FAILURE, context, false, cause);
    this.name = "HostingError";
  }
}

/**
 * Durable state read/write failure
 */
export class StateStoreError extends ClipcastError {
  constructor(
    operation: "read" | "write",
    message: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(`State ${operation} error: ${message}`, ErrorCode.STATE_STORE_ERROR, { operation, ...context }, false, cause);
    this.name = "StateStoreError";
  }
}

/**
 * Timeout error - retryable
 */
export class TimeoutError extends ClipcastError {
  constructor(operation: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(
      `Operation timed out after ${timeoutMs}ms: ${operation}`,
      ErrorCode.TIMEOUT_ERROR,
      { operation, timeoutMs, ...context },
      true
    );
    this.name = "TimeoutError";
  }
}

/**
 * Determine if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ClipcastError) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (message.includes("429") || message.includes("rate limit")) return true;
    if (/\b5\d{2}\b/.test(message)) return true;
    if (message.includes("timeout") || message.includes("etimedout")) return true;
    if (message.includes("econnreset") || message.includes("enotfound")) return true;
    // undici
    if (message.includes("fetch failed")) return true;
    if (message.includes("socket hang up")) return true;
    if (message.includes("econnrefused")) return true;
    if (error.name === "AbortError") return true;
  }

  return false;
}

/**
 * Delay hinted by the upstream, if the error carries one
 */
export function getRetryAfterMs(error: unknown): number | undefined {
  if (error instanceof RateLimitError) {
    return error.retryAfterMs;
  }
  return undefined;
}

const UPSTREAM_FAILURE_CODES: readonly ErrorCodeType[] = [
  ErrorCode.UPSTREAM_ERROR,
  ErrorCode.TRANSIENT_UPSTREAM_FAILURE,
  ErrorCode.RATE_LIMIT_EXCEEDED,
  ErrorCode.CREDENTIAL_EXPIRED,
  ErrorCode.TIMEOUT_ERROR,
  ErrorCode.NETWORK_ERROR,
];

/**
 * True when the catalog could not answer, as opposed to answering "no such clip"
 */
export function isUpstreamFailure(error: unknown): boolean {
  return error instanceof ClipcastError && UPSTREAM_FAILURE_CODES.includes(error.code);
}

/**
 * Extract error info for logging
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  code: ErrorCodeType;
  isRetryable: boolean;
  context?: Record<string, unknown>;
} {
  if (error instanceof ClipcastError) {
    return {
      message: error.message,
      code: error.code,
      isRetryable: error.isRetryable,
      context: error.context,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      code: ErrorCode.UNKNOWN_ERROR,
      isRetryable: isRetryableError(error),
    };
  }

  return {
    message: String(error),
    code: ErrorCode.UNKNOWN_ERROR,
    isRetryable: false,
  };
}
