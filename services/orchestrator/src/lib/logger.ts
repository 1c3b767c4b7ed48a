/**
 * Structured logging for the orchestrator
 *
 * JSON lines on stdout/stderr, one object per entry, with context
 * propagated through child loggers.
 */

import { extractErrorInfo } from "./errors";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

/**
 * Context that persists across all log entries
 */
export type LogContext = {
  component?: string;
  clipId?: string;
  operation?: string;
  traceId?: string;
  service?: string;
  [key: string]: unknown;
};

export type LogEntry = {
  timestamp: string;
  severity: LogLevel;
  message: string;
  component?: string;
  clipId?: string;
  traceId?: string;
  service?: string;
  [key: string]: unknown;
};

export interface ILogger {
  debug(message: string, extra?: Record<string, unknown>): void;
  info(message: string, extra?: Record<string, unknown>): void;
  warn(message: string, extra?: Record<string, unknown>): void;
  error(message: string, error?: unknown, extra?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context
   */
  child(context: Partial<LogContext>): ILogger;

  getContext(): LogContext;
}

/**
 * Structured logger implementation
 */
export class Logger implements ILogger {
  constructor(
    private context: LogContext = {},
    private minLevel: LogLevel = "DEBUG"
  ) {}

  private log(severity: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LEVEL_RANK[severity] < LEVEL_RANK[this.minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      severity,
      message,
      ...this.context,
      ...extra,
    };

    // Remove undefined values
    const cleanEntry = Object.fromEntries(Object.entries(entry).filter(([, v]) => v !== undefined));

    const json = JSON.stringify(cleanEntry);

    switch (severity) {
      case "ERROR":
        console.error(json);
        break;
      case "WARNING":
        console.warn(json);
        break;
      default:
        console.log(json);
    }
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("DEBUG", message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("INFO", message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("WARNING", message, extra);
  }

  error(message: string, error?: unknown, extra?: Record<string, unknown>): void {
    let errorData: Record<string, unknown> = {};

    if (error !== undefined) {
      const errorInfo = extractErrorInfo(error);
      errorData = {
        errorMessage: errorInfo.message,
        errorCode: errorInfo.code,
        isRetryable: errorInfo.isRetryable,
        errorContext: errorInfo.context,
      };

      if (error instanceof Error && error.stack) {
        errorData.errorStack = error.stack.split("\n").slice(0, 5).join("\n");
      }
    }

    this.log("ERROR", message, { ...errorData, ...extra });
  }

  child(context: Partial<LogContext>): ILogger {
    return new Logger({ ...this.context, ...context }, this.minLevel);
  }

  getContext(): LogContext {
    return { ...this.context };
  }
}

/**
 * Root logger for the service process
 */
export function createServiceLogger(options: { minLevel?: LogLevel; version?: string } = {}): ILogger {
  return new Logger(
    {
      service: "clipcast",
      version: options.version,
      traceId: generateTraceId(),
    },
    options.minLevel
  );
}

/**
 * Generate a trace ID for request correlation
 */
export function generateTraceId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `${timestamp}-${random}`;
}

/**
 * Timing utility for measuring operation duration
 */
export function withTiming<T>(
  logger: ILogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  return fn()
    .then((result) => {
      const durationMs = Date.now() - startTime;
      logger.info(`${operation} completed`, { operation, durationMs });
      return result;
    })
    .catch((error: unknown) => {
      const durationMs = Date.now() - startTime;
      logger.error(`${operation} failed`, error, { operation, durationMs });
      throw error;
    });
}

/**
 * Default logger instance (for quick usage)
 */
export const defaultLogger = new Logger({ service: "clipcast" });
