import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import type { ILogger } from "../lib/logger";

export const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, PUT, DELETE, OPTIONS",
  "Access-Control-Allow-Headers": "*",
};

export const NO_CACHE_HEADERS: Record<string, string> = {
  "Cache-Control": "no-cache, no-store, must-revalidate",
  Pragma: "no-cache",
  Expires: "0",
};

/**
 * Forward rejections from async handlers to the error middleware
 */
export function asyncRoute(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function cors(): RequestHandler {
  return (req, res, next) => {
    res.set(CORS_HEADERS);
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  };
}

export function notFound(): RequestHandler {
  return (_req, res) => {
    res.status(404).json({ error: "Not found" });
  };
}

function isBadRequestBody(error: unknown): boolean {
  return typeof error === "object" && error !== null && "status" in error && error.status === 400;
}

export function errorHandler(logger: ILogger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBadRequestBody(error)) {
      res.status(400).json({ error: "Invalid JSON body" });
      return;
    }

    logger.error("Request failed", error, { method: req.method, path: req.path });
    res.status(500).json({ error: "Internal server error" });
  };
}
