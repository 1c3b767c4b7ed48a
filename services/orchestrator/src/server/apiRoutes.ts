/**
 * Status and control API, mounted under /api
 */

import express from "express";
import { z } from "zod";
import type { ClipDescriptor } from "@clipcast/shared";
import { InvalidReferenceError, isUpstreamFailure } from "../lib/errors";
import type { HealthReporter } from "../lib/health";
import type { ILogger } from "../lib/logger";
import type { ContentWarningHandler } from "../automation/contentWarning";
import { ContentWarningReportSchema } from "../automation/contentWarning";
import type { ApprovalGate } from "../playback/approvalGate";
import type { PlaybackEngine } from "../playback/playbackEngine";
import type { ClipCache } from "../resolver/clipCache";
import { extractClipId, type ClipResolver } from "../resolver/clipResolver";
import type { LastClipStore } from "../state/lastClipStore";
import { asyncRoute } from "./middleware";

export const FALLBACK_DURATION_SECONDS = 30;
export const CLIP_URL_BASE = "https://clips.twitch.tv";

export const PlayRequestSchema = z
  .object({
    clipId: z.string().min(1).optional(),
    url: z.string().min(1).optional(),
    title: z.string().optional(),
    creatorName: z.string().optional(),
    broadcasterName: z.string().optional(),
    gameId: z.string().optional(),
    durationSeconds: z.number().positive().optional(),
  })
  .refine((body) => body.clipId !== undefined || body.url !== undefined, {
    message: "clipId or url is required",
  });

export type PlayRequest = z.infer<typeof PlayRequestSchema>;

const ApprovalDecisionSchema = z.object({ approved: z.boolean() });

export type ApiDependencies = {
  engine: PlaybackEngine;
  resolver: Pick<ClipResolver, "resolveById">;
  lastClip: LastClipStore;
  approvals: ApprovalGate;
  cache: ClipCache;
  contentWarnings: ContentWarningHandler;
  health: HealthReporter;
  logger: ILogger;
};

/**
 * Descriptor built from posted metadata when the catalog cannot be reached
 */
export function descriptorFromMetadata(clipId: string, body: PlayRequest, now: Date = new Date()): ClipDescriptor {
  return Object.freeze({
    id: clipId,
    url: `${CLIP_URL_BASE}/${clipId}`,
    title: body.title ?? "",
    broadcasterName: body.broadcasterName ?? "",
    broadcasterId: "",
    creatorName: body.creatorName ?? "",
    gameId: body.gameId ?? "",
    durationSeconds: body.durationSeconds ?? FALLBACK_DURATION_SECONDS,
    isFeatured: false,
    createdAt: now.toISOString(),
    thumbnailUrl: "",
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
}

export function createApiRouter(deps: ApiDependencies): express.Router {
  const { engine, resolver, lastClip, approvals, cache, contentWarnings, health } = deps;
  const logger = deps.logger.child({ component: "api" });
  const router = express.Router();

  // Playback runs past the response; its outcome only goes to the log.
  const startInBackground = (label: string, playback: Promise<{ status: string }>): void => {
    playback
      .then((outcome) => logger.info("Playback request finished", { request: label, status: outcome.status }))
      .catch((error: unknown) => logger.error("Playback request failed", error, { request: label }));
  };

  router.get("/status", (_req, res) => {
    res.json(engine.getStatus());
  });

  // 200 whatever the status; monitors read the body
  router.get("/health", (_req, res) => {
    res.json(health.snapshot());
  });

  router.post(
    "/play",
    asyncRoute(async (req, res) => {
      const parsed = PlayRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: formatIssues(parsed.error) });
        return;
      }
      const body = parsed.data;

      let clip: ClipDescriptor;
      try {
        const clipId = extractClipId(body.clipId ?? body.url ?? "");
        try {
          const outcome = await resolver.resolveById(clipId);
          if (outcome.status === "not_found") {
            res.status(404).json({ error: "Clip not found" });
            return;
          }
          clip = outcome.clip;
        } catch (error) {
          if (!isUpstreamFailure(error)) throw error;
          logger.warn("Catalog unavailable, playing from posted metadata", {
            clipId,
            error: error instanceof Error ? error.message : String(error),
          });
          clip = descriptorFromMetadata(clipId, body);
        }
      } catch (error) {
        if (error instanceof InvalidReferenceError) {
          res.status(400).json({ error: error.message });
          return;
        }
        throw error;
      }

      startInBackground("play", engine.play(clip));
      res.status(202).json({ message: "Clip queued", clip });
    })
  );

  router.post(
    "/replay",
    asyncRoute(async (_req, res) => {
      const url = await lastClip.get();
      if (!url) {
        res.status(404).json({ error: "No clip available for replay" });
        return;
      }

      startInBackground("replay", engine.replay());
      res.status(202).json({ message: "Replay queued", url });
    })
  );

  router.post(
    "/stop",
    asyncRoute(async (_req, res) => {
      await engine.stop("api");
      res.json({ message: "Playback stopped", status: engine.getStatus() });
    })
  );

  router.post(
    "/content-warning",
    asyncRoute(async (req, res) => {
      const parsed = ContentWarningReportSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: formatIssues(parsed.error) });
        return;
      }
      res.json(await contentWarnings.handle(parsed.data));
    })
  );

  router.get("/approvals", (_req, res) => {
    res.json({ approvals: approvals.pending() });
  });

  router.post("/approvals/:id", (req, res) => {
    const parsed = ApprovalDecisionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: formatIssues(parsed.error) });
      return;
    }

    const id = req.params.id;
    if (!approvals.decide(id, parsed.data.approved, "api")) {
      res.status(404).json({ error: "Approval request not found" });
      return;
    }
    res.json({ id, decision: parsed.data.approved ? "approved" : "denied" });
  });

  router.post("/cache/sweep", (_req, res) => {
    const removed = cache.sweep();
    logger.info("Cache swept", { removed, remaining: cache.size });
    res.json({ removed });
  });

  return router;
}
