/**
 * Content-warning handling for the embedded player
 *
 * The clip page reports a player that never finished loading. Without a
 * dismisser the operator gets a logged instruction to click through by hand.
 */

import { z } from "zod";
import { defaultLogger, type ILogger } from "../lib/logger";
import { PLAYER_SOURCE_NAME } from "../obs/constants";
import type { CompositorApi } from "../obs/types";

export const ContentWarningReportSchema = z.object({
  detectionMethod: z.string().min(1).default("unknown"),
  timestamp: z.string().optional(),
});

export type ContentWarningReport = z.infer<typeof ContentWarningReportSchema>;

export const MANUAL_INSTRUCTION =
  "Manual action needed: right-click the player source, choose Interact, and click through the warning";

export interface ContentWarningDismisser {
  dismiss(): Promise<boolean>;
}

/**
 * Reloads the player source, then toggles its visibility.
 * Either is enough to get past a gate that has not been rendered yet.
 */
export class CompositorWarningDismisser implements ContentWarningDismisser {
  private readonly logger: ILogger;

  constructor(
    private readonly compositor: CompositorApi,
    private readonly sceneName: string,
    private readonly sourceName: string = PLAYER_SOURCE_NAME,
    logger: ILogger = defaultLogger
  ) {
    this.logger = logger.child({ component: "content-warning" });
  }

  async dismiss(): Promise<boolean> {
    const refreshed = await this.compositor.refreshSource(this.sourceName);
    if (refreshed.ok) {
      this.logger.info("Player source refreshed", { sourceName: this.sourceName });
      return true;
    }
    this.logger.debug("Player refresh failed", { error: refreshed.error });

    const hidden = await this.compositor.setSourceVisible(this.sceneName, this.sourceName, false);
    const shown = hidden.ok && (await this.compositor.setSourceVisible(this.sceneName, this.sourceName, true)).ok;
    if (shown) {
      this.logger.info("Player visibility toggled", { sourceName: this.sourceName });
      return true;
    }

    this.logger.warn("Content warning could not be dismissed automatically", { sourceName: this.sourceName });
    return false;
  }
}

export class ContentWarningHandler {
  private readonly logger: ILogger;

  constructor(
    private readonly dismisser: ContentWarningDismisser | null,
    logger: ILogger = defaultLogger
  ) {
    this.logger = logger.child({ component: "content-warning" });
  }

  async handle(report: ContentWarningReport): Promise<{ obsAutomation: boolean }> {
    this.logger.warn("Content warning detected", {
      detectionMethod: report.detectionMethod,
      reportedAt: report.timestamp,
    });

    let dismissed = false;
    if (this.dismisser) {
      try {
        dismissed = await this.dismisser.dismiss();
      } catch (error) {
        this.logger.error("Content warning automation failed", error);
      }
    }

    if (!dismissed) {
      this.logger.info(MANUAL_INSTRUCTION, { automationConfigured: this.dismisser !== null });
    }
    return { obsAutomation: dismissed };
  }
}
