/**
 * Moderator approval for resolved clips
 *
 * A request waits up to timeoutMs, polling every pollIntervalMs for an
 * external decision. The wait ends early when the session signal aborts.
 */

import type { ApprovalRequest, ClipDescriptor } from "@clipcast/shared";
import { defaultLogger, type ILogger } from "../lib/logger";
import { createApprovalId } from "../lib/ids";
import { abortableSleep } from "../lib/retry";
import { Messages, approvalPrompt } from "../commands/messages";
import { notifySafely, type ChatNotifier } from "../commands/notifier";

export const APPROVAL_TIMEOUT_MS = 60000;
export const APPROVAL_POLL_INTERVAL_MS = 500;

export type ApprovalResult = "approved" | "denied" | "timeout" | "cancelled";

export type ApprovalGateOptions = {
  timeoutMs?: number;
  pollIntervalMs?: number;
  notifier?: ChatNotifier;
  logger?: ILogger;
  now?: () => number;
};

const AFFIRMATIVE = ["yes", "yep", "yeah", "yar", "yup", "sure", "fine", "ok", "okay", "go ahead", "approve", "approved"];
const NEGATIVE = ["no", "nope", "nah", "nay", "nar", "naw", "not sure", "not okay", "deny", "denied"];

/**
 * Interpret a free-form moderator reply.
 * Negatives are checked first so "not okay" is not read as "okay".
 */
export function parseApprovalReply(text: string): "approved" | "denied" | null {
  const normalized = text.trim().toLowerCase().replace(/[.!?,]+$/, "");
  if (NEGATIVE.includes(normalized)) return "denied";
  if (AFFIRMATIVE.includes(normalized)) return "approved";
  return null;
}

export class ApprovalGate {
  private readonly requests = new Map<string, ApprovalRequest>();
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly notifier: ChatNotifier | undefined;
  private readonly logger: ILogger;
  private readonly now: () => number;

  constructor(options: ApprovalGateOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? APPROVAL_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? APPROVAL_POLL_INTERVAL_MS;
    this.notifier = options.notifier;
    this.logger = (options.logger || defaultLogger).child({ component: "approval" });
    this.now = options.now ?? Date.now;
  }

  async request(
    clip: ClipDescriptor,
    options: { signal: AbortSignal; requestedBy?: string }
  ): Promise<ApprovalResult> {
    const id = createApprovalId();
    const expiresAtMs = this.now() + this.timeoutMs;
    const request: ApprovalRequest = {
      id,
      clip,
      requestedBy: options.requestedBy,
      decision: "pending",
      expiresAt: new Date(expiresAtMs).toISOString(),
    };
    this.requests.set(id, request);
    this.logger.info("Approval requested", { approvalId: id, clipId: clip.id, requestedBy: options.requestedBy });

    await this.notify(approvalPrompt(clip.url, id));
    await this.notify(Messages.APPROVAL_WAIT);

    try {
      const result = await this.wait(request, expiresAtMs, options.signal);
      this.logger.info("Approval finished", { approvalId: id, clipId: clip.id, result });

      if (result === "approved") await this.notify(Messages.APPROVAL_SUCCESS);
      if (result === "denied") await this.notify(Messages.APPROVAL_DENIED);
      if (result === "timeout") await this.notify(Messages.APPROVAL_TIMEOUT);
      return result;
    } finally {
      this.requests.delete(id);
    }
  }

  /**
   * Record a decision. False when the id is unknown or already decided.
   */
  decide(id: string, approved: boolean, decidedBy?: string): boolean {
    const request = this.requests.get(id);
    if (!request || request.decision !== "pending") return false;

    request.decision = approved ? "approved" : "denied";
    this.logger.info("Approval decided", { approvalId: id, decision: request.decision, decidedBy });
    return true;
  }

  /**
   * Decide the oldest pending request (replies without an id)
   */
  decideOldest(approved: boolean, decidedBy?: string): ApprovalRequest | null {
    for (const request of this.requests.values()) {
      if (request.decision === "pending") {
        this.decide(request.id, approved, decidedBy);
        return { ...request };
      }
    }
    return null;
  }

  pending(): ApprovalRequest[] {
    return [...this.requests.values()]
      .filter((request) => request.decision === "pending")
      .map((request) => ({ ...request }));
  }

  private async wait(request: ApprovalRequest, expiresAtMs: number, signal: AbortSignal): Promise<ApprovalResult> {
    for (;;) {
      if (request.decision !== "pending") return request.decision;
      if (signal.aborted) return "cancelled";
      if (this.now() >= expiresAtMs) return "timeout";

      const waited = await abortableSleep(this.pollIntervalMs, signal);
      if (!waited) return "cancelled";
    }
  }

  private async notify(message: string): Promise<void> {
    if (this.notifier) {
      await notifySafely(this.notifier, message, this.logger);
    }
  }
}
