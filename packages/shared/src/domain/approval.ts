import type { ClipDescriptor } from "./clip";

export type ApprovalDecision = "pending" | "approved" | "denied";

/**
 * A resolved clip waiting on moderator confirmation.
 * Lives in memory only for the duration of the wait.
 */
export type ApprovalRequest = {
  /** Short random id used in approve/deny replies */
  id: string;
  clip: ClipDescriptor;
  requestedBy?: string;
  decision: ApprovalDecision;
  /** ISO-8601 */
  expiresAt: string;
};
