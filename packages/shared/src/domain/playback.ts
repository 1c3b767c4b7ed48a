import type { ClipDescriptor } from "./clip";

export type PlaybackState =
  | "Idle"
  | "Resolving"
  | "AwaitingApproval"
  | "Loading"
  | "Playing"
  | "Cooldown";

/**
 * Snapshot served by the status endpoint
 */
export type PlaybackStatus = {
  state: PlaybackState;
  currentClip: ClipDescriptor | null;
  queueSize: number;
};

export type PlaybackOutcome =
  | { status: "playing"; clip: ClipDescriptor; autoStopMs: number }
  | { status: "not_found"; reason: string }
  | { status: "denied"; clip: ClipDescriptor; decision: "denied" | "timeout" }
  | { status: "cancelled" };
