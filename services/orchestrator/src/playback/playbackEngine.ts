/**
 * Playback State Machine
 *
 * Owns the single playback session:
 *   Idle -> Resolving -> [AwaitingApproval] -> Loading -> Playing -> Cooldown -> Idle
 *
 * Requests queue FIFO on the session slot. Every session has its own
 * AbortController; stop() aborts it before taking the transition lock, so a
 * late auto-stop or approval wait can never act on a newer session.
 * Loading runs under the same lock, so the slot is released only once the
 * stopped session's surface call has returned.
 */

import type {
  ClipDescriptor,
  PlaybackOutcome,
  PlaybackState,
  PlaybackStatus,
  ResolveOutcome,
} from "@clipcast/shared";
import { defaultLogger, type ILogger } from "../lib/logger";
import { CompositionSurfaceUnreadyError } from "../lib/errors";
import { Mutex } from "../lib/mutex";
import { sleep } from "../lib/retry";
import type { LastClipStore } from "../state/lastClipStore";
import type { ApprovalGate } from "./approvalGate";

/** Added to the clip duration before auto-stop, covering page load */
export const SETUP_DELAY_SECONDS = 3;

export interface CompositionSurface {
  ensureReady(): Promise<boolean>;
  setUrl(url: string): Promise<boolean>;
  show(): Promise<boolean>;
  /** Hide and blank the surface */
  reset(): Promise<boolean>;
}

export interface ClipHost {
  readonly pageUrl: string;
  host(clip: ClipDescriptor): void;
  clear(): void;
}

export interface ClipUrlResolver {
  resolveByUrl(url: string): Promise<ResolveOutcome>;
}

export type StateChangeListener = (state: PlaybackState, previous: PlaybackState, clip: ClipDescriptor | null) => void;

export type PlaybackEngineOptions = {
  surface: CompositionSurface;
  host: ClipHost;
  lastClip: LastClipStore;
  resolver: ClipUrlResolver;
  approvals: ApprovalGate;
  cooldownMs?: number;
  setupDelaySeconds?: number;
  onStateChange?: StateChangeListener;
  logger?: ILogger;
};

export type PlayOptions = {
  requireApproval?: boolean;
  requestedBy?: string;
};

type ClipSource = { kind: "clip"; clip: ClipDescriptor } | { kind: "resolve"; resolve: () => Promise<ResolveOutcome> };

type Session = {
  controller: AbortController;
  release: () => void;
  surfaceInUse: boolean;
};

export class PlaybackEngine {
  private state: PlaybackState = "Idle";
  private currentClip: ClipDescriptor | null = null;
  private session: Session | null = null;
  private closed = false;

  private readonly slot = new Mutex();
  private readonly transitions = new Mutex();
  private readonly cooldownMs: number;
  private readonly setupDelaySeconds: number;
  private readonly logger: ILogger;

  constructor(private readonly options: PlaybackEngineOptions) {
    this.cooldownMs = options.cooldownMs ?? 0;
    this.setupDelaySeconds = options.setupDelaySeconds ?? SETUP_DELAY_SECONDS;
    this.logger = (options.logger || defaultLogger).child({ component: "playback" });
  }

  getStatus(): PlaybackStatus {
    return {
      state: this.state,
      currentClip: this.currentClip,
      queueSize: this.slot.waiting,
    };
  }

  /**
   * Play an already-resolved clip once the session is free
   */
  play(clip: ClipDescriptor, options: PlayOptions = {}): Promise<PlaybackOutcome> {
    return this.run({ kind: "clip", clip }, options);
  }

  /**
   * Resolve inside the session (Resolving state), then play
   */
  enqueue(resolve: () => Promise<ResolveOutcome>, options: PlayOptions = {}): Promise<PlaybackOutcome> {
    return this.run({ kind: "resolve", resolve }, options);
  }

  /**
   * Re-resolve and play the last clip from durable state
   */
  replay(options: PlayOptions = {}): Promise<PlaybackOutcome> {
    return this.enqueue(async () => {
      const url = await this.options.lastClip.get();
      if (!url) return { status: "not_found", reason: "no_history" };
      return this.options.resolver.resolveByUrl(url);
    }, options);
  }

  /**
   * Stop the current session. No-op when Idle.
   */
  async stop(reason = "manual"): Promise<void> {
    const session = this.session;
    session?.controller.abort();
    await this.endSession(session, reason);
  }

  /**
   * Stop playback and refuse queued and future requests
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await this.stop("shutdown");
  }

  private async run(source: ClipSource, options: PlayOptions): Promise<PlaybackOutcome> {
    const release = await this.slot.acquire();
    if (this.closed) {
      release();
      return { status: "cancelled" };
    }

    const session: Session = { controller: new AbortController(), release, surfaceInUse: false };
    this.session = session;
    const { signal } = session.controller;

    try {
      let clip: ClipDescriptor;
      if (source.kind === "resolve") {
        if (!(await this.transition(session, "Resolving"))) return { status: "cancelled" };
        const outcome = await source.resolve();
        if (signal.aborted) return { status: "cancelled" };
        if (outcome.status === "not_found") {
          await this.abandon(session, `not found: ${outcome.reason}`);
          return { status: "not_found", reason: outcome.reason };
        }
        clip = outcome.clip;
      } else {
        clip = source.clip;
      }

      if (options.requireApproval) {
        if (!(await this.transition(session, "AwaitingApproval", clip))) return { status: "cancelled" };
        const decision = await this.options.approvals.request(clip, { signal, requestedBy: options.requestedBy });
        if (decision === "cancelled" || signal.aborted) return { status: "cancelled" };
        if (decision !== "approved") {
          await this.abandon(session, `approval ${decision}`);
          return { status: "denied", clip, decision };
        }
      }

      const autoStopMs = Math.round((clip.durationSeconds + this.setupDelaySeconds) * 1000);
      if (!(await this.load(session, clip, autoStopMs))) return { status: "cancelled" };
      this.logger.info("Clip playing", { clipId: clip.id, title: clip.title, autoStopMs });

      await this.rememberLastClip(clip);
      return { status: "playing", clip, autoStopMs };
    } catch (error) {
      if (signal.aborted) {
        this.logger.debug("Cancelled session failed", { error: error instanceof Error ? error.message : String(error) });
        return { status: "cancelled" };
      }
      await this.abandon(session, "failure");
      throw error;
    }
  }

  /**
   * Loading -> Playing; a concurrent stop() resets the surface after this returns
   */
  private load(session: Session, clip: ClipDescriptor, autoStopMs: number): Promise<boolean> {
    const { signal } = session.controller;

    return this.transitions.runExclusive(async () => {
      if (signal.aborted || this.session !== session) return false;
      this.setState("Loading", clip);

      await this.prepareSurface(session, clip);
      if (signal.aborted) return false;

      this.setState("Playing", clip);
      this.scheduleAutoStop(session, autoStopMs);
      return true;
    });
  }

  private async prepareSurface(session: Session, clip: ClipDescriptor): Promise<void> {
    const { surface, host } = this.options;
    const { signal } = session.controller;

    const ready = await surface.ensureReady();
    if (signal.aborted) return;
    if (!ready) {
      this.logger.error("Composition surface unavailable, playback aborted", undefined, { clipId: clip.id });
      throw new CompositionSurfaceUnreadyError("ensure_ready", { clipId: clip.id });
    }

    host.host(clip);
    session.surfaceInUse = true;

    const pointed = await surface.setUrl(host.pageUrl);
    if (signal.aborted) return;
    if (!pointed) {
      throw new CompositionSurfaceUnreadyError("set_url", { clipId: clip.id, pageUrl: host.pageUrl });
    }

    const shown = await surface.show();
    if (signal.aborted) return;
    if (!shown) {
      throw new CompositionSurfaceUnreadyError("show", { clipId: clip.id });
    }
  }

  private scheduleAutoStop(session: Session, delayMs: number): void {
    const timer = setTimeout(() => {
      if (this.session !== session) return;

      session.controller.abort();
      this.endSession(session, "auto").catch((error: unknown) => {
        this.logger.error("Auto-stop failed", error);
      });
    }, delayMs);

    session.controller.signal.addEventListener("abort", () => clearTimeout(timer), { once: true });
  }

  /**
   * Cooldown teardown for a session, under the transition lock
   */
  private async endSession(session: Session | null, reason: string): Promise<void> {
    await this.transitions.runExclusive(async () => {
      if (session === null || this.session !== session || this.state === "Idle") return;

      const clip = this.currentClip;
      this.setState("Cooldown", clip);
      this.options.host.clear();

      if (session.surfaceInUse && !(await this.options.surface.reset())) {
        this.logger.warn("Surface reset incomplete", { clipId: clip?.id, reason });
      }
      if (this.cooldownMs > 0) {
        await sleep(this.cooldownMs);
      }

      this.finish(session);
      this.logger.info("Playback stopped", { clipId: clip?.id, reason });
    });
  }

  /**
   * Return to Idle from a session that never reached Playing
   */
  private async abandon(session: Session, reason: string): Promise<void> {
    await this.transitions.runExclusive(async () => {
      if (this.session !== session) return;

      if (session.surfaceInUse) {
        this.options.host.clear();
        if (!(await this.options.surface.reset())) {
          this.logger.warn("Surface reset incomplete", { reason });
        }
      }
      this.finish(session);
      this.logger.debug("Session abandoned", { reason });
    });
  }

  private finish(session: Session): void {
    this.setState("Idle", null);
    this.session = null;
    session.release();
  }

  private transition(session: Session, next: PlaybackState, clip?: ClipDescriptor): Promise<boolean> {
    return this.transitions.runExclusive(() => {
      if (session.controller.signal.aborted || this.session !== session) return false;
      this.setState(next, clip ?? this.currentClip);
      return true;
    });
  }

  private setState(next: PlaybackState, clip: ClipDescriptor | null): void {
    const previous = this.state;
    this.state = next;
    this.currentClip = clip;
    this.logger.debug("Playback state changed", { from: previous, to: next, clipId: clip?.id });

    try {
      this.options.onStateChange?.(next, previous, clip);
    } catch (error) {
      this.logger.error("State change listener failed", error);
    }
  }

  private async rememberLastClip(clip: ClipDescriptor): Promise<void> {
    try {
      await this.options.lastClip.set(clip.url);
    } catch (error) {
      this.logger.error("Could not save last clip", error, { clipId: clip.id });
    }
  }
}
