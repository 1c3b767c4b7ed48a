/**
 * Compositor supervision
 *
 * Keeps the compositor connected and the clip scene in shape: connects at
 * startup until it succeeds, reconnects with backoff after a drop, and runs
 * ensureReady() on every connect and at each health check.
 * Without a connection the compositor is treated as always connected.
 */

import type { HealthReporter } from "../lib/health";
import { defaultLogger, type ILogger } from "../lib/logger";
import { abortableSleep, backoffDelay, RECONNECT_BACKOFF, type BackoffPolicy } from "../lib/retry";
import type { CompositionSurface } from "../playback/playbackEngine";
import type { CompositorConnection } from "./types";

export const COMPOSITOR_COMPONENT = "compositor";

const DEFAULT_HEALTH_CHECK_INTERVAL_MS = 60000;
const DEFAULT_MAX_RECONNECT_ATTEMPTS = 10;

export type SupervisorOptions = {
  surface: Pick<CompositionSurface, "ensureReady">;
  connection?: CompositorConnection;
  health: HealthReporter;
  healthCheckIntervalMs?: number;
  /** Reconnection gives up after this many failed attempts; the initial connect never does */
  maxReconnectAttempts?: number;
  backoff?: BackoffPolicy;
  random?: () => number;
  logger?: ILogger;
};

export class CompositorSupervisor {
  private readonly logger: ILogger;
  private readonly intervalMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly backoff: BackoffPolicy;
  private readonly random: () => number;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private unsubscribe: (() => void) | null = null;
  private wakeUp: (() => void) | null = null;

  constructor(private readonly options: SupervisorOptions) {
    this.logger = (options.logger || defaultLogger).child({ component: "supervisor" });
    this.intervalMs = options.healthCheckIntervalMs ?? DEFAULT_HEALTH_CHECK_INTERVAL_MS;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? DEFAULT_MAX_RECONNECT_ATTEMPTS;
    this.backoff = options.backoff ?? RECONNECT_BACKOFF;
    this.random = options.random ?? Math.random;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.unsubscribe = this.options.connection?.onDisconnected((reason) => this.handleDisconnect(reason)) ?? null;
    this.loop = this.run(controller.signal);
    this.logger.info("Compositor supervision started", { healthCheckIntervalMs: this.intervalMs });
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.controller?.abort();
    this.unsubscribe?.();
    await loop;

    this.controller = null;
    this.unsubscribe = null;
    this.loop = null;
    this.logger.info("Compositor supervision stopped");
  }

  private get connected(): boolean {
    return this.options.connection?.connected ?? true;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      if (!(await this.connectInitially(signal))) return;

      while (!signal.aborted) {
        if (!this.connected) {
          if (!(await this.reconnect(signal))) return;
          continue;
        }

        await this.waitForCheck(signal);
        if (signal.aborted) return;
        if (this.connected) await this.verify("health_check");
      }
    } catch (error) {
      this.logger.error("Compositor supervision failed", error);
      this.options.health.report(COMPOSITOR_COMPONENT, "unhealthy", "Supervision stopped");
    }
  }

  private async connectInitially(signal: AbortSignal): Promise<boolean> {
    for (let attempt = 1; !signal.aborted; attempt++) {
      if (await this.attemptConnect()) {
        this.logger.info("Compositor connected", { attempts: attempt });
        this.options.health.report(COMPOSITOR_COMPONENT, "healthy");
        await this.verify("connect");
        return true;
      }

      const delayMs = backoffDelay(attempt, this.backoff, this.random);
      this.logger.warn("Initial compositor connection failed", { attempt, delayMs });
      this.options.health.report(COMPOSITOR_COMPONENT, "unhealthy", "Connection failed");
      if (!(await abortableSleep(delayMs, signal))) return false;
    }
    return false;
  }

  private async reconnect(signal: AbortSignal): Promise<boolean> {
    for (let attempt = 1; attempt <= this.maxReconnectAttempts; attempt++) {
      const delayMs = backoffDelay(attempt, this.backoff, this.random);
      this.logger.info("Reconnection attempt scheduled", { attempt, maxAttempts: this.maxReconnectAttempts, delayMs });
      if (!(await abortableSleep(delayMs, signal))) return false;

      if (await this.attemptConnect()) {
        this.logger.info("Compositor reconnected", { attempt });
        this.options.health.report(COMPOSITOR_COMPONENT, "healthy");
        this.options.health.recordRepair(COMPOSITOR_COMPONENT, "Reconnected");
        await this.verify("reconnect");
        return true;
      }
    }

    this.logger.error("Max reconnection attempts reached", undefined, { maxAttempts: this.maxReconnectAttempts });
    this.options.health.report(COMPOSITOR_COMPONENT, "unhealthy", "Max reconnection attempts reached");
    return false;
  }

  private async attemptConnect(): Promise<boolean> {
    const { connection } = this.options;
    if (!connection || connection.connected) return true;
    return connection.tryConnect();
  }

  /**
   * ensureReady() both detects and repairs drift in the scene
   */
  private async verify(trigger: string): Promise<void> {
    const previous = this.options.health.get(COMPOSITOR_COMPONENT)?.status;

    let failure: string | undefined;
    try {
      if (await this.options.surface.ensureReady()) {
        if (previous === "degraded") {
          this.logger.info("Composition surface repaired", { trigger });
          this.options.health.recordRepair(COMPOSITOR_COMPONENT, "Composition surface repaired");
        }
        this.options.health.report(COMPOSITOR_COMPONENT, "healthy");
        return;
      }
      failure = "Composition surface not ready";
    } catch (error) {
      failure = error instanceof Error ? error.message : String(error);
    }

    this.logger.warn("Composition surface check failed", { trigger, error: failure });
    this.options.health.report(COMPOSITOR_COMPONENT, "degraded", failure);
  }

  private handleDisconnect(reason: string): void {
    this.logger.warn("Compositor disconnected, reconnecting", { reason });
    this.options.health.report(COMPOSITOR_COMPONENT, "unhealthy", "Connection lost");
    this.options.health.recordRepair(COMPOSITOR_COMPONENT, "Reconnection started");
    this.wakeUp?.();
  }

  /**
   * Resolves after one interval, on a disconnect, or on stop
   */
  private waitForCheck(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener("abort", done);
        this.wakeUp = null;
        resolve();
      };
      const timer = setTimeout(done, this.intervalMs);
      this.wakeUp = done;
      signal.addEventListener("abort", done, { once: true });
    });
  }
}
