/**
 * Scene Composition Adapter
 *
 * Prepares and verifies the on-screen surface the clip page is rendered into.
 * Every step checks live compositor state first and only creates what is
 * missing, so ensureReady() is idempotent. Steps report false on failure and
 * never throw. Concurrent ensureReady() calls run one at a time.
 */

import { defaultLogger, type ILogger } from "../lib/logger";
import { Mutex } from "../lib/mutex";
import { sleep } from "../lib/retry";
import {
  AUDIO_FILTERS,
  BLANK_URL,
  CLIP_SCENE_NAME,
  CREATE_ATTEMPTS,
  CREATE_RETRY_DELAY_MS,
  DEFAULT_BROWSER_SETTINGS,
  MONITOR_AND_OUTPUT,
  PLAYER_SOURCE_NAME,
  PLAYER_VOLUME_DB,
  VOLUME_TOLERANCE_DB,
  type BrowserSourceSettings,
} from "./constants";
import type { CompositorApi, CompositorResult } from "./types";

export type SceneAdapterOptions = {
  logger?: ILogger;
  sceneName?: string;
  sourceName?: string;
  width?: number;
  height?: number;
  attempts?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

type EnsureResult = "existing" | "created" | "failed";

function withinTolerance(volumeDb: number): boolean {
  return Math.abs(volumeDb - PLAYER_VOLUME_DB) <= VOLUME_TOLERANCE_DB;
}

export class SceneCompositionAdapter {
  readonly sceneName: string;
  readonly sourceName: string;
  private readonly settings: BrowserSourceSettings;
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: ILogger;
  private readonly preparing = new Mutex();

  constructor(
    private readonly compositor: CompositorApi,
    options: SceneAdapterOptions = {}
  ) {
    this.sceneName = options.sceneName ?? CLIP_SCENE_NAME;
    this.sourceName = options.sourceName ?? PLAYER_SOURCE_NAME;
    this.settings = {
      ...DEFAULT_BROWSER_SETTINGS,
      width: options.width ?? DEFAULT_BROWSER_SETTINGS.width,
      height: options.height ?? DEFAULT_BROWSER_SETTINGS.height,
    };
    this.attempts = options.attempts ?? CREATE_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? CREATE_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? sleep;
    this.logger = (options.logger || defaultLogger).child({ component: "scene-adapter" });
  }

  /**
   * Ensure clip scene, player source with its audio chain, and the scene's
   * attachment to the active program scene, in that order. The audio chain
   * is verified and repaired on every call.
   */
  ensureReady(): Promise<boolean> {
    return this.preparing.runExclusive(async () => {
      try {
        const scene = await this.ensure(
          "clip_scene",
          () => this.compositor.sceneExists(this.sceneName),
          () => this.compositor.createScene(this.sceneName)
        );
        if (scene === "failed") return false;

        const source = await this.ensure(
          "player_source",
          () => this.compositor.sourceExistsInScene(this.sceneName, this.sourceName),
          () => this.compositor.createEmbeddableSource(this.sceneName, this.sourceName, this.settings)
        );
        if (source === "failed") return false;
        if (!(await this.ensureAudioChain())) return false;

        const active = await this.activeScene();
        if (active === null) return false;
        if (active === this.sceneName) return true;

        const attached = await this.ensure(
          "scene_attachment",
          () => this.compositor.sourceExistsInScene(active, this.sceneName),
          () => this.compositor.addSceneAsSource(active, this.sceneName)
        );
        return attached !== "failed";
      } catch (error) {
        this.logger.error("Surface preparation failed", error, { operation: "ensureReady" });
        return false;
      }
    });
  }

  async show(): Promise<boolean> {
    return this.setVisibility(true);
  }

  async hide(): Promise<boolean> {
    return this.setVisibility(false);
  }

  /**
   * Point the player at url, reload it, and verify the stored setting
   */
  async setUrl(url: string): Promise<boolean> {
    try {
      const set = await this.compositor.setSourceUrl(this.sourceName, url);
      if (!this.check(set, "set_url", { url })) return false;

      const refreshed = await this.compositor.refreshSource(this.sourceName);
      if (!this.check(refreshed, "refresh_source", { url })) return false;

      const readBack = await this.compositor.getSourceUrl(this.sourceName);
      if (!this.check(readBack, "read_url", { url })) return false;
      if (readBack.value !== url) {
        this.logger.error("Source URL read-back mismatch", undefined, {
          operation: "setUrl",
          expected: url,
          actual: readBack.value,
        });
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error("Setting source URL failed", error, { operation: "setUrl", url });
      return false;
    }
  }

  /**
   * Hide the surface and reset the player to a blank page
   */
  async reset(): Promise<boolean> {
    const hidden = await this.hide();
    const blanked = await this.setUrl(BLANK_URL);
    return hidden && blanked;
  }

  private async setVisibility(visible: boolean): Promise<boolean> {
    const operation = visible ? "show" : "hide";
    try {
      if (!(await this.toggle(this.sceneName, this.sourceName, visible, operation))) return false;

      const active = await this.activeScene();
      if (active === null) return false;
      if (active === this.sceneName) return true;

      return await this.toggle(active, this.sceneName, visible, operation);
    } catch (error) {
      this.logger.error("Visibility change failed", error, { operation });
      return false;
    }
  }

  private async toggle(sceneName: string, sourceName: string, visible: boolean, operation: string): Promise<boolean> {
    const set = await this.compositor.setSourceVisible(sceneName, sourceName, visible);
    if (!this.check(set, operation, { sceneName, sourceName })) return false;

    const readBack = await this.compositor.getSourceVisible(sceneName, sourceName);
    if (!this.check(readBack, operation, { sceneName, sourceName })) return false;
    if (readBack.value !== visible) {
      this.logger.error("Visibility read-back mismatch", undefined, { operation, sceneName, sourceName, visible });
      return false;
    }
    return true;
  }

  private async ensureAudioChain(): Promise<boolean> {
    const monitor = await this.compositor.getMonitorType(this.sourceName);
    if (!this.check(monitor, "audio_monitor")) return false;
    if (monitor.value !== MONITOR_AND_OUTPUT) {
      const set = await this.compositor.setMonitorType(this.sourceName, MONITOR_AND_OUTPUT);
      if (!this.check(set, "audio_monitor")) return false;
      const readBack = await this.compositor.getMonitorType(this.sourceName);
      if (!this.check(readBack, "audio_monitor")) return false;
      if (readBack.value !== MONITOR_AND_OUTPUT) {
        this.logger.error("Monitor type read-back mismatch", undefined, { actual: readBack.value });
        return false;
      }
      this.logger.info("Audio monitor type set", { sourceName: this.sourceName, previous: monitor.value });
    }

    const volume = await this.compositor.getVolumeDb(this.sourceName);
    if (!this.check(volume, "audio_volume")) return false;
    if (!withinTolerance(volume.value)) {
      const set = await this.compositor.setVolumeDb(this.sourceName, PLAYER_VOLUME_DB);
      if (!this.check(set, "audio_volume")) return false;
      const readBack = await this.compositor.getVolumeDb(this.sourceName);
      if (!this.check(readBack, "audio_volume")) return false;
      if (!withinTolerance(readBack.value)) {
        this.logger.error("Volume read-back mismatch", undefined, { expected: PLAYER_VOLUME_DB, actual: readBack.value });
        return false;
      }
      this.logger.info("Player volume set", { sourceName: this.sourceName, previous: volume.value });
    }

    for (const filter of AUDIO_FILTERS) {
      const result = await this.ensure(
        `audio_filter:${filter.name}`,
        async () => {
          const filters = await this.compositor.listAudioFilters(this.sourceName);
          return filters.ok ? { ok: true, value: filters.value.includes(filter.name) } : filters;
        },
        () => this.compositor.applyAudioFilter(this.sourceName, filter)
      );
      if (result === "failed") return false;
    }
    return true;
  }

  private async activeScene(): Promise<string | null> {
    const active = await this.compositor.getCurrentProgramScene();
    return this.check(active, "active_scene") ? active.value : null;
  }

  /**
   * Check, then create and read back up to `attempts` times
   */
  private async ensure(
    step: string,
    exists: () => Promise<CompositorResult<boolean>>,
    create: () => Promise<CompositorResult<void>>
  ): Promise<EnsureResult> {
    const initial = await exists();
    if (!this.check(initial, step)) return "failed";
    if (initial.value) return "existing";

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      const created = await create();
      if (!created.ok) {
        this.logger.warn("Create attempt failed", { step, attempt, error: created.error, code: created.code });
      }

      const verified = await exists();
      if (verified.ok && verified.value) {
        this.logger.info("Surface element created", { step, attempt });
        return "created";
      }

      if (attempt < this.attempts) {
        await this.sleep(this.retryDelayMs);
      }
    }

    this.logger.error("Surface element could not be created", undefined, { step, attempts: this.attempts });
    return "failed";
  }

  private check<T>(
    result: CompositorResult<T>,
    step: string,
    extra?: Record<string, unknown>
  ): result is { ok: true; value: T } {
    if (result.ok) return true;
    this.logger.error("Compositor request failed", undefined, { step, error: result.error, code: result.code, ...extra });
    return false;
  }
}
