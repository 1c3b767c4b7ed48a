/**
 * Compositor capability over obs-websocket (protocol v5)
 */

import OBSWebSocket from "obs-websocket-js";
import { z } from "zod";
import { defaultLogger, type ILogger } from "../lib/logger";
import { BROWSER_SOURCE_KIND, REFRESH_PROPERTY, type AudioFilterSpec, type BrowserSourceSettings } from "./constants";
import type { CompositorApi, CompositorConnection, CompositorResult } from "./types";

const SceneListSchema = z.object({
  scenes: z.array(z.object({ sceneName: z.string() })),
});

const CurrentProgramSceneSchema = z.object({
  currentProgramSceneName: z.string(),
});

const SceneItemListSchema = z.object({
  sceneItems: z.array(z.object({ sourceName: z.string() })),
});

const SceneItemIdSchema = z.object({ sceneItemId: z.number() });
const SceneItemEnabledSchema = z.object({ sceneItemEnabled: z.boolean() });

const InputSettingsSchema = z.object({
  inputSettings: z.object({ url: z.string().optional() }),
});

const MonitorTypeSchema = z.object({ monitorType: z.string() });
const VolumeSchema = z.object({ inputVolumeDb: z.number() });

const FilterListSchema = z.object({
  filters: z.array(z.object({ filterName: z.string() })),
});

export type ObsConnectionConfig = {
  url: string;
  password?: string;
  logger?: ILogger;
};

export class ObsWebSocketCompositor implements CompositorApi, CompositorConnection {
  private readonly obs = new OBSWebSocket();
  private readonly logger: ILogger;
  private readonly disconnectListeners = new Set<(reason: string) => void>();
  private isConnected = false;
  private closing = false;

  constructor(private readonly config: ObsConnectionConfig) {
    this.logger = (config.logger || defaultLogger).child({ component: "obs" });
    this.obs.on("ConnectionClosed", (error) => {
      const wasConnected = this.isConnected;
      this.isConnected = false;
      if (!wasConnected || this.closing) return;

      this.logger.warn("Compositor connection closed", { code: error.code, reason: error.message });
      for (const listener of this.disconnectListeners) listener(error.message);
    });
  }

  get connected(): boolean {
    return this.isConnected;
  }

  async tryConnect(): Promise<boolean> {
    this.closing = false;
    try {
      const { obsWebSocketVersion, negotiatedRpcVersion } = await this.obs.connect(this.config.url, this.config.password);
      this.isConnected = true;
      this.logger.info("Connected to compositor", { url: this.config.url, obsWebSocketVersion, negotiatedRpcVersion });
      return true;
    } catch (error) {
      this.logger.warn("Compositor connection failed", {
        url: this.config.url,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  onDisconnected(listener: (reason: string) => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  async disconnect(): Promise<void> {
    this.closing = true;
    await this.obs.disconnect();
  }

  getCurrentProgramScene(): Promise<CompositorResult<string>> {
    return this.run("GetCurrentProgramScene", async () => {
      const response = CurrentProgramSceneSchema.parse(await this.obs.call("GetCurrentProgramScene"));
      return response.currentProgramSceneName;
    });
  }

  sceneExists(sceneName: string): Promise<CompositorResult<boolean>> {
    return this.run("GetSceneList", async () => {
      const response = SceneListSchema.parse(await this.obs.call("GetSceneList"));
      return response.scenes.some((scene) => scene.sceneName === sceneName);
    });
  }

  createScene(sceneName: string): Promise<CompositorResult<void>> {
    return this.run("CreateScene", async () => {
      await this.obs.call("CreateScene", { sceneName });
    });
  }

  sourceExistsInScene(sceneName: string, sourceName: string): Promise<CompositorResult<boolean>> {
    return this.run("GetSceneItemList", async () => {
      const response = SceneItemListSchema.parse(await this.obs.call("GetSceneItemList", { sceneName }));
      return response.sceneItems.some((item) => item.sourceName === sourceName);
    });
  }

  createEmbeddableSource(
    sceneName: string,
    sourceName: string,
    settings: BrowserSourceSettings
  ): Promise<CompositorResult<void>> {
    return this.run("CreateInput", async () => {
      await this.obs.call("CreateInput", {
        sceneName,
        inputName: sourceName,
        inputKind: BROWSER_SOURCE_KIND,
        inputSettings: { ...settings },
        sceneItemEnabled: true,
      });
    });
  }

  addSceneAsSource(parentScene: string, childScene: string): Promise<CompositorResult<void>> {
    return this.run("CreateSceneItem", async () => {
      await this.obs.call("CreateSceneItem", {
        sceneName: parentScene,
        sourceName: childScene,
        sceneItemEnabled: true,
      });
    });
  }

  getSourceVisible(sceneName: string, sourceName: string): Promise<CompositorResult<boolean>> {
    return this.run("GetSceneItemEnabled", async () => {
      const sceneItemId = await this.sceneItemId(sceneName, sourceName);
      const response = SceneItemEnabledSchema.parse(
        await this.obs.call("GetSceneItemEnabled", { sceneName, sceneItemId })
      );
      return response.sceneItemEnabled;
    });
  }

  setSourceVisible(sceneName: string, sourceName: string, visible: boolean): Promise<CompositorResult<void>> {
    return this.run("SetSceneItemEnabled", async () => {
      const sceneItemId = await this.sceneItemId(sceneName, sourceName);
      await this.obs.call("SetSceneItemEnabled", { sceneName, sceneItemId, sceneItemEnabled: visible });
    });
  }

  getSourceUrl(sourceName: string): Promise<CompositorResult<string>> {
    return this.run("GetInputSettings", async () => {
      const response = InputSettingsSchema.parse(await this.obs.call("GetInputSettings", { inputName: sourceName }));
      return response.inputSettings.url ?? "";
    });
  }

  setSourceUrl(sourceName: string, url: string): Promise<CompositorResult<void>> {
    return this.run("SetInputSettings", async () => {
      await this.obs.call("SetInputSettings", { inputName: sourceName, inputSettings: { url }, overlay: true });
    });
  }

  refreshSource(sourceName: string): Promise<CompositorResult<void>> {
    return this.run("PressInputPropertiesButton", async () => {
      await this.obs.call("PressInputPropertiesButton", { inputName: sourceName, propertyName: REFRESH_PROPERTY });
    });
  }

  getMonitorType(sourceName: string): Promise<CompositorResult<string>> {
    return this.run("GetInputAudioMonitorType", async () => {
      const response = MonitorTypeSchema.parse(
        await this.obs.call("GetInputAudioMonitorType", { inputName: sourceName })
      );
      return response.monitorType;
    });
  }

  setMonitorType(sourceName: string, monitorType: string): Promise<CompositorResult<void>> {
    return this.run("SetInputAudioMonitorType", async () => {
      await this.obs.call("SetInputAudioMonitorType", { inputName: sourceName, monitorType });
    });
  }

  getVolumeDb(sourceName: string): Promise<CompositorResult<number>> {
    return this.run("GetInputVolume", async () => {
      const response = VolumeSchema.parse(await this.obs.call("GetInputVolume", { inputName: sourceName }));
      return response.inputVolumeDb;
    });
  }

  setVolumeDb(sourceName: string, volumeDb: number): Promise<CompositorResult<void>> {
    return this.run("SetInputVolume", async () => {
      await this.obs.call("SetInputVolume", { inputName: sourceName, inputVolumeDb: volumeDb });
    });
  }

  listAudioFilters(sourceName: string): Promise<CompositorResult<string[]>> {
    return this.run("GetSourceFilterList", async () => {
      const response = FilterListSchema.parse(await this.obs.call("GetSourceFilterList", { sourceName }));
      return response.filters.map((filter) => filter.filterName);
    });
  }

  applyAudioFilter(sourceName: string, filter: AudioFilterSpec): Promise<CompositorResult<void>> {
    return this.run("CreateSourceFilter", async () => {
      await this.obs.call("CreateSourceFilter", {
        sourceName,
        filterName: filter.name,
        filterKind: filter.kind,
        filterSettings: { ...filter.settings },
      });
    });
  }

  private async sceneItemId(sceneName: string, sourceName: string): Promise<number> {
    const response = SceneItemIdSchema.parse(await this.obs.call("GetSceneItemId", { sceneName, sourceName }));
    return response.sceneItemId;
  }

  private async run<T>(request: string, fn: () => Promise<T>): Promise<CompositorResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code = error instanceof Error && "code" in error && typeof error.code === "number" ? error.code : undefined;
      this.logger.debug("Compositor request failed", { request, code, error: message });
      return { ok: false, error: message, code };
    }
  }
}
