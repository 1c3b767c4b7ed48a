import type { AudioFilterSpec, BrowserSourceSettings } from "./constants";

export type CompositorResult<T> = { ok: true; value: T } | { ok: false; error: string; code?: number };

/**
 * Compositor capability used by the scene adapter.
 * Implementations report failures as results and do not throw.
 */
export interface CompositorApi {
  getCurrentProgramScene(): Promise<CompositorResult<string>>;
  sceneExists(sceneName: string): Promise<CompositorResult<boolean>>;
  createScene(sceneName: string): Promise<CompositorResult<void>>;

  sourceExistsInScene(sceneName: string, sourceName: string): Promise<CompositorResult<boolean>>;
  createEmbeddableSource(
    sceneName: string,
    sourceName: string,
    settings: BrowserSourceSettings
  ): Promise<CompositorResult<void>>;
  /** Nest childScene as a source inside parentScene */
  addSceneAsSource(parentScene: string, childScene: string): Promise<CompositorResult<void>>;

  getSourceVisible(sceneName: string, sourceName: string): Promise<CompositorResult<boolean>>;
  setSourceVisible(sceneName: string, sourceName: string, visible: boolean): Promise<CompositorResult<void>>;

  getSourceUrl(sourceName: string): Promise<CompositorResult<string>>;
  setSourceUrl(sourceName: string, url: string): Promise<CompositorResult<void>>;
  /** Reload the page, bypassing the source's cache */
  refreshSource(sourceName: string): Promise<CompositorResult<void>>;

  getMonitorType(sourceName: string): Promise<CompositorResult<string>>;
  setMonitorType(sourceName: string, monitorType: string): Promise<CompositorResult<void>>;
  getVolumeDb(sourceName: string): Promise<CompositorResult<number>>;
  setVolumeDb(sourceName: string, volumeDb: number): Promise<CompositorResult<void>>;
  listAudioFilters(sourceName: string): Promise<CompositorResult<string[]>>;
  applyAudioFilter(sourceName: string, filter: AudioFilterSpec): Promise<CompositorResult<void>>;
}

/**
 * Connection lifecycle of a remote compositor
 */
export interface CompositorConnection {
  readonly connected: boolean;
  /** Single attempt; resolves false instead of throwing */
  tryConnect(): Promise<boolean>;
  /** Called when an established connection drops; returns an unsubscribe function */
  onDisconnected(listener: (reason: string) => void): () => void;
}
