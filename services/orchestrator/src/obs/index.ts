export { SceneCompositionAdapter, type SceneAdapterOptions } from "./sceneAdapter";
export { ObsWebSocketCompositor, type ObsConnectionConfig } from "./obsWebSocketCompositor";
export { CompositorSupervisor, COMPOSITOR_COMPONENT, type SupervisorOptions } from "./compositorSupervisor";
export type { CompositorApi, CompositorConnection, CompositorResult } from "./types";
export * from "./constants";
