/**
 * Well-known names and defaults for the clip composition surface
 */

export const CLIP_SCENE_NAME = "Clipcast";
export const PLAYER_SOURCE_NAME = "Clipcast Player";

export const BLANK_URL = "about:blank";
export const BROWSER_SOURCE_KIND = "browser_source";
export const REFRESH_PROPERTY = "refreshnocache";

export const DEFAULT_WIDTH = 1920;
export const DEFAULT_HEIGHT = 1080;

export type BrowserSourceSettings = {
  url: string;
  width: number;
  height: number;
  fps: number;
  fps_custom: boolean;
  reroute_audio: boolean;
  restart_when_active: boolean;
  shutdown: boolean;
  webpage_control_level: number;
};

export const DEFAULT_BROWSER_SETTINGS: BrowserSourceSettings = {
  url: BLANK_URL,
  width: DEFAULT_WIDTH,
  height: DEFAULT_HEIGHT,
  fps: 60,
  fps_custom: true,
  reroute_audio: true,
  restart_when_active: true,
  shutdown: true,
  webpage_control_level: 2,
};

export type AudioFilterSpec = {
  name: string;
  kind: string;
  settings: Record<string, number | string | boolean>;
};

export const MONITOR_AND_OUTPUT = "OBS_MONITORING_TYPE_MONITOR_AND_OUTPUT";
export const PLAYER_VOLUME_DB = -12;
export const VOLUME_TOLERANCE_DB = 0.1;

export const AUDIO_FILTERS: readonly AudioFilterSpec[] = [
  { name: "Clipcast Gain", kind: "gain_filter", settings: { db: 3 } },
  {
    name: "Clipcast Compressor",
    kind: "compressor_filter",
    settings: {
      attack_time: 69,
      output_gain: 0,
      ratio: 4,
      release_time: 120,
      sidechain_source: "Mic/Aux",
      threshold: -28,
    },
  },
];

export const CREATE_ATTEMPTS = 3;
export const CREATE_RETRY_DELAY_MS = 1000;
