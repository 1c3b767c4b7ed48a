/**
 * Environment configuration
 */

import { z } from "zod";
import type { SearchFilter } from "@clipcast/shared";
import { ValidationError } from "./errors";
import type { LogLevel } from "./logger";

const DAY_MS = 24 * 60 * 60 * 1000;

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

export const DEFAULT_SHOUTOUT_TEMPLATE = "Check out {broadcaster}! They were last playing {game}! twitch.tv/{broadcaster}";

const optionalSecret = z.string().min(1).optional();

export const EnvSchema = z
  .object({
    CLIPCAST_HTTP_HOST: z.string().min(1).default("127.0.0.1"),
    CLIPCAST_HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    CLIPCAST_HTTP_PORT_RANGE: z.coerce.number().int().min(1).max(100).default(10),

    TWITCH_CLIENT_ID: z.string().min(1),
    TWITCH_CLIENT_SECRET: optionalSecret,
    TWITCH_ACCESS_TOKEN: optionalSecret,
    TWITCH_REFRESH_TOKEN: optionalSecret,
    TWITCH_API_BASE_URL: z.string().url().default("https://api.twitch.tv/helix"),
    TWITCH_AUTH_BASE_URL: z.string().url().default("https://id.twitch.tv/oauth2"),

    OBS_WEBSOCKET_URL: z.string().url().default("ws://127.0.0.1:4455"),
    OBS_WEBSOCKET_PASSWORD: optionalSecret,

    CLIP_CACHE_EXPIRATION_DAYS: z.coerce.number().positive().default(30),
    CLIP_DEFAULT_FEATURED_ONLY: booleanFlag.default("false"),
    CLIP_DEFAULT_MAX_DURATION_SECONDS: z.coerce.number().int().positive().default(30),
    CLIP_DEFAULT_MAX_AGE_DAYS: z.coerce.number().int().positive().default(30),
    CLIP_REQUIRE_APPROVAL: booleanFlag.default("true"),

    PLAYBACK_COOLDOWN_MS: z.coerce.number().int().min(0).default(2000),

    SHOUTOUT_MESSAGE_ENABLED: booleanFlag.default("true"),
    SHOUTOUT_MESSAGE_TEMPLATE: z.string().min(1).default(DEFAULT_SHOUTOUT_TEMPLATE),
    SHOUTOUT_FEATURED_FIRST: booleanFlag.default("true"),
    SHOUTOUT_MAX_CLIP_LENGTH_SECONDS: z.coerce.number().int().positive().default(60),
    SHOUTOUT_MAX_CLIP_AGE_DAYS: z.coerce.number().int().positive().default(30),

    COMPOSITOR_HEALTH_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(60000),
    COMPOSITOR_MAX_RECONNECT_ATTEMPTS: z.coerce.number().int().positive().default(10),

    STATE_BACKEND: z.enum(["file", "firestore"]).default("file"),
    STATE_FILE_PATH: z.string().min(1).default(".clipcast/state.json"),

    LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARNING", "ERROR"]).default("INFO"),
  })
  .superRefine((env, ctx) => {
    if (!env.TWITCH_ACCESS_TOKEN && !env.TWITCH_CLIENT_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TWITCH_ACCESS_TOKEN"],
        message: "either TWITCH_ACCESS_TOKEN or TWITCH_CLIENT_SECRET is required",
      });
    }
  });

export type AppConfig = {
  http: {
    host: string;
    preferredPort: number;
    portRange: number;
  };
  twitch: {
    clientId: string;
    clientSecret?: string;
    accessToken?: string;
    refreshToken?: string;
    apiBaseUrl: string;
    authBaseUrl: string;
  };
  obs: {
    url: string;
    password?: string;
  };
  clips: {
    cacheExpirationMs: number;
    defaults: SearchFilter;
    requireApproval: boolean;
  };
  playback: {
    cooldownMs: number;
  };
  shoutout: {
    /** Empty when the chat message is disabled */
    messageTemplate: string;
    filter: SearchFilter;
  };
  supervision: {
    healthCheckIntervalMs: number;
    maxReconnectAttempts: number;
  };
  state: {
    backend: "file" | "firestore";
    filePath: string;
  };
  logLevel: LogLevel;
};

/**
 * Parse and validate configuration from the environment.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError("Invalid configuration", { issues });
  }

  const e = parsed.data;
  return {
    http: {
      host: e.CLIPCAST_HTTP_HOST,
      preferredPort: e.CLIPCAST_HTTP_PORT,
      portRange: e.CLIPCAST_HTTP_PORT_RANGE,
    },
    twitch: {
      clientId: e.TWITCH_CLIENT_ID,
      clientSecret: e.TWITCH_CLIENT_SECRET,
      accessToken: e.TWITCH_ACCESS_TOKEN,
      refreshToken: e.TWITCH_REFRESH_TOKEN,
      apiBaseUrl: e.TWITCH_API_BASE_URL,
      authBaseUrl: e.TWITCH_AUTH_BASE_URL,
    },
    obs: {
      url: e.OBS_WEBSOCKET_URL,
      password: e.OBS_WEBSOCKET_PASSWORD,
    },
    clips: {
      cacheExpirationMs: e.CLIP_CACHE_EXPIRATION_DAYS * DAY_MS,
      defaults: {
        featuredOnly: e.CLIP_DEFAULT_FEATURED_ONLY,
        maxDurationSeconds: e.CLIP_DEFAULT_MAX_DURATION_SECONDS,
        maxAgeDays: e.CLIP_DEFAULT_MAX_AGE_DAYS,
      },
      requireApproval: e.CLIP_REQUIRE_APPROVAL,
    },
    playback: {
      cooldownMs: e.PLAYBACK_COOLDOWN_MS,
    },
    shoutout: {
      messageTemplate: e.SHOUTOUT_MESSAGE_ENABLED ? e.SHOUTOUT_MESSAGE_TEMPLATE : "",
      filter: {
        featuredOnly: e.SHOUTOUT_FEATURED_FIRST,
        maxDurationSeconds: e.SHOUTOUT_MAX_CLIP_LENGTH_SECONDS,
        maxAgeDays: e.SHOUTOUT_MAX_CLIP_AGE_DAYS,
      },
    },
    supervision: {
      healthCheckIntervalMs: e.COMPOSITOR_HEALTH_CHECK_INTERVAL_MS,
      maxReconnectAttempts: e.COMPOSITOR_MAX_RECONNECT_ATTEMPTS,
    },
    state: {
      backend: e.STATE_BACKEND,
      filePath: e.STATE_FILE_PATH,
    },
    logLevel: e.LOG_LEVEL,
  };
}
