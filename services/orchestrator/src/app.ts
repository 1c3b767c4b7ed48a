/**
 * Composition root: builds every component from configuration and wires them.
 * Upstream capabilities can be replaced, which is how the tests run the whole
 * service in process.
 */

import type { AppConfig } from "./lib/config";
import { HealthReporter } from "./lib/health";
import { createServiceLogger, withTiming, type ILogger } from "./lib/logger";
import { ClipCache, ClipResolver, type CatalogApi } from "./resolver";
import { createTwitchCatalog } from "./twitch";
import {
  CLIP_SCENE_NAME,
  CompositorSupervisor,
  SceneCompositionAdapter,
  type CompositorApi,
  type CompositorConnection,
} from "./obs";
import { ApprovalGate } from "./playback/approvalGate";
import { PlaybackEngine } from "./playback/playbackEngine";
import { createLastClipStore, type LastClipStore } from "./state/lastClipStore";
import { EmbedServer } from "./server/embedServer";
import { createApiRouter } from "./server/apiRoutes";
import {
  CompositorWarningDismisser,
  ContentWarningHandler,
  type ContentWarningDismisser,
} from "./automation/contentWarning";
import { ClipCommandService } from "./commands/clipCommands";
import { LoggingNotifier, type ChatNotifier } from "./commands/notifier";

export type ApplicationDependencies = {
  compositor: CompositorApi;
  /** Supervised with reconnects when present; absent means always connected */
  connection?: CompositorConnection;
  catalog?: CatalogApi;
  lastClip?: LastClipStore;
  notifier?: ChatNotifier;
  /** null disables content-warning automation */
  dismisser?: ContentWarningDismisser | null;
  logger?: ILogger;
  nonce?: () => string;
  random?: () => number;
  now?: () => number;
  approvalPollIntervalMs?: number;
};

export type Application = {
  readonly logger: ILogger;
  readonly cache: ClipCache;
  readonly resolver: ClipResolver;
  readonly approvals: ApprovalGate;
  readonly lastClip: LastClipStore;
  readonly surface: SceneCompositionAdapter;
  readonly health: HealthReporter;
  readonly supervisor: CompositorSupervisor;
  readonly server: EmbedServer;
  readonly engine: PlaybackEngine;
  readonly commands: ClipCommandService;
  start(): Promise<number>;
  shutdown(): Promise<void>;
};

export function createApplication(config: AppConfig, deps: ApplicationDependencies): Application {
  const logger = deps.logger ?? createServiceLogger({ minLevel: config.logLevel });
  const notifier = deps.notifier ?? new LoggingNotifier(logger);

  const catalog = deps.catalog ?? createTwitchCatalog(config.twitch, logger);
  const cache = new ClipCache({ expirationMs: config.clips.cacheExpirationMs, now: deps.now });
  const resolver = new ClipResolver(catalog, cache, { logger, random: deps.random, now: deps.now });

  const approvals = new ApprovalGate({
    notifier,
    logger,
    now: deps.now,
    pollIntervalMs: deps.approvalPollIntervalMs,
  });
  const lastClip = deps.lastClip ?? createLastClipStore(config.state, logger);
  const surface = new SceneCompositionAdapter(deps.compositor, { logger });

  const health = new HealthReporter(deps.now);
  const supervisor = new CompositorSupervisor({
    surface,
    connection: deps.connection,
    health,
    healthCheckIntervalMs: config.supervision.healthCheckIntervalMs,
    maxReconnectAttempts: config.supervision.maxReconnectAttempts,
    random: deps.random,
    logger,
  });

  const server = new EmbedServer({
    host: config.http.host,
    preferredPort: config.http.preferredPort,
    portRange: config.http.portRange,
    games: catalog,
    logger,
    nonce: deps.nonce,
  });

  const engine = new PlaybackEngine({
    surface,
    host: server,
    lastClip,
    resolver,
    approvals,
    cooldownMs: config.playback.cooldownMs,
    logger,
  });

  const dismisser =
    deps.dismisser === undefined
      ? new CompositorWarningDismisser(deps.compositor, CLIP_SCENE_NAME, surface.sourceName, logger)
      : deps.dismisser;

  server.mountApi(
    createApiRouter({
      engine,
      resolver,
      lastClip,
      approvals,
      cache,
      contentWarnings: new ContentWarningHandler(dismisser, logger),
      health,
      logger,
    })
  );

  const commands = new ClipCommandService(resolver, engine, approvals, {
    defaults: config.clips.defaults,
    requireApproval: config.clips.requireApproval,
    shoutout: config.shoutout,
    games: catalog,
    notifier,
    logger,
  });

  return {
    logger,
    cache,
    resolver,
    approvals,
    lastClip,
    surface,
    health,
    supervisor,
    server,
    engine,
    commands,

    async start() {
      const port = await withTiming(logger, "embed_server_start", () => server.start());
      // Connects and prepares the surface in the background; every play re-verifies it.
      supervisor.start();
      return port;
    },

    async shutdown() {
      await supervisor.stop();
      await engine.shutdown();
      await server.stop();
      logger.info("Shutdown complete");
    },
  };
}
