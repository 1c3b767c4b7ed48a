/**
 * Embed Hosting Server
 *
 * Local HTTP listener serving the clip page the compositor renders, plus the
 * control/status API mounted under /api.
 */

import http from "http";
import express from "express";
import type { ClipDescriptor } from "@clipcast/shared";
import { HostingError } from "../lib/errors";
import { createNonce } from "../lib/ids";
import { defaultLogger, type ILogger } from "../lib/logger";
import type { ClipHost } from "../playback/playbackEngine";
import { asyncRoute, cors, errorHandler, NO_CACHE_HEADERS, notFound } from "./middleware";
import { contentSecurityPolicy, PAGE_CSS, renderBlankPage, renderClipPage } from "./pageTemplate";

export const DEFAULT_PORT = 8080;
export const DEFAULT_PORT_RANGE = 10;

export interface GameNameLookup {
  getGameName(gameId: string): Promise<string | null>;
}

export type EmbedServerOptions = {
  host?: string;
  preferredPort?: number;
  /** Number of ports tried, starting at preferredPort */
  portRange?: number;
  games?: GameNameLookup;
  logger?: ILogger;
  nonce?: () => string;
};

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
}

export class EmbedServer implements ClipHost {
  readonly app = express();
  private readonly api = express.Router();
  private server: http.Server | null = null;
  private boundPort: number | null = null;
  private clip: ClipDescriptor | null = null;

  private readonly bindHost: string;
  private readonly preferredPort: number;
  private readonly portRange: number;
  private readonly nonce: () => string;
  private readonly logger: ILogger;

  constructor(private readonly options: EmbedServerOptions = {}) {
    this.bindHost = options.host ?? "127.0.0.1";
    this.preferredPort = options.preferredPort ?? DEFAULT_PORT;
    this.portRange = options.portRange ?? DEFAULT_PORT_RANGE;
    this.nonce = options.nonce ?? (() => createNonce());
    this.logger = (options.logger || defaultLogger).child({ component: "embed-server" });

    this.app.disable("x-powered-by");
    this.app.use(cors());
    this.app.use(express.json({ limit: "16kb" }));

    this.app.get(["/", "/index.html"], asyncRoute(async (_req, res) => this.servePage(res)));
    this.app.get("/index.css", (_req, res) => {
      res.set(NO_CACHE_HEADERS).type("css").send(PAGE_CSS);
    });
    this.app.use("/api", this.api);

    this.app.use(notFound());
    this.app.use(errorHandler(this.logger));
  }

  get port(): number | null {
    return this.boundPort;
  }

  get pageUrl(): string {
    return `http://localhost:${this.boundPort ?? this.preferredPort}/`;
  }

  get activeClip(): ClipDescriptor | null {
    return this.clip;
  }

  get isListening(): boolean {
    return this.server !== null;
  }

  /**
   * Add API routes under /api. Must run before requests are served.
   */
  mountApi(router: express.Router): void {
    this.api.use(router);
  }

  host(clip: ClipDescriptor): void {
    this.clip = clip;
    this.logger.debug("Hosting clip", { clipId: clip.id });
  }

  clear(): void {
    this.clip = null;
  }

  /**
   * Bind the preferred port, falling back through the range on EADDRINUSE.
   * Other bind errors are fatal.
   */
  async start(): Promise<number> {
    if (this.server && this.boundPort !== null) return this.boundPort;

    for (let offset = 0; offset < this.portRange; offset++) {
      const candidate = this.preferredPort === 0 ? 0 : this.preferredPort + offset;
      try {
        const server = await this.listen(candidate);
        const address = server.address();
        this.server = server;
        this.boundPort = typeof address === "object" && address !== null ? address.port : candidate;
        this.logger.info("Embed server listening", { host: this.bindHost, port: this.boundPort, pageUrl: this.pageUrl });
        return this.boundPort;
      } catch (error) {
        if (errorCode(error) === "EADDRINUSE") {
          this.logger.warn("Port in use, trying next", { port: candidate });
          continue;
        }
        throw new HostingError(`Could not bind ${this.bindHost}:${candidate}`, { port: candidate }, error instanceof Error ? error : undefined);
      }
    }

    throw new HostingError("No free port in range", {
      preferredPort: this.preferredPort,
      portRange: this.portRange,
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    this.logger.info("Embed server stopped", { port: this.boundPort });
  }

  private listen(port: number): Promise<http.Server> {
    return new Promise((resolve, reject) => {
      const server = http.createServer(this.app);
      server.once("error", reject);
      server.listen(port, this.bindHost, () => {
        server.off("error", reject);
        server.on("error", (error) => this.onListenerFault(server, error));
        resolve(server);
      });
    });
  }

  // A faulted listener is dropped so the next start() binds again.
  private onListenerFault(server: http.Server, error: Error): void {
    this.logger.error("Embed server listener fault", error, { port: this.boundPort });
    if (this.server === server) {
      this.server = null;
      server.close();
    }
  }

  private async servePage(res: express.Response): Promise<void> {
    const nonce = this.nonce();
    res.set(NO_CACHE_HEADERS);
    res.set("Content-Security-Policy", contentSecurityPolicy(nonce));

    const clip = this.clip;
    if (!clip) {
      res.type("html").send(renderBlankPage());
      return;
    }

    const gameName = await this.lookupGameName(clip.gameId);
    res.type("html").send(renderClipPage({ clip, gameName, nonce }));
  }

  private async lookupGameName(gameId: string): Promise<string> {
    const games = this.options.games;
    if (!games || !gameId) return gameId;

    try {
      return (await games.getGameName(gameId)) ?? gameId;
    } catch (error) {
      this.logger.warn("Game name lookup failed, using id", { gameId, error: error instanceof Error ? error.message : String(error) });
      return gameId;
    }
  }
}
