/**
 * Clip commands
 *
 * Maps already-parsed chat commands onto the resolver and the playback
 * engine, and turns outcomes into chat notices.
 */

import type { ClipDefaults, ClipDescriptor, PlaybackOutcome, Requester, SearchFilter } from "@clipcast/shared";
import { DEFAULT_SHOUTOUT_TEMPLATE } from "../lib/config";
import { CompositionSurfaceUnreadyError, InvalidReferenceError, isUpstreamFailure } from "../lib/errors";
import { defaultLogger, type ILogger } from "../lib/logger";
import { parseApprovalReply, type ApprovalGate } from "../playback/approvalGate";
import type { PlaybackEngine } from "../playback/playbackEngine";
import type { ClipResolver } from "../resolver/clipResolver";
import type { GameNameLookup } from "../server/embedServer";
import { formatShoutout, Messages, nowPlaying, shoutoutNoClips } from "./messages";
import { LoggingNotifier, notifySafely, type ChatNotifier } from "./notifier";

export type ClipCommand =
  | { kind: "watch"; requester: Requester; url: string }
  | { kind: "random"; requester: Requester; channel: string; filter?: Partial<SearchFilter> }
  | { kind: "search"; requester: Requester; channel: string; query: string }
  | { kind: "shoutout"; requester: Requester; channel: string }
  | { kind: "replay"; requester: Requester }
  | { kind: "stop"; requester: Requester }
  | { kind: "approve"; requester: Requester; id?: string }
  | { kind: "deny"; requester: Requester; id?: string }
  | { kind: "reply"; requester: Requester; text: string };

export type CommandResult =
  | { kind: "playback"; outcome: PlaybackOutcome }
  | { kind: "stopped" }
  | { kind: "decided"; approvalId: string; approved: boolean }
  | { kind: "ignored"; reason: string }
  | { kind: "failed"; message: string };

export type ShoutoutSettings = {
  /** Empty sends the regular now-playing notice instead */
  messageTemplate: string;
  filter: SearchFilter;
};

export const DEFAULT_SHOUTOUT: ShoutoutSettings = {
  messageTemplate: DEFAULT_SHOUTOUT_TEMPLATE,
  filter: { featuredOnly: true, maxDurationSeconds: 60, maxAgeDays: 30 },
};

export type ClipCommandOptions = {
  defaults: ClipDefaults;
  /** Search results need a moderator's approval unless the requester is one */
  requireApproval: boolean;
  shoutout?: ShoutoutSettings;
  /** Game names for shoutout messages */
  games?: GameNameLookup;
  notifier?: ChatNotifier;
  logger?: ILogger;
};

export function isModerator(requester: Requester): boolean {
  return requester.roles.includes("broadcaster") || requester.roles.includes("moderator");
}

function notFoundMessage(reason: string): string {
  switch (reason) {
    case "upstream_miss":
      return Messages.UNABLE_TO_RETRIEVE_CLIP;
    case "unknown_channel":
      return Messages.UNABLE_TO_RESOLVE_CHANNEL;
    case "no_history":
      return Messages.NO_CLIP_FOR_REPLAY;
    default:
      return Messages.NO_CLIP_FOUND;
  }
}

type Announcements = {
  playing(clip: ClipDescriptor): Promise<string>;
  notFound(reason: string): string;
};

const DEFAULT_ANNOUNCEMENTS: Announcements = {
  playing: async (clip) => nowPlaying(clip.title, clip.creatorName),
  notFound: notFoundMessage,
};

export class ClipCommandService {
  private readonly notifier: ChatNotifier;
  private readonly logger: ILogger;

  constructor(
    private readonly resolver: ClipResolver,
    private readonly engine: PlaybackEngine,
    private readonly approvals: ApprovalGate,
    private readonly options: ClipCommandOptions
  ) {
    this.logger = (options.logger || defaultLogger).child({ component: "commands" });
    this.notifier = options.notifier ?? new LoggingNotifier(this.logger);
  }

  async execute(command: ClipCommand): Promise<CommandResult> {
    this.logger.info("Command received", { command: command.kind, requestedBy: command.requester.name });

    switch (command.kind) {
      case "watch": {
        const { url } = command;
        return this.playback(command, () => this.engine.enqueue(() => this.resolver.resolveByUrl(url)));
      }

      case "random": {
        const { channel } = command;
        const filter: SearchFilter = { ...this.options.defaults, ...command.filter };
        return this.playback(command, () => this.engine.enqueue(() => this.resolver.resolveRandom(channel, filter)));
      }

      case "search": {
        const { channel, query, requester } = command;
        if (!query.trim()) return this.fail(Messages.PROVIDE_SEARCH_TERM);
        const requireApproval = this.options.requireApproval && !isModerator(requester);
        return this.playback(command, () =>
          this.engine.enqueue(() => this.resolver.searchByTitle(channel, query), {
            requireApproval,
            requestedBy: requester.name,
          })
        );
      }

      case "shoutout": {
        if (!isModerator(command.requester)) return { kind: "ignored", reason: "not a moderator" };
        const target = command.channel.trim().replace(/^@/, "");
        if (!target) return this.fail(Messages.PROVIDE_SHOUTOUT_TARGET);

        const { filter, messageTemplate } = this.options.shoutout ?? DEFAULT_SHOUTOUT;
        return this.playback(command, () => this.engine.enqueue(() => this.resolver.resolveRandom(target, filter)), {
          playing: (clip) =>
            messageTemplate
              ? this.shoutoutMessage(messageTemplate, clip)
              : DEFAULT_ANNOUNCEMENTS.playing(clip),
          notFound: () => shoutoutNoClips(target),
        });
      }

      case "replay":
        return this.playback(command, () => this.engine.replay());

      case "stop":
        if (!isModerator(command.requester)) return { kind: "ignored", reason: "not a moderator" };
        await this.engine.stop("command");
        return { kind: "stopped" };

      case "approve":
      case "deny":
        return this.decide(command.requester, command.kind === "approve", command.id);

      case "reply": {
        const decision = parseApprovalReply(command.text);
        if (decision === null) return { kind: "ignored", reason: "not an approval reply" };
        return this.decide(command.requester, decision === "approved");
      }
    }
  }

  private decide(requester: Requester, approved: boolean, id?: string): CommandResult {
    if (!isModerator(requester)) return { kind: "ignored", reason: "not a moderator" };

    if (id !== undefined) {
      return this.approvals.decide(id, approved, requester.name)
        ? { kind: "decided", approvalId: id, approved }
        : { kind: "ignored", reason: "no pending request" };
    }

    const request = this.approvals.decideOldest(approved, requester.name);
    return request
      ? { kind: "decided", approvalId: request.id, approved }
      : { kind: "ignored", reason: "no pending request" };
  }

  private async playback(
    command: ClipCommand,
    start: () => Promise<PlaybackOutcome>,
    announce: Announcements = DEFAULT_ANNOUNCEMENTS
  ): Promise<CommandResult> {
    try {
      const outcome = await start();
      if (outcome.status === "playing") {
        await this.notify(await announce.playing(outcome.clip));
      } else if (outcome.status === "not_found") {
        await this.notify(announce.notFound(outcome.reason));
      }
      return { kind: "playback", outcome };
    } catch (error) {
      const message = this.failureMessage(command, error);
      if (message === null) throw error;
      return this.fail(message);
    }
  }

  private failureMessage(command: ClipCommand, error: unknown): string | null {
    if (error instanceof InvalidReferenceError) {
      return command.kind === "search" ? Messages.PROVIDE_SEARCH_TERM : Messages.UNABLE_TO_RETRIEVE_CLIP;
    }
    if (error instanceof CompositionSurfaceUnreadyError) {
      return Messages.PLAYBACK_UNAVAILABLE;
    }
    if (isUpstreamFailure(error)) {
      this.logger.error("Upstream failure during command", error, { command: command.kind });
      return Messages.UPSTREAM_UNAVAILABLE;
    }
    return null;
  }

  private async shoutoutMessage(template: string, clip: ClipDescriptor): Promise<string> {
    let game: string | null = null;
    if (clip.gameId && this.options.games) {
      try {
        game = await this.options.games.getGameName(clip.gameId);
      } catch (error) {
        this.logger.warn("Game lookup failed for shoutout", {
          gameId: clip.gameId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return formatShoutout(template, { broadcaster: clip.broadcasterName, game: game ?? "Unknown" });
  }

  private async fail(message: string): Promise<CommandResult> {
    await this.notify(message);
    return { kind: "failed", message };
  }

  private notify(message: string): Promise<void> {
    return notifySafely(this.notifier, message, this.logger);
  }
}
