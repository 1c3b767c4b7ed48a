export type { ClipDescriptor, SearchFilter, NotFoundReason, ResolveOutcome } from "./domain/clip";
export type { CacheEntry } from "./domain/cache";
export type { PlaybackState, PlaybackStatus, PlaybackOutcome } from "./domain/playback";
export type { ApprovalDecision, ApprovalRequest } from "./domain/approval";
export type { ClipDefaults, ChatRole, Requester } from "./domain/settings";
