/**
 * User-facing chat notices
 */

export const Messages = {
  NO_CLIP_FOUND: "No matching clip was found. Please refine your search.",
  UNABLE_TO_RETRIEVE_CLIP: "Unable to retrieve clip data. Please try again with a valid URL.",
  UNABLE_TO_RESOLVE_CHANNEL: "Unable to resolve channel by username. Please try again with a valid username or URL.",
  PROVIDE_SEARCH_TERM: "Please provide a valid search term to find a clip.",
  NO_CLIP_FOR_REPLAY: "No clip available for replay.",
  PLAYBACK_UNAVAILABLE: "The clip player isn't ready right now. Please try again later.",
  UPSTREAM_UNAVAILABLE: "Clip lookups are failing right now. Please try again later.",
  APPROVAL_WAIT: "I'll wait a minute for a mod to approve or deny this clip, starting now.",
  APPROVAL_TIMEOUT: "Time's up! The clip wasn't approved, maybe next time!",
  APPROVAL_DENIED: "The clip wasn't approved.",
  APPROVAL_SUCCESS: "The clip has been approved!",
  PROVIDE_SHOUTOUT_TARGET: "Please provide a channel to shout out.",
} as const;

export function approvalPrompt(clipUrl: string, approvalId: string): string {
  return `Did you mean this clip? ${clipUrl} (mods: !approve ${approvalId} or !deny ${approvalId})`;
}

export function nowPlaying(title: string, creatorName: string): string {
  return `Now playing: ${title} (clipped by ${creatorName})`;
}

export function shoutoutNoClips(channel: string): string {
  return `No clips found for @${channel}`;
}

/**
 * Fill {broadcaster}, {channel} (same value) and {game} in a shoutout template
 */
export function formatShoutout(template: string, values: { broadcaster: string; game: string }): string {
  return template.replace(/\{(broadcaster|channel|game)\}/g, (_match, key: string) =>
    key === "game" ? values.game : values.broadcaster
  );
}
