import type { SearchFilter } from "./clip";

/**
 * Defaults applied when a random request omits filter fields
 */
export type ClipDefaults = SearchFilter;

/**
 * Roles that may bypass or decide on clip approval
 */
export type ChatRole = "broadcaster" | "moderator" | "vip" | "subscriber" | "viewer";

export type Requester = {
  name: string;
  roles: ChatRole[];
};
