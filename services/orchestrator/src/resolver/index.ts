export { ClipResolver, extractClipId, matchesFilter, candidateWindows, type ClipResolverOptions } from "./clipResolver";
export { ClipCache, DEFAULT_CACHE_EXPIRATION_MS, type ClipCacheOptions } from "./clipCache";
export { tokenize, scoreTitle } from "./titleMatch";
export type { CatalogApi, ClipListQuery, ClipPage } from "./types";
