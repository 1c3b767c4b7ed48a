/**
 * Helix response schemas
 */

import { z } from "zod";

export const HelixClipSchema = z.object({
  id: z.string(),
  url: z.string(),
  embed_url: z.string().optional(),
  broadcaster_id: z.string(),
  broadcaster_name: z.string(),
  creator_id: z.string().optional(),
  creator_name: z.string(),
  video_id: z.string().optional(),
  game_id: z.string(),
  language: z.string().optional(),
  title: z.string(),
  view_count: z.number().optional(),
  created_at: z.string(),
  thumbnail_url: z.string(),
  duration: z.number(),
  vod_offset: z.number().nullable().optional(),
  is_featured: z.boolean().optional(),
});

export const PaginationSchema = z
  .object({
    cursor: z.string().optional(),
  })
  .optional();

export const HelixClipsResponseSchema = z.object({
  data: z.array(HelixClipSchema),
  pagination: PaginationSchema,
});

export const HelixUserSchema = z.object({
  id: z.string(),
  login: z.string(),
  display_name: z.string().optional(),
});

export const HelixUsersResponseSchema = z.object({
  data: z.array(HelixUserSchema),
});

export const HelixGameSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export const HelixGamesResponseSchema = z.object({
  data: z.array(HelixGameSchema),
});

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
});

export type HelixClip = z.infer<typeof HelixClipSchema>;
export type HelixClipsResponse = z.infer<typeof HelixClipsResponseSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
