import { z } from "zod";

// Token payloads (snake_case as returned by Trakt and as stored on disk)
export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number().positive(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  created_at: z.number().optional(),
});

export const storedTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.number(),
  expires_at: z.number(),
});

export const deviceCodeSchema = z.object({
  device_code: z.string().min(1),
  user_code: z.string().min(1),
  verification_url: z.string().min(1),
  expires_in: z.number().positive(),
  interval: z.number().positive().default(5),
});

// History payloads
export const traktIdsSchema = z.object({
  trakt: z.number().int(),
  slug: z.string().nullish(),
  imdb: z.string().nullish(),
  tmdb: z.number().nullish(),
  tvdb: z.number().nullish(),
});

const mediaSchema = z.object({
  title: z.string().nullish(),
  year: z.number().nullish(),
  ids: traktIdsSchema,
});

export const historyItemSchema = z.object({
  id: z.number().int(),
  watched_at: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid watched_at"),
  action: z.string().optional(),
  type: z.enum(["movie", "episode"]).optional(),
  progress: z.number().nullish(),
  movie: mediaSchema.optional(),
  show: mediaSchema.partial({ ids: true }).optional(),
  episode: mediaSchema
    .extend({ season: z.number().nullish(), number: z.number().nullish() })
    .optional(),
});

export const removeResponseSchema = z.object({
  deleted: z
    .object({ movies: z.number().optional(), episodes: z.number().optional() })
    .optional(),
  not_found: z
    .object({ ids: z.array(z.number()).optional() })
    .passthrough()
    .optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;
export type StoredToken = z.infer<typeof storedTokenSchema>;
export type DeviceCode = z.infer<typeof deviceCodeSchema>;
export type TraktHistoryItem = z.infer<typeof historyItemSchema>;
export type RemoveResponse = z.infer<typeof removeResponseSchema>;
