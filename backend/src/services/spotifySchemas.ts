import { z } from "zod";

/**
 * Spotify Web API response schemas.
 *
 * Each schema validates the snake_case wire payload and maps it onto the
 * camelCase model the rest of the backend works with. Unknown fields are
 * stripped.
 */

const imageSchema = z.object({
    url: z.string(),
    height: z.number().nullable().optional(),
    width: z.number().nullable().optional(),
});

const externalUrlsSchema = z.record(z.string()).default({});

export const artistSchema = z
    .object({
        id: z.string(),
        name: z.string(),
        genres: z.array(z.string()).default([]),
        popularity: z.number().int().default(0),
        images: z.array(imageSchema).default([]),
        external_urls: externalUrlsSchema,
    })
    .transform(({ external_urls, ...artist }) => ({
        ...artist,
        externalUrls: external_urls,
    }));

export const trackSchema = z
    .object({
        id: z.string(),
        name: z.string(),
        artists: z.array(artistSchema),
        album: z.object({
            id: z.string().optional(),
            name: z.string(),
            images: z.array(imageSchema).default([]),
        }),
        duration_ms: z.number().int().nonnegative(),
        popularity: z.number().int().default(0),
        external_urls: externalUrlsSchema,
    })
    .transform(({ duration_ms, external_urls, ...track }) => ({
        ...track,
        durationMs: duration_ms,
        externalUrls: external_urls,
    }));

export const audioFeaturesSchema = z.object({
    id: z.string(),
    danceability: z.number(),
    energy: z.number(),
    valence: z.number(),
    tempo: z.number(),
    acousticness: z.number(),
    instrumentalness: z.number(),
    liveness: z.number(),
    speechiness: z.number(),
});

export const recentTrackSchema = z
    .object({
        played_at: z.string(),
        track: trackSchema,
    })
    .transform(({ played_at, track }) => ({ playedAt: played_at, track }));

export const userSchema = z
    .object({
        id: z.string(),
        display_name: z.string().nullable().optional(),
        email: z.string().default(""),
        images: z.array(imageSchema).default([]),
        followers: z.object({ total: z.number().int() }).optional(),
    })
    .transform(({ display_name, followers, ...user }) => ({
        ...user,
        displayName: display_name ?? user.id,
        followers: followers?.total ?? 0,
    }));

export const tokenResponseSchema = z
    .object({
        access_token: z.string(),
        refresh_token: z.string().optional(),
        expires_in: z.number().int().default(3600),
        token_type: z.string().default("Bearer"),
    })
    .transform((token) => ({
        accessToken: token.access_token,
        refreshToken: token.refresh_token,
        expiresIn: token.expires_in,
        tokenType: token.token_type,
    }));

export const pagedArtistsSchema = z.object({ items: z.array(artistSchema).default([]) });
export const pagedTracksSchema = z.object({ items: z.array(trackSchema).default([]) });
export const recentlyPlayedSchema = z.object({ items: z.array(recentTrackSchema).default([]) });
export const audioFeaturesBatchSchema = z.object({
    audio_features: z.array(audioFeaturesSchema.nullable()).default([]),
});

export type Artist = z.output<typeof artistSchema>;
export type Track = z.output<typeof trackSchema>;
export type AudioFeatures = z.output<typeof audioFeaturesSchema>;
export type RecentTrack = z.output<typeof recentTrackSchema>;
export type SpotifyUser = z.output<typeof userSchema>;
export type SpotifyTokens = z.output<typeof tokenResponseSchema>;

export const TIME_RANGES = ["short_term", "medium_term", "long_term"] as const;
export type TimeRange = (typeof TIME_RANGES)[number];
