import axios from "axios";
import type { z } from "zod";
import { config, type AppConfig } from "../config";
import { logger } from "../utils/logger";
import { wrapSpotifyError } from "../utils/errors";
import {
    DEFAULT_RESPONSE_TTL_SECONDS,
    ResponseCache,
    responseCache,
} from "./responseCache";
import {
    audioFeaturesBatchSchema,
    pagedArtistsSchema,
    pagedTracksSchema,
    recentlyPlayedSchema,
    tokenResponseSchema,
    userSchema,
    type Artist,
    type AudioFeatures,
    type RecentTrack,
    type SpotifyTokens,
    type SpotifyUser,
    type TimeRange,
    type Track,
} from "./spotifySchemas";

/**
 * Spotify Service
 *
 * Authorization-code OAuth plus the read endpoints the stats and personality
 * views need. Every call acts on behalf of the user whose access token is
 * passed in; reads are cached for a few minutes per token.
 */

export const SPOTIFY_SCOPES = [
    "user-top-read",
    "user-read-recently-played",
    "user-read-private",
    "user-read-email",
] as const;

// The audio-features endpoint accepts at most 100 ids per request
export const AUDIO_FEATURES_BATCH_SIZE = 100;

const REQUEST_TIMEOUT_MS = 10_000;

export interface TopItemsOptions {
    timeRange?: TimeRange;
    limit?: number;
}

export class SpotifyService {
    constructor(
        private readonly settings: AppConfig["spotify"] = config.spotify,
        private readonly cache: ResponseCache = responseCache,
    ) {}

    getAuthUrl(state?: string): string {
        const params = new URLSearchParams({
            client_id: this.settings.clientId,
            response_type: "code",
            redirect_uri: this.settings.redirectUri,
            scope: SPOTIFY_SCOPES.join(" "),
            show_dialog: "true",
        });
        if (state) {
            params.set("state", state);
        }
        return `${this.settings.authorizeUrl}?${params.toString()}`;
    }

    async exchangeCodeForTokens(code: string): Promise<SpotifyTokens> {
        return this.requestTokens(
            {
                grant_type: "authorization_code",
                code,
                redirect_uri: this.settings.redirectUri,
            },
            "authorization code exchange"
        );
    }

    async refreshAccessToken(refreshToken: string): Promise<SpotifyTokens> {
        return this.requestTokens(
            {
                grant_type: "refresh_token",
                refresh_token: refreshToken,
            },
            "token refresh"
        );
    }

    async getUserProfile(accessToken: string): Promise<SpotifyUser> {
        return this.get("me", accessToken, {}, userSchema);
    }

    async getTopArtists(
        accessToken: string,
        { timeRange = "medium_term", limit = 20 }: TopItemsOptions = {}
    ): Promise<Artist[]> {
        const page = await this.get(
            "me/top/artists",
            accessToken,
            { time_range: timeRange, limit },
            pagedArtistsSchema
        );
        return page.items;
    }

    async getTopTracks(
        accessToken: string,
        { timeRange = "medium_term", limit = 20 }: TopItemsOptions = {}
    ): Promise<Track[]> {
        const page = await this.get(
            "me/top/tracks",
            accessToken,
            { time_range: timeRange, limit },
            pagedTracksSchema
        );
        return page.items;
    }

    async getRecentlyPlayed(accessToken: string, limit: number = 50): Promise<RecentTrack[]> {
        const page = await this.get(
            "me/player/recently-played",
            accessToken,
            { limit },
            recentlyPlayedSchema
        );
        return page.items;
    }

    /**
     * Audio features for the given tracks, in request order. Tracks Spotify
     * has no analysis for come back as null and are skipped.
     */
    async getAudioFeatures(accessToken: string, trackIds: string[]): Promise<AudioFeatures[]> {
        if (trackIds.length === 0) {
            return [];
        }

        const features: AudioFeatures[] = [];
        for (let start = 0; start < trackIds.length; start += AUDIO_FEATURES_BATCH_SIZE) {
            const batch = trackIds.slice(start, start + AUDIO_FEATURES_BATCH_SIZE);
            const response = await this.get(
                "audio-features",
                accessToken,
                { ids: batch.join(",") },
                audioFeaturesBatchSchema
            );

            for (const feature of response.audio_features) {
                if (feature) {
                    features.push(feature);
                }
            }
        }

        if (features.length < trackIds.length) {
            logger.debug(
                `Spotify: ${trackIds.length - features.length} of ${trackIds.length} tracks have no audio features`
            );
        }
        return features;
    }

    private async requestTokens(
        form: Record<string, string>,
        context: string
    ): Promise<SpotifyTokens> {
        const credentials = Buffer.from(
            `${this.settings.clientId}:${this.settings.clientSecret}`
        ).toString("base64");

        try {
            const response = await axios.post(
                this.settings.tokenUrl,
                new URLSearchParams(form).toString(),
                {
                    headers: {
                        Authorization: `Basic ${credentials}`,
                        "Content-Type": "application/x-www-form-urlencoded",
                    },
                    timeout: REQUEST_TIMEOUT_MS,
                }
            );
            return tokenResponseSchema.parse(response.data);
        } catch (error) {
            logger.warn(`Spotify: ${context} failed`, { error });
            throw wrapSpotifyError(error, context);
        }
    }

    private async get<S extends z.ZodTypeAny>(
        endpoint: string,
        accessToken: string,
        params: Record<string, string | number>,
        schema: S
    ): Promise<z.output<S>> {
        const url = `${this.settings.apiBaseUrl}/${endpoint.replace(/^\/+/, "")}`;
        const cacheKey = ResponseCache.key(`spotify:${endpoint}`, accessToken, params);

        try {
            const payload = await this.cache.wrap(
                cacheKey,
                DEFAULT_RESPONSE_TTL_SECONDS,
                async () => {
                    logger.debug(`Spotify: GET ${endpoint}`, params);
                    const response = await axios.get(url, {
                        headers: {
                            Authorization: `Bearer ${accessToken}`,
                            "Content-Type": "application/json",
                        },
                        params,
                        timeout: REQUEST_TIMEOUT_MS,
                    });
                    return response.data;
                }
            );
            return schema.parse(payload);
        } catch (error) {
            throw wrapSpotifyError(error, endpoint);
        }
    }
}

export const spotifyService = new SpotifyService();
