import { Router } from "express";
import { z } from "zod";
import { logger, withLogTiming } from "../utils/logger";
import { getSession, requireSpotifySession } from "../middleware/auth";
import { spotifyService } from "../services/spotify";
import { TIME_RANGES } from "../services/spotifySchemas";
import { buildUserStats } from "../services/listeningStats";
import { analyzePersonality } from "../services/personality";
import { sendRouteError, sendUpstreamRouteError } from "./routeErrorResponse";

const router = Router();
const log = logger.child("listening");

// All routes act on the signed-in Spotify user
router.use(requireSpotifySession);

const STATS_ITEM_LIMIT = 20;
const STATS_AUDIO_FEATURE_TRACKS = 10;
const PERSONALITY_ITEM_LIMIT = 50;

const timeRangeSchema = z.enum(TIME_RANGES).default("medium_term");

const limitSchema = (fallback: number) =>
    z.coerce.number().int().min(1).max(50).default(fallback);

const topItemsQuerySchema = z.object({
    time_range: timeRangeSchema,
    limit: limitSchema(20),
});

const recentQuerySchema = z.object({
    limit: limitSchema(50),
});

const personalityQuerySchema = z.object({
    time_range: timeRangeSchema,
});

function invalidQuery(error: z.ZodError) {
    return {
        details: error.issues.map((issue) => ({
            field: issue.path.join("."),
            message: issue.message,
        })),
    };
}

/**
 * GET /api/me
 */
router.get("/me", async (req, res) => {
    try {
        const profile = await spotifyService.getUserProfile(getSession(req).accessToken);
        res.json(profile);
    } catch (error) {
        sendUpstreamRouteError(res, "Failed to get user profile", error);
    }
});

/**
 * GET /api/top-artists?time_range=medium_term&limit=20
 */
router.get("/top-artists", async (req, res) => {
    const query = topItemsQuerySchema.safeParse(req.query);
    if (!query.success) {
        return sendRouteError(res, 400, "Invalid query parameters", invalidQuery(query.error));
    }

    try {
        const artists = await spotifyService.getTopArtists(getSession(req).accessToken, {
            timeRange: query.data.time_range,
            limit: query.data.limit,
        });
        res.json(artists);
    } catch (error) {
        sendUpstreamRouteError(res, "Failed to get top artists", error);
    }
});

/**
 * GET /api/top-tracks?time_range=medium_term&limit=20
 */
router.get("/top-tracks", async (req, res) => {
    const query = topItemsQuerySchema.safeParse(req.query);
    if (!query.success) {
        return sendRouteError(res, 400, "Invalid query parameters", invalidQuery(query.error));
    }

    try {
        const tracks = await spotifyService.getTopTracks(getSession(req).accessToken, {
            timeRange: query.data.time_range,
            limit: query.data.limit,
        });
        res.json(tracks);
    } catch (error) {
        sendUpstreamRouteError(res, "Failed to get top tracks", error);
    }
});

/**
 * GET /api/recent?limit=50
 */
router.get("/recent", async (req, res) => {
    const query = recentQuerySchema.safeParse(req.query);
    if (!query.success) {
        return sendRouteError(res, 400, "Invalid query parameters", invalidQuery(query.error));
    }

    try {
        const recent = await spotifyService.getRecentlyPlayed(
            getSession(req).accessToken,
            query.data.limit
        );
        res.json(recent);
    } catch (error) {
        sendUpstreamRouteError(res, "Failed to get recent tracks", error);
    }
});

/**
 * GET /api/stats
 * Listening time, top genres, hour-of-day trend and average audio features
 */
router.get("/stats", async (req, res) => {
    const session = getSession(req);

    try {
        const stats = await withLogTiming(
            log,
            "stats fetch",
            async () => {
                const [topArtists, topTracks, recentTracks] = await Promise.all([
                    spotifyService.getTopArtists(session.accessToken, { limit: STATS_ITEM_LIMIT }),
                    spotifyService.getTopTracks(session.accessToken, { limit: STATS_ITEM_LIMIT }),
                    spotifyService.getRecentlyPlayed(session.accessToken, STATS_ITEM_LIMIT),
                ]);

                const audioFeatures = await spotifyService.getAudioFeatures(
                    session.accessToken,
                    topTracks.slice(0, STATS_AUDIO_FEATURE_TRACKS).map((track) => track.id)
                );

                return buildUserStats({ topArtists, recentTracks, audioFeatures });
            },
            { userId: session.userId }
        );
        res.json(stats);
    } catch (error) {
        sendUpstreamRouteError(res, "Failed to get user stats", error);
    }
});

/**
 * GET /api/personality?time_range=medium_term
 * Archetype breakdown of the user's top artists and tracks. All fetches have
 * to succeed before anything is analysed.
 */
router.get("/personality", async (req, res) => {
    const query = personalityQuerySchema.safeParse(req.query);
    if (!query.success) {
        return sendRouteError(res, 400, "Invalid query parameters", invalidQuery(query.error));
    }

    const session = getSession(req);
    const timeRange = query.data.time_range;

    try {
        const categories = await withLogTiming(
            log,
            "personality analysis",
            async () => {
                const options = { timeRange, limit: PERSONALITY_ITEM_LIMIT };
                const [artists, tracks] = await Promise.all([
                    spotifyService.getTopArtists(session.accessToken, options),
                    spotifyService.getTopTracks(session.accessToken, options),
                ]);
                const audioFeatures = await spotifyService.getAudioFeatures(
                    session.accessToken,
                    tracks.map((track) => track.id)
                );

                return analyzePersonality(artists, tracks, audioFeatures);
            },
            { userId: session.userId, timeRange }
        );

        res.json({ timeRange, categories });
    } catch (error) {
        sendUpstreamRouteError(res, "Failed to analyze personality", error);
    }
});

export default router;
