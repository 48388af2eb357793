import request from "supertest";

jest.mock("../../services/spotify", () => ({
    spotifyService: {
        getUserProfile: jest.fn(),
        getTopArtists: jest.fn(),
        getTopTracks: jest.fn(),
        getRecentlyPlayed: jest.fn(),
        getAudioFeatures: jest.fn(),
    },
}));

import { spotifyService } from "../../services/spotify";
import { createSessionToken } from "../../middleware/auth";
import { AppError, ErrorCategory, ErrorCode } from "../../utils/errors";
import router from "../listening";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

const app = createRouteTestApp("/api", router);

const sessionToken = createSessionToken({
    sub: "user-1",
    spotifyAccessToken: "spotify-access",
    spotifyRefreshToken: "spotify-refresh",
});
const AUTH = `Bearer ${sessionToken}`;

function artist(id: string, genres: string[], popularity: number) {
    return { id, name: `Artist ${id}`, genres, popularity, images: [], externalUrls: {} };
}

function track(id: string, popularity: number, durationMs = 180000) {
    return {
        id,
        name: `Track ${id}`,
        artists: [],
        album: { name: "Album", images: [] },
        durationMs,
        popularity,
        externalUrls: {},
    };
}

describe("listening routes integration", () => {
    const mockGetProfile = spotifyService.getUserProfile as jest.Mock;
    const mockGetTopArtists = spotifyService.getTopArtists as jest.Mock;
    const mockGetTopTracks = spotifyService.getTopTracks as jest.Mock;
    const mockGetRecentlyPlayed = spotifyService.getRecentlyPlayed as jest.Mock;
    const mockGetAudioFeatures = spotifyService.getAudioFeatures as jest.Mock;

    beforeEach(() => {
        jest.clearAllMocks();
    });

    it("requires a bearer session", async () => {
        const res = await request(app).get("/api/me");

        expect(res.status).toBe(403);
        expect(res.body).toEqual({ error: "Not authenticated" });
    });

    it("rejects an invalid session token", async () => {
        const res = await request(app).get("/api/me").set("Authorization", "Bearer invalid_token");

        expect(res.status).toBe(401);
        expect(res.body).toEqual({ error: "Invalid token" });
    });

    it("returns the profile for GET /api/me", async () => {
        const profile = {
            id: "user-1",
            displayName: "Listener",
            email: "listener@example.test",
            images: [],
            followers: 12,
        };
        mockGetProfile.mockResolvedValueOnce(profile);

        const res = await request(app).get("/api/me").set("Authorization", AUTH);

        expect(res.status).toBe(200);
        expect(res.body).toEqual(profile);
        expect(mockGetProfile).toHaveBeenCalledWith("spotify-access");
    });

    it("passes query options through for GET /api/top-artists", async () => {
        const artists = [artist("a", ["pop"], 80), artist("b", ["jazz"], 60)];
        mockGetTopArtists.mockResolvedValueOnce(artists);

        const res = await request(app)
            .get("/api/top-artists?time_range=long_term&limit=6")
            .set("Authorization", AUTH);

        expect(res.status).toBe(200);
        expect(res.body).toHaveLength(2);
        expect(res.body[0].name).toBe("Artist a");
        expect(mockGetTopArtists).toHaveBeenCalledWith("spotify-access", {
            timeRange: "long_term",
            limit: 6,
        });
    });

    it("validates query parameters", async () => {
        const res = await request(app)
            .get("/api/top-tracks?time_range=forever&limit=500")
            .set("Authorization", AUTH);

        expect(res.status).toBe(400);
        expect(res.body.error).toBe("Invalid query parameters");
        expect(res.body.details.map((detail: { field: string }) => detail.field)).toEqual([
            "time_range",
            "limit",
        ]);
        expect(mockGetTopTracks).not.toHaveBeenCalled();
    });

    it("defaults the recent limit to 50", async () => {
        mockGetRecentlyPlayed.mockResolvedValueOnce([]);

        const res = await request(app).get("/api/recent").set("Authorization", AUTH);

        expect(res.status).toBe(200);
        expect(res.body).toEqual([]);
        expect(mockGetRecentlyPlayed).toHaveBeenCalledWith("spotify-access", 50);
    });

    it("aggregates GET /api/stats", async () => {
        mockGetTopArtists.mockResolvedValueOnce([artist("a", ["indie"], 40)]);
        mockGetTopTracks.mockResolvedValueOnce([track("t1", 55)]);
        mockGetRecentlyPlayed.mockResolvedValueOnce([
            { playedAt: "2024-05-01T08:00:00Z", track: track("t9", 20, 180000) },
        ]);
        mockGetAudioFeatures.mockResolvedValueOnce([
            {
                id: "t1",
                danceability: 0.5,
                energy: 0.6,
                valence: 0.2,
                tempo: 110,
                acousticness: 0.3,
                instrumentalness: 0,
                liveness: 0.1,
                speechiness: 0.04,
            },
        ]);

        const res = await request(app).get("/api/stats").set("Authorization", AUTH);

        expect(res.status).toBe(200);
        expect(res.body.totalListeningTimeMs).toBe(180000);
        expect(res.body.topGenres).toEqual([{ genre: "indie", count: 1 }]);
        expect(res.body.listeningTrends["8"]).toBe(1);
        expect(res.body.averageFeatures.tempo).toBe(110);
        expect(res.body.moodScore).toBeCloseTo(0.4);
        expect(mockGetTopArtists).toHaveBeenCalledWith("spotify-access", { limit: 20 });
        expect(mockGetRecentlyPlayed).toHaveBeenCalledWith("spotify-access", 20);
        expect(mockGetAudioFeatures).toHaveBeenCalledWith("spotify-access", ["t1"]);
    });

    it("returns the personality breakdown for GET /api/personality", async () => {
        mockGetTopArtists.mockResolvedValueOnce([
            artist("a", ["pop", "rock"], 80),
            artist("b", ["jazz", "blues"], 60),
        ]);
        mockGetTopTracks.mockResolvedValueOnce([track("t1", 75)]);
        mockGetAudioFeatures.mockResolvedValueOnce([]);

        const res = await request(app)
            .get("/api/personality?time_range=short_term")
            .set("Authorization", AUTH);

        expect(res.status).toBe(200);
        expect(res.body.timeRange).toBe("short_term");
        expect(
            res.body.categories.map((score: { category: string; percentage: number }) => [
                score.category,
                score.percentage,
            ])
        ).toEqual([
            ["performative", 28.6],
            ["pandering", 21.4],
            ["sophisticated", 17.1],
            ["explorer", 15.7],
            ["trendsetter", 11.4],
            ["avant_garde", 5.7],
        ]);
        expect(res.body.categories[0].description).toBe(
            "You love music that makes a statement and gets attention"
        );
        expect(mockGetTopArtists).toHaveBeenCalledWith("spotify-access", {
            timeRange: "short_term",
            limit: 50,
        });
        expect(mockGetAudioFeatures).toHaveBeenCalledWith("spotify-access", ["t1"]);
    });

    it("does not analyse when a fetch fails", async () => {
        mockGetTopArtists.mockRejectedValueOnce(
            new AppError(
                ErrorCode.SPOTIFY_AUTH_FAILED,
                ErrorCategory.RECOVERABLE,
                "Spotify rejected credentials: me/top/artists"
            )
        );
        mockGetTopTracks.mockResolvedValueOnce([]);

        const res = await request(app).get("/api/personality").set("Authorization", AUTH);

        expect(res.status).toBe(401);
        expect(res.body).toEqual({
            error: "Failed to analyze personality: Spotify rejected credentials: me/top/artists",
            code: ErrorCode.SPOTIFY_AUTH_FAILED,
        });
        expect(mockGetAudioFeatures).not.toHaveBeenCalled();
    });

    it("maps unexpected upstream failures to 502", async () => {
        mockGetProfile.mockRejectedValueOnce(new Error("socket hang up"));

        const res = await request(app).get("/api/me").set("Authorization", AUTH);

        expect(res.status).toBe(502);
        expect(res.body).toEqual({ error: "Failed to get user profile: socket hang up" });
    });
});
