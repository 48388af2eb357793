import type { Artist, AudioFeatures, RecentTrack } from "./spotifySchemas";

export const AUDIO_FEATURE_KEYS = [
    "danceability",
    "energy",
    "valence",
    "tempo",
    "acousticness",
    "instrumentalness",
    "liveness",
    "speechiness",
] as const;

export type AudioFeatureKey = (typeof AUDIO_FEATURE_KEYS)[number];
export type AverageFeatures = Partial<Record<AudioFeatureKey, number>>;

export interface GenreCount {
    genre: string;
    count: number;
}

export interface UserStats {
    totalListeningTimeMs: number;
    topGenres: GenreCount[];
    listeningTrends: Record<number, number>;
    averageFeatures: AverageFeatures;
    moodScore: number;
}

const DEFAULT_TOP_GENRES = 10;

export function countGenres(artists: Array<Pick<Artist, "genres">>): Map<string, number> {
    const counts = new Map<string, number>();
    for (const artist of artists) {
        for (const genre of artist.genres) {
            counts.set(genre, (counts.get(genre) ?? 0) + 1);
        }
    }
    return counts;
}

export function topGenres(
    counts: Map<string, number>,
    limit: number = DEFAULT_TOP_GENRES
): GenreCount[] {
    return Array.from(counts, ([genre, count]) => ({ genre, count }))
        .sort((a, b) => b.count - a.count)
        .slice(0, limit);
}

/**
 * Plays per hour of day (UTC), with every hour 0-23 present.
 */
export function calculateListeningTrends(
    recentTracks: Array<Pick<RecentTrack, "playedAt">>
): Record<number, number> {
    const hourCounts: Record<number, number> = {};
    for (let hour = 0; hour < 24; hour++) {
        hourCounts[hour] = 0;
    }

    for (const { playedAt } of recentTracks) {
        const playedAtMs = Date.parse(playedAt);
        if (Number.isNaN(playedAtMs)) continue;
        hourCounts[new Date(playedAtMs).getUTCHours()] += 1;
    }

    return hourCounts;
}

export function calculateAverageFeatures(features: AudioFeatures[]): AverageFeatures {
    if (features.length === 0) {
        return {};
    }

    const averages: AverageFeatures = {};
    for (const key of AUDIO_FEATURE_KEYS) {
        const total = features.reduce((sum, feature) => sum + feature[key], 0);
        averages[key] = total / features.length;
    }
    return averages;
}

export function calculateMoodScore(averages: AverageFeatures): number {
    return ((averages.valence ?? 0) + (averages.energy ?? 0)) / 2;
}

export function buildUserStats(input: {
    topArtists: Artist[];
    recentTracks: RecentTrack[];
    audioFeatures: AudioFeatures[];
}): UserStats {
    const averageFeatures = calculateAverageFeatures(input.audioFeatures);

    return {
        totalListeningTimeMs: input.recentTracks.reduce(
            (sum, recent) => sum + recent.track.durationMs,
            0
        ),
        topGenres: topGenres(countGenres(input.topArtists)),
        listeningTrends: calculateListeningTrends(input.recentTracks),
        averageFeatures,
        moodScore: calculateMoodScore(averageFeatures),
    };
}
