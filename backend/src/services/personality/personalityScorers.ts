import type { Artist, AudioFeatures, Track } from "../spotifySchemas";
import { GENRE_WEIGHTS } from "./personalityGenreWeights";
import {
    PERSONALITY_CATEGORIES,
    emptyTotals,
    type CategoryWeights,
} from "./personalityProfiles";

export type ArtistSignal = Pick<Artist, "genres" | "popularity">;
export type TrackSignal = Pick<Track, "popularity">;
export type AudioSignal = Pick<
    AudioFeatures,
    "energy" | "danceability" | "valence" | "acousticness" | "instrumentalness"
>;

const HIGH_POPULARITY = 70;
const LOW_POPULARITY = 30;
const HIGH_DIVERSITY = 0.7;
const LOW_DIVERSITY = 0.3;

function mean(values: number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function collectGenres(artists: ArtistSignal[]): string[] {
    return artists.flatMap((artist) => artist.genres);
}

/**
 * A tag matches when it contains the keyword, or any single word of it:
 * "k-pop" matches both "pop" and "k-pop", "smooth jazz" matches "free jazz".
 */
export function genreMatchesKeyword(tag: string, keyword: string): boolean {
    const lowered = tag.toLowerCase();
    if (lowered.includes(keyword)) {
        return true;
    }
    return keyword
        .split(/\s+/)
        .filter((word) => word.length > 0)
        .some((word) => lowered.includes(word));
}

/**
 * Mainstream vs. obscure, from the mean of every non-zero artist and track
 * popularity. Zero means "unknown" and is left out of the mean.
 */
export function scorePopularity(
    artists: ArtistSignal[],
    tracks: TrackSignal[]
): CategoryWeights {
    const popularities = [...artists, ...tracks]
        .map((item) => item.popularity)
        .filter((popularity) => popularity !== 0);

    if (popularities.length === 0) {
        return {};
    }

    const average = mean(popularities);
    if (average >= HIGH_POPULARITY) {
        return { performative: 0.8, pandering: 0.6 };
    }
    if (average <= LOW_POPULARITY) {
        return { avant_garde: 0.7, sophisticated: 0.5 };
    }
    return { explorer: 0.6 };
}

export function scoreGenres(artists: ArtistSignal[]): CategoryWeights {
    const genres = collectGenres(artists);
    if (genres.length === 0) {
        return {};
    }

    const scores = emptyTotals();
    for (const genre of genres) {
        for (const [keyword, weights] of GENRE_WEIGHTS) {
            if (!genreMatchesKeyword(genre, keyword)) continue;
            for (const category of PERSONALITY_CATEGORIES) {
                scores[category] += weights[category] ?? 0;
            }
        }
    }

    for (const category of PERSONALITY_CATEGORIES) {
        scores[category] /= genres.length;
    }
    return scores;
}

export function scoreAudioFeatures(features: AudioSignal[]): CategoryWeights {
    if (features.length === 0) {
        return {};
    }

    const energy = mean(features.map((f) => f.energy));
    const danceability = mean(features.map((f) => f.danceability));
    const valence = mean(features.map((f) => f.valence));
    const acousticness = mean(features.map((f) => f.acousticness));
    const instrumentalness = mean(features.map((f) => f.instrumentalness));

    const scores: CategoryWeights = {};

    if (energy > 0.7 && danceability > 0.7) {
        scores.pandering = 0.7;
        scores.performative = 0.5;
    }

    if (acousticness > 0.6 && energy < 0.4) {
        scores.sophisticated = 0.8;
    }

    if (instrumentalness > 0.5) {
        scores.avant_garde = 0.6;
    }

    // Extreme moods in either direction stack onto instrumentalness
    if (valence < 0.3 || valence > 0.9) {
        scores.avant_garde = (scores.avant_garde ?? 0) + 0.4;
    }

    return scores;
}

export function scoreDiversity(artists: ArtistSignal[]): CategoryWeights {
    const genres = collectGenres(artists);
    if (genres.length === 0) {
        return {};
    }

    const ratio = new Set(genres).size / genres.length;

    if (ratio > HIGH_DIVERSITY) {
        return { explorer: 0.8, trendsetter: 0.5 };
    }
    if (ratio < LOW_DIVERSITY) {
        return { pandering: 0.6 };
    }
    return {};
}
