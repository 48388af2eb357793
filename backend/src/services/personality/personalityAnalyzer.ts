/**
 * Music Personality Analyzer
 *
 * Turns a listener's top artists, top tracks and audio features into a
 * percentage breakdown over six fixed archetypes. Four independent scorers
 * (popularity, genre, audio features, genre diversity) each produce a partial
 * category map; the maps are blended with fixed weights, normalised to
 * percentages and filtered to the categories that make up a visible share.
 *
 * Pure and synchronous: safe to call from any number of request handlers.
 */

import {
    PERSONALITY_CATEGORIES,
    PERSONALITY_PROFILES,
    emptyTotals,
    type CategoryTotals,
    type CategoryWeights,
    type PersonalityCategory,
} from "./personalityProfiles";
import {
    scoreAudioFeatures,
    scoreDiversity,
    scoreGenres,
    scorePopularity,
    type ArtistSignal,
    type AudioSignal,
    type TrackSignal,
} from "./personalityScorers";

export interface CategoryScore {
    category: PersonalityCategory;
    percentage: number;
    description: string;
    traits: string[];
}

export type ScorerName = "popularity" | "genre" | "audio" | "diversity";

// Blend weights; must sum to 1
export const SCORER_WEIGHTS: Readonly<Record<ScorerName, number>> = {
    popularity: 0.3,
    genre: 0.3,
    audio: 0.25,
    diversity: 0.15,
};

export const VISIBILITY_THRESHOLD_PERCENT = 5;

function roundToTenth(value: number): number {
    return Math.round(value * 10) / 10;
}

/**
 * Runs every scorer and returns the weighted, un-normalised total per category.
 */
export function computeCategoryTotals(
    artists: ArtistSignal[],
    tracks: TrackSignal[],
    audioFeatures: AudioSignal[]
): CategoryTotals {
    const partials: Record<ScorerName, CategoryWeights> = {
        popularity: scorePopularity(artists, tracks),
        genre: scoreGenres(artists),
        audio: scoreAudioFeatures(audioFeatures),
        diversity: scoreDiversity(artists),
    };

    const totals = emptyTotals();
    for (const category of PERSONALITY_CATEGORIES) {
        totals[category] =
            (partials.popularity[category] ?? 0) * SCORER_WEIGHTS.popularity +
            (partials.genre[category] ?? 0) * SCORER_WEIGHTS.genre +
            (partials.audio[category] ?? 0) * SCORER_WEIGHTS.audio +
            (partials.diversity[category] ?? 0) * SCORER_WEIGHTS.diversity;
    }
    return totals;
}

/**
 * Converts totals into shares of 100. An all-zero input stays all zero.
 */
export function toPercentages(totals: CategoryTotals): CategoryTotals {
    const sum = PERSONALITY_CATEGORIES.reduce((acc, category) => acc + totals[category], 0);
    const divisor = sum === 0 ? 1 : sum;

    const percentages = emptyTotals();
    for (const category of PERSONALITY_CATEGORIES) {
        percentages[category] = (totals[category] / divisor) * 100;
    }
    return percentages;
}

export function analyzePersonality(
    artists: ArtistSignal[],
    tracks: TrackSignal[],
    audioFeatures: AudioSignal[]
): CategoryScore[] {
    const percentages = toPercentages(
        computeCategoryTotals(artists, tracks, audioFeatures)
    );

    const results: CategoryScore[] = [];
    for (const category of PERSONALITY_CATEGORIES) {
        const percentage = percentages[category];
        if (percentage <= VISIBILITY_THRESHOLD_PERCENT) continue;

        const profile = PERSONALITY_PROFILES[category];
        results.push({
            category,
            percentage: roundToTenth(percentage),
            description: profile.description,
            traits: [...profile.traits],
        });
    }

    // Array#sort is stable, so ties keep category order
    return results.sort((a, b) => b.percentage - a.percentage);
}
