export {
    analyzePersonality,
    computeCategoryTotals,
    toPercentages,
    SCORER_WEIGHTS,
    VISIBILITY_THRESHOLD_PERCENT,
} from "./personalityAnalyzer";
export type { CategoryScore, ScorerName } from "./personalityAnalyzer";
export {
    PERSONALITY_CATEGORIES,
    PERSONALITY_PROFILES,
} from "./personalityProfiles";
export type {
    CategoryTotals,
    CategoryWeights,
    PersonalityCategory,
    PersonalityProfile,
} from "./personalityProfiles";
export { GENRE_WEIGHTS } from "./personalityGenreWeights";
export {
    genreMatchesKeyword,
    scoreAudioFeatures,
    scoreDiversity,
    scoreGenres,
    scorePopularity,
} from "./personalityScorers";
export type { ArtistSignal, AudioSignal, TrackSignal } from "./personalityScorers";
