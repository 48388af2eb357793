import type { CategoryWeights } from "./personalityProfiles";

/**
 * Genre keyword → category contributions.
 *
 * Keywords are lowercase and matched against lowercased artist genre tags
 * (see `genreMatchesKeyword`). Insertion order is the matching order.
 */
export const GENRE_WEIGHTS: ReadonlyArray<readonly [string, CategoryWeights]> = [
    // Mainstream/popular
    ["pop", { performative: 0.8, pandering: 0.6 }],
    ["top 40", { performative: 0.9, pandering: 0.8 }],
    ["mainstream", { performative: 0.8, pandering: 0.7 }],

    // Experimental
    ["experimental", { avant_garde: 0.9, sophisticated: 0.7 }],
    ["noise", { avant_garde: 0.8, sophisticated: 0.6 }],
    ["ambient", { avant_garde: 0.6, sophisticated: 0.8 }],
    ["drone", { avant_garde: 0.7, sophisticated: 0.7 }],
    ["free jazz", { avant_garde: 0.8, sophisticated: 0.9 }],

    // Sophisticated
    ["classical", { sophisticated: 0.9, avant_garde: 0.3 }],
    ["jazz", { sophisticated: 0.8, explorer: 0.6 }],
    ["baroque", { sophisticated: 0.9, avant_garde: 0.4 }],
    ["opera", { sophisticated: 0.8, performative: 0.4 }],
    ["chamber music", { sophisticated: 0.9, avant_garde: 0.3 }],

    // World / diverse
    ["world", { explorer: 0.8, sophisticated: 0.5 }],
    ["afrobeat", { explorer: 0.7, trendsetter: 0.6 }],
    ["k-pop", { explorer: 0.6, trendsetter: 0.8 }],
    ["bossa nova", { explorer: 0.7, sophisticated: 0.6 }],
    ["cumbia", { explorer: 0.8, trendsetter: 0.5 }],

    // Emerging
    ["hyperpop", { trendsetter: 0.9, avant_garde: 0.6 }],
    ["phonk", { trendsetter: 0.8, explorer: 0.5 }],
    ["drill", { trendsetter: 0.7, performative: 0.6 }],
    ["bedroom pop", { trendsetter: 0.6, sophisticated: 0.7 }],
];
