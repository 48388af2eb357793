export const PERSONALITY_CATEGORIES = [
    "performative",
    "avant_garde",
    "pandering",
    "sophisticated",
    "explorer",
    "trendsetter",
] as const;

export type PersonalityCategory = (typeof PERSONALITY_CATEGORIES)[number];

/** Partial category → score map produced by a single scorer. */
export type CategoryWeights = Partial<Record<PersonalityCategory, number>>;

/** One value per category; what the combine step produces. */
export type CategoryTotals = Record<PersonalityCategory, number>;

export interface PersonalityProfile {
    description: string;
    traits: readonly string[];
}

// User-visible copy; keep wording in sync with the client.
export const PERSONALITY_PROFILES: Readonly<Record<PersonalityCategory, PersonalityProfile>> = {
    performative: {
        description: "You love music that makes a statement and gets attention",
        traits: [
            "Enjoys popular hits",
            "Likes energetic music",
            "Values mainstream appeal",
            "Appreciates polished production",
        ],
    },
    avant_garde: {
        description: "You seek out experimental and boundary-pushing sounds",
        traits: [
            "Appreciates complexity",
            "Enjoys unusual sounds",
            "Values artistic innovation",
            "Open to challenging music",
        ],
    },
    pandering: {
        description: "You enjoy feel-good, accessible music that hits the right spots",
        traits: [
            "Prefers catchy melodies",
            "Likes danceable beats",
            "Values emotional appeal",
            "Enjoys familiar structures",
        ],
    },
    sophisticated: {
        description: "You appreciate nuanced, intellectually engaging music",
        traits: [
            "Values musical complexity",
            "Enjoys acoustic elements",
            "Appreciates craftsmanship",
            "Prefers depth over intensity",
        ],
    },
    explorer: {
        description: "You love discovering diverse sounds from around the world",
        traits: [
            "Seeks musical diversity",
            "Enjoys world music",
            "Values cultural exploration",
            "Open to new experiences",
        ],
    },
    trendsetter: {
        description: "You stay ahead of the curve with emerging sounds and artists",
        traits: [
            "Discovers new genres early",
            "Values innovation",
            "Enjoys cutting-edge production",
            "Influences others' taste",
        ],
    },
};

export function emptyTotals(): CategoryTotals {
    return {
        performative: 0,
        avant_garde: 0,
        pandering: 0,
        sophisticated: 0,
        explorer: 0,
        trendsetter: 0,
    };
}
