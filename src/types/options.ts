/**
 * Progress callback shared by long-running operations.
 * @param progress A number between 0 and 1 (if known) or undefined.
 * @param message A descriptive message about the current step.
 */
export type ProgressCallback = (progress: number | undefined, message: string) => void;

/**
 * Thresholds for the query-only "deck is stacked" definitions.
 */
export interface FairnessConfig {
    /** Lowest rank counted as a high card */
    highRankFrom: number;
    /** How many more high cards one player may reveal before the deal counts as stacked */
    tolerance: number;
}

export interface WarModelConfig {
    /** Number of distinct ranks, numbered 1..ranks */
    ranks: number;
    /** Cards dealt to each player */
    deckSize: number;
    /** Deepest war round modeled; round 0 is the initial comparison */
    maxWarDepth: number;
    /** How often one player may reveal the same rank within the modeled hand */
    copiesPerRank: number;
    /** Copies of each rank in the full deck, shared by both players */
    suitsPerRank: number;
    fairness: FairnessConfig;
}

export interface QueryOptions {
    /** Upper bound on enumerated models before MODEL_LIMIT is raised */
    maxModels?: number;
    onProgress?: ProgressCallback;
}

export interface AssembleOptions {
    /** Run the satisfiability self-check after assembly (default: true) */
    selfCheck?: boolean;
    /** Solver calls spent shrinking a conflict before reporting it unshrunk */
    conflictSearchLimit?: number;
    onProgress?: ProgressCallback;
}

export const DEFAULTS = {
    ranks: 13,
    deckSize: 26,
    copiesPerRank: 1,
    suitsPerRank: 4,
    /** Default high cards are the top four ranks (10, J, Q, K of 13) */
    highRanks: 4,
    tolerance: 0,
    maxModels: 10000,
    conflictSearchLimit: 500,
} as const;
