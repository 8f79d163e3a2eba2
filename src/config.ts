/**
 * Model configuration
 *
 * Fills in defaults and validates a War model configuration with zod.
 */

import { z } from 'zod';
import { createConfigError } from './types/errors.js';
import { DEFAULTS, WarModelConfig } from './types/options.js';

/**
 * Deepest war level every tie chain can reach. A tie spends one copy of its
 * rank per player and two of the shared suits, so each rank funds
 * min(copiesPerRank, suitsPerRank / 2) ties; below that bound any chain of
 * ties still leaves a rank both players can reveal next.
 */
export function fundedWarDepth(config: Pick<WarModelConfig, 'ranks' | 'copiesPerRank' | 'suitsPerRank'>): number {
    const tiesPerRank = Math.min(config.copiesPerRank, Math.floor(config.suitsPerRank / 2));
    return Math.max(0, config.ranks * tiesPerRank - 1);
}

const fairnessSchema = z.object({
    highRankFrom: z.number().int().min(1).describe('Lowest rank counted as a high card'),
    tolerance: z.number().int().min(0).describe('High cards allowed beyond the uniform expectation before a deal counts as stacked'),
});

export const warModelConfigSchema = z.object({
    ranks: z.number().int().min(2).max(52),
    deckSize: z.number().int().min(1),
    maxWarDepth: z.number().int().min(0),
    copiesPerRank: z.number().int().min(1),
    suitsPerRank: z.number().int().min(1),
    fairness: fairnessSchema,
}).superRefine((config, ctx) => {
    if (config.maxWarDepth > config.deckSize - 1) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['maxWarDepth'],
            message: `Each war round reveals one more card per player; at most ${config.deckSize - 1} fit in a deck of ${config.deckSize}`,
        });
    }
    const funded = fundedWarDepth(config);
    if (config.maxWarDepth > funded) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['maxWarDepth'],
            message: `Ties run out of ranks after ${funded} war rounds`,
        });
    }
    if (config.fairness.highRankFrom > config.ranks) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['fairness', 'highRankFrom'],
            message: `No rank reaches ${config.fairness.highRankFrom} with ${config.ranks} ranks`,
        });
    }
});

/**
 * Partial configuration accepted from callers; missing fields take defaults.
 */
export type WarModelConfigInput = Partial<Omit<WarModelConfig, 'fairness'>> & {
    fairness?: Partial<WarModelConfig['fairness']>;
};

/**
 * Resolve a complete, validated configuration.
 * maxWarDepth defaults to the deepest war both the hand size and the rank
 * composition can fund; highRankFrom defaults to the top four ranks.
 */
export function resolveConfig(input: WarModelConfigInput = {}): WarModelConfig {
    const ranks = input.ranks ?? DEFAULTS.ranks;
    const deckSize = input.deckSize ?? DEFAULTS.deckSize;
    const copiesPerRank = input.copiesPerRank ?? DEFAULTS.copiesPerRank;
    const suitsPerRank = input.suitsPerRank ?? DEFAULTS.suitsPerRank;
    const candidate: WarModelConfig = {
        ranks,
        deckSize,
        maxWarDepth: input.maxWarDepth ?? Math.min(deckSize - 1, fundedWarDepth({ ranks, copiesPerRank, suitsPerRank })),
        copiesPerRank,
        suitsPerRank,
        fairness: {
            highRankFrom: input.fairness?.highRankFrom ?? Math.max(1, ranks - DEFAULTS.highRanks + 1),
            tolerance: input.fairness?.tolerance ?? DEFAULTS.tolerance,
        },
    };

    const parsed = warModelConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
        throw createConfigError(issues[0], issues);
    }
    return parsed.data;
}
