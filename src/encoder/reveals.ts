/**
 * Reveal and deck-validity rules.
 */

import {
    createAtMost,
    createExactlyOne,
    createImplies,
} from '../formula/index.js';
import type { Formula } from '../types/index.js';
import { EncodingBuilder } from './builder.js';
import { PLAYERS } from './naming.js';

/**
 * Every played round shows exactly one rank per player; an unplayed war
 * round shows none.
 */
export function encodeReveals(b: EncodingBuilder): void {
    for (const level of b.levels()) {
        for (const player of PLAYERS) {
            const ranks = b.ranks().map(r => b.rank(player, r, level));
            if (level === 0) {
                b.require(`reveal.${player}.0.exactlyOne`, createExactlyOne(ranks));
                continue;
            }

            const reached = b.reached(level);
            b.require(`reveal.${player}.${level}.exactlyOne`, createImplies(reached, createExactlyOne(ranks)));
            b.ranks().forEach((r, i) => {
                b.require(`reveal.${player}.${level}.rank${r}.needsReached`, createImplies(ranks[i], reached));
            });
        }
    }
}

/**
 * A player reveals each rank at most copiesPerRank times across the hand,
 * and both players together at most suitsPerRank times. Bounds that can
 * never be reached are left out.
 */
export function encodeDeckComposition(b: EncodingBuilder): void {
    const { copiesPerRank, suitsPerRank } = b.config;

    for (const r of b.ranks()) {
        const all: Formula[] = [];
        for (const player of PLAYERS) {
            const reveals = b.levels().map(level => b.rank(player, r, level));
            all.push(...reveals);
            if (reveals.length > copiesPerRank) {
                b.require(`deck.${player}.rank${r}.copies`, createAtMost(copiesPerRank, reveals));
            }
        }
        if (suitsPerRank < 2 * copiesPerRank && all.length > suitsPerRank) {
            b.require(`deck.rank${r}.suits`, createAtMost(suitsPerRank, all));
        }
    }
}
