/**
 * "Deck is stacked" definitions.
 *
 * Under a uniform deal each reveal is high with probability h / ranks, where
 * h is the number of ranks at or above highRankFrom. A player is favoured
 * when, over the rounds actually played, they reveal more high cards than
 * that expectation plus the tolerance. The count is split by hand length so
 * every comparison runs against a constant over at most one reveal per level.
 * These are query targets only and never become constraints.
 */

import { createAnd, createMoreThan, createNot, createOr } from '../formula/index.js';
import type { Formula } from '../types/index.js';
import { EncodingBuilder } from './builder.js';
import { DECK_IS_STACKED, PLAYERS, Player, stackedForName } from './naming.js';

function highRanks(b: EncodingBuilder): number[] {
    return b.ranks().filter(r => r >= b.config.fairness.highRankFrom);
}

/** Exactly the levels 0..last are played. */
function playedThrough(b: EncodingBuilder, last: number): Formula {
    const parts: Formula[] = [];
    if (last > 0) parts.push(b.reached(last));
    if (last < b.config.maxWarDepth) parts.push(createNot(b.reached(last + 1)));
    return createAnd(...parts);
}

/**
 * Largest high-card count still within the expectation for a hand of
 * `played` rounds. An integer count exceeds x exactly when it exceeds floor(x).
 */
function stackedMargin(b: EncodingBuilder, played: number): number {
    const expected = Math.floor((played * highRanks(b).length) / b.config.ranks);
    return expected + b.config.fairness.tolerance;
}

function stackedFor(b: EncodingBuilder, player: Player): Formula {
    const high = highRanks(b);
    const highAt = b.levels().map(level => createOr(...high.map(r => b.rank(player, r, level))));

    const cases: Formula[] = [];
    for (const level of b.levels()) {
        const played = level + 1;
        const margin = stackedMargin(b, played);
        // More than `played` high cards never fit in the hand
        if (margin >= played) continue;
        cases.push(createAnd(playedThrough(b, level), createMoreThan(highAt.slice(0, played), [], margin)));
    }
    return createOr(...cases);
}

export function defineFairness(b: EncodingBuilder): void {
    const perPlayer = PLAYERS.map(player => {
        const formula = stackedFor(b, player);
        b.define(stackedForName(player), formula);
        return formula;
    });
    b.define(DECK_IS_STACKED, createOr(...perPlayer));
}
