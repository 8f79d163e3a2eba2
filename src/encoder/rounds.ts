/**
 * Round comparison and war escalation.
 *
 * Each level compares the two revealed ranks. A tie at level k starts level
 * k+1; a tie at the deepest modeled level leaves the war exhausted.
 */

import {
    createAnd,
    createExactlyOne,
    createIff,
    createImplies,
    createOr,
} from '../formula/index.js';
import type { Formula } from '../types/index.js';
import { EncodingBuilder } from './builder.js';
import {
    PLAYERS,
    WAR_EXHAUSTED,
    handWinnerName,
    roundWinnerName,
    warTriggeredName,
} from './naming.js';

function outcomes(b: EncodingBuilder, level: number): { a: Formula; b: Formula; war: Formula } {
    return {
        a: b.prop(roundWinnerName('A', level), 'outcome'),
        b: b.prop(roundWinnerName('B', level), 'outcome'),
        war: b.prop(warTriggeredName(level), 'war'),
    };
}

/**
 * (A shows rA and B shows rB) -> winner, or -> war on equal ranks.
 */
export function encodeRoundComparison(b: EncodingBuilder): void {
    for (const level of b.levels()) {
        const out = outcomes(b, level);
        for (const rA of b.ranks()) {
            for (const rB of b.ranks()) {
                const consequence = rA > rB ? out.a : rA < rB ? out.b : out.war;
                b.require(
                    `round.${level}.A${rA}.B${rB}`,
                    createImplies(createAnd(b.rank('A', rA, level), b.rank('B', rB, level)), consequence)
                );
            }
        }
    }
}

/**
 * A played round has exactly one outcome; an unplayed one has none.
 */
export function encodeOutcomeExclusivity(b: EncodingBuilder): void {
    for (const level of b.levels()) {
        const out = outcomes(b, level);
        const all = [out.a, out.b, out.war];
        if (level === 0) {
            b.require('outcome.0.exactlyOne', createExactlyOne(all));
            continue;
        }
        const reached = b.reached(level);
        b.require(`outcome.${level}.exactlyOne`, createImplies(reached, createExactlyOne(all)));
        b.require(`outcome.${level}.needsReached`, createImplies(createOr(...all), reached));
    }
}

export function encodeWarEscalation(b: EncodingBuilder): void {
    const deepest = b.config.maxWarDepth;
    for (const level of b.levels()) {
        const war = b.prop(warTriggeredName(level), 'war');
        if (level < deepest) {
            b.require(`war.${level}.escalates`, createIff(war, b.reached(level + 1)));
        } else {
            b.require(`war.${level}.exhausted`, createIff(war, b.prop(WAR_EXHAUSTED, 'war')));
        }
    }
}

/**
 * The player who wins the last played round takes the hand.
 */
export function encodeHandOutcome(b: EncodingBuilder): void {
    for (const player of PLAYERS) {
        const rounds = b.levels().map(level => b.prop(roundWinnerName(player, level), 'outcome'));
        b.require(`hand.${player}`, createIff(b.prop(handWinnerName(player), 'hand'), createOr(...rounds)));
    }
}
