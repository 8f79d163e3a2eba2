/**
 * Analysis entry point tests
 */

import { analyzeWar, buildWarTheory, defaultQueries, runQueries } from '../src/analysis.js';
import type { QueryAnswer } from '../src/analysis.js';
import type { ModelCount, ModelResult } from '../src/query.js';
import { SMALL, bucketCount, errorCode } from './fixtures.js';

function asCount(answer: QueryAnswer | undefined): ModelCount {
    if (typeof answer === 'object' && 'counts' in answer) return answer;
    throw new Error('expected a model count');
}

function asModel(answer: QueryAnswer | undefined): ModelResult {
    if (typeof answer === 'object' && 'found' in answer) return answer;
    throw new Error('expected a model result');
}

describe('analyzeWar', () => {
    test('default queries on a small deck', () => {
        const report = analyzeWar(SMALL);

        expect(report.size).toEqual({ propositions: 22, constraints: 41, definitions: 3 });
        // With three ranks every rank counts as high, so no deal is ever stacked
        expect(Object.fromEntries(report.answers)).toEqual({
            consistent: true,
            a_can_win_first_round: true,
            single_first_round_outcome: true,
            higher_rank_wins: true,
            tie_triggers_war: true,
            stacked_deck_entailed: false,
            stacked_deck_excluded: true,
        });
    });

    test('default queries on the full deck', () => {
        const report = analyzeWar();

        expect(report.config.maxWarDepth).toBe(12);
        expect(report.size).toEqual({ propositions: 392, constraints: 2601, definitions: 3 });
        expect(Object.fromEntries(report.answers)).toEqual({
            consistent: true,
            a_can_win_first_round: true,
            single_first_round_outcome: true,
            higher_rank_wins: true,
            tie_triggers_war: true,
            stacked_deck_entailed: false,
            stacked_deck_excluded: false,
        });
    });

    test('custom queries with given facts', () => {
        const report = analyzeWar(SMALL, [
            { name: 'after_tie', kind: 'count', subset: ['war1_round_winner_is_A'], given: { war_triggered: true } },
            { name: 'a_first', kind: 'likelihood', target: 'round_winner_is_A' },
            {
                name: 'replay',
                kind: 'model',
                given: {
                    A_card_rank_is_3: true,
                    B_card_rank_is_3: true,
                    war1_A_card_rank_is_1: true,
                    war1_B_card_rank_is_2: true,
                },
            },
        ]);

        const afterTie = asCount(report.answers.get('after_tie'));
        expect(afterTie.total).toBe(12);
        expect(bucketCount(afterTie, { war1_round_winner_is_A: true })).toBe(3);
        expect(bucketCount(afterTie, { war1_round_winner_is_A: false })).toBe(9);

        expect(report.answers.get('a_first')).toEqual({ favourable: 3, total: 18, probability: 3 / 18 });

        const replay = asModel(report.answers.get('replay'));
        expect(replay.found).toBe(true);
        if (replay.found) {
            expect(replay.model.get('war1_round_winner_is_B')).toBe(true);
            expect(replay.model.get('hand_winner_is_B')).toBe(true);
            expect(replay.model.get('war_exhausted')).toBe(false);
        }
    });

    test('reports progress per stage', () => {
        const onProgress = jest.fn();
        analyzeWar(SMALL, [{ name: 'consistent', kind: 'satisfiable' }], { onProgress });

        expect(onProgress).toHaveBeenCalledWith(undefined, 'Encoding 2 rounds over 3 ranks');
        expect(onProgress).toHaveBeenCalledWith(undefined, 'Checking theory consistency');
        expect(onProgress).toHaveBeenCalledWith(0, 'Running query consistent');
    });

    test('invalid configuration aborts before encoding', () => {
        expect(errorCode(() => analyzeWar({ ranks: 3, deckSize: 2, maxWarDepth: 2 }))).toBe('INVALID_CONFIG');
    });

    test('given facts must name theory propositions', () => {
        expect(errorCode(() => analyzeWar(SMALL, [
            { name: 'bad', kind: 'satisfiable', given: { A_card_rank_is_13: true } },
        ]))).toBe('DANGLING_REFERENCE');
    });
});

describe('runQueries', () => {
    test('answers are keyed by name, later names win', () => {
        const { theory } = buildWarTheory(SMALL);
        const answers = runQueries(theory, [
            { name: 'q', kind: 'entailed', target: 'round_winner_is_A' },
            { name: 'q', kind: 'excluded', target: 'war1_reached' },
        ]);
        expect(answers.size).toBe(1);
        expect(answers.get('q')).toBe(false);
    });

    test('unknown targets are reported', () => {
        const { theory } = buildWarTheory(SMALL);
        expect(errorCode(() => runQueries(theory, [{ name: 'x', kind: 'excluded', target: 'war2_reached' }])))
            .toBe('UNKNOWN_TARGET');
    });
});

describe('defaultQueries', () => {
    test('targets the two highest ranks', () => {
        const { config } = buildWarTheory(SMALL);
        const higher = defaultQueries(config).find(q => q.name === 'higher_rank_wins');
        expect(higher?.given).toEqual({ A_card_rank_is_3: true, B_card_rank_is_2: true });
    });
});
