/**
 * Query layer tests on small hand-built theories
 */

import { QueryEngine, createQueryEngine } from '../src/query.js';
import { Theory } from '../src/theory.js';
import { createRegistry } from '../src/registry.js';
import { createBackendError } from '../src/types/errors.js';
import type { SolverBackend } from '../src/engines/interface.js';
import type { Formula } from '../src/types/index.js';
import { createAnd, createNot, createOr, createProp } from '../src/formula/index.js';
import { bucketCount, constraint, errorCode } from './fixtures.js';

const p = createProp('p');
const q = createProp('q');

function theoryOf(names: string[], ...formulas: Formula[]): Theory {
    const registry = createRegistry();
    for (const name of names) registry.register(name);
    return new Theory(registry.all(), formulas.map((f, i) => constraint(`c${i}`, f)));
}

describe('QueryEngine', () => {
    let engine: QueryEngine;

    beforeEach(() => {
        engine = createQueryEngine();
    });

    test('uses the SAT backend by default', () => {
        expect(engine.backendName).toBe('sat/minisat');
    });

    describe('satisfiability and models', () => {
        const disjunction = theoryOf(['p', 'q'], createOr(p, q));
        const contradiction = theoryOf(['p'], p, createNot(p));

        test('isSatisfiable', () => {
            expect(engine.isSatisfiable(disjunction)).toBe(true);
            expect(engine.isSatisfiable(contradiction)).toBe(false);
        });

        test('verdict is stable across calls', () => {
            const verdicts = [1, 2, 3].map(() => engine.isSatisfiable(disjunction));
            expect(verdicts).toEqual([true, true, true]);
        });

        test('findModel returns a complete assignment', () => {
            const result = engine.findModel(disjunction);
            expect(result.found).toBe(true);
            if (result.found) {
                expect(Array.from(result.model.keys())).toEqual(['p', 'q']);
                expect(result.model.get('p') || result.model.get('q')).toBe(true);
            }
        });

        test('findModel reports no model explicitly', () => {
            expect(engine.findModel(contradiction)).toEqual({ found: false });
        });

        test('empty theory has one empty model', () => {
            const empty = new Theory([], []);
            expect(engine.isSatisfiable(empty)).toBe(true);
            expect(engine.findModel(empty)).toEqual({ found: true, model: new Map() });
            expect(engine.countSolutions(empty)).toBe(1);
        });
    });

    describe('entailment', () => {
        const theory = theoryOf(['p', 'q'], createOr(p, q), createNot(p));

        test('entailed by refutation', () => {
            expect(engine.isEntailed(theory, 'q')).toBe(true);
            expect(engine.isEntailed(theory, createOr(p, q))).toBe(true);
            expect(engine.isEntailed(theory, 'p')).toBe(false);
        });

        test('excluded', () => {
            expect(engine.isExcluded(theory, 'p')).toBe(true);
            expect(engine.isExcluded(theory, 'q')).toBe(false);
        });

        test('entailed target has no counter-model', () => {
            const negated = theory.extend([constraint('not q', createNot(q))]);
            expect(engine.findModel(negated)).toEqual({ found: false });
        });

        test('an unsatisfiable theory entails everything', () => {
            const contradiction = theoryOf(['p', 'q'], p, createNot(p));
            expect(engine.isEntailed(contradiction, 'q')).toBe(true);
            expect(engine.isEntailed(contradiction, createNot(q))).toBe(true);
        });

        test('unknown targets are rejected', () => {
            expect(errorCode(() => engine.isEntailed(theory, 'r'))).toBe('UNKNOWN_TARGET');
        });
    });

    describe('counting', () => {
        const theory = theoryOf(['p', 'q'], createOr(p, q));

        test('groups full models by subset', () => {
            const result = engine.countModels(theory, ['p']);
            expect(result.total).toBe(3);
            expect(result.counts).toHaveLength(2);
            expect(bucketCount(result, { p: true })).toBe(2);
            expect(bucketCount(result, { p: false })).toBe(1);
        });

        test('full subset has one model per bucket', () => {
            const result = engine.countModels(theory, ['p', 'q']);
            expect(result.counts.map(b => b.count)).toEqual([1, 1, 1]);
        });

        test('duplicate subset names count once', () => {
            const result = engine.countModels(theory, ['p', 'p']);
            expect(result.counts.map(b => Object.keys(b.assignment))).toEqual([['p'], ['p']]);
        });

        test('empty subset collapses to the total', () => {
            expect(engine.countModels(theory, [])).toEqual({ total: 3, counts: [{ assignment: {}, count: 3 }] });
        });

        test('unconstrained propositions are counted', () => {
            expect(engine.countSolutions(theoryOf(['p', 'q', 'r'], p))).toBe(4);
        });

        test('unsatisfiable theory has no buckets', () => {
            expect(engine.countModels(theoryOf(['p'], p, createNot(p)), ['p'])).toEqual({ total: 0, counts: [] });
        });

        test('empty subset of an unsatisfiable theory keeps its single bucket', () => {
            expect(engine.countModels(theoryOf(['p'], p, createNot(p)), [])).toEqual({
                total: 0,
                counts: [{ assignment: {}, count: 0 }],
            });
        });

        test('reports progress every thousand models', () => {
            const names = Array.from({ length: 10 }, (_, i) => `v${i}`);
            const onProgress = jest.fn();
            expect(engine.countSolutions(theoryOf(names), { onProgress })).toBe(1024);
            expect(onProgress.mock.calls).toEqual([[undefined, 'Enumerated 1000 models']]);
        });

        test('exceeding maxModels throws instead of truncating', () => {
            expect(errorCode(() => engine.countModels(theory, ['p'], { maxModels: 2 }))).toBe('MODEL_LIMIT');
            expect(engine.countModels(theory, ['p'], { maxModels: 3 }).total).toBe(3);
        });

        test('engine defaults apply when options are absent', () => {
            const capped = new QueryEngine(undefined, { maxModels: 1 });
            expect(errorCode(() => capped.countSolutions(theory))).toBe('MODEL_LIMIT');
        });

        test('unknown subset names are rejected', () => {
            expect(errorCode(() => engine.countModels(theory, ['r']))).toBe('UNKNOWN_TARGET');
        });
    });

    describe('likelihood', () => {
        test('share of models satisfying the target', () => {
            const theory = theoryOf(['p', 'q'], createOr(p, q));
            expect(engine.likelihood(theory, createAnd(p, q))).toEqual({ favourable: 1, total: 3, probability: 1 / 3 });
        });

        test('no probability without models', () => {
            const theory = theoryOf(['p'], p, createNot(p));
            expect(engine.likelihood(theory, 'p')).toEqual({ favourable: 0, total: 0 });
        });
    });

    describe('backend failures', () => {
        const failing: SolverBackend = {
            name: 'failing',
            check: () => {
                throw createBackendError('malformed result');
            },
            createSession: () => {
                throw createBackendError('malformed result');
            },
        };

        test('propagate to the caller', () => {
            const broken = new QueryEngine(failing);
            const theory = theoryOf(['p'], p);
            expect(errorCode(() => broken.isSatisfiable(theory))).toBe('BACKEND_ERROR');
            expect(errorCode(() => broken.countSolutions(theory))).toBe('BACKEND_ERROR');
        });
    });
});
