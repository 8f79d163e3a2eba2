/**
 * Query Layer
 *
 * Satisfiability, model finding, entailment by refutation and model counting
 * over an assembled theory. Negative answers are ordinary return values;
 * only construction defects and backend failures throw.
 */

import type { Formula, Model, QueryOptions } from './types/index.js';
import { DEFAULTS } from './types/options.js';
import { createModelLimitError, createUnknownTargetError } from './types/errors.js';
import type { SolverBackend } from './engines/interface.js';
import { createSATBackend } from './engines/sat/index.js';
import { createNot, evaluate } from './formula/index.js';
import { Theory } from './theory.js';

export type ModelResult =
    | { found: true; model: Model }
    | { found: false };

export interface ModelBucket {
    /** Values of the counted subset, keyed by proposition name */
    assignment: Record<string, boolean>;
    /** Full models that agree with this assignment */
    count: number;
}

export interface ModelCount {
    /** Number of distinct full models */
    total: number;
    /** One bucket per distinct subset assignment, in discovery order */
    counts: ModelBucket[];
}

export interface Likelihood {
    favourable: number;
    total: number;
    /** favourable / total; absent when the theory has no models */
    probability?: number;
}

const PROGRESS_INTERVAL = 1000;

function subsetKey(model: Model, subset: readonly string[]): string {
    return subset.map(name => (model.get(name) ? '1' : '0')).join('');
}

export class QueryEngine {
    constructor(
        private readonly backend: SolverBackend = createSATBackend(),
        private readonly defaults: QueryOptions = {}
    ) {}

    get backendName(): string {
        return this.backend.name;
    }

    isSatisfiable(theory: Theory): boolean {
        return this.backend.check(theory.toProblem()).sat;
    }

    findModel(theory: Theory): ModelResult {
        const result = this.backend.check(theory.toProblem());
        return result.sat && result.model ? { found: true, model: result.model } : { found: false };
    }

    /**
     * Refutation: the target is entailed iff theory ∧ ¬target has no model.
     */
    isEntailed(theory: Theory, target: string | Formula): boolean {
        const formula = theory.resolveTarget(target);
        return !this.backend.check(theory.toProblem([createNot(formula)])).sat;
    }

    /**
     * The target is false in every model.
     */
    isExcluded(theory: Theory, target: string | Formula): boolean {
        return this.isEntailed(theory, createNot(theory.resolveTarget(target)));
    }

    /**
     * Every distinct full model, enumerated with blocking clauses.
     * Throws MODEL_LIMIT instead of returning a partial list.
     */
    *models(theory: Theory, options: QueryOptions = {}): Generator<Model> {
        const limit = options.maxModels ?? this.defaults.maxModels ?? DEFAULTS.maxModels;
        const onProgress = options.onProgress ?? this.defaults.onProgress;
        const session = this.backend.createSession(theory.toProblem());

        let found = 0;
        for (let model = session.solve(); model; model = session.solve()) {
            found++;
            if (found > limit) {
                throw createModelLimitError(limit);
            }
            if (onProgress && found % PROGRESS_INTERVAL === 0) {
                onProgress(undefined, `Enumerated ${found} models`);
            }
            yield model;
            session.forbid(model);
        }
    }

    /**
     * Count full models grouped by their values on a subset of propositions.
     * With an empty subset there is always exactly one bucket holding the
     * total, even when the theory has no models; a non-empty subset of an
     * unsatisfiable theory has no buckets.
     */
    countModels(theory: Theory, subset: readonly string[], options: QueryOptions = {}): ModelCount {
        const names = Array.from(new Set(subset));
        for (const name of names) {
            if (!theory.hasProposition(name)) throw createUnknownTargetError(name);
        }

        const buckets = new Map<string, ModelBucket>();
        let total = 0;
        for (const model of this.models(theory, options)) {
            total++;
            const key = subsetKey(model, names);
            const bucket = buckets.get(key);
            if (bucket) {
                bucket.count++;
            } else {
                const assignment: Record<string, boolean> = {};
                for (const name of names) assignment[name] = model.get(name) === true;
                buckets.set(key, { assignment, count: 1 });
            }
        }
        if (names.length === 0 && buckets.size === 0) {
            return { total, counts: [{ assignment: {}, count: 0 }] };
        }
        return { total, counts: Array.from(buckets.values()) };
    }

    countSolutions(theory: Theory, options: QueryOptions = {}): number {
        return this.countModels(theory, [], options).total;
    }

    /**
     * Share of models in which the target holds.
     */
    likelihood(theory: Theory, target: string | Formula, options: QueryOptions = {}): Likelihood {
        const formula = theory.resolveTarget(target);
        let total = 0;
        let favourable = 0;
        for (const model of this.models(theory, options)) {
            total++;
            if (evaluate(formula, model)) favourable++;
        }
        return total === 0 ? { favourable, total } : { favourable, total, probability: favourable / total };
    }
}

export function createQueryEngine(backend?: SolverBackend, defaults?: QueryOptions): QueryEngine {
    return new QueryEngine(backend, defaults);
}
