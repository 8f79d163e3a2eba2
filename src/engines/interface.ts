/**
 * Solver Backend Interface
 *
 * Narrow contract between the query layer and a SAT engine: solve once, or
 * open a session that accepts blocking clauses to enumerate further models.
 */

import type { Formula, Model } from '../types/index.js';

/**
 * Variable universe plus constraints. Every variable appears in returned
 * models, whether or not a constraint mentions it.
 */
export interface SolverProblem {
    readonly variables: readonly string[];
    readonly constraints: readonly Formula[];
}

/**
 * Result of a satisfiability check
 */
export interface SatResult {
    /** Whether the problem is satisfiable */
    sat: boolean;
    /** Complete assignment if satisfiable */
    model?: Model;
    statistics: {
        timeMs: number;
        variables: number;
        constraints: number;
    };
}

/**
 * Incremental solving state for one problem.
 */
export interface SolverSession {
    /** Next model, or null once none remain */
    solve(): Model | null;
    /** Exclude a model from every later solve() */
    forbid(model: Model): void;
}

export interface SolverBackend {
    /** Unique name of the backend */
    readonly name: string;
    createSession(problem: SolverProblem): SolverSession;
    check(problem: SolverProblem): SatResult;
}
