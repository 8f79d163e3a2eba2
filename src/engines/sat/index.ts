/**
 * SAT Backend
 *
 * Solver backend using the logic-solver package (MiniSat compiled to JS).
 */

import { SatResult, SolverBackend, SolverProblem, SolverSession } from '../interface.js';
import { SATSession } from './session.js';

export class SATBackend implements SolverBackend {
    readonly name = 'sat/minisat';

    createSession(problem: SolverProblem): SolverSession {
        return new SATSession(problem);
    }

    /**
     * Single satisfiability check with statistics.
     */
    check(problem: SolverProblem): SatResult {
        const startTime = Date.now();
        const model = this.createSession(problem).solve();
        const statistics = {
            timeMs: Date.now() - startTime,
            variables: problem.variables.length,
            constraints: problem.constraints.length,
        };
        return model ? { sat: true, model, statistics } : { sat: false, statistics };
    }
}

/**
 * Create a new SAT backend instance.
 */
export function createSATBackend(): SATBackend {
    return new SATBackend();
}

export { SATSession } from './session.js';
export { toLogicFormula } from './translator.js';
