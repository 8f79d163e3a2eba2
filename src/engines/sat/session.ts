import Logic from 'logic-solver';
import type { Model } from '../../types/index.js';
import { createBackendError } from '../../types/errors.js';
import { SolverProblem, SolverSession } from '../interface.js';
import { toLogicFormula } from './translator.js';

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/**
 * One logic-solver instance. forbid() adds a blocking clause over the
 * whole variable universe, so each model is returned once.
 */
export class SATSession implements SolverSession {
    private readonly solver: Logic.Solver;
    private readonly variables: readonly string[];
    private readonly empty: boolean;
    private exhausted = false;

    constructor(problem: SolverProblem) {
        this.variables = problem.variables;
        this.empty = problem.variables.length === 0 && problem.constraints.length === 0;
        this.solver = new Logic.Solver();
        try {
            // Unconstrained variables must still show up in every model
            for (const v of problem.variables) {
                this.solver.getVarNum(v);
            }
            for (const constraint of problem.constraints) {
                this.solver.require(toLogicFormula(constraint));
            }
        } catch (e) {
            throw createBackendError(`could not load problem: ${errorMessage(e)}`);
        }
    }

    solve(): Model | null {
        if (this.exhausted) return null;
        // Empty theory: trivially satisfiable by the empty assignment
        if (this.empty) return new Map();

        let solution: Logic.Solution | null;
        try {
            solution = this.solver.solve();
        } catch (e) {
            throw createBackendError(`solve failed: ${errorMessage(e)}`);
        }
        if (!solution) return null;

        const assignment = solution.getMap();
        const model = new Map<string, boolean>();
        for (const v of this.variables) {
            const value = assignment[v];
            if (typeof value !== 'boolean') {
                throw createBackendError(`solution has no value for '${v}'`, { variable: v });
            }
            model.set(v, value);
        }
        return model;
    }

    forbid(model: Model): void {
        // The only assignment over no variables is the empty one
        if (this.variables.length === 0) {
            this.exhausted = true;
            return;
        }

        const blocking = this.variables.map(v => {
            const value = model.get(v);
            if (value === undefined) {
                throw createBackendError(`cannot forbid a model without '${v}'`, { variable: v });
            }
            return value ? Logic.not(v) : v;
        });
        this.solver.require(Logic.or(blocking));
    }
}
