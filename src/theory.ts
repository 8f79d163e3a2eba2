/**
 * Theory
 *
 * Immutable bundle of propositions, constraints and query-only definitions.
 * Every name a constraint or definition mentions must be a proposition of
 * the theory; the constructor rejects dangling references.
 */

import type { Constraint, Formula } from './types/index.js';
import {
    createDanglingReferenceError,
    createUnknownTargetError,
} from './types/errors.js';
import type { Proposition } from './registry.js';
import type { SolverProblem } from './engines/interface.js';
import { collectPropositions, createAssignment, createProp } from './formula/index.js';

/**
 * Theory size, as reported to external validation tooling.
 */
export interface TheorySize {
    propositions: number;
    constraints: number;
    definitions: number;
}

export class Theory {
    private readonly byName: ReadonlyMap<string, Proposition>;
    readonly constraints: readonly Constraint[];
    readonly definitions: ReadonlyMap<string, Formula>;

    constructor(
        propositions: readonly Proposition[],
        constraints: readonly Constraint[],
        definitions: ReadonlyMap<string, Formula> = new Map()
    ) {
        this.byName = new Map(propositions.map(p => [p.name, p]));
        for (const constraint of constraints) {
            this.checkReferences(constraint.formula, constraint.label);
        }
        for (const [name, formula] of definitions) {
            this.checkReferences(formula, `definition ${name}`);
        }
        this.constraints = Object.freeze([...constraints]);
        this.definitions = new Map(definitions);
    }

    private checkReferences(formula: Formula, label: string): void {
        for (const name of collectPropositions(formula)) {
            if (!this.byName.has(name)) {
                throw createDanglingReferenceError(name, label);
            }
        }
    }

    get propositions(): Proposition[] {
        return Array.from(this.byName.values());
    }

    /** Proposition names, the solver's variable universe */
    get variables(): string[] {
        return Array.from(this.byName.keys());
    }

    hasProposition(name: string): boolean {
        return this.byName.has(name);
    }

    size(): TheorySize {
        return {
            propositions: this.byName.size,
            constraints: this.constraints.length,
            definitions: this.definitions.size,
        };
    }

    /**
     * Turn a query target into a formula over this theory.
     * A name resolves to a proposition first, then to a definition.
     */
    resolveTarget(target: string | Formula): Formula {
        if (typeof target === 'string') {
            if (this.byName.has(target)) return createProp(target);
            const definition = this.definitions.get(target);
            if (!definition) throw createUnknownTargetError(target);
            return definition;
        }
        for (const name of collectPropositions(target)) {
            if (!this.byName.has(name)) throw createUnknownTargetError(name);
        }
        return target;
    }

    /**
     * New theory with extra constraints. No consistency check runs:
     * an unsatisfiable extension is a valid thing to query.
     */
    extend(constraints: readonly Constraint[]): Theory {
        return new Theory(this.propositions, [...this.constraints, ...constraints], this.definitions);
    }

    /**
     * New theory with the given propositions fixed.
     */
    assume(facts: Record<string, boolean>): Theory {
        if (Object.keys(facts).length === 0) return this;
        const label = `given ${Object.entries(facts).map(([k, v]) => (v ? k : `-${k}`)).join(', ')}`;
        return this.extend([{ label, formula: createAssignment(facts) }]);
    }

    toProblem(extra: readonly Formula[] = []): SolverProblem {
        return {
            variables: this.variables,
            constraints: [...this.constraints.map(c => c.formula), ...extra],
        };
    }
}
