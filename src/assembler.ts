/**
 * Theory Assembler
 *
 * Aggregates a registry and its constraints into a Theory, then checks the
 * result is satisfiable. An inconsistent rule set is reported with the
 * labels of a conflicting subset instead of surfacing later as empty answers.
 */

import type { AssembleOptions, Constraint } from './types/index.js';
import { DEFAULTS } from './types/options.js';
import { createInconsistentTheoryError } from './types/errors.js';
import type { SolverBackend } from './engines/interface.js';
import { createSATBackend } from './engines/sat/index.js';
import type { PropositionRegistry } from './registry.js';
import type { Encoding } from './encoder/index.js';
import { QueryEngine } from './query.js';
import { Theory } from './theory.js';

export interface AssemblyOptions extends AssembleOptions {
    backend?: SolverBackend;
}

export interface Conflict {
    labels: string[];
    /** Every listed constraint is needed for the conflict */
    minimal: boolean;
}

/**
 * Deletion-based shrinking: drop each constraint in turn and keep it out
 * whenever the rest stays unsatisfiable.
 */
export function findConflict(
    theory: Theory,
    backend: SolverBackend,
    options: Pick<AssembleOptions, 'conflictSearchLimit' | 'onProgress'> = {}
): Conflict {
    const limit = options.conflictSearchLimit ?? DEFAULTS.conflictSearchLimit;
    let core: readonly Constraint[] = theory.constraints;
    let calls = 0;

    for (let i = 0; i < core.length;) {
        if (calls >= limit) {
            return { labels: core.map(c => c.label), minimal: false };
        }
        const candidate = [...core.slice(0, i), ...core.slice(i + 1)];
        calls++;
        options.onProgress?.(i / core.length, `Shrinking conflict (${core.length} constraints)`);
        const sat = backend.check({
            variables: theory.variables,
            constraints: candidate.map(c => c.formula),
        }).sat;
        if (sat) {
            i++;
        } else {
            core = candidate;
        }
    }
    return { labels: core.map(c => c.label), minimal: true };
}

/**
 * Build a theory from a registry and either a constraint list or a full
 * encoding (constraints plus definitions).
 */
export function assemble(
    registry: PropositionRegistry,
    input: readonly Constraint[] | Encoding,
    options: AssemblyOptions = {}
): Theory {
    const encoding: Encoding = isConstraintList(input) ? { constraints: input, definitions: new Map() } : input;
    const theory = new Theory(registry.all(), encoding.constraints, encoding.definitions);

    if (options.selfCheck === false) {
        return theory;
    }

    const backend = options.backend ?? createSATBackend();
    options.onProgress?.(undefined, 'Checking theory consistency');
    if (!new QueryEngine(backend).isSatisfiable(theory)) {
        const conflict = findConflict(theory, backend, options);
        throw createInconsistentTheoryError(conflict.labels, conflict.minimal);
    }
    return theory;
}

function isConstraintList(input: readonly Constraint[] | Encoding): input is readonly Constraint[] {
    return Array.isArray(input);
}
