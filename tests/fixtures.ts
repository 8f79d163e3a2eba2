/**
 * Shared test fixtures.
 */
import type { WarModelConfigInput } from '../src/config.js';
import type { ModelCount } from '../src/query.js';
import type { Constraint, Formula } from '../src/types/index.js';
import { LogicException } from '../src/types/errors.js';

/**
 * Three ranks, two cards each: one initial round and one war round.
 * Small enough to enumerate every model (18 in total).
 */
export const SMALL: WarModelConfigInput = { ranks: 3, deckSize: 2 };

/** Full 13-rank deck, initial round only. */
export const SINGLE_ROUND: WarModelConfigInput = { maxWarDepth: 0 };

export function constraint(label: string, formula: Formula): Constraint {
    return { label, formula };
}

/**
 * Count of the bucket matching an assignment, or 0 if none matches.
 */
export function bucketCount(result: ModelCount, assignment: Record<string, boolean>): number {
    const bucket = result.counts.find(b =>
        Object.entries(assignment).every(([name, value]) => b.assignment[name] === value));
    return bucket ? bucket.count : 0;
}

/**
 * Run a function expected to throw a LogicException and return it.
 */
export function catchLogicException(fn: () => unknown): LogicException {
    try {
        fn();
    } catch (e) {
        if (e instanceof LogicException) return e;
        throw e;
    }
    throw new Error('expected a LogicException');
}

export function errorCode(fn: () => unknown): string {
    return catchLogicException(fn).code;
}
