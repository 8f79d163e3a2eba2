import type { Formula } from '../types/index.js';

export const TRUE: Formula = { type: 'const', value: true };
export const FALSE: Formula = { type: 'const', value: false };

export function createProp(name: string): Formula {
    return { type: 'prop', name };
}

export function createNot(operand: Formula): Formula {
    return { type: 'not', operand };
}

export function createAnd(...operands: Formula[]): Formula {
    return { type: 'and', operands };
}

export function createOr(...operands: Formula[]): Formula {
    return { type: 'or', operands };
}

export function createImplies(left: Formula, right: Formula): Formula {
    return { type: 'implies', left, right };
}

export function createIff(left: Formula, right: Formula): Formula {
    return { type: 'iff', left, right };
}

export function createExactlyOne(operands: Formula[]): Formula {
    return { type: 'exactlyOne', operands };
}

export function createAtMost(limit: number, operands: Formula[]): Formula {
    return { type: 'atMost', limit, operands };
}

export function createAtMostOne(operands: Formula[]): Formula {
    return createAtMost(1, operands);
}

export function createMoreThan(left: Formula[], right: Formula[], margin = 0): Formula {
    return { type: 'moreThan', left, right, margin };
}

/**
 * Conjunction of unit literals fixing the given propositions.
 */
export function createAssignment(facts: Record<string, boolean>): Formula {
    return createAnd(
        ...Object.entries(facts).map(([name, value]) =>
            value ? createProp(name) : createNot(createProp(name)))
    );
}
