import type { Formula, Model } from '../types/index.js';
import { createUnknownTargetError } from '../types/errors.js';

function countTrue(operands: Formula[], model: Model): number {
    return operands.filter(op => evaluate(op, model)).length;
}

/**
 * Evaluate a formula under a complete assignment.
 * Throws UNKNOWN_TARGET if the model does not assign a mentioned proposition.
 */
export function evaluate(formula: Formula, model: Model): boolean {
    switch (formula.type) {
        case 'prop': {
            const value = model.get(formula.name);
            if (value === undefined) {
                throw createUnknownTargetError(formula.name);
            }
            return value;
        }
        case 'const':
            return formula.value;
        case 'not':
            return !evaluate(formula.operand, model);
        case 'and':
            return formula.operands.every(op => evaluate(op, model));
        case 'or':
            return formula.operands.some(op => evaluate(op, model));
        case 'implies':
            return !evaluate(formula.left, model) || evaluate(formula.right, model);
        case 'iff':
            return evaluate(formula.left, model) === evaluate(formula.right, model);
        case 'exactlyOne':
            return countTrue(formula.operands, model) === 1;
        case 'atMost':
            return countTrue(formula.operands, model) <= formula.limit;
        case 'moreThan':
            return countTrue(formula.left, model) > countTrue(formula.right, model) + formula.margin;
    }
}
