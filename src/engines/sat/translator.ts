/**
 * Formula to logic-solver translation.
 */

import Logic from 'logic-solver';
import type { Formula } from '../../types/index.js';

function translateAll(formulas: Formula[]): Logic.Formula[] {
    return formulas.map(toLogicFormula);
}

function atMost(limit: number, operands: Formula[]): Logic.Formula {
    if (limit >= operands.length) return Logic.TRUE;
    const terms = translateAll(operands);
    if (limit === 0) return Logic.not(Logic.or(terms));
    if (limit === 1) return Logic.atMostOne(terms);
    return Logic.lessThanOrEqual(Logic.sum(terms), Logic.constantBits(limit));
}

function moreThan(left: Formula[], right: Formula[], margin: number): Logic.Formula {
    if (left.length <= margin) return Logic.FALSE;
    const leftBits = Logic.sum(translateAll(left));
    if (right.length === 0) {
        return margin === 0
            ? Logic.or(translateAll(left))
            : Logic.greaterThan(leftBits, Logic.constantBits(margin));
    }
    const rightBits = margin === 0
        ? Logic.sum(translateAll(right))
        : Logic.sum(translateAll(right), Logic.constantBits(margin));
    return Logic.greaterThan(leftBits, rightBits);
}

export function toLogicFormula(formula: Formula): Logic.Formula {
    switch (formula.type) {
        case 'prop':
            return formula.name;
        case 'const':
            return formula.value ? Logic.TRUE : Logic.FALSE;
        case 'not':
            return Logic.not(toLogicFormula(formula.operand));
        case 'and':
            return Logic.and(translateAll(formula.operands));
        case 'or':
            return Logic.or(translateAll(formula.operands));
        case 'implies':
            return Logic.implies(toLogicFormula(formula.left), toLogicFormula(formula.right));
        case 'iff':
            return Logic.equiv(toLogicFormula(formula.left), toLogicFormula(formula.right));
        case 'exactlyOne':
            return Logic.exactlyOne(translateAll(formula.operands));
        case 'atMost':
            return atMost(formula.limit, formula.operands);
        case 'moreThan':
            return moreThan(formula.left, formula.right, formula.margin);
    }
}
