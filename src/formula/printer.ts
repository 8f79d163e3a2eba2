import type { Formula } from '../types/index.js';

function list(operands: Formula[]): string {
    return operands.map(formulaToString).join(', ');
}

/**
 * Pretty-print a formula using the `-`, `&`, `|`, `->`, `<->` operators.
 */
export function formulaToString(formula: Formula): string {
    switch (formula.type) {
        case 'prop':
            return formula.name;
        case 'const':
            return formula.value ? '$true' : '$false';
        case 'not':
            return `-${formulaToString(formula.operand)}`;
        case 'and':
            if (formula.operands.length === 0) return '$true';
            if (formula.operands.length === 1) return formulaToString(formula.operands[0]);
            return `(${formula.operands.map(formulaToString).join(' & ')})`;
        case 'or':
            if (formula.operands.length === 0) return '$false';
            if (formula.operands.length === 1) return formulaToString(formula.operands[0]);
            return `(${formula.operands.map(formulaToString).join(' | ')})`;
        case 'implies':
            return `(${formulaToString(formula.left)} -> ${formulaToString(formula.right)})`;
        case 'iff':
            return `(${formulaToString(formula.left)} <-> ${formulaToString(formula.right)})`;
        case 'exactlyOne':
            return `exactlyOne(${list(formula.operands)})`;
        case 'atMost':
            return `atMost${formula.limit}(${list(formula.operands)})`;
        case 'moreThan': {
            if (formula.right.length === 0) return `count(${list(formula.left)}) > ${formula.margin}`;
            const margin = formula.margin === 0 ? '' : ` + ${formula.margin}`;
            return `count(${list(formula.left)}) > count(${list(formula.right)})${margin}`;
        }
    }
}
