import type { Formula } from '../types/index.js';

/**
 * Direct children of a formula node, in operand order.
 */
export function children(formula: Formula): Formula[] {
    switch (formula.type) {
        case 'prop':
        case 'const':
            return [];
        case 'not':
            return [formula.operand];
        case 'implies':
        case 'iff':
            return [formula.left, formula.right];
        case 'moreThan':
            return [...formula.left, ...formula.right];
        case 'and':
        case 'or':
        case 'exactlyOne':
        case 'atMost':
            return formula.operands;
    }
}

/**
 * Generic formula visitor (pre-order)
 */
export function traverse(formula: Formula, visitor: (node: Formula) => void): void {
    visitor(formula);
    for (const child of children(formula)) {
        traverse(child, visitor);
    }
}

/**
 * Names of every proposition the formula mentions, in first-seen order.
 */
export function collectPropositions(formula: Formula): string[] {
    const names = new Set<string>();
    traverse(formula, node => {
        if (node.type === 'prop') names.add(node.name);
    });
    return Array.from(names);
}
