/**
 * Formula construction, traversal, evaluation and printing.
 */

export * from './factory.js';
export { children, traverse, collectPropositions } from './visitor.js';
export { evaluate } from './evaluate.js';
export { formulaToString } from './printer.js';
