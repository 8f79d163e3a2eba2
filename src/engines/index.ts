/**
 * Solver backends
 */

export type { SolverBackend, SolverSession, SolverProblem, SatResult } from './interface.js';
export { SATBackend, SATSession, createSATBackend, toLogicFormula } from './sat/index.js';
