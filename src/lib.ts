/**
 * War Logic - Library Entry Point
 *
 * Exports the theory construction and query layer. Printing results is left
 * to callers.
 */

// Analysis call sequence
export {
    analyzeWar,
    buildWarTheory,
    defaultQueries,
    runQueries,
} from './analysis.js';
export type {
    AnalysisOptions,
    AnalysisReport,
    NamedQuery,
    QueryAnswer,
    WarTheory,
} from './analysis.js';

// Configuration
export { fundedWarDepth, resolveConfig, warModelConfigSchema } from './config.js';
export type { WarModelConfigInput } from './config.js';

// Registry, encoder, assembler
export { PropositionRegistry, createRegistry } from './registry.js';
export type { Proposition, PropositionRole } from './registry.js';
export * from './encoder/index.js';
export { assemble, findConflict } from './assembler.js';
export type { AssemblyOptions, Conflict } from './assembler.js';
export { Theory } from './theory.js';
export type { TheorySize } from './theory.js';

// Queries
export { QueryEngine, createQueryEngine } from './query.js';
export type { Likelihood, ModelBucket, ModelCount, ModelResult } from './query.js';

// Solver backends
export * from './engines/index.js';

// Formulas
export * from './formula/index.js';

// Types and Interfaces
export * from './types/index.js';
