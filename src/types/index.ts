/**
 * Shared type definitions
 */

export {
    LogicException,
    isLogicException,
    createConfigError,
    createInvalidPropositionError,
    createIncompatiblePropositionError,
    createDanglingReferenceError,
    createInconsistentTheoryError,
    createUnknownTargetError,
    createModelLimitError,
    createBackendError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    LogicError,
} from './errors.js';

export type {
    FormulaType,
    PropFormula,
    ConstFormula,
    NotFormula,
    NaryFormula,
    BinaryFormula,
    ExactlyOneFormula,
    AtMostFormula,
    MoreThanFormula,
    Formula,
    Constraint,
    Model,
} from './formula.js';

export { DEFAULTS } from './options.js';

export type {
    ProgressCallback,
    FairnessConfig,
    WarModelConfig,
    QueryOptions,
    AssembleOptions,
} from './options.js';
