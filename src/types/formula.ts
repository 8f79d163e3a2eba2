/**
 * Propositional Formula Types
 *
 * The constraint language handed to the solver backend.
 * Cardinality nodes are kept as-is instead of being expanded to CNF so the
 * backend can use its own encodings for them.
 */

export type FormulaType =
    | 'prop'
    | 'const'
    | 'not'
    | 'and'
    | 'or'
    | 'implies'
    | 'iff'
    | 'exactlyOne'
    | 'atMost'
    | 'moreThan';

export interface PropFormula {
    type: 'prop';
    name: string;
}

export interface ConstFormula {
    type: 'const';
    value: boolean;
}

export interface NotFormula {
    type: 'not';
    operand: Formula;
}

/** Empty `and` is true, empty `or` is false. */
export interface NaryFormula {
    type: 'and' | 'or';
    operands: Formula[];
}

export interface BinaryFormula {
    type: 'implies' | 'iff';
    left: Formula;
    right: Formula;
}

export interface ExactlyOneFormula {
    type: 'exactlyOne';
    operands: Formula[];
}

/** At most `limit` of the operands are true. */
export interface AtMostFormula {
    type: 'atMost';
    limit: number;
    operands: Formula[];
}

/** count(left) > count(right) + margin */
export interface MoreThanFormula {
    type: 'moreThan';
    left: Formula[];
    right: Formula[];
    margin: number;
}

export type Formula =
    | PropFormula
    | ConstFormula
    | NotFormula
    | NaryFormula
    | BinaryFormula
    | ExactlyOneFormula
    | AtMostFormula
    | MoreThanFormula;

/**
 * A named constraint. The label identifies the rule it came from
 * when a conflict is reported.
 */
export interface Constraint {
    readonly label: string;
    readonly formula: Formula;
}

/**
 * Truth assignment from proposition name to value.
 */
export type Model = ReadonlyMap<string, boolean>;
