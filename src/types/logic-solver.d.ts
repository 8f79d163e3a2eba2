/**
 * Type declarations for logic-solver package
 *
 * logic-solver is a MiniSat-based SAT solver compiled to JavaScript.
 * https://www.npmjs.com/package/logic-solver
 */

declare module 'logic-solver' {
    namespace Logic {
        type Formula = string | FormulaObject;

        interface FormulaObject {
            type: string;
        }

        /**
         * Unsigned integer as a little-endian list of formulas.
         */
        interface Bits {
            bits: Formula[];
        }

        type Operand = Formula | Bits | Array<Formula | Bits>;

        interface Solver {
            /**
             * Require formulas to be true.
             */
            require(...formulas: Array<Formula | Formula[]>): void;

            /**
             * Require formulas to be false.
             */
            forbid(...formulas: Array<Formula | Formula[]>): void;

            /**
             * Solve the constraints and return a solution, or null if unsatisfiable.
             */
            solve(): Solution | null;

            /**
             * Solve with a temporary assumption, without requiring it permanently.
             */
            solveAssuming(formula: Formula): Solution | null;

            /**
             * Variable number for a name, creating the variable unless noCreate is set.
             */
            getVarNum(name: string, noCreate?: boolean): number;
        }

        interface Solution {
            /**
             * Get the assignment map from variable names to booleans.
             */
            getMap(): Record<string, boolean>;

            /**
             * Get the list of variables that are true.
             */
            getTrueVars(): string[];

            /**
             * Evaluate a formula in this solution.
             */
            evaluate(formula: Formula): boolean;

            /**
             * Formula that is true only for this assignment.
             */
            getFormula(): Formula;
        }
    }

    interface LogicStatic {
        Solver: new () => Logic.Solver;

        or(...operands: Array<Logic.Formula | Logic.Formula[]>): Logic.Formula;
        and(...operands: Array<Logic.Formula | Logic.Formula[]>): Logic.Formula;
        not(operand: Logic.Formula): Logic.Formula;
        implies(a: Logic.Formula, b: Logic.Formula): Logic.Formula;
        equiv(a: Logic.Formula, b: Logic.Formula): Logic.Formula;
        xor(...operands: Array<Logic.Formula | Logic.Formula[]>): Logic.Formula;
        exactlyOne(...operands: Array<Logic.Formula | Logic.Formula[]>): Logic.Formula;
        atMostOne(...operands: Array<Logic.Formula | Logic.Formula[]>): Logic.Formula;

        /**
         * Number of true operands, as Bits.
         */
        sum(...operands: Logic.Operand[]): Logic.Bits;
        constantBits(value: number): Logic.Bits;
        greaterThan(a: Logic.Bits, b: Logic.Bits): Logic.Formula;
        lessThanOrEqual(a: Logic.Bits, b: Logic.Bits): Logic.Formula;

        TRUE: Logic.Formula;
        FALSE: Logic.Formula;
    }

    const Logic: LogicStatic;
    export = Logic;
}
