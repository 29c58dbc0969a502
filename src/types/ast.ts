/**
 * Abstract Syntax Tree (AST) Types for Propositional Formulas
 *
 * The node set is closed: every consumer switches exhaustively on `type`.
 */

export type BinaryOperator =
    | 'and'
    | 'or'
    | 'xor'
    | 'implies'
    | 'iff';

export type FormulaType = 'atom' | 'not' | BinaryOperator;

export interface AtomFormula {
    readonly type: 'atom';
    readonly name: string;
}

export interface NotFormula {
    readonly type: 'not';
    readonly operand: Formula;
}

export interface BinaryFormula {
    readonly type: BinaryOperator;
    readonly left: Formula;
    readonly right: Formula;
}

export type Formula = AtomFormula | NotFormula | BinaryFormula;

/** A formula paired with the column name it is reported under. */
export interface NamedFormula {
    name: string;
    formula: Formula;
}

/**
 * Truth assignment of atom names. Atoms absent from the assignment are false.
 */
export type Assignment = ReadonlyMap<string, boolean> | Readonly<Record<string, boolean>>;
