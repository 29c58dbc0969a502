import type { BinaryOperator, Formula, FormulaType } from '../types/index.js';

/**
 * Binding strength, loosest first. Mirrors the parser's grammar levels.
 */
export const PRECEDENCE: Readonly<Record<FormulaType, number>> = {
    iff: 1,
    implies: 2,
    or: 3,
    xor: 4,
    and: 5,
    not: 6,
    atom: 7,
};

export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOperator, string>> = {
    and: 'AND',
    or: 'OR',
    xor: 'XOR',
    implies: '->',
    iff: '<->',
};

/**
 * Pretty-print a formula back to its canonical text.
 *
 * Binary operators all fold left, so a right operand at the same level as
 * its parent keeps its parentheses; `parse(formulaToString(f))` rebuilds `f`.
 */
export function formulaToString(node: Formula): string {
    switch (node.type) {
        case 'atom':
            return node.name;
        case 'not':
            return `NOT ${wrap(node.operand, PRECEDENCE.not, false)}`;
        default: {
            const level = PRECEDENCE[node.type];
            const left = wrap(node.left, level, false);
            const right = wrap(node.right, level, true);
            return `${left} ${OPERATOR_SYMBOLS[node.type]} ${right}`;
        }
    }
}

function wrap(child: Formula, parentLevel: number, isRightOperand: boolean): string {
    const level = PRECEDENCE[child.type];
    const needsParens = level < parentLevel || (isRightOperand && level === parentLevel);
    const text = formulaToString(child);
    return needsParens ? `(${text})` : text;
}
