import type { Formula, AtomFormula, NotFormula, BinaryFormula } from '../types/index.js';

export function createAtom(name: string): AtomFormula {
    return { type: 'atom', name };
}

export function createNot(operand: Formula): NotFormula {
    return { type: 'not', operand };
}

export function createAnd(left: Formula, right: Formula): BinaryFormula {
    return { type: 'and', left, right };
}

export function createOr(left: Formula, right: Formula): BinaryFormula {
    return { type: 'or', left, right };
}

export function createXor(left: Formula, right: Formula): BinaryFormula {
    return { type: 'xor', left, right };
}

export function createImplies(left: Formula, right: Formula): BinaryFormula {
    return { type: 'implies', left, right };
}

export function createIff(left: Formula, right: Formula): BinaryFormula {
    return { type: 'iff', left, right };
}
