export {
    createAtom,
    createNot,
    createAnd,
    createOr,
    createXor,
    createImplies,
    createIff,
} from './factory.js';
export { traverse, collectAtoms, formulasEqual } from './visitor.js';
export { formulaToString, PRECEDENCE, OPERATOR_SYMBOLS } from './printer.js';
