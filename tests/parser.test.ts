/**
 * Tokenizer and parser tests
 */

import { parse, tryParse, Tokenizer } from '../src/parser/index.js';
import { createAnd, createAtom, createIff, createImplies, createNot, createOr, createXor } from '../src/ast/index.js';
import { LogicException } from '../src/types/errors.js';

const A = createAtom('A');
const B = createAtom('B');
const C = createAtom('C');

function parseError(input: string): LogicException {
    try {
        parse(input);
    } catch (e) {
        if (e instanceof LogicException) return e;
        throw e;
    }
    throw new Error(`expected '${input}' to fail`);
}

describe('Tokenizer', () => {
    test('matches multi-character operators before single ones', () => {
        const tokens = new Tokenizer('A <-> B -> ~C').tokenize();
        expect(tokens.map(t => t.type)).toEqual(['IDENT', 'IFF', 'IDENT', 'IMPLIES', 'NOT', 'IDENT', 'EOF']);
        expect(tokens.map(t => t.position)).toEqual([0, 2, 6, 8, 11, 12, 13]);
    });

    test('classifies word operators case-insensitively and keeps their text', () => {
        const tokens = new Tokenizer('a and b Or not c xor d').tokenize();
        expect(tokens.map(t => t.type)).toEqual([
            'IDENT', 'AND', 'IDENT', 'OR', 'NOT', 'IDENT', 'XOR', 'IDENT', 'EOF',
        ]);
        expect(tokens[3].value).toBe('Or');
    });

    test('reads maximal identifier runs', () => {
        const tokens = new Tokenizer('Android ANDY loan_ok2').tokenize();
        expect(tokens.map(t => [t.type, t.value])).toEqual([
            ['IDENT', 'Android'],
            ['IDENT', 'ANDY'],
            ['IDENT', 'loan_ok2'],
            ['EOF', ''],
        ]);
    });

    test('maps symbolic operators', () => {
        const tokens = new Tokenizer('(A&B)|~C').tokenize();
        expect(tokens.map(t => t.type)).toEqual([
            'LPAREN', 'IDENT', 'AND', 'IDENT', 'RPAREN', 'OR', 'NOT', 'IDENT', 'EOF',
        ]);
    });

    test('ends with a single EOF token', () => {
        const tokens = new Tokenizer('   ').tokenize();
        expect(tokens).toEqual([{ type: 'EOF', value: '', position: 3 }]);
    });

    test('rejects unknown characters with their position', () => {
        const error = parseError('A $ B');
        expect(error.code).toBe('PARSE_ERROR');
        expect(error.message).toBe("Unexpected character '$' at position 2");
        expect(error.error.span?.start).toBe(2);
        expect(error.error.details).toEqual({ character: '$' });
    });
});

describe('Parser', () => {
    test('parses a single atom', () => {
        expect(parse('Fever')).toEqual({ type: 'atom', name: 'Fever' });
    });

    test('AND binds tighter than OR', () => {
        expect(parse('A AND B OR C')).toEqual(createOr(createAnd(A, B), C));
        expect(parse('A OR B AND C')).toEqual(createOr(A, createAnd(B, C)));
    });

    test('XOR sits between AND and OR', () => {
        expect(parse('A XOR B AND C')).toEqual(createXor(A, createAnd(B, C)));
        expect(parse('A OR B XOR C')).toEqual(createOr(A, createXor(B, C)));
    });

    test('IFF is loosest, then IMPLIES', () => {
        expect(parse('A <-> B -> C')).toEqual(createIff(A, createImplies(B, C)));
    });

    test('binary operators fold left', () => {
        expect(parse('A -> B -> C')).toEqual(createImplies(createImplies(A, B), C));
        expect(parse('A OR B OR C')).toEqual(createOr(createOr(A, B), C));
    });

    test('NOT is prefix and binds tightest', () => {
        expect(parse('NOT A AND B')).toEqual(createAnd(createNot(A), B));
        expect(parse('NOT NOT A')).toEqual(createNot(createNot(A)));
        expect(parse('~(A | B)')).toEqual(createNot(createOr(A, B)));
    });

    test('parentheses override precedence', () => {
        expect(parse('(A OR B) AND C')).toEqual(createAnd(createOr(A, B), C));
    });

    test('preserves identifier case', () => {
        expect(parse('fever')).toEqual(createAtom('fever'));
    });

    test('rejects a doubled binary operator', () => {
        const error = parseError('A AND AND B');
        expect(error.code).toBe('PARSE_ERROR');
        expect(error.message).toBe("Unexpected token 'AND' at position 6 where an atom or '(' was expected");
        expect(error.error.suggestion).toBe("Two binary operators in a row - an atom or '(' must come between them");
    });

    test('reports a missing closing parenthesis', () => {
        const error = parseError('(A AND B');
        expect(error.message).toBe('Expected RPAREN but found EOF at position 8');
        expect(error.error.details).toEqual({ expected: 'RPAREN', found: 'EOF' });
        expect(error.error.suggestion).toBe("Unbalanced parentheses - missing closing ')'");
    });

    test('reports trailing input after a complete formula', () => {
        const error = parseError('A B');
        expect(error.message).toBe("Unexpected token 'B' after a complete formula");
        expect(error.error.span?.start).toBe(2);
    });

    test('reports empty input', () => {
        const error = parseError('');
        expect(error.message).toBe("Unexpected end of input at position 0 where an atom or '(' was expected");
    });

    test('reports a dangling implication', () => {
        const error = parseError('A ->');
        expect(error.error.suggestion).toBe("Incomplete implication - missing consequent after '->'");
    });
});

describe('tryParse', () => {
    test('returns the formula on success', () => {
        const result = tryParse('A & B');
        expect(result).toEqual({ ok: true, formula: createAnd(A, B) });
    });

    test('returns the error instead of throwing', () => {
        const result = tryParse('A AND AND B');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.code).toBe('PARSE_ERROR');
        }
    });
});
