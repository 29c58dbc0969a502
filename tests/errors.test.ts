/**
 * Tests for structured error system
 */

import {
    LogicError,
    LogicException,
    getSuggestion,
    createParseError,
    createRuleLoadError,
    createTableTooLargeError,
    serializeLogicError,
} from '../src/types/errors.js';
import { evaluate } from '../src/utils/evaluation.js';

describe('LogicException', () => {
    test('wraps the error object', () => {
        const error: LogicError = {
            code: 'PARSE_ERROR',
            message: 'Unexpected token',
            span: { start: 5, end: 6, line: 1, col: 6 },
            suggestion: 'Check your syntax',
            context: 'A AND',
        };

        const exception = new LogicException(error);

        expect(exception).toBeInstanceOf(Error);
        expect(exception.name).toBe('LogicException');
        expect(exception.message).toBe('Unexpected token');
        expect(exception.code).toBe('PARSE_ERROR');
        expect(exception.toJSON()).toBe(error);
    });
});

describe('getSuggestion', () => {
    test.each([
        ['(A AND B', "Unbalanced parentheses - missing closing ')'"],
        ['A AND B)', "Unbalanced parentheses - missing opening '('"],
        ['A <->', "Incomplete biconditional - missing right side after '<->'"],
        ['A ->', "Incomplete implication - missing consequent after '->'"],
        ['A AND', 'Incomplete conjunction - missing right operand after AND'],
        ['A |', 'Incomplete disjunction - missing right operand after OR'],
        ['A XOR', 'Incomplete exclusive-or - missing right operand after XOR'],
        ['A AND ~', 'Incomplete negation - missing operand after NOT'],
        ['A AND OR B', "Two binary operators in a row - an atom or '(' must come between them"],
        ['A != B', "Use NOT or '~' for negation and '<->' for equivalence"],
    ])('%s', (input, suggestion) => {
        expect(getSuggestion(input)).toBe(suggestion);
    });

    test('no suggestion for well-formed input', () => {
        expect(getSuggestion('A AND B')).toBeUndefined();
    });
});

describe('error factories', () => {
    test('parse error carries span and context', () => {
        const e = createParseError('Unexpected token', 'A\nB )', 4);
        expect(e.error.span).toEqual({ start: 4, end: 5, line: 2, col: 3 });
        expect(e.error.context).toBe('A\nB )');
        expect(e.error.suggestion).toBe("Unbalanced parentheses - missing opening '('");
    });

    test('rule load error prefixes its message', () => {
        const e = createRuleLoadError('bad record', { index: 2 });
        expect(e.code).toBe('RULE_LOAD_ERROR');
        expect(e.message).toBe('Failed to load rules: bad record');
        expect(e.error.details).toEqual({ index: 2 });
    });

    test('table too large', () => {
        const e = createTableTooLargeError(20, 16);
        expect(e.code).toBe('TABLE_TOO_LARGE');
        expect(e.message).toBe('Too many atoms (20) for a full truth table; the limit is 16');
        expect(e.error.details).toEqual({ atomCount: 20, maxAtoms: 16 });
    });

    test('unknown formula node is an internal error', () => {
        const bogus = JSON.parse('{"type":"nand"}');
        expect(() => evaluate(bogus, {})).toThrow('Internal error: Unexpected formula node: {"type":"nand"}');
        try {
            evaluate(bogus, {});
        } catch (e) {
            expect(e).toBeInstanceOf(LogicException);
            if (e instanceof LogicException) expect(e.code).toBe('INTERNAL_ERROR');
        }
    });
});

describe('serializeLogicError', () => {
    test('omits absent fields', () => {
        expect(serializeLogicError({ code: 'CONFIG_ERROR', message: 'bad' })).toEqual({
            code: 'CONFIG_ERROR',
            message: 'bad',
        });
    });

    test('keeps present fields', () => {
        const e = createTableTooLargeError(3, 2);
        expect(serializeLogicError(e.error)).toEqual({
            code: 'TABLE_TOO_LARGE',
            message: 'Too many atoms (3) for a full truth table; the limit is 2',
            suggestion: 'Evaluate against the current facts instead, or raise PDM_MAX_TABLE_ATOMS',
            details: { atomCount: 3, maxAtoms: 2 },
        });
    });
});
