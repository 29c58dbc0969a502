import type { Formula } from '../types/index.js';
import { LogicException } from '../types/errors.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';

export type ParseResult =
    | { ok: true; formula: Formula }
    | { ok: false; error: LogicException };

/**
 * Parse a propositional formula string into an AST
 */
export function parse(input: string): Formula {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens, input);
    return parser.parse();
}

/**
 * Parse without throwing on syntax errors.
 * Anything other than a LogicException is still rethrown.
 */
export function tryParse(input: string): ParseResult {
    try {
        return { ok: true, formula: parse(input) };
    } catch (e) {
        if (e instanceof LogicException) {
            return { ok: false, error: e };
        }
        throw e;
    }
}
