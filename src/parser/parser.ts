import type { BinaryOperator, Formula } from '../types/ast.js';
import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/**
 * Parser for propositional formulas
 *
 * Grammar (EBNF-ish), loosest binding first:
 *   formula  = iff
 *   iff      = implies ('<->' implies)*
 *   implies  = or ('->' or)*
 *   or       = xor (('OR' | '|') xor)*
 *   xor      = and ('XOR' and)*
 *   and      = unary (('AND' | '&') unary)*
 *   unary    = ('NOT' | '~') unary | primary
 *   primary  = IDENT | '(' formula ')'
 *
 * Every binary level folds left, so `a -> b -> c` is `(a -> b) -> c`.
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string) {
        this.tokens = tokens;
        this.originalInput = originalInput;
    }

    parse(): Formula {
        const result = this.parseFormula();
        if (this.current().type !== 'EOF') {
            throw createParseError(
                `Unexpected token '${this.current().value}' after a complete formula`,
                this.originalInput,
                this.current().position,
                { found: this.current().type, value: this.current().value }
            );
        }
        return result;
    }

    private current(): Token {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private expect(type: TokenType): Token {
        const token = this.current();
        if (token.type !== type) {
            throw createParseError(
                `Expected ${type} but found ${token.type} at position ${token.position}`,
                this.originalInput,
                token.position,
                { expected: type, found: token.type }
            );
        }
        return this.advance();
    }

    private parseFormula(): Formula {
        return this.parseIff();
    }

    private parseIff(): Formula {
        return this.foldLeft('IFF', 'iff', () => this.parseImplies());
    }

    private parseImplies(): Formula {
        return this.foldLeft('IMPLIES', 'implies', () => this.parseDisjunction());
    }

    private parseDisjunction(): Formula {
        return this.foldLeft('OR', 'or', () => this.parseExclusive());
    }

    private parseExclusive(): Formula {
        return this.foldLeft('XOR', 'xor', () => this.parseConjunction());
    }

    private parseConjunction(): Formula {
        return this.foldLeft('AND', 'and', () => this.parseUnary());
    }

    private foldLeft(token: TokenType, type: BinaryOperator, operand: () => Formula): Formula {
        let left = operand();

        while (this.current().type === token) {
            this.advance();
            const right = operand();
            left = { type, left, right };
        }

        return left;
    }

    private parseUnary(): Formula {
        if (this.current().type === 'NOT') {
            this.advance();
            const operand = this.parseUnary();
            return { type: 'not', operand };
        }

        return this.parsePrimary();
    }

    private parsePrimary(): Formula {
        // Parenthesized formula
        if (this.current().type === 'LPAREN') {
            this.advance();
            const formula = this.parseFormula();
            this.expect('RPAREN');
            return formula;
        }

        if (this.current().type === 'IDENT') {
            return { type: 'atom', name: this.advance().value };
        }

        const token = this.current();
        const shown = token.type === 'EOF' ? 'end of input' : `token '${token.value}'`;
        throw createParseError(
            `Unexpected ${shown} at position ${token.position} where an atom or '(' was expected`,
            this.originalInput,
            token.position,
            { expected: 'IDENT', found: token.type }
        );
    }
}
