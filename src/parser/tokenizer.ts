import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/**
 * Word operators, matched case-insensitively against whole identifiers.
 */
const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ['AND', 'AND'],
    ['OR', 'OR'],
    ['NOT', 'NOT'],
    ['XOR', 'XOR'],
]);

const IDENT_CHAR = /[A-Za-z0-9_]/;

/**
 * Tokenizer for propositional formulas
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            // Multi-character operators, longest first
            if (this.match('<->')) {
                this.addToken('IFF', '<->');
                continue;
            }
            if (this.match('->')) {
                this.addToken('IMPLIES', '->');
                continue;
            }

            // Single character tokens
            switch (char) {
                case '(': this.addToken('LPAREN', '('); this.pos++; continue;
                case ')': this.addToken('RPAREN', ')'); this.pos++; continue;
                case '&': this.addToken('AND', '&'); this.pos++; continue;
                case '|': this.addToken('OR', '|'); this.pos++; continue;
                case '~': this.addToken('NOT', '~'); this.pos++; continue;
            }

            // Identifiers and word operators
            if (IDENT_CHAR.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && IDENT_CHAR.test(this.input[this.pos])) {
                    this.pos++;
                }
                const value = this.input.slice(start, this.pos);
                const keyword = KEYWORDS.get(value.toUpperCase());
                this.tokens.push({ type: keyword ?? 'IDENT', value, position: start });
                continue;
            }

            throw createParseError(
                `Unexpected character '${char}' at position ${this.pos}`,
                this.input,
                this.pos,
                { character: char }
            );
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private match(str: string): boolean {
        if (this.input.startsWith(str, this.pos)) {
            this.pos += str.length;
            return true;
        }
        return false;
    }

    private addToken(type: TokenType, value: string): void {
        // Called after `match` consumed multi-character operators, before advancing single ones
        const position = value.length > 1 ? this.pos - value.length : this.pos;
        this.tokens.push({ type, value, position });
    }
}
