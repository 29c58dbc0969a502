/**
 * Parser Types
 */

export type TokenType =
    | 'IDENT'         // Fever, loan_ok, A1
    | 'AND'           // AND, &
    | 'OR'            // OR, |
    | 'XOR'           // XOR
    | 'NOT'           // NOT, ~
    | 'IMPLIES'       // ->
    | 'IFF'           // <->
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
