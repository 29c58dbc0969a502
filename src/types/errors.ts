/**
 * Structured Error System
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

/**
 * Error codes for logic operations
 */
export type LogicErrorCode =
  | 'PARSE_ERROR'           // Syntax errors in formula
  | 'RULE_LOAD_ERROR'       // Malformed rule record or rule-set document
  | 'CONFIG_ERROR'          // Invalid configuration value
  | 'TABLE_TOO_LARGE'       // Truth table refused by an atom-count guard
  | 'INTERNAL_ERROR';       // Engine invariant violated

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The problematic formula or record
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogicException);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for JSON output
   */
  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /<->\s*$/,
      suggestion: "Incomplete biconditional - missing right side after '<->'"
    },
    {
      pattern: /->\s*$/,
      suggestion: "Incomplete implication - missing consequent after '->'"
    },
    {
      pattern: /(&|\bAND)\s*$/i,
      suggestion: "Incomplete conjunction - missing right operand after AND"
    },
    {
      pattern: /(\||\bOR)\s*$/i,
      suggestion: "Incomplete disjunction - missing right operand after OR"
    },
    {
      pattern: /\bXOR\s*$/i,
      suggestion: "Incomplete exclusive-or - missing right operand after XOR"
    },
    {
      pattern: /(~|\bNOT)\s*$/i,
      suggestion: "Incomplete negation - missing operand after NOT"
    },
    {
      pattern: /\b(AND|OR|XOR)\s+(AND|OR|XOR)\b/i,
      suggestion: "Two binary operators in a row - an atom or '(' must come between them"
    },
    {
      pattern: /[!=]/,
      suggestion: "Use NOT or '~' for negation and '<->' for equivalence"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion
 */
export function createParseError(
  message: string,
  input: string,
  position?: number,
  details?: Record<string, unknown>
): LogicException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position),
    col: getColumnNumber(input, position),
  } : undefined;

  return new LogicException({
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
    details,
  });
}

/**
 * Create a rule loading error
 */
export function createRuleLoadError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'RULE_LOAD_ERROR',
    message: `Failed to load rules: ${message}`,
    suggestion: 'Each rule needs string fields id, premise, conclusion and text',
    details,
  });
}

/**
 * Create a configuration error
 */
export function createConfigError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'CONFIG_ERROR',
    message: `Invalid configuration: ${message}`,
    details,
  });
}

/**
 * Create a truth table size error
 */
export function createTableTooLargeError(
  atomCount: number,
  maxAtoms: number
): LogicException {
  return new LogicException({
    code: 'TABLE_TOO_LARGE',
    message: `Too many atoms (${atomCount}) for a full truth table; the limit is ${maxAtoms}`,
    suggestion: 'Evaluate against the current facts instead, or raise PDM_MAX_TABLE_ATOMS',
    details: { atomCount, maxAtoms },
  });
}

/**
 * Create an internal invariant error
 */
export function createInternalError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INTERNAL_ERROR',
    message: `Internal error: ${message}`,
    details,
  });
}

/**
 * Fails loudly when a closed union receives a value outside it.
 */
export function assertNever(value: never, what: string = 'value'): never {
  throw createInternalError(`Unexpected ${what}: ${JSON.stringify(value)}`);
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}
