/**
 * Propositional Decision Maker - Library Entry Point
 *
 * Exports the logic engine for use in other projects.
 * Nothing reachable from here writes to the console or reads the environment.
 */

// Parser
export { parse, tryParse, Tokenizer, Parser } from './parser/index.js';
export type { ParseResult } from './parser/index.js';

// AST
export * from './ast/index.js';

// Evaluation and truth tables
export { evaluate, assignmentFromFacts } from './utils/evaluation.js';
export { generateTruthTable, resolveAtoms, satisfyingRows } from './truthTable.js';

// Rules and inference
export * from './rules/index.js';
export * from './inference/index.js';

// Sessions
export { ReasoningSession, createReasoningSession } from './session/session.js';
export type { SessionOptions } from './session/session.js';

// Formatting
export { formatTruthTable, formatTableView, formatForwardResult, formatProofTree, formatRules } from './utils/formatting.js';

// Types and Interfaces
export * from './types/index.js';
