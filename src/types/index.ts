/**
 * Shared type definitions
 */

// Re-export error types
export {
    LogicException,
    createParseError,
    createRuleLoadError,
    createConfigError,
    createTableTooLargeError,
    createInternalError,
    assertNever,
    getSuggestion,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export AST types
export type {
    BinaryOperator,
    FormulaType,
    AtomFormula,
    NotFormula,
    BinaryFormula,
    Formula,
    NamedFormula,
    Assignment,
} from './ast.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export rule and inference types
export type {
    Rule,
    RuleRecord,
    RuleSetDocument,
    ForwardStep,
    Contradiction,
    ForwardResult,
    ProofNode,
} from './rules.js';

export type {
    TruthTable,
    TruthTableRow,
    TableView,
} from './truthTable.js';

export type { Verbosity } from './responses.js';
export { VERBOSITY_LEVELS } from './responses.js';

// Re-export options
export {
    DEFAULTS,
    CYCLE_GUARDS,
} from './options.js';

export type {
    CycleGuard,
    ForwardOptions,
    BackwardOptions,
    TruthTableOptions,
} from './options.js';
