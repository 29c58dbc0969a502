import type { ForwardStep } from './rules.js';
import type { NamedFormula } from './ast.js';

/**
 * How backward chaining scopes its cycle guard.
 *
 * - `path`: an atom is barred only while it is on the current recursion
 *   path; it is released again on backtrack.
 * - `shared`: one visited set for the whole search; once an atom has been
 *   attempted anywhere it cannot be proved again in another branch.
 */
export type CycleGuard = 'path' | 'shared';

export const CYCLE_GUARDS: readonly CycleGuard[] = ['path', 'shared'];

export interface ForwardOptions {
    /**
     * Called once per rule firing, in firing order.
     */
    onStep?: (step: ForwardStep) => void;
}

export interface BackwardOptions {
    cycleGuard?: CycleGuard;
}

export interface TruthTableOptions {
    /** Explicit atom order; duplicates are dropped. Defaults to the sorted formula atoms. */
    atoms?: readonly string[];
    /** Only rows satisfying this formula are kept; it is reported as a column too. */
    filter?: NamedFormula;
}

export const DEFAULTS = {
    domain: 'medical',
    domains: ['medical', 'loan'],
    maxTableAtoms: 16,
    cycleGuard: 'path',
    negationPrefix: 'NOT ',
} as const;
