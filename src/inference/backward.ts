/**
 * Backward Chaining
 *
 * Goal-directed prover. Every call returns a complete proof tree; an
 * unprovable goal is a failed node, not an error.
 */

import type { BackwardOptions, CycleGuard, ProofNode, Rule } from '../types/index.js';
import { DEFAULTS } from '../types/index.js';
import { conclusionAtoms, premiseAtoms } from '../rules/rule.js';

export const PROOF_MESSAGES = {
    fact: 'Given as a fact.',
    cycle: 'Cycle detected while proving this goal.',
    noRules: 'No rules conclude this goal.',
    allFailed: 'All applicable rules failed to prove this goal.',
    proved: (goal: string, ruleId: string) => `Proved ${goal} using rule ${ruleId}.`,
} as const;

function failed(goal: string, message: string): ProofNode {
    return { goal, premises: [], succeeded: false, message };
}

interface IndexedRule {
    rule: Rule;
    conclusions: ReadonlySet<string>;
    premises: readonly string[];
}

class BackwardChainer {
    private facts: ReadonlySet<string>;
    private rules: readonly IndexedRule[];
    private guard: CycleGuard;
    private visiting: Set<string> = new Set();
    // Successful sub-proofs, reused across sibling branches
    private proved: Map<string, ProofNode> = new Map();

    constructor(facts: ReadonlySet<string>, rules: readonly Rule[], guard: CycleGuard) {
        this.facts = facts;
        this.rules = rules.map(rule => ({
            rule,
            conclusions: conclusionAtoms(rule),
            premises: [...premiseAtoms(rule)].sort(),
        }));
        this.guard = guard;
    }

    prove(goal: string): ProofNode {
        if (this.facts.has(goal)) {
            return { goal, premises: [], succeeded: true, message: PROOF_MESSAGES.fact };
        }
        if (this.visiting.has(goal)) {
            return failed(goal, PROOF_MESSAGES.cycle);
        }
        const known = this.proved.get(goal);
        if (known) {
            return known;
        }

        this.visiting.add(goal);
        const node = this.proveViaRules(goal);
        if (this.guard === 'path') {
            this.visiting.delete(goal);
        }
        if (node.succeeded) {
            this.proved.set(goal, node);
        }
        return node;
    }

    private proveViaRules(goal: string): ProofNode {
        const applicable = this.rules.filter(r => r.conclusions.has(goal));
        if (applicable.length === 0) {
            return failed(goal, PROOF_MESSAGES.noRules);
        }

        for (const { rule, premises } of applicable) {
            // All premises are attempted, even after one fails
            const children = premises.map(atom => this.prove(atom));
            if (children.every(c => c.succeeded)) {
                return {
                    goal,
                    ruleId: rule.id,
                    premises: children,
                    succeeded: true,
                    message: PROOF_MESSAGES.proved(goal, rule.id),
                };
            }
        }

        return failed(goal, PROOF_MESSAGES.allFailed);
    }
}

/**
 * Try to prove `goal` from `facts` using `rules` in order.
 * The first rule whose premise atoms are all provable wins.
 */
export function backwardChain(
    goal: string,
    facts: Iterable<string>,
    rules: readonly Rule[],
    options: BackwardOptions = {}
): ProofNode {
    const chainer = new BackwardChainer(
        new Set(facts),
        rules,
        options.cycleGuard ?? DEFAULTS.cycleGuard
    );
    return chainer.prove(goal);
}

/**
 * Rule ids used anywhere in a successful proof, outermost first.
 * Shared sub-proofs are walked once.
 */
export function rulesUsed(node: ProofNode): string[] {
    const ids = new Set<string>();
    const seen = new Set<ProofNode>();
    const visit = (current: ProofNode): void => {
        if (!current.succeeded || seen.has(current)) return;
        seen.add(current);
        if (current.ruleId !== undefined) ids.add(current.ruleId);
        current.premises.forEach(visit);
    };
    visit(node);
    return [...ids];
}
