/**
 * Forward Chaining
 *
 * Fires rules in order, pass after pass, until a full pass adds no fact.
 * The fact set only grows and is bounded by the atoms of the rule set, so
 * the loop terminates.
 */

import type { ForwardOptions, ForwardResult, ForwardStep, Formula, Rule } from '../types/index.js';
import { collectAtoms } from '../ast/index.js';
import { assignmentFromFacts, evaluate } from '../utils/evaluation.js';
import { detectContradictions } from './contradictions.js';

/**
 * Conclusion atoms that, forced true with every other known atom held at its
 * current value, make the conclusion true and are not facts yet.
 */
export function newlySatisfiable(
    conclusion: Formula,
    base: ReadonlyMap<string, boolean>,
    facts: ReadonlySet<string>
): Set<string> {
    const atoms = [...collectAtoms(conclusion)].sort();
    const assignment = new Map(base);
    for (const atom of atoms) {
        if (!assignment.has(atom)) assignment.set(atom, facts.has(atom));
    }

    const inferred = new Set<string>();
    for (const atom of atoms) {
        if (facts.has(atom)) continue;
        const forced = new Map(assignment);
        forced.set(atom, true);
        if (evaluate(conclusion, forced)) {
            inferred.add(atom);
        }
    }
    return inferred;
}

function explain(step: number, rule: Rule, inferred: ReadonlySet<string>): string {
    const premiseAtoms = [...collectAtoms(rule.premise)].sort().join(', ');
    return `Step ${step}: ${rule.id} fired on premise atoms ${premiseAtoms} -> inferred ${[...inferred].join(', ')}.`;
}

export function forwardChain(
    initialFacts: Iterable<string>,
    rules: readonly Rule[],
    options: ForwardOptions = {}
): ForwardResult {
    const facts = new Set<string>(initialFacts);
    const steps: ForwardStep[] = [];

    let firedAny = true;
    while (firedAny) {
        firedAny = false;

        for (const rule of rules) {
            const assignment = assignmentFromFacts(collectAtoms(rule.premise), facts);
            if (!evaluate(rule.premise, assignment)) continue;

            const inferred = newlySatisfiable(rule.conclusion, assignment, facts);
            if (inferred.size === 0) continue;

            firedAny = true;
            for (const atom of inferred) facts.add(atom);

            const number = steps.length + 1;
            const step: ForwardStep = {
                step: number,
                ruleId: rule.id,
                inferred,
                explanation: explain(number, rule, inferred),
            };
            steps.push(step);
            options.onStep?.(step);
        }
    }

    return {
        finalFacts: facts,
        steps,
        contradictions: detectContradictions(facts),
    };
}
