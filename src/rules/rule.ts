import type { Rule } from '../types/index.js';
import { parse } from '../parser/index.js';
import { collectAtoms } from '../ast/index.js';

/**
 * Build a rule from premise and conclusion text.
 * Syntax errors in either formula propagate as PARSE_ERROR.
 */
export function createRule(
    id: string,
    premise: string,
    conclusion: string,
    description: string = ''
): Rule {
    return {
        id,
        premise: parse(premise),
        conclusion: parse(conclusion),
        description,
    };
}

export function conclusionAtoms(rule: Rule): Set<string> {
    return collectAtoms(rule.conclusion);
}

export function premiseAtoms(rule: Rule): Set<string> {
    return collectAtoms(rule.premise);
}

/**
 * Sorted atom universe of a rule set (premises and conclusions).
 */
export function collectRuleAtoms(rules: readonly Rule[]): string[] {
    const atoms = new Set<string>();
    for (const rule of rules) {
        for (const a of premiseAtoms(rule)) atoms.add(a);
        for (const a of conclusionAtoms(rule)) atoms.add(a);
    }
    return [...atoms].sort();
}
