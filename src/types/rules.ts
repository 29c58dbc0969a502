/**
 * Rule and inference result types
 */

import type { Formula } from './ast.js';

/**
 * A named premise/conclusion pair, the unit of inference
 */
export interface Rule {
    readonly id: string;
    readonly premise: Formula;
    readonly conclusion: Formula;
    readonly description: string;
}

/**
 * Rule record as stored in a rule-set document
 */
export interface RuleRecord {
    id: string;
    premise: string;
    conclusion: string;
    text: string;
}

/**
 * Rule-set document: domain name -> ordered rule records
 */
export type RuleSetDocument = Record<string, RuleRecord[]>;

/**
 * One successful rule firing during forward chaining
 */
export interface ForwardStep {
    readonly step: number;
    readonly ruleId: string;
    readonly inferred: ReadonlySet<string>;
    readonly explanation: string;
}

export interface Contradiction {
    readonly atom: string;
    readonly message: string;
}

export interface ForwardResult {
    readonly finalFacts: ReadonlySet<string>;
    readonly steps: readonly ForwardStep[];
    readonly contradictions: readonly Contradiction[];
}

/**
 * Node of a backward-chaining proof tree.
 * `ruleId` is set iff the goal was established through a rule.
 */
export interface ProofNode {
    readonly goal: string;
    readonly ruleId?: string;
    readonly premises: readonly ProofNode[];
    readonly succeeded: boolean;
    readonly message: string;
}
