/**
 * Reasoning Session
 *
 * Holds the rule sets loaded for a run, the selected domain, rules added
 * by the user on top of that domain's base rules, and the facts currently
 * asserted. Each domain keeps its own custom rules.
 */

import type {
    CycleGuard,
    ForwardOptions,
    ForwardResult,
    Formula,
    ProofNode,
    Rule,
    RuleRecord,
    TableView,
    TruthTable,
} from '../types/index.js';
import { DEFAULTS } from '../types/index.js';
import { createTableTooLargeError } from '../types/errors.js';
import { parse } from '../parser/index.js';
import { collectAtoms } from '../ast/index.js';
import { evaluate } from '../utils/evaluation.js';
import { generateTruthTable, satisfyingRows } from '../truthTable.js';
import { collectRuleAtoms, createRule, exportRuleSet, loadRules } from '../rules/index.js';
import type { RuleSetStorage } from '../rules/index.js';
import { backwardChain, forwardChain } from '../inference/index.js';

export interface SessionOptions {
    domain?: string;
    maxTableAtoms?: number;
    cycleGuard?: CycleGuard;
}

export class ReasoningSession {
    private ruleSets: ReadonlyMap<string, readonly Rule[]>;
    private customRules = new Map<string, Rule[]>();
    private currentFacts = new Set<string>();
    private currentDomain: string;
    private maxTableAtoms: number;
    private cycleGuard: CycleGuard;

    constructor(ruleSets: ReadonlyMap<string, readonly Rule[]>, options: SessionOptions = {}) {
        this.ruleSets = ruleSets;
        this.currentDomain = options.domain ?? DEFAULTS.domain;
        this.maxTableAtoms = options.maxTableAtoms ?? DEFAULTS.maxTableAtoms;
        this.cycleGuard = options.cycleGuard ?? DEFAULTS.cycleGuard;
    }

    get domain(): string {
        return this.currentDomain;
    }

    domains(): string[] {
        return [...new Set([...this.ruleSets.keys(), ...this.customRules.keys()])];
    }

    selectDomain(domain: string): void {
        this.currentDomain = domain;
    }

    /**
     * Base rules of the selected domain followed by its custom rules
     */
    rules(): Rule[] {
        return [
            ...(this.ruleSets.get(this.currentDomain) ?? []),
            ...(this.customRules.get(this.currentDomain) ?? []),
        ];
    }

    addRule(rule: Rule): void {
        const custom = this.customRules.get(this.currentDomain) ?? [];
        custom.push(rule);
        this.customRules.set(this.currentDomain, custom);
    }

    /**
     * Parse and add a rule; syntax errors propagate and nothing is added.
     */
    addRuleFromText(id: string, premise: string, conclusion: string, description: string = ''): Rule {
        const rule = createRule(id, premise, conclusion, description);
        this.addRule(rule);
        return rule;
    }

    /**
     * Replace the selected domain's custom rules with that domain's entry
     * in a rule-set document. Nothing changes when the document is rejected.
     */
    loadCustomRules(document: unknown): Rule[] {
        const rules = loadRules(document, this.currentDomain);
        this.customRules.set(this.currentDomain, rules);
        return rules;
    }

    /**
     * Store the selected domain's full rule list, base and custom.
     */
    async saveRules(storage: RuleSetStorage): Promise<void> {
        await storage.save(this.currentDomain, this.rules());
    }

    assertFact(name: string): void {
        this.currentFacts.add(name);
    }

    retractFact(name: string): boolean {
        return this.currentFacts.delete(name);
    }

    facts(): string[] {
        return [...this.currentFacts].sort();
    }

    /**
     * Atoms mentioned by the selected domain's rules
     */
    atoms(): string[] {
        return collectRuleAtoms(this.rules());
    }

    /**
     * Value of a formula with the current facts true and every other atom false
     */
    evaluate(formula: string | Formula): boolean {
        const parsed = typeof formula === 'string' ? parse(formula) : formula;
        const assignment = new Map<string, boolean>();
        for (const atom of collectAtoms(parsed)) {
            assignment.set(atom, this.currentFacts.has(atom));
        }
        return evaluate(parsed, assignment);
    }

    /**
     * Full table over the rule atoms and the formula's own atoms.
     * Refuses atom counts above the configured maximum.
     */
    truthTable(formula: string | Formula, column: string = 'Formula'): TruthTable {
        const parsed = typeof formula === 'string' ? parse(formula) : formula;
        const atoms = this.tableAtoms(parsed);
        if (atoms.length > this.maxTableAtoms) {
            throw createTableTooLargeError(atoms.length, this.maxTableAtoms);
        }
        return generateTruthTable([{ name: column, formula: parsed }], { atoms });
    }

    /**
     * Like `truthTable`, but past the atom limit evaluates the formula under
     * the current facts instead of refusing.
     */
    tableView(formula: string | Formula, column: string = 'Formula'): TableView {
        const parsed = typeof formula === 'string' ? parse(formula) : formula;
        const atomCount = this.tableAtoms(parsed).length;
        if (atomCount > this.maxTableAtoms) {
            return { kind: 'evaluated', atomCount, maxAtoms: this.maxTableAtoms, value: this.evaluate(parsed) };
        }
        const table = this.truthTable(parsed, column);
        return { kind: 'table', table, trueRows: satisfyingRows(table, column) };
    }

    private tableAtoms(formula: Formula): string[] {
        return [...new Set([...this.atoms(), ...collectAtoms(formula)])].sort();
    }

    forward(options: ForwardOptions = {}): ForwardResult {
        return forwardChain(this.currentFacts, this.rules(), options);
    }

    prove(goal: string): ProofNode {
        return backwardChain(goal, this.currentFacts, this.rules(), { cycleGuard: this.cycleGuard });
    }

    /**
     * Drop custom rules of every domain and all facts
     */
    reset(): void {
        this.customRules.clear();
        this.currentFacts.clear();
    }

    export(): { domain: string; rules: RuleRecord[] } {
        return exportRuleSet(this.currentDomain, this.rules());
    }
}

export function createReasoningSession(
    ruleSets: ReadonlyMap<string, readonly Rule[]>,
    options?: SessionOptions
): ReasoningSession {
    return new ReasoningSession(ruleSets, options);
}
