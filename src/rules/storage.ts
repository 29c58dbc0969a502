/**
 * Rule-Set Persistence Interface
 */

import type { Rule } from '../types/index.js';

export interface RuleSetStorage {
    /** Every stored domain with its parsed rules */
    load(): Promise<Map<string, Rule[]>>;
    /** Replace one domain's rules, keeping the others */
    save(domain: string, rules: readonly Rule[]): Promise<void>;
}

/**
 * In-process storage, used where no file should be touched.
 */
export class MemoryRuleSetStorage implements RuleSetStorage {
    private ruleSets: Map<string, Rule[]>;

    constructor(initial?: ReadonlyMap<string, readonly Rule[]>) {
        this.ruleSets = new Map();
        for (const [domain, rules] of initial ?? []) {
            this.ruleSets.set(domain, [...rules]);
        }
    }

    async load(): Promise<Map<string, Rule[]>> {
        return new Map([...this.ruleSets].map(([domain, rules]) => [domain, [...rules]]));
    }

    async save(domain: string, rules: readonly Rule[]): Promise<void> {
        this.ruleSets.set(domain, [...rules]);
    }
}
