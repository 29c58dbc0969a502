import type { Contradiction } from '../types/index.js';
import { DEFAULTS } from '../types/index.js';

const PREFIX = DEFAULTS.negationPrefix;

/**
 * Fact string asserting the negation of `atom`, e.g. "NOT Flu".
 */
export function negatedFact(atom: string): string {
    return `${PREFIX}${atom}`;
}

/**
 * Atoms present both plainly and as their negated fact, sorted by name.
 */
export function detectContradictions(facts: Iterable<string>): Contradiction[] {
    const positives = new Set<string>();
    const negatives = new Set<string>();
    for (const fact of facts) {
        if (fact.startsWith(PREFIX)) {
            negatives.add(fact.slice(PREFIX.length));
        } else {
            positives.add(fact);
        }
    }

    return [...positives]
        .filter(atom => negatives.has(atom))
        .sort()
        .map(atom => ({
            atom,
            message: `Contradiction between ${atom} and ${negatedFact(atom)}`,
        }));
}
