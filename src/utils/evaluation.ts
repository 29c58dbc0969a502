/**
 * Formula Evaluation Utilities
 *
 * Logic for evaluating formulas against a truth assignment.
 */

import type { Assignment, Formula } from '../types/index.js';
import { assertNever } from '../types/errors.js';

/**
 * Truth value of an atom; absent atoms are false.
 */
export function lookup(assignment: Assignment, name: string): boolean {
    if (isMapAssignment(assignment)) {
        return assignment.get(name) ?? false;
    }
    return Object.prototype.hasOwnProperty.call(assignment, name) && assignment[name] === true;
}

function isMapAssignment(assignment: Assignment): assignment is ReadonlyMap<string, boolean> {
    return assignment instanceof Map;
}

/**
 * Evaluate a formula under an assignment
 */
export function evaluate(node: Formula, assignment: Assignment): boolean {
    switch (node.type) {
        case 'atom':
            return lookup(assignment, node.name);

        case 'not':
            return !evaluate(node.operand, assignment);

        case 'and':
            return evaluate(node.left, assignment) &&
                evaluate(node.right, assignment);

        case 'or':
            return evaluate(node.left, assignment) ||
                evaluate(node.right, assignment);

        case 'xor':
            return evaluate(node.left, assignment) !==
                evaluate(node.right, assignment);

        case 'implies':
            return !evaluate(node.left, assignment) ||
                evaluate(node.right, assignment);

        case 'iff':
            return evaluate(node.left, assignment) ===
                evaluate(node.right, assignment);

        default:
            return assertNever(node, 'formula node');
    }
}

/**
 * Assignment restricted to `atoms`, each true iff it is one of `facts`.
 */
export function assignmentFromFacts(
    atoms: Iterable<string>,
    facts: ReadonlySet<string>
): Map<string, boolean> {
    const assignment = new Map<string, boolean>();
    for (const atom of atoms) {
        assignment.set(atom, facts.has(atom));
    }
    return assignment;
}
