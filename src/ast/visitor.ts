import type { Formula } from '../types/index.js';

/**
 * Generic AST Visitor (pre-order)
 */
export function traverse(node: Formula, visitor: (node: Formula) => void): void {
    visitor(node);

    switch (node.type) {
        case 'atom':
            return;
        case 'not':
            traverse(node.operand, visitor);
            return;
        default:
            traverse(node.left, visitor);
            traverse(node.right, visitor);
    }
}

/**
 * Names of every atom reachable from a node.
 */
export function collectAtoms(node: Formula): Set<string> {
    const atoms = new Set<string>();
    traverse(node, n => {
        if (n.type === 'atom') atoms.add(n.name);
    });
    return atoms;
}

/**
 * Structural equality of two formulas.
 */
export function formulasEqual(a: Formula, b: Formula): boolean {
    if (a.type === 'atom') {
        return b.type === 'atom' && a.name === b.name;
    }
    if (a.type === 'not') {
        return b.type === 'not' && formulasEqual(a.operand, b.operand);
    }
    if (b.type === 'atom' || b.type === 'not' || b.type !== a.type) {
        return false;
    }
    return formulasEqual(a.left, b.left) && formulasEqual(a.right, b.right);
}
