/**
 * Truth Table Generator
 *
 * Enumerates every assignment over an ordered atom set and evaluates each
 * formula column per row. Performs no size guard: 2^n rows are produced
 * for n atoms, so callers bound n first.
 */

import type { NamedFormula, TruthTable, TruthTableOptions, TruthTableRow } from './types/index.js';
import { collectAtoms } from './ast/index.js';
import { evaluate } from './utils/evaluation.js';
import { allAssignments, uniqueInOrder } from './utils/enumerate.js';

/**
 * Working atom order: the explicit list (deduplicated) or the sorted union
 * of atoms occurring in the formulas.
 */
export function resolveAtoms(
    formulas: readonly NamedFormula[],
    atoms?: readonly string[]
): string[] {
    if (atoms !== undefined) {
        return uniqueInOrder(atoms);
    }
    const inferred = new Set<string>();
    for (const { formula } of formulas) {
        for (const atom of collectAtoms(formula)) inferred.add(atom);
    }
    return [...inferred].sort();
}

export function generateTruthTable(
    formulas: readonly NamedFormula[],
    options: TruthTableOptions = {}
): TruthTable {
    const atoms = resolveAtoms(formulas, options.atoms);
    const { filter } = options;
    const rows: TruthTableRow[] = [];

    for (const assignment of allAssignments(atoms)) {
        if (filter && !evaluate(filter.formula, assignment)) {
            continue;
        }

        const values = new Map<string, boolean>();
        for (const { name, formula } of formulas) {
            values.set(name, evaluate(formula, assignment));
        }
        if (filter) {
            values.set(filter.name, true);
        }
        rows.push({ assignment, values });
    }

    const formulaColumns = formulas.map(f => f.name);
    if (filter) formulaColumns.push(filter.name);

    return { atoms, formulaColumns, rows };
}

/**
 * Rows in which the named column is true.
 */
export function satisfyingRows(table: TruthTable, column: string): TruthTableRow[] {
    return table.rows.filter(row => row.values.get(column) === true);
}
