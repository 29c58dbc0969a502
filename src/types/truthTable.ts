/**
 * Truth table types
 */

export interface TruthTableRow {
    /** Value of every atom, in column order */
    readonly assignment: ReadonlyMap<string, boolean>;
    /** Value of every formula column (and the filter column, when given) */
    readonly values: ReadonlyMap<string, boolean>;
}

export interface TruthTable {
    readonly atoms: readonly string[];
    readonly formulaColumns: readonly string[];
    readonly rows: readonly TruthTableRow[];
}

/**
 * A full table with its satisfying rows, or, past the atom limit, the
 * formula's value under the current facts.
 */
export type TableView =
    | { kind: 'table'; table: TruthTable; trueRows: readonly TruthTableRow[] }
    | { kind: 'evaluated'; atomCount: number; maxAtoms: number; value: boolean };
