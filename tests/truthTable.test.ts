/**
 * Truth table generation
 */

import { generateTruthTable, resolveAtoms, satisfyingRows } from '../src/truthTable.js';
import { parse } from '../src/parser/index.js';

const rowBits = (row: { assignment: ReadonlyMap<string, boolean> }, atoms: readonly string[]) =>
    atoms.map(a => (row.assignment.get(a) ? '1' : '0')).join('');

describe('generateTruthTable', () => {
    test('two atoms give four rows counting up from all-false', () => {
        const table = generateTruthTable([{ name: 'F', formula: parse('A AND B') }]);

        expect(table.atoms).toEqual(['A', 'B']);
        expect(table.formulaColumns).toEqual(['F']);
        expect(table.rows).toHaveLength(4);
        expect(table.rows.map(r => rowBits(r, table.atoms))).toEqual(['00', '01', '10', '11']);
        expect(table.rows.map(r => r.values.get('F'))).toEqual([false, false, false, true]);
        expect(satisfyingRows(table, 'F')).toHaveLength(1);
    });

    test('infers atoms as the sorted union over every formula', () => {
        const table = generateTruthTable([
            { name: 'P', formula: parse('Zeta OR Beta') },
            { name: 'Q', formula: parse('Alpha -> Beta') },
        ]);
        expect(table.atoms).toEqual(['Alpha', 'Beta', 'Zeta']);
        expect(table.rows).toHaveLength(8);
    });

    test('explicit atoms keep first occurrence order; the last atom varies fastest', () => {
        const table = generateTruthTable([{ name: 'F', formula: parse('A') }], { atoms: ['B', 'A', 'B'] });
        expect(table.atoms).toEqual(['B', 'A']);
        expect(table.rows[1].assignment.get('B')).toBe(false);
        expect(table.rows[1].assignment.get('A')).toBe(true);
        expect(table.rows.map(r => r.values.get('F'))).toEqual([false, true, false, true]);
    });

    test('every assignment appears exactly once', () => {
        const atoms = ['A', 'B', 'C', 'D'];
        const table = generateTruthTable([{ name: 'F', formula: parse('A') }], { atoms });
        const bits = table.rows.map(r => rowBits(r, atoms));
        expect(bits).toHaveLength(16);
        expect(new Set(bits).size).toBe(16);
    });

    test('zero atoms give exactly one empty row', () => {
        const table = generateTruthTable([]);
        expect(table.atoms).toEqual([]);
        expect(table.rows).toHaveLength(1);
        expect(table.rows[0].assignment.size).toBe(0);
    });

    test('a filter keeps satisfying rows and adds its column', () => {
        const table = generateTruthTable(
            [{ name: 'X', formula: parse('A XOR B') }],
            { filter: { name: 'Either', formula: parse('A OR B') } }
        );
        expect(table.formulaColumns).toEqual(['X', 'Either']);
        expect(table.rows.map(r => rowBits(r, table.atoms))).toEqual(['01', '10', '11']);
        expect(table.rows.map(r => r.values.get('X'))).toEqual([true, true, false]);
        expect(table.rows.every(r => r.values.get('Either') === true)).toBe(true);
    });
});

describe('resolveAtoms', () => {
    test('deduplicates explicit atoms', () => {
        expect(resolveAtoms([], ['C', 'A', 'C'])).toEqual(['C', 'A']);
    });
});
