/**
 * Formatting utilities
 */
import type { ForwardResult, ProofNode, Rule, TableView, TruthTable, Verbosity } from '../types/index.js';
import { formulaToString } from '../ast/index.js';

const bool = (value: boolean | undefined): string => (value ? 'T' : 'F');

/**
 * Format truth table as an aligned text grid
 */
export function formatTruthTable(table: TruthTable): string {
    const headers = [...table.atoms, ...table.formulaColumns];
    const widths = headers.map(h => Math.max(h.length, 1));

    const pad = (cells: string[]): string =>
        cells.map((c, i) => c.padEnd(widths[i])).join(' | ').trimEnd();

    const lines = [pad(headers), widths.map(w => '-'.repeat(w)).join('-+-')];
    for (const row of table.rows) {
        lines.push(pad([
            ...table.atoms.map(a => bool(row.assignment.get(a))),
            ...table.formulaColumns.map(c => bool(row.values.get(c))),
        ]));
    }
    return lines.join('\n');
}

/**
 * A full table followed by its true rows, or the fallback value with the
 * reason no table was drawn.
 */
export function formatTableView(view: TableView): string {
    if (view.kind === 'evaluated') {
        return [
            `Too many atoms (${view.atomCount}) for a full table; the limit is ${view.maxAtoms}. Showing the current assignment only.`,
            `Value: ${view.value ? 'TRUE' : 'FALSE'}`,
        ].join('\n');
    }
    const trueRows = view.trueRows.length > 0
        ? formatTruthTable({ ...view.table, rows: view.trueRows })
        : '(none)';
    return `${formatTruthTable(view.table)}\n\nTrue rows:\n${trueRows}`;
}

/**
 * Format forward-chaining output. Minimal lists only the final facts;
 * standard adds fired rules; detailed adds their explanations.
 */
export function formatForwardResult(result: ForwardResult, verbosity: Verbosity = 'standard'): string {
    const lines: string[] = [];
    const facts = [...result.finalFacts].sort();
    lines.push(`Final facts: ${facts.length > 0 ? facts.join(', ') : '(none)'}`);

    if (verbosity !== 'minimal') {
        if (result.steps.length === 0) {
            lines.push('No rules fired.');
        } else {
            lines.push('Fired rules:');
            for (const step of result.steps) {
                lines.push(`  ${step.step}. ${step.ruleId} -> ${[...step.inferred].join(', ')}`);
                if (verbosity === 'detailed') {
                    lines.push(`     ${step.explanation}`);
                }
            }
        }
    }

    if (result.contradictions.length > 0) {
        lines.push('Contradictions:');
        for (const c of result.contradictions) {
            lines.push(`  ${c.atom}: ${c.message}`);
        }
    }

    return lines.join('\n');
}

/**
 * Format a proof tree with two-space indentation per level.
 * A sub-proof shared by several branches is expanded the first time only.
 */
export function formatProofTree(node: ProofNode): string {
    const lines: string[] = [];
    const expanded = new Set<ProofNode>();

    const visit = (current: ProofNode, depth: number): void => {
        const indent = '  '.repeat(depth);
        const status = current.succeeded ? 'success' : 'failure';
        const via = current.ruleId !== undefined ? ` [${current.ruleId}]` : '';
        if (expanded.has(current) && current.premises.length > 0) {
            lines.push(`${indent}${current.goal} (${status})${via}: Proved above.`);
            return;
        }
        expanded.add(current);
        lines.push(`${indent}${current.goal} (${status})${via}: ${current.message}`);
        for (const child of current.premises) {
            visit(child, depth + 1);
        }
    };

    visit(node, 0);
    return lines.join('\n');
}

/**
 * One line per rule: `id: premise => conclusion`, plus description when detailed
 */
export function formatRules(rules: readonly Rule[], verbosity: Verbosity = 'standard'): string {
    if (rules.length === 0) {
        return '(no rules)';
    }
    return rules.map(r => {
        const line = `${r.id}: ${formulaToString(r.premise)} => ${formulaToString(r.conclusion)}`;
        return verbosity === 'detailed' && r.description ? `${line}\n    ${r.description}` : line;
    }).join('\n');
}
