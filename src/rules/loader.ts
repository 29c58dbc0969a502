/**
 * Rule-set interchange
 *
 * Converts rule-set documents (domain -> rule records with formula text)
 * into parsed rules, and back. A malformed record fails the whole load.
 */

import { z } from 'zod';
import type { Rule, RuleRecord, RuleSetDocument } from '../types/index.js';
import { createRuleLoadError, serializeLogicError } from '../types/errors.js';
import { tryParse } from '../parser/index.js';
import { formulaToString } from '../ast/index.js';

export const RuleRecordSchema = z.object({
    id: z.string(),
    premise: z.string(),
    conclusion: z.string(),
    text: z.string(),
});

export const RuleSetDocumentSchema = z.record(z.string(), z.unknown());

const RuleListSchema = z.array(z.unknown());

type RawDocument = z.infer<typeof RuleSetDocumentSchema>;

function validateDocument(data: unknown): RawDocument {
    const result = RuleSetDocumentSchema.safeParse(data);
    if (!result.success) {
        throw createRuleLoadError(
            'rule-set document must be a JSON object keyed by domain name',
            { issues: result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })) }
        );
    }
    return result.data;
}

function validateRuleList(value: unknown, domain: string): unknown[] {
    const result = RuleListSchema.safeParse(value);
    if (!result.success) {
        throw createRuleLoadError(`domain '${domain}' must hold an array of rule records`, { domain });
    }
    return result.data;
}

function toRule(raw: unknown, domain: string, index: number): Rule {
    const record = RuleRecordSchema.safeParse(raw);
    if (!record.success) {
        const issues = record.error.issues
            .map(i => `${i.path.join('.') || '(record)'}: ${i.message}`)
            .join('; ');
        throw createRuleLoadError(
            `record ${index} in domain '${domain}' is malformed (${issues})`,
            { domain, index }
        );
    }

    const { id, premise, conclusion, text } = record.data;
    const parsedPremise = tryParse(premise);
    if (!parsedPremise.ok) {
        throw createRuleLoadError(
            `rule '${id}' in domain '${domain}' has an invalid premise: ${parsedPremise.error.message}`,
            { domain, index, ruleId: id, field: 'premise', cause: serializeLogicError(parsedPremise.error.error) }
        );
    }
    const parsedConclusion = tryParse(conclusion);
    if (!parsedConclusion.ok) {
        throw createRuleLoadError(
            `rule '${id}' in domain '${domain}' has an invalid conclusion: ${parsedConclusion.error.message}`,
            { domain, index, ruleId: id, field: 'conclusion', cause: serializeLogicError(parsedConclusion.error.error) }
        );
    }

    return {
        id,
        premise: parsedPremise.formula,
        conclusion: parsedConclusion.formula,
        description: text,
    };
}

/**
 * Load one domain's rules. A domain absent from the document has no rules;
 * other keys are not inspected.
 */
export function loadRules(data: unknown, domain: string): Rule[] {
    const document = validateDocument(data);
    const value = document[domain];
    if (value === undefined) {
        return [];
    }
    return validateRuleList(value, domain).map((raw, index) => toRule(raw, domain, index));
}

/**
 * Load every domain in the document. Keys whose value is not an array
 * (a version number, a comment) are not domains and are skipped.
 */
export function loadRuleSets(data: unknown): Map<string, Rule[]> {
    const document = validateDocument(data);
    const ruleSets = new Map<string, Rule[]>();
    for (const [domain, value] of Object.entries(document)) {
        if (!Array.isArray(value)) continue;
        ruleSets.set(domain, value.map((raw, index) => toRule(raw, domain, index)));
    }
    return ruleSets;
}

export function ruleToRecord(rule: Rule): RuleRecord {
    return {
        id: rule.id,
        premise: formulaToString(rule.premise),
        conclusion: formulaToString(rule.conclusion),
        text: rule.description,
    };
}

export function rulesToJson(rules: Iterable<Rule>): { rules: RuleRecord[] } {
    return { rules: [...rules].map(ruleToRecord) };
}

export function exportRuleSet(domain: string, rules: Iterable<Rule>): { domain: string; rules: RuleRecord[] } {
    return { domain, ...rulesToJson(rules) };
}

/**
 * Document form of in-memory rule sets, ready for JSON.stringify.
 */
export function toRuleSetDocument(ruleSets: ReadonlyMap<string, readonly Rule[]>): RuleSetDocument {
    const document: RuleSetDocument = {};
    for (const [domain, rules] of ruleSets) {
        document[domain] = rules.map(ruleToRecord);
    }
    return document;
}
