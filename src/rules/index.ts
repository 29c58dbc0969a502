export { createRule, conclusionAtoms, premiseAtoms, collectRuleAtoms } from './rule.js';
export {
    RuleRecordSchema,
    RuleSetDocumentSchema,
    loadRules,
    loadRuleSets,
    ruleToRecord,
    rulesToJson,
    exportRuleSet,
    toRuleSetDocument,
} from './loader.js';
export type { RuleSetStorage } from './storage.js';
export { MemoryRuleSetStorage } from './storage.js';
export { FileRuleSetStorage } from './file-storage.js';
