import fs from 'fs/promises';
import path from 'path';
import type { Rule, RuleSetDocument } from '../types/index.js';
import { DEFAULTS } from '../types/index.js';
import { createRuleLoadError } from '../types/errors.js';
import { RuleSetStorage } from './storage.js';
import { loadRuleSets, toRuleSetDocument } from './loader.js';

/**
 * Rule sets kept in a single JSON document on disk.
 * A missing file reads as the empty default domains; any other I/O or
 * JSON failure propagates.
 */
export class FileRuleSetStorage implements RuleSetStorage {
    private filePath: string;

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    get path(): string {
        return this.filePath;
    }

    async read(): Promise<unknown> {
        let data: string;
        try {
            data = await fs.readFile(this.filePath, 'utf-8');
        } catch (e) {
            if (isNotFound(e)) {
                return emptyDocument();
            }
            throw e;
        }

        try {
            return JSON.parse(data);
        } catch (e) {
            throw createRuleLoadError(`${this.filePath} is not valid JSON`, {
                file: this.filePath,
                cause: e instanceof Error ? e.message : String(e),
            });
        }
    }

    async load(): Promise<Map<string, Rule[]>> {
        return loadRuleSets(await this.read());
    }

    async save(domain: string, rules: readonly Rule[]): Promise<void> {
        const ruleSets = await this.load();
        ruleSets.set(domain, [...rules]);
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.filePath, JSON.stringify(toRuleSetDocument(ruleSets), null, 2) + '\n', 'utf-8');
    }
}

function emptyDocument(): RuleSetDocument {
    return Object.fromEntries(DEFAULTS.domains.map(d => [d, []]));
}

function isNotFound(e: unknown): boolean {
    return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}
