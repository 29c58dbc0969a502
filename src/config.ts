/**
 * Runtime configuration, read from environment variables.
 *
 *   PDM_RULES_PATH       rule-set JSON file
 *   PDM_DOMAIN           domain selected at start-up
 *   PDM_MAX_TABLE_ATOMS  largest atom count shown as a full truth table
 *   PDM_CYCLE_GUARD      backward-chaining guard: path | shared
 */

import path from 'path';
import { z } from 'zod';
import { CYCLE_GUARDS, DEFAULTS } from './types/index.js';
import type { CycleGuard } from './types/index.js';
import { createConfigError } from './types/errors.js';

export interface Config {
    rulesPath: string;
    domain: string;
    maxTableAtoms: number;
    cycleGuard: CycleGuard;
}

/** Rule sets shipped with the package */
export const BUNDLED_RULES_PATH = path.resolve(__dirname, '..', 'rules', 'default-rules.json');

// A blank line such as `PDM_DOMAIN=` in .env leaves the variable unset
const unset = (value: unknown): unknown => (value === '' ? undefined : value);

const ConfigSchema = z.object({
    PDM_RULES_PATH: z.preprocess(unset, z.string().min(1).default(BUNDLED_RULES_PATH)),
    PDM_DOMAIN: z.preprocess(unset, z.string().min(1).default(DEFAULTS.domain)),
    PDM_MAX_TABLE_ATOMS: z.preprocess(unset, z.coerce.number().int().min(0).max(24).default(DEFAULTS.maxTableAtoms)),
    PDM_CYCLE_GUARD: z.preprocess(unset, z.enum(['path', 'shared']).default(DEFAULTS.cycleGuard)),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = ConfigSchema.safeParse(env);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw createConfigError(`${issue.path.join('.')}: ${issue.message}`, {
            issues: result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
        });
    }

    const parsed = result.data;
    return {
        rulesPath: parsed.PDM_RULES_PATH,
        domain: parsed.PDM_DOMAIN,
        maxTableAtoms: parsed.PDM_MAX_TABLE_ATOMS,
        cycleGuard: parsed.PDM_CYCLE_GUARD,
    };
}

export function parseCycleGuard(value: string): CycleGuard {
    const guard = CYCLE_GUARDS.find(g => g === value);
    if (guard === undefined) {
        throw createConfigError(`cycle guard must be one of ${CYCLE_GUARDS.join(', ')}, got '${value}'`);
    }
    return guard;
}
