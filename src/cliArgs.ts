/**
 * Command-line argument handling for the `pdm` CLI
 */

import type { CycleGuard, Verbosity } from './types/index.js';
import { VERBOSITY_LEVELS } from './types/index.js';
import { createConfigError } from './types/errors.js';
import { parseCycleGuard } from './config.js';

export interface CliArgs {
    command?: string;
    positionals: string[];
    facts: string[];
    atoms?: string[];
    filter?: string;
    rulesPath?: string;
    domain?: string;
    verbosity: Verbosity;
    cycleGuard?: CycleGuard;
    help: boolean;
    version: boolean;
}

const VALUE_OPTIONS = ['facts', 'atoms', 'filter', 'rules', 'domain', 'verbosity', 'cycle-guard'] as const;
type ValueOption = typeof VALUE_OPTIONS[number];

function isValueOption(name: string): name is ValueOption {
    return VALUE_OPTIONS.some(o => o === name);
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function splitList(value: string): string[] {
    return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

/**
 * The argument a command needs, or CONFIG_ERROR when it is blank
 */
export function requireArgument(command: string, value: string, what: string): string {
    if (!value) {
        throw createConfigError(`'${command}' needs a ${what} argument`);
    }
    return value;
}

function parseVerbosity(value: string): Verbosity {
    const level = VERBOSITY_LEVELS.find(v => v === value);
    if (level === undefined) {
        throw createConfigError(`verbosity must be one of ${VERBOSITY_LEVELS.join(', ')}, got '${value}'`);
    }
    return level;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        positionals: [],
        facts: [],
        verbosity: 'standard',
        help: false,
        version: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
            continue;
        }
        if (arg === '--version' || arg === '-v') {
            args.version = true;
            continue;
        }
        if (!arg.startsWith('--')) {
            args.positionals.push(arg);
            continue;
        }

        const eq = arg.indexOf('=');
        const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
        if (!isValueOption(name)) {
            throw createConfigError(`unknown option '--${name}'`);
        }

        let value: string;
        if (eq !== -1) {
            value = arg.slice(eq + 1);
        } else if (i + 1 < argv.length) {
            value = argv[++i];
        } else {
            throw createConfigError(`option '--${name}' needs a value`);
        }

        switch (name) {
            case 'facts': args.facts.push(...splitList(value)); break;
            case 'atoms': args.atoms = splitList(value); break;
            case 'filter': args.filter = value; break;
            case 'rules': args.rulesPath = value; break;
            case 'domain': args.domain = value; break;
            case 'verbosity': args.verbosity = parseVerbosity(value); break;
            case 'cycle-guard': args.cycleGuard = parseCycleGuard(value); break;
        }
    }

    args.command = args.positionals.shift();
    return args;
}

export interface RuleCommand {
    id: string;
    premise: string;
    conclusion: string;
    description: string;
}

/**
 * Parse `<id> <premise> => <conclusion> [# description]` as typed in the REPL
 */
export function parseRuleCommand(text: string): RuleCommand {
    const match = /^\s*(\S+)\s+(.+?)\s*=>\s*(.+?)\s*(?:#\s*(.*))?$/.exec(text);
    if (!match) {
        throw createConfigError(`expected '<id> <premise> => <conclusion> [# description]', got '${text}'`);
    }
    return {
        id: match[1],
        premise: match[2],
        conclusion: match[3],
        description: (match[4] ?? '').trim(),
    };
}
