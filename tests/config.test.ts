/**
 * Configuration and CLI argument parsing
 */

import { BUNDLED_RULES_PATH, loadConfig, parseCycleGuard } from '../src/config.js';
import { parseCliArgs, parseRuleCommand, requireArgument, splitList } from '../src/cliArgs.js';
import { LogicException } from '../src/types/errors.js';

function configError(fn: () => unknown): LogicException {
    try {
        fn();
    } catch (e) {
        if (e instanceof LogicException) return e;
        throw e;
    }
    throw new Error('expected a LogicException');
}

describe('loadConfig', () => {
    test('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({
            rulesPath: BUNDLED_RULES_PATH,
            domain: 'medical',
            maxTableAtoms: 16,
            cycleGuard: 'path',
        });
    });

    test('reads environment overrides', () => {
        const config = loadConfig({
            PDM_RULES_PATH: '/tmp/rules.json',
            PDM_DOMAIN: 'loan',
            PDM_MAX_TABLE_ATOMS: '10',
            PDM_CYCLE_GUARD: 'shared',
        });
        expect(config).toEqual({
            rulesPath: '/tmp/rules.json',
            domain: 'loan',
            maxTableAtoms: 10,
            cycleGuard: 'shared',
        });
    });

    test('blank values count as unset', () => {
        const config = loadConfig({ PDM_MAX_TABLE_ATOMS: '', PDM_DOMAIN: '', PDM_CYCLE_GUARD: '' });
        expect(config.maxTableAtoms).toBe(16);
        expect(config.domain).toBe('medical');
        expect(config.cycleGuard).toBe('path');
    });

    test('rejects invalid values', () => {
        expect(configError(() => loadConfig({ PDM_MAX_TABLE_ATOMS: 'many' })).code).toBe('CONFIG_ERROR');
        expect(configError(() => loadConfig({ PDM_CYCLE_GUARD: 'global' })).code).toBe('CONFIG_ERROR');
    });
});

describe('parseCycleGuard', () => {
    test('accepts known strategies only', () => {
        expect(parseCycleGuard('shared')).toBe('shared');
        expect(configError(() => parseCycleGuard('none')).message)
            .toBe("Invalid configuration: cycle guard must be one of path, shared, got 'none'");
    });
});

describe('parseCliArgs', () => {
    test('splits command, positionals and options', () => {
        const args = parseCliArgs(['prove', 'Flu', '--facts', 'Fever, Cough', '--verbosity=detailed']);
        expect(args.command).toBe('prove');
        expect(args.positionals).toEqual(['Flu']);
        expect(args.facts).toEqual(['Fever', 'Cough']);
        expect(args.verbosity).toBe('detailed');
        expect(args.help).toBe(false);
    });

    test('reads table options', () => {
        const args = parseCliArgs(['table', 'A XOR B', '--atoms', 'B,A', '--filter', 'A OR B', '--cycle-guard=shared']);
        expect(args.atoms).toEqual(['B', 'A']);
        expect(args.filter).toBe('A OR B');
        expect(args.cycleGuard).toBe('shared');
    });

    test('repeated --facts accumulate', () => {
        expect(parseCliArgs(['forward', '--facts', 'A', '--facts=B']).facts).toEqual(['A', 'B']);
    });

    test('flags help and version', () => {
        const args = parseCliArgs(['-h', '--version']);
        expect(args.help).toBe(true);
        expect(args.version).toBe(true);
        expect(args.command).toBeUndefined();
    });

    test('rejects unknown options, missing values and bad levels', () => {
        expect(configError(() => parseCliArgs(['--engine', 'z3'])).message)
            .toBe("Invalid configuration: unknown option '--engine'");
        expect(configError(() => parseCliArgs(['prove', '--facts'])).code).toBe('CONFIG_ERROR');
        expect(configError(() => parseCliArgs(['--verbosity', 'loud'])).code).toBe('CONFIG_ERROR');
    });
});

describe('parseRuleCommand', () => {
    test('reads id, premise, conclusion and description', () => {
        expect(parseRuleCommand('R9 Fever AND Cough => Flu # flu check')).toEqual({
            id: 'R9',
            premise: 'Fever AND Cough',
            conclusion: 'Flu',
            description: 'flu check',
        });
    });

    test('description is optional', () => {
        expect(parseRuleCommand('R9 A -> B => C')).toEqual({
            id: 'R9',
            premise: 'A -> B',
            conclusion: 'C',
            description: '',
        });
    });

    test('requires the => separator', () => {
        expect(configError(() => parseRuleCommand('R9 A -> C')).code).toBe('CONFIG_ERROR');
    });
});

describe('splitList', () => {
    test('drops blanks', () => {
        expect(splitList('A,, B ,')).toEqual(['A', 'B']);
    });
});

describe('requireArgument', () => {
    test('passes a given value through', () => {
        expect(requireArgument('prove', 'Flu', 'goal')).toBe('Flu');
    });

    test('a blank value is a configuration error', () => {
        const error = configError(() => requireArgument('prove', '', 'goal'));
        expect(error.code).toBe('CONFIG_ERROR');
        expect(error.message).toBe("Invalid configuration: 'prove' needs a goal argument");
    });
});
