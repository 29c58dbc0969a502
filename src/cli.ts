#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'fs';
import * as readline from 'readline';
import chalk from 'chalk';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { parseCliArgs, parseRuleCommand, requireArgument, splitList } from './cliArgs.js';
import type { CliArgs } from './cliArgs.js';
import { parse, tryParse } from './parser/index.js';
import { collectAtoms, formulaToString } from './ast/index.js';
import { FileRuleSetStorage } from './rules/index.js';
import { ReasoningSession } from './session/session.js';
import { generateTruthTable, resolveAtoms, satisfyingRows } from './truthTable.js';
import { LogicException } from './types/errors.js';
import type { ProofNode, TableView, Verbosity } from './types/index.js';
import { assignmentFromFacts, evaluate } from './utils/evaluation.js';
import { formatForwardResult, formatProofTree, formatRules, formatTableView } from './utils/formatting.js';

const VERSION = '1.0.0';
const HELP = `
Propositional Decision Maker v${VERSION}

Usage:
  pdm eval <formula>      Evaluate a formula with --facts true, all else false
  pdm table <formula>     Print the truth table of a formula and its true rows
  pdm validate <file>     Check syntax of every line of a file
  pdm forward             Forward-chain from --facts over the domain's rules
  pdm prove <goal>        Backward-chain a proof of <goal> from --facts
  pdm rules               List the domain's rules
  pdm repl                Interactive mode

Options:
  --facts <A,B,...>           Atoms asserted true
  --atoms <A,B,...>           Column order for 'table' (default: sorted atoms)
  --filter <formula>          Keep only 'table' rows where the formula holds
  --rules <file>              Rule-set JSON file (env PDM_RULES_PATH)
  --domain <name>             Rule-set domain (env PDM_DOMAIN, default medical)
  --verbosity <level>         minimal | standard | detailed
  --cycle-guard <strategy>    path | shared (env PDM_CYCLE_GUARD)
  --help, -h                  Show this help
  --version, -v               Show version

Formula syntax:
  NOT/~   AND/&   XOR   OR/|   ->   <->   ( )      (tightest to loosest: NOT first)

Examples:
  pdm eval "Fever AND (Cough OR SoreThroat) -> Flu" --facts Fever,Cough
  pdm prove Flu --facts Fever,Cough --verbosity detailed
  pdm table "A XOR B" --filter "A OR B"
`;

function verdict(ok: boolean, yes: string, no: string): string {
    return ok ? chalk.green(`✓ ${yes}`) : chalk.red(`✗ ${no}`);
}

function describeError(e: unknown): string {
    if (e instanceof LogicException) {
        const hint = e.error.suggestion ? chalk.dim(`\n  Hint: ${e.error.suggestion}`) : '';
        return `${e.message}${hint}`;
    }
    return e instanceof Error ? e.message : String(e);
}

async function openSession(config: Config): Promise<ReasoningSession> {
    const storage = new FileRuleSetStorage(config.rulesPath);
    const ruleSets = await storage.load();
    return new ReasoningSession(ruleSets, {
        domain: config.domain,
        maxTableAtoms: config.maxTableAtoms,
        cycleGuard: config.cycleGuard,
    });
}

function printTableView(view: TableView): void {
    const text = formatTableView(view);
    console.log(view.kind === 'evaluated' ? chalk.yellow(text) : text);
}

function printProof(proof: ProofNode, verbosity: Verbosity): void {
    console.log(verdict(proof.succeeded, `PROVED ${proof.goal}`, `NOT PROVED ${proof.goal}`));
    if (verbosity !== 'minimal') {
        console.log(formatProofTree(proof));
    }
}

async function main(): Promise<number> {
    const args = parseCliArgs(process.argv.slice(2));

    if (args.version) {
        console.log(VERSION);
        return 0;
    }
    if (args.help || !args.command) {
        console.log(HELP);
        return 0;
    }

    const env = loadConfig();
    const config: Config = {
        rulesPath: args.rulesPath ?? env.rulesPath,
        domain: args.domain ?? env.domain,
        maxTableAtoms: env.maxTableAtoms,
        cycleGuard: args.cycleGuard ?? env.cycleGuard,
    };

    switch (args.command) {
        case 'eval': {
            const text = requirePositional(args, 'formula');
            const session = await openSession(config);
            args.facts.forEach(f => session.assertFact(f));
            const formula = parse(text);
            const value = session.evaluate(formula);
            if (args.verbosity !== 'minimal') {
                console.log(chalk.dim(`Formula: ${formulaToString(formula)}`));
                console.log(chalk.dim(`Facts: ${session.facts().join(', ') || '(none)'}`));
            }
            console.log(value ? chalk.green('TRUE') : chalk.red('FALSE'));
            return value ? 0 : 1;
        }
        case 'table': {
            const formula = parse(requirePositional(args, 'formula'));
            const filter = args.filter !== undefined
                ? { name: 'Filter', formula: parse(args.filter) }
                : undefined;
            const columns = [{ name: 'Formula', formula }];
            const atoms = resolveAtoms(filter ? [...columns, filter] : columns, args.atoms);
            if (atoms.length > config.maxTableAtoms) {
                const facts = new Set(args.facts);
                printTableView({
                    kind: 'evaluated',
                    atomCount: atoms.length,
                    maxAtoms: config.maxTableAtoms,
                    value: evaluate(formula, assignmentFromFacts(collectAtoms(formula), facts)),
                });
                return 0;
            }
            const table = generateTruthTable(columns, { atoms, filter });
            printTableView({ kind: 'table', table, trueRows: satisfyingRows(table, 'Formula') });
            if (args.verbosity !== 'minimal') {
                console.log(chalk.dim(`Rows: ${table.rows.length} of 2^${atoms.length}`));
            }
            return 0;
        }
        case 'validate': {
            const fileName = requirePositional(args, 'file');
            const lines = readFileSync(fileName, 'utf-8').split('\n')
                .map(l => l.trim())
                .filter(l => l && !l.startsWith('#'));
            let allValid = true;
            for (const line of lines) {
                const result = tryParse(line);
                if (result.ok) {
                    console.log(`${chalk.green('✓')} ${line}`);
                } else {
                    console.log(`${chalk.red('✗')} ${line}`);
                    console.log(`  Error: ${describeError(result.error)}`);
                    allValid = false;
                }
            }
            return allValid ? 0 : 1;
        }
        case 'forward': {
            const session = await openSession(config);
            args.facts.forEach(f => session.assertFact(f));
            const result = session.forward();
            console.log(formatForwardResult(result, args.verbosity));
            return result.contradictions.length === 0 ? 0 : 1;
        }
        case 'prove': {
            const goal = requirePositional(args, 'goal');
            const session = await openSession(config);
            args.facts.forEach(f => session.assertFact(f));
            const proof = session.prove(goal);
            printProof(proof, args.verbosity);
            return proof.succeeded ? 0 : 1;
        }
        case 'rules': {
            const session = await openSession(config);
            console.log(chalk.bold(`Domain: ${session.domain}`));
            console.log(formatRules(session.rules(), args.verbosity));
            return 0;
        }
        case 'repl': {
            const session = await openSession(config);
            args.facts.forEach(f => session.assertFact(f));
            await runRepl(session, args.verbosity);
            return 0;
        }
        default:
            console.error(`Unknown command: ${args.command}`);
            console.log(HELP);
            return 1;
    }
}

function requirePositional(args: CliArgs, what: string): string {
    return requireArgument(args.command ?? '', args.positionals[0] ?? '', what);
}

const REPL_HELP = `Commands:
  .fact <A,B,...>       Assert facts
  .retract <A>          Retract a fact
  .facts                List current facts
  .rule <id> <premise> => <conclusion> [# description]
                        Add a custom rule to the current domain
  .rules                List rules of the current domain
  .domain [name]        Show or switch the domain
  .eval <formula>       Evaluate under the current facts
  .table <formula>      Truth table over rule atoms and formula atoms
  .load <file>          Replace the domain's custom rules from a rule-set file
  .save <file>          Write the domain's rules into a rule-set file
  .forward              Run forward chaining
  .prove <goal>         Run backward chaining
  .export               Print the domain's rules as JSON
  .reset                Drop custom rules and facts
  .quit, .exit, .q      Exit REPL
  .help                 Show this help`;

async function handleReplLine(session: ReasoningSession, line: string, verbosity: Verbosity): Promise<boolean> {
    const space = line.indexOf(' ');
    const command = space === -1 ? line : line.slice(0, space);
    const rest = space === -1 ? '' : line.slice(space + 1).trim();

    switch (command) {
        case '.help':
            console.log(REPL_HELP);
            break;
        case '.fact':
            splitList(rest).forEach(f => session.assertFact(f));
            console.log(`Facts: ${session.facts().join(', ') || '(none)'}`);
            break;
        case '.retract':
            console.log(session.retractFact(rest) ? `Retracted ${rest}` : `${rest} was not a fact`);
            break;
        case '.facts':
            console.log(session.facts().join(', ') || '(none)');
            break;
        case '.rule': {
            const cmd = parseRuleCommand(rest);
            const rule = session.addRuleFromText(cmd.id, cmd.premise, cmd.conclusion, cmd.description);
            console.log(chalk.green(`✓ Added rule ${rule.id}`));
            break;
        }
        case '.rules':
            console.log(formatRules(session.rules(), verbosity));
            break;
        case '.domain':
            if (rest) session.selectDomain(rest);
            console.log(`Domain: ${session.domain} (available: ${session.domains().join(', ')})`);
            break;
        case '.eval':
            console.log(session.evaluate(rest) ? chalk.green('TRUE') : chalk.red('FALSE'));
            break;
        case '.table':
            printTableView(session.tableView(rest));
            break;
        case '.load': {
            const document: unknown = JSON.parse(readFileSync(requireArgument(command, rest, 'file'), 'utf-8'));
            const loaded = session.loadCustomRules(document);
            console.log(chalk.green(`✓ Loaded ${loaded.length} custom rule(s) for ${session.domain}`));
            break;
        }
        case '.save':
            await session.saveRules(new FileRuleSetStorage(requireArgument(command, rest, 'file')));
            console.log(chalk.green(`✓ Saved ${session.rules().length} rule(s) for ${session.domain} to ${rest}`));
            break;
        case '.forward':
            console.log(formatForwardResult(session.forward(), verbosity));
            break;
        case '.prove':
            printProof(session.prove(rest), verbosity);
            break;
        case '.export':
            console.log(JSON.stringify(session.export(), null, 2));
            break;
        case '.reset':
            session.reset();
            console.log('Cleared.');
            break;
        case '.quit':
        case '.exit':
        case '.q':
            return false;
        default:
            console.log('Unknown command. Type .help for the list of commands.');
    }
    return true;
}

async function runRepl(session: ReasoningSession, verbosity: Verbosity): Promise<void> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'pdm> ',
    });

    console.log(`Propositional Decision Maker REPL v${VERSION} - domain ${session.domain}`);
    console.log('Type .help for commands.\n');
    rl.prompt();

    for await (const line of rl) {
        const trimmed = line.trim();
        if (trimmed) {
            try {
                if (!(await handleReplLine(session, trimmed, verbosity))) {
                    break;
                }
            } catch (e) {
                console.log(chalk.red(`✗ ${describeError(e)}`));
            }
        }
        rl.prompt();
    }
    rl.close();
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch(e => {
        console.error(chalk.red('Error:'), describeError(e));
        process.exitCode = 1;
    });
