import { Command, CommanderError, Option } from 'commander';
import { readFileSync } from 'fs';
import { Diagnostic } from './types/diagnostic.js';
import { Reporter, OUTPUT_FORMATS, COLOR_MODES } from './core/reporter.js';
import { ConfigFields, DEFAULT_CONFIG_FILE, loadConfig, resolveSettings } from './core/config.js';
import { Expression, fromArguments, loadExpressionFiles } from './core/sources.js';
import { isRecord } from './core/schema.js';
import { evaluateExpression } from './core/expr/pipeline.js';
import { countBySeverity } from './core/diagnostics.js';

interface CliOptions {
    file: string[];
    ignore: string[];
    format?: string;
    color?: string;
    trace?: boolean;
    failFast?: boolean;
    config?: string;
    profile?: string;
}

function readVersion(): string {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    return isRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
}

function collect(val: string, memo: string[]): string[] {
    memo.push(val);
    return memo;
}

function toOverrides(options: CliOptions): ConfigFields {
    return {
        format: OUTPUT_FORMATS.find(f => f === options.format),
        color: COLOR_MODES.find(c => c === options.color),
        trace: options.trace,
        failFast: options.failFast,
        files: options.file,
        ignore: options.ignore
    };
}

async function evaluateCommand(args: string[], options: CliOptions, cwd: string, version: string): Promise<number> {
    const diagnostics: Diagnostic[] = [];

    const loaded = loadConfig(options.config, cwd);
    diagnostics.push(...loaded.diagnostics);

    const resolved = resolveSettings(loaded.config, options.profile, toOverrides(options), options.config ?? DEFAULT_CONFIG_FILE);
    diagnostics.push(...resolved.diagnostics);
    const { settings } = resolved;

    // A broken config (bad syntax, unknown profile, missing --config file) stops before evaluating anything.
    const configBroken = countBySeverity(diagnostics).errors > 0;

    const reporter = new Reporter({ format: settings.format, color: settings.color, trace: settings.trace });

    const expressions: Expression[] = fromArguments(args);
    if (settings.files.length > 0) {
        const fromFiles = await loadExpressionFiles(settings.files, { cwd, ignore: settings.ignore });
        expressions.push(...fromFiles.expressions);
        diagnostics.push(...fromFiles.diagnostics);
    }

    if (expressions.length === 0) {
        diagnostics.push({
            code: 'NO_EXPRESSIONS',
            message: 'No expressions to evaluate. Pass them as arguments or with --file.',
            severity: 'error',
            file: '<input>'
        });
    }

    reporter.printBanner(version, expressions.length);
    reporter.printDiagnostics(diagnostics);

    const counts = countBySeverity(diagnostics);
    let passed = 0;
    let failed = 0;

    if (!configBroken) {
        for (const expression of expressions) {
            const evaluation = evaluateExpression(expression.text);
            reporter.printEvaluation(expression, evaluation);

            if (evaluation.ok) {
                passed++;
                continue;
            }

            failed++;
            if (settings.failFast) {
                reporter.printInfo('Stopping at first failure (--fail-fast).');
                break;
            }
        }
    }

    const exitCode = failed > 0 || counts.errors > 0 ? 1 : 0;

    reporter.printSummary({
        expressions: { total: expressions.length, passed, failed },
        diagnostics: counts,
        exitCode
    });

    if (exitCode === 0 && counts.warnings === 0) {
        reporter.printSuccess();
    }

    return exitCode;
}

export function createProgram(cwd: string, onExit: (code: number) => void): Command {
    const version = readVersion();
    const program = new Command();

    program
        .name('linecalc')
        .description('Evaluates integer +/- expressions, left to right')
        .version(version)
        .argument('[expressions...]', 'Expressions to evaluate, e.g. "10 + 3 - 2". Use -- before expressions that look like options')
        .option('-f, --file <glob>', 'Read expressions from files, one per line (can be used multiple times)', collect, [])
        .option('--ignore <glob>', 'Ignore files matching the given glob patterns (can be used multiple times)', collect, [])
        .addOption(new Option('--format <format>', 'Output format (default: pretty)').choices(OUTPUT_FORMATS))
        .addOption(new Option('--color <mode>', 'Color output (default: auto)').choices(COLOR_MODES))
        .option('--trace', 'Print the token sequence of every expression')
        .option('--fail-fast', 'Stop at the first expression that fails')
        .option('--config <path>', `Path to a config file (defaults to ${DEFAULT_CONFIG_FILE} in the working directory)`)
        .option('--profile <name>', 'Use a specific profile from the config file')
        // Operator-led input such as "-5" is kept as an expression so the evaluator can report it.
        .allowUnknownOption()
        .action(async (expressions: string[], options: CliOptions) => {
            onExit(await evaluateCommand(expressions, options, cwd, version));
        });

    return program;
}

/**
 * Runs the CLI against `argv` (as found in `process.argv`) and resolves to the
 * process exit code.
 */
export async function run(argv: readonly string[], cwd: string = process.cwd()): Promise<number> {
    let exitCode = 0;
    const program = createProgram(cwd, code => { exitCode = code; });
    program.exitOverride();

    try {
        await program.parseAsync([...argv]);
    } catch (e) {
        if (e instanceof CommanderError) {
            return e.exitCode;
        }
        throw e;
    }

    return exitCode;
}
