import { Diagnostic, Severity } from '../types/diagnostic.js';
import { Evaluation } from './expr/pipeline.js';
import { formatTokens } from './expr/tokens.js';
import { toDiagnostic } from './diagnostics.js';
import { Expression } from './sources.js';
import ansis from 'ansis';

export type OutputFormat = 'pretty' | 'plain' | 'json' | 'compact';
export type ColorMode = 'auto' | 'always' | 'never';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'plain', 'json', 'compact'];
export const COLOR_MODES: readonly ColorMode[] = ['auto', 'always', 'never'];

export interface ReporterOptions {
    color: ColorMode;
    format: OutputFormat;
    trace: boolean;
}

export interface SummaryStats {
    expressions: { total: number; passed: number; failed: number };
    diagnostics: { errors: number; warnings: number };
    exitCode: number;
}

const CONTEXT_PREFIX = '    ↳ ';

export class Reporter {
    private options: ReporterOptions;
    private shouldColor: boolean;
    private startTime: number;

    constructor(options: ReporterOptions) {
        this.options = options;
        this.shouldColor = this.shouldUseColor();
        this.startTime = Date.now();
    }

    private shouldUseColor(): boolean {
        if (this.options.color === 'never') return false;
        if (this.options.color === 'always') return true;
        if (this.options.format === 'plain') return false; // Plain format never uses color

        // auto mode: check environment
        const hasColorEnv = process.env.NO_COLOR !== undefined;
        const hasForceColor = process.env.FORCE_COLOR !== undefined;
        const isTTY = process.stdout.isTTY;

        return !hasColorEnv && (hasForceColor || isTTY);
    }

    private getElapsedTime(): string {
        const elapsed = Date.now() - this.startTime;
        return (elapsed / 1000).toFixed(2);
    }

    private colorize(text: string, color: (text: string) => string): string {
        return this.shouldColor ? color(text) : text;
    }

    private isMachineFormat(): boolean {
        return this.options.format === 'json' || this.options.format === 'compact';
    }

    private getSeverityIcon(severity: Severity): string {
        return severity === 'error' ? '✖' : '⚠';
    }

    private getSeverityColor(severity: Severity): (text: string) => string {
        return severity === 'error' ? ansis.red : ansis.yellow;
    }

    private formatLocation(diagnostic: Diagnostic): string {
        const { file, range } = diagnostic;
        return range ? `${file}:${range.start.line}:${range.start.col}` : file;
    }

    private formatDiagnostic(diagnostic: Diagnostic): string {
        const { code, message, severity } = diagnostic;
        const icon = this.getSeverityIcon(severity);
        const severityText = severity.toUpperCase();

        const coloredIcon = this.colorize(icon, this.getSeverityColor(severity));
        const coloredSeverity = this.colorize(severityText, this.getSeverityColor(severity));
        const coloredCode = this.colorize(`[${code}]`, ansis.cyan);
        const coloredLocation = this.colorize(this.formatLocation(diagnostic), ansis.bold);

        return `  ${coloredIcon} ${coloredSeverity}  ${coloredCode}  ${coloredLocation}  ${message}`;
    }

    private formatCompactDiagnostic(diagnostic: Diagnostic): string {
        const severityChar = diagnostic.severity === 'error' ? 'E' : 'W';
        return `${this.formatLocation(diagnostic)} [${diagnostic.code}] ${severityChar}: ${diagnostic.message}`;
    }

    private formatContext(context: string): string {
        return this.colorize(`${CONTEXT_PREFIX}${context}`, ansis.dim);
    }

    private formatMarker(diagnostic: Diagnostic): string | undefined {
        if (!diagnostic.range) return undefined;
        const { start, end } = diagnostic.range;
        const width = Math.max(1, end.offset - start.offset);
        const padding = ' '.repeat(CONTEXT_PREFIX.length + start.offset);
        return `${padding}${this.colorize('^'.repeat(width), this.getSeverityColor(diagnostic.severity))}`;
    }

    private printDiagnostic(diagnostic: Diagnostic): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify(diagnostic));
            return;
        }

        if (this.options.format === 'compact') {
            console.log(this.formatCompactDiagnostic(diagnostic));
            return;
        }

        console.log(this.formatDiagnostic(diagnostic));

        if (diagnostic.source !== undefined) {
            console.log(this.formatContext(diagnostic.source));
            const marker = this.formatMarker(diagnostic);
            if (marker) console.log(marker);
        }
    }

    printBanner(version: string, expressionCount: number): void {
        if (this.isMachineFormat()) {
            return;
        }

        const date = new Date().toLocaleString('en-US', {
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit'
        });

        const header = this.colorize(`┌ linecalc ${version}  •  Evaluating ${expressionCount} expression${expressionCount === 1 ? '' : 's'}  •  ${date}`, ansis.bold);
        const divider = this.colorize('└────────────────────────────────────────────────────────', ansis.dim);

        console.log(header);
        console.log(divider);
        console.log();
    }

    printEvaluation(expression: Expression, evaluation: Evaluation): void {
        const tokens = evaluation.ok || evaluation.stage === 'parse' ? evaluation.tokens : undefined;

        if (this.options.format === 'json') {
            const traced = this.options.trace && tokens ? { tokens: formatTokens(tokens) } : {};
            const record = evaluation.ok
                ? { file: expression.file, line: expression.line, input: expression.text, ok: true, value: evaluation.value.toString(), ...traced }
                : { file: expression.file, line: expression.line, input: expression.text, ok: false, diagnostic: toDiagnostic(expression, evaluation), ...traced };
            console.log(JSON.stringify(record));
            return;
        }

        if (this.options.format === 'compact') {
            if (evaluation.ok) {
                console.log(`${expression.file}:${expression.line} ${expression.text} = ${evaluation.value}`);
            } else {
                console.log(this.formatCompactDiagnostic(toDiagnostic(expression, evaluation)));
            }
            return;
        }

        if (evaluation.ok) {
            const successIcon = this.colorize('✓', ansis.green);
            const value = this.colorize(evaluation.value.toString(), ansis.bold);
            console.log(`  ${successIcon} ${expression.text}  =  ${value}`);
        } else {
            this.printDiagnostic(toDiagnostic(expression, evaluation));
        }

        if (this.options.trace && tokens) {
            this.printTrace(formatTokens(tokens));
        }
    }

    printTrace(tokens: string): void {
        console.log(this.formatContext(`Tokens: ${tokens}`));
    }

    printDiagnostics(diagnostics: readonly Diagnostic[]): void {
        diagnostics.forEach(diagnostic => this.printDiagnostic(diagnostic));
    }

    printSummary(stats: SummaryStats): void {
        if (this.options.format === 'json') {
            console.log(JSON.stringify({
                summary: stats,
                timing: { elapsedSeconds: this.getElapsedTime() }
            }));
            return;
        }

        const { expressions, diagnostics } = stats;

        if (this.options.format === 'compact') {
            console.log(`Summary: ${expressions.passed} passed, ${expressions.failed} failed, ${diagnostics.errors} errors, ${diagnostics.warnings} warnings (${this.getElapsedTime()}s)`);
            return;
        }

        const divider = this.colorize('────────────────────────────────────────────────────────', ansis.dim);
        console.log();
        console.log(divider);
        console.log(this.colorize('Summary', ansis.bold));
        console.log();

        console.log(this.colorize('Expressions:', ansis.cyan) + ` ${expressions.total}`);
        const passedStr = this.colorize(`Passed: ${expressions.passed}`, ansis.green);
        const failedStr = this.colorize(`Failed: ${expressions.failed}`, expressions.failed > 0 ? ansis.red : ansis.dim);
        console.log(`  ${passedStr}  ${failedStr}`);
        console.log();

        if (diagnostics.errors > 0 || diagnostics.warnings > 0) {
            const errorsStr = this.colorize(`Errors: ${diagnostics.errors}`, diagnostics.errors > 0 ? ansis.red : ansis.dim);
            const warningsStr = this.colorize(`Warnings: ${diagnostics.warnings}`, diagnostics.warnings > 0 ? ansis.yellow : ansis.dim);
            console.log(this.colorize('Other diagnostics:', ansis.cyan));
            console.log(`  ${errorsStr}  ${warningsStr}`);
            console.log();
        }

        console.log(this.colorize(`Evaluated ${expressions.total} expressions in ${this.getElapsedTime()}s`, ansis.dim));

        const exitLine = `Exit code: ${stats.exitCode}`;
        console.log(this.colorize(exitLine, stats.exitCode === 0 ? ansis.green : ansis.red));
    }

    printSuccess(): void {
        if (this.isMachineFormat()) {
            return;
        }

        console.log();
        const successIcon = this.colorize('✓', ansis.green);
        const successMsg = this.colorize('All expressions evaluated!', ansis.green.bold);
        console.log(`${successIcon} ${successMsg}`);
    }

    printInfo(message: string): void {
        if (this.isMachineFormat()) return;

        console.log(this.colorize(message, ansis.dim));
    }
}
