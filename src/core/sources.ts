import fg from 'fast-glob';
import { readFileSync } from 'fs';
import path from 'path';
import { Diagnostic } from '../types/diagnostic.js';
import { stripBom } from '../parser/yaml.js';

export interface Expression {
    text: string;
    file: string;
    line: number;
}

export interface LoadedExpressions {
    expressions: Expression[];
    diagnostics: Diagnostic[];
}

export interface FileSourceOptions {
    cwd: string;
    ignore?: string[];
}

export function fromArguments(args: readonly string[]): Expression[] {
    return args.map((text, index) => ({ text, file: `<arg:${index + 1}>`, line: 1 }));
}

/**
 * One expression per line. Blank lines and `#` comments are skipped, the rest
 * is kept verbatim (apart from a trailing CR) so that stray characters still
 * get reported by the scanner.
 */
export function parseExpressionFile(content: string, file: string): Expression[] {
    const expressions: Expression[] = [];
    const lines = stripBom(content).split('\n');

    lines.forEach((raw, index) => {
        const text = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
        const trimmed = text.trim();
        if (trimmed === '' || trimmed.startsWith('#')) return;
        expressions.push({ text, file, line: index + 1 });
    });

    return expressions;
}

export async function loadExpressionFiles(patterns: readonly string[], options: FileSourceOptions): Promise<LoadedExpressions> {
    const expressions: Expression[] = [];
    const diagnostics: Diagnostic[] = [];
    const seen = new Set<string>();
    const ignore = ['**/node_modules/**', ...(options.ignore || [])];

    for (const pattern of patterns) {
        const matches = await fg(pattern, { cwd: options.cwd, absolute: true, onlyFiles: true, ignore });

        if (matches.length === 0) {
            diagnostics.push({
                code: 'NO_EXPRESSIONS',
                message: `No files matched "${pattern}"`,
                severity: 'warning',
                file: pattern
            });
            continue;
        }

        for (const match of matches.sort()) {
            if (seen.has(match)) continue;
            seen.add(match);

            const file = path.relative(options.cwd, match);
            try {
                expressions.push(...parseExpressionFile(readFileSync(match, 'utf8'), file));
            } catch (e) {
                diagnostics.push({
                    code: 'FILE_READ_ERROR',
                    message: `Failed to read ${file}: ${e instanceof Error ? e.message : String(e)}`,
                    severity: 'error',
                    file
                });
            }
        }
    }

    return { expressions, diagnostics };
}
