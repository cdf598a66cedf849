import { Diagnostic, DiagnosticCode, Range } from '../types/diagnostic.js';
import { FailedEvaluation, describeEvaluation } from './expr/pipeline.js';
import type { Expression } from './sources.js';

function failureCode(evaluation: FailedEvaluation): DiagnosticCode {
    if (evaluation.stage === 'scan') {
        return 'INVALID_CHARACTER';
    }
    return evaluation.error.kind === 'UnexpectedEndOfInput' ? 'UNEXPECTED_END_OF_INPUT' : 'INVALID_TOKEN';
}

function lineRange(line: number, startOffset: number, endOffset: number): Range {
    return {
        start: { line, col: startOffset + 1, offset: startOffset },
        end: { line, col: endOffset + 1, offset: endOffset }
    };
}

/**
 * Lexical failures point at the offending character. Parse failures span the
 * whole line since tokens keep no source positions.
 */
export function toDiagnostic(expression: Expression, evaluation: FailedEvaluation): Diagnostic {
    const range = evaluation.stage === 'scan'
        ? lineRange(expression.line, evaluation.error.position, evaluation.error.position + 1)
        : lineRange(expression.line, 0, Array.from(expression.text).length);

    return {
        code: failureCode(evaluation),
        message: describeEvaluation(evaluation),
        severity: 'error',
        file: expression.file,
        range,
        source: expression.text
    };
}

export function countBySeverity(diagnostics: readonly Diagnostic[]): { errors: number; warnings: number } {
    let errors = 0;
    let warnings = 0;
    for (const d of diagnostics) {
        if (d.severity === 'error') errors++;
        else warnings++;
    }
    return { errors, warnings };
}
