import { Token } from './tokens.js';
import { LexError, ParseError, describeLexError, describeParseError } from './errors.js';
import { scan } from './tokenizer.js';
import { evaluateTokens } from './evaluator.js';

export type Evaluation =
    | { ok: true; input: string; tokens: Token[]; value: bigint }
    | { ok: false; stage: 'scan'; input: string; error: LexError }
    | { ok: false; stage: 'parse'; input: string; tokens: Token[]; error: ParseError };

export type FailedEvaluation = Extract<Evaluation, { ok: false }>;

export function evaluateExpression(input: string): Evaluation {
    const scanned = scan(input);
    if (!scanned.ok) {
        return { ok: false, stage: 'scan', input, error: scanned.error };
    }

    const tokens = scanned.value;
    const evaluated = evaluateTokens(tokens);
    if (!evaluated.ok) {
        return { ok: false, stage: 'parse', input, tokens, error: evaluated.error };
    }

    return { ok: true, input, tokens, value: evaluated.value };
}

export function describeEvaluation(evaluation: FailedEvaluation): string {
    return evaluation.stage === 'scan'
        ? describeLexError(evaluation.error)
        : describeParseError(evaluation.error);
}
