export { scan, Scanner } from './core/expr/tokenizer.js';
export { evaluateTokens, Evaluator } from './core/expr/evaluator.js';
export { evaluateExpression, describeEvaluation } from './core/expr/pipeline.js';
export type { Evaluation, FailedEvaluation } from './core/expr/pipeline.js';
export { PLUS, SUBTRACT, numberToken, formatToken, formatTokens, ok, fail } from './core/expr/tokens.js';
export type { Token, TokenKind, Result, Success, Failure } from './core/expr/tokens.js';
export {
    ContractViolationError,
    describeLexError,
    describeParseError,
    invalidCharacter,
    invalidToken,
    UNEXPECTED_END_OF_INPUT
} from './core/expr/errors.js';
export type { LexError, ParseError } from './core/expr/errors.js';
export { toDiagnostic } from './core/diagnostics.js';
export type { Diagnostic, DiagnosticCode, Severity, Range, Location } from './types/diagnostic.js';
export { run } from './cli.js';
