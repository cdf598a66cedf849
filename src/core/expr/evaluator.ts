import { Token, Result, ok, fail } from './tokens.js';
import { ParseError, UNEXPECTED_END_OF_INPUT, invalidToken } from './errors.js';

/**
 * Folds `number (('+' | '-') number)*` left to right.
 *
 * There is no explicit state variable: after an operator the loop calls
 * `expectNumber()` directly, otherwise it is waiting for an operator or the end.
 */
export class Evaluator {
    private readonly tokens: readonly Token[];
    private position = 0;

    constructor(tokens: readonly Token[]) {
        this.tokens = tokens;
    }

    nextToken(): Token | undefined {
        if (this.position >= this.tokens.length) {
            return undefined;
        }
        const token = this.tokens[this.position];
        this.position++;
        return token;
    }

    expectNumber(): Result<bigint, ParseError> {
        const token = this.nextToken();
        if (token === undefined) {
            return fail(UNEXPECTED_END_OF_INPUT);
        }

        switch (token.kind) {
            case 'Number':
                return ok(token.value);
            case 'Plus':
            case 'Subtract':
                return fail(invalidToken(token));
        }
    }

    evaluate(): Result<bigint, ParseError> {
        const first = this.expectNumber();
        if (!first.ok) return first;

        let value = first.value;

        for (let token = this.nextToken(); token !== undefined; token = this.nextToken()) {
            switch (token.kind) {
                case 'Plus': {
                    const operand = this.expectNumber();
                    if (!operand.ok) return operand;
                    value += operand.value;
                    break;
                }
                case 'Subtract': {
                    const operand = this.expectNumber();
                    if (!operand.ok) return operand;
                    value -= operand.value;
                    break;
                }
                case 'Number':
                    return fail(invalidToken(token));
            }
        }

        return ok(value);
    }
}

export function evaluateTokens(tokens: readonly Token[]): Result<bigint, ParseError> {
    return new Evaluator(tokens).evaluate();
}
