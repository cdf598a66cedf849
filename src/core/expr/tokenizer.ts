import { Token, Result, PLUS, SUBTRACT, numberToken, ok, fail } from './tokens.js';
import { LexError, ContractViolationError, invalidCharacter } from './errors.js';

const DIGIT = /^[0-9]$/;

function isDigit(char: string | undefined): char is string {
    return char !== undefined && DIGIT.test(char);
}

/**
 * Single-use cursor over the code points of one input string.
 * Positions count code points, so a surrogate pair is one character.
 */
export class Scanner {
    private readonly chars: readonly string[];
    private position = 0;

    constructor(input: string) {
        this.chars = Array.from(input);
    }

    peek(): string | undefined {
        return this.position < this.chars.length ? this.chars[this.position] : undefined;
    }

    advance(): void {
        if (this.position >= this.chars.length) {
            throw new ContractViolationError('Cannot advance past end of input');
        }
        this.position++;
    }

    scanNumber(): bigint {
        let value = 0n;
        let char = this.peek();

        while (isDigit(char)) {
            value = value * 10n + BigInt(char.charCodeAt(0) - 48);
            this.advance();
            char = this.peek();
        }

        return value;
    }

    scan(): Result<Token[], LexError> {
        const tokens: Token[] = [];

        for (let char = this.peek(); char !== undefined; char = this.peek()) {
            if (isDigit(char)) {
                tokens.push(numberToken(this.scanNumber()));
                continue;
            }

            switch (char) {
                case '+':
                    tokens.push(PLUS);
                    this.advance();
                    break;
                case '-':
                    tokens.push(SUBTRACT);
                    this.advance();
                    break;
                case ' ':
                    this.advance();
                    break;
                default:
                    return fail(invalidCharacter(char, this.position));
            }
        }

        return ok(tokens);
    }
}

export function scan(input: string): Result<Token[], LexError> {
    return new Scanner(input).scan();
}
