import { Token, formatToken } from './tokens.js';

export type LexError =
    | { readonly kind: 'InvalidCharacter'; readonly character: string; readonly position: number };

export type ParseError =
    | { readonly kind: 'UnexpectedEndOfInput' }
    | { readonly kind: 'InvalidToken'; readonly token: Token };

export function invalidCharacter(character: string, position: number): LexError {
    return { kind: 'InvalidCharacter', character, position };
}

export const UNEXPECTED_END_OF_INPUT: ParseError = Object.freeze<ParseError>({ kind: 'UnexpectedEndOfInput' });

export function invalidToken(token: Token): ParseError {
    return { kind: 'InvalidToken', token };
}

export function describeLexError(error: LexError): string {
    switch (error.kind) {
        case 'InvalidCharacter':
            return `Input contained an invalid character at ${error.position}: '${error.character}'`;
        default: {
            const unreachable: never = error.kind;
            return unreachable;
        }
    }
}

export function describeParseError(error: ParseError): string {
    switch (error.kind) {
        case 'UnexpectedEndOfInput':
            return 'Unexpected end of input during parsing';
        case 'InvalidToken':
            return `Invalid token during parsing: ${formatToken(error.token)}`;
        default: {
            const unreachable: never = error;
            return unreachable;
        }
    }
}

/**
 * Thrown when a cursor is misused by the calling code. Bad input is never
 * reported this way; it comes back as a failed result.
 */
export class ContractViolationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContractViolationError';
    }
}
