export type Token =
    | { readonly kind: 'Number'; readonly value: bigint }
    | { readonly kind: 'Plus' }
    | { readonly kind: 'Subtract' };

export type TokenKind = Token['kind'];

export const PLUS: Token = Object.freeze<Token>({ kind: 'Plus' });
export const SUBTRACT: Token = Object.freeze<Token>({ kind: 'Subtract' });

export function numberToken(value: bigint): Token {
    return Object.freeze<Token>({ kind: 'Number', value });
}

export function formatToken(token: Token): string {
    switch (token.kind) {
        case 'Number':
            return `Number(${token.value})`;
        case 'Plus':
            return 'Plus';
        case 'Subtract':
            return 'Subtract';
        default: {
            const unreachable: never = token;
            return unreachable;
        }
    }
}

export function formatTokens(tokens: readonly Token[]): string {
    return `[${tokens.map(formatToken).join(', ')}]`;
}

export type Result<T, E> = Success<T> | Failure<E>;

export interface Success<T> {
    ok: true;
    value: T;
}

export interface Failure<E> {
    ok: false;
    error: E;
}

export function ok<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail<E>(error: E): Failure<E> {
    return { ok: false, error };
}
