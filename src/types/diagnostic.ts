export type Severity = 'error' | 'warning';

export type DiagnosticCode =
    | 'INVALID_CHARACTER'
    | 'UNEXPECTED_END_OF_INPUT'
    | 'INVALID_TOKEN'
    | 'CONFIG_SYNTAX_ERROR'
    | 'CONFIG_INVALID_FIELD'
    | 'CONFIG_UNKNOWN_PROFILE'
    | 'FILE_READ_ERROR'
    | 'NO_EXPRESSIONS';

export interface Location {
    line: number;
    col: number;
    offset: number;
}

export interface Range {
    start: Location;
    end: Location;
}

export interface Diagnostic {
    code: DiagnosticCode;
    message: string;
    severity: Severity;
    file: string;
    range?: Range;
    source?: string; // Text of the offending line, used for caret context
}
