/**
 * (c) settlement-dump-decoder - Card settlement dump decoding
 * October 19, 2026
 *
 * A TypeScript based decoder for ISO 8583 style transaction dumps
 */

export type ValueClass = 'numeric' | 'alphanumeric' | 'special';

/* closed set of per-field decode strategies */
export type DecodeStrategy = 'identity' | 'timestamp' | 'amount' | 'hex';

export interface FieldDefinition {
    readonly number: number;
    readonly name: string;
    readonly length: number;
    readonly valueClass: ValueClass;
    readonly strategy: DecodeStrategy;
}

/* one column of the fixed-width settlement record layout */
export interface LayoutField {
    readonly name: string;
    readonly start: number;
    readonly length: number;
    readonly strategy: DecodeStrategy;
    readonly alphanumericOnly?: boolean;
}

export type FieldValue =
    | { kind: 'text'; value: string }
    | { kind: 'number'; value: number }
    | { kind: 'raw'; hex: string }
    | { kind: 'absent' };

export type RecordFormat = 'binary' | 'text';

export type ValidationStatus = 'pass' | 'fail' | 'unchecked';

export interface ValidationOutcome {
    status: ValidationStatus;
    /* all errors of a record joined with "; " */
    errors: string;
}

interface RecordBase {
    mti: string;
    mtiMeaning: string;
    recordFormat: RecordFormat;
    sourceIdentifier: string;
    /* byte offset (binary) or character offset (text) where the record starts */
    position: number;
}

export interface DecodedRecord extends RecordBase {
    kind: 'decoded';
    fields: ReadonlyMap<string, FieldValue>;
    validation: ValidationOutcome;
}

export interface ConfigurationFaultRecord extends RecordBase {
    kind: 'configuration-fault';
    reason: string;
}

export type RecordResult = DecodedRecord | ConfigurationFaultRecord;

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export type DiagnosticCode =
    | 'charset-fallback'
    | 'field-decode'
    | 'unknown-field'
    | 'secondary-bitmap'
    | 'truncated-field'
    | 'resync'
    | 'resync-exhausted'
    | 'stream-exhausted'
    | 'framing'
    | 'configuration'
    | 'no-records';

export interface Diagnostic {
    severity: DiagnosticSeverity;
    code: DiagnosticCode;
    message: string;
    position?: number;
}

export interface DecodeFault {
    position: number;
    reason: string;
}

export type BinaryCharset = 'ascii' | 'latin1' | 'ebcdic';

export type BoundaryMode = 'strict' | 'lax';

export type Framing = 'none' | 'rdw' | 'blocked-rdw';

export type DetectedFormat =
    | { kind: 'binary'; reason: string }
    | { kind: 'text'; charset: string; confidence: number };

export interface FieldSpecification {
    readonly maxLength: number;
    readonly type: string;
}

/* field number -> specification, iterated in ascending field order */
export type MessageSpecification = ReadonlyMap<number, FieldSpecification>;

export interface DecodeResult {
    records: RecordResult[];
    diagnostics: Diagnostic[];
}
