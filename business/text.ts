import { splitCandidates } from './boundary';
import { FieldResolver, HEADER_TRAILER_MTI, MTI_LENGTH, SETTLEMENT_LAYOUT } from './registry';
import { resolveSpecification, SpecificationResolution, SpecificationSet } from './specs';
import { applyStrategy } from './strategies';
import { BoundaryMode, DecodeResult, DecodeStrategy, Diagnostic, FieldValue, MessageSpecification, RecordResult } from './types';
import { errorMessage } from './util';
import { assembleRecord, FieldSlice } from './validation';

export const FIXED_RECORD_LENGTH = 256;
const DELIMITER = '|';
const PADDING_CHARACTER = '@';
const RECORD_LENGTH_SHAPE = /^\d{4}$/;
/* M, YYMMDD, HHMMSS, 12 digit amount, 4 digit sequence */
const TRANSACTION_SHAPE = /M\d{6}\d{10}\d{12}/g;

export interface TextDecodeOptions {
    sourceIdentifier: string;
    boundaryMode: BoundaryMode;
    minRecordLength: number;
    fixedRecordLength: number;
    specifications?: SpecificationSet;
    mtiMeanings?: Readonly<Record<string, string>>;
}

/* removes control characters and the reserved padding character */
export function cleanRecord(record: string): string {
    return record.replace(/[\x00-\x1F\x7F-\x9F]/g, '').split(PADDING_CHARACTER).join('');
}

function decodeValue(strategy: DecodeStrategy, label: string, text: string, position: number, diagnostics: Diagnostic[]): FieldValue {
    try {
        return applyStrategy(strategy, text);
    } catch (err) {
        diagnostics.push({ severity: 'warning', code: 'field-decode', position, message: `${label}: ${errorMessage(err)}` });
        return { kind: 'raw', hex: Buffer.from(text, 'utf8').toString('hex') };
    }
}

class TextRecordDecoder {
    readonly records: RecordResult[] = [];
    readonly diagnostics: Diagnostic[] = [];

    constructor(private readonly options: TextDecodeOptions) {}

    private finish(mti: string, position: number, fields: Map<string, FieldValue>, slices: FieldSlice[], resolution: SpecificationResolution): void {
        this.records.push(assembleRecord(
            { mti, recordFormat: 'text', sourceIdentifier: this.options.sourceIdentifier, position, mtiMeanings: this.options.mtiMeanings },
            fields, slices, resolution, this.diagnostics,
        ));
    }

    /* MTI|field_number:value|field_number:value|... */
    decodeDelimited(line: string, position: number): void {
        const parts = line.split(DELIMITER);
        const mti = parts[0].trim();
        const resolution = resolveSpecification(this.options.specifications, mti);
        const fields = new Map<string, FieldValue>();
        const slices: FieldSlice[] = [];
        if (resolution.kind === 'missing') {
            this.finish(mti, position, fields, slices, resolution);
            return;
        }
        const resolver = new FieldResolver(resolution.kind === 'found' ? resolution.specification : undefined);

        for (const part of parts.slice(1)) {
            const colon = part.indexOf(':');
            if (colon < 0) continue;
            const numberText = part.slice(0, colon).trim();
            if (!/^\d+$/.test(numberText)) continue;
            const def = resolver.resolve(Number(numberText));
            if (!def) continue;
            const text = part.slice(colon + 1);
            fields.set(def.name, decodeValue(def.strategy, def.name, text, position, this.diagnostics));
            slices.push({ number: def.number, label: def.name, text });
        }
        this.finish(mti, position, fields, slices, resolution);
    }

    /* external specification: fields follow the MTI back to back in field order */
    private sliceBySpecification(record: string, specification: MessageSpecification, position: number): [Map<string, FieldValue>, FieldSlice[]] {
        const resolver = new FieldResolver(specification);
        const fields = new Map<string, FieldValue>();
        const slices: FieldSlice[] = [];
        let cursor = MTI_LENGTH;
        for (const fieldNumber of specification.keys()) {
            const def = resolver.resolve(fieldNumber);
            if (!def) continue;
            const text = record.slice(cursor, cursor + def.length).trim();
            cursor += def.length;
            fields.set(def.name, decodeValue(def.strategy, def.name, text, position, this.diagnostics));
            slices.push({ number: fieldNumber, label: def.name, text });
        }
        return [fields, slices];
    }

    private sliceByLayout(record: string, position: number): Map<string, FieldValue> {
        const fields = new Map<string, FieldValue>();
        for (const column of SETTLEMENT_LAYOUT) {
            if (column.start >= record.length) {
                fields.set(column.name, { kind: 'absent' });
                continue;
            }
            let text = record.slice(column.start, column.start + column.length).trim();
            if (column.alphanumericOnly) text = text.replace(/[^0-9A-Za-z]/g, '');
            fields.set(column.name, decodeValue(column.strategy, column.name, text, position, this.diagnostics));
        }
        return fields;
    }

    /**
     * File header/trailer: a 4 digit record length after the MTI, then
     * embedded M-transactions, one record each. Without transactions the
     * remainder is kept as raw data.
     */
    private decodeHeaderTrailer(record: string, position: number, resolution: SpecificationResolution): void {
        const lengthText = record.slice(MTI_LENGTH, MTI_LENGTH + 4);
        let recordLength: FieldValue = { kind: 'absent' };
        if (RECORD_LENGTH_SHAPE.test(lengthText)) {
            recordLength = { kind: 'number', value: Number(lengthText) };
        } else {
            this.diagnostics.push({ severity: 'warning', code: 'field-decode', position, message: `Record Length: "${lengthText}" is not a 4 digit length` });
        }

        const transactions = [...record.matchAll(TRANSACTION_SHAPE)];
        if (transactions.length === 0) {
            const fields = new Map<string, FieldValue>([
                ['Record Length', recordLength],
                ['Raw Data', { kind: 'text', value: record.slice(MTI_LENGTH + 4).trim() }],
            ]);
            this.finish(HEADER_TRAILER_MTI, position, fields, [], resolution);
            return;
        }
        for (const match of transactions) {
            const transaction = match[0];
            const at = position + (match.index ?? 0);
            const fields = new Map<string, FieldValue>([
                ['Record Length', recordLength],
                ['Transaction Date', { kind: 'text', value: transaction.slice(1, 7) }],
                ['Transaction Time', { kind: 'text', value: transaction.slice(7, 13) }],
                ['Amount', decodeValue('amount', 'Amount', transaction.slice(13, 25), at, this.diagnostics)],
                ['Raw Transaction', { kind: 'text', value: transaction }],
            ]);
            this.finish(HEADER_TRAILER_MTI, at, fields, [], resolution);
        }
    }

    decodeFixedWidth(record: string, position: number): void {
        const mti = record.slice(0, MTI_LENGTH).trim();
        const resolution = resolveSpecification(this.options.specifications, mti);
        switch (resolution.kind) {
            case 'missing':
                this.finish(mti, position, new Map<string, FieldValue>(), [], resolution);
                return;
            case 'found': {
                const [fields, slices] = this.sliceBySpecification(record, resolution.specification, position);
                this.finish(mti, position, fields, slices, resolution);
                return;
            }
            case 'unconfigured':
                if (mti === HEADER_TRAILER_MTI) {
                    this.decodeHeaderTrailer(record, position, resolution);
                } else {
                    this.finish(mti, position, this.sliceByLayout(record, position), [], resolution);
                }
        }
    }

    /* blocked records when the length fits, otherwise boundary heuristic candidates */
    decodeSegment(line: string, position: number): void {
        const cleaned = cleanRecord(line);
        const size = this.options.fixedRecordLength;
        if (cleaned.length > 0 && cleaned.length % size === 0) {
            for (let off = 0; off < cleaned.length; off += size) {
                this.decodeFixedWidth(cleaned.slice(off, off + size), position + off);
            }
            return;
        }
        const candidates = splitCandidates(cleaned, { mode: this.options.boundaryMode, minRecordLength: this.options.minRecordLength });
        for (const candidate of candidates) {
            this.decodeFixedWidth(candidate.text, position + candidate.start);
        }
    }
}

/**
 * Decodes text content line by line: pipe-delimited lines are one record
 * each, other lines are fixed-width segments.
 */
export function decodeTextRecords(content: string, options: TextDecodeOptions): DecodeResult {
    const decoder = new TextRecordDecoder(options);
    let offset = 0;
    for (const rawLine of content.split('\n')) {
        const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
        if (line.trim()) {
            if (line.includes(DELIMITER)) {
                decoder.decodeDelimited(line, offset);
            } else {
                decoder.decodeSegment(line, offset);
            }
        }
        offset += rawLine.length + 1;
    }
    return { records: decoder.records, diagnostics: decoder.diagnostics };
}
