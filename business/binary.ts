import { BITMAP_LENGTH, decodeBitmap, hasSecondaryBitmap } from './bitmap';
import { FieldResolver, MTI_LENGTH } from './registry';
import { resync } from './resync';
import { resolveSpecification, SpecificationSet } from './specs';
import { applyStrategy, rawValue } from './strategies';
import { BinaryCharset, DecodeFault, DecodeResult, Diagnostic, FieldDefinition, FieldValue, Framing, RecordResult } from './types';
import { CharsetError, decodeBytes, errorMessage, lengthHeaderDecode, stripPadding, toHex } from './util';
import { assembleRecord, FieldSlice } from './validation';

const RDW_LENGTH = 4;
const BLOCK_LENGTH = 1014;
const BLOCK_PADDING = 2;
const PACKED_AMOUNT_LENGTH = 6;

export interface BinaryDecodeOptions {
    charset: BinaryCharset;
    framing: Framing;
    sourceIdentifier: string;
    specifications?: SpecificationSet;
    mtiMeanings?: Readonly<Record<string, string>>;
}

type RecordStep =
    | { kind: 'exhausted' }
    | { kind: 'fault'; fault: DecodeFault }
    | { kind: 'record'; record: RecordResult; next: number; truncated: boolean };

/* decoded and unpadded text, or the hex of bytes the charset cannot decode */
function decodeText(bytes: Buffer, charset: BinaryCharset): string {
    try {
        return stripPadding(decodeBytes(bytes, charset));
    } catch (err) {
        if (err instanceof CharsetError) return toHex(bytes);
        throw err;
    }
}

/* ASCII digits first, then the trailing bytes as a packed signed integer */
export function decodeAmount(bytes: Buffer, charset: BinaryCharset): FieldValue {
    let text: string | null = null;
    try {
        text = decodeBytes(bytes, charset);
    } catch (err) {
        if (!(err instanceof CharsetError)) throw err;
    }
    if (text !== null && /^ *\d+ *$/.test(text)) {
        return { kind: 'number', value: Number(text.trim()) / 100 };
    }
    if (bytes.length >= PACKED_AMOUNT_LENGTH) {
        return { kind: 'number', value: bytes.readIntBE(bytes.length - PACKED_AMOUNT_LENGTH, PACKED_AMOUNT_LENGTH) / 100 };
    }
    return { kind: 'absent' };
}

function decodeField(def: FieldDefinition, bytes: Buffer, charset: BinaryCharset, position: number, diagnostics: Diagnostic[]): [FieldValue, string] {
    if (def.strategy === 'hex') return [rawValue(bytes), toHex(bytes)];
    if (def.strategy === 'amount') {
        const amount = decodeAmount(bytes, charset);
        if (amount.kind === 'absent') {
            diagnostics.push({ severity: 'warning', code: 'field-decode', position, message: `field ${def.number}: amount is neither digits nor packed` });
        }
        return [amount, decodeText(bytes, charset)];
    }

    let text: string;
    try {
        text = stripPadding(decodeBytes(bytes, charset));
    } catch (err) {
        if (!(err instanceof CharsetError)) throw err;
        diagnostics.push({ severity: 'warning', code: 'field-decode', position, message: `field ${def.number}: ${err.message}` });
        return [rawValue(bytes), toHex(bytes)];
    }

    try {
        return [applyStrategy(def.strategy, text), text];
    } catch (err) {
        diagnostics.push({ severity: 'warning', code: 'field-decode', position, message: `field ${def.number}: ${errorMessage(err)}` });
        return [rawValue(bytes), text];
    }
}

/**
 * Decodes one record starting at `start`, reading no further than `end`.
 * ReadMTI -> ReadBitmap -> ReadField(i)... -> RecordComplete, or a fault.
 */
export function decodeRecordAt(buffer: Buffer, start: number, end: number, options: BinaryDecodeOptions, diagnostics: Diagnostic[]): RecordStep {
    let pos = start;
    const mti = decodeText(buffer.subarray(pos, pos + MTI_LENGTH), options.charset);
    pos += MTI_LENGTH;

    if (pos + BITMAP_LENGTH > end) return { kind: 'exhausted' };
    const bitmap = buffer.subarray(pos, pos + BITMAP_LENGTH);
    const present = decodeBitmap(bitmap);
    if (present.length === 0) {
        return { kind: 'fault', fault: { position: pos, reason: `bitmap at ${pos} declares no data fields` } };
    }
    pos += BITMAP_LENGTH;

    if (hasSecondaryBitmap(bitmap)) {
        if (pos + BITMAP_LENGTH > end) return { kind: 'exhausted' };
        diagnostics.push({ severity: 'info', code: 'secondary-bitmap', position: pos, message: `record at ${start}: fields 65-128 are not decoded` });
        pos += BITMAP_LENGTH;
    }

    const resolution = resolveSpecification(options.specifications, mti);
    const resolver = new FieldResolver(resolution.kind === 'found' ? resolution.specification : undefined);
    const fields = new Map<string, FieldValue>();
    const slices: FieldSlice[] = [];
    // a configuration fault discards the fields, so their decode warnings go too
    const fieldDiagnostics: Diagnostic[] = resolution.kind === 'missing' ? [] : diagnostics;
    let truncated = false;

    for (const fieldNumber of present) {
        const def = resolver.resolve(fieldNumber);
        if (!def) {
            diagnostics.push({ severity: 'warning', code: 'unknown-field', position: pos, message: `record at ${start}: field ${fieldNumber} has no definition, skipped` });
            continue;
        }
        if (pos + def.length > end) {
            diagnostics.push({
                severity: 'warning',
                code: 'truncated-field',
                position: pos,
                message: `record at ${start}: field ${fieldNumber} needs ${def.length} bytes, ${end - pos} left`,
            });
            truncated = true;
            break;
        }
        const [value, text] = decodeField(def, buffer.subarray(pos, pos + def.length), options.charset, pos, fieldDiagnostics);
        fields.set(def.name, value);
        slices.push({ number: fieldNumber, label: def.name, text });
        pos += def.length;
    }

    const record = assembleRecord(
        { mti, recordFormat: 'binary', sourceIdentifier: options.sourceIdentifier, position: start, mtiMeanings: options.mtiMeanings },
        fields, slices, resolution, diagnostics,
    );
    return { kind: 'record', record, next: pos, truncated };
}

function decodeUnframed(buffer: Buffer, options: BinaryDecodeOptions, result: DecodeResult): void {
    let cursor = 0;
    while (cursor + MTI_LENGTH <= buffer.length) {
        let step: RecordStep;
        try {
            step = decodeRecordAt(buffer, cursor, buffer.length, options, result.diagnostics);
        } catch (err) {
            step = { kind: 'fault', fault: { position: cursor, reason: errorMessage(err) } };
        }

        if (step.kind === 'exhausted') break;
        if (step.kind === 'fault') {
            const next = resync(buffer, step.fault, cursor, result.diagnostics);
            if (next === null) return;
            cursor = next;
            continue;
        }
        result.records.push(step.record);
        // a truncated field means the buffer ended inside this record
        if (step.truncated) return;
        cursor = step.next;
    }
    if (cursor < buffer.length) {
        result.diagnostics.push({
            severity: 'info',
            code: 'stream-exhausted',
            position: cursor,
            message: `${buffer.length - cursor} trailing bytes are too short for a record header`,
        });
    }
}

/* strips the two padding bytes that close every 1014 byte block */
export function unblock(buffer: Buffer): Buffer {
    const parts: Buffer[] = [];
    for (let off = 0; off < buffer.length; off += BLOCK_LENGTH) {
        parts.push(buffer.subarray(off, Math.min(off + BLOCK_LENGTH - BLOCK_PADDING, buffer.length)));
    }
    return Buffer.concat(parts);
}

function decodeFramed(buffer: Buffer, options: BinaryDecodeOptions, result: DecodeResult): void {
    let off = 0;
    while (off + RDW_LENGTH <= buffer.length) {
        const len = lengthHeaderDecode(buffer, off, RDW_LENGTH);
        // zero length closes the file
        if (len === 0) return;
        const start = off + RDW_LENGTH;
        if (start + len > buffer.length) {
            result.diagnostics.push({
                severity: 'warning',
                code: 'framing',
                position: off,
                message: `record length ${len} at ${off} runs past the end of the buffer`,
            });
            return;
        }

        let step: RecordStep;
        try {
            step = decodeRecordAt(buffer, start, start + len, options, result.diagnostics);
        } catch (err) {
            step = { kind: 'fault', fault: { position: start, reason: errorMessage(err) } };
        }
        if (step.kind === 'record') {
            result.records.push(step.record);
        } else {
            const reason = step.kind === 'fault' ? step.fault.reason : 'record shorter than its header';
            result.diagnostics.push({ severity: 'warning', code: 'framing', position: start, message: `skipped framed record at ${start}: ${reason}` });
        }
        off = start + len;
    }
}

/**
 * Walks a binary dump record by record. Faults never abort the pass: an
 * unframed dump resynchronizes on the next framing marker, a framed one
 * skips to the next length header.
 */
export function decodeBinary(buffer: Buffer, options: BinaryDecodeOptions): DecodeResult {
    const result: DecodeResult = { records: [], diagnostics: [] };
    switch (options.framing) {
        case 'none':
            decodeUnframed(buffer, options, result);
            break;
        case 'rdw':
            decodeFramed(buffer, options, result);
            break;
        case 'blocked-rdw':
            decodeFramed(unblock(buffer), options, result);
            break;
    }
    return result;
}
