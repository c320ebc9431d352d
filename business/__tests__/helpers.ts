import { encodeBitmap } from '../bitmap';
import { ILogger } from '../logger';
import { DecodedRecord, RecordResult } from '../types';

/* MTI + primary bitmap + field bytes in ascending field order */
export function binaryRecord(mti: string | Buffer, fields: Record<number, string | Buffer>): Buffer {
    const numbers = Object.keys(fields).map(Number).sort((a, b) => a - b);
    return Buffer.concat([
        typeof mti === 'string' ? Buffer.from(mti, 'latin1') : mti,
        encodeBitmap(numbers),
        ...numbers.map(n => {
            const value = fields[n];
            return typeof value === 'string' ? Buffer.from(value, 'latin1') : value;
        }),
    ]);
}

export function rdw(record: Buffer): Buffer {
    const header = Buffer.alloc(4);
    header.writeUInt32BE(record.length);
    return Buffer.concat([header, record]);
}

/* a space filled record with values placed at their offsets */
export function fixedWidth(length: number, values: Array<[number, string]>): string {
    const chars = Array.from({ length }, () => ' ');
    for (const [start, text] of values) {
        for (let i = 0; i < text.length; i++) chars[start + i] = text[i];
    }
    return chars.join('');
}

export function asDecoded(record: RecordResult | undefined): DecodedRecord {
    if (!record || record.kind !== 'decoded') throw new Error(`expected a decoded record, got ${record?.kind}`);
    return record;
}

export class MockLogger implements ILogger {
    debugMessages: string[] = [];
    errorMessages: string[] = [];
    infoMessages: string[] = [];
    warnMessages: string[] = [];
    verbose: boolean;

    constructor(verbose: boolean = false) {
        this.verbose = verbose;
    }

    info(message: string): void {
        this.infoMessages.push(message);
    }
    success(_message: string): void {}
    warn(message: string): void {
        this.warnMessages.push(message);
    }
    error(message: string): void {
        this.errorMessages.push(message);
    }
    debug(message: string): void {
        if (this.verbose) {
            this.debugMessages.push(message);
        }
    }
}
