import moment from 'moment';
import { DecodeStrategy, FieldValue } from './types';

const TIMESTAMP_FORMATS: Readonly<Record<number, [string, string]>> = {
    6:  ['HHmmss', 'HH:mm:ss'],
    10: ['MMDDHHmmss', 'MM-DD HH:mm:ss'],
    12: ['YYMMDDHHmmss', 'YY-MM-DD HH:mm:ss'],
};

function reformatTimestamp(value: string): FieldValue {
    if (!value) return { kind: 'absent' };
    const format = TIMESTAMP_FORMATS[value.length];
    if (!format || !/^\d+$/.test(value)) throw new Error(`"${value}" is not a compact timestamp`);
    // year 2000 keeps 0229 valid
    const parsed = moment.utc(value.length === 12 ? value : '2000' + value, value.length === 12 ? format[0] : 'YYYY' + format[0], true);
    if (!parsed.isValid()) throw new Error(`"${value}" is not a valid ${format[0]} timestamp`);
    return { kind: 'text', value: parsed.format(format[1]) };
}

export function rescaleAmount(value: string): FieldValue {
    if (!value) return { kind: 'absent' };
    if (!/^-?\d+$/.test(value)) throw new Error(`"${value}" is not a numeric amount`);
    return { kind: 'number', value: Number(value) / 100 };
}

/**
 * Applies a field's decode strategy to its decoded text.
 * Throws when the text does not fit the strategy; callers degrade to raw bytes.
 */
export function applyStrategy(strategy: DecodeStrategy, value: string): FieldValue {
    switch (strategy) {
        case 'identity':
            return { kind: 'text', value };
        case 'timestamp':
            return reformatTimestamp(value);
        case 'amount':
            return rescaleAmount(value);
        case 'hex':
            return { kind: 'raw', hex: Buffer.from(value, 'latin1').toString('hex') };
    }
}

export function rawValue(bytes: Buffer): FieldValue {
    return { kind: 'raw', hex: bytes.toString('hex') };
}
