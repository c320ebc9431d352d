/**
 * (c) settlement-dump-decoder - Card settlement dump decoding
 * October 19, 2026
 *
 * A TypeScript based decoder for ISO 8583 style transaction dumps
 */
import { BinaryCharset } from './types';
import e2a from './data/ebcdic.json';

export class CharsetError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CharsetError';
    }
}

/* big-endian unsigned length prefix of the given size in bytes */
export function lengthHeaderDecode(buf: Buffer, offset: number, size: number): number {
    let len = 0;
    for (let i = 0; i < size; i++) {
        len = len * 256 + buf[offset + i];
    }
    return len;
}

export function toHex(buf: Buffer): string {
    return buf.toString('hex');
}

export function ebcdicToAscii(buf: Buffer): string {
    const result = Buffer.alloc(buf.length);
    for (let i = 0; i < buf.length; i++) result[i] = e2a[buf[i]];
    return result.toString('latin1');
}

export function asciiToEbcdic(input: string): Buffer {
    const result: number[] = [];
    for (let i = 0; i < input.length; i++) {
        const j = e2a.indexOf(input.charCodeAt(i));
        if (j >= 0) result.push(j);
    }
    return Buffer.from(result);
}

/**
 * Decodes bytes in the receiving charset of a binary record.
 * Throws a CharsetError when the bytes are not valid in that charset.
 */
export function decodeBytes(buf: Buffer, charset: BinaryCharset): string {
    switch (charset) {
        case 'ascii':
            for (let i = 0; i < buf.length; i++) {
                if (buf[i] > 0x7f) throw new CharsetError(`byte 0x${buf[i].toString(16)} at ${i} is not ASCII`);
            }
            return buf.toString('latin1');
        case 'latin1':
            return buf.toString('latin1');
        case 'ebcdic':
            return ebcdicToAscii(buf);
    }
}

export function stripPadding(value: string): string {
    return value.replace(/^[\0\s]+|[\0\s]+$/g, '');
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
