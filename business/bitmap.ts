export const BITMAP_LENGTH = 8;

/**
 * Expands a primary bitmap into the ascending list of present data fields.
 * Bit 1 flags a secondary bitmap and never names a data field.
 */
export function decodeBitmap(bytes: Buffer): number[] {
    const bits = bytes.readBigUInt64BE(0).toString(2).padStart(64, '0');
    const present: number[] = [];
    for (let i = 2; i <= 64; i++) {
        if (bits[i - 1] === '1') present.push(i);
    }
    return present;
}

export function hasSecondaryBitmap(bytes: Buffer): boolean {
    return (bytes[0] & 0x80) !== 0;
}

/* inverse of decodeBitmap, used to build messages */
export function encodeBitmap(fields: Iterable<number>): Buffer {
    let value = 0n;
    for (const f of fields) {
        if (f < 1 || f > 64) throw new RangeError(`field ${f} is outside the primary bitmap`);
        value |= 1n << BigInt(64 - f);
    }
    const buf = Buffer.alloc(BITMAP_LENGTH);
    buf.writeBigUInt64BE(value);
    return buf;
}
