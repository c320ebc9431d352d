import { describe, it, expect } from 'vitest';
import { applyStrategy, rawValue, rescaleAmount } from '../strategies';

describe('applyStrategy', () => {
    it('keeps identity values as text', () => {
        expect(applyStrategy('identity', 'TERM0001')).toEqual({ kind: 'text', value: 'TERM0001' });
    });

    it('reformats compact timestamps', () => {
        expect(applyStrategy('timestamp', '0612143000')).toEqual({ kind: 'text', value: '06-12 14:30:00' });
        expect(applyStrategy('timestamp', '143000')).toEqual({ kind: 'text', value: '14:30:00' });
        expect(applyStrategy('timestamp', '240612143000')).toEqual({ kind: 'text', value: '24-06-12 14:30:00' });
        expect(applyStrategy('timestamp', '0229120000')).toEqual({ kind: 'text', value: '02-29 12:00:00' });
    });

    it('rejects impossible timestamps', () => {
        expect(() => applyStrategy('timestamp', '1345000000')).toThrow('not a valid MMDDHHmmss timestamp');
        expect(() => applyStrategy('timestamp', '12345')).toThrow('not a compact timestamp');
    });

    it('treats an empty timestamp as absent', () => {
        expect(applyStrategy('timestamp', '')).toEqual({ kind: 'absent' });
    });

    it('renders hex values from their characters', () => {
        expect(applyStrategy('hex', 'AB')).toEqual({ kind: 'raw', hex: '4142' });
    });
});

describe('rescaleAmount', () => {
    it('divides by 100', () => {
        expect(rescaleAmount('000000012345')).toEqual({ kind: 'number', value: 123.45 });
        expect(rescaleAmount('-500')).toEqual({ kind: 'number', value: -5 });
    });

    it('treats an empty amount as absent', () => {
        expect(rescaleAmount('')).toEqual({ kind: 'absent' });
    });

    it('rejects non numeric amounts', () => {
        expect(() => rescaleAmount('12.34')).toThrow('"12.34" is not a numeric amount');
    });
});

describe('rawValue', () => {
    it('hex encodes bytes', () => {
        expect(rawValue(Buffer.from([0xde, 0xad, 0x00]))).toEqual({ kind: 'raw', hex: 'dead00' });
    });
});
