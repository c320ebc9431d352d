import { describe, it, expect } from 'vitest';
import { allFields, describeMti, FieldResolver, fieldLabel, lookup, SETTLEMENT_LAYOUT } from '../registry';

describe('lookup', () => {
    it('returns the static definition', () => {
        expect(lookup(4)).toEqual({ number: 4, name: 'Amount Transaction', length: 12, valueClass: 'numeric', strategy: 'amount' });
        expect(lookup(7)?.strategy).toBe('timestamp');
    });

    it('returns the identical definition on every call', () => {
        expect(lookup(2)).toBe(lookup(2));
    });

    it('returns undefined for unregistered fields', () => {
        expect(lookup(5)).toBeUndefined();
    });

    it('keeps field numbers unique', () => {
        const numbers = allFields().map(f => f.number);
        expect(new Set(numbers).size).toBe(numbers.length);
    });
});

describe('fieldLabel', () => {
    it('falls back to a synthetic name', () => {
        expect(fieldLabel(2)).toBe('Primary Account Number');
        expect(fieldLabel(5)).toBe('Field 5');
    });
});

describe('describeMti', () => {
    it('names known, unknown and missing message types', () => {
        expect(describeMti('1240')).toBe('Authorization Request');
        expect(describeMti('9999')).toBe('Unknown MTI (9999)');
        expect(describeMti('')).toBe('Missing MTI');
    });

    it('prefers configured meanings', () => {
        expect(describeMti('1240', { '1240': 'Presentment' })).toBe('Presentment');
        expect(describeMti('0200', { '0200': 'Financial Request' })).toBe('Financial Request');
    });
});

describe('FieldResolver', () => {
    const resolver = new FieldResolver(new Map([
        [4, { maxLength: 10, type: 'numeric' }],
        [48, { maxLength: 5, type: 'alphanumeric' }],
    ]));

    it('takes the specification length over the static one', () => {
        expect(resolver.resolve(4)).toEqual({ number: 4, name: 'Amount Transaction', length: 10, valueClass: 'numeric', strategy: 'amount' });
    });

    it('adds fields the static table lacks', () => {
        expect(resolver.resolve(48)).toEqual({ number: 48, name: 'Field 48', length: 5, valueClass: 'alphanumeric', strategy: 'identity' });
    });

    it('passes through fields the specification does not mention', () => {
        expect(resolver.resolve(2)).toBe(lookup(2));
        expect(resolver.resolve(5)).toBeUndefined();
    });

    it('without a specification is the static registry', () => {
        expect(new FieldResolver().resolve(11)).toBe(lookup(11));
    });
});

describe('SETTLEMENT_LAYOUT', () => {
    it('covers the 256 character record without overlaps', () => {
        let end = 4;
        for (const column of SETTLEMENT_LAYOUT) {
            expect(column.start).toBe(end);
            end = column.start + column.length;
        }
        expect(end).toBe(256);
    });
});
