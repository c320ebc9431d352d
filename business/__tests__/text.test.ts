import { describe, it, expect } from 'vitest';
import { cleanRecord, decodeTextRecords, TextDecodeOptions } from '../text';
import { SpecificationSet } from '../specs';
import { asDecoded, fixedWidth } from './helpers';

const options: TextDecodeOptions = {
    sourceIdentifier: 'settlement.txt',
    boundaryMode: 'strict',
    minRecordLength: 60,
    fixedRecordLength: 256,
};

const settlement = fixedWidth(256, [
    [0, '1240'],
    [4, '5412345678901234'],
    [23, '000000'],
    [29, '000000012345'],
    [61, '0612153000'],
    [159, 'TERM0001'],
    [182, 'MERCHANT ONE'],
]);

describe('cleanRecord', () => {
    it('removes control characters and padding', () => {
        expect(cleanRecord('12@40\x01AB\x7f\x85')).toBe('1240AB');
    });
});

describe('decodeTextRecords', () => {
    it('cuts a line of whole fixed-width blocks into records', () => {
        const { records, diagnostics } = decodeTextRecords(settlement + settlement, options);
        expect(records.map(r => r.position)).toEqual([0, 256]);
        const record = asDecoded(records[1]);
        expect(record.mti).toBe('1240');
        expect(record.mtiMeaning).toBe('Authorization Request');
        expect(record.recordFormat).toBe('text');
        expect(record.sourceIdentifier).toBe('settlement.txt');
        expect(record.fields.get('PAN')).toEqual({ kind: 'text', value: '5412345678901234' });
        expect(record.fields.get('Processing Code')).toEqual({ kind: 'text', value: '000000' });
        expect(record.fields.get('Amount')).toEqual({ kind: 'number', value: 123.45 });
        expect(record.fields.get('Amount Reconciliation')).toEqual({ kind: 'absent' });
        expect(record.fields.get('Local Date/Time')).toEqual({ kind: 'text', value: '06-12 15:30:00' });
        expect(record.fields.get('Terminal ID')).toEqual({ kind: 'text', value: 'TERM0001' });
        expect(record.fields.get('Merchant Name')).toEqual({ kind: 'text', value: 'MERCHANT ONE' });
        expect(record.fields.size).toBe(23);
        expect(record.validation).toEqual({ status: 'unchecked', errors: '' });
        expect(diagnostics).toEqual([]);
    });

    it('splits by boundaries when the line is not a whole number of blocks', () => {
        const { records } = decodeTextRecords(settlement + 'XYZ' + settlement, options);
        expect(records.map(r => r.position)).toEqual([0, 259]);
        expect(asDecoded(records[1]).fields.get('Terminal ID')).toEqual({ kind: 'text', value: 'TERM0001' });
    });

    it('reads pipe-delimited records', () => {
        const { records } = decodeTextRecords('1240|2:5412345678901234|4:000000012345|11:123456|99:ignored|x:1|noColon', options);
        const record = asDecoded(records[0]);
        expect(record.mti).toBe('1240');
        expect([...record.fields]).toEqual([
            ['Primary Account Number', { kind: 'text', value: '5412345678901234' }],
            ['Amount Transaction', { kind: 'number', value: 123.45 }],
            ['System Trace Audit Number', { kind: 'text', value: '123456' }],
        ]);
    });

    it('keeps a field whose strategy fails as raw text bytes', () => {
        const { records, diagnostics } = decodeTextRecords('1240|7:99', options);
        expect(asDecoded(records[0]).fields.get('Transmission Date/Time')).toEqual({ kind: 'raw', hex: '3939' });
        expect(diagnostics).toEqual([{
            severity: 'warning',
            code: 'field-decode',
            position: 0,
            message: 'Transmission Date/Time: "99" is not a compact timestamp',
        }]);
    });

    it('reports records at their line offsets', () => {
        const { records } = decodeTextRecords('first line noise\n1240|11:123456\r\n1240|11:654321', options);
        expect(records.map(r => r.position)).toEqual([17, 33]);
    });

    it('slices fixed-width records by an external specification', () => {
        const specifications = new SpecificationSet([['1240', new Map([
            [2, { maxLength: 16, type: 'numeric' }],
            [4, { maxLength: 12, type: 'numeric' }],
            [11, { maxLength: 6, type: 'numeric' }],
        ])]]);
        const line = ('1240' + '5412345678901234' + '000000012345' + '12345A').padEnd(80);
        const { records } = decodeTextRecords(line, { ...options, fixedRecordLength: 80, specifications });
        const record = asDecoded(records[0]);
        expect([...record.fields]).toEqual([
            ['Primary Account Number', { kind: 'text', value: '5412345678901234' }],
            ['Amount Transaction', { kind: 'number', value: 123.45 }],
            ['System Trace Audit Number', { kind: 'text', value: '12345A' }],
        ]);
        expect(record.validation).toEqual({ status: 'fail', errors: 'System Trace Audit Number: expected numeric' });
    });

    it('returns a configuration fault when no specification applies', () => {
        const specifications = new SpecificationSet([['1442', new Map()]]);
        const { records } = decodeTextRecords(settlement, { ...options, specifications });
        expect(records[0].kind).toBe('configuration-fault');
    });

    it('reports only the configuration fault when no specification applies', () => {
        const specifications = new SpecificationSet([['1442', new Map()]]);
        const badTimestamp = fixedWidth(256, [[0, '1240'], [4, '5412345678901234'], [61, '9999999999']]);
        const fixed = decodeTextRecords(badTimestamp, { ...options, specifications });
        const delimited = decodeTextRecords('1240|7:99', { ...options, specifications });
        const fault = {
            severity: 'error',
            code: 'configuration',
            position: 0,
            message: 'no specification for MTI 1240 and no default specification',
        };
        expect(fixed.diagnostics).toEqual([fault]);
        expect(delimited.diagnostics).toEqual([fault]);
    });

    it('skips blank lines', () => {
        expect(decodeTextRecords('\n   \n', options).records).toEqual([]);
    });
});

describe('decodeTextRecords for file header/trailer records', () => {
    it('emits one record per embedded transaction', () => {
        const line = ('1644' + '0120'
            + 'M' + '240612' + '153000' + '000000012345' + '0001'
            + 'M' + '240612' + '160000' + '000000067890' + '0002').padEnd(256);
        const { records, diagnostics } = decodeTextRecords(line, options);
        expect(records.map(r => r.position)).toEqual([8, 37]);
        const first = asDecoded(records[0]);
        expect(first.mti).toBe('1644');
        expect(first.mtiMeaning).toBe('File Header/Trailer');
        expect([...first.fields]).toEqual([
            ['Record Length', { kind: 'number', value: 120 }],
            ['Transaction Date', { kind: 'text', value: '240612' }],
            ['Transaction Time', { kind: 'text', value: '153000' }],
            ['Amount', { kind: 'number', value: 123.45 }],
            ['Raw Transaction', { kind: 'text', value: 'M2406121530000000000123450001' }],
        ]);
        expect(asDecoded(records[1]).fields.get('Transaction Time')).toEqual({ kind: 'text', value: '160000' });
        expect(asDecoded(records[1]).fields.get('Amount')).toEqual({ kind: 'number', value: 678.9 });
        expect(diagnostics).toEqual([]);
    });

    it('keeps the remainder of a header without transactions', () => {
        const line = ('1644' + '0064' + 'FILE HEADER CLEARING 240612').padEnd(256);
        const { records } = decodeTextRecords(line, options);
        expect(records).toHaveLength(1);
        expect([...asDecoded(records[0]).fields]).toEqual([
            ['Record Length', { kind: 'number', value: 64 }],
            ['Raw Data', { kind: 'text', value: 'FILE HEADER CLEARING 240612' }],
        ]);
    });

    it('warns about a record length that is not 4 digits', () => {
        const line = ('1644' + 'HDR ' + 'FILE TRAILER').padEnd(256);
        const { records, diagnostics } = decodeTextRecords(line, options);
        expect(asDecoded(records[0]).fields.get('Record Length')).toEqual({ kind: 'absent' });
        expect(diagnostics).toEqual([{
            severity: 'warning',
            code: 'field-decode',
            position: 0,
            message: 'Record Length: "HDR " is not a 4 digit length',
        }]);
    });
});
