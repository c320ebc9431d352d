import { FieldValue, RecordResult } from './types';

export type Cell = string | number | null;
export type Row = Record<string, Cell>;

export function cellOf(value: FieldValue): Cell {
    switch (value.kind) {
        case 'text':
            return value.value;
        case 'number':
            return value.value;
        case 'raw':
            return value.hex;
        case 'absent':
            return null;
    }
}

/**
 * Flattens a record into the tabular shape handed to display and export:
 * metadata keys first, then one column per decoded field.
 */
export function toRow(record: RecordResult): Row {
    const row: Row = {
        mti: record.mti,
        mti_meaning: record.mtiMeaning,
        record_format: record.recordFormat,
        source_identifier: record.sourceIdentifier,
    };
    if (record.kind === 'configuration-fault') {
        row.status = 'error';
        row.validation_errors = record.reason;
        return row;
    }
    row.status = record.validation.status;
    row.validation_errors = record.validation.errors;
    for (const [label, value] of record.fields) {
        row[label] = cellOf(value);
    }
    return row;
}
