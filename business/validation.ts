import { describeMti } from './registry';
import { SpecificationResolution } from './specs';
import { Diagnostic, FieldValue, MessageSpecification, RecordFormat, RecordResult, ValidationOutcome } from './types';

/* the text a field was decoded from, kept for conformance checks */
export interface FieldSlice {
    number: number;
    label: string;
    text: string;
}

export function validateFields(slices: readonly FieldSlice[], specification: MessageSpecification): ValidationOutcome {
    const errors: string[] = [];
    for (const slice of slices) {
        const spec = specification.get(slice.number);
        if (!spec) continue;
        if (spec.maxLength && slice.text.length !== spec.maxLength) {
            errors.push(`${slice.label}: length ${slice.text.length} vs ${spec.maxLength}`);
        }
        if (spec.type === 'numeric' && !/^\d+$/.test(slice.text)) {
            errors.push(`${slice.label}: expected numeric`);
        }
    }
    return { status: errors.length ? 'fail' : 'pass', errors: errors.join('; ') };
}

export interface RecordHeader {
    mti: string;
    recordFormat: RecordFormat;
    sourceIdentifier: string;
    position: number;
    mtiMeanings?: Readonly<Record<string, string>>;
}

export function assembleRecord(
    header: RecordHeader,
    fields: ReadonlyMap<string, FieldValue>,
    slices: readonly FieldSlice[],
    resolution: SpecificationResolution,
    diagnostics: Diagnostic[],
): RecordResult {
    const base = {
        mti: header.mti,
        mtiMeaning: describeMti(header.mti, header.mtiMeanings),
        recordFormat: header.recordFormat,
        sourceIdentifier: header.sourceIdentifier,
        position: header.position,
    };
    switch (resolution.kind) {
        case 'missing':
            diagnostics.push({ severity: 'error', code: 'configuration', position: header.position, message: resolution.reason });
            return { ...base, kind: 'configuration-fault', reason: resolution.reason };
        case 'unconfigured':
            return { ...base, kind: 'decoded', fields, validation: { status: 'unchecked', errors: '' } };
        case 'found':
            return { ...base, kind: 'decoded', fields, validation: validateFields(slices, resolution.specification) };
    }
}
