import { BoundaryMode } from './types';
import { HEADER_TRAILER_MTI, MTI_LENGTH } from './registry';

/* message types that open a record in settlement dumps */
export const KNOWN_MTIS: readonly string[] = ['1240', '1442', '1644', '1804', '1420', '1422', '1424', '1426', '1428', '1430'];

export const MIN_RECORD_LENGTH = 60;

/* card scheme leading digit followed by the rest of a 12-19 digit PAN */
const ACCOUNT_NUMBER_SHAPE = / *[2-6]\d{11,18}/y;
const RECORD_LENGTH_SHAPE = /\d{4}/y;

export interface BoundaryOptions {
    mode: BoundaryMode;
    minRecordLength: number;
    mtis?: readonly string[];
}

export interface Candidate {
    start: number;
    text: string;
}

export function mtiPattern(mtis: readonly string[] = KNOWN_MTIS): RegExp {
    return new RegExp(mtis.map(m => m.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')).join('|'), 'g');
}

/* first stage: every non-overlapping MTI match */
export function findMtiStarts(content: string, pattern: RegExp): number[] {
    return [...content.matchAll(pattern)].map(m => m.index ?? 0);
}

/* second stage: an account number must follow the MTI directly */
export function hasAccountNumber(content: string, start: number): boolean {
    ACCOUNT_NUMBER_SHAPE.lastIndex = start + MTI_LENGTH;
    return ACCOUNT_NUMBER_SHAPE.test(content);
}

/* a header/trailer is confirmed by its record length instead */
export function confirmsRecord(content: string, start: number): boolean {
    if (content.startsWith(HEADER_TRAILER_MTI, start)) {
        RECORD_LENGTH_SHAPE.lastIndex = start + MTI_LENGTH;
        return RECORD_LENGTH_SHAPE.test(content);
    }
    return hasAccountNumber(content, start);
}

/**
 * Carves unframed text into candidate records. In strict mode MTI matches
 * without an adjacent account number (or header/trailer length) are not
 * boundaries, so they stay inside the record that contains them; lax mode
 * trusts every MTI match.
 */
export function splitCandidates(content: string, options: BoundaryOptions): Candidate[] {
    const pattern = mtiPattern(options.mtis);
    let starts = findMtiStarts(content, pattern);
    if (options.mode === 'strict') {
        starts = starts.filter(s => confirmsRecord(content, s));
    }

    const candidates: Candidate[] = [];
    starts.forEach((start, i) => {
        const end = i + 1 < starts.length ? starts[i + 1] : content.length;
        const text = content.slice(start, end).trimEnd();
        if (text.length >= options.minRecordLength) candidates.push({ start, text });
    });
    return candidates;
}

export function splitRecords(content: string, options: BoundaryOptions): string[] {
    return splitCandidates(content, options).map(c => c.text);
}
