import { MTI_LENGTH } from './registry';
import { DecodeFault, Diagnostic } from './types';

/* start-of-text marker of the network's framing convention */
export const FRAME_MARKER = 0x02;

/**
 * Searches forward from a fault for the next framing marker and returns the
 * cursor to resume at, or null when the rest of the buffer holds no marker.
 * Never throws; every call reports the skipped byte range.
 */
export function resync(buffer: Buffer, fault: DecodeFault, recordStart: number, diagnostics: Diagnostic[]): number | null {
    const p = buffer.indexOf(FRAME_MARKER, fault.position + 1);
    if (p === -1) {
        diagnostics.push({
            severity: 'warning',
            code: 'resync-exhausted',
            position: fault.position,
            message: `${fault.reason}; no framing marker after ${fault.position}, skipped bytes ${recordStart}-${buffer.length - 1}`,
        });
        return null;
    }
    // a marker opens the bitmap, the MTI sits just before it
    const resume = p - MTI_LENGTH > recordStart ? p - MTI_LENGTH : p;
    diagnostics.push({
        severity: 'warning',
        code: 'resync',
        position: fault.position,
        message: `${fault.reason}; skipped bytes ${recordStart}-${resume - 1}, resuming at ${resume}`,
    });
    return resume;
}
