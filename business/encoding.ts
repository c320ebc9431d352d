import * as path from 'path';
import { analyse } from 'chardet';
import { DetectedFormat, Diagnostic } from './types';

export const FALLBACK_CHARSET = 'latin1';
const NUL_SCAN_LENGTH = 1000;
const SOH = 0x01;
const STX = 0x02;

export interface DetectionOptions {
    binaryExtensions: readonly string[];
    confidenceThreshold: number;
}

/**
 * Classifies a dump as binary framed messages or text in some charset.
 * Text detection never fails: below the confidence threshold the
 * byte-preserving single byte charset is used.
 */
export function detectFormat(content: Buffer, filename: string, options: DetectionOptions): DetectedFormat {
    const ext = path.extname(filename).toLowerCase();
    if (ext && options.binaryExtensions.some(e => e.toLowerCase() === ext)) {
        return { kind: 'binary', reason: `extension ${ext}` };
    }
    if (content.length > 0 && (content[0] === SOH || content[0] === STX)) {
        return { kind: 'binary', reason: `leading control byte 0x${content[0].toString(16).padStart(2, '0')}` };
    }
    const nul = content.subarray(0, NUL_SCAN_LENGTH).indexOf(0);
    if (nul >= 0) {
        return { kind: 'binary', reason: `NUL byte at ${nul}` };
    }

    const best = analyse(content)[0];
    // chardet reports confidence as a percentage
    const confidence = best ? best.confidence / 100 : 0;
    if (best && confidence > options.confidenceThreshold) {
        return { kind: 'text', charset: best.name, confidence };
    }
    return { kind: 'text', charset: FALLBACK_CHARSET, confidence };
}

/* decodes text content, falling back to latin1 for charsets Node cannot decode */
export function decodeText(content: Buffer, charset: string, diagnostics: Diagnostic[]): string {
    if (charset === FALLBACK_CHARSET) return content.toString('latin1');
    try {
        return new TextDecoder(charset).decode(content);
    } catch (err) {
        if (!(err instanceof RangeError)) throw err;
        diagnostics.push({
            severity: 'info',
            code: 'charset-fallback',
            message: `charset ${charset} is not supported, decoded as ${FALLBACK_CHARSET}`,
        });
        return content.toString('latin1');
    }
}
