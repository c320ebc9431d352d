/**
 * (c) settlement-dump-decoder - Card settlement dump decoding
 * October 19, 2026
 *
 * A TypeScript based decoder for ISO 8583 style transaction dumps
 */
import { decodeBinary } from './binary';
import { MIN_RECORD_LENGTH } from './boundary';
import { decodeText, detectFormat } from './encoding';
import { SpecificationSet } from './specs';
import { decodeTextRecords, FIXED_RECORD_LENGTH } from './text';
import { BinaryCharset, BoundaryMode, DecodeResult, DetectedFormat, Diagnostic, Framing } from './types';
import { errorMessage } from './util';

export interface EngineOptions {
    binaryExtensions: readonly string[];
    confidenceThreshold: number;
    binaryCharset: BinaryCharset;
    framing: Framing;
    boundaryMode: BoundaryMode;
    minRecordLength: number;
    fixedRecordLength: number;
    specifications?: SpecificationSet;
    mtiMeanings?: Readonly<Record<string, string>>;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
    binaryExtensions: ['.001'],
    confidenceThreshold: 0.7,
    binaryCharset: 'ascii',
    framing: 'none',
    boundaryMode: 'strict',
    minRecordLength: MIN_RECORD_LENGTH,
    fixedRecordLength: FIXED_RECORD_LENGTH,
};

export interface DumpDecodeResult extends DecodeResult {
    format: DetectedFormat;
}

function decodeDetected(content: Buffer, format: DetectedFormat, sourceIdentifier: string, options: EngineOptions): DecodeResult {
    if (format.kind === 'binary') {
        return decodeBinary(content, {
            charset: options.binaryCharset,
            framing: options.framing,
            sourceIdentifier,
            specifications: options.specifications,
            mtiMeanings: options.mtiMeanings,
        });
    }
    const charsetDiagnostics: Diagnostic[] = [];
    const text = decodeText(content, format.charset, charsetDiagnostics);
    const result = decodeTextRecords(text, {
        sourceIdentifier,
        boundaryMode: options.boundaryMode,
        minRecordLength: options.minRecordLength,
        fixedRecordLength: options.fixedRecordLength,
        specifications: options.specifications,
        mtiMeanings: options.mtiMeanings,
    });
    return { records: result.records, diagnostics: [...charsetDiagnostics, ...result.diagnostics] };
}

/**
 * Decodes one dump. Never throws: faults become diagnostics and an
 * unparseable buffer yields an empty record list.
 */
export function decodeDump(content: Buffer, filename: string, options: EngineOptions = DEFAULT_ENGINE_OPTIONS): DumpDecodeResult {
    let format: DetectedFormat = { kind: 'binary', reason: 'undetected' };
    let result: DecodeResult;
    try {
        format = detectFormat(content, filename, options);
        result = decodeDetected(content, format, filename, options);
    } catch (err) {
        result = {
            records: [],
            diagnostics: [{ severity: 'error', code: 'no-records', message: `decoding ${filename} failed: ${errorMessage(err)}` }],
        };
        return { format, ...result };
    }
    if (result.records.length === 0) {
        result.diagnostics.push({ severity: 'warning', code: 'no-records', message: `no valid records in ${filename}` });
    }
    return { format, ...result };
}
