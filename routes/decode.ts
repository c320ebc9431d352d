/**
 * (c) settlement-dump-decoder - Card settlement dump decoding
 * October 19, 2026
 *
 * A TypeScript based decoder for ISO 8583 style transaction dumps
 */
import { Router, Request, Response, NextFunction } from "express";
import { raw } from 'body-parser';
import { decodeDump, EngineOptions } from '../business/engine';
import { getLogger, ILogger, logDiagnostics } from '../business/logger';
import { Row, toRow } from '../business/output';
import { BoundaryMode, DetectedFormat, Diagnostic } from '../business/types';

export interface DecodeResponse {
    format: DetectedFormat;
    records: Row[];
    diagnostics: Diagnostic[];
}

export type HandlerResult<T> =
    | { status: 200; payload: T }
    | { status: 400 | 404; payload: { status: string } };

function queryString(value: unknown): string | undefined {
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/* request handling without the HTTP plumbing */
export function handleDecode(body: unknown, query: Record<string, unknown>, options: EngineOptions, logger: ILogger): HandlerResult<DecodeResponse> {
    if (!Buffer.isBuffer(body) || body.length === 0) {
        return { status: 400, payload: { status: 'request body must contain the dump bytes' } };
    }
    const mode = queryString(query['mode']) ?? options.boundaryMode;
    if (mode !== 'strict' && mode !== 'lax') {
        return { status: 400, payload: { status: `unknown mode ${mode}` } };
    }
    const boundaryMode: BoundaryMode = mode;
    const filename = queryString(query['filename']) ?? 'upload';

    const result = decodeDump(body, filename, { ...options, boundaryMode });
    logDiagnostics(logger, filename, result.diagnostics);
    logger.info(`${filename}: ${result.format.kind}, ${result.records.length} records, ${result.diagnostics.length} diagnostics`);
    return {
        status: 200,
        payload: { format: result.format, records: result.records.map(toRow), diagnostics: result.diagnostics },
    };
}

export function createDecodeRouter(options: EngineOptions, bodyLimit: string, verbose = false): Router {
    const logger = getLogger('decode', verbose);
    const DecodeRouter: Router = Router();

    DecodeRouter.post("/", raw({ type: () => true, limit: bodyLimit }), function (request: Request, response: Response, next: NextFunction) {
        try {
            const result = handleDecode(request.body, request.query, options, logger);
            response.status(result.status).json(result.payload);
        } catch (err) {
            next(err);
        }
    });

    return DecodeRouter;
}
