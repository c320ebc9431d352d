/**
 * (c) settlement-dump-decoder - Card settlement dump decoding
 * October 19, 2026
 *
 * A TypeScript based decoder for ISO 8583 style transaction dumps
 */
import * as fs from 'fs';
import * as path from 'path';
import * as jsonfile from 'jsonfile';
import { FieldSpecification, MessageSpecification } from './types';
import { ConfigurationError } from './errors';

export const DEFAULT_SPECIFICATION = 'default';

export type SpecificationResolution =
    | { kind: 'unconfigured' }
    | { kind: 'found'; specification: MessageSpecification; source: string }
    | { kind: 'missing'; reason: string };

/**
 * External field specifications keyed by message type, with an optional
 * default used for message types that have none of their own.
 */
export class SpecificationSet {
    private readonly byMti: ReadonlyMap<string, MessageSpecification>;

    constructor(entries: Iterable<[string, MessageSpecification]>) {
        this.byMti = new Map(entries);
    }

    get size(): number {
        return this.byMti.size;
    }

    resolve(mti: string): SpecificationResolution {
        const own = this.byMti.get(mti);
        if (own) return { kind: 'found', specification: own, source: mti };
        const fallback = this.byMti.get(DEFAULT_SPECIFICATION);
        if (fallback) return { kind: 'found', specification: fallback, source: DEFAULT_SPECIFICATION };
        return { kind: 'missing', reason: `no specification for MTI ${mti || '(missing)'} and no default specification` };
    }
}

export function resolveSpecification(specifications: SpecificationSet | undefined, mti: string): SpecificationResolution {
    return specifications ? specifications.resolve(mti) : { kind: 'unconfigured' };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates the raw JSON of one specification file: an object mapping field
 * numbers to { max_len, type }.
 */
export function parseSpecification(raw: unknown, source: string): MessageSpecification {
    if (!isRecord(raw)) throw new ConfigurationError(`${source}: expected an object of field specifications`);

    const entries: [number, FieldSpecification][] = [];
    for (const [key, value] of Object.entries(raw)) {
        const fieldNumber = Number(key);
        if (!/^\d+$/.test(key) || fieldNumber < 1 || fieldNumber > 128) {
            throw new ConfigurationError(`${source}: "${key}" is not a field number 1-128`);
        }
        if (!isRecord(value)) throw new ConfigurationError(`${source}: field ${key} must be an object`);
        const maxLength = value['max_len'];
        if (typeof maxLength !== 'number' || !Number.isInteger(maxLength) || maxLength < 0) {
            throw new ConfigurationError(`${source}: field ${key} is missing a non-negative integer max_len`);
        }
        const type = value['type'] ?? 'alphanumeric';
        if (typeof type !== 'string') throw new ConfigurationError(`${source}: field ${key} type must be a string`);
        entries.push([fieldNumber, { maxLength, type }]);
    }
    entries.sort((a, b) => a[0] - b[0]);
    return new Map(entries);
}

/* reads every <MTI>.json (and default.json) of a directory */
export function loadSpecifications(directory: string): SpecificationSet {
    let files: string[];
    try {
        files = fs.readdirSync(directory).filter(f => path.extname(f).toLowerCase() === '.json');
    } catch (err) {
        throw new ConfigurationError(`cannot read specifications directory ${directory}`, { cause: err });
    }

    const entries: [string, MessageSpecification][] = [];
    for (const file of files) {
        const full = path.join(directory, file);
        let raw: unknown;
        try {
            raw = jsonfile.readFileSync(full);
        } catch (err) {
            throw new ConfigurationError(`${full} is not valid JSON`, { cause: err });
        }
        entries.push([path.basename(file, path.extname(file)), parseSpecification(raw, full)]);
    }
    return new SpecificationSet(entries);
}
