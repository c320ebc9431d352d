/**
 * (c) settlement-dump-decoder - Card settlement dump decoding
 * October 19, 2026
 *
 * A TypeScript based decoder for ISO 8583 style transaction dumps
 */
import * as fs from 'fs';
import * as jsonfile from 'jsonfile';
import { DEFAULT_ENGINE_OPTIONS, EngineOptions } from './engine';
import { ConfigurationError } from './errors';
import { loadSpecifications } from './specs';
import { BinaryCharset, BoundaryMode, Framing } from './types';

const CONFIG_FILE: string = process.env.DUMP_DECODER_CONFIG ?? 'config.json';

export interface AppConfig {
    port: number;
    bodyLimit: string;
    verbose: boolean;
    engine: EngineOptions;
}

const CHARSETS: readonly BinaryCharset[] = ['ascii', 'latin1', 'ebcdic'];
const FRAMINGS: readonly Framing[] = ['none', 'rdw', 'blocked-rdw'];
const BOUNDARY_MODES: readonly BoundaryMode[] = ['strict', 'lax'];

function oneOf<T extends string>(allowed: readonly T[], value: unknown, key: string, fallback: T): T {
    if (value === undefined) return fallback;
    const match = allowed.find(a => a === value);
    if (match === undefined) throw new ConfigurationError(`${key} must be one of ${allowed.join(', ')}`);
    return match;
}

function numberOf(value: unknown, key: string, fallback: number): number {
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || Number.isNaN(value)) throw new ConfigurationError(`${key} must be a number`);
    return value;
}

function stringsOf(value: unknown, key: string, fallback: readonly string[]): readonly string[] {
    if (value === undefined) return fallback;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new ConfigurationError(`${key} must be an array of strings`);
    }
    return value;
}

function meaningsOf(value: unknown): Record<string, string> {
    if (value === undefined) return {};
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new ConfigurationError('mtiMeanings must be an object');
    }
    const meanings: Record<string, string> = {};
    for (const [mti, meaning] of Object.entries(value)) {
        if (typeof meaning !== 'string') throw new ConfigurationError(`mtiMeanings.${mti} must be a string`);
        meanings[mti] = meaning;
    }
    return meanings;
}

/* merges a parsed config file over the defaults */
export function buildConfig(raw: Record<string, unknown>): AppConfig {
    const defaults = DEFAULT_ENGINE_OPTIONS;
    const specsDirectory = raw['specsDirectory'];
    if (specsDirectory !== undefined && typeof specsDirectory !== 'string') {
        throw new ConfigurationError('specsDirectory must be a string');
    }
    const bodyLimit = raw['bodyLimit'] ?? '50mb';
    if (typeof bodyLimit !== 'string') throw new ConfigurationError('bodyLimit must be a string');

    return {
        port: numberOf(raw['port'], 'port', 3000),
        bodyLimit,
        verbose: raw['verbose'] === true,
        engine: {
            binaryExtensions: stringsOf(raw['binaryExtensions'], 'binaryExtensions', defaults.binaryExtensions),
            confidenceThreshold: numberOf(raw['confidenceThreshold'], 'confidenceThreshold', defaults.confidenceThreshold),
            binaryCharset: oneOf(CHARSETS, raw['binaryCharset'], 'binaryCharset', defaults.binaryCharset),
            framing: oneOf(FRAMINGS, raw['framing'], 'framing', defaults.framing),
            boundaryMode: oneOf(BOUNDARY_MODES, raw['boundaryMode'], 'boundaryMode', defaults.boundaryMode),
            minRecordLength: numberOf(raw['minRecordLength'], 'minRecordLength', defaults.minRecordLength),
            fixedRecordLength: numberOf(raw['fixedRecordLength'], 'fixedRecordLength', defaults.fixedRecordLength),
            specifications: specsDirectory === undefined ? undefined : loadSpecifications(specsDirectory),
            mtiMeanings: meaningsOf(raw['mtiMeanings']),
        },
    };
}

/* a missing config file means defaults */
export function readConfig(file: string = CONFIG_FILE): AppConfig {
    if (!fs.existsSync(file)) return buildConfig({});
    let raw: unknown;
    try {
        raw = jsonfile.readFileSync(file);
    } catch (err) {
        throw new ConfigurationError(`${file} is not valid JSON`, { cause: err });
    }
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ConfigurationError(`${file} must contain a JSON object`);
    }
    return buildConfig(Object.fromEntries(Object.entries(raw)));
}
