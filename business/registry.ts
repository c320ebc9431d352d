import { FieldDefinition, LayoutField, MessageSpecification, ValueClass, DecodeStrategy } from './types';

function field(number: number, name: string, length: number, valueClass: ValueClass, strategy: DecodeStrategy = 'identity'): FieldDefinition {
    return Object.freeze({ number, name, length, valueClass, strategy });
}

/* define the commonly used primary bitmap fields */
const FIELDS: readonly FieldDefinition[] = [
    field(2,  'Primary Account Number', 19, 'numeric'),
    field(3,  'Processing Code', 6, 'numeric'),
    field(4,  'Amount Transaction', 12, 'numeric', 'amount'),
    field(7,  'Transmission Date/Time', 10, 'numeric', 'timestamp'),
    field(11, 'System Trace Audit Number', 6, 'numeric'),
    field(12, 'Local Transaction Time', 6, 'numeric', 'timestamp'),
    field(14, 'Expiration Date', 4, 'numeric'),
    field(22, 'POS Data Code', 12, 'alphanumeric'),
    field(24, 'Function Code', 3, 'numeric'),
    field(32, 'Acquiring Institution ID', 11, 'numeric'),
    field(37, 'Retrieval Reference Number', 12, 'alphanumeric'),
    field(38, 'Approval Code', 6, 'alphanumeric'),
    field(41, 'Card Acceptor Terminal ID', 16, 'alphanumeric'),
    field(42, 'Card Acceptor ID Code', 15, 'alphanumeric'),
    field(43, 'Card Acceptor Name/Location', 99, 'alphanumeric'),
    field(49, 'Currency Code Transaction', 3, 'numeric'),
    field(64, 'Message Authentication Code', 8, 'special', 'hex'),
];

const REGISTRY: ReadonlyMap<number, FieldDefinition> = new Map(FIELDS.map(f => [f.number, f]));

/* fixed-width settlement record layout (256 characters) */
export const SETTLEMENT_LAYOUT: readonly LayoutField[] = [
    { name: 'PAN', start: 4, length: 19, strategy: 'identity', alphanumericOnly: true },
    { name: 'Processing Code', start: 23, length: 6, strategy: 'identity' },
    { name: 'Amount', start: 29, length: 12, strategy: 'amount' },
    { name: 'Amount Reconciliation', start: 41, length: 12, strategy: 'amount' },
    { name: 'Conversion Rate Reconciliation', start: 53, length: 8, strategy: 'identity' },
    { name: 'Local Date/Time', start: 61, length: 10, strategy: 'timestamp' },
    { name: 'Card Expiry', start: 71, length: 4, strategy: 'identity' },
    { name: 'POS Data Code', start: 75, length: 3, strategy: 'identity' },
    { name: 'Card Sequence Number', start: 78, length: 3, strategy: 'identity' },
    { name: 'Function Code', start: 81, length: 3, strategy: 'identity' },
    { name: 'Message Reason Code', start: 84, length: 4, strategy: 'identity' },
    { name: 'MCC', start: 88, length: 4, strategy: 'identity' },
    { name: 'Amounts Original', start: 92, length: 12, strategy: 'amount' },
    { name: 'Acquirer Reference Data', start: 104, length: 12, strategy: 'identity' },
    { name: 'Acquiring Institution ID Code', start: 116, length: 11, strategy: 'identity' },
    { name: 'Forwarding Institution ID Code', start: 127, length: 11, strategy: 'identity' },
    { name: 'Retrieval Reference Number', start: 138, length: 12, strategy: 'identity' },
    { name: 'Approval Code', start: 150, length: 6, strategy: 'identity' },
    { name: 'Service Code', start: 156, length: 3, strategy: 'identity' },
    { name: 'Terminal ID', start: 159, length: 8, strategy: 'identity' },
    { name: 'Merchant ID', start: 167, length: 15, strategy: 'identity' },
    { name: 'Merchant Name', start: 182, length: 40, strategy: 'identity' },
    { name: 'Additional Data', start: 222, length: 34, strategy: 'identity' },
];

export const MTI_LENGTH = 4;

/* file header/trailer records carry a length and embedded transactions instead of a PAN */
export const HEADER_TRAILER_MTI = '1644';

export const MTI_MEANINGS: Readonly<Record<string, string>> = {
    '1240': 'Authorization Request',
    '1250': 'Authorization Response',
    '1420': 'Clearing Advice',
    '1422': 'Clearing Advice Repeat',
    '1424': 'Clearing Reversal',
    '1426': 'Clearing Reversal Repeat',
    '1428': 'Clearing Adjustment',
    '1430': 'Clearing Advice Response',
    '1440': 'Clearing Notification',
    '1442': 'Chargeback',
    '1644': 'File Header/Trailer',
    '1804': 'Network Management Request',
};

export function lookup(fieldNumber: number): FieldDefinition | undefined {
    return REGISTRY.get(fieldNumber);
}

export function allFields(): FieldDefinition[] {
    return [...REGISTRY.values()];
}

export function fieldLabel(fieldNumber: number): string {
    return lookup(fieldNumber)?.name ?? `Field ${fieldNumber}`;
}

export function describeMti(mti: string, extra: Readonly<Record<string, string>> = {}): string {
    if (!mti) return 'Missing MTI';
    return extra[mti] ?? MTI_MEANINGS[mti] ?? `Unknown MTI (${mti})`;
}

/**
 * The registry as seen by one message type: external specification entries
 * take precedence for length and add fields the static table lacks.
 */
export class FieldResolver {
    constructor(readonly specification?: MessageSpecification) {}

    resolve(fieldNumber: number): FieldDefinition | undefined {
        const base = lookup(fieldNumber);
        const spec = this.specification?.get(fieldNumber);
        if (!spec) return base;
        return {
            number: fieldNumber,
            name: fieldLabel(fieldNumber),
            length: spec.maxLength,
            valueClass: spec.type === 'numeric' ? 'numeric' : base?.valueClass ?? 'alphanumeric',
            strategy: base?.strategy ?? 'identity',
        };
    }
}
