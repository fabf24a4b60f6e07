/**
 * Deterministic schedule dumps for fixtures and replay comparison.
 *
 * Text: a header line, then one tab-separated line per entry
 *   <time ms>\t<resource id>\t<resource kind>\t<payload type>\t<value>
 * Binary: the same rows in a MessagePack envelope.
 */

import { pack, unpack } from 'msgpackr';

import {
    custom,
    moveAbsolute,
    moveRelative,
    payloadValue,
    setAnalog,
    setDigital,
    type ActionEntry,
    type ActionPayload,
    type ActionPayloadType,
    type ActionSchedule,
} from '@/types/actionTable';
import type { ResourceKind } from '@/types/devices';
import { Time } from '@/utils/time';

const TEXT_HEADER = '# action-schedule v1';
const BINARY_VERSION = 1;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

type DumpRow = [time: string, id: string, kind: ResourceKind, type: ActionPayloadType, value: boolean | number];

interface BinaryEnvelope {
    version: number;
    entries: DumpRow[];
}

export class ScheduleFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ScheduleFormatError';
    }
}

const RESOURCE_KINDS: readonly ResourceKind[] = ['camera', 'light', 'stage-axis', 'pattern-client'];
const PAYLOAD_TYPES: readonly ActionPayloadType[] = [
    'SET_DIGITAL',
    'SET_ANALOG',
    'MOVE_ABSOLUTE',
    'MOVE_RELATIVE',
    'CUSTOM',
];

const isResourceKind = (value: unknown): value is ResourceKind =>
    RESOURCE_KINDS.some((kind) => kind === value);

const isPayloadType = (value: unknown): value is ActionPayloadType =>
    PAYLOAD_TYPES.some((type) => type === value);

const toRow = (entry: ActionEntry): DumpRow => {
    if (/[\t\r\n]/.test(entry.target.id)) {
        throw new ScheduleFormatError(`Resource id ${JSON.stringify(entry.target.id)} cannot be dumped`);
    }
    return [
        entry.timestamp.toString(),
        entry.target.id,
        entry.target.kind,
        entry.payload.type,
        payloadValue(entry.payload),
    ];
};

const buildPayload = (type: ActionPayloadType, value: boolean | number, line: number): ActionPayload => {
    if (type === 'SET_DIGITAL') {
        if (typeof value !== 'boolean') {
            throw new ScheduleFormatError(`Row ${line}: SET_DIGITAL needs a boolean value`);
        }
        return setDigital(value);
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ScheduleFormatError(`Row ${line}: ${type} needs a finite number`);
    }
    switch (type) {
        case 'SET_ANALOG':
            return setAnalog(value);
        case 'MOVE_ABSOLUTE':
            return moveAbsolute(value);
        case 'MOVE_RELATIVE':
            return moveRelative(value);
        case 'CUSTOM':
            if (!Number.isInteger(value)) {
                throw new ScheduleFormatError(`Row ${line}: CUSTOM needs an integer index`);
            }
            return custom(value);
    }
};

const fromRow = (row: unknown, sequence: number): ActionEntry => {
    if (!Array.isArray(row) || row.length !== 5) {
        throw new ScheduleFormatError(`Row ${sequence}: expected 5 fields`);
    }
    const [time, id, kind, type, value] = row;
    if (typeof time !== 'string' || typeof id !== 'string' || id.length === 0) {
        throw new ScheduleFormatError(`Row ${sequence}: invalid time or resource id`);
    }
    if (!isResourceKind(kind) || !isPayloadType(type)) {
        throw new ScheduleFormatError(`Row ${sequence}: unknown resource kind or payload type`);
    }
    if (typeof value !== 'boolean' && typeof value !== 'number') {
        throw new ScheduleFormatError(`Row ${sequence}: invalid value`);
    }
    let timestamp: Time;
    try {
        timestamp = Time.parse(time);
    } catch (error) {
        throw new ScheduleFormatError(
            `Row ${sequence}: ${error instanceof Error ? error.message : 'invalid time'}`,
        );
    }
    return {
        timestamp,
        target: { id, kind },
        payload: buildPayload(type, value, sequence),
        sequence,
    };
};

const toSchedule = (entries: ActionEntry[]): ActionSchedule => ({
    entries,
    duration: Time.max(Time.ZERO, ...entries.map((entry) => entry.timestamp)),
});

// ============================================================================
// Text
// ============================================================================

export const dumpScheduleText = (schedule: { entries: readonly ActionEntry[] }): string => {
    const lines = schedule.entries.map((entry) => toRow(entry).map(String).join('\t'));
    return [TEXT_HEADER, ...lines].join('\n') + '\n';
};

const parseTextValue = (raw: string): boolean | number => {
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    return raw.trim() === '' ? Number.NaN : Number(raw);
};

export const parseScheduleText = (text: string): ActionSchedule => {
    const lines = text.split('\n').filter((line) => line.length > 0);
    if (lines[0] !== TEXT_HEADER) {
        throw new ScheduleFormatError('Missing action-schedule header');
    }
    const entries = lines.slice(1).map((line, index) => {
        const fields = line.split('\t');
        if (fields.length !== 5) {
            throw new ScheduleFormatError(`Row ${index}: expected 5 fields`);
        }
        const [time, id, kind, type, value] = fields;
        return fromRow([time, id, kind, type, parseTextValue(value)], index);
    });
    return toSchedule(entries);
};

// ============================================================================
// Binary
// ============================================================================

export const encodeScheduleBinary = (schedule: { entries: readonly ActionEntry[] }): Uint8Array => {
    const envelope: BinaryEnvelope = {
        version: BINARY_VERSION,
        entries: schedule.entries.map(toRow),
    };
    return pack(envelope);
};

export const decodeScheduleBinary = (data: Uint8Array): ActionSchedule => {
    const decoded: unknown = unpack(data);
    if (typeof decoded !== 'object' || decoded === null || !('version' in decoded)) {
        throw new ScheduleFormatError('Binary schedule has no envelope');
    }
    if (decoded.version !== BINARY_VERSION || !('entries' in decoded) || !Array.isArray(decoded.entries)) {
        throw new ScheduleFormatError('Unsupported binary schedule envelope');
    }
    const rows: unknown[] = decoded.entries;
    return toSchedule(rows.map((row, index) => fromRow(row, index)));
};

// ============================================================================
// Fingerprint
// ============================================================================

/** 32-bit FNV-1a over UTF-16 code units, as 8 hex digits. */
export const fnv1aHex = (text: string): string => {
    let digest = FNV_OFFSET_BASIS;
    for (let index = 0; index < text.length; index++) {
        digest = Math.imul(digest ^ text.charCodeAt(index), FNV_PRIME) >>> 0;
    }
    return digest.toString(16).padStart(8, '0');
};

/** Short hash of the text dump; equal schedules share a fingerprint. */
export const fingerprintSchedule = (schedule: { entries: readonly ActionEntry[] }): string =>
    `schedule-${fnv1aHex(dumpScheduleText(schedule))}`;
