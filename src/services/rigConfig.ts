import { readFile } from 'node:fs/promises';

import { DEFAULT_SCHEDULER_SETTINGS, type SchedulerSettings } from '@/constants/scheduling';
import type { Device, PatternDrive } from '@/types/devices';
import { ConfigurationError } from '@/utils/schedulingErrors';

import { DeviceRegistry } from './deviceRegistry';
import {
    createCameraDevice,
    createLightDevice,
    createPatternClientDevice,
    createStageAxisDevice,
    type CameraOptions,
    type LightOptions,
    type PatternClientOptions,
    type StageAxisOptions,
} from './devices';

const CURRENT_VERSION = 1;

// ============================================================================
// Types
// ============================================================================

export type DeviceConfig =
    | ({ type: 'camera' } & CameraOptions)
    | ({ type: 'light' } & LightOptions)
    | ({ type: 'stage-axis' } & Omit<StageAxisOptions, 'reportedVelocity'>)
    | ({ type: 'pattern-client' } & PatternClientOptions);

export interface RigConfig {
    version: number;
    scheduler: SchedulerSettings;
    devices: DeviceConfig[];
    /** Executor group name -> attached pattern client ids. */
    analogGroups: Record<string, string[]>;
}

// ============================================================================
// Field Readers
// ============================================================================

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

const isPatternDrive = (value: unknown): value is PatternDrive =>
    value === 'sequence-index' || value === 'angle' || value === 'phase';

const invalid = (message: string, resourceId?: string): ConfigurationError =>
    new ConfigurationError('invalid_config', message, { resourceId });

/**
 * Optional non-negative number: absent stays undefined, anything else that
 * is not a usable number is dropped with a warning.
 */
const readOptionalNumber = (raw: RawRecord, field: string, owner: string): number | undefined => {
    const value = raw[field];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (isFiniteNumber(value) && value >= 0) {
        return value;
    }
    console.warn(`[RigConfig] Ignoring invalid ${field} for ${owner}:`, value);
    return undefined;
};

const readTriggerLine = (raw: RawRecord, owner: string): number | null => {
    const value = raw.triggerLine;
    if (value === undefined || value === null) {
        return null;
    }
    if (Number.isInteger(value) && isFiniteNumber(value) && value >= 0) {
        return value;
    }
    console.warn(`[RigConfig] Ignoring invalid triggerLine for ${owner}:`, value);
    return null;
};

// ============================================================================
// Parsing
// ============================================================================

const parseDevice = (raw: unknown, index: number): DeviceConfig => {
    if (!isRecord(raw)) {
        throw invalid(`Device #${index} must be an object`);
    }
    const { id, type } = raw;
    if (typeof id !== 'string' || id.length === 0) {
        throw invalid(`Device #${index} needs a non-empty string id`);
    }

    switch (type) {
        case 'camera':
            return {
                type: 'camera',
                id,
                exposureMs: readOptionalNumber(raw, 'exposureMs', id),
                interExposureGapMs: readOptionalNumber(raw, 'interExposureGapMs', id),
                resetMs: readOptionalNumber(raw, 'resetMs', id),
                ready: typeof raw.ready === 'boolean' ? raw.ready : true,
                triggerLine: readTriggerLine(raw, id),
            };
        case 'light':
            return {
                type: 'light',
                id,
                wavelengthNm: readOptionalNumber(raw, 'wavelengthNm', id) ?? null,
                triggerLine: readTriggerLine(raw, id),
            };
        case 'stage-axis': {
            const axis = raw.axis;
            return {
                type: 'stage-axis',
                id,
                axis: Number.isInteger(axis) && isFiniteNumber(axis) ? axis : undefined,
                velocity: readOptionalNumber(raw, 'velocity', id),
                settlingTimeMs: readOptionalNumber(raw, 'settlingTimeMs', id),
            };
        }
        case 'pattern-client': {
            if (raw.drive !== undefined && !isPatternDrive(raw.drive)) {
                console.warn(`[RigConfig] Unknown drive for ${id}, using sequence-index:`, raw.drive);
            }
            return {
                type: 'pattern-client',
                id,
                drive: isPatternDrive(raw.drive) ? raw.drive : undefined,
                settlingTimeMs: readOptionalNumber(raw, 'settlingTimeMs', id),
            };
        }
        default:
            throw invalid(`Device ${id} has unknown type ${String(type)}`, id);
    }
};

const parseScheduler = (raw: unknown): SchedulerSettings => {
    if (raw === undefined) {
        return { ...DEFAULT_SCHEDULER_SETTINGS };
    }
    if (!isRecord(raw)) {
        throw invalid('scheduler must be an object');
    }
    return {
        interTriggerDelayMs:
            readOptionalNumber(raw, 'interTriggerDelayMs', 'scheduler') ??
            DEFAULT_SCHEDULER_SETTINGS.interTriggerDelayMs,
        zHeightThreshold:
            readOptionalNumber(raw, 'zHeightThreshold', 'scheduler') ??
            DEFAULT_SCHEDULER_SETTINGS.zHeightThreshold,
    };
};

const parseAnalogGroups = (raw: unknown): Record<string, string[]> => {
    if (raw === undefined) {
        return {};
    }
    if (!isRecord(raw)) {
        throw invalid('analogGroups must be an object');
    }
    const groups: Record<string, string[]> = {};
    for (const [group, members] of Object.entries(raw)) {
        if (!Array.isArray(members) || !members.every((member) => typeof member === 'string')) {
            throw invalid(`analogGroups.${group} must be a list of client ids`);
        }
        groups[group] = members.filter((member): member is string => typeof member === 'string');
    }
    return groups;
};

/**
 * Validate a rig description. Optional values fall back to defaults;
 * structural problems throw ConfigurationError.
 */
export const parseRigConfig = (raw: unknown): RigConfig => {
    if (!isRecord(raw)) {
        throw invalid('Rig configuration must be an object');
    }
    if (raw.version !== CURRENT_VERSION) {
        throw invalid(`Unsupported rig configuration version ${String(raw.version)}`);
    }
    if (!Array.isArray(raw.devices)) {
        throw invalid('Rig configuration needs a devices list');
    }

    return {
        version: CURRENT_VERSION,
        scheduler: parseScheduler(raw.scheduler),
        devices: raw.devices.map((device, index) => parseDevice(device, index)),
        analogGroups: parseAnalogGroups(raw.analogGroups),
    };
};

export const loadRigConfig = async (filePath: string): Promise<RigConfig> => {
    const text = await readFile(filePath, 'utf8');
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new ConfigurationError('invalid_config', `Rig configuration ${filePath} is not valid JSON`, {
            cause: error,
        });
    }
    return parseRigConfig(parsed);
};

// ============================================================================
// Registry
// ============================================================================

const createDevice = (config: DeviceConfig): Device => {
    switch (config.type) {
        case 'camera':
            return createCameraDevice(config);
        case 'light':
            return createLightDevice(config);
        case 'stage-axis':
            return createStageAxisDevice(config);
        case 'pattern-client':
            return createPatternClientDevice(config);
    }
};

/**
 * Build a fresh registry for one run, attaching pattern clients to their
 * executor groups.
 */
export const createDeviceRegistry = (config: RigConfig): DeviceRegistry => {
    const registry = new DeviceRegistry(config.devices.map(createDevice));
    for (const [group, members] of Object.entries(config.analogGroups)) {
        for (const clientId of members) {
            registry.attachAnalogClient(group, clientId);
        }
    }
    return registry;
};
