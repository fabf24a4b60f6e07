import type { ActionEntry } from '@/types/actionTable';
import { payloadValue } from '@/types/actionTable';
import type { ExperimentPlan, IlluminationStep } from '@/types/experiment';

import { DeviceRegistry } from '../deviceRegistry';
import {
    createCameraDevice,
    createLightDevice,
    createPatternClientDevice,
    createStageAxisDevice,
    type CameraOptions,
} from '../devices';

export const CAMERA = { id: 'cam', kind: 'camera' } as const;
export const LIGHT = { id: 'laser', kind: 'light' } as const;
export const STAGE = { id: 'z', kind: 'stage-axis' } as const;

/**
 * Camera 50 ms exposure + 10 ms gap, one light, a Z stage moving 10 µm in
 * 20 ms with 5 ms settle, and two pattern clients (slm by index, rotor by
 * angle) attached to their own groups.
 */
export function createTestRegistry(camera: Partial<CameraOptions> = {}): DeviceRegistry {
    const registry = new DeviceRegistry([
        createCameraDevice({ id: 'cam', exposureMs: 50, interExposureGapMs: 10, ...camera }),
        createLightDevice({ id: 'laser', wavelengthNm: 488 }),
        createStageAxisDevice({ id: 'z', velocity: 500, settlingTimeMs: 5 }),
        createPatternClientDevice({ id: 'slm', drive: 'sequence-index', settlingTimeMs: 10 }),
        createPatternClientDevice({ id: 'rotor', drive: 'angle', settlingTimeMs: 20 }),
    ]);
    registry.attachAnalogClient('slm', 'slm');
    registry.attachAnalogClient('rotor', 'rotor');
    return registry;
}

export function steps(count: number): IlluminationStep[] {
    return Array.from({ length: count }, (_, index) => ({
        angleDeg: index * 90,
        phaseDeg: 0,
        wavelength: 488e-9,
    }));
}

export function createTestPlan(overrides: Partial<ExperimentPlan> = {}): ExperimentPlan {
    return {
        sequence: steps(2),
        zStart: 0,
        zHeight: 0,
        sliceHeight: 1,
        numReps: 1,
        cameras: [CAMERA],
        lights: [LIGHT],
        stage: null,
        patternGroups: [],
        metadata: '',
        ...overrides,
    };
}

/** Compact "time id TYPE value" form for assertions. */
export function describeEntry(entry: ActionEntry): string {
    return `${entry.timestamp.toString()} ${entry.target.id} ${entry.payload.type} ${String(payloadValue(entry.payload))}`;
}
