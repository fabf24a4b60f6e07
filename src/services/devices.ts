import {
    DEFAULT_MODULATOR_SETTLING_TIME_MS,
    DEFAULT_STAGE_SETTLING_TIME_MS,
    DEFAULT_STAGE_VELOCITY_UM_PER_S,
    DEFAULT_Z_AXIS,
} from '@/constants/scheduling';
import { custom, setAnalog } from '@/types/actionTable';
import type {
    CameraDevice,
    LightDevice,
    PatternClientDevice,
    PatternDrive,
    StageAxisDevice,
} from '@/types/devices';
import { ConfigurationError } from '@/utils/schedulingErrors';

const isPositiveFinite = (value: number): boolean => Number.isFinite(value) && value > 0;

const requirePositive = (id: string, field: string, value: number): number => {
    if (!isPositiveFinite(value)) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `${field} for ${id} must be a positive number, got ${value}`,
            { resourceId: id },
        );
    }
    return value;
};

const requireNonNegative = (id: string, field: string, value: number): number => {
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `${field} for ${id} must be zero or more, got ${value}`,
            { resourceId: id },
        );
    }
    return value;
};

// ============================================================================
// Camera
// ============================================================================

export interface CameraOptions {
    id: string;
    /** Undefined until the exposure has been set on the device. */
    exposureMs?: number;
    /** Readout/transfer time between exposures. */
    interExposureGapMs?: number;
    resetMs?: number;
    ready?: boolean;
    triggerLine?: number | null;
}

export const createCameraDevice = (options: CameraOptions): CameraDevice => {
    let exposureMs = options.exposureMs ?? null;
    let ready = options.ready ?? true;
    const gapMs = options.interExposureGapMs ?? null;
    const resetMs = options.resetMs ?? null;

    return {
        kind: 'camera',
        handle: { id: options.id, kind: 'camera' },
        triggerLine: options.triggerLine ?? null,
        exposureMs: () => exposureMs,
        interExposureGapMs: () => gapMs,
        resetMs: () => resetMs,
        isReady: () => ready,
        setExposureMs(ms: number) {
            exposureMs = requireNonNegative(options.id, 'Exposure time', ms);
        },
        setReady(next: boolean) {
            ready = next;
        },
    };
};

// ============================================================================
// Light
// ============================================================================

export interface LightOptions {
    id: string;
    triggerLine?: number | null;
    wavelengthNm?: number | null;
}

export const createLightDevice = (options: LightOptions): LightDevice => ({
    kind: 'light',
    handle: { id: options.id, kind: 'light' },
    triggerLine: options.triggerLine ?? null,
    wavelengthNm: options.wavelengthNm ?? null,
});

// ============================================================================
// Stage Axis
// ============================================================================

export interface StageAxisOptions {
    id: string;
    axis?: number;
    /** Configured velocity in µm/s. */
    velocity?: number;
    settlingTimeMs?: number;
    /** Live velocity reported by the device, preferred when positive. */
    reportedVelocity?: () => number | null;
}

/**
 * Stage axis whose motion time is distance over velocity. The settling time
 * is added after every move, whatever its length.
 */
export const createStageAxisDevice = (options: StageAxisOptions): StageAxisDevice => {
    const configuredVelocity = requirePositive(
        options.id,
        'Velocity',
        options.velocity ?? DEFAULT_STAGE_VELOCITY_UM_PER_S,
    );
    const settleMs = requireNonNegative(
        options.id,
        'Settling time',
        options.settlingTimeMs ?? DEFAULT_STAGE_SETTLING_TIME_MS,
    );

    const currentVelocity = (): number => {
        const reported = options.reportedVelocity?.() ?? null;
        return reported !== null && isPositiveFinite(reported) ? reported : configuredVelocity;
    };

    return {
        kind: 'stage-axis',
        handle: { id: options.id, kind: 'stage-axis' },
        axis: options.axis ?? DEFAULT_Z_AXIS,
        motionMs(from: number, to: number) {
            if (!Number.isFinite(from) || !Number.isFinite(to)) {
                return null;
            }
            return {
                moveMs: (Math.abs(to - from) / currentVelocity()) * 1_000,
                settleMs,
            };
        },
    };
};

// ============================================================================
// Pattern Generator Client
// ============================================================================

export interface PatternClientOptions {
    id: string;
    drive?: PatternDrive;
    settlingTimeMs?: number;
}

export const createPatternClientDevice = (options: PatternClientOptions): PatternClientDevice => {
    const drive = options.drive ?? 'sequence-index';
    const settleMs = requireNonNegative(
        options.id,
        'Settling time',
        options.settlingTimeMs ?? DEFAULT_MODULATOR_SETTLING_TIME_MS,
    );

    return {
        kind: 'pattern-client',
        handle: { id: options.id, kind: 'pattern-client' },
        drive,
        settleMs: () => settleMs,
        setpointFor(step, index) {
            switch (drive) {
                case 'angle':
                    return setAnalog(step.angleDeg);
                case 'phase':
                    return setAnalog(step.phaseDeg);
                case 'sequence-index':
                    return custom(index);
            }
        },
    };
};
