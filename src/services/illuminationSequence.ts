import {
    ANGLE_RANGE_DEG,
    DEFAULT_NUM_ANGLES,
    DEFAULT_NUM_PHASES,
    DEFAULT_WAVELENGTH_M,
    PHASE_RANGE_DEG,
} from '@/constants/scheduling';
import type { IlluminationStep } from '@/types/experiment';
import { ConfigurationError } from '@/utils/schedulingErrors';

export interface IlluminationSequenceOptions {
    numAngles?: number;
    numPhases?: number;
    wavelength?: number;
}

const requireCount = (field: string, value: number): number => {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `${field} must be a positive integer, got ${value}`,
        );
    }
    return value;
};

/**
 * Angle-major list of grating patterns: every phase of the first angle,
 * then every phase of the next.
 */
export const buildIlluminationSequence = ({
    numAngles = DEFAULT_NUM_ANGLES,
    numPhases = DEFAULT_NUM_PHASES,
    wavelength = DEFAULT_WAVELENGTH_M,
}: IlluminationSequenceOptions = {}): IlluminationStep[] => {
    requireCount('Number of angles', numAngles);
    requireCount('Number of phases', numPhases);
    if (!Number.isFinite(wavelength) || wavelength <= 0) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `Wavelength must be a positive number, got ${wavelength}`,
        );
    }

    const steps: IlluminationStep[] = [];
    for (let angleIndex = 0; angleIndex < numAngles; angleIndex++) {
        for (let phaseIndex = 0; phaseIndex < numPhases; phaseIndex++) {
            steps.push({
                angleDeg: (angleIndex * ANGLE_RANGE_DEG) / numAngles,
                phaseDeg: (phaseIndex * PHASE_RANGE_DEG) / numPhases,
                wavelength,
            });
        }
    }
    return steps;
};

export const formatDiffractionMetadata = (diffractionAngle: number): string =>
    `SLM diff_angle ${diffractionAngle.toFixed(3)}`;

export const appendMetadata = (existing: string | undefined, addition: string): string =>
    existing && existing.length > 0 ? `${existing}; ${addition}` : addition;
