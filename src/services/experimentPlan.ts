import type { ExperimentPlan, ExperimentSettings } from '@/types/experiment';
import { ConfigurationError } from '@/utils/schedulingErrors';

import type { DeviceRegistry } from './deviceRegistry';
import {
    appendMetadata,
    buildIlluminationSequence,
    formatDiffractionMetadata,
} from './illuminationSequence';

export interface BuildExperimentPlanOptions {
    /** Diffraction angle reported by the pattern generator, stored in metadata. */
    diffractionAngle?: number | null;
}

const dedupe = (ids: string[]): string[] => Array.from(new Set(ids));

/**
 * Resolve user-facing experiment settings against the registry.
 */
export const buildExperimentPlan = (
    registry: DeviceRegistry,
    settings: ExperimentSettings,
    { diffractionAngle = null }: BuildExperimentPlanOptions = {},
): ExperimentPlan => {
    const sequence = buildIlluminationSequence({
        numAngles: settings.numAngles,
        numPhases: settings.numPhases,
        wavelength: settings.wavelength,
    });

    const cameras = dedupe(settings.cameraIds).map((id) => registry.require(id, 'camera').handle);
    const lights = dedupe(settings.lightIds).map((id) => registry.require(id, 'light').handle);
    const stage = settings.stageId ? registry.require(settings.stageId, 'stage-axis').handle : null;

    const numReps = settings.numReps ?? 1;
    if (!Number.isInteger(numReps) || numReps < 1) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `numReps must be a positive integer, got ${numReps}`,
        );
    }

    const metadata =
        diffractionAngle === null
            ? (settings.metadata ?? '')
            : appendMetadata(settings.metadata, formatDiffractionMetadata(diffractionAngle));

    return {
        sequence,
        zStart: settings.zStart,
        zHeight: settings.zHeight,
        sliceHeight: settings.sliceHeight,
        numReps,
        cameras,
        lights,
        stage,
        patternGroups: dedupe(settings.patternGroups ?? []),
        metadata,
    };
};
