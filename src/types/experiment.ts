import type { ActionSchedule } from './actionTable';
import type { ResourceHandle } from './devices';

/**
 * One structured-illumination pattern: grating angle and phase in degrees,
 * wavelength in metres.
 */
export interface IlluminationStep {
    angleDeg: number;
    phaseDeg: number;
    wavelength: number;
}

/**
 * Fully resolved input to the sequence planner.
 */
export interface ExperimentPlan {
    /** Steps visited in order on every Z slice. */
    sequence: readonly IlluminationStep[];
    /** Z position of the first slice (µm). */
    zStart: number;
    /** Height of the imaged volume (µm). 0 for a single plane. */
    zHeight: number;
    /** Distance between slices (µm). */
    sliceHeight: number;
    /** Back-to-back repetitions the executor will run. */
    numReps: number;
    cameras: readonly ResourceHandle[];
    lights: readonly ResourceHandle[];
    stage: ResourceHandle | null;
    /** Executor groups whose attached pattern clients are driven each step. */
    patternGroups: readonly string[];
    /** Free-form annotation stored alongside the images. */
    metadata: string;
}

/**
 * Plain experiment parameters, as edited by a user, before resolution
 * against a device registry.
 */
export interface ExperimentSettings {
    numAngles: number;
    numPhases: number;
    wavelength?: number;
    zStart: number;
    zHeight: number;
    sliceHeight: number;
    numReps?: number;
    cameraIds: string[];
    lightIds: string[];
    stageId?: string | null;
    patternGroups?: string[];
    metadata?: string;
}

/**
 * Everything the executor and metadata writer need from one planning run.
 */
export interface SequenceSchedule extends ActionSchedule {
    /** Images each camera will produce, including discarded ones. */
    imageCounts: ReadonlyMap<string, number>;
    /** Per camera, zero-based indices of frames produced by reset triggers. */
    discardedImages: ReadonlyMap<string, readonly number[]>;
    /** Steps to upload to pattern generators before execution. */
    sequence: readonly IlluminationStep[];
    numZSlices: number;
    metadata: string;
}
