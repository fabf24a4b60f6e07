/**
 * Tunable margins used by the sequence planner.
 */
export interface SchedulerSettings {
    /** Pause after each exposure so pattern generators can latch (ms). */
    interTriggerDelayMs: number;
    /** Volumes taller than this (µm) get an extra top slice. */
    zHeightThreshold: number;
}

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerSettings = {
    interTriggerDelayMs: 5,
    zHeightThreshold: 1e-6,
};

// Stage axis fallbacks when the rig description leaves them out
export const DEFAULT_STAGE_VELOCITY_UM_PER_S = 1_000;
export const DEFAULT_STAGE_SETTLING_TIME_MS = 10;
export const DEFAULT_Z_AXIS = 2;

export const DEFAULT_MODULATOR_SETTLING_TIME_MS = 10;

// Structured illumination defaults
export const DEFAULT_NUM_ANGLES = 3;
export const DEFAULT_NUM_PHASES = 5;
export const DEFAULT_WAVELENGTH_M = 488e-9;
export const ANGLE_RANGE_DEG = 180;
export const PHASE_RANGE_DEG = 360;

// Ratio tolerance when counting slices, absorbs float noise in zHeight / sliceHeight
export const SLICE_COUNT_EPSILON = 1e-9;
