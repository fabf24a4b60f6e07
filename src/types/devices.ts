import type { ActionPayload } from './actionTable';
import type { IlluminationStep } from './experiment';

// ============================================================================
// Resource Handles
// ============================================================================

export type ResourceKind = 'camera' | 'light' | 'stage-axis' | 'pattern-client';

/**
 * Opaque identifier for a controllable device. Ids are unique per registry.
 */
export interface ResourceHandle {
    readonly id: string;
    readonly kind: ResourceKind;
}

// ============================================================================
// Capabilities
// ============================================================================

/** Digital on/off device. */
export interface Triggerable {
    readonly handle: ResourceHandle;
    /** Executor digital line, or null for a software trigger. */
    readonly triggerLine: number | null;
}

/**
 * Camera-like device. Timing accessors report milliseconds and return null
 * when the underlying descriptor cannot answer.
 */
export interface Exposable {
    readonly handle: ResourceHandle;
    exposureMs(): number | null;
    interExposureGapMs(): number | null;
    /** Duration of the arm/reset cycle; null falls back to exposure + gap. */
    resetMs(): number | null;
    isReady(): boolean;
}

export interface MotionEstimateMs {
    moveMs: number;
    settleMs: number;
}

/** Absolute/relative mover with an offline motion-time estimate. */
export interface Positionable {
    readonly handle: ResourceHandle;
    /** 0 = X, 1 = Y, 2 = Z */
    readonly axis: number;
    motionMs(from: number, to: number): MotionEstimateMs | null;
}

/** Device driven by an analog setpoint or sequence index per step. */
export interface AnalogSettable {
    readonly handle: ResourceHandle;
    settleMs(): number | null;
    setpointFor(step: IlluminationStep, index: number): ActionPayload;
}

// ============================================================================
// Concrete Devices
// ============================================================================

export interface CameraDevice extends Triggerable, Exposable {
    readonly kind: 'camera';
    setExposureMs(ms: number): void;
    setReady(ready: boolean): void;
}

export interface LightDevice extends Triggerable {
    readonly kind: 'light';
    /** Emission wavelength in nanometres, when known. */
    readonly wavelengthNm: number | null;
}

export interface StageAxisDevice extends Positionable {
    readonly kind: 'stage-axis';
}

/**
 * How a pattern client turns a sequence step into a payload:
 * - sequence-index: CUSTOM(i), the device replays its uploaded sequence
 * - angle / phase: SET_ANALOG with the step's angle or phase in degrees
 */
export type PatternDrive = 'sequence-index' | 'angle' | 'phase';

export interface PatternClientDevice extends AnalogSettable {
    readonly kind: 'pattern-client';
    readonly drive: PatternDrive;
}

export type Device = CameraDevice | LightDevice | StageAxisDevice | PatternClientDevice;

export type DeviceOfKind<K extends ResourceKind> = Extract<Device, { kind: K }>;
