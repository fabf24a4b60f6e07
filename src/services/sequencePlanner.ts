/**
 * Sequence Planner
 *
 * Turns an experiment plan into a single action table in one pass:
 * 1. Reset cameras that are not known to be ready
 * 2. For each Z slice: move, then per illumination step drive the pattern
 *    clients and expose, then hold the stage in place
 * 3. Return the stage to the start and hold until every camera is free
 *
 * Commands are never rescheduled after they are appended. When a camera is
 * still busy, triggers go out at the cursor and the cursor itself is pushed
 * past the busy period.
 */

import {
    DEFAULT_SCHEDULER_SETTINGS,
    SLICE_COUNT_EPSILON,
    type SchedulerSettings,
} from '@/constants/scheduling';
import { moveAbsolute, setDigital } from '@/types/actionTable';
import type { ResourceHandle, ResourceKind } from '@/types/devices';
import type { ExperimentPlan, SequenceSchedule } from '@/types/experiment';
import { ConfigurationError, toConfigurationError } from '@/utils/schedulingErrors';
import { Time } from '@/utils/time';

import { ActionTable } from './actionTable';
import type { DeviceRegistry } from './deviceRegistry';
import { ResourceTimingOracle } from './timingOracle';

// =============================================================================
// TYPES
// =============================================================================

export type PlannerLogSeverity = 'info' | 'warning';

export interface PlannerLogEntry {
    scope: 'planner';
    severity: PlannerLogSeverity;
    message: string;
    metadata?: Record<string, unknown>;
}

export interface PlannerContext {
    registry: DeviceRegistry;
    /** Defaults to an oracle over `registry`. */
    oracle?: ResourceTimingOracle;
    settings?: Partial<SchedulerSettings>;
    onLog?: (entry: PlannerLogEntry) => void;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Slices to image: the nominal count (at least one), plus one more to reach
 * the top of any volume taller than the threshold.
 */
export const countZSlices = (
    zHeight: number,
    sliceHeight: number,
    threshold: number = DEFAULT_SCHEDULER_SETTINGS.zHeightThreshold,
): number => {
    if (zHeight <= threshold) {
        return 1;
    }
    const nominal = Math.max(1, Math.ceil(zHeight / sliceHeight - SLICE_COUNT_EPSILON));
    return nominal + 1;
};

const resolveSettings = (overrides: Partial<SchedulerSettings> = {}): SchedulerSettings => {
    const settings = { ...DEFAULT_SCHEDULER_SETTINGS, ...overrides };
    if (!Number.isFinite(settings.interTriggerDelayMs) || settings.interTriggerDelayMs < 0) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `Inter-trigger delay must be zero or more, got ${settings.interTriggerDelayMs}`,
        );
    }
    if (!Number.isFinite(settings.zHeightThreshold) || settings.zHeightThreshold < 0) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `Z height threshold must be zero or more, got ${settings.zHeightThreshold}`,
        );
    }
    return settings;
};

const requireKind = (
    registry: DeviceRegistry,
    handles: readonly ResourceHandle[],
    kind: ResourceKind,
): void => {
    for (const handle of handles) {
        if (handle.kind !== kind) {
            throw new ConfigurationError(
                'wrong_resource_kind',
                `Resource ${handle.id} is a ${handle.kind}, expected ${kind}`,
                { resourceId: handle.id },
            );
        }
        registry.require(handle.id, kind);
    }
};

const validatePlan = (
    plan: ExperimentPlan,
    registry: DeviceRegistry,
    settings: SchedulerSettings,
): void => {
    const finiteFields: Array<[string, number]> = [
        ['zStart', plan.zStart],
        ['zHeight', plan.zHeight],
        ['sliceHeight', plan.sliceHeight],
    ];
    for (const [field, value] of finiteFields) {
        if (!Number.isFinite(value)) {
            throw new ConfigurationError('invalid_plan', `${field} must be a finite number`);
        }
    }
    if (plan.zHeight < 0) {
        throw new ConfigurationError('invalid_plan', `zHeight must be zero or more, got ${plan.zHeight}`);
    }
    if (!Number.isInteger(plan.numReps) || plan.numReps < 1) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `numReps must be a positive integer, got ${plan.numReps}`,
        );
    }

    const isVolume = plan.zHeight > settings.zHeightThreshold;
    if (isVolume && plan.sliceHeight <= 0) {
        throw new ConfigurationError(
            'non_positive_parameter',
            `sliceHeight must be positive for a ${plan.zHeight} µm volume`,
        );
    }
    if (isVolume && !plan.stage) {
        throw new ConfigurationError('invalid_plan', 'A Z volume needs a stage positioner');
    }

    requireKind(registry, plan.cameras, 'camera');
    requireKind(registry, plan.lights, 'light');
    if (plan.stage) {
        requireKind(registry, [plan.stage], 'stage-axis');
    }
};

// =============================================================================
// PLANNER
// =============================================================================

/**
 * Single-use planner: build one with a plan, call `generate()` once.
 */
export class SequencePlanner {
    private readonly registry: DeviceRegistry;
    private readonly oracle: ResourceTimingOracle;
    private readonly settings: SchedulerSettings;
    private readonly onLog?: (entry: PlannerLogEntry) => void;

    private readonly table: ActionTable;
    private cursor = Time.ZERO;
    private consumed = false;

    private readonly imageCounts = new Map<string, number>();
    private readonly discardedImages = new Map<string, number[]>();
    private numZSlices = 0;

    constructor(
        private readonly plan: ExperimentPlan,
        context: PlannerContext,
    ) {
        this.registry = context.registry;
        this.oracle = context.oracle ?? new ResourceTimingOracle(context.registry);
        this.settings = resolveSettings(context.settings);
        this.onLog = context.onLog;
        this.table = new ActionTable((entry, previous) =>
            this.oracle.busyDuration(entry, previous),
        );
    }

    /**
     * Build the action table. Any failure aborts the whole run; timing
     * failures surface as ConfigurationError.
     */
    public generate(): ActionTable {
        if (this.consumed) {
            throw new Error('SequencePlanner.generate() can only be called once');
        }
        this.consumed = true;

        try {
            validatePlan(this.plan, this.registry, this.settings);
            this.warnOnDegeneratePlan();
            this.resetCameras();
            const finalAltitude = this.runZSlices();
            this.returnToStart(finalAltitude);
        } catch (error) {
            throw toConfigurationError(error);
        }

        this.log('info', 'Action table generated', {
            entries: this.table.size,
            durationMs: this.table.endTime.toString(),
            numZSlices: this.numZSlices,
        });
        return this.table;
    }

    /** Images scheduled per camera, reset frames included. */
    public getImageCounts(): ReadonlyMap<string, number> {
        return new Map(this.imageCounts);
    }

    public getDiscardedImages(): ReadonlyMap<string, readonly number[]> {
        return new Map(
            Array.from(this.discardedImages, ([id, indices]) => [id, [...indices]] as const),
        );
    }

    public getNumZSlices(): number {
        return this.numZSlices;
    }

    // -------------------------------------------------------------------------
    // Phases
    // -------------------------------------------------------------------------

    private resetCameras(): void {
        const toReset = this.plan.cameras.filter((camera) => !this.oracle.isCameraReady(camera));
        if (toReset.length === 0) {
            return;
        }

        let resetEnd = Time.ZERO;
        for (const camera of toReset) {
            resetEnd = Time.max(resetEnd, this.oracle.resetTime(camera));
            this.table.append(this.cursor, camera, setDigital(true));
            const frameIndex = this.countImage(camera);
            const discarded = this.discardedImages.get(camera.id) ?? [];
            this.discardedImages.set(camera.id, [...discarded, frameIndex]);
        }
        const allFree = Time.max(
            Time.ZERO,
            ...toReset.map((camera) => this.table.earliestAvailable(camera)),
        );
        this.cursor = Time.max(this.cursor.add(resetEnd), allFree);

        this.log('info', `Reset ${toReset.length} camera(s)`, {
            cameras: toReset.map((camera) => camera.id),
            readyAtMs: this.cursor.toString(),
        });
    }

    /**
     * Z loop. Returns the last commanded altitude, or null without a stage.
     */
    private runZSlices(): number | null {
        const { plan } = this;
        this.numZSlices = countZSlices(
            plan.zHeight,
            plan.sliceHeight,
            this.settings.zHeightThreshold,
        );
        const interTriggerDelay = Time.fromMs(this.settings.interTriggerDelayMs);

        let previousAltitude: number | null = null;
        for (let zIndex = 0; zIndex < this.numZSlices; zIndex++) {
            const zTarget = plan.zStart + plan.sliceHeight * zIndex;

            if (plan.stage) {
                // Scheduled when the move begins; later actions wait for it to settle
                this.table.append(this.cursor, plan.stage, moveAbsolute(zTarget));
                if (previousAltitude !== null) {
                    const { moveTime, settleTime } = this.oracle.motionTime(
                        plan.stage,
                        previousAltitude,
                        zTarget,
                    );
                    this.cursor = this.cursor.add(moveTime).add(settleTime);
                }
                previousAltitude = zTarget;
            }

            plan.sequence.forEach((step, index) => {
                for (const group of plan.patternGroups) {
                    for (const client of this.registry.analogClients(group)) {
                        this.table.append(this.cursor, client.handle, client.setpointFor(step, index));
                    }
                }
                this.cursor = this.expose(this.cursor, plan.cameras, plan.lights);
                this.cursor = this.cursor.add(interTriggerDelay);
            });

            if (plan.stage) {
                // Hold the Z position through the exposure burst
                this.table.append(this.cursor, plan.stage, moveAbsolute(zTarget));
            }
        }

        return previousAltitude;
    }

    private returnToStart(finalAltitude: number | null): void {
        const { plan } = this;
        let settleTime = Time.ZERO;

        if (plan.stage && finalAltitude !== null) {
            const motion = this.oracle.motionTime(plan.stage, finalAltitude, plan.zStart);
            this.cursor = this.cursor.add(motion.moveTime);
            this.table.append(this.cursor, plan.stage, moveAbsolute(plan.zStart));
            settleTime = motion.settleTime;
        }

        // Only a following repetition has to wait for the camera pipelines
        const cameraReadyTime =
            plan.numReps > 1
                ? Time.max(
                      Time.ZERO,
                      ...plan.cameras.map((camera) => this.table.earliestAvailable(camera)),
                  )
                : Time.ZERO;
        const holdTime = Time.max(this.cursor.add(settleTime), cameraReadyTime);

        if (plan.stage) {
            this.table.append(holdTime, plan.stage, moveAbsolute(plan.zStart));
        } else {
            for (const light of plan.lights) {
                this.table.append(holdTime, light, setDigital(false));
            }
        }
        this.cursor = holdTime;
    }

    // -------------------------------------------------------------------------
    // Exposure
    // -------------------------------------------------------------------------

    /**
     * Trigger every light and camera at `cursor`. Returns when the exposure
     * ends, which is never before all cameras were free to begin it.
     */
    private expose(
        cursor: Time,
        cameras: readonly ResourceHandle[],
        lights: readonly ResourceHandle[],
    ): Time {
        let acquisition = Time.ZERO;
        let lastReady = Time.ZERO;

        for (const camera of cameras) {
            acquisition = Time.max(acquisition, this.oracle.acquisitionTime(camera));
            lastReady = Time.max(lastReady, this.table.earliestAvailable(camera));
        }

        for (const light of lights) {
            this.table.append(cursor, light, setDigital(true));
        }

        for (const camera of cameras) {
            this.table.append(cursor, camera, setDigital(true));
            this.countImage(camera);
        }

        return Time.max(lastReady, cursor.add(acquisition));
    }

    /** Increment the camera's image counter; returns the new frame's index. */
    private countImage(camera: ResourceHandle): number {
        const index = this.imageCounts.get(camera.id) ?? 0;
        this.imageCounts.set(camera.id, index + 1);
        return index;
    }

    private warnOnDegeneratePlan(): void {
        if (this.plan.cameras.length === 0) {
            this.warn('Plan has no cameras; no images will be acquired');
        }
        if (this.plan.sequence.length === 0) {
            this.warn('Plan has an empty illumination sequence; only stage moves are scheduled');
        }
    }

    private warn(message: string): void {
        console.warn(`[SequencePlanner] ${message}`);
        this.log('warning', message);
    }

    private log(
        severity: PlannerLogSeverity,
        message: string,
        metadata?: Record<string, unknown>,
    ): void {
        this.onLog?.({ scope: 'planner', severity, message, metadata });
    }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

/**
 * Plan one experiment with a fresh planner and freeze the result for the
 * executor.
 */
export const planSequence = (plan: ExperimentPlan, context: PlannerContext): SequenceSchedule => {
    const planner = new SequencePlanner(plan, context);
    const table = planner.generate();
    const { entries, duration } = table.toSchedule();

    return Object.freeze({
        entries,
        duration,
        imageCounts: planner.getImageCounts(),
        discardedImages: planner.getDiscardedImages(),
        sequence: Object.freeze(plan.sequence.map((step) => ({ ...step }))),
        numZSlices: planner.getNumZSlices(),
        metadata: plan.metadata,
    });
};
