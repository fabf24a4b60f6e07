import type { ActionEntry } from '@/types/actionTable';
import type { ResourceHandle } from '@/types/devices';
import { UnavailableTimingError, type TimingQuery } from '@/utils/schedulingErrors';
import { Time } from '@/utils/time';

import type { DeviceRegistry } from './deviceRegistry';

export interface MotionEstimate {
    moveTime: Time;
    settleTime: Time;
}

const toTime = (resourceId: string, query: TimingQuery, ms: number | null): Time => {
    if (ms === null) {
        throw new UnavailableTimingError(resourceId, query);
    }
    if (!Number.isFinite(ms) || ms < 0) {
        throw new UnavailableTimingError(resourceId, query, `reported ${ms} ms`);
    }
    return Time.fromMs(ms);
};

/**
 * Answers "how long will this take" for registered devices.
 *
 * Every query reads the device again; nothing is cached between calls, since
 * exposure settings can change between runs.
 */
export class ResourceTimingOracle {
    constructor(private readonly registry: DeviceRegistry) {}

    public exposureTime(camera: ResourceHandle): Time {
        const device = this.registry.require(camera.id, 'camera');
        return toTime(camera.id, 'exposure', device.exposureMs());
    }

    public interExposureGap(camera: ResourceHandle): Time {
        const device = this.registry.require(camera.id, 'camera');
        return toTime(camera.id, 'inter-exposure-gap', device.interExposureGapMs());
    }

    /** Exposure plus gap: minimum spacing between two triggers. */
    public acquisitionTime(camera: ResourceHandle): Time {
        return this.exposureTime(camera).add(this.interExposureGap(camera));
    }

    public resetTime(camera: ResourceHandle): Time {
        const device = this.registry.require(camera.id, 'camera');
        const resetMs = device.resetMs();
        return resetMs === null ? this.acquisitionTime(camera) : toTime(camera.id, 'reset', resetMs);
    }

    public isCameraReady(camera: ResourceHandle): boolean {
        return this.registry.require(camera.id, 'camera').isReady();
    }

    public motionTime(stage: ResourceHandle, from: number, to: number): MotionEstimate {
        const device = this.registry.require(stage.id, 'stage-axis');
        const estimate = device.motionMs(from, to);
        if (!estimate) {
            throw new UnavailableTimingError(stage.id, 'motion', `no estimate for ${from} -> ${to}`);
        }
        return {
            moveTime: toTime(stage.id, 'motion', estimate.moveMs),
            settleTime: toTime(stage.id, 'settle', estimate.settleMs),
        };
    }

    public settleTime(client: ResourceHandle): Time {
        const device = this.registry.require(client.id, 'pattern-client');
        return toTime(client.id, 'settle', device.settleMs());
    }

    /**
     * How long a resource stays busy after an entry, given the entry before
     * it on the same resource.
     */
    public busyDuration(entry: ActionEntry, previous: ActionEntry | null): Time {
        const { target, payload } = entry;
        switch (target.kind) {
            case 'camera':
                return payload.type === 'SET_DIGITAL' && payload.value
                    ? this.acquisitionTime(target)
                    : Time.ZERO;
            case 'stage-axis': {
                if (payload.type === 'MOVE_RELATIVE') {
                    const { moveTime, settleTime } = this.motionTime(target, 0, payload.delta);
                    return moveTime.add(settleTime);
                }
                if (payload.type !== 'MOVE_ABSOLUTE') {
                    return Time.ZERO;
                }
                const previousPayload = previous?.payload;
                const from =
                    previousPayload?.type === 'MOVE_ABSOLUTE'
                        ? previousPayload.position
                        : payload.position;
                const { moveTime, settleTime } = this.motionTime(target, from, payload.position);
                return moveTime.add(settleTime);
            }
            case 'pattern-client':
                return this.settleTime(target);
            case 'light':
                return Time.ZERO;
        }
    }
}
