import type { ActionEntry } from '@/types/actionTable';

import type { ResourceTimingOracle } from './timingOracle';

export type ScheduleViolationCode = 'out_of_order' | 'non_monotonic' | 'double_booked';

export interface ScheduleViolation {
    code: ScheduleViolationCode;
    message: string;
    resourceId: string;
    /** Append index of the offending entry. */
    sequence: number;
}

export interface ScheduleValidationResult {
    valid: boolean;
    violations: ScheduleViolation[];
}

const isTrigger = (entry: ActionEntry): boolean =>
    entry.payload.type === 'SET_DIGITAL' && entry.payload.value;

/**
 * Check a handoff schedule: global timestamp order, per-resource order, and
 * that no camera is triggered before its previous exposure and readout end.
 */
export const validateSchedule = (
    schedule: { entries: readonly ActionEntry[] },
    oracle: ResourceTimingOracle,
): ScheduleValidationResult => {
    const violations: ScheduleViolation[] = [];
    const lastByResource = new Map<string, ActionEntry>();
    const lastTriggerByCamera = new Map<string, ActionEntry>();
    let previous: ActionEntry | null = null;

    for (const entry of schedule.entries) {
        const resourceId = entry.target.id;

        if (previous && entry.timestamp.isBefore(previous.timestamp)) {
            violations.push({
                code: 'out_of_order',
                message: `Entry at ${entry.timestamp.toString()} ms follows ${previous.timestamp.toString()} ms`,
                resourceId,
                sequence: entry.sequence,
            });
        }

        const last = lastByResource.get(resourceId);
        if (last && (entry.sequence < last.sequence || entry.timestamp.isBefore(last.timestamp))) {
            violations.push({
                code: 'non_monotonic',
                message: `${resourceId} commanded at ${entry.timestamp.toString()} ms after a command at ${last.timestamp.toString()} ms`,
                resourceId,
                sequence: entry.sequence,
            });
        }

        if (entry.target.kind === 'camera' && isTrigger(entry)) {
            const lastTrigger = lastTriggerByCamera.get(resourceId);
            if (lastTrigger) {
                const freeAt = lastTrigger.timestamp.add(oracle.acquisitionTime(entry.target));
                if (entry.timestamp.isBefore(freeAt)) {
                    violations.push({
                        code: 'double_booked',
                        message: `${resourceId} triggered at ${entry.timestamp.toString()} ms, busy until ${freeAt.toString()} ms`,
                        resourceId,
                        sequence: entry.sequence,
                    });
                }
            }
            lastTriggerByCamera.set(resourceId, entry);
        }

        lastByResource.set(resourceId, entry);
        previous = entry;
    }

    return { valid: violations.length === 0, violations };
};
