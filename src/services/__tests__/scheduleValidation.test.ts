import { describe, expect, it } from 'vitest';

import { setDigital, type ActionEntry, type ActionPayload } from '@/types/actionTable';
import type { ResourceHandle } from '@/types/devices';
import { Time } from '@/utils/time';

import { validateSchedule } from '../scheduleValidation';
import { planSequence } from '../sequencePlanner';
import { ResourceTimingOracle } from '../timingOracle';

import { CAMERA, LIGHT, createTestPlan, createTestRegistry } from './testRig';

const at = (
    ms: number,
    target: ResourceHandle,
    payload: ActionPayload,
    sequence: number,
): ActionEntry => ({ timestamp: Time.fromMs(ms), target, payload, sequence });

describe('validateSchedule', () => {
    const registry = createTestRegistry();
    const oracle = new ResourceTimingOracle(registry);

    it('accepts a planned schedule', () => {
        const schedule = planSequence(createTestPlan(), { registry });

        expect(validateSchedule(schedule, oracle)).toEqual({ valid: true, violations: [] });
    });

    it('flags entries that go back in time', () => {
        const result = validateSchedule(
            {
                entries: [at(10, LIGHT, setDigital(true), 0), at(5, CAMERA, setDigital(false), 1)],
            },
            oracle,
        );

        expect(result.valid).toBe(false);
        expect(result.violations).toEqual([
            {
                code: 'out_of_order',
                message: 'Entry at 5 ms follows 10 ms',
                resourceId: 'cam',
                sequence: 1,
            },
        ]);
    });

    it('flags a resource whose commands are swapped', () => {
        const result = validateSchedule(
            {
                entries: [at(0, LIGHT, setDigital(true), 1), at(0, LIGHT, setDigital(false), 0)],
            },
            oracle,
        );

        expect(result.violations).toEqual([
            {
                code: 'non_monotonic',
                message: 'laser commanded at 0 ms after a command at 0 ms',
                resourceId: 'laser',
                sequence: 0,
            },
        ]);
    });

    it('flags a camera triggered during its previous acquisition', () => {
        const result = validateSchedule(
            {
                entries: [
                    at(0, CAMERA, setDigital(true), 0),
                    at(30, CAMERA, setDigital(true), 1),
                    at(90, CAMERA, setDigital(true), 2),
                ],
            },
            oracle,
        );

        expect(result.violations).toEqual([
            {
                code: 'double_booked',
                message: 'cam triggered at 30 ms, busy until 60 ms',
                resourceId: 'cam',
                sequence: 1,
            },
        ]);
    });
});
