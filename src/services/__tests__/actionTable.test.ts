import { describe, expect, it } from 'vitest';

import { moveAbsolute, setDigital } from '@/types/actionTable';
import { ActionOrderError } from '@/utils/schedulingErrors';
import { Time } from '@/utils/time';

import { ActionTable } from '../actionTable';
import { ResourceTimingOracle } from '../timingOracle';

import { CAMERA, LIGHT, STAGE, createTestRegistry, describeEntry } from './testRig';

const ms = (value: number) => Time.fromMs(value);

describe('ActionTable', () => {
    it('keeps entries in append order with sequence numbers', () => {
        const table = new ActionTable();
        table.append(ms(10), LIGHT, setDigital(true));
        table.append(ms(0), CAMERA, setDigital(true));

        expect(table.entries().map(describeEntry)).toEqual([
            '10 laser SET_DIGITAL true',
            '0 cam SET_DIGITAL true',
        ]);
        expect(table.entries().map((entry) => entry.sequence)).toEqual([0, 1]);
        expect(table.size).toBe(2);
        expect(table.endTime.toString()).toBe('10');
    });

    it('rejects an earlier timestamp for the same resource', () => {
        const table = new ActionTable();
        table.append(ms(20), CAMERA, setDigital(true));
        table.append(ms(20), CAMERA, setDigital(false));

        expect(() => table.append(ms(19), CAMERA, setDigital(true))).toThrow(ActionOrderError);
        expect(table.size).toBe(2);
    });

    it('reports zero availability for untouched resources', () => {
        const table = new ActionTable();
        expect(table.earliestAvailable(CAMERA)).toBe(Time.ZERO);
        expect(table.lastEntryFor(CAMERA)).toBeNull();
    });

    it('adds exposure and gap to a camera trigger', () => {
        const oracle = new ResourceTimingOracle(createTestRegistry());
        const table = new ActionTable((entry, previous) => oracle.busyDuration(entry, previous));

        table.append(ms(100), CAMERA, setDigital(true));

        expect(table.earliestAvailable(CAMERA).toString()).toBe('160');
    });

    it('measures stage moves from the previous position', () => {
        const oracle = new ResourceTimingOracle(createTestRegistry());
        const table = new ActionTable((entry, previous) => oracle.busyDuration(entry, previous));

        table.append(ms(0), STAGE, moveAbsolute(0));
        expect(table.earliestAvailable(STAGE).toString()).toBe('5');

        table.append(ms(5), STAGE, moveAbsolute(10));
        expect(table.earliestAvailable(STAGE).toString()).toBe('30');
    });

    it('freezes entries and the returned list', () => {
        const table = new ActionTable();
        const entry = table.append(ms(1), LIGHT, setDigital(true));

        expect(Object.isFrozen(entry)).toBe(true);
        expect(Object.isFrozen(entry.payload)).toBe(true);
        expect(Object.isFrozen(table.entries())).toBe(true);
    });

    it('sorts the handoff schedule by time, ties in append order', () => {
        const table = new ActionTable();
        table.append(ms(10), CAMERA, setDigital(true));
        table.append(ms(5), LIGHT, setDigital(true));
        table.append(ms(10), STAGE, moveAbsolute(1));
        table.append(ms(5), { id: 'other-light', kind: 'light' }, setDigital(true));

        const schedule = table.toSchedule();

        expect(schedule.entries.map((entry) => entry.sequence)).toEqual([1, 3, 0, 2]);
        expect(schedule.duration.toString()).toBe('10');
        expect(Object.isFrozen(schedule.entries)).toBe(true);
        // append order is untouched
        expect(table.entries().map((entry) => entry.sequence)).toEqual([0, 1, 2, 3]);
    });
});
