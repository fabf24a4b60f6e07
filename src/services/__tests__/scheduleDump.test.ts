import { pack } from 'msgpackr';
import { describe, expect, it } from 'vitest';

import { moveAbsolute, setDigital } from '@/types/actionTable';
import { Time } from '@/utils/time';

import {
    ScheduleFormatError,
    decodeScheduleBinary,
    dumpScheduleText,
    encodeScheduleBinary,
    fingerprintSchedule,
    fnv1aHex,
    parseScheduleText,
} from '../scheduleDump';
import { planSequence } from '../sequencePlanner';

import { STAGE, createTestPlan, createTestRegistry, describeEntry } from './testRig';

const plannedSchedule = () =>
    planSequence(createTestPlan({ patternGroups: ['slm', 'rotor'] }), {
        registry: createTestRegistry(),
    });

describe('dumpScheduleText', () => {
    it('writes a header and one tab-separated row per entry', () => {
        const schedule = planSequence(createTestPlan(), { registry: createTestRegistry() });

        expect(dumpScheduleText(schedule)).toBe(
            [
                '# action-schedule v1',
                '0\tlaser\tlight\tSET_DIGITAL\ttrue',
                '0\tcam\tcamera\tSET_DIGITAL\ttrue',
                '65\tlaser\tlight\tSET_DIGITAL\ttrue',
                '65\tcam\tcamera\tSET_DIGITAL\ttrue',
                '130\tlaser\tlight\tSET_DIGITAL\tfalse',
                '',
            ].join('\n'),
        );
    });

    it('refuses ids that would break a row', () => {
        const entry = {
            timestamp: Time.ZERO,
            target: { id: 'bad\tid', kind: 'light' as const },
            payload: setDigital(true),
            sequence: 0,
        };

        expect(() => dumpScheduleText({ entries: [entry] })).toThrow(ScheduleFormatError);
    });
});

describe('parseScheduleText', () => {
    it('reads back a dumped schedule', () => {
        const schedule = plannedSchedule();

        const parsed = parseScheduleText(dumpScheduleText(schedule));

        expect(parsed.entries.map(describeEntry)).toEqual(schedule.entries.map(describeEntry));
        expect(parsed.entries.map((entry) => entry.sequence)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
        expect(parsed.duration.toString()).toBe('130');
    });

    it('keeps fractional times and negative positions', () => {
        const parsed = parseScheduleText('# action-schedule v1\n12.5\tz\tstage-axis\tMOVE_ABSOLUTE\t-3.25\n');

        expect(parsed.entries[0]?.timestamp.toString()).toBe('12.5');
        expect(parsed.entries[0]?.payload).toEqual(moveAbsolute(-3.25));
        expect(parsed.entries[0]?.target).toEqual(STAGE);
    });

    it('rejects malformed input', () => {
        expect(() => parseScheduleText('0\tcam\tcamera\tSET_DIGITAL\ttrue\n')).toThrow(
            'Missing action-schedule header',
        );
        expect(() => parseScheduleText('# action-schedule v1\nnot a row\n')).toThrow(
            'Row 0: expected 5 fields',
        );
        expect(() => parseScheduleText('# action-schedule v1\n0\tcam\tcamera\tSET_DIGITAL\t1\n')).toThrow(
            'Row 0: SET_DIGITAL needs a boolean value',
        );
        expect(() => parseScheduleText('# action-schedule v1\n0\tslm\tpattern-client\tSET_ANALOG\tabc\n')).toThrow(
            'Row 0: SET_ANALOG needs a finite number',
        );
        expect(() => parseScheduleText('# action-schedule v1\n0\tcam\tscanner\tSET_DIGITAL\ttrue\n')).toThrow(
            'Row 0: unknown resource kind or payload type',
        );
    });
});

describe('binary schedule', () => {
    it('decodes what it encodes', () => {
        const schedule = plannedSchedule();

        const decoded = decodeScheduleBinary(encodeScheduleBinary(schedule));

        expect(decoded.entries.map(describeEntry)).toEqual(schedule.entries.map(describeEntry));
        expect(decoded.duration.toString()).toBe('130');
    });

    it('rejects unknown envelopes', () => {
        expect(() => decodeScheduleBinary(pack({ version: 2, entries: [] }))).toThrow(
            'Unsupported binary schedule envelope',
        );
        expect(() => decodeScheduleBinary(pack([1, 2, 3]))).toThrow('Binary schedule has no envelope');
    });
});

describe('fnv1aHex', () => {
    it('matches the 32-bit FNV-1a reference values', () => {
        expect(fnv1aHex('')).toBe('811c9dc5');
        expect(fnv1aHex('a')).toBe('e40c292c');
        expect(fnv1aHex('foobar')).toBe('bf9cf968');
    });
});

describe('fingerprintSchedule', () => {
    it('is stable for equal schedules and changes with any entry', () => {
        const first = fingerprintSchedule(plannedSchedule());
        const modified = planSequence(createTestPlan({ patternGroups: ['slm'] }), {
            registry: createTestRegistry(),
        });

        expect(first).toMatch(/^schedule-[0-9a-f]{8}$/);
        expect(fingerprintSchedule(plannedSchedule())).toBe(first);
        expect(fingerprintSchedule(modified)).not.toBe(first);
    });
});
