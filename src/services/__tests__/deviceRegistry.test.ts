import { describe, expect, it } from 'vitest';

import { ConfigurationError } from '@/utils/schedulingErrors';

import { DeviceRegistry } from '../deviceRegistry';
import {
    createCameraDevice,
    createLightDevice,
    createPatternClientDevice,
    createStageAxisDevice,
} from '../devices';

const createRegistry = () =>
    new DeviceRegistry([
        createCameraDevice({ id: 'cam', exposureMs: 20 }),
        createLightDevice({ id: 'led' }),
        createPatternClientDevice({ id: 'slm' }),
        createPatternClientDevice({ id: 'rotor', drive: 'angle' }),
    ]);

describe('DeviceRegistry', () => {
    it('looks devices up by id and kind', () => {
        const registry = createRegistry();

        expect(registry.has('cam')).toBe(true);
        expect(registry.require('cam', 'camera').exposureMs()).toBe(20);
        expect(registry.get({ id: 'led', kind: 'light' }).kind).toBe('light');
        expect(() => registry.require('cam', 'light')).toThrow('Resource cam is a camera, expected light');
        expect(() => registry.get({ id: 'nope', kind: 'camera' })).toThrow(ConfigurationError);
    });

    it('refuses a second device with the same id', () => {
        const registry = createRegistry();

        expect(() => registry.register(createStageAxisDevice({ id: 'cam' }))).toThrow(
            'Device cam is already registered',
        );
    });

    it('tracks analog clients per group in attachment order', () => {
        const registry = createRegistry();
        registry.attachAnalogClient('patterns', 'rotor');
        registry.attachAnalogClient('patterns', 'slm');
        registry.attachAnalogClient('patterns', 'rotor');

        expect(registry.analogClients('patterns').map((client) => client.handle.id)).toEqual([
            'rotor',
            'slm',
        ]);
        expect(registry.analogClients('unknown')).toEqual([]);
        expect(() => registry.attachAnalogClient('patterns', 'led')).toThrow(ConfigurationError);
    });

    it('drops a group when its last client detaches', () => {
        const registry = createRegistry();
        registry.attachAnalogClient('slm', 'slm');
        registry.detachAnalogClient('slm', 'rotor');
        expect(registry.groups()).toEqual(['slm']);

        registry.detachAnalogClient('slm', 'slm');

        expect(registry.groups()).toEqual([]);
        expect(registry.analogClients('slm')).toEqual([]);
    });
});

describe('devices', () => {
    it('validates camera exposure updates', () => {
        const camera = createCameraDevice({ id: 'cam' });
        expect(camera.exposureMs()).toBeNull();

        camera.setExposureMs(12.5);
        expect(camera.exposureMs()).toBe(12.5);
        expect(() => camera.setExposureMs(-1)).toThrow(ConfigurationError);
    });

    it('rejects a stage without a usable velocity', () => {
        expect(() => createStageAxisDevice({ id: 'z', velocity: 0 })).toThrow(
            'Velocity for z must be a positive number, got 0',
        );
        expect(createStageAxisDevice({ id: 'z' }).motionMs(Number.NaN, 1)).toBeNull();
    });

    it('derives pattern setpoints from the drive', () => {
        const step = { angleDeg: 60, phaseDeg: 144, wavelength: 488e-9 };

        expect(createPatternClientDevice({ id: 'a' }).setpointFor(step, 4)).toEqual({ type: 'CUSTOM', index: 4 });
        expect(createPatternClientDevice({ id: 'b', drive: 'angle' }).setpointFor(step, 4)).toEqual({
            type: 'SET_ANALOG',
            value: 60,
        });
        expect(createPatternClientDevice({ id: 'c', drive: 'phase' }).setpointFor(step, 4)).toEqual({
            type: 'SET_ANALOG',
            value: 144,
        });
        expect(createPatternClientDevice({ id: 'd' }).settleMs()).toBe(10);
    });
});
