import type { ResourceHandle } from './devices';
import type { Time } from '../utils/time';

// ============================================================================
// Action Payloads
// ============================================================================

export interface SetDigitalPayload {
    type: 'SET_DIGITAL';
    value: boolean;
}

export interface SetAnalogPayload {
    type: 'SET_ANALOG';
    value: number;
}

export interface MoveAbsolutePayload {
    type: 'MOVE_ABSOLUTE';
    position: number;
}

export interface MoveRelativePayload {
    type: 'MOVE_RELATIVE';
    delta: number;
}

/** Device-specific command selected by index (e.g. a sequence step). */
export interface CustomPayload {
    type: 'CUSTOM';
    index: number;
}

export type ActionPayload =
    | SetDigitalPayload
    | SetAnalogPayload
    | MoveAbsolutePayload
    | MoveRelativePayload
    | CustomPayload;

export type ActionPayloadType = ActionPayload['type'];

export const setDigital = (value: boolean): SetDigitalPayload => ({ type: 'SET_DIGITAL', value });
export const setAnalog = (value: number): SetAnalogPayload => ({ type: 'SET_ANALOG', value });
export const moveAbsolute = (position: number): MoveAbsolutePayload => ({
    type: 'MOVE_ABSOLUTE',
    position,
});
export const moveRelative = (delta: number): MoveRelativePayload => ({
    type: 'MOVE_RELATIVE',
    delta,
});
export const custom = (index: number): CustomPayload => ({ type: 'CUSTOM', index });

/** Scalar carried by a payload, used by dumps and logs. */
export const payloadValue = (payload: ActionPayload): boolean | number => {
    switch (payload.type) {
        case 'SET_DIGITAL':
        case 'SET_ANALOG':
            return payload.value;
        case 'MOVE_ABSOLUTE':
            return payload.position;
        case 'MOVE_RELATIVE':
            return payload.delta;
        case 'CUSTOM':
            return payload.index;
    }
};

// ============================================================================
// Entries & Schedules
// ============================================================================

export interface ActionEntry {
    readonly timestamp: Time;
    readonly target: ResourceHandle;
    readonly payload: ActionPayload;
    /** Zero-based append index within the table. */
    readonly sequence: number;
}

/**
 * Frozen handoff snapshot: entries in globally non-decreasing timestamp
 * order, ties kept in append order.
 */
export interface ActionSchedule {
    readonly entries: readonly ActionEntry[];
    /** Timestamp of the last entry, or zero for an empty table. */
    readonly duration: Time;
}
