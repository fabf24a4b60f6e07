import type { Time } from './time';

export type ConfigurationErrorCode =
    | 'missing_timing'
    | 'non_positive_parameter'
    | 'invalid_plan'
    | 'invalid_config'
    | 'unknown_resource'
    | 'wrong_resource_kind'
    | 'duplicate_resource';

interface ConfigurationErrorOptions {
    resourceId?: string;
    cause?: unknown;
}

/**
 * A required parameter is missing or out of range. Fatal to the planning run.
 */
export class ConfigurationError extends Error {
    readonly code: ConfigurationErrorCode;
    readonly resourceId?: string;

    constructor(
        code: ConfigurationErrorCode,
        message: string,
        options: ConfigurationErrorOptions = {},
    ) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'ConfigurationError';
        this.code = code;
        this.resourceId = options.resourceId;
    }
}

export type TimingQuery = 'exposure' | 'inter-exposure-gap' | 'reset' | 'motion' | 'settle';

/**
 * The timing oracle could not answer a query for a resource.
 */
export class UnavailableTimingError extends Error {
    readonly resourceId: string;
    readonly query: TimingQuery;

    constructor(resourceId: string, query: TimingQuery, detail?: string) {
        super(
            `Timing "${query}" unavailable for ${resourceId}${detail ? `: ${detail}` : ''}`,
        );
        this.name = 'UnavailableTimingError';
        this.resourceId = resourceId;
        this.query = query;
    }
}

/**
 * An append would break a resource's causal command order. Planner bug.
 */
export class ActionOrderError extends Error {
    readonly resourceId: string;
    readonly timestamp: Time;
    readonly lastTimestamp: Time;

    constructor(resourceId: string, timestamp: Time, lastTimestamp: Time) {
        super(
            `Out-of-order action for ${resourceId}: ${timestamp.toString()} ms is before ${lastTimestamp.toString()} ms`,
        );
        this.name = 'ActionOrderError';
        this.resourceId = resourceId;
        this.timestamp = timestamp;
        this.lastTimestamp = lastTimestamp;
    }
}

/**
 * Map a timing failure to the error surfaced by planning.
 */
export const toConfigurationError = (error: unknown): unknown => {
    if (error instanceof UnavailableTimingError) {
        return new ConfigurationError('missing_timing', error.message, {
            resourceId: error.resourceId,
            cause: error,
        });
    }
    return error;
};
