export { Time, TimeUnderflowError, type TimeComparison } from '@/utils/time';
export {
    ActionOrderError,
    ConfigurationError,
    UnavailableTimingError,
    type ConfigurationErrorCode,
    type TimingQuery,
} from '@/utils/schedulingErrors';

export * from '@/types/actionTable';
export type * from '@/types/devices';
export type * from '@/types/experiment';

export {
    DEFAULT_SCHEDULER_SETTINGS,
    type SchedulerSettings,
} from '@/constants/scheduling';

export { ActionTable, compareForHandoff, sortForHandoff, type BusyDurationResolver } from '@/services/actionTable';
export {
    createCameraDevice,
    createLightDevice,
    createPatternClientDevice,
    createStageAxisDevice,
    type CameraOptions,
    type LightOptions,
    type PatternClientOptions,
    type StageAxisOptions,
} from '@/services/devices';
export { DeviceRegistry } from '@/services/deviceRegistry';
export { ResourceTimingOracle, type MotionEstimate } from '@/services/timingOracle';
export {
    appendMetadata,
    buildIlluminationSequence,
    formatDiffractionMetadata,
    type IlluminationSequenceOptions,
} from '@/services/illuminationSequence';
export { buildExperimentPlan, type BuildExperimentPlanOptions } from '@/services/experimentPlan';
export {
    SequencePlanner,
    countZSlices,
    planSequence,
    type PlannerContext,
    type PlannerLogEntry,
    type PlannerLogSeverity,
} from '@/services/sequencePlanner';
export {
    createDeviceRegistry,
    loadRigConfig,
    parseRigConfig,
    type DeviceConfig,
    type RigConfig,
} from '@/services/rigConfig';
export {
    validateSchedule,
    type ScheduleValidationResult,
    type ScheduleViolation,
    type ScheduleViolationCode,
} from '@/services/scheduleValidation';
export {
    ScheduleFormatError,
    decodeScheduleBinary,
    dumpScheduleText,
    encodeScheduleBinary,
    fingerprintSchedule,
    parseScheduleText,
} from '@/services/scheduleDump';
