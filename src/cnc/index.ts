/**
 * CNC output module
 */

export { MachineConfigSchema, DEFAULT_MACHINE_CONFIG, resolveMachineConfig, gridToMachine } from './machine';
export type { MachineConfig } from './machine';

export { generateCutJob, summarizeJob, estimateJobTime, formatTime } from './job';
export type { MotionInstruction, JobSummary } from './job';

export { toGcode, formatNumber } from './gcode';
