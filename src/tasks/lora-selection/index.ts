/**
 * @module tasks/lora-selection
 * @description Device agents, run aggregation and the experiment driver
 */

export type {
    ExperimentConfig,
    PropagationSpec,
    PolicySharing,
    EnergyProfileName,
    MobilityConfig,
} from './config';
export {
    DEFAULT_EXPERIMENT_CONFIG,
    PRESETS,
    createExperimentConfig,
    presetConfig,
    effectiveArms,
    validateExperimentConfig,
} from './config';

export type {
    AgentState,
    DeviceAgentOptions,
    StepInput,
    TransmissionAttempt,
    DeviceTotals,
} from './agent';
export { DeviceAgent } from './agent';

export type { ArmSelection, LossPoint, RunSummary } from './aggregate';
export { RunAggregate } from './aggregate';

export { uniformDiscPosition, RandomWalk } from './mobility';

export type { RunOptions, DeviceReport, RunReport } from './driver';
export { GATEWAY_POSITION, buildPropagation, buildLinkModel, runExperiment } from './driver';

export type { CliArgs, OutputFormat } from './args';
export { parseCliArgs, cliOverrides } from './args';
