/**
 * @module tasks/lora-selection/config
 * @description Experiment configuration, presets and validation
 */

import { ConfigError } from '../../core/errors';
import type { ArmSetConfig } from '../../bandits/arm-space';
import type { PolicyOptions } from '../../bandits/registry';
import type { LogDistanceParams } from '../../models/channel/path-loss';
import type { CollisionModelSpec } from '../../models/phy/lora/collision';
import { hasSensitivity } from '../../models/phy/lora/tables';

// ==================== Types ====================

export type PropagationSpec =
    | ({ kind: 'log-distance' } & Partial<LogDistanceParams>)
    | {
        kind: 'channel-profile';
        profile: 'stationary' | 'non-stationary';
        /** Seconds spent at each location (non-stationary only) */
        dwellTimeS?: number;
        shadowingSigmaDb?: number;
    };

/** Whether every device owns its policy or all devices share one instance */
export type PolicySharing = 'per-device' | 'shared';

export type EnergyProfileName = 'radio-only' | 'active-cycle';

export interface MobilityConfig {
    /** Share of devices that move, in [0, 1] */
    fraction: number;
    /** Walking speed (m/s) */
    speedMps: number;
    /** Time between direction changes (s) */
    legDurationS: number;
    /** Half-width of the square the walk stays in (m) */
    boundM: number;
}

export interface ExperimentConfig {
    /** Experiment label recorded in logs and manifests */
    experiment: string;
    /** Policy name, see `POLICY_NAMES` */
    algorithm: string;
    seed: number;
    arms: ArmSetConfig;
    /** Pin the spreading factor set to this single value */
    fixedSpreadingFactor?: number;
    policy: PolicyOptions;
    policySharing: PolicySharing;
    payloadBytes: number;
    devices: number;
    /** Radius of the disc devices are placed in, gateway at the centre (m) */
    radiusM: number;
    mobility: MobilityConfig;
    /** Mean of the exponential per-device interval (s) */
    meanIntervalS: number;
    /** Upper bound of the uniform jitter added to every interval (s) */
    jitterS: number;
    simulationTimeS: number;
    /** Per-device transmission budget */
    maxTransmissions?: number;
    propagation: PropagationSpec;
    collision: CollisionModelSpec;
    energyProfile: EnergyProfileName;
    noiseFigureDb: number;
}

// ==================== Defaults ====================

const MHZ = 1e6;

function channelGrid(firstMHz: number, count: number, stepMHz: number): number[] {
    return Array.from({ length: count }, (_, i) => Math.round((firstMHz + i * stepMHz) * MHZ));
}

export const DEFAULT_EXPERIMENT_CONFIG: ExperimentConfig = {
    experiment: 'default',
    algorithm: 'ucb1',
    seed: 42,
    arms: {
        spreadingFactors: [7, 8, 9, 10, 11, 12],
        bandwidthsHz: [125000],
        frequenciesHz: channelGrid(868.1, 3, 0.2),
        txPowersDbm: [14],
    },
    policy: {},
    policySharing: 'per-device',
    payloadBytes: 20,
    devices: 10,
    radiusM: 1000,
    mobility: {
        fraction: 0,
        speedMps: 5,
        legDurationS: 20,
        boundM: 1500,
    },
    meanIntervalS: 4,
    jitterS: 0.1,
    simulationTimeS: 600,
    propagation: { kind: 'log-distance' },
    collision: { kind: 'none' },
    energyProfile: 'radio-only',
    noiseFigureDb: 6,
};

/**
 * Studied scenarios. Each preset overrides the defaults.
 */
export const PRESETS: Record<string, Partial<ExperimentConfig>> = {
    'd-lora': {
        experiment: 'd-lora',
        algorithm: 'd-lora',
        arms: {
            spreadingFactors: [7, 8, 9, 10, 11, 12],
            bandwidthsHz: [125000, 250000, 500000],
            frequenciesHz: channelGrid(470.1, 8, 0.2),
            txPowersDbm: [2, 4, 6, 8, 10, 12, 14],
        },
        devices: 50,
        collision: { kind: 'load-proportional' },
    },
    'ucb1-tuned': {
        experiment: 'ucb1-tuned',
        algorithm: 'ucb1-tuned',
        arms: {
            spreadingFactors: [7],
            bandwidthsHz: [125000],
            frequenciesHz: channelGrid(920.6, 5, 0.4),
            txPowersDbm: [-3, 1, 5, 9, 13],
        },
        policy: { reward: { convention: 'inverse-energy' } },
        energyProfile: 'active-cycle',
        collision: { kind: 'proximity' },
    },
    qoca: {
        experiment: 'qoca',
        algorithm: 'qoca',
        arms: {
            spreadingFactors: [7],
            bandwidthsHz: [125000],
            frequenciesHz: channelGrid(867.1, 8, 0.2),
            txPowersDbm: [14],
        },
        propagation: { kind: 'channel-profile', profile: 'stationary' },
    },
    'qoca-non-stationary': {
        experiment: 'qoca-non-stationary',
        algorithm: 'dqoca',
        arms: {
            spreadingFactors: [7],
            bandwidthsHz: [125000],
            frequenciesHz: channelGrid(867.1, 8, 0.2),
            txPowersDbm: [14],
        },
        propagation: { kind: 'channel-profile', profile: 'non-stationary', dwellTimeS: 200 },
    },
    tow: {
        experiment: 'tow',
        algorithm: 'tow',
        arms: {
            spreadingFactors: [7, 8, 9, 10, 11, 12],
            bandwidthsHz: [125000],
            frequenciesHz: channelGrid(867.1, 8, 0.2),
            txPowersDbm: [14],
        },
        devices: 30,
        collision: { kind: 'proximity' },
    },
};

// ==================== Construction ====================

/**
 * Merge overrides onto a base config. Nested groups (arms, mobility, policy)
 * are merged key by key; everything else is replaced.
 */
export function createExperimentConfig(
    overrides: Partial<ExperimentConfig> = {},
    base: ExperimentConfig = DEFAULT_EXPERIMENT_CONFIG
): ExperimentConfig {
    return {
        ...base,
        ...overrides,
        arms: { ...base.arms, ...overrides.arms },
        mobility: { ...base.mobility, ...overrides.mobility },
        policy: { ...base.policy, ...overrides.policy },
    };
}

/**
 * Config for a named preset plus overrides
 *
 * @throws ConfigError for an unknown preset
 */
export function presetConfig(name: string, overrides: Partial<ExperimentConfig> = {}): ExperimentConfig {
    const preset = PRESETS[name];
    if (preset === undefined) {
        throw new ConfigError(`Unknown preset: ${name}. Available: ${Object.keys(PRESETS).join(', ')}`);
    }
    return createExperimentConfig(overrides, createExperimentConfig(preset));
}

/**
 * Arm sets after applying `fixedSpreadingFactor`
 */
export function effectiveArms(config: ExperimentConfig): ArmSetConfig {
    if (config.fixedSpreadingFactor === undefined) return config.arms;
    return { ...config.arms, spreadingFactors: [config.fixedSpreadingFactor] };
}

// ==================== Validation ====================

function requirePositive(value: number, label: string): void {
    if (!(value > 0) || !Number.isFinite(value)) {
        throw new ConfigError(`${label} must be a positive number`, { [label]: value });
    }
}

function requireNonNegative(value: number, label: string): void {
    if (!(value >= 0) || !Number.isFinite(value)) {
        throw new ConfigError(`${label} must be a non-negative number`, { [label]: value });
    }
}

/**
 * Validate an experiment configuration
 *
 * @throws ConfigError describing the first problem found
 */
export function validateExperimentConfig(config: ExperimentConfig): void {
    if (!Number.isInteger(config.devices) || config.devices < 1) {
        throw new ConfigError('devices must be a positive integer', { devices: config.devices });
    }
    if (!Number.isInteger(config.seed)) {
        throw new ConfigError('seed must be an integer', { seed: config.seed });
    }
    if (!Number.isInteger(config.payloadBytes) || config.payloadBytes < 0 || config.payloadBytes > 255) {
        throw new ConfigError('payloadBytes must be an integer in [0, 255]', { payloadBytes: config.payloadBytes });
    }
    requirePositive(config.radiusM, 'radiusM');
    requirePositive(config.meanIntervalS, 'meanIntervalS');
    requirePositive(config.simulationTimeS, 'simulationTimeS');
    requireNonNegative(config.jitterS, 'jitterS');
    requireNonNegative(config.noiseFigureDb, 'noiseFigureDb');

    if (config.maxTransmissions !== undefined
        && (!Number.isInteger(config.maxTransmissions) || config.maxTransmissions < 1)) {
        throw new ConfigError('maxTransmissions must be a positive integer', {
            maxTransmissions: config.maxTransmissions,
        });
    }

    const { mobility } = config;
    if (!(mobility.fraction >= 0 && mobility.fraction <= 1)) {
        throw new ConfigError('mobility.fraction must be in [0, 1]', { fraction: mobility.fraction });
    }
    requireNonNegative(mobility.speedMps, 'mobility.speedMps');
    requirePositive(mobility.legDurationS, 'mobility.legDurationS');
    requirePositive(mobility.boundM, 'mobility.boundM');

    const arms = effectiveArms(config);
    for (const sf of arms.spreadingFactors) {
        for (const bw of arms.bandwidthsHz) {
            if (!hasSensitivity(sf, bw)) {
                throw new ConfigError(`No sensitivity entry for SF${sf} at ${bw} Hz`, { spreadingFactor: sf, bandwidthHz: bw });
            }
        }
    }
}
