/**
 * Experiment Driver Tests
 * Configuration, presets, CLI arguments, mobility, run aggregation and end-to-end runs
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, UnknownPolicyError } from '../src/core/errors';
import { MemoryLogger } from '../src/core/logging';
import { createRng } from '../src/core/repro';
import { distance } from '../src/models/channel/path-loss';
import type { TxParams } from '../src/models/phy/lora/types';
import type { TransmissionAttempt } from '../src/tasks/lora-selection/agent';
import { RunAggregate } from '../src/tasks/lora-selection/aggregate';
import { cliOverrides, parseCliArgs } from '../src/tasks/lora-selection/args';
import {
    DEFAULT_EXPERIMENT_CONFIG,
    PRESETS,
    createExperimentConfig,
    effectiveArms,
    presetConfig,
    validateExperimentConfig,
    type ExperimentConfig,
} from '../src/tasks/lora-selection/config';
import { runExperiment } from '../src/tasks/lora-selection/driver';
import { RandomWalk, uniformDiscPosition } from '../src/tasks/lora-selection/mobility';
import { ScriptedLinkModel } from './test-utils';

function smallConfig(overrides: Partial<ExperimentConfig> = {}): ExperimentConfig {
    return createExperimentConfig({
        experiment: 'unit',
        devices: 3,
        simulationTimeS: 60,
        ...overrides,
    });
}

function memoryLogger(config: ExperimentConfig): MemoryLogger {
    return new MemoryLogger({ task: config.experiment, seed: config.seed });
}

// ==================== Configuration ====================

describe('Experiment configuration', () => {
    it('should merge nested groups key by key', () => {
        const config = createExperimentConfig({
            arms: { ...DEFAULT_EXPERIMENT_CONFIG.arms, txPowersDbm: [2, 14] },
            mobility: { ...DEFAULT_EXPERIMENT_CONFIG.mobility, fraction: 0.5 },
        });
        expect(config.arms.txPowersDbm).toEqual([2, 14]);
        expect(config.arms.spreadingFactors).toEqual([7, 8, 9, 10, 11, 12]);
        expect(config.mobility.fraction).toBe(0.5);
        expect(config.mobility.speedMps).toBe(5);
        expect(DEFAULT_EXPERIMENT_CONFIG.mobility.fraction).toBe(0);
    });

    it('should pin the spreading factor', () => {
        const config = smallConfig({ fixedSpreadingFactor: 9 });
        expect(effectiveArms(config).spreadingFactors).toEqual([9]);
        expect(config.arms.spreadingFactors).toHaveLength(6);
    });

    it('should accept the defaults and every preset', () => {
        expect(() => validateExperimentConfig(DEFAULT_EXPERIMENT_CONFIG)).not.toThrow();
        for (const name of Object.keys(PRESETS)) {
            expect(() => validateExperimentConfig(presetConfig(name))).not.toThrow();
        }
    });

    it('should apply presets under the overrides', () => {
        const config = presetConfig('qoca', { seed: 7 });
        expect(config.algorithm).toBe('qoca');
        expect(config.seed).toBe(7);
        expect(config.arms.frequenciesHz).toHaveLength(8);
        expect(config.arms.frequenciesHz[1]).toBe(867300000);
        expect(config.propagation).toEqual({ kind: 'channel-profile', profile: 'stationary' });
        expect(presetConfig('qoca-non-stationary').algorithm).toBe('dqoca');
    });

    it('should reject an unknown preset', () => {
        expect(() => presetConfig('lorawan')).toThrow(ConfigError);
    });

    it('should reject invalid values', () => {
        const bad: Partial<ExperimentConfig>[] = [
            { devices: 0 },
            { devices: 2.5 },
            { seed: 1.5 },
            { payloadBytes: 300 },
            { meanIntervalS: 0 },
            { simulationTimeS: -1 },
            { jitterS: -0.1 },
            { maxTransmissions: 0 },
            { mobility: { ...DEFAULT_EXPERIMENT_CONFIG.mobility, fraction: 2 } },
            { fixedSpreadingFactor: 6 },
            { arms: { ...DEFAULT_EXPERIMENT_CONFIG.arms, bandwidthsHz: [62500] } },
        ];
        for (const overrides of bad) {
            expect(() => validateExperimentConfig(smallConfig(overrides))).toThrow(ConfigError);
        }
    });
});

// ==================== CLI Arguments ====================

describe('CLI arguments', () => {
    it('should parse short and long flags', () => {
        const args = parseCliArgs([
            '-a', 'qoca',
            '-n', '5',
            '--seed', '11',
            '-d', '120.5',
            '--mobility', '0.25',
            '--sf', '9',
            '--sharing', 'shared',
            '--format', 'json',
            '-v',
        ]);
        expect(args).toEqual({
            algorithm: 'qoca',
            devices: 5,
            seed: 11,
            durationS: 120.5,
            mobility: 0.25,
            spreadingFactor: 9,
            sharing: 'shared',
            format: 'json',
            verbose: true,
            help: false,
        });
    });

    it('should default to text output', () => {
        expect(parseCliArgs([])).toEqual({ format: 'text', verbose: false, help: false });
        expect(parseCliArgs(['--help']).help).toBe(true);
    });

    it('should reject malformed arguments', () => {
        expect(() => parseCliArgs(['--bogus'])).toThrow(ConfigError);
        expect(() => parseCliArgs(['-n'])).toThrow(ConfigError);
        expect(() => parseCliArgs(['-n', '--seed', '1'])).toThrow(ConfigError);
        expect(() => parseCliArgs(['-n', 'abc'])).toThrow(ConfigError);
        expect(() => parseCliArgs(['-n', '2.5'])).toThrow(ConfigError);
        expect(() => parseCliArgs(['--format', 'xml'])).toThrow(ConfigError);
        expect(() => parseCliArgs(['--sharing', 'global'])).toThrow(ConfigError);
    });

    it('should turn arguments into config overrides', () => {
        const args = parseCliArgs(['-a', 'tow', '--mobility', '0.5', '--interval', '8', '--transmissions', '40', '--payload', '12']);
        const overrides = cliOverrides(args, DEFAULT_EXPERIMENT_CONFIG);
        expect(overrides).toEqual({
            algorithm: 'tow',
            meanIntervalS: 8,
            payloadBytes: 12,
            maxTransmissions: 40,
            mobility: { ...DEFAULT_EXPERIMENT_CONFIG.mobility, fraction: 0.5 },
        });
    });
});

// ==================== Mobility ====================

describe('Mobility', () => {
    it('should place devices inside the disc', () => {
        const rng = createRng(3);
        const center = { x: 10, y: -20 };
        for (let i = 0; i < 200; i++) {
            expect(distance(uniformDiscPosition(500, rng, center), center)).toBeLessThanOrEqual(500);
        }
    });

    it('should keep the walk inside its square', () => {
        const walk = new RandomWalk({ x: 0, y: 0 }, { speedMps: 50, legDurationS: 3, boundM: 100 }, createRng(8));
        for (let t = 0; t <= 500; t += 7) {
            const p = walk.positionAt(t);
            expect(Math.abs(p.x)).toBeLessThanOrEqual(100 + 1e-9);
            expect(Math.abs(p.y)).toBeLessThanOrEqual(100 + 1e-9);
        }
    });

    it('should move at the configured speed within a leg', () => {
        const walk = new RandomWalk({ x: 0, y: 0 }, { speedMps: 2, legDurationS: 100, boundM: 1000 }, createRng(8));
        expect(distance(walk.positionAt(10), { x: 0, y: 0 })).toBeCloseTo(20, 9);
    });

    it('should not go back in time', () => {
        const walk = new RandomWalk({ x: 0, y: 0 }, { speedMps: 1, legDurationS: 5, boundM: 50 }, createRng(1));
        walk.positionAt(10);
        expect(() => walk.positionAt(5)).toThrow(RangeError);
    });
});

// ==================== Aggregate ====================

const SF7: TxParams = { spreadingFactor: 7, bandwidthHz: 125000, frequencyHz: 868100000, txPowerDbm: 14 };
const SF8: TxParams = { ...SF7, spreadingFactor: 8 };

function attempt(deviceId: number, timeS: number, params: TxParams, success: boolean, collided = false): TransmissionAttempt {
    return {
        deviceId,
        timeS,
        params,
        rssiDbm: -100,
        snrDb: 5,
        timeOnAirS: 0.1,
        energyMj: 2,
        success,
        collided,
        qualityMw: 1e-10,
        reward: success ? 1 : 0,
        bitsDelivered: success ? 160 : 0,
        degraded: false,
        nextTimeS: undefined,
    };
}

describe('RunAggregate', () => {
    it('should report zeros before any attempt', () => {
        const aggregate = new RunAggregate();
        expect(aggregate.pdr).toBe(0);
        const summary = aggregate.summary();
        expect(summary.packetsSent).toBe(0);
        expect(summary.energyEfficiencyBitsPerJ).toBe(0);
        expect(summary.avgTimeOnAirS).toBe(0);
        expect(aggregate.armSelections()).toEqual([]);
        expect(aggregate.lostBy(100)).toBe(0);
    });

    it('should fold attempts into run metrics', () => {
        const aggregate = new RunAggregate();
        aggregate.record(attempt(0, 1, SF7, true));
        aggregate.record(attempt(1, 2, SF7, false));
        aggregate.record(attempt(0, 3, SF8, false, true));

        const summary = aggregate.summary();
        expect(summary.packetsSent).toBe(3);
        expect(summary.packetsReceived).toBe(1);
        expect(summary.packetsLost).toBe(2);
        expect(summary.collisions).toBe(1);
        expect(summary.pdr).toBeCloseTo(1 / 3, 12);
        expect(summary.energyMj).toBe(6);
        expect(summary.bitsDelivered).toBe(160);
        expect(summary.energyEfficiencyBitsPerJ).toBeCloseTo(160 / 0.006, 6);
        expect(summary.avgTimeOnAirS).toBeCloseTo(0.1, 12);
        expect(summary.avgRssiDbm).toBe(-100);
        expect(summary.avgSnrDb).toBe(5);
        expect(summary.degradedSamples).toBe(0);
    });

    it('should count arm selections in order of first use', () => {
        const aggregate = new RunAggregate();
        aggregate.record(attempt(0, 1, SF7, true));
        aggregate.record(attempt(1, 2, SF8, true));
        aggregate.record(attempt(0, 3, SF7, true));

        const selections = aggregate.armSelections();
        expect(selections.map(s => [s.arm, s.count])).toEqual([
            ['SF7/125k/868.1MHz/14dBm', 2],
            ['SF8/125k/868.1MHz/14dBm', 1],
        ]);
        expect(selections[0].ratio).toBeCloseTo(2 / 3, 12);
    });

    it('should track cumulative losses over time', () => {
        const aggregate = new RunAggregate();
        aggregate.record(attempt(0, 1, SF7, true));
        aggregate.record(attempt(1, 2, SF7, false));
        aggregate.record(attempt(0, 3, SF8, false));

        expect(aggregate.lossSeries()).toEqual([
            { timeS: 2, cumulativeLost: 1 },
            { timeS: 3, cumulativeLost: 2 },
        ]);
        expect(aggregate.lostBy(0)).toBe(0);
        expect(aggregate.lostBy(2.5)).toBe(1);
        expect(aggregate.lostBy(10)).toBe(2);
    });

    it('should keep per-device totals', () => {
        const aggregate = new RunAggregate();
        aggregate.record(attempt(0, 1, SF7, true));
        aggregate.record(attempt(0, 3, SF8, false));
        expect(aggregate.device(0)).toEqual({
            packetsSent: 2,
            packetsReceived: 1,
            energyMj: 4,
            bitsDelivered: 160,
            airtimeS: 0.2,
        });
        expect(aggregate.device(5).packetsSent).toBe(0);
    });
});

// ==================== Driver ====================

describe('runExperiment', () => {
    it('should replay identically from the same seed', () => {
        const config = smallConfig({ algorithm: 'random', seed: 9 });
        const first = memoryLogger(config);
        const second = memoryLogger(config);
        const a = runExperiment(config, { logger: first });
        const b = runExperiment(config, { logger: second });

        const trace = (logger: MemoryLogger) => logger.transmissions.map(t => [t.time, t.deviceId, t.arm, t.success]);
        expect(first.transmissions.length).toBeGreaterThan(0);
        expect(trace(second)).toEqual(trace(first));
        expect(b.summary).toEqual(a.summary);
        expect(b.manifest.configHash).toBe(a.manifest.configHash);
    });

    it('should log every transmission in time order', () => {
        const config = smallConfig({ algorithm: 'fixed' });
        const logger = memoryLogger(config);
        const report = runExperiment(config, { logger });
        const times = logger.transmissions.map(t => t.time);
        expect(times).toEqual([...times].sort((x, y) => x - y));
        expect(logger.transmissions).toHaveLength(report.summary.packetsSent);
        expect(logger.devices).toHaveLength(3);
        expect(logger.reports).toHaveLength(1);
        expect(logger.events[0].message).toBe('Experiment started');
    });

    it('should keep the fixed policy on one arm per device', () => {
        const config = smallConfig({ algorithm: 'fixed' });
        const logger = memoryLogger(config);
        runExperiment(config, { logger });
        for (const deviceId of [0, 1, 2]) {
            const arms = new Set(logger.transmissions.filter(t => t.deviceId === deviceId).map(t => t.arm));
            expect(arms.size).toBe(1);
        }
    });

    it('should compute run metrics from the link outcomes', () => {
        const config = smallConfig({ maxTransmissions: 4, simulationTimeS: 1e6 });
        const report = runExperiment(config, { linkModel: new ScriptedLinkModel(() => true) });
        expect(report.summary.packetsSent).toBe(12);
        expect(report.summary.pdr).toBe(1);
        expect(report.summary.bitsDelivered).toBe(12 * 160);
        expect(report.summary.energyEfficiencyBitsPerJ).toBeCloseTo(160000, 6);
        expect(report.lossSeries).toEqual([]);
        expect(report.scheduler.executed).toBe(12);
        expect(report.devices.map(d => d.totals.packetsSent)).toEqual([4, 4, 4]);
    });

    it('should log the success indicator as the reward in a default run', () => {
        const config = smallConfig({ maxTransmissions: 3, simulationTimeS: 1e6 });
        const logger = memoryLogger(config);
        runExperiment(config, { logger, linkModel: new ScriptedLinkModel(() => true, 0.05, 2.5) });
        expect(logger.transmissions).toHaveLength(9);
        expect(logger.transmissions.map(t => t.reward)).toEqual(Array(9).fill(1));
    });

    it('should log inverse energy when the policy is configured for it', () => {
        const config = smallConfig({
            maxTransmissions: 2,
            simulationTimeS: 1e6,
            policy: { reward: { convention: 'inverse-energy' } },
        });
        const logger = memoryLogger(config);
        runExperiment(config, { logger, linkModel: new ScriptedLinkModel(() => true, 0.05, 2.5) });
        expect(logger.transmissions).toHaveLength(6);
        expect(logger.transmissions.map(t => t.reward)).toEqual(Array(6).fill(0.4));
    });

    it('should record every loss when nothing gets through', () => {
        const config = smallConfig({ maxTransmissions: 2, simulationTimeS: 1e6 });
        const report = runExperiment(config, { linkModel: new ScriptedLinkModel(() => false) });
        expect(report.summary.pdr).toBe(0);
        expect(report.lossSeries).toHaveLength(6);
        expect(report.lossSeries[5].cumulativeLost).toBe(6);
    });

    it('should pin the spreading factor for the whole run', () => {
        const config = smallConfig({ fixedSpreadingFactor: 9 });
        const logger = memoryLogger(config);
        runExperiment(config, { logger });
        expect(logger.transmissions.length).toBeGreaterThan(0);
        expect(logger.transmissions.every(t => t.arm.startsWith('SF9/'))).toBe(true);
    });

    it('should give each device its own policy by default', () => {
        const report = runExperiment(smallConfig());
        expect(report.sharedPolicyCounters).toBeUndefined();
        const attempts = report.devices.reduce((sum, d) => sum + (d.policyCounters?.attempts ?? 0), 0);
        expect(attempts).toBe(report.summary.packetsSent);
    });

    it('should feed one policy from every device when shared', () => {
        const report = runExperiment(smallConfig({ policySharing: 'shared' }));
        expect(report.sharedPolicyCounters?.attempts).toBe(report.summary.packetsSent);
        expect(report.devices.every(d => d.policyCounters === undefined)).toBe(true);
    });

    it('should make the last devices mobile', () => {
        const config = smallConfig({
            devices: 4,
            mobility: { ...DEFAULT_EXPERIMENT_CONFIG.mobility, fraction: 0.5 },
        });
        const report = runExperiment(config);
        expect(report.devices.map(d => d.mobile)).toEqual([false, false, true, true]);
        for (const device of report.devices) {
            expect(distance(device.initialPosition, { x: 0, y: 0 })).toBeLessThanOrEqual(config.radiusM);
        }
    });

    it('should run a channel-profile preset', () => {
        const report = runExperiment(presetConfig('qoca', { devices: 2, simulationTimeS: 60 }));
        expect(report.summary.packetsSent).toBeGreaterThan(0);
        expect(report.summary.degradedSamples).toBe(0);
        expect(report.policy).toBe('qoca');
    });

    it('should fail before any event for an unknown algorithm', () => {
        const config = smallConfig({ algorithm: 'ucb2' });
        const logger = memoryLogger(config);
        expect(() => runExperiment(config, { logger })).toThrow(UnknownPolicyError);
        expect(logger.transmissions).toHaveLength(0);
        expect(logger.events).toHaveLength(0);
    });

    it('should reject an invalid config', () => {
        expect(() => runExperiment(smallConfig({ devices: 0 }))).toThrow(ConfigError);
    });
});
